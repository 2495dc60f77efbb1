import './globals.css';
import type { ReactNode } from 'react';

export const metadata = {
  title: 'Earnings Document Finder',
  description: 'Find and download earnings call documents across regions',
};

export default function RootLayout({
  children,
}: {
  children: ReactNode;
}) {
  return (
    <html lang="en">
      <body>{children}</body>
    </html>
  );
}
