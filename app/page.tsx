import { DocumentFinderClient } from '../components/DocumentFinderClient';

export const metadata = {
  title: 'Earnings Document Finder',
};

export default function HomePage() {
  return (
    <main>
      <h1>Earnings Document Finder</h1>
      <p>
        <em>
          Find earnings call transcripts, investor presentations and press releases for
          listed companies in India, the US, Japan, Korea and China, then download them in
          one go.
        </em>
      </p>
      <DocumentFinderClient />
    </main>
  );
}
