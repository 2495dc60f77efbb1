function readInt(name: string, fallback: number) {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export const config = {
  outputDir: process.env.OUTPUT_DIR ?? './downloads',
  scripPath: process.env.BSE_SCRIP_PATH ?? './data/bse_scrip.csv',
  quartersPerCompany: readInt('QUARTERS_PER_COMPANY', 5),
  requestTimeoutMs: readInt('REQUEST_TIMEOUT_MS', 30_000),
  maxRetries: Math.max(1, readInt('MAX_RETRIES', 3)),
  retryDelayMs: readInt('RETRY_DELAY_MS', 1_000),
  downloadConcurrency: Math.max(1, readInt('DOWNLOAD_CONCURRENCY', 4)),
  userAgent:
    process.env.USER_AGENT ??
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36',
  // SEC asks automated clients to identify themselves with a contact address.
  secUserAgent: process.env.SEC_USER_AGENT ?? 'EarningsDocumentFinder/1.0 (admin@example.com)',
};
