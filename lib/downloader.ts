import { access, mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import pLimit from 'p-limit';
import { config } from './config';
import { documentFilename, type DocumentRecord } from './documents';
import { errorMessage, headersForUrl } from './http';

export type DownloadOptions = {
  concurrency?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
};

export type DownloadResult = {
  record: DocumentRecord;
  ok: boolean;
  skipped: boolean;
  path: string | null;
  error: string | null;
};

export function companyFolderName(company: string) {
  return company
    .replace(/[^\p{L}\p{N} \-_]/gu, '_')
    .trim()
    .replace(/ /g, '_');
}

export function companyOutputDir(company: string, outputDir = config.outputDir) {
  return path.join(outputDir, companyFolderName(company));
}

async function fileExists(filePath: string) {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

export async function downloadDocument(
  record: DocumentRecord,
  outputDir: string,
  options: DownloadOptions = {},
): Promise<DownloadResult> {
  const maxRetries = Math.max(1, options.maxRetries ?? config.maxRetries);
  const retryDelayMs = options.retryDelayMs ?? config.retryDelayMs;
  const timeoutMs = options.timeoutMs ?? config.requestTimeoutMs * 2;
  const filePath = path.join(outputDir, documentFilename(record));

  if (await fileExists(filePath)) {
    return { record, ok: true, skipped: true, path: filePath, error: null };
  }

  let lastError = 'not attempted';
  for (let attempt = 1; attempt <= maxRetries; attempt += 1) {
    try {
      const res = await fetch(record.url, {
        headers: { ...headersForUrl(record.url), Accept: '*/*' },
        signal: AbortSignal.timeout(timeoutMs),
      });
      if (res.status === 200) {
        await writeFile(filePath, Buffer.from(await res.arrayBuffer()));
        return { record, ok: true, skipped: false, path: filePath, error: null };
      }
      lastError = `HTTP ${res.status}`;
    } catch (error) {
      lastError = errorMessage(error);
    }
    if (attempt < maxRetries) await sleep(retryDelayMs);
  }

  console.warn('[downloader] download failed', { url: record.url, attempts: maxRetries, error: lastError });
  return { record, ok: false, skipped: false, path: null, error: lastError };
}

/**
 * Fetches every record into `outputDir`, a few at a time. Existing files are left in
 * place; one failed file never stops the others. Results follow the input order.
 */
export async function downloadDocuments(
  records: readonly DocumentRecord[],
  outputDir: string,
  options: DownloadOptions = {},
): Promise<DownloadResult[]> {
  await mkdir(outputDir, { recursive: true });
  const limit = pLimit(Math.max(1, options.concurrency ?? config.downloadConcurrency));
  return Promise.all(records.map((record) => limit(() => downloadDocument(record, outputDir, options))));
}

/** Joins segments under `outputDir`; null when the result would land outside it. */
export function resolveInsideOutputDir(segments: readonly string[], outputDir = config.outputDir) {
  const root = path.resolve(outputDir);
  const target = path.resolve(root, ...segments);
  return target.startsWith(`${root}${path.sep}`) ? target : null;
}
