import path from 'node:path';
import { config } from '../../../lib/config';
import { companyOutputDir, downloadDocuments } from '../../../lib/downloader';
import { earningsService } from '../../../lib/runtime';
import { DownloadRequestSchema, firstIssue } from '../../../lib/schemas';

export const runtime = 'nodejs';

export async function POST(request: Request) {
  const body: unknown = await request.json().catch(() => ({}));
  const parsed = DownloadRequestSchema.safeParse(body);
  if (!parsed.success) {
    return Response.json({ error: firstIssue(parsed.error) }, { status: 400 });
  }
  const { company, region, count, ...flags } = parsed.data;

  const documents = await earningsService.getEarningsDocuments(company, {
    region,
    count: count ?? config.quartersPerCompany,
    ...flags,
  });
  if (documents.length === 0) {
    return Response.json({ error: 'No documents found for this company.' }, { status: 404 });
  }

  const outputDir = companyOutputDir(company);
  const results = await downloadDocuments(documents, outputDir);
  const fileCount = results.filter((result) => result.ok).length;
  const folder = path.basename(outputDir);

  console.info('[downloads] completed', { company, region, fileCount, total: documents.length });
  return Response.json({
    message: `Downloaded ${fileCount} of ${documents.length} files to ${outputDir}`,
    fileCount,
    downloadUrl: `/api/downloads/${encodeURIComponent(folder)}`,
  });
}
