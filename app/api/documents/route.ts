import { config } from '../../../lib/config';
import { docTypeFlags, documentFilename, parseDocTypes } from '../../../lib/documents';
import { earningsService } from '../../../lib/runtime';
import { DocumentQuerySchema, firstIssue, searchParamsObject } from '../../../lib/schemas';

export const runtime = 'nodejs';

export async function GET(request: Request) {
  const parsed = DocumentQuerySchema.safeParse(searchParamsObject(new URL(request.url).searchParams));
  if (!parsed.success) {
    return Response.json({ error: firstIssue(parsed.error) }, { status: 400 });
  }
  const { company, region, count, types } = parsed.data;

  const documents = await earningsService.getEarningsDocuments(company, {
    region,
    count: count ?? config.quartersPerCompany,
    ...docTypeFlags(parseDocTypes(types)),
  });

  return Response.json(
    documents.map((doc) => ({
      company: doc.company,
      quarter: doc.quarter,
      year: doc.year,
      docType: doc.docType,
      url: doc.url,
      source: doc.source,
      date: doc.date ? doc.date.toISOString() : null,
      filename: documentFilename(doc),
    })),
  );
}
