import { earningsService } from '../../../../lib/runtime';
import { CompanySearchQuerySchema, firstIssue, searchParamsObject } from '../../../../lib/schemas';

export const runtime = 'nodejs';

export async function GET(request: Request) {
  const parsed = CompanySearchQuerySchema.safeParse(searchParamsObject(new URL(request.url).searchParams));
  if (!parsed.success) {
    return Response.json({ error: firstIssue(parsed.error) }, { status: 400 });
  }

  const results = await earningsService.searchCompany(parsed.data.q, parsed.data.region);
  return Response.json(results);
}
