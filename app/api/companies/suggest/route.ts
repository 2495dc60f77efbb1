import { earningsService, scripStore } from '../../../../lib/runtime';
import { firstIssue, searchParamsObject, SuggestQuerySchema } from '../../../../lib/schemas';
import type { ScripSuggestion } from '../../../../lib/scripStore';

export const runtime = 'nodejs';

export async function GET(request: Request) {
  const parsed = SuggestQuerySchema.safeParse(searchParamsObject(new URL(request.url).searchParams));
  if (!parsed.success) {
    return Response.json({ error: firstIssue(parsed.error) }, { status: 400 });
  }
  const { q: query, region, limit } = parsed.data;

  if (region === 'india') {
    return Response.json(scripStore.suggest(query, limit));
  }

  const results = await earningsService.searchCompany(query, region);
  const suggestions: ScripSuggestion[] = results
    .filter((result) => result.name)
    .slice(0, limit)
    .map((result) => ({
      name: result.name,
      symbol: result.symbol ?? '',
      identifier: result.identifier ?? '',
      label: result.symbol ? `${result.name} (${result.symbol})` : result.name,
    }));
  return Response.json(suggestions);
}
