import { earningsService } from '../../../../lib/runtime';

export const runtime = 'nodejs';

export async function GET() {
  return Response.json(earningsService.getAvailableRegions());
}
