import { z } from 'zod';
import { REGIONS } from './regions';

export const RegionSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(
    z.enum(REGIONS, {
      errorMap: (_issue, ctx) => ({ message: `Invalid region: ${String(ctx.data)}` }),
    }),
  );

function clampedInt(min: number, max: number, label: string) {
  return z.coerce
    .number({ invalid_type_error: `${label} must be a number.` })
    .int(`${label} must be a whole number.`)
    .transform((value) => Math.min(max, Math.max(min, value)));
}

const CountSchema = clampedInt(1, 20, 'Count');

function requiredText(message: string) {
  return z.string({ required_error: message }).trim().min(1, message);
}

const CompanyNameSchema = requiredText('Provide a company name.');

// SEC company_tickers.json: { "0": { cik_str, ticker, title }, ... }
export const TickerMapSchema = z.record(z.unknown());

export const TickerEntrySchema = z.object({
  cik_str: z.coerce.number().int().nonnegative(),
  ticker: z.string().trim().min(1),
  title: z.string().trim(),
});

export const SubmissionsSchema = z.object({
  filings: z.object({
    recent: z.object({
      form: z.array(z.string()),
      filingDate: z.array(z.string()),
      accessionNumber: z.array(z.string()),
      primaryDocument: z.array(z.string()),
      items: z.array(z.string()).default([]),
    }),
  }),
});

export type RecentFilings = z.infer<typeof SubmissionsSchema>['filings']['recent'];

export const ScreenerSearchSchema = z.array(
  z.object({
    name: z.string().trim().default(''),
    url: z.string().trim().min(1),
  }),
);

export const CompanySearchQuerySchema = z.object({
  q: requiredText('Provide a company name to search.'),
  region: RegionSchema.optional(),
});

export const SuggestQuerySchema = z.object({
  q: requiredText('Provide a company name to suggest.'),
  region: RegionSchema.default('india'),
  limit: clampedInt(1, 50, 'Limit').default(20),
});

export const DocumentQuerySchema = z.object({
  company: CompanyNameSchema,
  region: RegionSchema.default('india'),
  count: CountSchema.optional(),
  types: z.string().optional(),
});

export const DownloadRequestSchema = z.object({
  company: CompanyNameSchema,
  region: RegionSchema.default('india'),
  count: CountSchema.optional(),
  includeTranscripts: z.boolean().default(true),
  includePresentations: z.boolean().default(true),
  includePressReleases: z.boolean().default(true),
});

export type DownloadRequest = z.infer<typeof DownloadRequestSchema>;

/** First issue message of a failed parse, for `{ error }` responses. */
export function firstIssue(error: z.ZodError) {
  return error.issues[0]?.message ?? 'Invalid request.';
}

/** Query-string parameters as a plain object; repeated keys keep the first value. */
export function searchParamsObject(params: URLSearchParams) {
  const result: Record<string, string> = {};
  params.forEach((value, key) => {
    if (!(key in result)) result[key] = value;
  });
  return result;
}

// Shapes the UI reads back from the API.
export const DocumentRowSchema = z.object({
  company: z.string(),
  quarter: z.string(),
  year: z.string(),
  docType: z.string(),
  url: z.string(),
  source: z.string(),
  filename: z.string(),
});

export type DocumentRow = z.infer<typeof DocumentRowSchema>;

export const SuggestionSchema = z.object({
  name: z.string().min(1),
  label: z.string().min(1),
});

export type Suggestion = z.infer<typeof SuggestionSchema>;

export const ApiErrorSchema = z.object({ error: z.string() });

export const DownloadResponseSchema = z.object({ message: z.string() });
