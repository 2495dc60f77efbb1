import { z } from 'zod';
import {
  ApiErrorSchema,
  DocumentRowSchema,
  DownloadResponseSchema,
  SuggestionSchema,
  type DocumentRow,
  type Suggestion,
} from './schemas';

export function canSubmitSearch(company: string, docTypes: readonly string[], loading: boolean) {
  return !loading && company.trim().length > 0 && docTypes.length > 0;
}

export function errorFrom(data: unknown, fallback: string) {
  const parsed = ApiErrorSchema.safeParse(data);
  return parsed.success ? parsed.data.error : fallback;
}

/** Rows that fail validation are dropped. */
export function toDocumentRows(data: unknown): DocumentRow[] {
  const parsed = z.array(z.unknown()).safeParse(data);
  if (!parsed.success) return [];
  return parsed.data.flatMap((row) => {
    const result = DocumentRowSchema.safeParse(row);
    return result.success ? [result.data] : [];
  });
}

export function toSuggestions(data: unknown): Suggestion[] {
  const parsed = z.array(z.unknown()).safeParse(data);
  if (!parsed.success) return [];
  return parsed.data.flatMap((row) => {
    const result = SuggestionSchema.safeParse(row);
    return result.success ? [result.data] : [];
  });
}

export function downloadMessage(data: unknown) {
  const parsed = DownloadResponseSchema.safeParse(data);
  return parsed.success ? parsed.data.message : 'Download finished.';
}
