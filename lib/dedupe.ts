import { companyKey } from './companyNames';
import type { DocumentRecord } from './documents';

export type SourcePriorities = Readonly<Record<string, number>>;

// Lower wins: exchange filings, then company IR and regulators, then aggregators.
export const SOURCE_PRIORITY: SourcePriorities = {
  bse: 0,
  nse: 0,
  company_ir: 1,
  edgar: 1,
  tdnet: 1,
  dart: 1,
  cninfo: 1,
  screener: 2,
  trendlyne: 3,
};

export const UNKNOWN_SOURCE_PRIORITY = 99;

export function sourcePriority(source: string, priorities: SourcePriorities = SOURCE_PRIORITY) {
  return Object.hasOwn(priorities, source) ? priorities[source] : UNKNOWN_SOURCE_PRIORITY;
}

export function urlKey(url: string) {
  return url.toLowerCase().replace(/\/+$/, '');
}

export function semanticKey(record: DocumentRecord) {
  return JSON.stringify([companyKey(record.company), record.quarter, record.year, record.docType]);
}

function keepPreferred(
  records: readonly DocumentRecord[],
  keyOf: (record: DocumentRecord) => string,
  priorities: SourcePriorities,
) {
  const kept = new Map<string, DocumentRecord>();
  for (const record of records) {
    const key = keyOf(record);
    const existing = kept.get(key);
    if (
      !existing ||
      sourcePriority(record.source, priorities) < sourcePriority(existing.source, priorities)
    ) {
      kept.set(key, record);
    }
  }
  return [...kept.values()];
}

/**
 * Collapses records that point at the same document. URL identity is resolved first,
 * then (company, quarter, year, doc type) identity among the survivors; each time the
 * record from the lowest-priority-value source wins and ties keep the first seen.
 */
export function deduplicateDocuments(
  records: readonly DocumentRecord[],
  priorities: SourcePriorities = SOURCE_PRIORITY,
): DocumentRecord[] {
  const byUrl = keepPreferred(records, (record) => urlKey(record.url), priorities);
  return keepPreferred(byUrl, semanticKey, priorities);
}
