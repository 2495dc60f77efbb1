import type { DocTypeFlags, DocumentRecord } from '../documents';
import type { FiscalYearType, Region } from '../regions';

export type CompanyDescriptor = {
  name: string;
  url: string;
  source: string;
  region: Region;
  symbol: string | null;
  identifier: string | null;
};

export type FetchDocumentsOptions = DocTypeFlags & {
  count: number;
};

/**
 * One document provider for one region. Implementations tag every record with their
 * own `sourceName` and the period convention of their region, and never let a network
 * failure escape: they log it and return what they have.
 */
export interface SourceAdapter {
  readonly region: Region;
  readonly sourceName: string;
  readonly priority: number;
  readonly fiscalYearType: FiscalYearType;
  searchCompany(query: string): Promise<CompanyDescriptor | null>;
  getEarningsDocuments(company: string, options: FetchDocumentsOptions): Promise<DocumentRecord[]>;
}
