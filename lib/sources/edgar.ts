import { companyKey } from '../companyNames';
import { createDocumentRecord, isDocTypeIncluded, type DocType, type DocTypeFlags, type DocumentRecord } from '../documents';
import { fuzzyMatchCompany } from '../fuzzyMatch';
import { errorMessage, fetchJson } from '../http';
import { calendarPeriodFromFilingDate, limitByQuarter } from '../periods';
import { SubmissionsSchema, TickerEntrySchema, TickerMapSchema } from '../schemas';
import type { CompanyDescriptor, FetchDocumentsOptions, SourceAdapter } from './types';

const SEC_BASE = 'https://data.sec.gov';
const SEC_ARCHIVES = 'https://www.sec.gov';
const SEC_FILES = 'https://www.sec.gov/files/company_tickers.json';

const RESOLVED_CACHE_SIZE = 500;

const FORM_DOC_TYPES: Record<string, DocType> = {
  '10-Q': 'transcript',
  '10-K': 'presentation',
  '8-K': 'press_release',
};

export type TickerInfo = {
  cik: string;
  ticker: string;
  name: string;
};

export type TickerIndex = {
  byName: Map<string, TickerInfo>;
  byTicker: Map<string, TickerInfo>;
};

export function buildTickerIndex(data: unknown): TickerIndex {
  const index: TickerIndex = { byName: new Map(), byTicker: new Map() };
  const parsed = TickerMapSchema.safeParse(data);
  if (!parsed.success) return index;
  for (const raw of Object.values(parsed.data)) {
    const entry = TickerEntrySchema.safeParse(raw);
    if (!entry.success) continue;
    const ticker = entry.data.ticker.toUpperCase();
    const name = entry.data.title;
    const info = { cik: String(entry.data.cik_str).padStart(10, '0'), ticker, name };
    const nameKey = companyKey(name);
    if (nameKey && !index.byName.has(nameKey)) index.byName.set(nameKey, info);
    if (!index.byTicker.has(ticker.toLowerCase())) index.byTicker.set(ticker.toLowerCase(), info);
  }
  return index;
}

/**
 * Resolves a company name or ticker: exact name or ticker first, then substring
 * containment on names, then a fuzzy match.
 */
export function findTickerInfo(index: TickerIndex, query: string): TickerInfo | null {
  const key = companyKey(query);
  if (!key) return null;

  const direct = index.byName.get(key) ?? index.byTicker.get(key);
  if (direct) return direct;

  if (key.length >= 3) {
    for (const [name, info] of index.byName) {
      if (name.length >= 3 && (name.includes(key) || key.includes(name))) return info;
    }
  }

  const [best] = fuzzyMatchCompany(query, [...index.byName.keys()], 70);
  return best ? (index.byName.get(best[0]) ?? null) : null;
}

/**
 * `findTickerInfo` over one index, remembering the most recent answers (misses
 * included) so repeated lookups skip the fuzzy scan.
 */
export class TickerResolver {
  private readonly resolved = new Map<string, TickerInfo | null>();

  constructor(
    private readonly index: TickerIndex,
    private readonly capacity = RESOLVED_CACHE_SIZE,
  ) {}

  get size() {
    return this.resolved.size;
  }

  resolve(query: string): TickerInfo | null {
    const key = companyKey(query);
    const cached = this.resolved.get(key);
    if (cached !== undefined) {
      this.resolved.delete(key);
      this.resolved.set(key, cached);
      return cached;
    }

    const info = findTickerInfo(this.index, query);
    this.resolved.set(key, info);
    if (this.resolved.size > this.capacity) {
      const [oldest] = this.resolved.keys();
      this.resolved.delete(oldest);
    }
    return info;
  }
}

function parseFilingDate(filingDate: string) {
  const parsed = new Date(`${filingDate}T00:00:00Z`);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * Turns the `filings.recent` block of an EDGAR submissions document into records.
 * 10-Q, 10-K and 8-K filings map to transcript, presentation and press release; an
 * 8-K is kept only when it carries item 2.02 (results of operations) or lists no items.
 */
export function documentsFromSubmissions(
  submissions: unknown,
  company: TickerInfo,
  flags: DocTypeFlags,
): DocumentRecord[] {
  const parsed = SubmissionsSchema.safeParse(submissions);
  if (!parsed.success) return [];
  const { form: forms, filingDate: filingDates, accessionNumber: accessions, primaryDocument: primaryDocuments, items } =
    parsed.data.filings.recent;

  const records: DocumentRecord[] = [];
  for (let i = 0; i < forms.length; i += 1) {
    const form = forms[i];
    const docType = FORM_DOC_TYPES[form];
    if (!docType || !isDocTypeIncluded(docType, flags)) continue;
    const itemList = items[i] ?? '';
    if (form === '8-K' && itemList && !itemList.includes('2.02')) continue;

    const filingDate = filingDates[i] ?? '';
    const period = calendarPeriodFromFilingDate(filingDate, form);
    if (period.quarter === null) continue;

    const accession = (accessions[i] ?? '').replace(/-/g, '');
    const primaryDocument = primaryDocuments[i] ?? '';
    if (!accession || !primaryDocument) continue;

    records.push(
      createDocumentRecord({
        company: company.name,
        quarter: period.quarter,
        year: period.year,
        docType,
        url: `${SEC_ARCHIVES}/Archives/edgar/data/${Number(company.cik)}/${accession}/${primaryDocument}`,
        source: 'edgar',
        date: parseFilingDate(filingDate),
      }),
    );
  }
  return records;
}

/** SEC EDGAR filings for US issuers. EDGAR carries no call transcripts, so 10-Qs stand in for them. */
export class EdgarSource implements SourceAdapter {
  readonly region = 'us';
  readonly sourceName = 'edgar';
  readonly priority = 1;
  readonly fiscalYearType = 'calendar';

  private resolver: TickerResolver | null = null;

  private async loadResolver() {
    if (this.resolver) return this.resolver;
    try {
      this.resolver = new TickerResolver(buildTickerIndex(await fetchJson(SEC_FILES)));
      return this.resolver;
    } catch (error) {
      console.error('[edgar] ticker map failed', { error: errorMessage(error) });
      return null;
    }
  }

  private async findCompany(query: string) {
    const resolver = await this.loadResolver();
    return resolver ? resolver.resolve(query) : null;
  }

  async searchCompany(query: string): Promise<CompanyDescriptor | null> {
    const info = await this.findCompany(query);
    if (!info) return null;
    return {
      name: info.name,
      url: `${SEC_ARCHIVES}/cgi-bin/browse-edgar?action=getcompany&CIK=${info.cik}&type=10-&dateb=&owner=include&count=40`,
      source: this.sourceName,
      region: this.region,
      symbol: info.ticker,
      identifier: info.cik,
    };
  }

  async getEarningsDocuments(company: string, options: FetchDocumentsOptions) {
    const info = await this.findCompany(company);
    if (!info) {
      console.warn('[edgar] company not found', { company });
      return [];
    }

    try {
      const submissions = await fetchJson(`${SEC_BASE}/submissions/CIK${info.cik}.json`);
      return limitByQuarter(documentsFromSubmissions(submissions, info, options), options.count);
    } catch (error) {
      console.error('[edgar] submissions fetch failed', { company, cik: info.cik, error: errorMessage(error) });
      return [];
    }
  }
}
