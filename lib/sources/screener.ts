import { load, type CheerioAPI } from 'cheerio';
import { normalizeCompanyName } from '../companyNames';
import { createDocumentRecord, UNKNOWN_QUARTER, type DocType, type DocumentRecord } from '../documents';
import { errorMessage, fetchJson, fetchText, toAbsoluteUrl } from '../http';
import { limitByQuarter, parsePeriod, toFiscalYearLabel } from '../periods';
import { ScreenerSearchSchema } from '../schemas';
import type { CompanyDescriptor, FetchDocumentsOptions, SourceAdapter } from './types';

const BASE_URL = 'https://www.screener.in';
const SEARCH_URL = 'https://www.screener.in/api/company/search/';

const LINK_PATTERNS: Array<{ docType: DocType; pattern: RegExp }> = [
  { docType: 'transcript', pattern: /transcript/i },
  { docType: 'presentation', pattern: /ppt|presentation/i },
];

function findDocumentsSection($: CheerioAPI) {
  const byId = $('#documents').first();
  if (byId.length > 0) return byId;

  const sectionById = $('section')
    .filter((_, el) => /document|concall/i.test($(el).attr('id') ?? ''))
    .first();
  if (sectionById.length > 0) return sectionById;

  const byClass = $('div, section')
    .filter((_, el) =>
      ($(el).attr('class') ?? '')
        .split(/\s+/)
        .some((name) => /concall|document/i.test(name)),
    )
    .first();
  if (byClass.length > 0) return byClass;

  const exchangePdf = $('a')
    .filter((_, el) => /(bseindia|nseindia).*\.pdf/i.test($(el).attr('href') ?? ''))
    .first();
  if (exchangePdf.length > 0) {
    const section = exchangePdf.closest('section');
    return section.length > 0 ? section : exchangePdf.closest('div');
  }
  return null;
}

function periodFromContext(context: string) {
  const period = parsePeriod(context);
  if (period.quarter === null) return { quarter: UNKNOWN_QUARTER, year: '' };
  return { quarter: period.quarter, year: toFiscalYearLabel(period.year) };
}

/**
 * Reads transcript (and optionally presentation) links out of a Screener company page.
 * The period comes from the text of the list item around each link.
 */
export function parseScreenerDocuments(
  html: string,
  options: { fallbackName: string; includeTranscripts: boolean; includePresentations: boolean },
): DocumentRecord[] {
  const $ = load(html);
  const company = $('h1.margin-0').first().text().trim() || options.fallbackName;
  const section = findDocumentsSection($);
  if (!section) {
    console.warn('[screener] no documents section', { company });
    return [];
  }

  const wanted = LINK_PATTERNS.filter(({ docType }) =>
    docType === 'transcript' ? options.includeTranscripts : options.includePresentations,
  );
  const seen = new Set<string>();
  const records: DocumentRecord[] = [];

  for (const { docType, pattern } of wanted) {
    section
      .find('a')
      .filter((_, el) => pattern.test($(el).text()))
      .each((_, el) => {
        const href = ($(el).attr('href') ?? '').trim();
        if (!href || seen.has(href)) return;
        seen.add(href);
        const url = href.startsWith('http') ? href : toAbsoluteUrl(BASE_URL, href);
        if (!url) return;

        const context = $(el).closest('li').text().replace(/\s+/g, ' ').trim();
        const { quarter, year } = periodFromContext(context);
        records.push(createDocumentRecord({ company, quarter, year, docType, url, source: 'screener' }));
      });
  }
  return records;
}

/** Screener.in concall listings for Indian companies. */
export class ScreenerSource implements SourceAdapter {
  readonly region = 'india';
  readonly sourceName = 'screener';
  readonly priority = 2;
  readonly fiscalYearType = 'indian';

  async searchCompany(query: string): Promise<CompanyDescriptor | null> {
    const normalized = normalizeCompanyName(query);
    if (!normalized) return null;
    try {
      const parsed = ScreenerSearchSchema.safeParse(
        await fetchJson(`${SEARCH_URL}?q=${encodeURIComponent(normalized)}`),
      );
      if (!parsed.success) {
        console.warn('[screener] unexpected search response', { query, issue: parsed.error.issues[0]?.message });
        return null;
      }
      const [first] = parsed.data;
      if (!first) return null;
      const url = toAbsoluteUrl(BASE_URL, first.url);
      if (!url) return null;
      return {
        name: first.name || normalized,
        url,
        source: this.sourceName,
        region: this.region,
        symbol: null,
        identifier: null,
      };
    } catch (error) {
      console.error('[screener] search failed', { query, error: errorMessage(error) });
      return null;
    }
  }

  async getEarningsDocuments(company: string, options: FetchDocumentsOptions) {
    const match = await this.searchCompany(company);
    if (!match) {
      console.warn('[screener] company not found', { company });
      return [];
    }

    try {
      const html = await fetchText(match.url);
      const records = parseScreenerDocuments(html, {
        fallbackName: company,
        includeTranscripts: options.includeTranscripts,
        includePresentations: options.includePresentations,
      });
      return limitByQuarter(records, options.count);
    } catch (error) {
      console.error('[screener] company page failed', { company, url: match.url, error: errorMessage(error) });
      return [];
    }
  }
}
