import { deduplicateDocuments } from './dedupe';
import type { DocTypeFlags, DocumentRecord } from './documents';
import { errorMessage } from './http';
import { REGION_INFO, REGIONS, type Region } from './regions';
import type { SourceRegistry } from './sources/registry';
import type { CompanyDescriptor, SourceAdapter } from './sources/types';

export type DocumentQuery = DocTypeFlags & {
  region: Region;
  count: number;
};

export type RegionSummary = {
  id: Region;
  name: string;
  fiscalYear: string;
  sources: string[];
};

export class EarningsService {
  constructor(private readonly registry: SourceRegistry) {}

  private sourcesFor(region?: Region): readonly SourceAdapter[] {
    return region ? this.registry.getSources(region) : this.registry.getAllSources();
  }

  /** Asks every adapter of the region (or of all regions) for the company; misses and failures are skipped. */
  async searchCompany(query: string, region?: Region): Promise<CompanyDescriptor[]> {
    const results = await Promise.all(
      this.sourcesFor(region).map((source) =>
        source.searchCompany(query).catch((error: unknown) => {
          console.error('[earnings] search failed', {
            source: source.sourceName,
            query,
            error: errorMessage(error),
          });
          return null;
        }),
      ),
    );
    return results.filter((result): result is CompanyDescriptor => result !== null);
  }

  /**
   * Collects documents from every adapter registered for the region, in priority
   * order, and reconciles them into one list.
   */
  async getEarningsDocuments(company: string, query: DocumentQuery): Promise<DocumentRecord[]> {
    const { region, ...options } = query;
    const sources = this.registry.getSources(region);
    if (sources.length === 0) {
      console.info('[earnings] no sources registered', { region });
      return [];
    }

    const batches = await Promise.all(
      sources.map((source) =>
        source.getEarningsDocuments(company, options).catch((error: unknown) => {
          console.error('[earnings] source failed', {
            source: source.sourceName,
            company,
            error: errorMessage(error),
          });
          return [];
        }),
      ),
    );
    const combined = batches.flat();
    const documents = deduplicateDocuments(combined);
    console.info('[earnings] documents collected', {
      company,
      region,
      found: combined.length,
      kept: documents.length,
    });
    return documents;
  }

  getAvailableRegions(): RegionSummary[] {
    return REGIONS.map((id) => ({
      id,
      name: REGION_INFO[id].name,
      fiscalYear: REGION_INFO[id].fiscalYear,
      sources: this.registry.getSources(id).map((source) => source.sourceName),
    }));
  }
}
