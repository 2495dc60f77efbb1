import type { Region } from '../regions';
import type { SourceAdapter } from './types';

export class SourceRegistry {
  private readonly sources = new Map<Region, SourceAdapter[]>();

  /** Adds an adapter to its region, keeping the list ordered by priority. Re-registering a name is a no-op. */
  register(source: SourceAdapter) {
    const current = this.sources.get(source.region) ?? [];
    if (current.some((existing) => existing.sourceName === source.sourceName)) return this;
    const next = [...current, source].sort((a, b) => a.priority - b.priority);
    this.sources.set(source.region, next);
    return this;
  }

  getSources(region: Region): readonly SourceAdapter[] {
    return this.sources.get(region) ?? [];
  }

  getAllSources(): SourceAdapter[] {
    return [...this.sources.values()].flat();
  }

  getRegions(): Region[] {
    return [...this.sources.keys()];
  }

  getSourceByName(name: string) {
    return this.getAllSources().find((source) => source.sourceName === name) ?? null;
  }

  clear() {
    this.sources.clear();
  }
}
