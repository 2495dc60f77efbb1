import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createDocumentRecord } from '../lib/documents';
import { EarningsService } from '../lib/earningsService';
import { SourceRegistry } from '../lib/sources/registry';
import type { CompanyDescriptor } from '../lib/sources/types';
import { FakeSource } from './helpers/fakeSource';

const flags = { includeTranscripts: true, includePresentations: true, includePressReleases: false };

const screenerCopy = createDocumentRecord({
  company: 'Foo Ltd',
  quarter: 'Q3',
  year: 'FY26',
  docType: 'transcript',
  url: 'https://www.screener.in/foo-q3.pdf',
  source: 'screener',
});
const bseCopy = createDocumentRecord({
  company: 'Foo Limited',
  quarter: 'Q3',
  year: 'FY26',
  docType: 'transcript',
  url: 'https://www.bseindia.com/foo-q3.pdf',
  source: 'bse',
});
const olderCall = createDocumentRecord({
  company: 'Foo Ltd',
  quarter: 'Q2',
  year: 'FY26',
  docType: 'transcript',
  url: 'https://www.screener.in/foo-q2.pdf',
  source: 'screener',
});

function descriptor(source: string): CompanyDescriptor {
  return { name: 'Foo Ltd', url: `https://${source}.example/foo`, source, region: 'india', symbol: null, identifier: null };
}

describe('EarningsService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('merges every adapter of the region and keeps the preferred copy', async () => {
    const screener = new FakeSource({ region: 'india', sourceName: 'screener', priority: 2, documents: [screenerCopy, olderCall] });
    const bse = new FakeSource({ region: 'india', sourceName: 'bse', priority: 0, documents: [bseCopy] });
    const service = new EarningsService(new SourceRegistry().register(screener).register(bse));

    const documents = await service.getEarningsDocuments('Foo', { region: 'india', count: 4, ...flags });
    expect(documents).toEqual([bseCopy, olderCall]);
    expect(screener.calls).toEqual([{ company: 'Foo', options: { count: 4, ...flags } }]);
  });

  it('keeps going when one adapter fails', async () => {
    const broken = new FakeSource({ region: 'india', sourceName: 'bse', priority: 0, failWith: new Error('timeout') });
    const screener = new FakeSource({ region: 'india', sourceName: 'screener', priority: 2, documents: [olderCall] });
    const service = new EarningsService(new SourceRegistry().register(broken).register(screener));

    await expect(service.getEarningsDocuments('Foo', { region: 'india', count: 4, ...flags })).resolves.toEqual([olderCall]);
    expect(console.error).toHaveBeenCalledWith('[earnings] source failed', {
      source: 'bse',
      company: 'Foo',
      error: 'timeout',
    });
  });

  it('returns nothing for a region without adapters', async () => {
    const service = new EarningsService(new SourceRegistry());
    await expect(service.getEarningsDocuments('Foo', { region: 'japan', count: 4, ...flags })).resolves.toEqual([]);
  });

  it('collects company matches and skips misses and failures', async () => {
    const registry = new SourceRegistry()
      .register(new FakeSource({ region: 'india', sourceName: 'bse', priority: 0, failWith: new Error('down') }))
      .register(new FakeSource({ region: 'india', sourceName: 'screener', priority: 2, company: descriptor('screener') }))
      .register(new FakeSource({ region: 'india', sourceName: 'trendlyne', priority: 3 }))
      .register(new FakeSource({ region: 'us', sourceName: 'edgar', priority: 1, company: descriptor('edgar') }));
    const service = new EarningsService(registry);

    expect(await service.searchCompany('Foo', 'india')).toEqual([descriptor('screener')]);
    expect((await service.searchCompany('Foo')).map((match) => match.source)).toEqual(['screener', 'edgar']);
  });

  it('describes every supported region', () => {
    const registry = new SourceRegistry().register(new FakeSource({ region: 'us', sourceName: 'edgar', priority: 1 }));
    const regions = new EarningsService(registry).getAvailableRegions();
    expect(regions.map((region) => region.id)).toEqual(['india', 'us', 'japan', 'korea', 'china']);
    expect(regions[1]).toEqual({ id: 'us', name: 'United States', fiscalYear: 'Jan-Dec', sources: ['edgar'] });
    expect(regions[0].sources).toEqual([]);
  });
});
