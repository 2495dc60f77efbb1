import { mkdtempSync, rmSync, utimesSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { buildScripEntries, ScripStore } from '../lib/scripStore';

const SCRIP_CSV = [
  'Security Code,Company name,Symbol,ISIN',
  '500002,ABB Ltd.,ABB,INE117A01022',
  '500003,Aegis Logistics Ltd.,AEGISLOG,INE208C01025',
  '500257,Lupin Ltd.,LUPIN,INE326A01037',
  '500257,Lupin Limited,,',
].join('\n');

describe('buildScripEntries', () => {
  it('groups rows by normalized name and collects aliases', () => {
    const entries = buildScripEntries(SCRIP_CSV);
    expect(entries.map((entry) => entry.normalizedName)).toEqual(['abb', 'aegis logistics', 'lupin']);
    const lupin = entries[2];
    expect(lupin.name).toBe('Lupin Ltd.');
    expect([...lupin.aliases].sort()).toEqual(['lupin', 'lupin limited', 'lupin ltd.']);
  });

  it('backfills a missing symbol and identifier from later rows', () => {
    const [entry] = buildScripEntries('Company name,Symbol,ISIN\nLupin Ltd.,,\nLupin Limited,LUPIN,INE326A01037');
    expect(entry.symbol).toBe('LUPIN');
    expect(entry.identifier).toBe('INE326A01037');
  });

  it('orders entries by code point', () => {
    const entries = buildScripEntries('Name,Symbol\nÉclair Foods,ECLAIR\nZeta,ZETA\nalpha,ALPHA');
    expect(entries.map((entry) => entry.normalizedName)).toEqual(['alpha', 'zeta', 'éclair foods']);
  });

  it('falls back to a plain name column', () => {
    const [entry] = buildScripEntries('Name,Symbol\nInfosys Limited,INFY');
    expect(entry.name).toBe('Infosys Limited');
    expect(entry.normalizedName).toBe('infosys');
    expect(entry.identifier).toBe('');
  });
});

describe('ScripStore', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'scrip-store-'));
    file = path.join(dir, 'scrips.csv');
    writeFileSync(file, SCRIP_CSV);
    utimesSync(file, 1_000_000, 1_000_000);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('suggests by name prefix', () => {
    const store = new ScripStore(file);
    expect(store.suggest('AB')).toEqual([
      { name: 'ABB Ltd.', symbol: 'ABB', identifier: 'INE117A01022', label: 'ABB Ltd. (ABB)' },
    ]);
  });

  it('suggests by symbol prefix when no name matches', () => {
    const store = new ScripStore(file);
    expect(store.suggest('aegisl').map((suggestion) => suggestion.label)).toEqual([
      'Aegis Logistics Ltd. (AEGISLOG)',
    ]);
    expect(store.suggest('AEGIS').map((suggestion) => suggestion.symbol)).toEqual(['AEGISLOG']);
  });

  it('matches any alias of a grouped company', () => {
    const store = new ScripStore(file);
    expect(store.suggest('lupin limited').map((suggestion) => suggestion.label)).toEqual(['Lupin Ltd. (LUPIN)']);
  });

  it('honours the limit and ignores blank queries', () => {
    const store = new ScripStore(file);
    expect(store.suggest('a', 1).map((suggestion) => suggestion.name)).toEqual(['ABB Ltd.']);
    expect(store.suggest('   ')).toEqual([]);
  });

  it('keeps serving the cached index until the modification time changes', () => {
    const store = new ScripStore(file);
    expect(store.entries()).toHaveLength(3);

    writeFileSync(file, 'Company name,Symbol\nTata Motors Ltd.,TATAMOTORS');
    utimesSync(file, 1_000_000, 1_000_000);
    expect(store.entries()).toHaveLength(3);

    utimesSync(file, 2_000_000, 2_000_000);
    expect(store.entries().map((entry) => entry.name)).toEqual(['Tata Motors Ltd.']);
  });

  it('sees an appended row once the file is touched', () => {
    const store = new ScripStore(file);
    expect(store.suggest('tata')).toEqual([]);
    writeFileSync(file, `${SCRIP_CSV}\n500570,Tata Motors Ltd.,TATAMOTORS,INE155A01022`);
    utimesSync(file, 3_000_000, 3_000_000);
    expect(store.suggest('tata').map((suggestion) => suggestion.label)).toEqual(['Tata Motors Ltd. (TATAMOTORS)']);
  });

  it('reloads on demand', () => {
    const store = new ScripStore(file);
    expect(store.entries()).toHaveLength(3);
    writeFileSync(file, 'Company name,Symbol\nTata Motors Ltd.,TATAMOTORS');
    utimesSync(file, 1_000_000, 1_000_000);
    expect(store.reload()).toHaveLength(1);
  });

  it('returns nothing for a missing file and warns once', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const missing = path.join(dir, 'missing.csv');
    const store = new ScripStore(missing);
    expect(store.suggest('ab')).toEqual([]);
    expect(store.suggest('ab')).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('[scrip-store] scrip file not found', { path: missing });
  });

  it('recovers when a deleted file comes back and warns again when it goes away', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const store = new ScripStore(file);
    expect(store.entries()).toHaveLength(3);

    rmSync(file);
    expect(store.suggest('ab')).toEqual([]);
    expect(store.suggest('ab')).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);

    writeFileSync(file, SCRIP_CSV);
    utimesSync(file, 4_000_000, 4_000_000);
    expect(store.suggest('ab').map((suggestion) => suggestion.label)).toEqual(['ABB Ltd. (ABB)']);

    rmSync(file);
    expect(store.suggest('ab')).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenLastCalledWith('[scrip-store] scrip file not found', { path: file });
  });
});
