import { readFileSync, statSync } from 'node:fs';
import { companyKey } from './companyNames';
import { parseCsvRecords } from './csv';

export type ScripEntry = {
  name: string;
  symbol: string;
  identifier: string;
  normalizedName: string;
  normalizedSymbol: string;
  aliases: ReadonlySet<string>;
};

export type ScripSuggestion = {
  name: string;
  symbol: string;
  identifier: string;
  label: string;
};

type ScripIndex = {
  entries: readonly ScripEntry[];
  mtimeMs: number;
};

type MutableEntry = Omit<ScripEntry, 'aliases' | 'normalizedSymbol'> & { aliases: Set<string> };

function compareCodePoints(a: string, b: string) {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function buildScripEntries(csvText: string): ScripEntry[] {
  const groups = new Map<string, MutableEntry>();

  for (const row of parseCsvRecords(csvText)) {
    const name = row['company name'] || row.name || '';
    const symbol = row.symbol ?? '';
    const identifier = row.isin ?? '';
    if (!name) continue;
    const key = companyKey(name);
    if (!key) continue;

    const existing = groups.get(key);
    if (!existing) {
      groups.set(key, {
        name,
        symbol,
        identifier,
        normalizedName: key,
        aliases: new Set([key, name.toLowerCase()]),
      });
      continue;
    }
    existing.aliases.add(name.toLowerCase());
    if (!existing.symbol && symbol) existing.symbol = symbol;
    if (!existing.identifier && identifier) existing.identifier = identifier;
  }

  return [...groups.values()]
    .map((entry) => ({ ...entry, normalizedSymbol: entry.symbol.toLowerCase() }))
    .sort((a, b) => compareCodePoints(a.normalizedName, b.normalizedName));
}

function readMtimeMs(path: string) {
  try {
    return statSync(path).mtimeMs;
  } catch {
    return null;
  }
}

/**
 * Company-name autocomplete backed by an exchange scrip list (CSV). The index is
 * rebuilt whenever the file's modification time changes and swapped in whole.
 */
export class ScripStore {
  private index: ScripIndex | null = null;
  private missingReported = false;
  private unreadableReported = false;

  constructor(readonly path: string) {}

  /** Loads the file when it is new or changed; returns the entries currently served. */
  refresh(): readonly ScripEntry[] {
    const mtimeMs = readMtimeMs(this.path);
    if (mtimeMs === null) {
      if (!this.missingReported) {
        console.warn('[scrip-store] scrip file not found', { path: this.path });
        this.missingReported = true;
      }
      return [];
    }
    this.missingReported = false;

    if (this.index && this.index.mtimeMs === mtimeMs) return this.index.entries;
    return this.reload(mtimeMs);
  }

  /** Rebuilds the index from disk regardless of the cached modification time. */
  reload(mtimeMs = readMtimeMs(this.path)): readonly ScripEntry[] {
    if (mtimeMs === null) return [];
    let entries: ScripEntry[];
    try {
      entries = buildScripEntries(readFileSync(this.path, 'utf8'));
    } catch (error) {
      if (!this.unreadableReported) {
        console.warn('[scrip-store] failed to read scrip file', {
          path: this.path,
          error: error instanceof Error ? error.message : String(error),
        });
        this.unreadableReported = true;
      }
      return this.index?.entries ?? [];
    }
    this.unreadableReported = false;
    this.index = { entries, mtimeMs };
    return entries;
  }

  entries(): readonly ScripEntry[] {
    return this.refresh();
  }

  suggest(query: string, limit = 20): ScripSuggestion[] {
    const needle = query.trim().toLowerCase();
    if (!needle || limit <= 0) return [];

    const matches: ScripSuggestion[] = [];
    const seenLabels = new Set<string>();
    for (const entry of this.refresh()) {
      const matched =
        [...entry.aliases].some((alias) => alias.startsWith(needle)) ||
        (entry.normalizedSymbol !== '' && entry.normalizedSymbol.startsWith(needle));
      if (!matched) continue;

      const label = entry.symbol ? `${entry.name} (${entry.symbol})` : entry.name;
      if (seenLabels.has(label)) continue;
      seenLabels.add(label);
      matches.push({ name: entry.name, symbol: entry.symbol, identifier: entry.identifier, label });
      if (matches.length >= limit) break;
    }
    return matches;
  }
}
