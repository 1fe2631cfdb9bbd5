/**
 * Resolution Diagnostics Log
 *
 * Accumulates match, ignore and error records produced while resolving.
 * Records are deduplicated: recording the same tuple twice keeps one copy.
 * Draining returns records in a stable order (context, country, then the
 * remaining fields) so runs can be compared line by line.
 *
 * @module resolution/diagnostics
 */

import type { ErrorRecord, IgnoreRecord, MatchRecord } from '../core/types.js';

type SortKey = readonly (string | undefined)[];

/**
 * Compare tuples field by field; an absent field sorts before any value
 */
function compareKeys(a: SortKey, b: SortKey): number {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const left = a[i];
    const right = b[i];
    if (left === right) continue;
    if (left === undefined) return -1;
    if (right === undefined) return 1;
    return left < right ? -1 : 1;
  }
  return 0;
}

function matchKey(record: MatchRecord): SortKey {
  return [
    record.context,
    record.countryIso3,
    record.input,
    record.name,
    record.method,
    record.pcode,
    String(record.exact),
  ];
}

function outcomeKey(record: IgnoreRecord | ErrorRecord): SortKey {
  return [record.context, record.countryIso3, record.input];
}

/**
 * Append-only record set keyed by tuple
 */
class RecordSet<T> {
  private readonly records = new Map<string, T>();

  constructor(private readonly keyOf: (record: T) => SortKey) {}

  add(record: T): void {
    const key = JSON.stringify(this.keyOf(record));
    if (!this.records.has(key)) {
      this.records.set(key, record);
    }
  }

  sorted(): T[] {
    return [...this.records.values()].sort((a, b) => compareKeys(this.keyOf(a), this.keyOf(b)));
  }

  clear(): void {
    this.records.clear();
  }

  get size(): number {
    return this.records.size;
  }
}

export class DiagnosticsLog {
  private readonly matches = new RecordSet<MatchRecord>(matchKey);
  private readonly ignored = new RecordSet<IgnoreRecord>(outcomeKey);
  private readonly errors = new RecordSet<ErrorRecord>(outcomeKey);

  recordMatch(record: MatchRecord): void {
    this.matches.add(record);
  }

  recordIgnored(record: IgnoreRecord): void {
    this.ignored.add(record);
  }

  recordError(record: ErrorRecord): void {
    this.errors.add(record);
  }

  /** Sorted matches, without clearing */
  peekMatches(): MatchRecord[] {
    return this.matches.sorted();
  }

  peekIgnored(): IgnoreRecord[] {
    return this.ignored.sorted();
  }

  peekErrors(): ErrorRecord[] {
    return this.errors.sorted();
  }

  /** Sorted matches; the match log is cleared */
  drainMatches(): MatchRecord[] {
    const records = this.matches.sorted();
    this.matches.clear();
    return records;
  }

  drainIgnored(): IgnoreRecord[] {
    const records = this.ignored.sorted();
    this.ignored.clear();
    return records;
  }

  drainErrors(): ErrorRecord[] {
    const records = this.errors.sorted();
    this.errors.clear();
    return records;
  }

  reset(): void {
    this.matches.clear();
    this.ignored.clear();
    this.errors.clear();
  }
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * @example "ingest - YEM: Matching (fuzzy) Al Dali to Ad Dali on map"
 */
export function formatMatch(record: MatchRecord): string {
  return `${record.context} - ${record.countryIso3}: Matching (${record.method}) ${record.input} to ${record.name} on map`;
}

/**
 * @example "ingest - Ignored ZWE!" or "ingest - YEM: Ignored nord!"
 */
export function formatIgnored(record: IgnoreRecord): string {
  if (record.input === undefined) {
    return `${record.context} - Ignored ${record.countryIso3}!`;
  }
  return `${record.context} - ${record.countryIso3}: Ignored ${record.input}!`;
}

/**
 * @example "ingest - Could not find ABC in map names!"
 */
export function formatError(record: ErrorRecord): string {
  if (record.input === undefined) {
    return `${record.context} - Could not find ${record.countryIso3} in map names!`;
  }
  return `${record.context} - ${record.countryIso3}: Could not find ${record.input} in map names!`;
}
