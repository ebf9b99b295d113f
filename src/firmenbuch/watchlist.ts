import { join } from 'node:path';
import { z } from 'zod';
import { ValidationError } from '../core/errors.js';
import { readOptional, writePrivateFile } from '../core/files.js';
import { createLogger } from '../core/logger.js';
import { parseJson, parseWithSchema } from '../core/schema.js';
import { isValidFn } from '../identifiers/fn.js';
import type { FbExtract, WatchlistChange, WatchlistCheckResult, WatchlistEntry } from './types.js';

const log = createLogger('fb-watchlist');

export const WATCHLIST_FILE = 'fb-watchlist.json';

// ── Canonical JSON ──────────────────────────────────────────────────────────

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([k, v]): [string, unknown] => [k, sortKeys(v)]),
    );
  }
  return value;
}

/** JSON with object keys sorted at every level, so equal values compare byte-equal. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function changedFields(before: unknown, after: unknown): string[] {
  const a = typeof before === 'object' && before !== null ? Object.entries(before) : [];
  const b = typeof after === 'object' && after !== null ? Object.entries(after) : [];
  const left = new Map(a.map(([k, v]): [string, string] => [k, canonicalJson(v)]));
  const right = new Map(b.map(([k, v]): [string, string] => [k, canonicalJson(v)]));
  const keys = new Set([...left.keys(), ...right.keys()]);
  return [...keys].filter((k) => left.get(k) !== right.get(k)).sort();
}

// ── File format (snake_case) ────────────────────────────────────────────────

const statusSchema = z.enum(['aktiv', 'geloescht', 'in_liquidation', 'insolvent']);

const entrySchema = z.object({
  fn: z.string(),
  company: z.string().default(''),
  added_at: z.string(),
  last_check: z.string().optional(),
  last_status: statusSchema.optional(),
  notes: z.string().optional(),
  enabled: z.boolean().default(true),
  last_snapshot: z.unknown().optional(),
});

const changeSchema = z.object({
  fn: z.string(),
  company: z.string(),
  detected_at: z.string(),
  old_status: statusSchema.optional(),
  new_status: statusSchema,
  changed_fields: z.array(z.string()),
});

const fileSchema = z.object({
  entries: z.array(entrySchema).default([]),
  changes: z.array(changeSchema).default([]),
});

type FileJson = z.infer<typeof fileSchema>;

function fromFile(raw: FileJson): { entries: WatchlistEntry[]; changes: WatchlistChange[] } {
  return {
    entries: raw.entries.map((e) => ({
      fn: e.fn,
      company: e.company,
      addedAt: e.added_at,
      lastCheck: e.last_check,
      lastStatus: e.last_status,
      notes: e.notes,
      enabled: e.enabled,
      lastSnapshot: e.last_snapshot,
    })),
    changes: raw.changes.map((c) => ({
      fn: c.fn,
      company: c.company,
      detectedAt: c.detected_at,
      oldStatus: c.old_status,
      newStatus: c.new_status,
      changedFields: c.changed_fields,
    })),
  };
}

function toFile(entries: readonly WatchlistEntry[], changes: readonly WatchlistChange[]): FileJson {
  return {
    entries: entries.map((e) => ({
      fn: e.fn,
      company: e.company,
      added_at: e.addedAt,
      last_check: e.lastCheck,
      last_status: e.lastStatus,
      notes: e.notes,
      enabled: e.enabled,
      last_snapshot: e.lastSnapshot,
    })),
    changes: changes.map((c) => ({
      fn: c.fn,
      company: c.company,
      detected_at: c.detectedAt,
      old_status: c.oldStatus,
      new_status: c.newStatus,
      changed_fields: c.changedFields,
    })),
  };
}

/** What `checkAll` needs from the register client. */
export interface ExtractSource {
  extract(fn: string, options?: { signal?: AbortSignal }): Promise<FbExtract>;
}

/**
 * Watched register numbers in one JSON file, written with mode 0600. Every
 * mutating call reads the file, applies the change and writes it back.
 */
export class WatchlistStore {
  constructor(readonly file: string) {}

  static inHome(home: string): WatchlistStore {
    return new WatchlistStore(join(home, WATCHLIST_FILE));
  }

  async load(): Promise<{ entries: WatchlistEntry[]; changes: WatchlistChange[] }> {
    const content = await readOptional(this.file);
    if (content === undefined) return { entries: [], changes: [] };
    return fromFile(parseWithSchema(fileSchema, parseJson(content, 'watchlist')));
  }

  async list(): Promise<WatchlistEntry[]> {
    return (await this.load()).entries;
  }

  async changes(): Promise<WatchlistChange[]> {
    return (await this.load()).changes;
  }

  /** Upserts by register number; an existing entry keeps its history. */
  async add(
    input: { fn: string; company?: string; notes?: string; enabled?: boolean },
    now = new Date(),
  ): Promise<WatchlistEntry> {
    if (!isValidFn(input.fn)) {
      throw new ValidationError([{ code: 'invalid_fn', field: 'fn', message: `invalid Firmenbuch number "${input.fn}"` }]);
    }
    const data = await this.load();
    const existing = data.entries.find((e) => e.fn === input.fn);
    const entry: WatchlistEntry = existing
      ? {
          ...existing,
          company: input.company ?? existing.company,
          notes: input.notes ?? existing.notes,
          enabled: input.enabled ?? existing.enabled,
        }
      : {
          fn: input.fn,
          company: input.company ?? '',
          addedAt: now.toISOString(),
          notes: input.notes,
          enabled: input.enabled ?? true,
        };
    const entries = existing
      ? data.entries.map((e) => (e.fn === input.fn ? entry : e))
      : [...data.entries, entry];
    await this.save(entries, data.changes);
    return entry;
  }

  async remove(fn: string): Promise<boolean> {
    const data = await this.load();
    const entries = data.entries.filter((e) => e.fn !== fn);
    if (entries.length === data.entries.length) return false;
    await this.save(entries, data.changes);
    return true;
  }

  /**
   * Fetches every enabled entry and compares its canonical JSON with the last
   * snapshot. The first check only records the baseline. A failed fetch is
   * reported; its entry gets a new check time and keeps its last status.
   */
  async checkAll(source: ExtractSource, options: { signal?: AbortSignal; now?: Date } = {}): Promise<WatchlistCheckResult> {
    const data = await this.load();
    const result: WatchlistCheckResult = { checked: 0, changes: [], errors: [] };
    const entries: WatchlistEntry[] = [];

    for (const entry of data.entries) {
      if (!entry.enabled) {
        entries.push(entry);
        continue;
      }
      const checkedAt = (options.now ?? new Date()).toISOString();
      let extract: FbExtract;
      try {
        extract = await source.extract(entry.fn, { signal: options.signal });
      } catch (err) {
        if (options.signal?.aborted) throw err;
        const message = err instanceof Error ? err.message : String(err);
        log.warn({ fn: entry.fn, err }, 'watchlist check failed');
        result.errors.push({ fn: entry.fn, message });
        entries.push({ ...entry, lastCheck: checkedAt });
        continue;
      }

      result.checked += 1;
      if (entry.lastSnapshot !== undefined && canonicalJson(entry.lastSnapshot) !== canonicalJson(extract)) {
        const change: WatchlistChange = {
          fn: entry.fn,
          company: extract.company,
          detectedAt: checkedAt,
          oldStatus: entry.lastStatus,
          newStatus: extract.status,
          changedFields: changedFields(entry.lastSnapshot, extract),
        };
        result.changes.push(change);
        log.info({ fn: entry.fn, fields: change.changedFields }, 'register entry changed');
      }
      entries.push({
        ...entry,
        company: extract.company,
        lastCheck: checkedAt,
        lastStatus: extract.status,
        lastSnapshot: sortKeys(extract),
      });
    }

    await this.save(entries, [...data.changes, ...result.changes]);
    return result;
  }

  private async save(entries: readonly WatchlistEntry[], changes: readonly WatchlistChange[]): Promise<void> {
    await writePrivateFile(this.file, JSON.stringify(toFile(entries, changes), null, 2) + '\n');
  }
}
