/**
 * Usage Store
 *
 * Durable launch history: how often each app or path was launched, how it
 * was last launched, and when. Every write goes through to disk immediately,
 * via a temp file renamed over the store so a crash never leaves a torn file.
 */

import * as fs from 'fs';
import * as path from 'path';
import { PersistenceError, describeError } from './errors.js';
import { createLogger } from './logger.js';
import type { LaunchMode, UsageRecord } from './types.js';

const log = createLogger('Usage');

const STORE_VERSION = 1;

interface StoredUsageFile {
  version: number;
  records: Record<string, UsageRecord>;
}

export interface RecordLaunchResult {
  record: UsageRecord;
  persisted: boolean;
  error?: PersistenceError;
}

function isRecordObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function normalizeLaunchMode(value: unknown): LaunchMode | undefined {
  const normalized = String(value ?? '').trim().toLowerCase();
  if (normalized === 'direct') return 'direct';
  if (normalized === 'terminal') return 'terminal';
  return undefined;
}

function normalizeStoredRecord(key: string, raw: unknown): UsageRecord | null {
  if (!isRecordObject(raw)) return null;
  const normalizedKey = String(key || '').trim();
  if (!normalizedKey) return null;

  const launchCount = Number(raw.launchCount);
  const lastUsedAt = Number(raw.lastUsedAt);

  return {
    key: normalizedKey,
    launchCount: Number.isFinite(launchCount) ? Math.max(0, Math.floor(launchCount)) : 0,
    lastLaunchMode: normalizeLaunchMode(raw.lastLaunchMode),
    lastUsedAt: Number.isFinite(lastUsedAt) ? Math.max(0, lastUsedAt) : 0,
  };
}

export class UsageStore {
  private readonly records = new Map<string, UsageRecord>();

  private constructor(
    readonly filePath: string,
    private readonly now: () => number
  ) {}

  static open(filePath: string, options?: { now?: () => number }): UsageStore {
    const store = new UsageStore(filePath, options?.now ?? Date.now);
    store.loadFromDisk();
    log.debug(`Loaded ${store.records.size} usage record(s) from ${filePath}`);
    return store;
  }

  get size(): number {
    return this.records.size;
  }

  get(key: string): UsageRecord | undefined {
    const record = this.records.get(key);
    return record ? { ...record } : undefined;
  }

  launchCount(key: string): number {
    return this.records.get(key)?.launchCount ?? 0;
  }

  recordLaunch(key: string, mode?: LaunchMode): RecordLaunchResult {
    const existing = this.records.get(key);
    const record: UsageRecord = {
      key,
      launchCount: (existing?.launchCount ?? 0) + 1,
      lastLaunchMode: mode ?? existing?.lastLaunchMode,
      lastUsedAt: this.now(),
    };
    this.records.set(key, record);
    return this.persist(record);
  }

  /** Explicit preference change; does not count as a launch. */
  setPreferredMode(key: string, mode: LaunchMode): RecordLaunchResult {
    const existing = this.records.get(key);
    const record: UsageRecord = {
      key,
      launchCount: existing?.launchCount ?? 0,
      lastLaunchMode: mode,
      lastUsedAt: existing?.lastUsedAt ?? 0,
    };
    this.records.set(key, record);
    return this.persist(record);
  }

  flush(): void {
    this.saveToDisk();
  }

  private persist(record: UsageRecord): RecordLaunchResult {
    try {
      this.saveToDisk();
      return { record: { ...record }, persisted: true };
    } catch (error) {
      const failure = error instanceof PersistenceError
        ? error
        : new PersistenceError(`Failed to save usage history: ${describeError(error)}`, { cause: error });
      log.error(failure.message);
      return { record: { ...record }, persisted: false, error: failure };
    }
  }

  private loadFromDisk(): void {
    let data: string;
    try {
      if (!fs.existsSync(this.filePath)) return;
      data = fs.readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      log.error(`Failed to read usage history from ${this.filePath}:`, describeError(error));
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      log.error(`Usage history at ${this.filePath} is not valid JSON; starting empty:`, describeError(error));
      return;
    }

    if (!isRecordObject(parsed) || !isRecordObject(parsed.records)) {
      log.warn(`Usage history at ${this.filePath} has an unknown layout; starting empty`);
      return;
    }

    for (const [key, raw] of Object.entries(parsed.records)) {
      const record = normalizeStoredRecord(key, raw);
      if (record) this.records.set(record.key, record);
    }
  }

  private saveToDisk(): void {
    const payload: StoredUsageFile = {
      version: STORE_VERSION,
      records: Object.fromEntries(this.records),
    };
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tempPath, JSON.stringify(payload, null, 2), 'utf-8');
      fs.renameSync(tempPath, this.filePath);
    } catch (error) {
      try {
        fs.rmSync(tempPath, { force: true });
      } catch (cleanupError) {
        log.warn(`Could not remove ${tempPath}:`, describeError(cleanupError));
      }
      throw new PersistenceError(`Failed to save usage history to ${this.filePath}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }
}
