/**
 * Application Catalog
 *
 * Discovers launchable applications by scanning `.desktop` files in the
 * configured application directories, then executables on `$PATH` that no
 * desktop entry already covers. `$PATH` executables are treated as terminal
 * programs.
 *
 * Discovery results are cached as JSON; the directories are only rescanned
 * when the cache is missing or a rebuild is requested.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError, describeError } from './errors.js';
import { parseDesktopEntry } from './desktop-entry.js';
import { parseExecCommand } from './command-line.js';
import { createLogger } from './logger.js';
import type { RawAppRecord } from './types.js';

const log = createLogger('AppCatalog');

const CACHE_VERSION = 1;
const SKIPPED_PATH_SEGMENTS = ['/sbin', '/games', '/lib'];

export interface AppCatalogOptions {
  applicationDirectories: string[];
  pathVariable?: string;
  scanPathExecutables?: boolean;
  cachePath?: string;
  rebuild?: boolean;
}

function isRecordObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function normalizeCachedRecord(raw: unknown): RawAppRecord | null {
  if (!isRecordObject(raw)) return null;
  const id = String(raw.id ?? '').trim();
  const name = String(raw.name ?? '').trim();
  const exec = String(raw.exec ?? '').trim();
  if (!id || !name || !exec) return null;
  return { id, name, exec, terminal: raw.terminal === true };
}

function executableBaseName(exec: string): string {
  const argv = parseExecCommand(exec);
  return argv.length > 0 ? path.basename(argv[0]) : '';
}

async function listDirectory(dir: string): Promise<fs.Dirent[] | null> {
  try {
    return await fs.promises.readdir(dir, { withFileTypes: true });
  } catch {
    return null;
  }
}

export async function scanDesktopEntries(
  directories: string[]
): Promise<{ records: RawAppRecord[]; readableSources: number }> {
  const records: RawAppRecord[] = [];
  let readableSources = 0;

  for (const dir of directories) {
    const dirents = await listDirectory(dir);
    if (!dirents) continue;
    readableSources += 1;

    const files = dirents
      .filter((dirent) => !dirent.isDirectory() && dirent.name.endsWith('.desktop'))
      .map((dirent) => dirent.name)
      .sort((a, b) => a.localeCompare(b));

    for (const fileName of files) {
      const filePath = path.join(dir, fileName);
      let content: string;
      try {
        content = await fs.promises.readFile(filePath, 'utf-8');
      } catch (error) {
        log.debug(`Skipping unreadable desktop entry ${filePath}: ${describeError(error)}`);
        continue;
      }

      const entry = parseDesktopEntry(content);
      if (!entry) continue;
      if (entry.type && entry.type !== 'Application') continue;
      if (entry.noDisplay || entry.hidden) continue;
      if (!entry.name || !entry.exec) continue;

      records.push({ id: filePath, name: entry.name, exec: entry.exec, terminal: entry.terminal });
    }
  }

  return { records, readableSources };
}

export async function scanPathExecutables(
  pathVariable: string,
  knownBinaries: Set<string>
): Promise<{ records: RawAppRecord[]; readableSources: number }> {
  const records: RawAppRecord[] = [];
  const seenNames = new Set<string>();
  let readableSources = 0;

  const directories = pathVariable.split(path.delimiter).map((dir) => dir.trim()).filter(Boolean);
  for (const dir of directories) {
    if (SKIPPED_PATH_SEGMENTS.some((segment) => dir.includes(segment))) continue;

    const dirents = await listDirectory(dir);
    if (!dirents) continue;
    readableSources += 1;

    const names = dirents
      .filter((dirent) => !dirent.isDirectory())
      .map((dirent) => dirent.name)
      .sort((a, b) => a.localeCompare(b));

    for (const name of names) {
      if (name.includes('.') || knownBinaries.has(name) || seenNames.has(name)) continue;

      const filePath = path.join(dir, name);
      let stats: fs.Stats;
      try {
        stats = await fs.promises.stat(filePath);
      } catch {
        continue;
      }
      if (!stats.isFile() || (stats.mode & 0o111) === 0) continue;

      seenNames.add(name);
      records.push({ id: filePath, name, exec: name, terminal: true });
    }
  }

  return { records, readableSources };
}

export async function discoverApplications(options: AppCatalogOptions): Promise<RawAppRecord[]> {
  const desktop = await scanDesktopEntries(options.applicationDirectories);

  const seenNames = new Set<string>();
  const records: RawAppRecord[] = [];
  for (const record of desktop.records) {
    if (seenNames.has(record.name)) continue;
    seenNames.add(record.name);
    records.push(record);
  }

  let readableSources = desktop.readableSources;
  if (options.scanPathExecutables !== false) {
    const knownBinaries = new Set(desktop.records.map((record) => executableBaseName(record.exec)).filter(Boolean));
    const executables = await scanPathExecutables(options.pathVariable ?? '', knownBinaries);
    readableSources += executables.readableSources;
    for (const record of executables.records) {
      if (seenNames.has(record.name)) continue;
      seenNames.add(record.name);
      records.push(record);
    }
  }

  if (readableSources === 0) {
    throw new ConfigurationError(
      `No application source could be read (checked ${options.applicationDirectories.length} application ` +
        'director(ies) and $PATH)'
    );
  }

  return records;
}

export function readAppCache(cachePath: string): RawAppRecord[] | null {
  try {
    if (!fs.existsSync(cachePath)) return null;
    const parsed: unknown = JSON.parse(fs.readFileSync(cachePath, 'utf-8'));
    if (!isRecordObject(parsed) || parsed.version !== CACHE_VERSION || !Array.isArray(parsed.apps)) return null;
    return parsed.apps
      .map((item) => normalizeCachedRecord(item))
      .filter((item): item is RawAppRecord => Boolean(item));
  } catch (error) {
    log.warn(`Ignoring unreadable app cache ${cachePath}: ${describeError(error)}`);
    return null;
  }
}

export function writeAppCache(cachePath: string, records: RawAppRecord[]): void {
  try {
    fs.mkdirSync(path.dirname(cachePath), { recursive: true });
    fs.writeFileSync(cachePath, JSON.stringify({ version: CACHE_VERSION, apps: records }), 'utf-8');
  } catch (error) {
    log.error(`Failed to write app cache ${cachePath}: ${describeError(error)}`);
  }
}

/**
 * Returns the raw application records, from the cache when possible.
 */
export async function loadAppCatalog(options: AppCatalogOptions): Promise<RawAppRecord[]> {
  if (options.cachePath && !options.rebuild) {
    const cached = readAppCache(options.cachePath);
    if (cached && cached.length > 0) {
      log.debug(`Loaded ${cached.length} app(s) from cache`);
      return cached;
    }
  }

  const records = await discoverApplications(options);
  log.info(`Discovered ${records.length} app(s)`);
  if (options.cachePath) writeAppCache(options.cachePath, records);
  return records;
}
