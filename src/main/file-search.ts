/**
 * Filesystem Search Backend
 *
 * A fresh depth-first walk from the search root for every query. Entries
 * stream out in batches, their names are fuzzy-matched as they arrive, and
 * matches are posted to the session through a `SearchChannel` tagged with
 * the generation the search was started for.
 *
 * The walk checks its abort signal after every entry and before every
 * directory read, and yields to the event loop regularly, so a superseded
 * search stops within one pending `readdir` and keystrokes are never starved.
 */

import * as fs from 'fs';
import * as path from 'path';
import { SearchIOError, describeError } from './errors.js';
import { scoreFuzzyMatch } from './fuzzy-match.js';
import { createLogger } from './logger.js';
import type { SearchChannel } from './search-channel.js';
import type { Candidate, PathRef } from './types.js';

const log = createLogger('FileSearch');

const DEFAULT_BATCH_SIZE = 64;
const FLUSH_INTERVAL_MS = 25;
const ENTRIES_PER_EVENT_LOOP_TURN = 256;

// Build output and dependency trees are rarely what anyone wants to open.
export const DEFAULT_EXCLUDED_DIRECTORY_NAMES = [
  'node_modules',
  'dist',
  'build',
  'out',
  '.git',
  '.hg',
  '.svn',
  '.next',
  '.nuxt',
  '.turbo',
  '.cache',
  'coverage',
  'target',
  '__pycache__',
  '.venv',
  'venv',
  '.terraform',
  '.yarn',
  '.pnpm-store',
  '.npm',
] as const;

export interface WalkOptions {
  signal?: AbortSignal;
  showHidden?: boolean;
  excludedDirectoryNames?: Iterable<string>;
  batchSize?: number;
}

export type FileSearchMessage =
  | { type: 'batch'; generation: number; candidates: Candidate[]; scanned: number }
  | { type: 'done'; generation: number; scanned: number }
  | { type: 'error'; generation: number; error: SearchIOError; scanned: number };

export interface FileSearchRequest {
  root: string;
  query: string;
  generation: number;
  showHidden?: boolean;
  excludedDirectoryNames?: Iterable<string>;
  batchSize?: number;
}

export interface FileSearchHandle {
  generation: number;
  cancel: () => void;
  /** Settles when the walk has finished, failed, or noticed its cancellation. */
  done: Promise<void>;
}

export type FileSearchStarter = (
  request: FileSearchRequest,
  channel: SearchChannel<FileSearchMessage>
) => FileSearchHandle;

type DirectoryFrame = {
  dir: string;
  entries: fs.Dirent[];
  index: number;
};

function sortByName(entries: fs.Dirent[]): fs.Dirent[] {
  return [...entries].sort((a, b) => {
    if (a.name === b.name) return 0;
    return a.name < b.name ? -1 : 1;
  });
}

function yieldToEventLoop(): Promise<void> {
  return new Promise<void>((resolve) => setImmediate(resolve));
}

/**
 * Depth-first walk in name order. Symbolic links are listed but not
 * followed; unreadable subdirectories are skipped. Only an unreadable root
 * fails the walk.
 */
export async function* walkFileTree(root: string, options: WalkOptions = {}): AsyncGenerator<PathRef[], void, undefined> {
  const rootPath = path.resolve(root);
  const signal = options.signal;
  const showHidden = Boolean(options.showHidden);
  const batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
  const excludedNames: Iterable<string> = options.excludedDirectoryNames ?? DEFAULT_EXCLUDED_DIRECTORY_NAMES;
  const excluded = new Set(Array.from(excludedNames, (name) => name.toLowerCase()));

  let rootEntries: fs.Dirent[];
  try {
    rootEntries = await fs.promises.readdir(rootPath, { withFileTypes: true });
  } catch (error) {
    throw new SearchIOError(`Cannot read ${rootPath}: ${describeError(error)}`, rootPath, { cause: error });
  }

  const stack: DirectoryFrame[] = [{ dir: rootPath, entries: sortByName(rootEntries), index: 0 }];
  let batch: PathRef[] = [];
  let lastFlushAt = Date.now();
  let processedSinceYield = 0;

  while (stack.length > 0) {
    if (signal?.aborted) return;

    const frame = stack[stack.length - 1];
    if (frame.index >= frame.entries.length) {
      stack.pop();
      continue;
    }

    const dirent = frame.entries[frame.index];
    frame.index += 1;

    processedSinceYield += 1;
    if (processedSinceYield >= ENTRIES_PER_EVENT_LOOP_TURN) {
      processedSinceYield = 0;
      await yieldToEventLoop();
      if (signal?.aborted) return;
    }

    const name = dirent.name;
    if (!showHidden && name.startsWith('.')) continue;

    const isDirectory = dirent.isDirectory();
    if (isDirectory && excluded.has(name.toLowerCase())) continue;

    const absolutePath = path.join(frame.dir, name);
    batch.push({ kind: 'path', absolutePath, isDirectory });
    if (batch.length >= batchSize) {
      yield batch;
      batch = [];
      lastFlushAt = Date.now();
    }

    if (!isDirectory) continue;

    if (signal?.aborted) return;
    let children: fs.Dirent[];
    try {
      children = await fs.promises.readdir(absolutePath, { withFileTypes: true });
    } catch (error) {
      log.debug(`Skipping unreadable directory ${absolutePath}: ${describeError(error)}`);
      continue;
    }
    stack.push({ dir: absolutePath, entries: sortByName(children), index: 0 });

    if (batch.length > 0 && Date.now() - lastFlushAt >= FLUSH_INTERVAL_MS) {
      yield batch;
      batch = [];
      lastFlushAt = Date.now();
    }
  }

  if (batch.length > 0 && !signal?.aborted) yield batch;
}

function toDisplayPath(rootPath: string, absolutePath: string): string {
  const relative = path.relative(rootPath, absolutePath);
  return path.sep === '/' ? relative : relative.split(path.sep).join('/');
}

/**
 * Matches the entries' file names (not their paths). Positions are shifted
 * so they index into the root-relative display path.
 */
export function matchPathEntries(rootPath: string, query: string, entries: PathRef[]): Candidate[] {
  const candidates: Candidate[] = [];
  for (const entry of entries) {
    const name = path.basename(entry.absolutePath);
    const match = scoreFuzzyMatch(query, name);
    if (!match) continue;

    const relative = toDisplayPath(rootPath, entry.absolutePath);
    const offset = relative.length - name.length;
    candidates.push({
      displayText: entry.isDirectory ? `${relative}/` : relative,
      payload: entry,
      score: match.score,
      matchPositions: match.positions.map((position) => position + offset),
    });
  }
  return candidates;
}

async function runFileSearch(
  request: FileSearchRequest,
  channel: SearchChannel<FileSearchMessage>,
  signal: AbortSignal
): Promise<void> {
  const rootPath = path.resolve(request.root);
  const { generation } = request;
  let scanned = 0;

  try {
    const walk = walkFileTree(rootPath, {
      signal,
      showHidden: request.showHidden,
      excludedDirectoryNames: request.excludedDirectoryNames,
      batchSize: request.batchSize,
    });
    for await (const entries of walk) {
      if (signal.aborted) return;
      scanned += entries.length;
      const candidates = matchPathEntries(rootPath, request.query, entries);
      if (candidates.length > 0) {
        channel.post({ type: 'batch', generation, candidates, scanned });
      }
    }
    if (signal.aborted) {
      log.debug(`Search #${generation} cancelled after ${scanned} entries`);
      return;
    }
    channel.post({ type: 'done', generation, scanned });
    log.debug(`Search #${generation} finished: ${scanned} entries under ${rootPath}`);
  } catch (error) {
    if (signal.aborted) return;
    const failure = error instanceof SearchIOError
      ? error
      : new SearchIOError(`File search failed: ${describeError(error)}`, rootPath, { cause: error });
    log.warn(failure.message);
    channel.post({ type: 'error', generation, error: failure, scanned });
  }
}

export const startFileSearch: FileSearchStarter = (request, channel) => {
  const controller = new AbortController();
  const done = runFileSearch(request, channel, controller.signal);
  return {
    generation: request.generation,
    cancel: () => controller.abort(),
    done,
  };
};
