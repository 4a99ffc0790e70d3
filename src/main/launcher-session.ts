/**
 * Launcher Session
 *
 * The mode controller. Owns the current mode, query, generation and result
 * set, and is only ever mutated from the foreground (key handling and
 * channel drains). Background file walks talk to it exclusively through the
 * `SearchChannel`; anything they post for a generation other than the
 * current one is dropped here.
 *
 * The session doubles as an external store for the terminal UI:
 * `subscribe` / `getSnapshot` follow React's `useSyncExternalStore`
 * contract, and a new snapshot is published once per discrete change.
 */

import type { AppIndex } from './app-index.js';
import { LaunchError, describeError } from './errors.js';
import {
  startFileSearch,
  type FileSearchHandle,
  type FileSearchMessage,
  type FileSearchStarter,
} from './file-search.js';
import { createLogger } from './logger.js';
import { DEFAULT_USAGE_WEIGHTING, applyUsageWeight, mergeRankedCandidates, rankCandidates, type UsageWeighting } from './ranking.js';
import { SearchChannel } from './search-channel.js';
import {
  getTargetKey,
  type AppRef,
  type Candidate,
  type LaunchMode,
  type LaunchTarget,
  type SearchMode,
  type UsageRecord,
} from './types.js';
import type { RecordLaunchResult } from './usage-store.js';

const log = createLogger('Session');

const DAY_MS = 24 * 60 * 60 * 1000;

export type LauncherCommand =
  | 'backspace'
  | 'delete-word'
  | 'clear-query'
  | 'cursor-left'
  | 'cursor-right'
  | 'cursor-start'
  | 'cursor-end'
  | 'select-next'
  | 'select-previous'
  | 'select-first'
  | 'select-last'
  | 'toggle-mode'
  | 'toggle-force-terminal'
  | 'toggle-preferred-mode'
  | 'toggle-dormant'
  | 'launch'
  | 'quit';

export type LauncherKey = { type: 'insert'; text: string } | { type: LauncherCommand };

export type LaunchFunction = (target: LaunchTarget, mode: LaunchMode | null) => Promise<void>;

/** The slice of the usage store the session relies on. */
export interface UsageLedger {
  get: (key: string) => UsageRecord | undefined;
  launchCount: (key: string) => number;
  recordLaunch: (key: string, mode?: LaunchMode) => RecordLaunchResult;
  setPreferredMode: (key: string, mode: LaunchMode) => RecordLaunchResult;
}

export interface StatusMessage {
  kind: 'info' | 'error';
  text: string;
}

export interface SessionExit {
  reason: 'launched' | 'quit';
  target?: LaunchTarget;
  mode?: LaunchMode | null;
  remembered?: boolean;
}

export interface SessionSnapshot {
  mode: SearchMode;
  query: string;
  cursor: number;
  generation: number;
  results: readonly Candidate[];
  selectedIndex: number;
  /** Resolved launch mode of the selected app, null for files or no selection. */
  selectedLaunchMode: LaunchMode | null;
  searching: boolean;
  scannedEntries: number;
  status: StatusMessage | null;
  forceTerminalKey: string | null;
  showDormant: boolean;
  hiddenDormantCount: number;
  launching: boolean;
  exit: SessionExit | null;
}

export interface LauncherSessionOptions {
  appIndex: AppIndex;
  usage: UsageLedger;
  launch: LaunchFunction;
  filesRoot: string;
  maxResults: number;
  initialMode?: SearchMode;
  initialQuery?: string;
  showHidden?: boolean;
  excludedDirectoryNames?: readonly string[];
  dormantAfterDays?: number;
  weighting?: UsageWeighting;
  startFileSearch?: FileSearchStarter;
  now?: () => number;
}

function previousCharLength(text: string, cursor: number): number {
  if (cursor <= 0) return 0;
  const code = text.charCodeAt(cursor - 1);
  if (cursor >= 2 && code >= 0xdc00 && code <= 0xdfff) {
    const high = text.charCodeAt(cursor - 2);
    if (high >= 0xd800 && high <= 0xdbff) return 2;
  }
  return 1;
}

export function nextCharLength(text: string, cursor: number): number {
  if (cursor >= text.length) return 0;
  const code = text.charCodeAt(cursor);
  if (code >= 0xd800 && code <= 0xdbff && cursor + 1 < text.length) return 2;
  return 1;
}

const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/g;

export class LauncherSession {
  private mode: SearchMode;
  private query: string;
  private cursor: number;
  private generation = 0;
  private results: Candidate[] = [];
  private selectedIndex = 0;
  private searching = false;
  private scannedEntries = 0;
  private status: StatusMessage | null = null;
  private forceTerminalKey: string | null = null;
  private showDormant = false;
  private hiddenDormantCount = 0;
  private launching = false;
  private exit: SessionExit | null = null;

  private activeSearch: FileSearchHandle | null = null;
  private readonly channel = new SearchChannel<FileSearchMessage>();
  private readonly listeners = new Set<() => void>();
  private readonly maxResults: number;
  private readonly weighting: UsageWeighting;
  private readonly startSearch: FileSearchStarter;
  private readonly now: () => number;
  private snapshot: SessionSnapshot;
  private dirty = false;
  private disposed = false;

  constructor(private readonly options: LauncherSessionOptions) {
    this.mode = options.initialMode ?? 'apps';
    this.query = options.initialQuery ?? '';
    this.cursor = this.query.length;
    this.maxResults = Math.max(1, Math.floor(options.maxResults));
    this.weighting = options.weighting ?? DEFAULT_USAGE_WEIGHTING;
    this.startSearch = options.startFileSearch ?? startFileSearch;
    this.now = options.now ?? Date.now;

    this.channel.onReadable(() => this.drainMessages());
    this.refreshResults();
    this.snapshot = this.buildSnapshot();
    this.dirty = false;
  }

  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  getSnapshot = (): SessionSnapshot => this.snapshot;

  /** Applies every pending background message, then publishes once. */
  drainMessages(): void {
    this.applyPendingMessages();
    this.commit();
  }

  /** Keys are ignored once the session has ended and while a launch is in flight. */
  async handleKey(key: LauncherKey): Promise<void> {
    if (this.exit || this.disposed || this.launching) return;
    this.applyPendingMessages();

    if (key.type === 'insert') {
      this.insertText(key.text);
      this.commit();
      return;
    }

    switch (key.type) {
      case 'backspace':
        this.deleteBackward();
        break;
      case 'delete-word':
        this.deleteWordBackward();
        break;
      case 'clear-query':
        this.setQuery('', 0);
        break;
      case 'cursor-left':
        this.moveCursor(this.cursor - previousCharLength(this.query, this.cursor));
        break;
      case 'cursor-right':
        this.moveCursor(this.cursor + nextCharLength(this.query, this.cursor));
        break;
      case 'cursor-start':
        this.moveCursor(0);
        break;
      case 'cursor-end':
        this.moveCursor(this.query.length);
        break;
      case 'select-next':
        this.moveSelection('down');
        break;
      case 'select-previous':
        this.moveSelection('up');
        break;
      case 'select-first':
        this.selectIndex(0);
        break;
      case 'select-last':
        this.selectIndex(this.results.length - 1);
        break;
      case 'toggle-mode':
        this.toggleMode();
        break;
      case 'toggle-force-terminal':
        this.toggleForceTerminal();
        break;
      case 'toggle-preferred-mode':
        this.togglePreferredMode();
        break;
      case 'toggle-dormant':
        this.showDormant = !this.showDormant;
        this.dirty = true;
        if (this.mode === 'apps') this.refreshResults();
        break;
      case 'quit':
        this.finish({ reason: 'quit' });
        break;
      case 'launch':
        this.commit();
        await this.launchSelection();
        return;
    }
    this.commit();
  }

  /** Resolves how the given app would be launched right now. */
  resolveLaunchMode(app: AppRef): LaunchMode {
    if (this.forceTerminalKey === app.id) return 'terminal';
    return this.storedLaunchMode(app);
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.cancelActiveSearch();
    this.channel.close();
    this.listeners.clear();
  }

  // ─── Query & selection ────────────────────────────────────────────

  private insertText(text: string): void {
    const clean = String(text || '').replace(CONTROL_CHARACTERS, '');
    if (!clean) return;
    const next = this.query.slice(0, this.cursor) + clean + this.query.slice(this.cursor);
    this.setQuery(next, this.cursor + clean.length);
  }

  private deleteBackward(): void {
    const width = previousCharLength(this.query, this.cursor);
    if (width === 0) return;
    const next = this.query.slice(0, this.cursor - width) + this.query.slice(this.cursor);
    this.setQuery(next, this.cursor - width);
  }

  private deleteWordBackward(): void {
    if (this.cursor === 0) return;
    let start = this.cursor;
    while (start > 0 && /\s/.test(this.query[start - 1])) start -= 1;
    while (start > 0 && !/\s/.test(this.query[start - 1])) start -= 1;
    this.setQuery(this.query.slice(0, start) + this.query.slice(this.cursor), start);
  }

  private setQuery(query: string, cursor: number): void {
    if (query === this.query) {
      this.moveCursor(cursor);
      return;
    }
    this.query = query;
    this.cursor = Math.max(0, Math.min(cursor, query.length));
    this.refreshResults();
  }

  private moveCursor(cursor: number): void {
    const next = Math.max(0, Math.min(cursor, this.query.length));
    if (next === this.cursor) return;
    this.cursor = next;
    this.dirty = true;
  }

  private moveSelection(direction: 'up' | 'down'): void {
    const count = this.results.length;
    if (count <= 1) return;
    this.selectedIndex = direction === 'down'
      ? (this.selectedIndex + 1) % count
      : (this.selectedIndex - 1 + count) % count;
    this.dirty = true;
  }

  private selectIndex(index: number): void {
    const next = Math.max(0, Math.min(index, this.results.length - 1));
    if (next === this.selectedIndex) return;
    this.selectedIndex = next;
    this.dirty = true;
  }

  private toggleMode(): void {
    this.mode = this.mode === 'apps' ? 'files' : 'apps';
    this.refreshResults();
  }

  private selectedCandidate(): Candidate | undefined {
    return this.results[this.selectedIndex];
  }

  private selectedApp(): AppRef | null {
    const payload = this.selectedCandidate()?.payload;
    return payload?.kind === 'app' ? payload : null;
  }

  // ─── Launch preferences ───────────────────────────────────────────

  private storedLaunchMode(app: AppRef): LaunchMode {
    const stored = this.options.usage.get(app.id)?.lastLaunchMode;
    if (stored) return stored;
    return app.isTerminalApp ? 'terminal' : 'direct';
  }

  private toggleForceTerminal(): void {
    if (this.mode === 'files') {
      this.setStatus({ kind: 'info', text: 'Files always open in the editor' });
      return;
    }
    const app = this.selectedApp();
    if (!app) return;

    if (this.forceTerminalKey === app.id) {
      this.forceTerminalKey = null;
      this.setStatus({ kind: 'info', text: `${app.name}: ${this.storedLaunchMode(app)} launch` });
    } else {
      this.forceTerminalKey = app.id;
      this.setStatus({ kind: 'info', text: `${app.name}: terminal launch (this time only)` });
    }
  }

  private togglePreferredMode(): void {
    if (this.mode === 'files') {
      this.setStatus({ kind: 'info', text: 'Files always open in the editor' });
      return;
    }
    const app = this.selectedApp();
    if (!app) return;

    const next: LaunchMode = this.storedLaunchMode(app) === 'terminal' ? 'direct' : 'terminal';
    const outcome = this.options.usage.setPreferredMode(app.id, next);
    if (!outcome.persisted) {
      this.setStatus({ kind: 'error', text: `Preference for ${app.name} could not be saved` });
      return;
    }
    this.setStatus({ kind: 'info', text: `${app.name} now launches ${next === 'terminal' ? 'in a terminal' : 'directly'}` });
  }

  private setStatus(status: StatusMessage | null): void {
    this.status = status;
    this.dirty = true;
  }

  // ─── Searching ────────────────────────────────────────────────────

  private isDormant(app: AppRef, now: number): boolean {
    const days = this.options.dormantAfterDays;
    if (!days || days <= 0) return false;
    const lastUsedAt = this.options.usage.get(app.id)?.lastUsedAt ?? 0;
    return lastUsedAt > 0 && now - lastUsedAt > days * DAY_MS;
  }

  private weigh(candidates: Candidate[]): Candidate[] {
    return applyUsageWeight(candidates, (key) => this.options.usage.launchCount(key), this.weighting);
  }

  private refreshResults(): void {
    this.generation += 1;
    this.cancelActiveSearch();
    this.results = [];
    this.selectedIndex = 0;
    this.scannedEntries = 0;
    this.hiddenDormantCount = 0;
    this.status = null;
    this.dirty = true;

    if (this.mode === 'apps') {
      this.searching = false;
      const now = this.now();
      let matches = this.options.appIndex.search(this.query);
      if (!this.showDormant) {
        const visible = matches.filter((candidate) => {
          return candidate.payload.kind !== 'app' || !this.isDormant(candidate.payload, now);
        });
        this.hiddenDormantCount = matches.length - visible.length;
        matches = visible;
      }
      this.results = rankCandidates(this.weigh(matches), this.maxResults);
      return;
    }

    this.searching = true;
    this.activeSearch = this.startSearch(
      {
        root: this.options.filesRoot,
        query: this.query,
        generation: this.generation,
        showHidden: this.options.showHidden,
        excludedDirectoryNames: this.options.excludedDirectoryNames,
      },
      this.channel
    );
  }

  private cancelActiveSearch(): void {
    if (!this.activeSearch) return;
    this.activeSearch.cancel();
    this.activeSearch = null;
  }

  private applyPendingMessages(): void {
    for (const message of this.channel.drain()) {
      if (message.generation !== this.generation) {
        log.debug(`Discarding ${message.type} from stale search #${message.generation}`);
        continue;
      }
      this.applyMessage(message);
    }
  }

  private applyMessage(message: FileSearchMessage): void {
    switch (message.type) {
      case 'batch': {
        const selectedKey = this.selectedCandidate();
        this.results = mergeRankedCandidates(this.results, this.weigh(message.candidates), this.maxResults);
        this.scannedEntries = message.scanned;
        this.reselect(selectedKey ? getTargetKey(selectedKey.payload) : null);
        break;
      }
      case 'done':
        this.searching = false;
        this.scannedEntries = message.scanned;
        this.activeSearch = null;
        break;
      case 'error':
        this.searching = false;
        this.scannedEntries = message.scanned;
        this.activeSearch = null;
        this.results = [];
        this.selectedIndex = 0;
        this.status = { kind: 'error', text: message.error.message };
        break;
    }
    this.dirty = true;
  }

  private reselect(previousKey: string | null): void {
    if (previousKey) {
      const index = this.results.findIndex((candidate) => getTargetKey(candidate.payload) === previousKey);
      if (index >= 0) {
        this.selectedIndex = index;
        return;
      }
    }
    this.selectedIndex = Math.min(this.selectedIndex, Math.max(0, this.results.length - 1));
  }

  // ─── Launching ────────────────────────────────────────────────────

  private async launchSelection(): Promise<void> {
    if (this.launching) return;
    const candidate = this.selectedCandidate();
    if (!candidate) return;

    const target = candidate.payload;
    const mode = target.kind === 'app' ? this.resolveLaunchMode(target) : null;

    this.launching = true;
    this.setStatus({ kind: 'info', text: `Launching ${candidate.displayText}…` });
    this.commit();

    try {
      await this.options.launch(target, mode);
    } catch (error) {
      this.launching = false;
      if (this.disposed) return;
      const text = error instanceof LaunchError ? error.message : `Failed to launch ${candidate.displayText}: ${describeError(error)}`;
      log.error(text);
      this.setStatus({ kind: 'error', text });
      this.commit();
      return;
    }

    if (this.disposed) {
      this.launching = false;
      return;
    }
    const outcome = this.options.usage.recordLaunch(getTargetKey(target), mode ?? undefined);
    if (!outcome.persisted) {
      log.warn(`Launch of ${candidate.displayText} was not remembered`);
      this.setStatus({ kind: 'error', text: `Launched, but usage history could not be saved` });
    }
    this.launching = false;
    this.forceTerminalKey = null;
    this.finish({ reason: 'launched', target, mode, remembered: outcome.persisted });
    this.commit();
  }

  private finish(exit: SessionExit): void {
    this.exit = exit;
    this.cancelActiveSearch();
    this.searching = false;
    this.dirty = true;
  }

  // ─── Publishing ───────────────────────────────────────────────────

  private buildSnapshot(): SessionSnapshot {
    const app = this.selectedApp();
    return {
      mode: this.mode,
      query: this.query,
      cursor: this.cursor,
      generation: this.generation,
      results: this.results,
      selectedIndex: this.selectedIndex,
      selectedLaunchMode: app ? this.resolveLaunchMode(app) : null,
      searching: this.searching,
      scannedEntries: this.scannedEntries,
      status: this.status,
      forceTerminalKey: this.forceTerminalKey,
      showDormant: this.showDormant,
      hiddenDormantCount: this.hiddenDormantCount,
      launching: this.launching,
      exit: this.exit,
    };
  }

  private commit(): void {
    if (!this.dirty) return;
    this.dirty = false;
    this.snapshot = this.buildSnapshot();
    for (const listener of this.listeners) listener();
  }
}
