/**
 * Shared shapes flowing between the search backends, the ranking step and
 * the terminal renderer.
 */

export type SearchMode = 'apps' | 'files';

/** How an application is started: as-is, or wrapped in a terminal emulator. */
export type LaunchMode = 'direct' | 'terminal';

export interface AppRef {
  kind: 'app';
  /** Path of the source manifest (or executable); the usage-store key. */
  id: string;
  name: string;
  exec: string;
  isTerminalApp: boolean;
}

export interface PathRef {
  kind: 'path';
  absolutePath: string;
  isDirectory: boolean;
}

export type LaunchTarget = AppRef | PathRef;

export interface Candidate {
  displayText: string;
  payload: LaunchTarget;
  score: number;
  /** Indices into `displayText` of the characters the query matched. */
  matchPositions: number[];
}

export interface UsageRecord {
  key: string;
  launchCount: number;
  lastLaunchMode?: LaunchMode;
  lastUsedAt: number;
}

/** Raw record handed over by the application manifest scanner. */
export interface RawAppRecord {
  id: string;
  name: string;
  exec: string;
  terminal: boolean;
}

export function getTargetKey(target: LaunchTarget): string {
  return target.kind === 'app' ? target.id : target.absolutePath;
}
