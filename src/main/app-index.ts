import { scoreFuzzyMatch } from './fuzzy-match.js';
import type { AppRef, Candidate, RawAppRecord } from './types.js';

function toAppRef(record: RawAppRecord): AppRef | null {
  const id = String(record.id || '').trim();
  const name = String(record.name || '').trim();
  const exec = String(record.exec || '').trim();
  if (!id || !name || !exec) return null;
  return { kind: 'app', id, name, exec, isTerminalApp: record.terminal === true };
}

/**
 * In-memory list of launchable applications, loaded once at startup.
 */
export class AppIndex {
  private constructor(readonly apps: readonly AppRef[]) {}

  /** Drops malformed records and keeps the first record for every id. */
  static load(records: Iterable<RawAppRecord>): AppIndex {
    const seen = new Set<string>();
    const apps: AppRef[] = [];
    for (const record of records) {
      const app = toAppRef(record);
      if (!app || seen.has(app.id)) continue;
      seen.add(app.id);
      apps.push(app);
    }
    return new AppIndex(apps);
  }

  get size(): number {
    return this.apps.length;
  }

  /** Matching candidates in index order; ranking happens in the session. */
  search(query: string): Candidate[] {
    const candidates: Candidate[] = [];
    for (const app of this.apps) {
      const match = scoreFuzzyMatch(query, app.name);
      if (!match) continue;
      candidates.push({
        displayText: app.name,
        payload: app,
        score: match.score,
        matchPositions: match.positions,
      });
    }
    return candidates;
  }
}
