/**
 * app-index.test.ts
 *
 * Covers loading app records (validation, dedupe by id) and the fuzzy search
 * over app names.
 */

import { describe, it, expect } from 'vitest';
import { AppIndex } from '../app-index.js';
import type { RawAppRecord } from '../types.js';

const RECORDS: RawAppRecord[] = [
  { id: '/apps/firefox.desktop', name: 'Firefox', exec: 'firefox %u', terminal: false },
  { id: '/apps/htop.desktop', name: 'htop', exec: 'htop', terminal: true },
  { id: '/apps/files.desktop', name: 'Files', exec: 'nautilus', terminal: false },
];

describe('AppIndex', () => {
  it('loads records as app references', () => {
    const index = AppIndex.load(RECORDS);
    expect(index.size).toBe(3);
    expect(index.apps[1]).toEqual({
      kind: 'app',
      id: '/apps/htop.desktop',
      name: 'htop',
      exec: 'htop',
      isTerminalApp: true,
    });
  });

  it('drops malformed records and duplicate ids', () => {
    const index = AppIndex.load([
      ...RECORDS,
      { id: '/apps/firefox.desktop', name: 'Firefox Nightly', exec: 'firefox-nightly', terminal: false },
      { id: '', name: 'No Id', exec: 'x', terminal: false },
      { id: '/apps/blank.desktop', name: '   ', exec: 'x', terminal: false },
      { id: '/apps/noexec.desktop', name: 'No Exec', exec: '', terminal: false },
    ]);
    expect(index.apps.map((app) => app.name)).toEqual(['Firefox', 'htop', 'Files']);
  });

  it('returns every app for an empty query in index order', () => {
    const candidates = AppIndex.load(RECORDS).search('');
    expect(candidates.map((candidate) => candidate.displayText)).toEqual(['Firefox', 'htop', 'Files']);
    expect(candidates.every((candidate) => candidate.score === 0)).toBe(true);
  });

  it('returns only fuzzy matches with their positions', () => {
    const candidates = AppIndex.load(RECORDS).search('fi');
    expect(candidates.map((candidate) => candidate.displayText)).toEqual(['Firefox', 'Files']);
    expect(candidates[0].matchPositions).toEqual([0, 1]);
    expect(candidates[0].payload).toMatchObject({ kind: 'app', id: '/apps/firefox.desktop' });
  });
});
