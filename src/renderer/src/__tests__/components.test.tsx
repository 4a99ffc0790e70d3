/**
 * components.test.tsx
 *
 * Renders the launcher screen pieces through ink-testing-library and checks
 * the rows, markers and status summaries a user would see.
 */

import React from 'react';
import { describe, it, expect, vi, afterEach } from 'vitest';
import { render } from 'ink-testing-library';
import { AppIndex } from '../../../main/app-index.js';
import { LauncherSession } from '../../../main/launcher-session.js';
import type { Candidate } from '../../../main/types.js';
import App from '../App.js';
import { splitHighlightSegments } from '../components/HighlightedText.js';
import { splitAtCursor } from '../components/QueryLine.js';
import ResultList, { parentPrefixLength } from '../components/ResultList.js';
import { describeResults } from '../components/StatusLine.js';

const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

function plainLines(frame: string | undefined): string[] {
  return String(frame ?? '')
    .replace(ANSI_PATTERN, '')
    .split('\n')
    .map((line) => line.trimEnd());
}

const firefox: Candidate = {
  displayText: 'Firefox',
  payload: { kind: 'app', id: '/apps/firefox.desktop', name: 'Firefox', exec: 'firefox', isTerminalApp: false },
  score: 87,
  matchPositions: [0, 1, 2, 3],
};

const htop: Candidate = {
  displayText: 'htop',
  payload: { kind: 'app', id: '/apps/htop.desktop', name: 'htop', exec: 'htop', isTerminalApp: true },
  score: 40,
  matchPositions: [],
};

const notes: Candidate = {
  displayText: 'docs/notes.md',
  payload: { kind: 'path', absolutePath: '/home/tester/docs/notes.md', isDirectory: false },
  score: 30,
  matchPositions: [5, 6],
};

describe('splitHighlightSegments', () => {
  it('groups runs of matched, plain and dimmed characters', () => {
    expect(splitHighlightSegments('docs/notes.md', [5, 6], 5)).toEqual([
      { text: 'docs/', matched: false, dimmed: true },
      { text: 'no', matched: true, dimmed: false },
      { text: 'tes.md', matched: false, dimmed: false },
    ]);
    expect(splitHighlightSegments('', [])).toEqual([]);
  });
});

describe('splitAtCursor', () => {
  it('keeps a surrogate pair under the cursor whole', () => {
    expect(splitAtCursor('a\u{1F600}x', 1)).toEqual({ before: 'a', atCursor: '\u{1F600}', after: 'x' });
  });

  it('shows a blank cursor cell past the end of the query', () => {
    expect(splitAtCursor('fi', 2)).toEqual({ before: 'fi', atCursor: ' ', after: '' });
  });
});

describe('parentPrefixLength', () => {
  it('covers the parent directories of files and folders', () => {
    expect(parentPrefixLength('docs/notes.md')).toBe(5);
    expect(parentPrefixLength('docs/archive/')).toBe(5);
    expect(parentPrefixLength('notes.md')).toBe(0);
  });
});

describe('describeResults', () => {
  it('summarises the result set', () => {
    const base = {
      mode: 'apps' as const,
      results: [firefox],
      searching: false,
      scannedEntries: 0,
      status: null,
      hiddenDormantCount: 0,
      selectedLaunchMode: 'direct' as const,
    };
    expect(describeResults(base)).toBe('1 result · direct');
    expect(describeResults({ ...base, results: [], selectedLaunchMode: null, hiddenDormantCount: 2 })).toBe(
      '0 results · 2 dormant hidden'
    );
    expect(describeResults({ ...base, mode: 'files', searching: true, scannedEntries: 120, selectedLaunchMode: null })).toBe(
      '1 result · scanning… 120'
    );
    expect(describeResults({ ...base, mode: 'files', scannedEntries: 120, selectedLaunchMode: null })).toBe(
      '1 result · 120 scanned'
    );
  });
});

describe('ResultList', () => {
  it('marks the selected row and terminal apps', () => {
    const { lastFrame, unmount } = render(
      <ResultList results={[firefox, htop, notes]} selectedIndex={1} height={3} searching={false} forceTerminalKey={null} />
    );
    const lines = plainLines(lastFrame());
    expect(lines[0]).toBe('  Firefox');
    expect(lines[1]).toMatch(/^› htop\s+\[term\]$/);
    expect(lines[2]).toBe('  docs/notes.md');
    unmount();
  });

  it('flags the app forced into a terminal', () => {
    const { lastFrame, unmount } = render(
      <ResultList results={[firefox]} selectedIndex={0} height={1} searching={false} forceTerminalKey="/apps/firefox.desktop" />
    );
    expect(plainLines(lastFrame())[0]).toMatch(/^› Firefox\s+\[forced\]$/);
    unmount();
  });

  it('explains an empty list', () => {
    const idle = render(<ResultList results={[]} selectedIndex={0} height={2} searching={false} forceTerminalKey={null} />);
    expect(plainLines(idle.lastFrame())[0]).toBe('No matches');
    idle.unmount();

    const busy = render(<ResultList results={[]} selectedIndex={0} height={2} searching forceTerminalKey={null} />);
    expect(plainLines(busy.lastFrame())[0]).toBe('Searching…');
    busy.unmount();
  });
});

describe('App', () => {
  let session: LauncherSession | null = null;

  afterEach(() => {
    session?.dispose();
    session = null;
  });

  function createSession(): LauncherSession {
    return new LauncherSession({
      appIndex: AppIndex.load([
        { id: '/apps/firefox.desktop', name: 'Firefox', exec: 'firefox', terminal: false },
        { id: '/apps/files.desktop', name: 'Files', exec: 'nautilus', terminal: false },
        { id: '/apps/htop.desktop', name: 'htop', exec: 'htop', terminal: true },
      ]),
      usage: {
        get: () => undefined,
        launchCount: () => 0,
        recordLaunch: (key) => ({ record: { key, launchCount: 1, lastUsedAt: 0 }, persisted: true }),
        setPreferredMode: (key, mode) => ({ record: { key, launchCount: 0, lastLaunchMode: mode, lastUsedAt: 0 }, persisted: true }),
      },
      launch: async () => {},
      filesRoot: '/nonexistent',
      maxResults: 50,
    });
  }

  it('renders the query line, the status line and the results', () => {
    session = createSession();
    const { lastFrame, unmount } = render(<App session={session} />);
    const frame = plainLines(lastFrame()).join('\n');

    expect(frame).toContain('apps › ');
    expect(frame).toContain('3 results · direct');
    expect(frame).toContain('› Files');
    expect(frame).toContain('  Firefox');
    unmount();
  });

  it('forwards typed keys to the session', async () => {
    session = createSession();
    const current = session;
    const { lastFrame, stdin, unmount } = render(<App session={current} />);

    stdin.write('h');
    await vi.waitFor(() => expect(current.getSnapshot().query).toBe('h'));
    await vi.waitFor(() => expect(plainLines(lastFrame()).join('\n')).toContain('1 result · terminal'));
    unmount();
  });

  it('ends the session on Ctrl+C', async () => {
    session = createSession();
    const current = session;
    const { stdin, unmount } = render(<App session={current} />);

    stdin.write('\u0003');
    await vi.waitFor(() => expect(current.getSnapshot().exit).toEqual({ reason: 'quit' }));
    unmount();
  });
});
