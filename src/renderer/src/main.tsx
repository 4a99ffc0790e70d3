import React from 'react';
import { render } from 'ink';
import type { LauncherSession, SessionExit } from '../../main/launcher-session.js';
import App from './App.js';

const ENTER_ALT_SCREEN = '\x1b[?1049h';
const LEAVE_ALT_SCREEN = '\x1b[?1049l';

/**
 * Takes over the terminal (alternate screen, raw input) until the session
 * ends, then restores it. Resolves with how the session ended.
 */
export async function runTerminalLauncher(session: LauncherSession): Promise<SessionExit | null> {
  const stdout = process.stdout;
  const alternateScreen = Boolean(stdout.isTTY);
  if (alternateScreen) stdout.write(ENTER_ALT_SCREEN);

  try {
    const instance = render(<App session={session} />, { exitOnCtrlC: false });
    await instance.waitUntilExit();
  } finally {
    if (alternateScreen) stdout.write(LEAVE_ALT_SCREEN);
  }
  return session.getSnapshot().exit;
}
