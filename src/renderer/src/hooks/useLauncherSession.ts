/**
 * useLauncherSession.ts
 *
 * Subscribes a component to the session's snapshots. The session publishes
 * one snapshot per discrete change, so each change renders at most once.
 */

import { useSyncExternalStore } from 'react';
import type { LauncherSession, SessionSnapshot } from '../../../main/launcher-session.js';

export function useLauncherSession(session: LauncherSession): SessionSnapshot {
  return useSyncExternalStore(session.subscribe, session.getSnapshot, session.getSnapshot);
}
