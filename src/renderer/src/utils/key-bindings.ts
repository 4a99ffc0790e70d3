/**
 * Maps Ink key events onto launcher commands.
 *
 * Ink reports the DEL byte most terminals send for Backspace as `delete`,
 * and Ctrl+H as `backspace`; both erase the previous character. Ctrl+J is
 * the same byte as Enter and cannot be bound. Page Up and Page Down jump to
 * the ends of the list.
 */

import type { Key } from 'ink';
import type { LauncherCommand, LauncherKey } from '../../../main/launcher-session.js';

export type KeyState = Pick<
  Key,
  | 'upArrow'
  | 'downArrow'
  | 'leftArrow'
  | 'rightArrow'
  | 'pageUp'
  | 'pageDown'
  | 'return'
  | 'escape'
  | 'ctrl'
  | 'meta'
  | 'shift'
  | 'tab'
  | 'backspace'
  | 'delete'
>;

export const NO_KEY: KeyState = {
  upArrow: false,
  downArrow: false,
  leftArrow: false,
  rightArrow: false,
  pageUp: false,
  pageDown: false,
  return: false,
  escape: false,
  ctrl: false,
  meta: false,
  shift: false,
  tab: false,
  backspace: false,
  delete: false,
};

const CTRL_BINDINGS: Record<string, LauncherCommand> = {
  a: 'cursor-start',
  b: 'cursor-left',
  c: 'quit',
  d: 'toggle-dormant',
  e: 'cursor-end',
  f: 'cursor-right',
  k: 'select-previous',
  n: 'select-next',
  p: 'select-previous',
  r: 'toggle-preferred-mode',
  t: 'toggle-force-terminal',
  u: 'clear-query',
  w: 'delete-word',
};

export function translateInput(input: string, key: KeyState): LauncherKey | null {
  if (key.escape) return { type: 'quit' };
  if (key.return) return { type: 'launch' };
  if (key.tab) return { type: 'toggle-mode' };
  if (key.backspace || key.delete) return { type: 'backspace' };
  if (key.upArrow) return { type: 'select-previous' };
  if (key.downArrow) return { type: 'select-next' };
  if (key.pageUp) return { type: 'select-first' };
  if (key.pageDown) return { type: 'select-last' };
  if (key.leftArrow) return { type: 'cursor-left' };
  if (key.rightArrow) return { type: 'cursor-right' };

  if (key.ctrl) {
    const command = CTRL_BINDINGS[input.toLowerCase()];
    return command ? { type: command } : null;
  }
  if (key.meta) return null;

  return input ? { type: 'insert', text: input } : null;
}
