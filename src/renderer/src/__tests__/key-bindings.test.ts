/**
 * key-bindings.test.ts
 *
 * Pins the mapping from Ink key events to launcher commands, including the
 * terminal quirks around Backspace and the control chords.
 */

import { describe, it, expect } from 'vitest';
import { NO_KEY, translateInput, type KeyState } from '../utils/key-bindings.js';

function key(overrides: Partial<KeyState>): KeyState {
  return { ...NO_KEY, ...overrides };
}

describe('translateInput', () => {
  it('inserts printable input, including pasted text', () => {
    expect(translateInput('f', NO_KEY)).toEqual({ type: 'insert', text: 'f' });
    expect(translateInput('Fire fox', key({ shift: true }))).toEqual({ type: 'insert', text: 'Fire fox' });
  });

  it('maps the named keys', () => {
    expect(translateInput('', key({ return: true }))).toEqual({ type: 'launch' });
    expect(translateInput('', key({ escape: true }))).toEqual({ type: 'quit' });
    expect(translateInput('\t', key({ tab: true }))).toEqual({ type: 'toggle-mode' });
    expect(translateInput('', key({ upArrow: true }))).toEqual({ type: 'select-previous' });
    expect(translateInput('', key({ downArrow: true }))).toEqual({ type: 'select-next' });
    expect(translateInput('', key({ leftArrow: true }))).toEqual({ type: 'cursor-left' });
    expect(translateInput('', key({ rightArrow: true }))).toEqual({ type: 'cursor-right' });
    expect(translateInput('', key({ pageUp: true }))).toEqual({ type: 'select-first' });
    expect(translateInput('', key({ pageDown: true }))).toEqual({ type: 'select-last' });
  });

  it('treats both backspace flavours as backspace', () => {
    expect(translateInput('', key({ delete: true }))).toEqual({ type: 'backspace' });
    expect(translateInput('', key({ backspace: true }))).toEqual({ type: 'backspace' });
  });

  it('maps control chords', () => {
    const chords: Array<[string, string]> = [
      ['c', 'quit'],
      ['t', 'toggle-force-terminal'],
      ['r', 'toggle-preferred-mode'],
      ['d', 'toggle-dormant'],
      ['u', 'clear-query'],
      ['w', 'delete-word'],
      ['n', 'select-next'],
      ['p', 'select-previous'],
      ['k', 'select-previous'],
      ['a', 'cursor-start'],
      ['e', 'cursor-end'],
      ['b', 'cursor-left'],
      ['f', 'cursor-right'],
    ];
    for (const [input, type] of chords) {
      expect(translateInput(input, key({ ctrl: true }))).toEqual({ type });
    }
  });

  it('ignores unbound chords and empty input', () => {
    expect(translateInput('z', key({ ctrl: true }))).toBeNull();
    expect(translateInput('x', key({ meta: true }))).toBeNull();
    expect(translateInput('', NO_KEY)).toBeNull();
  });
});
