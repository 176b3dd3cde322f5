import type { Key } from '../session/state.js';

/** Shape of the `key` argument of Node's readline 'keypress' event. */
export interface Keypress {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

export function decodeKey(str: string | undefined, key: Keypress | undefined): Key | null {
  // readline flags a lone Esc as meta, so named keys are matched first
  switch (key?.name) {
    case 'return':
    case 'enter':
      return { kind: 'enter' };
    case 'escape':
      return { kind: 'escape' };
    case 'backspace':
      return { kind: 'backspace' };
    case 'up':
      return { kind: 'up' };
    case 'down':
      return { kind: 'down' };
  }
  if (key?.ctrl || key?.meta) return null;
  if (str === undefined || Array.from(str).length !== 1) return null;
  const code = str.codePointAt(0) ?? 0;
  if (code < 0x20 || code === 0x7f) return null;
  return { kind: 'char', char: str };
}
