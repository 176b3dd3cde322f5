// Session state and key transitions.
// The search buffer lives inside the Search variant, so List mode never carries stale input.

export type Mode =
  | { kind: 'list' }
  | { kind: 'search'; buffer: string };

export interface SessionState {
  mode: Mode;
  selected: number;
  output: string;
  showHelp: boolean;
}

export type Key =
  | { kind: 'char'; char: string }
  | { kind: 'enter' }
  | { kind: 'escape' }
  | { kind: 'backspace' }
  | { kind: 'up' }
  | { kind: 'down' };

/** Work a transition asks the loop to perform after state is updated. */
export type Intent =
  | { kind: 'none' }
  | { kind: 'quit' }
  | { kind: 'download'; ticker: string }
  | { kind: 'analyze'; ticker: string };

const NONE: Intent = { kind: 'none' };

export function createSessionState(): SessionState {
  return { mode: { kind: 'list' }, selected: 0, output: '', showHelp: false };
}

export function searchBuffer(state: SessionState): string {
  return state.mode.kind === 'search' ? state.mode.buffer : '';
}

function assertNever(x: never): never {
  throw new Error(`Unhandled key: ${JSON.stringify(x)}`);
}

function onChar(state: SessionState, char: string): Intent {
  // Command letters win over typing, in either mode
  switch (char) {
    case 'q':
      return { kind: 'quit' };
    case 'h':
      state.showHelp = !state.showHelp;
      return NONE;
    case 's':
      state.mode = { kind: 'search', buffer: '' };
      return NONE;
  }
  if (state.mode.kind === 'search') state.mode = { kind: 'search', buffer: state.mode.buffer + char };
  return NONE;
}

function onEnter(state: SessionState, tickers: readonly string[]): Intent {
  const mode = state.mode;
  switch (mode.kind) {
    case 'search': {
      const ticker = mode.buffer.trim().toUpperCase();
      return ticker ? { kind: 'download', ticker } : NONE;
    }
    case 'list': {
      const ticker = tickers[state.selected];
      return ticker === undefined ? NONE : { kind: 'analyze', ticker };
    }
  }
}

function move(state: SessionState, delta: 1 | -1, count: number) {
  if (state.mode.kind !== 'list' || count === 0) return;
  state.selected = (state.selected + delta + count) % count;
}

/**
 * Applies `key` to `state` in place. `tickers` is this tick's catalog, in display order.
 */
export function dispatchKey(state: SessionState, key: Key, tickers: readonly string[]): Intent {
  switch (key.kind) {
    case 'char':
      return onChar(state, key.char);
    case 'escape':
      state.mode = { kind: 'list' };
      return NONE;
    case 'backspace':
      if (state.mode.kind === 'search') state.mode = { kind: 'search', buffer: Array.from(state.mode.buffer).slice(0, -1).join('') };
      return NONE;
    case 'down':
      move(state, 1, tickers.length);
      return NONE;
    case 'up':
      move(state, -1, tickers.length);
      return NONE;
    case 'enter':
      return onEnter(state, tickers);
    default:
      return assertNever(key);
  }
}

/** Closes a download: record the outcome, leave Search. */
export function completeDownload(state: SessionState, message: string) {
  state.output = message;
  state.mode = { kind: 'list' };
}
