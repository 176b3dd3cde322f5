import readline from 'readline';
import { render, type Instance } from 'ink';
import { Frame } from './Frame.js';
import type { Size } from './sizing.js';
import { decodeKey, type Keypress } from './keys.js';
import type { Terminal } from '../session/loop.js';
import type { Key } from '../session/state.js';
import type { PanelTree } from '../render/panels.js';
import { TerminalSetupError } from '../shared/errors.js';

const ENTER_ALT_SCREEN = '\x1b[?1049h';
const LEAVE_ALT_SCREEN = '\x1b[?1049l';
const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';

/**
 * Full-screen terminal: alternate screen, raw keyboard input, Ink drawing.
 * `open` and `close` failures propagate; nothing else here throws.
 */
export class InkTerminal implements Terminal {
  private instance: Instance | null = null;
  private queue: Key[] = [];
  private waiter: ((key: Key) => void) | null = null;
  private lastTree: PanelTree | null = null;

  private readonly onKeypress = (str: string | undefined, key: Keypress | undefined) => {
    const decoded = decodeKey(str, key);
    if (!decoded) return;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter(decoded);
    } else {
      this.queue.push(decoded);
    }
  };

  private readonly onResize = () => { this.draw(this.lastTree); };

  constructor(
    private readonly stdin: NodeJS.ReadStream = process.stdin,
    private readonly stdout: NodeJS.WriteStream = process.stdout,
  ) {}

  private size(): Size {
    // One row short of the screen keeps Ink from scrolling the alternate buffer
    return { width: this.stdout.columns || 80, height: Math.max(1, (this.stdout.rows || 24) - 1) };
  }

  open() {
    if (!this.stdin.isTTY || !this.stdout.isTTY) {
      throw new TerminalSetupError('stdin and stdout must be an interactive terminal');
    }
    try {
      readline.emitKeypressEvents(this.stdin);
      this.stdin.setRawMode(true);
      this.stdin.on('keypress', this.onKeypress);
      this.stdin.resume();
      this.stdout.write(ENTER_ALT_SCREEN + HIDE_CURSOR);
      this.stdout.on('resize', this.onResize);
      this.instance = render(<Frame tree={null} size={this.size()} />, {
        stdout: this.stdout,
        stdin: this.stdin,
        exitOnCtrlC: false,
        patchConsole: false,
      });
    } catch (err) {
      throw new TerminalSetupError('could not prepare the terminal', err);
    }
  }

  draw(tree: PanelTree | null) {
    this.lastTree = tree;
    this.instance?.rerender(<Frame tree={tree} size={this.size()} />);
  }

  pollKey(timeoutMs: number): Promise<Key | null> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve(queued);
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, timeoutMs);
      this.waiter = key => {
        clearTimeout(timer);
        resolve(key);
      };
    });
  }

  close() {
    try {
      this.instance?.unmount();
      this.instance = null;
      this.stdout.off('resize', this.onResize);
      this.stdin.off('keypress', this.onKeypress);
      if (this.stdin.isTTY) this.stdin.setRawMode(false);
      this.stdin.pause();
      this.stdout.write(SHOW_CURSOR + LEAVE_ALT_SCREEN);
    } catch (err) {
      throw new TerminalSetupError('could not restore the terminal', err);
    }
  }
}
