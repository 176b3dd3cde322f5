import { spawnSync } from 'child_process';
import { logger } from '../utils/logger.js';

export type Outcome =
  | { kind: 'success'; stdout: string }
  | { kind: 'scriptFailure'; stderr: string; status: number | null; signal: NodeJS.Signals | null }
  | { kind: 'launchFailure'; description: string };

export interface ProcessInvoker {
  invoke(script: string, args?: string[]): Outcome;
}

export interface InvokerOptions {
  interpreter: string;
  cwd: string;
}

/**
 * Runs `<interpreter> <script> ...args` to completion, blocking the caller.
 * No timeout: a script runs as long as it needs.
 */
export class SyncProcessInvoker implements ProcessInvoker {
  constructor(private readonly opts: InvokerOptions) {}

  invoke(script: string, args: string[] = []): Outcome {
    const started = Date.now();
    const r = spawnSync(this.opts.interpreter, [script, ...args], {
      cwd: this.opts.cwd,
      encoding: 'utf8',
      stdio: ['ignore', 'pipe', 'pipe'],
      maxBuffer: 64 * 1024 * 1024,
    });
    const ms = Date.now() - started;
    if (r.error) {
      logger.warn({ script, args, err: r.error, ms }, 'script_launch_failed');
      return { kind: 'launchFailure', description: r.error.message };
    }
    if (r.status === 0) {
      logger.info({ script, args, ms }, 'script_succeeded');
      return { kind: 'success', stdout: r.stdout };
    }
    logger.warn({ script, args, status: r.status, signal: r.signal, ms }, 'script_failed');
    return { kind: 'scriptFailure', stderr: r.stderr, status: r.status, signal: r.signal };
  }
}

/** Human-readable reason for a failed outcome; never just blank. */
export function failureDetail(o: Exclude<Outcome, { kind: 'success' }>): string {
  if (o.kind === 'launchFailure') return o.description;
  const stderr = o.stderr.trim();
  if (stderr) return stderr;
  return o.signal ? `terminated by ${o.signal}` : `exited with status ${o.status}`;
}
