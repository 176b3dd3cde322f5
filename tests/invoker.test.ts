import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { SyncProcessInvoker, failureDetail } from '../src/process/invoker.js';
import { logToConsole, logToFile } from '../src/utils/logger.js';

const dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'tt-invoker-')));

function script(name: string, body: string) {
  fs.writeFileSync(path.join(dir, name), body, 'utf8');
  return name;
}

// Node stands in for the script interpreter
const invoker = new SyncProcessInvoker({ interpreter: process.execPath, cwd: dir });

describe('SyncProcessInvoker', () => {
  before(() => logToFile(path.join(dir, 'test.log')));
  after(() => {
    logToConsole();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns stdout on exit status zero', () => {
    const s = script('ok.cjs', "process.stdout.write('hello\\n');");
    assert.deepStrictEqual(invoker.invoke(s), { kind: 'success', stdout: 'hello\n' });
  });

  it('passes arguments and runs in the configured directory', () => {
    const s = script('echo.cjs', "process.stdout.write(process.argv.slice(2).join(' ') + '|' + process.cwd());");
    assert.deepStrictEqual(invoker.invoke(s, ['AAPL', 'pre_stock/AAPL.csv']), { kind: 'success', stdout: `AAPL pre_stock/AAPL.csv|${dir}` });
  });

  it('returns stderr and status on a non-zero exit', () => {
    const s = script('fail.cjs', "process.stderr.write('bad ticker\\n'); process.exit(1);");
    assert.deepStrictEqual(invoker.invoke(s), { kind: 'scriptFailure', stderr: 'bad ticker\n', status: 1, signal: null });
  });

  it('reports a missing interpreter as a launch failure', () => {
    const broken = new SyncProcessInvoker({ interpreter: path.join(dir, 'no-such-interpreter'), cwd: dir });
    const outcome = broken.invoke('anything.py');
    assert.strictEqual(outcome.kind, 'launchFailure');
    if (outcome.kind === 'launchFailure') assert.match(outcome.description, /ENOENT/);
  });
});

describe('failureDetail', () => {
  it('prefers trimmed stderr', () => {
    assert.strictEqual(failureDetail({ kind: 'scriptFailure', stderr: '  boom \n', status: 1, signal: null }), 'boom');
  });

  it('falls back to the exit status or signal', () => {
    assert.strictEqual(failureDetail({ kind: 'scriptFailure', stderr: '', status: 2, signal: null }), 'exited with status 2');
    assert.strictEqual(failureDetail({ kind: 'scriptFailure', stderr: '\n', status: null, signal: 'SIGKILL' }), 'terminated by SIGKILL');
  });

  it('uses the launch description as is', () => {
    assert.strictEqual(failureDetail({ kind: 'launchFailure', description: 'spawnSync python3 EACCES' }), 'spawnSync python3 EACCES');
  });
});
