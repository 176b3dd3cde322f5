import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { SessionLoop, runSession, type LoopSettings, type Terminal } from '../src/session/loop.js';
import type { Key } from '../src/session/state.js';
import type { PanelNode } from '../src/render/panels.js';
import { logToConsole, logToFile } from '../src/utils/logger.js';

const HEADER = 'Date,Open,High,Low,Close,Volume';

class FakeTerminal implements Terminal {
  readonly frames: PanelNode[] = [];
  readonly waits: number[] = [];
  constructor(private readonly keys: Array<Key | null>) {}
  draw(tree: PanelNode) { this.frames.push(tree); }
  pollKey(timeoutMs: number): Promise<Key | null> {
    this.waits.push(timeoutMs);
    // Quit once the script runs out so run() always ends
    if (!this.keys.length) return Promise.resolve({ kind: 'char', char: 'q' });
    return Promise.resolve(this.keys.shift() ?? null);
  }
}

class FakeActions {
  readonly downloads: string[] = [];
  readonly analyzed: string[] = [];
  constructor(private readonly cacheDir: string) {}
  download(ticker: string) {
    this.downloads.push(ticker);
    fs.writeFileSync(path.join(this.cacheDir, `${ticker}.csv`), `${HEADER}\nd1,1,1,1,10,1\nd2,1,1,1,11,1\n`);
    return `Downloaded data for ${ticker}`;
  }
  analyze(ticker: string) {
    this.analyzed.push(ticker);
    return `ML Prediction for ${ticker}: 1.00`;
  }
}

const root = fs.mkdtempSync(path.join(os.tmpdir(), 'tt-loop-'));
let seq = 0;

function setup(files: Record<string, string> = {}, trades?: string) {
  const dir = path.join(root, `case-${seq++}`);
  const cacheDir = path.join(dir, 'pre_stock');
  fs.mkdirSync(cacheDir, { recursive: true });
  for (const [name, text] of Object.entries(files)) fs.writeFileSync(path.join(cacheDir, name), text);
  const tradesFile = path.join(dir, 'trading_history.csv');
  if (trades !== undefined) fs.writeFileSync(tradesFile, trades);
  const settings: LoopSettings = { cacheDir, seriesExt: 'csv', closeColumn: 4, tradesFile, pollIntervalMs: 300 };
  return { settings, actions: new FakeActions(cacheDir) };
}

const char = (c: string): Key => ({ kind: 'char', char: c });
const ENTER: Key = { kind: 'enter' };
const DOWN: Key = { kind: 'down' };
const SERIES = `${HEADER}\nd1,1,1,1,100,1\nd2,1,1,1,110,1\n`;

after(() => fs.rmSync(root, { recursive: true, force: true }));

describe('SessionLoop', () => {
  before(() => logToFile(path.join(root, 'test.log')));
  after(() => logToConsole());

  it('draws once per tick and stops on q', async () => {
    const { settings, actions } = setup({ 'AAPL.csv': SERIES });
    const terminal = new FakeTerminal([null, null, char('q')]);
    const loop = new SessionLoop({ settings, terminal, actions, accounts: [] });
    await loop.run();
    assert.strictEqual(loop.isStopped, true);
    assert.strictEqual(loop.tickCount, 3);
    assert.strictEqual(terminal.frames.length, 3);
    assert.deepStrictEqual(terminal.waits, [300, 300, 300]);
  });

  it('downloads the searched ticker, returns to the list and rescans at once', async () => {
    const { settings, actions } = setup({ 'AAPL.csv': SERIES });
    const keys = [char('s'), char('n'), char('v'), char('d'), char('a'), ENTER];
    const loop = new SessionLoop({ settings, terminal: new FakeTerminal([...keys]), actions, accounts: [] });
    for (let i = 0; i < keys.length; i++) await loop.tick();
    assert.deepStrictEqual(actions.downloads, ['NVDA']);
    assert.strictEqual(loop.state.output, 'Downloaded data for NVDA');
    assert.deepStrictEqual(loop.state.mode, { kind: 'list' });
    assert.deepStrictEqual(loop.stocks.map(s => s.ticker).sort(), ['AAPL', 'NVDA']);
  });

  it('analyzes the selected ticker', async () => {
    const { settings, actions } = setup({ 'AAPL.csv': SERIES, 'MSFT.csv': SERIES });
    const loop = new SessionLoop({ settings, terminal: new FakeTerminal([DOWN, ENTER]), actions, accounts: [] });
    await loop.tick();
    await loop.tick();
    const selected = loop.stocks[1].ticker;
    assert.deepStrictEqual(actions.analyzed, [selected]);
    assert.strictEqual(loop.state.output, `ML Prediction for ${selected}: 1.00`);
  });

  it('ignores enter while the catalog is empty', async () => {
    const { settings, actions } = setup();
    const loop = new SessionLoop({ settings, terminal: new FakeTerminal([ENTER]), actions, accounts: [] });
    await loop.tick();
    assert.deepStrictEqual(actions.analyzed, []);
    assert.strictEqual(loop.state.output, '');
  });

  it('renders the help overlay on the tick after h', async () => {
    const { settings, actions } = setup();
    const terminal = new FakeTerminal([char('h'), null]);
    const loop = new SessionLoop({ settings, terminal, actions, accounts: [] });
    await loop.tick();
    await loop.tick();
    assert.strictEqual(terminal.frames[0].kind, 'split');
    const help = terminal.frames[1];
    if (help.kind !== 'text') throw new Error('expected text');
    assert.strictEqual(help.title, 'Instructions');
  });

  it('re-reads the trade ledger every tick', async () => {
    const { settings, actions } = setup({}, 'name,transaction,new_balance\nAlice,5,15\n');
    const terminal = new FakeTerminal([]);
    await runSession({ settings, terminal, actions, accounts: [] });
    const frame = terminal.frames[0];
    if (frame.kind !== 'split') throw new Error('expected split');
    const top = frame.children[0].node;
    if (top.kind !== 'split') throw new Error('expected split');
    assert.deepStrictEqual(top.children[1].node, { kind: 'text', title: 'Live Trades', lines: ['Alice  5.00  15.00'] });
  });
});

describe('SessionLoop with an unwritable log file', () => {
  before(() => logToFile(root));
  after(() => logToConsole());

  it('keeps running when log lines cannot be written', async t => {
    t.mock.method(console, 'log', () => {});
    t.mock.method(console, 'warn', () => {});
    const { settings, actions } = setup({ 'AAPL.csv': SERIES });
    const terminal = new FakeTerminal([char('q')]);
    const loop = new SessionLoop({ settings, terminal, actions, accounts: [] });
    await loop.run();
    assert.strictEqual(loop.isStopped, true);
    assert.strictEqual(loop.tickCount, 1);
  });
});
