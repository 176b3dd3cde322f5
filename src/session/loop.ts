import type { Settings } from '../config/settings.js';
import { scanCatalog, type StockInfo } from '../store/catalog.js';
import { loadTradesQuietly, type AccountSummary } from '../store/records.js';
import { renderLayout } from '../render/layout.js';
import type { PanelTree } from '../render/panels.js';
import { completeDownload, createSessionState, dispatchKey, type Intent, type Key, type SessionState } from './state.js';
import type { ScriptActions } from './actions.js';
import { logger } from '../utils/logger.js';

export interface Terminal {
  draw(tree: PanelTree): void;
  /** Resolves with the next key, or null once `timeoutMs` passes without one. */
  pollKey(timeoutMs: number): Promise<Key | null>;
}

export type LoopSettings = Pick<Settings, 'cacheDir' | 'seriesExt' | 'closeColumn' | 'tradesFile' | 'pollIntervalMs'>;

export interface SessionDeps {
  settings: LoopSettings;
  terminal: Terminal;
  actions: Pick<ScriptActions, 'download' | 'analyze'>;
  accounts: AccountSummary[];
  state?: SessionState;
}

/**
 * One tick: rescan catalog, render, wait for a key, dispatch.
 * Script actions run inside the dispatch step and block the tick until they finish.
 */
export class SessionLoop {
  readonly state: SessionState;
  private catalog: StockInfo[] = [];
  private stopped = false;
  private ticks = 0;

  constructor(private readonly deps: SessionDeps) {
    this.state = deps.state ?? createSessionState();
  }

  get stocks(): readonly StockInfo[] { return this.catalog; }
  get tickCount() { return this.ticks; }
  get isStopped() { return this.stopped; }

  stop() { this.stopped = true; }

  refreshCatalog() {
    const { cacheDir, seriesExt, closeColumn } = this.deps.settings;
    this.catalog = scanCatalog(cacheDir, { ext: seriesExt, closeColumn });
  }

  async tick(): Promise<void> {
    const { settings, terminal, accounts } = this.deps;
    this.ticks++;
    this.refreshCatalog();
    const trades = loadTradesQuietly(settings.tradesFile);
    terminal.draw(renderLayout({ state: this.state, accounts, trades, catalog: this.catalog }));
    const key = await terminal.pollKey(settings.pollIntervalMs);
    if (!key) return;
    this.perform(dispatchKey(this.state, key, this.catalog.map(s => s.ticker)));
  }

  async run(): Promise<void> {
    logger.info({ cacheDir: this.deps.settings.cacheDir }, 'session_started');
    while (!this.stopped) await this.tick();
    logger.info({ ticks: this.ticks }, 'session_stopped');
  }

  private perform(intent: Intent) {
    const { actions } = this.deps;
    switch (intent.kind) {
      case 'none':
        return;
      case 'quit':
        this.stop();
        return;
      case 'download': {
        logger.info({ ticker: intent.ticker }, 'download_requested');
        completeDownload(this.state, actions.download(intent.ticker));
        this.refreshCatalog();
        return;
      }
      case 'analyze':
        logger.info({ ticker: intent.ticker }, 'analyze_requested');
        this.state.output = actions.analyze(intent.ticker);
        return;
    }
  }
}

export function runSession(deps: SessionDeps): Promise<void> {
  return new SessionLoop(deps).run();
}
