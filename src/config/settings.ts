import path from 'path';
import { z } from 'zod';
import { ConfigError } from '../shared/errors.js';

const SettingsSchema = z.object({
  WORK_DIR: z.string().min(1).optional(),
  ACCOUNTS_FILE: z.string().min(1).default('account_summary.csv'),
  TRADES_FILE: z.string().min(1).default('trading_history.csv'),
  CACHE_DIR: z.string().min(1).default('pre_stock'),
  SERIES_EXT: z.string().regex(/^[A-Za-z0-9]+$/, 'extension without dot').default('csv'),
  CLOSE_COLUMN: z.coerce.number().int().min(0).default(4),
  PYTHON_BIN: z.string().min(1).default('python3'),
  DOWNLOAD_SCRIPT: z.string().min(1).default('download_stock.py'),
  PREPROCESS_SCRIPT: z.string().min(1).default('ml/preprocess.py'),
  PREDICT_SCRIPT: z.string().min(1).default('ml/model.py'),
  POLL_INTERVAL_MS: z.coerce.number().int().min(10).max(10000).default(300),
  LOG_FILE: z.string().min(1).default('logs/trade-terminal.log'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface Settings {
  workDir: string;
  accountsFile: string;
  tradesFile: string;
  cacheDir: string;
  seriesExt: string;
  closeColumn: number;
  pythonBin: string;
  /** Script paths stay relative so messages and arguments read like the command line */
  downloadScript: string;
  preprocessScript: string;
  predictScript: string;
  pollIntervalMs: number;
  logFile: string;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
}

type Env = Record<string, string | undefined>;

export function loadSettings(env: Env = process.env, cwd = process.cwd()): Settings {
  // Blank entries in .env count as unset
  const cleaned: Env = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v.trim() !== '') cleaned[k] = v.trim();
  }
  const r = SettingsSchema.safeParse(cleaned);
  if (!r.success) {
    throw new ConfigError(r.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }
  const c = r.data;
  const workDir = path.resolve(cwd, c.WORK_DIR ?? '.');
  const at = (p: string) => path.resolve(workDir, p);
  return {
    workDir,
    accountsFile: at(c.ACCOUNTS_FILE),
    tradesFile: at(c.TRADES_FILE),
    cacheDir: at(c.CACHE_DIR),
    seriesExt: c.SERIES_EXT,
    closeColumn: c.CLOSE_COLUMN,
    pythonBin: c.PYTHON_BIN,
    downloadScript: c.DOWNLOAD_SCRIPT,
    preprocessScript: c.PREPROCESS_SCRIPT,
    predictScript: c.PREDICT_SCRIPT,
    pollIntervalMs: c.POLL_INTERVAL_MS,
    logFile: at(c.LOG_FILE),
    logLevel: c.LOG_LEVEL,
  };
}
