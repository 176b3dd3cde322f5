import fs from 'fs';
import path from 'path';
import { parseCsv, parseDecimal } from './csv.js';
import { logger } from '../utils/logger.js';

export interface StockInfo {
  ticker: string;
  price: number;
  change: number;
  pctChange: number;
}

export interface CatalogOptions {
  /** Series file extension, without the dot */
  ext?: string;
  /** Zero-based column holding the closing price (Date,Open,High,Low,Close,...) */
  closeColumn?: number;
}

export function seriesPath(directory: string, ticker: string, ext = 'csv') {
  return path.join(directory, `${ticker}.${ext}`);
}

/** Closing prices in file order; the header row and unparseable cells are skipped. */
export function readClosePrices(file: string, closeColumn = 4): number[] {
  const rows = parseCsv(fs.readFileSync(file, 'utf8'));
  const closes: number[] = [];
  for (const row of rows.slice(1)) {
    const close = parseDecimal(row.cells[closeColumn]);
    if (close !== null) closes.push(close);
  }
  return closes;
}

export function stockInfoFromCloses(ticker: string, closes: number[]): StockInfo {
  if (closes.length < 2) return { ticker, price: 0, change: 0, pctChange: 0 };
  const last = closes[closes.length - 1];
  const prev = closes[closes.length - 2];
  const change = last - prev;
  const pctChange = prev !== 0 ? (change / prev) * 100 : 0;
  return { ticker, price: last, change, pctChange };
}

function isFileTarget(link: string): boolean {
  try {
    return fs.statSync(link).isFile();
  } catch {
    // dangling link
    return false;
  }
}

/**
 * One StockInfo per series file (or link to one), in directory enumeration order.
 * Tickers with unreadable or short series still appear, zeroed.
 */
export function scanCatalog(directory: string, opts: CatalogOptions = {}): StockInfo[] {
  const ext = '.' + (opts.ext ?? 'csv');
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(directory, { withFileTypes: true });
  } catch (err) {
    logger.debug({ directory, err }, 'catalog_dir_unavailable');
    return [];
  }
  const out: StockInfo[] = [];
  for (const e of entries) {
    if (path.extname(e.name) !== ext) continue;
    const file = path.join(directory, e.name);
    if (!e.isFile() && !(e.isSymbolicLink() && isFileTarget(file))) continue;
    const ticker = path.basename(e.name, ext);
    if (!ticker) continue;
    let closes: number[] = [];
    try {
      closes = readClosePrices(file, opts.closeColumn);
    } catch (err) {
      logger.debug({ ticker, err }, 'catalog_series_unreadable');
    }
    out.push(stockInfoFromCloses(ticker, closes));
  }
  return out;
}
