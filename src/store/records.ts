import fs from 'fs';
import { z } from 'zod';
import { parseCsv, formatCsv, parseDecimal } from './csv.js';
import { RecordDecodeError, RecordLoadError, describeError } from '../shared/errors.js';
import { logger } from '../utils/logger.js';

export interface AccountSummary {
  name: string;
  initialAmount: number;
  currentAmount: number;
  change: number;
  percentageChange: number;
}

export interface TradeRecord {
  name: string;
  transaction: number;
  newBalance: number;
}

/** Ledger row as the simulation writes it; the extra column is ignored on load. */
export interface LedgerEntry extends TradeRecord {
  percentageChange: number;
}

const decimal = z.string().transform((raw, ctx) => {
  const n = parseDecimal(raw);
  if (n === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: '${raw}'` });
    return z.NEVER;
  }
  return n;
});

const AccountRowSchema = z.object({
  name: z.string(),
  initial_amount: decimal,
  current_amount: decimal,
  change: decimal,
  percentage_change: decimal,
});

const TradeRowSchema = z.object({
  name: z.string(),
  transaction: decimal,
  new_balance: decimal,
});

export const ACCOUNT_HEADER = ['name', 'initial_amount', 'current_amount', 'change', 'percentage_change'];
export const LEDGER_HEADER = ['name', 'transaction', 'new_balance', 'percentage_change'];

/** Change and percentage change are only ever derived here, together. */
export function summarizeAccount(name: string, initialAmount: number, currentAmount: number): AccountSummary {
  const change = currentAmount - initialAmount;
  const percentageChange = initialAmount !== 0 ? (change / initialAmount) * 100 : 0;
  return { name, initialAmount, currentAmount, change, percentageChange };
}

function readText(file: string): string {
  try {
    return fs.readFileSync(file, 'utf8');
  } catch (err) {
    throw new RecordLoadError(file, err);
  }
}

function decodeRows<S extends z.ZodTypeAny>(file: string, schema: S): Array<z.output<S>> {
  const rows = parseCsv(readText(file));
  if (!rows.length) return [];
  const header = rows[0].cells.map(h => h.trim());
  const out: Array<z.output<S>> = [];
  for (const row of rows.slice(1)) {
    const obj: Record<string, string> = {};
    header.forEach((h, i) => {
      const cell = row.cells[i];
      if (cell !== undefined) obj[h] = cell;
    });
    const r = schema.safeParse(obj);
    if (!r.success) {
      throw new RecordDecodeError(file, row.line, r.error.issues.map(i => `${i.path.join('.') || 'row'}: ${i.message}`));
    }
    out.push(r.data);
  }
  return out;
}

export function loadAccounts(file: string): AccountSummary[] {
  return decodeRows(file, AccountRowSchema).map(r => summarizeAccount(r.name, r.initial_amount, r.current_amount));
}

export function loadTrades(file: string): TradeRecord[] {
  return decodeRows(file, TradeRowSchema).map(r => ({ name: r.name, transaction: r.transaction, newBalance: r.new_balance }));
}

/** Startup load: absence is reported once, then the dashboard runs with no accounts. */
export function loadAccountsOrWarn(file: string): AccountSummary[] {
  try {
    return loadAccounts(file);
  } catch (err) {
    logger.warn({ file, err }, `Warning: could not read ${file}: ${describeError(err)}`);
    return [];
  }
}

/** Per-tick load: any failure is an empty ledger. */
export function loadTradesQuietly(file: string): TradeRecord[] {
  try {
    return loadTrades(file);
  } catch (err) {
    logger.debug({ file, err }, 'trades_load_skipped');
    return [];
  }
}

export function writeAccounts(file: string, accounts: AccountSummary[]) {
  const rows = accounts.map(a => [a.name, a.initialAmount, a.currentAmount, a.change, a.percentageChange]);
  fs.writeFileSync(file, formatCsv(ACCOUNT_HEADER, rows), 'utf8');
}

export function writeLedger(file: string, entries: LedgerEntry[]) {
  const rows = entries.map(e => [e.name, e.transaction, e.newBalance, e.percentageChange]);
  fs.writeFileSync(file, formatCsv(LEDGER_HEADER, rows), 'utf8');
}
