import { summarizeAccount, type AccountSummary, type LedgerEntry } from '../store/records.js';

export interface AccountBook {
  accounts: AccountSummary[];
  history: LedgerEntry[];
}

export function openAccount(name: string, initialAmount: number): AccountSummary {
  return summarizeAccount(name, initialAmount, initialAmount);
}

export function createBook(accounts: AccountSummary[] = []): AccountBook {
  return { accounts: [...accounts], history: [] };
}

/**
 * Applies a signed trade to the named account and appends it to the ledger.
 * Returns null when no account has that name; the book is left untouched.
 */
export function processTrade(book: AccountBook, name: string, amount: number): LedgerEntry | null {
  const idx = book.accounts.findIndex(a => a.name === name);
  if (idx < 0) return null;
  const prev = book.accounts[idx];
  const next = summarizeAccount(prev.name, prev.initialAmount, prev.currentAmount + amount);
  book.accounts[idx] = next;
  const entry: LedgerEntry = {
    name,
    transaction: amount,
    newBalance: next.currentAmount,
    // Relative to the opening amount, not the running balance
    percentageChange: prev.initialAmount !== 0 ? (amount / prev.initialAmount) * 100 : 0,
  };
  book.history.push(entry);
  return entry;
}
