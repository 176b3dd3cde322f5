import 'dotenv/config';
import { loadSettings } from '../src/config/settings.js';
import { createBook, openAccount, processTrade } from '../src/simulation/ledger.js';
import { writeAccounts, writeLedger } from '../src/store/records.js';

// Writes a small account summary and trading history for the dashboard to display.
const TRADES: Array<[string, number]> = [
  ['Alice', 5],
  ['Bob', -3],
  ['Alice', 2],
];

async function main() {
  const settings = loadSettings();
  const book = createBook([openAccount('Alice', 10), openAccount('Bob', 20)]);
  for (const [name, amount] of TRADES) {
    if (!processTrade(book, name, amount)) console.log(`Account ${name} not found.`);
  }
  writeAccounts(settings.accountsFile, book.accounts);
  writeLedger(settings.tradesFile, book.history);
  console.log('CSV files written successfully.');
}

main().catch(e => { console.error(e); process.exit(1); });
