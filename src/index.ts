#!/usr/bin/env node
import 'dotenv/config';
import { loadSettings } from './config/settings.js';
import { loadAccountsOrWarn } from './store/records.js';
import { SyncProcessInvoker } from './process/invoker.js';
import { ScriptActions } from './session/actions.js';
import { runSession } from './session/loop.js';
import { InkTerminal } from './ui/terminal.js';
import { logger, logToConsole, logToFile, setLogLevel } from './utils/logger.js';

async function main() {
  const settings = loadSettings();
  setLogLevel(settings.logLevel);

  // Reported on the console, before the alternate screen hides it
  const accounts = loadAccountsOrWarn(settings.accountsFile);

  const invoker = new SyncProcessInvoker({ interpreter: settings.pythonBin, cwd: settings.workDir });
  const actions = new ScriptActions(invoker, settings);
  const terminal = new InkTerminal();

  logToFile(settings.logFile);
  terminal.open();
  let failure: unknown;
  try {
    await runSession({ settings, terminal, actions, accounts });
  } catch (err) {
    failure = err;
  } finally {
    terminal.close();
    logToConsole();
  }
  if (failure !== undefined) {
    logger.error({ err: failure }, 'session_failed');
    process.exitCode = 1;
  }
}

main().catch(err => {
  logToConsole();
  logger.error({ err }, 'startup_failed');
  process.exit(1);
});
