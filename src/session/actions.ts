import path from 'path';
import type { Settings } from '../config/settings.js';
import { seriesPath } from '../store/catalog.js';
import { failureDetail, type Outcome, type ProcessInvoker } from '../process/invoker.js';

export interface ActionLabels {
  ok: (stdout: string) => string;
  failed: string;
}

/** Formats any outcome of `script` into the single message shown in the Search panel. */
export function describeOutcome(script: string, outcome: Outcome, labels: ActionLabels): string {
  switch (outcome.kind) {
    case 'success':
      return labels.ok(outcome.stdout.trim());
    case 'scriptFailure':
      return `${labels.failed}: ${failureDetail(outcome)}`;
    case 'launchFailure':
      return `Failed to run ${script}: ${failureDetail(outcome)}`;
  }
}

export type ActionSettings = Pick<Settings, 'workDir' | 'cacheDir' | 'seriesExt' | 'downloadScript' | 'preprocessScript' | 'predictScript'>;

export class ScriptActions {
  constructor(private readonly invoker: ProcessInvoker, private readonly settings: ActionSettings) {}

  download(ticker: string): string {
    const { downloadScript } = this.settings;
    const outcome = this.invoker.invoke(downloadScript, [ticker]);
    return describeOutcome(downloadScript, outcome, {
      ok: () => `Downloaded data for ${ticker}`,
      failed: 'Download error',
    });
  }

  preprocess(ticker: string): string {
    const { preprocessScript, workDir, cacheDir, seriesExt } = this.settings;
    // Relative to the scripts' working directory, e.g. pre_stock/AAPL.csv
    const file = path.relative(workDir, seriesPath(cacheDir, ticker, seriesExt));
    const outcome = this.invoker.invoke(preprocessScript, [file]);
    return describeOutcome(preprocessScript, outcome, {
      ok: () => `Preprocess OK for ${ticker}`,
      failed: 'Preprocess error',
    });
  }

  predict(ticker: string): string {
    const { predictScript } = this.settings;
    const outcome = this.invoker.invoke(predictScript);
    return describeOutcome(predictScript, outcome, {
      ok: stdout => `ML Prediction for ${ticker}: ${stdout}`,
      failed: 'Model error',
    });
  }

  /** Preprocess then predict, whatever preprocess returned; the last message wins. */
  analyze(ticker: string): string {
    this.preprocess(ticker);
    return this.predict(ticker);
  }
}
