import type { AccountSummary, TradeRecord } from '../store/records.js';
import type { StockInfo } from '../store/catalog.js';
import { searchBuffer, type SessionState } from '../session/state.js';
import { fmtNum, fmtPct } from '../utils/format.js';
import { split, type PanelNode, type PanelTree, type Point } from './panels.js';

export interface RenderSnapshot {
  readonly state: Readonly<SessionState>;
  readonly accounts: readonly AccountSummary[];
  readonly trades: readonly TradeRecord[];
  readonly catalog: readonly StockInfo[];
}

export const HELP_LINES = [
  'Instructions:',
  ' - Up/Down: Navigate ML stock list',
  ' - Enter (List mode): Preprocess & train on selected stock',
  ' - s: Activate search box',
  ' - In Search mode: Type ticker and press Enter to download data',
  ' - Esc (in Search mode): Cancel search',
  ' - h: Toggle instructions overlay',
  ' - q: Quit',
];

// Illustrative trend; not derived from the catalog
export const TREND_SERIES: Point[] = [
  [0, 100], [1, 102.5], [2, 105], [3, 103], [4, 107], [5, 106], [6, 110],
];

const ACCOUNT_COLUMNS = ['Name', 'Initial', 'Current', 'Change', '% Change'];
const ACCOUNT_WIDTHS = [10, 10, 10, 10, 10];

function trendChart(): PanelNode {
  const xs = TREND_SERIES.map(p => p[0]);
  const ys = TREND_SERIES.map(p => p[1]);
  return {
    kind: 'chart',
    title: 'Stock Chart',
    points: TREND_SERIES,
    xBounds: [Math.min(...xs) - 0.5, Math.max(...xs) + 0.5],
    yBounds: [Math.min(...ys) - 2, Math.max(...ys) + 2],
    color: 'green',
  };
}

export function tradeLine(t: TradeRecord): string {
  return `${t.name}  ${fmtNum(t.transaction)}  ${fmtNum(t.newBalance)}`;
}

export function accountRow(a: AccountSummary): string[] {
  return [a.name, fmtNum(a.initialAmount), fmtNum(a.currentAmount), fmtNum(a.change), fmtPct(a.percentageChange)];
}

export function catalogLine(s: StockInfo, selected: boolean): string {
  return `${selected ? '>' : ' '} ${s.ticker}  ${fmtNum(s.price)}  ${fmtNum(s.change)} (${fmtPct(s.pctChange)})`;
}

export function renderLayout({ state, accounts, trades, catalog }: RenderSnapshot): PanelTree {
  if (state.showHelp) return { kind: 'text', title: 'Instructions', lines: HELP_LINES };

  const top = split('horizontal', [
    [70, trendChart()],
    [30, { kind: 'text', title: 'Live Trades', lines: trades.map(tradeLine) }],
  ]);
  const middle: PanelNode = {
    kind: 'table',
    title: 'Account Summary',
    header: ACCOUNT_COLUMNS,
    widths: ACCOUNT_WIDTHS,
    rows: accounts.map(accountRow),
  };
  const bottom = split('horizontal', [
    [70, { kind: 'text', title: 'ML List', lines: catalog.map((s, i) => catalogLine(s, i === state.selected)) }],
    [30, { kind: 'text', title: 'Search', lines: [`Search Ticker: ${searchBuffer(state)}`, '', ...state.output.split('\n')] }],
  ]);
  return split('vertical', [[50, top], [30, middle], [20, bottom]], 1);
}
