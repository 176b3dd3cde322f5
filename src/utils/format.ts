// Shared lightweight formatting helpers
export function fmtNum(x: number, d = 2): string {
  return Number.isFinite(x) ? x.toFixed(d) : '—';
}
export function fmtPct(x: number, d = 2): string {
  return Number.isFinite(x) ? x.toFixed(d) + '%' : '—';
}
export function padCell(s: string, width: number): string {
  return s.length >= width ? s.slice(0, width) : s + ' '.repeat(width - s.length);
}
