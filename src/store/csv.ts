// Minimal CSV support for the flat files the dashboard reads and the simulation writes.
// Comma separated, optional double quotes ("" inside quotes is a literal quote).

export type CsvRow = { line: number; cells: string[] };

export function splitCsvLine(line: string): string[] {
  const cells: string[] = [];
  let cur = '';
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') { cur += '"'; i++; }
      else if (ch === '"') quoted = false;
      else cur += ch;
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      cells.push(cur); cur = '';
    } else {
      cur += ch;
    }
  }
  cells.push(cur);
  return cells;
}

/** Non-blank lines split into cells; `line` is 1-based in the source text. */
export function parseCsv(text: string): CsvRow[] {
  const rows: CsvRow[] = [];
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    if (lines[i].trim() === '') continue;
    rows.push({ line: i + 1, cells: splitCsvLine(lines[i]) });
  }
  return rows;
}

function quoteCell(v: string): string {
  return /[",\r\n]/.test(v) ? `"${v.replace(/"/g, '""')}"` : v;
}

export function formatCsv(header: string[], rows: Array<Array<string | number>>): string {
  const out = [header.map(quoteCell).join(',')];
  for (const r of rows) out.push(r.map(c => quoteCell(String(c))).join(','));
  return out.join('\n') + '\n';
}

/** Strict decimal parse: rejects blanks and anything Number() would coerce loosely. */
export function parseDecimal(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  if (!/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/.test(raw)) return null;
  const n = Number(raw);
  return Number.isFinite(n) ? n : null;
}
