export type CsvValue = string | number | null | undefined;

const esc = (v: CsvValue): string => {
  const s = v === null || v === undefined ? '' : String(v);
  const needs = /[",\n\r]/.test(s);
  const t = s.replace(/"/g, '""');
  return needs ? `"${t}"` : t;
};

export function toCsv(rows: ReadonlyArray<Record<string, CsvValue>>, headers: readonly string[]): string {
  const lines: string[] = [];
  lines.push(headers.map(esc).join(','));
  for (const r of rows) lines.push(headers.map((h) => esc(r[h])).join(','));
  return lines.join('\r\n');
}

/** Splits CSV text into rows of raw fields. Quoted fields may span lines. */
export function parseCsv(text: string): string[][] {
  const src = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;
  let i = 0;

  const endField = () => { row.push(field); field = ''; };
  const endRow = () => {
    endField();
    // skip blank lines
    if (row.length > 1 || row[0] !== '') rows.push(row);
    row = [];
  };

  while (i < src.length) {
    const c = src[i];
    if (quoted) {
      if (c === '"') {
        if (src[i + 1] === '"') { field += '"'; i += 2; continue; }
        quoted = false; i++; continue;
      }
      field += c; i++; continue;
    }
    if (c === '"' && field === '') { quoted = true; i++; continue; }
    if (c === ',') { endField(); i++; continue; }
    if (c === '\r') { endRow(); i += src[i + 1] === '\n' ? 2 : 1; continue; }
    if (c === '\n') { endRow(); i++; continue; }
    field += c; i++;
  }
  if (quoted) throw new SyntaxError('unterminated quoted field');
  if (field !== '' || row.length) endRow();
  return rows;
}

/** Parses CSV with a header row into one record per data row. */
export function readTable(text: string, expected: readonly string[]): Record<string, string>[] {
  const [header, ...body] = parseCsv(text);
  if (!header) return [];
  const missing = expected.filter((h) => !header.includes(h));
  if (missing.length) throw new SyntaxError(`missing columns: ${missing.join(', ')}`);
  return body.map((cells, n) => {
    if (cells.length !== header.length) {
      throw new SyntaxError(`row ${n + 2} has ${cells.length} fields, expected ${header.length}`);
    }
    const rec: Record<string, string> = {};
    header.forEach((h, i) => { rec[h] = cells[i]; });
    return rec;
  });
}
