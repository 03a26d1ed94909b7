/**
 * Parser for the USGS RDB format: tab-separated text with `#` comment lines,
 * a header line, and a field-format line (`5s`, `15s`, `16N`, ...) before the data.
 */

export type RdbRecord = Record<string, string>;

const FORMAT_CELL = /^\d+[sdnN]$/;

function isFormatLine(cells: string[]): boolean {
  return cells.length > 0 && cells.every((cell) => FORMAT_CELL.test(cell.trim()));
}

export function parseRdb(text: string): RdbRecord[] {
  const lines = text
    .split(/\r?\n/)
    .filter((line) => line.trim() !== '' && !line.startsWith('#'));

  if (lines.length === 0) return [];

  const header = lines[0].split('\t').map((h) => h.trim());
  let start = 1;
  if (lines.length > 1 && isFormatLine(lines[1].split('\t'))) {
    start = 2;
  }

  const records: RdbRecord[] = [];
  for (const line of lines.slice(start)) {
    const cells = line.split('\t');
    const record: RdbRecord = {};
    header.forEach((name, i) => {
      record[name] = (cells[i] ?? '').trim();
    });
    records.push(record);
  }
  return records;
}
