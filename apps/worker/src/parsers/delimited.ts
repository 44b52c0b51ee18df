export interface DelimitedTable {
  header: string[];
  rows: string[][];
}

/**
 * Splits a header-first text table. Quoted fields are not supported; the
 * household and grid exports never quote numeric columns.
 */
export function parseDelimited(text: string, delimiter: string): DelimitedTable {
  const lines = text.replace(/^\uFEFF/, "").split(/\r?\n/);
  const headerLine = lines.find((line) => line.trim().length > 0);
  if (headerLine === undefined) {
    return { header: [], rows: [] };
  }

  const headerIndex = lines.indexOf(headerLine);
  const header = headerLine.split(delimiter).map((cell) => cell.trim());
  const rows: string[][] = [];
  for (let index = headerIndex + 1; index < lines.length; index += 1) {
    const line = lines[index];
    if (!line.trim()) {
      continue;
    }
    rows.push(line.split(delimiter).map((cell) => cell.trim()));
  }
  return { header, rows };
}

/** `?`, empty and non-numeric cells read as missing. */
export function parseNumericCell(value: string | undefined, missingMarkers: string[] = ["?", "NA", "nan"]): number | null {
  if (value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  if (!trimmed.length || missingMarkers.includes(trimmed)) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

export function columnIndex(header: string[], name: string): number {
  const target = name.toLowerCase();
  return header.findIndex((cell) => cell.toLowerCase() === target);
}
