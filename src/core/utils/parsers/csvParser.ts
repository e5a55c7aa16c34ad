import { parse } from 'csv-parse/sync';

/** Un objet par ligne, indexé par les noms de la ligne d'en-tête. */
export function parseCSV(raw: string): unknown {
  const records: unknown = parse(raw, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
  });
  return records;
}
