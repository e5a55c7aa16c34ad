import type { ColumnDefinition, ColumnType, ReplaceTableRequest } from './TableSink';

const TABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export type Dialect = 'sqlite' | 'postgres';

const TYPE_MAP: Record<Dialect, Record<ColumnType, string>> = {
  sqlite: {
    Text: 'TEXT',
    DateTime: 'DATETIME',
    Boolean: 'BOOLEAN',
    BigInteger: 'BIGINT',
    Integer: 'INTEGER',
    Float: 'FLOAT',
  },
  postgres: {
    Text: 'TEXT',
    DateTime: 'TIMESTAMPTZ',
    Boolean: 'BOOLEAN',
    BigInteger: 'BIGINT',
    Integer: 'INTEGER',
    Float: 'DOUBLE PRECISION',
  },
};

export function isValidTableName(name: string): boolean {
  return TABLE_NAME.test(name);
}

/** Identifiant entre guillemets doubles (les noms de colonnes contiennent espaces et points). */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function createTableSql(dialect: Dialect, table: string, columns: readonly ColumnDefinition[]): string {
  const defs = columns.map((c) => `  ${quoteIdentifier(c.name)} ${TYPE_MAP[dialect][c.type]}`).join(',\n');
  return `CREATE TABLE ${quoteIdentifier(table)} (\n${defs}\n)`;
}

export function createIndexSql(table: string, column: string): string {
  return `CREATE INDEX ${quoteIdentifier(`ix_${table}_${column}`)} ON ${quoteIdentifier(table)} (${quoteIdentifier(column)})`;
}

/**
 * INSERT multi-lignes paramétré.
 * sqlite: `?` ; postgres: `$1, $2, ...`
 */
export function insertSql(dialect: Dialect, table: string, columns: readonly ColumnDefinition[], rowCount: number): string {
  const names = columns.map((c) => quoteIdentifier(c.name)).join(', ');
  const tuples: string[] = [];
  for (let r = 0; r < rowCount; r++) {
    const placeholders = columns.map((_, c) => (dialect === 'sqlite' ? '?' : `$${r * columns.length + c + 1}`));
    tuples.push(`(${placeholders.join(', ')})`);
  }
  return `INSERT INTO ${quoteIdentifier(table)} (${names}) VALUES ${tuples.join(', ')}`;
}

/**
 * Nombre de lignes par INSERT : `batchSize`, borné par la limite de paramètres du moteur.
 */
export function rowsPerStatement(batchSize: number, columnCount: number, maxParameters: number): number {
  const byParameters = Math.floor(maxParameters / Math.max(1, columnCount));
  return Math.max(1, Math.min(batchSize, byParameters));
}

export function* batches<T>(rows: readonly T[], size: number): Generator<readonly T[]> {
  for (let start = 0; start < rows.length; start += size) {
    yield rows.slice(start, start + size);
  }
}

/** Problèmes bloquants d'une requête de remplacement, indépendants du moteur. */
export function validateRequest(request: ReplaceTableRequest): string | undefined {
  if (!isValidTableName(request.table)) return `nom de table invalide`;
  if (request.columns.length === 0) return 'aucune colonne';
  if (!Number.isInteger(request.batchSize) || request.batchSize <= 0) return `taille de lot invalide: ${request.batchSize}`;
  const seen = new Set<string>();
  for (const column of request.columns) {
    if (seen.has(column.name)) return `colonne '${column.name}' en double`;
    seen.add(column.name);
  }
  const width = request.columns.length;
  const bad = request.rows.findIndex((row) => row.length !== width);
  if (bad >= 0) return `la ligne ${bad} contient ${request.rows[bad].length} valeurs pour ${width} colonnes`;
  return undefined;
}
