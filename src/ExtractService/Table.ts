import { TableShapeError } from '../core/errors';

export type Scalar = string | number | boolean;
export type JsonValue = Scalar | null | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Valeur d'une cellule, classée pour le pattern matching du Flattener.
 * Une valeur absente (`undefined`) est classée `null`.
 */
export type Cell =
  | { readonly kind: 'null' }
  | { readonly kind: 'scalar'; readonly value: Scalar }
  | { readonly kind: 'object'; readonly value: JsonObject }
  | { readonly kind: 'array'; readonly value: readonly JsonValue[] };

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function classify(value: JsonValue | undefined): Cell {
  if (value === undefined || value === null) return { kind: 'null' };
  if (Array.isArray(value)) return { kind: 'array', value };
  if (isJsonObject(value)) return { kind: 'object', value };
  return { kind: 'scalar', value };
}

/** Chemin de colonne sous forme de segments (ex. ['fields', 'customfield_10101', 'breached']). */
export type ColumnPath = readonly string[];

/** Forme sérialisée, utilisée uniquement aux frontières de la table. */
export function pathToString(path: ColumnPath): string {
  return path.join('.');
}

export function parsePath(dotted: string): ColumnPath {
  return dotted.split('.');
}

export interface Column {
  readonly path: ColumnPath;
  readonly values: readonly JsonValue[];
}

/**
 * Table en colonnes, alignée par position de ligne.
 * Invariants vérifiés à la construction :
 *  - chaque colonne contient exactement `rowCount` valeurs
 *  - les noms sérialisés sont uniques
 */
export class Table {
  private readonly byName: ReadonlyMap<string, Column>;

  constructor(
    readonly columns: readonly Column[],
    readonly rowCount: number,
  ) {
    const byName = new Map<string, Column>();
    for (const column of columns) {
      const name = pathToString(column.path);
      if (column.values.length !== rowCount) {
        throw new TableShapeError(`La colonne '${name}' contient ${column.values.length} valeurs pour ${rowCount} lignes`);
      }
      if (byName.has(name)) {
        throw new TableShapeError(`Colonne '${name}' en double`);
      }
      byName.set(name, column);
    }
    this.byName = byName;
  }

  public static empty(rowCount = 0): Table {
    return new Table([], rowCount);
  }

  public get names(): string[] {
    return this.columns.map((c) => pathToString(c.path));
  }

  public has(name: string): boolean {
    return this.byName.has(name);
  }

  public column(name: string): Column | undefined {
    return this.byName.get(name);
  }

  /** Ajoute des colonnes en fin de table (même nombre de lignes). */
  public withAppended(columns: readonly Column[]): Table {
    return new Table([...this.columns, ...columns], this.rowCount);
  }

  public without(name: string): Table {
    return new Table(
      this.columns.filter((c) => pathToString(c.path) !== name),
      this.rowCount,
    );
  }

  /** Renomme chaque colonne ; les valeurs ne bougent pas. */
  public renamed(rename: (path: ColumnPath) => ColumnPath): Table {
    return new Table(
      this.columns.map((c) => ({ path: rename(c.path), values: c.values })),
      this.rowCount,
    );
  }

  public row(index: number): JsonValue[] {
    return this.columns.map((c) => c.values[index] ?? null);
  }

  public *rows(): Generator<JsonValue[]> {
    for (let i = 0; i < this.rowCount; i++) {
      yield this.row(i);
    }
  }
}
