import { ExpansionError, TableShapeError, errorMessage } from '../core/errors';
import { type Logger, consoleLogger } from '../core/utils/Logger';
import { type Column, type ColumnPath, type JsonObject, type JsonValue, Table, classify, isJsonObject, parsePath, pathToString } from './Table';

/** Une expansion de colonne imbriquée, telle que décrite dans le profil d'extraction. */
export interface ExpansionRule {
  column: string;
  keep: readonly string[];
  dropOriginal?: boolean;
}

export interface DegradedField {
  field: string;
  error: ExpansionError;
}

/** Champ dont certaines séquences ne sont pas triées par date de fin de cycle. */
export interface UnorderedField {
  field: string;
  rows: number;
}

export interface ExpansionResult {
  table: Table;
  degraded: DegradedField[];
  unordered: UnorderedField[];
}

const STOP_TIME: ColumnPath = ['stopTime', 'epochMillis'];

// Parcours en profondeur : objets => segments, tableaux et scalaires => feuilles.
function* leaves(record: JsonObject, prefix: ColumnPath): Generator<[ColumnPath, JsonValue]> {
  for (const [key, value] of Object.entries(record)) {
    const path = [...prefix, key];
    if (isJsonObject(value)) {
      if (Object.keys(value).length === 0) {
        yield [path, null];
      } else {
        yield* leaves(value, path);
      }
    } else {
      yield [path, value];
    }
  }
}

/**
 * Aplatissement de premier niveau d'une liste d'enregistrements JSON.
 * L'ordre des colonnes suit leur première apparition ; une colonne absente d'un
 * enregistrement vaut `null` pour cette ligne.
 */
export function normalize(records: readonly JsonObject[]): Table {
  const columns = new Map<string, { path: ColumnPath; values: JsonValue[] }>();

  records.forEach((record, rowIndex) => {
    for (const [path, value] of leaves(record, [])) {
      const name = pathToString(path);
      let column = columns.get(name);
      if (!column) {
        column = { path, values: new Array<JsonValue>(records.length).fill(null) };
        columns.set(name, column);
      } else if (column.path.length !== path.length || column.path.some((segment, i) => segment !== path[i])) {
        throw new TableShapeError(`Deux chemins distincts produisent la colonne '${name}'`);
      }
      column.values[rowIndex] = value;
    }
  });

  return new Table([...columns.values()], records.length);
}

function valueAt(source: JsonObject, path: ColumnPath): JsonValue {
  let current: JsonValue = source;
  for (const segment of path) {
    if (!isJsonObject(current)) return null;
    const next: JsonValue | undefined = current[segment];
    if (next === undefined) return null;
    current = next;
  }
  return current;
}

// Dernière entrée d'une séquence non vide ; toute autre forme => aucune entrée.
function lastEntry(value: JsonValue | undefined): JsonObject | undefined {
  const cell = classify(value);
  switch (cell.kind) {
    case 'array': {
      const last = cell.value.at(-1);
      return isJsonObject(last) ? last : undefined;
    }
    case 'null':
    case 'scalar':
    case 'object':
      return undefined;
  }
}

/**
 * Expanse une colonne contenant une séquence d'objets en colonnes scalaires.
 *
 * Pour chaque ligne, seule la dernière entrée de la séquence est retenue (la plus
 * récente, la source ordonnant les cycles chronologiquement). Une cellule vide,
 * absente ou qui n'est pas une séquence donne `null` pour chaque sous-champ.
 * Les nouvelles colonnes sont nommées `colonne.sousChamp` et ajoutées en fin de
 * table ; le nombre de lignes est inchangé.
 *
 * @throws ExpansionError si la colonne est absente ou si un nom de colonne entre en collision
 */
export function expand(table: Table, nestedFieldPath: string, fieldsToKeep: readonly string[], dropOriginal = true): Table {
  const source = table.column(nestedFieldPath);
  if (!source) {
    throw new ExpansionError(nestedFieldPath, 'colonne absente de la table');
  }

  const subPaths = fieldsToKeep.map(parsePath);
  const buffers: JsonValue[][] = subPaths.map(() => []);

  for (const cell of source.values) {
    const entry = lastEntry(cell);
    subPaths.forEach((subPath, i) => {
      buffers[i].push(entry ? valueAt(entry, subPath) : null);
    });
  }

  const added: Column[] = subPaths.map((subPath, i) => ({
    path: [...source.path, ...subPath],
    values: buffers[i],
  }));

  try {
    const base = dropOriginal ? table.without(nestedFieldPath) : table;
    return base.withAppended(added);
  } catch (err) {
    if (err instanceof TableShapeError) {
      throw new ExpansionError(nestedFieldPath, err.message, err);
    }
    throw err;
  }
}

/**
 * Nombre de cellules dont les entrées portent des `stopTime.epochMillis` décroissants.
 * Les entrées sans date de fin ne sont pas comparées.
 */
export function countUnorderedRows(values: readonly JsonValue[]): number {
  let count = 0;
  for (const value of values) {
    const cell = classify(value);
    if (cell.kind !== 'array') continue;
    const stops = cell.value
      .map((entry) => (isJsonObject(entry) ? valueAt(entry, STOP_TIME) : null))
      .filter((t): t is number => typeof t === 'number');
    if (stops.some((t, i) => i > 0 && t < stops[i - 1])) count++;
  }
  return count;
}

/**
 * Applique chaque expansion indépendamment.
 * Une ExpansionError est journalisée et collectée ; le pipeline continue sans ce champ.
 * Les séquences non triées chronologiquement sont signalées : la dernière entrée
 * retenue n'y est pas forcément la plus récente.
 */
export function expandAll(table: Table, expansions: readonly ExpansionRule[], logger: Logger = consoleLogger): ExpansionResult {
  const degraded: DegradedField[] = [];
  const unordered: UnorderedField[] = [];
  let current = table;

  for (const rule of expansions) {
    logger('info', `Expansion de ${rule.column}...`);
    const source = current.column(rule.column);
    try {
      current = expand(current, rule.column, rule.keep, rule.dropOriginal ?? true);
    } catch (err) {
      if (!(err instanceof ExpansionError)) throw err;
      logger('warn', `Erreur: ${errorMessage(err)}`, { field: rule.column });
      degraded.push({ field: rule.column, error: err });
      continue;
    }

    const rows = source ? countUnorderedRows(source.values) : 0;
    if (rows > 0) {
      logger('warn', `${rule.column}: ${rows} ligne(s) aux cycles non triés par stopTime, la dernière entrée n'est peut-être pas la plus récente`, {
        field: rule.column,
        rows,
      });
      unordered.push({ field: rule.column, rows });
    }
  }

  return { table: current, degraded, unordered };
}
