/**
 * Taxonomie des erreurs de l'extraction.
 * Chaque erreur porte un `code` stable, utilisé par l'audit et par les tests.
 */
export class ExtractError extends Error {
  readonly code: string;

  constructor(message: string, code: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
  }
}

/** Serveur injoignable, identifiants refusés ou requête rejetée. Fatal. */
export class SourceError extends ExtractError {
  readonly statusCode: number;
  readonly responseBody: string;

  constructor(statusCode: number, responseBody: string, cause?: unknown) {
    super(`Erreur source (${statusCode}): ${responseBody}`, 'SOURCE_ERROR', cause);
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

/** Expansion impossible d'un champ imbriqué. Le pipeline continue sans ce champ. */
export class ExpansionError extends ExtractError {
  readonly field: string;

  constructor(field: string, message: string, cause?: unknown) {
    super(`Expansion de '${field}' impossible: ${message}`, 'EXPANSION_ERROR', cause);
    this.field = field;
  }
}

/** Configuration ou schéma incohérent avec les données. Fatal. */
export class ConfigurationError extends ExtractError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIGURATION_ERROR', cause);
  }
}

export class UnresolvedFieldError extends ConfigurationError {
  readonly fieldId: string;

  constructor(fieldId: string) {
    super(`Champ personnalisé '${fieldId}' absent de la table de correspondance`);
    this.fieldId = fieldId;
  }
}

export class MissingColumnError extends ConfigurationError {
  readonly column: string;

  constructor(column: string) {
    super(`Colonne '${column}' absente de la table`);
    this.column = column;
  }
}

/** Une opération aurait désaligné les lignes ou dupliqué une colonne. */
export class TableShapeError extends ExtractError {
  constructor(message: string) {
    super(message, 'TABLE_SHAPE_ERROR');
  }
}

/** Échec du chargement en base. La connexion est tout de même libérée. */
export class SinkError extends ExtractError {
  readonly table: string;

  constructor(table: string, message: string, cause?: unknown) {
    super(`Chargement de '${table}' impossible: ${message}`, 'SINK_ERROR', cause);
    this.table = table;
  }
}

export class FileParsingError extends ExtractError {
  readonly extension: string;

  constructor(extension: string, message: string, cause?: unknown) {
    super(`Parsing ${extension} impossible: ${message}`, 'FILE_PARSING_ERROR', cause);
    this.extension = extension;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
