import * as path from 'path';
import { z } from 'zod';

import { ConfigurationError } from '../core/errors';
import { COLUMN_TYPES, type ColumnType } from '../core/persistence/TableSink';
import { isValidTableName } from '../core/persistence/sqlDialect';
import { FileLoader } from '../core/utils/FileLoader';
import { DEFAULT_BATCH_SIZE } from '../ExtractService/Loader';
import { DEFAULT_PAGE_SIZE } from '../ExtractService/Pager';
import type { Projection } from '../ExtractService/Projector';
import type { ExpansionRule } from '../ExtractService/Flattener';

// Cellule CSV vide => valeur absente
const blank = (v: unknown): unknown => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const columnSchema = z.object({
  path: z.string().min(1),
  label: z.preprocess(blank, z.string().min(1).optional()),
  type: z.preprocess(blank, z.enum(COLUMN_TYPES).optional()),
});

const expansionSchema = z.object({
  column: z.string().min(1),
  keep: z.array(z.string().min(1)).min(1),
  dropOriginal: z.boolean().default(true),
});

const profileSchema = z
  .object({
    query: z.string().min(1),
    fields: z.array(z.string().min(1)).min(1),
    pageSize: z.number().int().positive().default(DEFAULT_PAGE_SIZE),
    expansions: z.array(expansionSchema).default([]),
    columns: z.array(columnSchema).min(1).optional(),
    columnsFile: z.string().min(1).optional(),
    destination: z.object({
      table: z.string().refine(isValidTableName, 'nom de table invalide'),
      batchSize: z.number().int().positive().default(DEFAULT_BATCH_SIZE),
    }),
  })
  .refine((p) => (p.columns === undefined) !== (p.columnsFile === undefined), {
    message: 'définir soit columns, soit columnsFile',
    path: ['columns'],
  });

const columnsFileRef = z.object({ columnsFile: z.string().min(1).optional() });

export type ColumnEntry = z.infer<typeof columnSchema>;

/** Description complète d'une extraction, colonnes résolues. */
export interface ExtractProfile {
  query: string;
  fields: string[];
  pageSize: number;
  expansions: ExpansionRule[];
  columns: ColumnEntry[];
  destination: {
    table: string;
    batchSize: number;
  };
}

function describe(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(racine)'}: ${i.message}`).join('; ');
}

/** Chemin d'un fichier voisin du profil (même dossier local ou même préfixe S3). */
export function besideProfile(profilePath: string, file: string): string {
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(file) || path.isAbsolute(file)) return file;
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(profilePath)) {
    return profilePath.slice(0, profilePath.lastIndexOf('/') + 1) + file;
  }
  return path.join(path.dirname(profilePath), file);
}

/**
 * Valide un profil déjà décodé. Les colonnes externes (`columnsFile`) sont
 * fournies par l'appelant.
 * @throws ConfigurationError
 */
export function parseProfile(raw: unknown, source = 'profil', externalColumns?: unknown): ExtractProfile {
  const parsed = profileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`${source} invalide: ${describe(parsed.error)}`);
  }
  const { columnsFile, columns: inline, ...profile } = parsed.data;

  let columns = inline;
  if (!columns) {
    const fromFile = z.array(columnSchema).min(1).safeParse(externalColumns);
    if (!fromFile.success) {
      throw new ConfigurationError(`${columnsFile ?? 'columnsFile'} invalide: ${describe(fromFile.error)}`);
    }
    columns = fromFile.data;
  }

  return { ...profile, columns };
}

/**
 * Charge le profil d'extraction (JSON) et, le cas échéant, son fichier de colonnes (CSV).
 * @param profilePath chemin local ou s3://
 */
export async function loadProfile(profilePath: string, loader: FileLoader = FileLoader.getInstance()): Promise<ExtractProfile> {
  const meta = await loader.load(profilePath);
  const ref = columnsFileRef.safeParse(meta.content);

  let externalColumns: unknown;
  if (ref.success && ref.data.columnsFile) {
    const columnsMeta = await loader.load(besideProfile(profilePath, ref.data.columnsFile));
    externalColumns = columnsMeta.content;
  }
  return parseProfile(meta.content, profilePath, externalColumns);
}

/** Nom de sortie d'une colonne : son libellé, sinon son chemin. */
export function outputName(column: ColumnEntry): string {
  return column.label ?? column.path;
}

export function toProjection(profile: ExtractProfile): Projection {
  const rename: Record<string, string> = {};
  for (const column of profile.columns) {
    if (column.label !== undefined && column.label !== column.path) {
      rename[column.path] = column.label;
    }
  }
  return { select: profile.columns.map((c) => c.path), rename };
}

/** Types SQL imposés, par nom de colonne de sortie. */
export function columnTypes(profile: ExtractProfile): Record<string, ColumnType> {
  const types: Record<string, ColumnType> = {};
  for (const column of profile.columns) {
    if (column.type) types[outputName(column)] = column.type;
  }
  return types;
}
