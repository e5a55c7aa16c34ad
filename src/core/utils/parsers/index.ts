import { FileParsingError, errorMessage } from '../../errors';
import { parseJSON } from './jsonParser';
import { parseCSV } from './csvParser';

type ParserFn = (raw: string) => unknown;

const parsers: Record<string, ParserFn> = {
  '.json': parseJSON,
  '.csv': parseCSV,
};

export function isParsable(extension: string): boolean {
  return extension.toLowerCase() in parsers;
}

/**
 * Parse le contenu selon l'extension ; une extension inconnue retourne le texte brut.
 * @throws FileParsingError si le contenu ne correspond pas au format annoncé
 */
export function parseContent(extension: string, raw: string): unknown {
  const ext = extension.toLowerCase();
  const parser = parsers[ext];
  if (!parser) return raw;

  try {
    return parser(raw);
  } catch (error) {
    throw new FileParsingError(ext, errorMessage(error), error);
  }
}
