import { ConfigurationError } from '../core/errors';
import { type Logger, consoleLogger, formatElapsed } from '../core/utils/Logger';
import type { Ticket, TicketSource } from './TicketSource';

export const DEFAULT_PAGE_SIZE = 1000;

/**
 * Récupère tous les tickets d'une requête, page par page, dans l'ordre de la source.
 *
 * Une première requête à taille nulle donne le total ; on enchaîne ensuite
 * `ceil(total / pageSize)` requêtes séquentielles aux offsets `i * pageSize`.
 * Une erreur de la source interrompt la collecte (pas de résultat partiel).
 */
export async function collate(source: TicketSource, query: string, fields: readonly string[], pageSize: number = DEFAULT_PAGE_SIZE, logger: Logger = consoleLogger): Promise<Ticket[]> {
  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new ConfigurationError(`Taille de page invalide: ${pageSize}`);
  }

  const started = Date.now();
  logger('info', 'Interrogation de Jira...');

  const { total } = await source.query(query, [], 0, 0);
  logger('info', `La requête '${query}' renvoie ${total} tickets`);

  const totalPages = Math.ceil(total / pageSize);
  const tickets: Ticket[] = [];

  for (let page = 0; page < totalPages; page++) {
    logger('info', `Page ${page + 1} sur ${totalPages}`);
    const result = await source.query(query, fields, pageSize, page * pageSize);
    tickets.push(...result.issues);
  }

  if (tickets.length !== total) {
    logger('warn', `${tickets.length} tickets reçus pour un total annoncé de ${total}`);
  }
  logger('info', `Temps écoulé ${formatElapsed(Date.now() - started)}`);

  return tickets;
}
