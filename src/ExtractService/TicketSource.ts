import type { JsonObject } from './Table';

/** Ticket brut tel que renvoyé par la source (clé unique + champs imbriqués). */
export type Ticket = JsonObject & { key: string };

export interface SearchPage {
  total: number;
  issues: Ticket[];
}

export interface CustomFieldEntry {
  id: string;
  name: string;
}

/**
 * Source de tickets paginée.
 * Toute erreur (serveur injoignable, identifiants, requête rejetée) est fatale.
 */
export interface TicketSource {
  query(query: string, fields: readonly string[], limit: number, offset: number): Promise<SearchPage>;
  getCustomFields(): Promise<CustomFieldEntry[]>;
}
