import type { QueryParams } from '../../core/utils/ApiServiceManager';

/**
 * Paramètres de requête pour la recherche JQL (offset-based).
 */
export interface SearchIssuesQueryParams extends QueryParams {
  jql: string;
  fields?: readonly string[];
  startAt: number;
  maxResults: number;
}

/** Paramètres pour l'endpoint getFields. */
export interface GetFieldsQueryParams extends QueryParams {}
