import type { z } from 'zod';

import { SourceError } from '../core/errors';
import type { ApiServiceManager } from '../core/utils/ApiServiceManager';
import type { CustomFieldEntry, SearchPage, TicketSource } from '../ExtractService/TicketSource';
import { jiraFieldSchema, jiraSearchPageSchema } from './jiraApiInterfaces/JiraSearchPage';
import type { GetFieldsQueryParams, SearchIssuesQueryParams } from './jiraApiInterfaces/QueryParams';

// Noms des opérations attendues dans la bibliothèque d'API
const OPS = {
  searchIssues: 'searchIssues',
  getFields: 'getFields',
} as const;

/**
 * Source de tickets adossée à l'API REST Jira (recherche JQL + liste des champs).
 * Les réponses sont validées ; une réponse inattendue est une erreur source.
 */
export class JiraTicketSource implements TicketSource {
  constructor(
    private readonly api: ApiServiceManager,
    private readonly vendor: string = 'Atlassian',
  ) {}

  private decode<S extends z.ZodTypeAny>(schema: S, payload: unknown, op: string): z.output<S> {
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .slice(0, 5)
        .map((i) => `${i.path.join('.')}: ${i.message}`)
        .join('; ');
      throw new SourceError(0, `${op}: réponse inattendue (${issues})`, parsed.error);
    }
    return parsed.data;
  }

  /**
   * Recherche JQL paginée (offset-based).
   * `limit = 0` ne renvoie que le total.
   */
  public async query(query: string, fields: readonly string[], limit: number, offset: number): Promise<SearchPage> {
    const params: SearchIssuesQueryParams = {
      jql: query,
      fields,
      startAt: offset,
      maxResults: limit,
    };
    const payload = await this.api.getData(this.vendor, OPS.searchIssues, params);
    const page = this.decode(jiraSearchPageSchema, payload, OPS.searchIssues);
    return { total: page.total, issues: page.issues };
  }

  /**
   * Liste des champs personnalisés de l'instance (id -> nom).
   */
  public async getCustomFields(): Promise<CustomFieldEntry[]> {
    const params: GetFieldsQueryParams = {};
    const payload = await this.api.getData(this.vendor, OPS.getFields, params);
    const fields = this.decode(jiraFieldSchema.array(), payload, OPS.getFields);
    return fields.filter((f) => f.custom).map((f) => ({ id: f.id, name: f.name }));
  }
}
