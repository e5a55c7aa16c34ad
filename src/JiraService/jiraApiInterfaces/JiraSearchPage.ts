import { z } from 'zod';
import type { JsonValue } from '../../ExtractService/Table';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)]),
);

/** Un ticket : clé unique + champs JSON arbitraires. */
export const jiraIssueSchema = z.object({ key: z.string().min(1) }).catchall(jsonValueSchema);

/**
 * Structure d'une page de résultat JIRA (pagination offset-based).
 */
export const jiraSearchPageSchema = z.object({
  startAt: z.number().int().optional(),
  maxResults: z.number().int().optional(),
  /** Nombre total de tickets correspondant à la requête */
  total: z.number().int().nonnegative(),
  issues: z.array(jiraIssueSchema).default([]),
});

/** Entrée de GET /rest/api/2/field */
export const jiraFieldSchema = z.object({
  id: z.string(),
  name: z.string(),
  custom: z.boolean().default(false),
});

export type JiraIssue = z.infer<typeof jiraIssueSchema>;
export type JiraSearchPage = z.infer<typeof jiraSearchPageSchema>;
export type JiraInstanceField = z.infer<typeof jiraFieldSchema>;
