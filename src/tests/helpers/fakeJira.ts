import type { CustomFieldEntry, Ticket } from '../../ExtractService/TicketSource';

function json(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' } });
}

/**
 * Réponses d'une instance Jira en mémoire pour `fetch` :
 * /rest/api/2/search (startAt / maxResults) et /rest/api/2/field.
 */
export function fakeJiraFetch(tickets: readonly Ticket[], customFields: readonly CustomFieldEntry[]) {
  return async (input: string | URL | Request): Promise<Response> => {
    const url = new URL(input instanceof Request ? input.url : input);
    if (url.pathname.endsWith('/rest/api/2/field')) {
      const fields = [{ id: 'summary', name: 'Summary', custom: false }, ...customFields.map((f) => ({ ...f, custom: true }))];
      return json(fields);
    }
    if (url.pathname.endsWith('/rest/api/2/search')) {
      const startAt = Number(url.searchParams.get('startAt') ?? 0);
      const maxResults = Number(url.searchParams.get('maxResults') ?? 50);
      return json({ startAt, maxResults, total: tickets.length, issues: tickets.slice(startAt, startAt + maxResults) });
    }
    return new Response('Not Found', { status: 404 });
  };
}

export const CUSTOM_FIELDS: CustomFieldEntry[] = [
  { id: 'customfield_10101', name: 'Time to resolution' },
  { id: 'customfield_12120', name: 'General Enquiry' },
];

function cycle(breached: boolean, millis: number) {
  return { breached, goalDuration: { millis }, elapsedTime: { millis: millis / 2 } };
}

/** Trois tickets : deux avec deux cycles SLA terminés, un sans cycle. */
export const THREE_TICKETS: Ticket[] = [
  {
    key: 'SD-1',
    fields: { summary: 'VPN', status: { name: 'Open' }, customfield_10101: { completedCycles: [cycle(false, 100), cycle(true, 200)] } },
  },
  {
    key: 'SD-2',
    fields: { summary: 'Imprimante', status: { name: 'Done' }, customfield_10101: { completedCycles: [] } },
  },
  {
    key: 'SD-3',
    fields: { summary: 'Badge', status: { name: 'Open' }, customfield_10101: { completedCycles: [cycle(true, 300), cycle(false, 400)] } },
  },
];
