import type { JsonValue } from '../../ExtractService/Table';
import type { CustomFieldEntry, Ticket } from '../../ExtractService/TicketSource';

/** Correspondance des champs personnalisés demandés par le profil livré (config/). */
export const SERVICE_DESK_FIELDS: CustomFieldEntry[] = [
  { id: 'customfield_10101', name: 'Time to resolution' },
  { id: 'customfield_10102', name: 'Time to first response' },
  { id: 'customfield_10420', name: 'First Line Fix' },
  { id: 'customfield_12120', name: 'General Enquiry' },
  { id: 'customfield_12985', name: 'Tribe/Squad' },
  { id: 'customfield_13030', name: 'First Assignee' },
  { id: 'customfield_13031', name: 'Reason for Pending' },
];

function sla(breached: boolean, goal: number): JsonValue {
  return {
    completedCycles: [{ breached, goalDuration: { millis: goal }, elapsedTime: { millis: goal / 4 } }],
    ongoingCycle: { breached: false },
  };
}

/**
 * Ticket complet tel que renvoyé par la recherche pour le profil livré.
 * `generalEnquiry` vaut null pour un ticket hors du SLA « General Enquiry ».
 */
export function serviceDeskTicket(key: string, generalEnquiry: JsonValue): Ticket {
  return {
    key,
    fields: {
      issuetype: { name: 'Incident' },
      status: { name: 'Open', statusCategory: { name: 'To Do' } },
      summary: `Ticket ${key}`,
      priority: { name: 'High' },
      reporter: { name: 'alice' },
      assignee: { name: 'bob' },
      created: '2024-05-01T08:00:00.000+0000',
      updated: '2024-05-02T08:00:00.000+0000',
      resolved: null,
      customfield_12985: { value: 'Platform', child: { value: 'Core' } },
      customfield_10101: sla(false, 3_600_000),
      customfield_10102: sla(true, 900_000),
      customfield_13030: { name: 'carol' },
      customfield_13031: [{ value: 'Awaiting customer' }],
      customfield_10420: { value: 'Yes' },
      customfield_12120: generalEnquiry,
    },
  };
}

export const GENERAL_ENQUIRY_SLA = sla(true, 7_200_000);
