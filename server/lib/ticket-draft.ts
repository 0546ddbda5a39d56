import type { Ticket } from "@shared/schema";

// Fields a mutation may change. Identity, ownership, type and timestamps are fixed.
const MUTABLE_FIELDS = [
  "title",
  "description",
  "comment",
  "status",
  "priority",
  "assigneeId",
  "assigneeName",
  "accountableId",
  "accountableName",
  "supervisorId",
  "supervisorName",
  "assignmentHistory",
  "workflowState",
  "history",
  "externalRef",
] as const satisfies ReadonlyArray<keyof Ticket>;

type MutableField = (typeof MUTABLE_FIELDS)[number];

export type TicketChanges = Partial<Pick<Ticket, MutableField>>;

function copyField<K extends MutableField>(target: TicketChanges, source: Ticket, key: K) {
  target[key] = source[key];
}

/**
 * Returns the mutable fields that differ between the stored row and the draft,
 * or null when the mutation left the ticket as it was.
 */
export function diffTicket(current: Ticket, draft: Ticket): TicketChanges | null {
  const changes: TicketChanges = {};
  let changed = false;

  for (const field of MUTABLE_FIELDS) {
    if (JSON.stringify(current[field]) !== JSON.stringify(draft[field])) {
      copyField(changes, draft, field);
      changed = true;
    }
  }

  return changed ? changes : null;
}

export function cloneTicket(ticket: Ticket): Ticket {
  return structuredClone(ticket);
}
