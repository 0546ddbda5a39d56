import type { ActorType, HistoryEvent, Ticket } from "@shared/schema";
import type { IStorage } from "../storage";
import { TicketError } from "./errors";

export type HistoryActor = HistoryEvent["actor"];

export const SYSTEM_ACTOR: HistoryActor = { id: null, name: "System", type: "system" };

export type HistoryAction =
  | "ticket_created"
  | "roles_assigned"
  | "description_updated"
  | "priority_changed"
  | "ticket_submitted"
  | "workflow_rebuilt"
  | "department_started"
  | "department_done"
  | "department_rejected"
  | "department_skipped"
  | "ticket_archived"
  | "ticket_rejected"
  | "external_linked"
  | "external_resolved";

function timeOf(event: HistoryEvent): number {
  const time = Date.parse(event.timestamp);
  return Number.isNaN(time) ? 0 : time;
}

/**
 * Per-ticket audit trail. Events are only ever appended; `list` sorts by
 * timestamp and keeps append order for equal timestamps.
 */
export class HistoryLog {
  constructor(
    private readonly storage: IStorage,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** Appends to a ticket draft already held under `mutateTicket`. */
  record(draft: Ticket, actor: HistoryActor, action: HistoryAction | string, details: Record<string, unknown> = {}): HistoryEvent {
    const event: HistoryEvent = {
      timestamp: this.now().toISOString(),
      actor: { ...actor },
      action,
      details,
    };
    draft.history = [...draft.history, event];
    return event;
  }

  async append(
    ticketId: number,
    actorId: string | null,
    actorName: string,
    actorType: ActorType,
    action: HistoryAction | string,
    details: Record<string, unknown> = {},
  ): Promise<HistoryEvent> {
    return this.storage.mutateTicket(ticketId, (draft) =>
      this.record(draft, { id: actorId, name: actorName, type: actorType }, action, details),
    );
  }

  async list(ticketId: number): Promise<HistoryEvent[]> {
    const ticket = await this.storage.getTicket(ticketId);
    if (!ticket) throw TicketError.notFound("Ticket", ticketId);
    return sortHistory(ticket.history);
  }
}

export function sortHistory(events: readonly HistoryEvent[]): HistoryEvent[] {
  return [...events].sort((a, b) => timeOf(a) - timeOf(b));
}
