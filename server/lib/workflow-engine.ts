import {
  DEPARTMENT_ACTION_STATUSES,
  type DepartmentActionStatus,
  type DepartmentEntry,
  type DepartmentStatus,
  type Ticket,
  type TicketPriority,
  type TicketStatus,
  type TicketType,
  type WorkflowState,
} from "@shared/schema";
import type { IStorage } from "../storage";
import { TicketError } from "./errors";
import type { WorkflowBuilder } from "./workflow-builder";

export interface DepartmentQueueTicket {
  id: number;
  title: string;
  ticketType: TicketType;
  status: TicketStatus;
  priority: TicketPriority;
  departmentStatus: DepartmentStatus;
  createdAt: Date;
}

export interface DepartmentQueue {
  departmentId: string;
  departmentName: string;
  tickets: DepartmentQueueTicket[];
}

export function isDepartmentActionStatus(value: unknown): value is DepartmentActionStatus {
  return typeof value === "string" && DEPARTMENT_ACTION_STATUSES.some((status) => status === value);
}

export function requireWorkflow(ticket: Ticket): WorkflowState {
  if (!ticket.workflowState) {
    throw new TicketError("WorkflowNotInitialized", `Workflow not initialized for ticket ${ticket.id}`, { ticketId: ticket.id });
  }
  return ticket.workflowState;
}

export function requireDepartment(ticket: Ticket, departmentId: string): DepartmentEntry {
  const entry = requireWorkflow(ticket).departments[departmentId];
  if (!entry) {
    throw new TicketError("UnknownDepartment", `Department ${departmentId} is not part of the workflow for ticket ${ticket.id}`, {
      ticketId: ticket.id,
      departmentId,
    });
  }
  return entry;
}

/** True iff every required department is done. Departments that are not required never block. */
export function canArchiveWorkflow(state: WorkflowState): boolean {
  return Object.values(state.departments).every((d) => !d.required || d.status === "done");
}

export function hasRequiredRejection(state: WorkflowState): boolean {
  return Object.values(state.departments).some((d) => d.required && d.status === "rejected");
}

/**
 * Sets one department's status on a draft. Returns false when the status was
 * already set, leaving the draft untouched.
 */
export function applyDepartmentStatus(draft: Ticket, departmentId: string, status: DepartmentStatus): boolean {
  const entry = requireDepartment(draft, departmentId);
  if (entry.status === status) return false;

  const state = requireWorkflow(draft);
  draft.workflowState = {
    ...state,
    departments: { ...state.departments, [departmentId]: { ...entry, status } },
  };
  return true;
}

/** Reverts every `done` department on the draft to `open`; returns the reverted ids. */
export function resetDoneDepartments(draft: Ticket): string[] {
  const state = draft.workflowState;
  if (!state) return [];

  const reverted = Object.entries(state.departments)
    .filter(([, entry]) => entry.status === "done")
    .map(([id]) => id);
  if (reverted.length === 0) return [];

  const departments: Record<string, DepartmentEntry> = {};
  for (const [id, entry] of Object.entries(state.departments)) {
    departments[id] = entry.status === "done" ? { ...entry, status: "open" } : entry;
  }
  draft.workflowState = { ...state, departments };
  return reverted;
}

/**
 * Owns the per-ticket department map. Department membership is read from
 * storage on every call; nothing about the registry is cached.
 */
export class WorkflowEngine {
  constructor(
    private readonly storage: IStorage,
    private readonly builder: WorkflowBuilder,
  ) {}

  /** Builds the workflow for a ticket against the current registry without persisting it. */
  async plan(ticket: Pick<Ticket, "id" | "ticketType" | "description">): Promise<WorkflowState> {
    const registry = await this.storage.getAllDepartments();
    const state = this.builder.build(ticket.ticketType, ticket.description, registry);
    if (Object.keys(state.departments).length === 0) {
      throw new TicketError("WorkflowBuildFailed", `No departments could be resolved for ticket ${ticket.id}`, {
        ticketId: ticket.id,
        ticketType: ticket.ticketType,
      });
    }
    return state;
  }

  /** Builds and stores a fresh workflow, replacing any existing one. */
  async initialize(ticketId: number): Promise<WorkflowState> {
    const ticket = await this.storage.getTicket(ticketId);
    if (!ticket) throw TicketError.notFound("Ticket", ticketId);

    const state = await this.plan(ticket);
    await this.storage.mutateTicket(ticketId, (draft) => {
      draft.workflowState = state;
    });
    return state;
  }

  async setDepartmentStatus(ticketId: number, departmentId: string, status: string): Promise<boolean> {
    if (!isDepartmentActionStatus(status)) {
      throw TicketError.invalidPayload(`Invalid department status '${status}'`, { status });
    }
    return this.storage.mutateTicket(ticketId, (draft) => applyDepartmentStatus(draft, departmentId, status));
  }

  async getDepartmentStatus(ticketId: number, departmentId: string): Promise<DepartmentStatus | null> {
    const ticket = await this.requireTicket(ticketId);
    return ticket.workflowState?.departments[departmentId]?.status ?? null;
  }

  async getAllDepartmentStatuses(ticketId: number): Promise<Record<string, DepartmentEntry>> {
    const ticket = await this.requireTicket(ticketId);
    return { ...(ticket.workflowState?.departments ?? {}) };
  }

  async canArchive(ticketId: number): Promise<boolean> {
    const ticket = await this.requireTicket(ticketId);
    return canArchiveWorkflow(requireWorkflow(ticket));
  }

  async resetOnDescriptionChange(ticketId: number): Promise<string[]> {
    return this.storage.mutateTicket(ticketId, (draft) => resetDoneDepartments(draft));
  }

  /** Departments of the ticket's workflow the user is currently a member of. */
  async departmentsForUser(ticketId: number, userId: string): Promise<Record<string, DepartmentEntry>> {
    const ticket = await this.requireTicket(ticketId);
    const memberOf = new Set(await this.storage.getDepartmentIdsForUser(userId));

    const result: Record<string, DepartmentEntry> = {};
    for (const [id, entry] of Object.entries(ticket.workflowState?.departments ?? {})) {
      if (memberOf.has(id)) result[id] = entry;
    }
    return result;
  }

  async isMember(departmentId: string, userId: string): Promise<boolean> {
    const members = await this.storage.getDepartmentMemberIds(departmentId);
    return members.includes(userId);
  }

  /** Tickets waiting on each department the user belongs to. Departments with nothing pending are omitted. */
  async departmentQueue(userId: string): Promise<DepartmentQueue[]> {
    const departmentIds = await this.storage.getDepartmentIdsForUser(userId);
    if (departmentIds.length === 0) return [];

    const pending = await this.storage.getTickets({ status: "in_request" });
    const queues: DepartmentQueue[] = [];

    for (const departmentId of departmentIds) {
      const tickets: DepartmentQueueTicket[] = [];
      let departmentName = "";

      for (const ticket of pending) {
        const entry = ticket.workflowState?.departments[departmentId];
        if (!entry || !entry.required) continue;
        if (entry.status !== "open" && entry.status !== "in_progress") continue;
        departmentName = entry.name;
        tickets.push({
          id: ticket.id,
          title: ticket.title,
          ticketType: ticket.ticketType,
          status: ticket.status,
          priority: ticket.priority,
          departmentStatus: entry.status,
          createdAt: ticket.createdAt,
        });
      }

      if (tickets.length > 0) {
        queues.push({ departmentId, departmentName, tickets });
      }
    }

    return queues;
  }

  private async requireTicket(ticketId: number): Promise<Ticket> {
    const ticket = await this.storage.getTicket(ticketId);
    if (!ticket) throw TicketError.notFound("Ticket", ticketId);
    return ticket;
  }
}
