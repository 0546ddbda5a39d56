import {
  ROLE_KINDS,
  TERMINAL_STATUSES,
  TICKET_PRIORITIES,
  TICKET_TYPE_LABELS,
  isTicketType,
  type Actor,
  type AssignmentSnapshot,
  type DepartmentActionStatus,
  type HistoryEvent,
  type RoleBinding,
  type RoleKind,
  type Ticket,
  type TicketPriority,
  type TicketStatus,
} from "@shared/schema";
import { parseDescription, withTracking } from "@shared/descriptions";
import type { IStorage, TicketFilter } from "../storage";
import { TicketError } from "./errors";
import { SYSTEM_ACTOR, type HistoryActor, type HistoryLog } from "./history";
import { log } from "./logger";
import type { OverviewGroup } from "./overview-group";
import type { PermissionStore } from "./permissions";
import {
  applyDepartmentStatus,
  canArchiveWorkflow,
  hasRequiredRejection,
  isDepartmentActionStatus,
  requireDepartment,
  resetDoneDepartments,
  type WorkflowEngine,
} from "./workflow-engine";

/** Role holder once a ticket is with the departments rather than an individual. */
export const PENDING_DEPARTMENT: RoleBinding = { userId: "pending-department", userName: "Pending department" };

export interface CreateTicketInput {
  ticketType: string;
  description: string;
  assignee?: RoleBinding | null;
  accountable?: RoleBinding | null;
  supervisor?: RoleBinding | null;
  priority?: TicketPriority;
}

export type RoleChanges = Partial<Record<RoleKind, RoleBinding | null>>;

export type ExternalOutcome = "approved" | "rejected";

export interface ExternalResolution {
  externalTicketId: number;
  outcome: ExternalOutcome;
  comment?: string;
  /** Shipment tracking reported by the helpdesk, stored in the description. */
  tracking?: string;
}

export interface LifecycleDeps {
  storage: IStorage;
  permissions: PermissionStore;
  engine: WorkflowEngine;
  history: HistoryLog;
  overview: OverviewGroup;
  now?: () => Date;
}

const ROLE_COLUMNS = {
  assignee: { id: "assigneeId", name: "assigneeName" },
  accountable: { id: "accountableId", name: "accountableName" },
  supervisor: { id: "supervisorId", name: "supervisorName" },
} as const satisfies Record<RoleKind, { id: keyof Ticket; name: keyof Ticket }>;

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** `<type label> – <owner> – YYYY-MM-DD HH:mm`, in UTC. */
export function formatTicketTitle(label: string, ownerName: string, at: Date): string {
  const date = `${at.getUTCFullYear()}-${pad(at.getUTCMonth() + 1)}-${pad(at.getUTCDate())}`;
  const time = `${pad(at.getUTCHours())}:${pad(at.getUTCMinutes())}`;
  return `${label} – ${ownerName} – ${date} ${time}`;
}

export function isTerminal(status: TicketStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function isTicketPriority(value: unknown): value is TicketPriority {
  return typeof value === "string" && TICKET_PRIORITIES.some((priority) => priority === value);
}

function hasIdentity(binding: RoleBinding | null | undefined): binding is RoleBinding {
  return !!binding && binding.userId.trim().length > 0 && binding.userName.trim().length > 0;
}

function roleOf(ticket: Ticket, role: RoleKind): RoleBinding | null {
  const columns = ROLE_COLUMNS[role];
  const userId = ticket[columns.id];
  const userName = ticket[columns.name];
  return userId && userName ? { userId, userName } : null;
}

function setRole(draft: Ticket, role: RoleKind, binding: RoleBinding | null) {
  switch (role) {
    case "assignee":
      draft.assigneeId = binding?.userId ?? null;
      draft.assigneeName = binding?.userName ?? null;
      break;
    case "accountable":
      draft.accountableId = binding?.userId ?? null;
      draft.accountableName = binding?.userName ?? null;
      break;
    case "supervisor":
      draft.supervisorId = binding?.userId ?? null;
      draft.supervisorName = binding?.userName ?? null;
      break;
  }
}

function userActor(actor: Actor): HistoryActor {
  return { id: actor.id, name: actor.name, type: "user" };
}

/**
 * The ticket state machine: in_progress -> in_request -> archived | rejected.
 * A rejected ticket may still be archived by an admin. Each transition
 * appends one history event, inside the same locked mutation as the change.
 */
export class TicketLifecycle {
  private readonly storage: IStorage;
  private readonly permissions: PermissionStore;
  private readonly engine: WorkflowEngine;
  private readonly history: HistoryLog;
  private readonly overview: OverviewGroup;
  private readonly now: () => Date;

  constructor(deps: LifecycleDeps) {
    this.storage = deps.storage;
    this.permissions = deps.permissions;
    this.engine = deps.engine;
    this.history = deps.history;
    this.overview = deps.overview;
    this.now = deps.now ?? (() => new Date());
  }

  // ==================== CREATION ====================

  async create(actor: Actor, input: CreateTicketInput): Promise<Ticket> {
    const { ticketType } = input;
    if (!isTicketType(ticketType)) {
      throw new TicketError("InvalidTicketType", `Unknown ticket type: ${ticketType}`, { ticketType });
    }

    if (!(await this.permissions.isAuthorized(ticketType, actor.id))) {
      throw TicketError.forbidden(`Not permitted to create ${ticketType} tickets`, { ticketType });
    }

    if (!hasIdentity(input.assignee)) throw TicketError.invalidPayload("Assignee is required");
    if (!hasIdentity(input.supervisor)) throw TicketError.invalidPayload("Supervisor is required");
    const accountable = hasIdentity(input.accountable) ? input.accountable : null;

    const parsed = parseDescription(ticketType, input.description);
    if (!parsed.success) {
      throw TicketError.invalidPayload(parsed.reason, { ticketType });
    }

    const createdAt = this.now();
    const timestamp = createdAt.toISOString();
    const assignmentHistory: AssignmentSnapshot[] = [];
    const roles: Array<[RoleKind, RoleBinding | null]> = [
      ["assignee", input.assignee],
      ["accountable", accountable],
      ["supervisor", input.supervisor],
    ];
    for (const [role, binding] of roles) {
      if (binding) {
        assignmentHistory.push({ role, userId: binding.userId, userName: binding.userName, actorId: actor.id, timestamp });
      }
    }

    const created: HistoryEvent = {
      timestamp,
      actor: userActor(actor),
      action: "ticket_created",
      details: { ticketType },
    };

    const ticket = await this.storage.createTicket({
      title: formatTicketTitle(TICKET_TYPE_LABELS[ticketType], actor.name, createdAt),
      ticketType,
      description: input.description,
      ownerId: actor.id,
      ownerName: actor.name,
      status: "in_progress",
      priority: input.priority ?? "medium",
      assigneeId: input.assignee.userId,
      assigneeName: input.assignee.userName,
      accountableId: accountable?.userId ?? null,
      accountableName: accountable?.userName ?? null,
      supervisorId: input.supervisor.userId,
      supervisorName: input.supervisor.userName,
      assignmentHistory,
      history: [created],
      createdAt,
      updatedAt: createdAt,
    });

    log(`Ticket #${ticket.id} (${ticketType}) created by ${actor.name}`, "workflow");
    return ticket;
  }

  // ==================== EDITS ====================

  async assignRoles(actor: Actor, ticketId: number, changes: RoleChanges): Promise<Ticket> {
    return this.mutate(ticketId, (draft) => {
      this.requireEditor(actor, draft);
      if (draft.status !== "in_progress") {
        throw TicketError.invalidTransition("Roles can only be reassigned while the ticket is in progress", { status: draft.status });
      }

      const timestamp = this.now().toISOString();
      const applied: Array<{ role: RoleKind; userId: string | null; userName: string | null }> = [];

      for (const role of ROLE_KINDS) {
        if (!(role in changes)) continue;
        const next = changes[role] ?? null;
        if (role !== "accountable" && !hasIdentity(next)) {
          throw TicketError.invalidPayload(`${role} cannot be cleared`, { role });
        }
        const binding = hasIdentity(next) ? next : null;
        const current = roleOf(draft, role);
        if (current?.userId === binding?.userId && current?.userName === binding?.userName) continue;

        setRole(draft, role, binding);
        applied.push({ role, userId: binding?.userId ?? null, userName: binding?.userName ?? null });
        if (binding) {
          draft.assignmentHistory = [
            ...draft.assignmentHistory,
            { role, userId: binding.userId, userName: binding.userName, actorId: actor.id, timestamp },
          ];
        }
      }

      if (applied.length > 0) {
        this.history.record(draft, userActor(actor), "roles_assigned", { changes: applied });
      }
    });
  }

  async updateDescription(actor: Actor, ticketId: number, description: string): Promise<Ticket> {
    return this.mutate(ticketId, (draft) => {
      this.requireEditor(actor, draft);
      if (isTerminal(draft.status)) {
        throw TicketError.invalidTransition(`Ticket is ${draft.status}`, { status: draft.status });
      }

      const parsed = parseDescription(draft.ticketType, description);
      if (!parsed.success) {
        throw TicketError.invalidPayload(parsed.reason, { ticketType: draft.ticketType });
      }
      if (draft.description === description) return;

      draft.description = description;
      // Department approvals were given against the previous text
      const reopened = draft.status === "in_request" ? resetDoneDepartments(draft) : [];
      this.history.record(draft, userActor(actor), "description_updated", { reopenedDepartments: reopened });
    });
  }

  async setPriority(actor: Actor, ticketId: number, value: string): Promise<Ticket> {
    if (!isTicketPriority(value)) {
      throw TicketError.invalidPayload(`Invalid priority '${value}'`, { priority: value });
    }
    const priority: TicketPriority = value;

    return this.mutate(ticketId, (draft) => {
      this.requireEditor(actor, draft);
      if (draft.status === "archived") {
        throw TicketError.invalidTransition("Ticket is archived", { status: draft.status });
      }
      if (draft.priority === priority) return;

      const previous = draft.priority;
      draft.priority = priority;
      this.history.record(draft, userActor(actor), "priority_changed", { from: previous, to: priority });
    });
  }

  // ==================== SUBMISSION ====================

  /**
   * Hands the ticket to its departments. The workflow is planned before the
   * ticket is locked; if no department resolves, nothing is written.
   */
  async submit(actor: Actor, ticketId: number, value?: string): Promise<Ticket> {
    if (value !== undefined && !isTicketPriority(value)) {
      throw TicketError.invalidPayload(`Invalid priority '${value}'`, { priority: value });
    }
    const priority: TicketPriority | undefined = value;

    const ticket = await this.requireTicket(ticketId);
    this.requireEditor(actor, ticket);
    if (ticket.status !== "in_progress") {
      throw TicketError.invalidTransition(`Only in-progress tickets can be submitted (ticket is ${ticket.status})`, {
        status: ticket.status,
      });
    }

    const parsed = parseDescription(ticket.ticketType, ticket.description);
    if (!parsed.success) {
      throw TicketError.invalidPayload(parsed.reason, { ticketType: ticket.ticketType });
    }

    const workflow = await this.engine.plan(ticket);

    const submitted = await this.mutate(ticketId, (draft) => {
      if (draft.status !== "in_progress" || draft.description !== ticket.description) {
        throw TicketError.invalidTransition("Ticket changed while it was being submitted", { status: draft.status });
      }

      if (priority !== undefined) draft.priority = priority;
      draft.workflowState = workflow;
      draft.status = "in_request";

      const timestamp = this.now().toISOString();
      for (const role of ROLE_KINDS) {
        setRole(draft, role, PENDING_DEPARTMENT);
        draft.assignmentHistory = [
          ...draft.assignmentHistory,
          { role, userId: PENDING_DEPARTMENT.userId, userName: PENDING_DEPARTMENT.userName, actorId: actor.id, timestamp },
        ];
      }

      this.history.record(draft, userActor(actor), "ticket_submitted", {
        priority: draft.priority,
        departments: Object.keys(workflow.departments),
      });
    });

    log(`Ticket #${ticketId} submitted to ${Object.keys(workflow.departments).length} departments`, "workflow");
    return submitted;
  }

  /** Admin reset of the department map while the ticket is with the departments. */
  async rebuildWorkflow(actor: Actor, ticketId: number): Promise<Ticket> {
    this.requireAdmin(actor);

    const ticket = await this.requireTicket(ticketId);
    if (ticket.status !== "in_request") {
      throw TicketError.invalidTransition("Workflow can only be rebuilt while the ticket is in request", { status: ticket.status });
    }

    const workflow = await this.engine.plan(ticket);

    return this.mutate(ticketId, (draft) => {
      if (draft.status !== "in_request") {
        throw TicketError.invalidTransition("Ticket changed while the workflow was rebuilt", { status: draft.status });
      }
      draft.workflowState = workflow;
      this.history.record(draft, userActor(actor), "workflow_rebuilt", { departments: Object.keys(workflow.departments) });
    });
  }

  // ==================== DEPARTMENT ACTIONS ====================

  async startDepartmentWork(actor: Actor, ticketId: number, departmentId: string): Promise<Ticket> {
    const ticket = await this.requireTicket(ticketId);
    requireDepartment(ticket, departmentId);
    await this.requireMember(actor, departmentId);

    return this.mutate(ticketId, (draft) => {
      this.requireInRequest(draft);
      const entry = requireDepartment(draft, departmentId);
      if (entry.status === "in_progress") return;
      if (entry.status !== "open") {
        throw TicketError.invalidTransition(`Department is already ${entry.status}`, { departmentId, status: entry.status });
      }

      applyDepartmentStatus(draft, departmentId, "in_progress");
      this.history.record(draft, userActor(actor), "department_started", { departmentId, departmentName: entry.name });
    });
  }

  /**
   * Records a department's decision. A rejection by a required department
   * rejects the ticket; the last required approval archives it. Both follow-ups
   * are recorded as system events.
   */
  async departmentComplete(actor: Actor, ticketId: number, departmentId: string, status: string): Promise<Ticket> {
    if (!isDepartmentActionStatus(status)) {
      throw TicketError.invalidPayload(`Invalid department status '${status}'`, { status });
    }
    const action: DepartmentActionStatus = status;

    const ticket = await this.requireTicket(ticketId);
    requireDepartment(ticket, departmentId);
    await this.requireMember(actor, departmentId);

    const result = await this.mutate(ticketId, (draft) => {
      this.requireInRequest(draft);
      const entry = requireDepartment(draft, departmentId);
      if (entry.status === action) return;
      if (entry.status !== "open" && entry.status !== "in_progress") {
        throw TicketError.invalidTransition(`Department is already ${entry.status}`, { departmentId, status: entry.status });
      }

      applyDepartmentStatus(draft, departmentId, action);
      this.history.record(draft, userActor(actor), `department_${action}`, {
        departmentId,
        departmentName: entry.name,
      });

      const workflow = draft.workflowState;
      if (!workflow) return;
      if (hasRequiredRejection(workflow)) {
        draft.status = "rejected";
        this.history.record(draft, SYSTEM_ACTOR, "ticket_rejected", { reason: "department_rejected", departmentId });
      } else if (canArchiveWorkflow(workflow)) {
        draft.status = "archived";
        this.history.record(draft, SYSTEM_ACTOR, "ticket_archived", { reason: "all_departments_done" });
      }
    });

    if (isTerminal(result.status) && result.status !== ticket.status) {
      log(`Ticket #${ticketId} ${result.status} after department ${departmentId} marked ${action}`, "workflow");
    }
    return result;
  }

  // ==================== MANUAL CLOSURE ====================

  async reject(actor: Actor, ticketId: number, reason?: string): Promise<Ticket> {
    this.requireAdmin(actor);
    return this.mutate(ticketId, (draft) => {
      if (draft.status === "rejected") return;
      if (draft.status === "archived") {
        throw TicketError.invalidTransition("Archived tickets cannot be rejected", { status: draft.status });
      }
      draft.status = "rejected";
      this.history.record(draft, userActor(actor), "ticket_rejected", { reason: reason ?? null, manual: true });
    });
  }

  async archive(actor: Actor, ticketId: number): Promise<Ticket> {
    this.requireAdmin(actor);
    return this.mutate(ticketId, (draft) => {
      if (draft.status === "archived") return;
      const previous = draft.status;
      draft.status = "archived";
      this.history.record(draft, userActor(actor), "ticket_archived", { from: previous, manual: true });
    });
  }

  // ==================== EXTERNAL SYSTEM ====================

  async linkExternal(actor: Actor, ticketId: number, externalTicketId: number): Promise<Ticket> {
    if (!Number.isInteger(externalTicketId) || externalTicketId <= 0) {
      throw TicketError.invalidPayload("External ticket id must be a positive integer", { externalTicketId });
    }

    return this.mutate(ticketId, (draft) => {
      this.requireEditor(actor, draft);
      if (isTerminal(draft.status)) {
        throw TicketError.invalidTransition(`Ticket is ${draft.status}`, { status: draft.status });
      }
      if (draft.externalRef?.ninjaTicketId === externalTicketId) return;

      draft.externalRef = { ninjaTicketId: externalTicketId, syncedAt: null };
      this.history.record(draft, userActor(actor), "external_linked", { externalTicketId });
    });
  }

  /**
   * Folds a terminal outcome from the external system into the ticket.
   * Returns false without writing when the ticket is already terminal.
   */
  async applyExternalResolution(ticketId: number, resolution: ExternalResolution): Promise<boolean> {
    return this.storage.mutateTicket(ticketId, (draft) => {
      if (isTerminal(draft.status)) return false;

      draft.status = resolution.outcome === "approved" ? "archived" : "rejected";
      if (resolution.comment) draft.comment = resolution.comment;
      if (resolution.tracking) draft.description = withTracking(draft.description, resolution.tracking);
      draft.externalRef = { ninjaTicketId: resolution.externalTicketId, syncedAt: this.now().toISOString() };
      this.history.record(draft, SYSTEM_ACTOR, "external_resolved", {
        externalTicketId: resolution.externalTicketId,
        outcome: resolution.outcome,
        comment: resolution.comment ?? null,
        tracking: resolution.tracking ?? null,
      });
      return true;
    });
  }

  /**
   * Marks a linked ticket whose external counterpart closed without a readable
   * outcome. Returns true only the first time, so callers can report it once.
   */
  async noteUnresolvedExternal(ticketId: number, externalTicketId: number): Promise<boolean> {
    return this.storage.mutateTicket(ticketId, (draft) => {
      if (isTerminal(draft.status) || draft.externalRef?.unresolvedAt) return false;

      const timestamp = this.now().toISOString();
      draft.externalRef = { ninjaTicketId: externalTicketId, syncedAt: timestamp, unresolvedAt: timestamp };
      this.history.record(draft, SYSTEM_ACTOR, "external_outcome_missing", { externalTicketId });
      return true;
    });
  }

  // ==================== READS ====================

  async get(actor: Actor, ticketId: number): Promise<Ticket> {
    const ticket = await this.requireTicket(ticketId);
    await this.requireViewer(actor, ticket);
    return ticket;
  }

  async listHistory(actor: Actor, ticketId: number): Promise<HistoryEvent[]> {
    await this.get(actor, ticketId);
    return this.history.list(ticketId);
  }

  /** Admins and the overview group see every ticket; everyone else the tickets they own or hold a role on. */
  async list(actor: Actor, filter: TicketFilter = {}): Promise<Ticket[]> {
    if (await this.seesAllTickets(actor)) {
      return this.storage.getTickets(filter);
    }
    return this.storage.getTickets({ ...filter, involvingUserId: actor.id });
  }

  canEdit(actor: Actor, ticket: Ticket): boolean {
    if (actor.isAdmin || ticket.ownerId === actor.id) return true;
    return ROLE_KINDS.some((role) => roleOf(ticket, role)?.userId === actor.id);
  }

  /** Editors, the overview group, and members of any department in the ticket's workflow. */
  async canView(actor: Actor, ticket: Ticket): Promise<boolean> {
    if (this.canEdit(actor, ticket)) return true;
    if (await this.overview.isMember(actor.id)) return true;

    const workflowDepartments = Object.keys(ticket.workflowState?.departments ?? {});
    if (workflowDepartments.length === 0) return false;
    const memberOf = await this.storage.getDepartmentIdsForUser(actor.id);
    return workflowDepartments.some((id) => memberOf.includes(id));
  }

  // ==================== GUARDS ====================

  private async mutate(ticketId: number, fn: (draft: Ticket) => void): Promise<Ticket> {
    await this.storage.mutateTicket(ticketId, fn);
    return this.requireTicket(ticketId);
  }

  private async seesAllTickets(actor: Actor): Promise<boolean> {
    return actor.isAdmin || this.overview.isMember(actor.id);
  }

  private async requireViewer(actor: Actor, ticket: Ticket) {
    if (!(await this.canView(actor, ticket))) {
      throw TicketError.forbidden(`Not permitted to view ticket ${ticket.id}`, { ticketId: ticket.id });
    }
  }

  private async requireTicket(ticketId: number): Promise<Ticket> {
    const ticket = await this.storage.getTicket(ticketId);
    if (!ticket) throw TicketError.notFound("Ticket", ticketId);
    return ticket;
  }

  private requireEditor(actor: Actor, ticket: Ticket) {
    if (!this.canEdit(actor, ticket)) {
      throw TicketError.forbidden(`Not permitted to modify ticket ${ticket.id}`, { ticketId: ticket.id });
    }
  }

  private requireAdmin(actor: Actor) {
    if (!actor.isAdmin) {
      throw TicketError.forbidden("Admin access required");
    }
  }

  private async requireMember(actor: Actor, departmentId: string) {
    if (!(await this.engine.isMember(departmentId, actor.id))) {
      throw TicketError.forbidden(`Not a member of department ${departmentId}`, { departmentId });
    }
  }

  private requireInRequest(ticket: Ticket) {
    if (ticket.status !== "in_request") {
      throw TicketError.invalidTransition(`Ticket is ${ticket.status}, not in request`, { status: ticket.status });
    }
  }
}
