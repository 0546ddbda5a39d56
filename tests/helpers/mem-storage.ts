import {
  TERMINAL_STATUSES,
  type Department,
  type InsertDepartment,
  type InsertTicket,
  type InsertUser,
  type Ticket,
  type TicketPermission,
  type TicketType,
  type User,
} from "@shared/schema";
import type { IStorage, PermissionEntry, TicketFilter, TicketMutation } from "../../server/storage";
import { TicketError } from "../../server/lib/errors";
import { cloneTicket, diffTicket } from "../../server/lib/ticket-draft";

function involves(ticket: Ticket, userId: string): boolean {
  return [ticket.ownerId, ticket.assigneeId, ticket.accountableId, ticket.supervisorId].includes(userId);
}

/**
 * In-process IStorage. Mutations on the same ticket run one after another,
 * like the row lock DatabaseStorage takes.
 */
export class MemStorage implements IStorage {
  readonly users = new Map<string, User>();
  readonly departments = new Map<string, Department>();
  readonly members: Array<{ departmentId: string; userId: string }> = [];
  readonly permissions = new Map<TicketType, TicketPermission>();
  readonly tickets = new Map<number, Ticket>();
  readonly overviewMembers = new Set<string>();

  /** Number of ticket rows written by mutateTicket. */
  ticketWrites = 0;

  private nextId = 1;
  private nextTicketId = 1;
  private readonly locks = new Map<number, Promise<void>>();

  // Users
  async getUser(id: string): Promise<User | undefined> {
    return this.users.get(id);
  }

  async getUserByEmail(email: string): Promise<User | undefined> {
    return Array.from(this.users.values()).find((u) => u.email === email);
  }

  async createUser(user: InsertUser): Promise<User> {
    const created: User = {
      id: `user-${this.nextId++}`,
      email: user.email,
      name: user.name,
      isActive: user.isActive ?? true,
      isAdmin: user.isAdmin ?? false,
      createdAt: new Date(),
    };
    this.users.set(created.id, created);
    return created;
  }

  // Departments
  async getDepartment(id: string): Promise<Department | undefined> {
    return this.departments.get(id);
  }

  async getAllDepartments(): Promise<Department[]> {
    return Array.from(this.departments.values()).sort((a, b) => a.name.localeCompare(b.name));
  }

  async createDepartment(department: InsertDepartment): Promise<Department> {
    const created: Department = { id: `dept-${this.nextId++}`, name: department.name, createdAt: new Date() };
    this.departments.set(created.id, created);
    return created;
  }

  async getDepartmentMemberIds(departmentId: string): Promise<string[]> {
    return this.members.filter((m) => m.departmentId === departmentId).map((m) => m.userId);
  }

  async getDepartmentIdsForUser(userId: string): Promise<string[]> {
    return this.members.filter((m) => m.userId === userId).map((m) => m.departmentId);
  }

  async addDepartmentMember(departmentId: string, userId: string): Promise<void> {
    if (!this.members.some((m) => m.departmentId === departmentId && m.userId === userId)) {
      this.members.push({ departmentId, userId });
    }
  }

  async removeDepartmentMember(departmentId: string, userId: string): Promise<boolean> {
    const index = this.members.findIndex((m) => m.departmentId === departmentId && m.userId === userId);
    if (index < 0) return false;
    this.members.splice(index, 1);
    return true;
  }

  // Ticket permissions
  async getTicketPermissions(): Promise<TicketPermission[]> {
    return Array.from(this.permissions.values()).map((p) => ({ ...p, userIds: [...p.userIds] }));
  }

  async ensureTicketPermissionEntries(types: readonly TicketType[]): Promise<TicketType[]> {
    const created: TicketType[] = [];
    for (const ticketType of types) {
      if (this.permissions.has(ticketType)) continue;
      this.permissions.set(ticketType, { ticketType, userIds: [], updatedAt: new Date() });
      created.push(ticketType);
    }
    return created;
  }

  async replaceTicketPermissionUsers(entries: PermissionEntry[]): Promise<void> {
    for (const entry of entries) {
      this.permissions.set(entry.ticketType, { ticketType: entry.ticketType, userIds: [...entry.userIds], updatedAt: new Date() });
    }
  }

  async addTicketPermissionUser(ticketType: TicketType, userId: string): Promise<void> {
    const entry = this.permissions.get(ticketType);
    if (!entry) {
      this.permissions.set(ticketType, { ticketType, userIds: [userId], updatedAt: new Date() });
      return;
    }
    if (!entry.userIds.includes(userId)) {
      entry.userIds = [...entry.userIds, userId];
      entry.updatedAt = new Date();
    }
  }

  async removeTicketPermissionUser(ticketType: TicketType, userId: string): Promise<void> {
    const entry = this.permissions.get(ticketType);
    if (entry && entry.userIds.includes(userId)) {
      entry.userIds = entry.userIds.filter((id) => id !== userId);
      entry.updatedAt = new Date();
    }
  }

  // Ticket overview group
  async getOverviewMemberIds(): Promise<string[]> {
    return Array.from(this.overviewMembers).sort();
  }

  async isOverviewMember(userId: string): Promise<boolean> {
    return this.overviewMembers.has(userId);
  }

  async addOverviewMember(userId: string): Promise<boolean> {
    if (this.overviewMembers.has(userId)) return false;
    this.overviewMembers.add(userId);
    return true;
  }

  async removeOverviewMember(userId: string): Promise<boolean> {
    return this.overviewMembers.delete(userId);
  }

  async replaceOverviewMembers(userIds: string[]): Promise<void> {
    this.overviewMembers.clear();
    for (const userId of userIds) this.overviewMembers.add(userId);
  }

  // Tickets
  async createTicket(data: InsertTicket): Promise<Ticket> {
    const now = new Date();
    const ticket: Ticket = {
      id: data.id ?? this.nextTicketId++,
      title: data.title,
      ticketType: data.ticketType,
      description: data.description,
      ownerId: data.ownerId,
      ownerName: data.ownerName,
      comment: data.comment ?? "",
      status: data.status ?? "in_progress",
      priority: data.priority ?? "medium",
      assigneeId: data.assigneeId ?? null,
      assigneeName: data.assigneeName ?? null,
      accountableId: data.accountableId ?? null,
      accountableName: data.accountableName ?? null,
      supervisorId: data.supervisorId ?? null,
      supervisorName: data.supervisorName ?? null,
      assignmentHistory: data.assignmentHistory ?? [],
      workflowState: data.workflowState ?? null,
      history: data.history ?? [],
      externalRef: data.externalRef ?? null,
      version: data.version ?? 1,
      createdAt: data.createdAt ?? now,
      updatedAt: data.updatedAt ?? now,
    };
    this.tickets.set(ticket.id, cloneTicket(ticket));
    return ticket;
  }

  async getTicket(id: number): Promise<Ticket | undefined> {
    const ticket = this.tickets.get(id);
    return ticket ? cloneTicket(ticket) : undefined;
  }

  async getTickets(filter: TicketFilter = {}): Promise<Ticket[]> {
    return Array.from(this.tickets.values())
      .filter((t) => !filter.status || t.status === filter.status)
      .filter((t) => !filter.ticketType || t.ticketType === filter.ticketType)
      .filter((t) => !filter.ownerId || t.ownerId === filter.ownerId)
      .filter((t) => !filter.involvingUserId || involves(t, filter.involvingUserId))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
      .map(cloneTicket);
  }

  async getExternallyLinkedOpenTickets(): Promise<Ticket[]> {
    return Array.from(this.tickets.values())
      .filter((t) => t.externalRef !== null && !TERMINAL_STATUSES.includes(t.status))
      .sort((a, b) => a.id - b.id)
      .map(cloneTicket);
  }

  mutateTicket<T>(id: number, mutate: TicketMutation<T>): Promise<T> {
    const previous = this.locks.get(id) ?? Promise.resolve();
    const run = previous.then(() => this.applyMutation(id, mutate));
    this.locks.set(
      id,
      run.then(
        () => undefined,
        () => undefined,
      ),
    );
    return run;
  }

  private async applyMutation<T>(id: number, mutate: TicketMutation<T>): Promise<T> {
    const current = this.tickets.get(id);
    if (!current) throw TicketError.notFound("Ticket", id);

    const draft = cloneTicket(current);
    const result = await mutate(draft);
    const changes = diffTicket(current, draft);
    if (changes) {
      this.tickets.set(id, { ...current, ...changes, version: current.version + 1, updatedAt: new Date() });
      this.ticketWrites++;
    }
    return result;
  }
}
