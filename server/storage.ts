import { eq, and, or, asc, desc, sql, notInArray, isNotNull, type SQL } from "drizzle-orm";
import type { Database } from "./db";
import {
  users,
  departments,
  departmentMembers,
  ticketPermissions,
  ticketOverviewMembers,
  tickets,
  TERMINAL_STATUSES,
  type User,
  type InsertUser,
  type Department,
  type InsertDepartment,
  type TicketPermission,
  type Ticket,
  type InsertTicket,
  type TicketStatus,
  type TicketType,
} from "@shared/schema";
import { TicketError } from "./lib/errors";
import { cloneTicket, diffTicket } from "./lib/ticket-draft";

export interface TicketFilter {
  status?: TicketStatus;
  ticketType?: TicketType;
  ownerId?: string;
  /** Owner or current holder of any role. */
  involvingUserId?: string;
}

export interface PermissionEntry {
  ticketType: TicketType;
  userIds: string[];
}

/**
 * A mutation receives a private copy of the stored ticket. Whatever it leaves
 * in the draft is written back in the same transaction; returning without
 * touching the draft writes nothing.
 */
export type TicketMutation<T> = (draft: Ticket) => T | Promise<T>;

export interface IStorage {
  // Users
  getUser(id: string): Promise<User | undefined>;
  getUserByEmail(email: string): Promise<User | undefined>;
  createUser(user: InsertUser): Promise<User>;

  // Departments
  getDepartment(id: string): Promise<Department | undefined>;
  getAllDepartments(): Promise<Department[]>;
  createDepartment(department: InsertDepartment): Promise<Department>;
  getDepartmentMemberIds(departmentId: string): Promise<string[]>;
  getDepartmentIdsForUser(userId: string): Promise<string[]>;
  addDepartmentMember(departmentId: string, userId: string): Promise<void>;
  removeDepartmentMember(departmentId: string, userId: string): Promise<boolean>;

  // Ticket permissions
  getTicketPermissions(): Promise<TicketPermission[]>;
  ensureTicketPermissionEntries(types: readonly TicketType[]): Promise<TicketType[]>;
  replaceTicketPermissionUsers(entries: PermissionEntry[]): Promise<void>;
  addTicketPermissionUser(ticketType: TicketType, userId: string): Promise<void>;
  removeTicketPermissionUser(ticketType: TicketType, userId: string): Promise<void>;

  // Ticket overview group
  getOverviewMemberIds(): Promise<string[]>;
  isOverviewMember(userId: string): Promise<boolean>;
  addOverviewMember(userId: string): Promise<boolean>;
  removeOverviewMember(userId: string): Promise<boolean>;
  replaceOverviewMembers(userIds: string[]): Promise<void>;

  // Tickets
  createTicket(ticket: InsertTicket): Promise<Ticket>;
  getTicket(id: number): Promise<Ticket | undefined>;
  getTickets(filter?: TicketFilter): Promise<Ticket[]>;
  getExternallyLinkedOpenTickets(): Promise<Ticket[]>;
  mutateTicket<T>(id: number, mutate: TicketMutation<T>): Promise<T>;
}

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: Database) {}

  // Users
  async getUser(id: string): Promise<User | undefined> {
    const [user] = await this.db.select().from(users).where(eq(users.id, id));
    return user;
  }

  async getUserByEmail(email: string): Promise<User | undefined> {
    const [user] = await this.db.select().from(users).where(eq(users.email, email));
    return user;
  }

  async createUser(user: InsertUser): Promise<User> {
    const [created] = await this.db.insert(users).values(user).returning();
    return created;
  }

  // Departments
  async getDepartment(id: string): Promise<Department | undefined> {
    const [department] = await this.db.select().from(departments).where(eq(departments.id, id));
    return department;
  }

  async getAllDepartments(): Promise<Department[]> {
    return this.db.select().from(departments).orderBy(asc(departments.name));
  }

  async createDepartment(department: InsertDepartment): Promise<Department> {
    const [created] = await this.db.insert(departments).values(department).returning();
    return created;
  }

  async getDepartmentMemberIds(departmentId: string): Promise<string[]> {
    const rows = await this.db
      .select({ userId: departmentMembers.userId })
      .from(departmentMembers)
      .where(eq(departmentMembers.departmentId, departmentId));
    return rows.map((r) => r.userId);
  }

  async getDepartmentIdsForUser(userId: string): Promise<string[]> {
    const rows = await this.db
      .select({ departmentId: departmentMembers.departmentId })
      .from(departmentMembers)
      .where(eq(departmentMembers.userId, userId));
    return rows.map((r) => r.departmentId);
  }

  async addDepartmentMember(departmentId: string, userId: string): Promise<void> {
    await this.db.insert(departmentMembers).values({ departmentId, userId }).onConflictDoNothing();
  }

  async removeDepartmentMember(departmentId: string, userId: string): Promise<boolean> {
    const result = await this.db
      .delete(departmentMembers)
      .where(and(eq(departmentMembers.departmentId, departmentId), eq(departmentMembers.userId, userId)))
      .returning();
    return result.length > 0;
  }

  // Ticket permissions
  async getTicketPermissions(): Promise<TicketPermission[]> {
    return this.db.select().from(ticketPermissions);
  }

  async ensureTicketPermissionEntries(types: readonly TicketType[]): Promise<TicketType[]> {
    if (types.length === 0) return [];
    const created = await this.db
      .insert(ticketPermissions)
      .values(types.map((ticketType) => ({ ticketType, userIds: [] })))
      .onConflictDoNothing()
      .returning({ ticketType: ticketPermissions.ticketType });
    return created.map((r) => r.ticketType);
  }

  async replaceTicketPermissionUsers(entries: PermissionEntry[]): Promise<void> {
    await this.db.transaction(async (tx) => {
      for (const entry of entries) {
        await tx
          .insert(ticketPermissions)
          .values({ ticketType: entry.ticketType, userIds: entry.userIds })
          .onConflictDoUpdate({
            target: ticketPermissions.ticketType,
            set: { userIds: entry.userIds, updatedAt: new Date() },
          });
      }
    });
  }

  async addTicketPermissionUser(ticketType: TicketType, userId: string): Promise<void> {
    await this.db
      .insert(ticketPermissions)
      .values({ ticketType, userIds: [userId] })
      .onConflictDoUpdate({
        target: ticketPermissions.ticketType,
        set: {
          userIds: sql`array_append(${ticketPermissions.userIds}, ${userId})`,
          updatedAt: new Date(),
        },
        setWhere: sql`NOT (${userId} = ANY(${ticketPermissions.userIds}))`,
      });
  }

  async removeTicketPermissionUser(ticketType: TicketType, userId: string): Promise<void> {
    await this.db
      .update(ticketPermissions)
      .set({
        userIds: sql`array_remove(${ticketPermissions.userIds}, ${userId})`,
        updatedAt: new Date(),
      })
      .where(and(
        eq(ticketPermissions.ticketType, ticketType),
        sql`${userId} = ANY(${ticketPermissions.userIds})`,
      ));
  }

  // Ticket overview group
  async getOverviewMemberIds(): Promise<string[]> {
    const rows = await this.db
      .select({ userId: ticketOverviewMembers.userId })
      .from(ticketOverviewMembers)
      .orderBy(asc(ticketOverviewMembers.userId));
    return rows.map((r) => r.userId);
  }

  async isOverviewMember(userId: string): Promise<boolean> {
    const [row] = await this.db
      .select({ userId: ticketOverviewMembers.userId })
      .from(ticketOverviewMembers)
      .where(eq(ticketOverviewMembers.userId, userId));
    return row !== undefined;
  }

  async addOverviewMember(userId: string): Promise<boolean> {
    const inserted = await this.db.insert(ticketOverviewMembers).values({ userId }).onConflictDoNothing().returning();
    return inserted.length > 0;
  }

  async removeOverviewMember(userId: string): Promise<boolean> {
    const result = await this.db.delete(ticketOverviewMembers).where(eq(ticketOverviewMembers.userId, userId)).returning();
    return result.length > 0;
  }

  async replaceOverviewMembers(userIds: string[]): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx.delete(ticketOverviewMembers);
      if (userIds.length > 0) {
        await tx.insert(ticketOverviewMembers).values(userIds.map((userId) => ({ userId })));
      }
    });
  }

  // Tickets
  async createTicket(ticket: InsertTicket): Promise<Ticket> {
    const [created] = await this.db.insert(tickets).values(ticket).returning();
    return created;
  }

  async getTicket(id: number): Promise<Ticket | undefined> {
    const [ticket] = await this.db.select().from(tickets).where(eq(tickets.id, id));
    return ticket;
  }

  async getTickets(filter: TicketFilter = {}): Promise<Ticket[]> {
    const conditions: SQL[] = [];
    if (filter.status) conditions.push(eq(tickets.status, filter.status));
    if (filter.ticketType) conditions.push(eq(tickets.ticketType, filter.ticketType));
    if (filter.ownerId) conditions.push(eq(tickets.ownerId, filter.ownerId));
    if (filter.involvingUserId) {
      const involving = or(
        eq(tickets.ownerId, filter.involvingUserId),
        eq(tickets.assigneeId, filter.involvingUserId),
        eq(tickets.accountableId, filter.involvingUserId),
        eq(tickets.supervisorId, filter.involvingUserId),
      );
      if (involving) conditions.push(involving);
    }

    return this.db
      .select()
      .from(tickets)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(desc(tickets.createdAt));
  }

  async getExternallyLinkedOpenTickets(): Promise<Ticket[]> {
    return this.db
      .select()
      .from(tickets)
      .where(and(
        isNotNull(tickets.externalRef),
        notInArray(tickets.status, [...TERMINAL_STATUSES]),
      ))
      .orderBy(asc(tickets.id));
  }

  async mutateTicket<T>(id: number, mutate: TicketMutation<T>): Promise<T> {
    return this.db.transaction(async (tx) => {
      const [current] = await tx.select().from(tickets).where(eq(tickets.id, id)).for("update");
      if (!current) {
        throw TicketError.notFound("Ticket", id);
      }

      const draft = cloneTicket(current);
      const result = await mutate(draft);
      const changes = diffTicket(current, draft);
      if (changes) {
        await tx
          .update(tickets)
          .set({ ...changes, version: current.version + 1, updatedAt: new Date() })
          .where(eq(tickets.id, id));
      }
      return result;
    });
  }
}
