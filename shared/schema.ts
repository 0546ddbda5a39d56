import { sql } from "drizzle-orm";
import { pgTable, text, varchar, boolean, timestamp, integer, json, pgEnum, serial, primaryKey } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// Ticket types are the wire keys used by the request forms
export const TICKET_TYPES = [
  "hardware",
  "zugang-beantragen",
  "zugang-sperren",
  "niederlassung-anmelden",
  "niederlassung-umzug",
  "niederlassung-schliessen",
] as const;
export type TicketType = (typeof TICKET_TYPES)[number];

export const TICKET_TYPE_LABELS: Record<TicketType, string> = {
  hardware: "Hardware order",
  "zugang-beantragen": "Access grant",
  "zugang-sperren": "Access revoke",
  "niederlassung-anmelden": "Branch opening",
  "niederlassung-umzug": "Branch move",
  "niederlassung-schliessen": "Branch closing",
};

export function isTicketType(value: unknown): value is TicketType {
  return typeof value === "string" && TICKET_TYPES.some((type) => type === value);
}

export const TICKET_STATUSES = ["in_progress", "in_request", "rejected", "archived"] as const;
export type TicketStatus = (typeof TICKET_STATUSES)[number];
export const TERMINAL_STATUSES: readonly TicketStatus[] = ["rejected", "archived"];

export const TICKET_PRIORITIES = ["low", "medium", "high", "critical"] as const;
export type TicketPriority = (typeof TICKET_PRIORITIES)[number];

export const DEPARTMENT_STATUSES = ["open", "in_progress", "done", "skipped", "rejected"] as const;
export type DepartmentStatus = (typeof DEPARTMENT_STATUSES)[number];

// Statuses a department member may set; open/in_progress are engine-managed
export const DEPARTMENT_ACTION_STATUSES = ["done", "rejected", "skipped"] as const;
export type DepartmentActionStatus = (typeof DEPARTMENT_ACTION_STATUSES)[number];

export const ROLE_KINDS = ["assignee", "accountable", "supervisor"] as const;
export type RoleKind = (typeof ROLE_KINDS)[number];

// Enums
export const ticketTypeEnum = pgEnum("ticket_type", TICKET_TYPES);
export const ticketStatusEnum = pgEnum("ticket_status", TICKET_STATUSES);
export const ticketPriorityEnum = pgEnum("ticket_priority", TICKET_PRIORITIES);

// JSON sub-documents. Stored in `json` columns, which keep the text (and key order) as written.
export interface DepartmentEntry {
  name: string;
  required: boolean;
  status: DepartmentStatus;
}

export interface WorkflowState {
  departments: Record<string, DepartmentEntry>;
  builtAt: string;
}

export type ActorType = "user" | "system";

export interface HistoryEvent {
  timestamp: string;
  actor: {
    id: string | null;
    name: string;
    type: ActorType;
  };
  action: string;
  details: Record<string, unknown>;
}

export interface AssignmentSnapshot {
  role: RoleKind;
  userId: string;
  userName: string;
  actorId: string | null;
  timestamp: string;
}

export interface ExternalRef {
  ninjaTicketId: number;
  syncedAt: string | null;
  // Set once the external ticket was seen closed without a readable outcome
  unresolvedAt?: string;
}

// Users table
export const users = pgTable("users", {
  id: varchar("id", { length: 36 }).primaryKey().default(sql`gen_random_uuid()`),
  email: varchar("email", { length: 255 }).notNull().unique(),
  name: varchar("name", { length: 255 }).notNull(),
  isActive: boolean("is_active").notNull().default(true),
  isAdmin: boolean("is_admin").notNull().default(false),
  createdAt: timestamp("created_at").notNull().defaultNow(),
});

// Departments (sign-off groups)
export const departments = pgTable("departments", {
  id: varchar("id", { length: 36 }).primaryKey().default(sql`gen_random_uuid()`),
  name: varchar("name", { length: 255 }).notNull().unique(),
  createdAt: timestamp("created_at").notNull().defaultNow(),
});

export const departmentMembers = pgTable("department_members", {
  departmentId: varchar("department_id", { length: 36 }).notNull().references(() => departments.id, { onDelete: "cascade" }),
  userId: varchar("user_id", { length: 36 }).notNull(),
  addedAt: timestamp("added_at").notNull().defaultNow(),
}, (t) => [
  primaryKey({ columns: [t.departmentId, t.userId] }),
]);

// One row per ticket type; an empty list means nobody may create that type
export const ticketPermissions = pgTable("ticket_permissions", {
  ticketType: ticketTypeEnum("ticket_type").primaryKey(),
  userIds: text("user_ids").array().notNull().default(sql`ARRAY[]::text[]`),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
});

// Users who may view every ticket regardless of their part in it
export const ticketOverviewMembers = pgTable("ticket_overview_members", {
  userId: varchar("user_id", { length: 36 }).primaryKey(),
  addedAt: timestamp("added_at").notNull().defaultNow(),
});

// Tickets
export const tickets = pgTable("tickets", {
  id: serial("id").primaryKey(),
  title: varchar("title", { length: 255 }).notNull(),
  ticketType: ticketTypeEnum("ticket_type").notNull(),
  description: text("description").notNull(),
  ownerId: varchar("owner_id", { length: 255 }).notNull(),
  ownerName: varchar("owner_name", { length: 255 }).notNull(),
  comment: text("comment").notNull().default(""),
  status: ticketStatusEnum("status").notNull().default("in_progress"),
  priority: ticketPriorityEnum("priority").notNull().default("medium"),
  assigneeId: varchar("assignee_id", { length: 255 }),
  assigneeName: varchar("assignee_name", { length: 255 }),
  accountableId: varchar("accountable_id", { length: 255 }),
  accountableName: varchar("accountable_name", { length: 255 }),
  supervisorId: varchar("supervisor_id", { length: 255 }),
  supervisorName: varchar("supervisor_name", { length: 255 }),
  assignmentHistory: json("assignment_history").$type<AssignmentSnapshot[]>().notNull().default([]),
  workflowState: json("workflow_state").$type<WorkflowState>(),
  history: json("history").$type<HistoryEvent[]>().notNull().default([]),
  externalRef: json("ninja_metadata").$type<ExternalRef>(),
  version: integer("version").notNull().default(1),
  createdAt: timestamp("created_at").notNull().defaultNow(),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
});

// Insert schemas
export const insertUserSchema = createInsertSchema(users).omit({
  id: true,
  createdAt: true,
});

export const insertDepartmentSchema = createInsertSchema(departments).omit({
  id: true,
  createdAt: true,
});

// Types
export type User = typeof users.$inferSelect;
export type InsertUser = z.infer<typeof insertUserSchema>;

export type Department = typeof departments.$inferSelect;
export type InsertDepartment = z.infer<typeof insertDepartmentSchema>;

export type DepartmentMember = typeof departmentMembers.$inferSelect;

export type TicketPermission = typeof ticketPermissions.$inferSelect;

export type Ticket = typeof tickets.$inferSelect;
export type InsertTicket = typeof tickets.$inferInsert;

// Identity acting on the engine, resolved by the HTTP layer
export interface Actor {
  id: string;
  name: string;
  isAdmin: boolean;
}

export type RoleBinding = { userId: string; userName: string };

export type TicketWithDepartments = Ticket & {
  myDepartments?: Array<{ departmentId: string; name: string; status: DepartmentStatus }>;
};
