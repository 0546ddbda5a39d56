import type { Express, Request, Response, NextFunction } from "express";
import type { Server } from "http";
import session from "express-session";
import { z } from "zod";
import {
  TICKET_PRIORITIES,
  TICKET_STATUSES,
  TICKET_TYPES,
  TICKET_TYPE_LABELS,
  insertDepartmentSchema,
  type Actor,
  type TicketWithDepartments,
  type User,
} from "@shared/schema";
import type { AppConfig } from "./config";
import type { IStorage, TicketFilter } from "./storage";
import { TicketError, isTicketError } from "./lib/errors";
import { logError } from "./lib/logger";
import type { OverviewGroup } from "./lib/overview-group";
import type { PermissionStore } from "./lib/permissions";
import type { WorkflowEngine } from "./lib/workflow-engine";
import type { TicketLifecycle } from "./lib/ticket-lifecycle";
import type { ReconciliationSync } from "./lib/reconciliation";

export interface AppServices {
  config: AppConfig;
  storage: IStorage;
  permissions: PermissionStore;
  overview: OverviewGroup;
  engine: WorkflowEngine;
  lifecycle: TicketLifecycle;
  sync: ReconciliationSync | null;
  sessionStore?: session.Store;
}

// Extend Express Request to include the acting user
declare global {
  namespace Express {
    interface Request {
      user?: User;
      actor?: Actor;
    }
  }
}

declare module "express-session" {
  interface SessionData {
    userId?: string;
  }
}

const roleBindingSchema = z.object({
  userId: z.string().trim().min(1).max(255),
  userName: z.string().trim().min(1).max(255),
});

// Forms post the description either as serialized text or as the object itself
const descriptionInput = z
  .union([z.string(), z.record(z.unknown())])
  .transform((value) => (typeof value === "string" ? value : JSON.stringify(value)));

const createTicketSchema = z.object({
  ticketType: z.string().min(1),
  description: descriptionInput,
  assignee: roleBindingSchema.nullish(),
  accountable: roleBindingSchema.nullish(),
  supervisor: roleBindingSchema.nullish(),
  priority: z.enum(TICKET_PRIORITIES).optional(),
});

const roleChangesSchema = z.object({
  assignee: roleBindingSchema.optional(),
  accountable: roleBindingSchema.nullable().optional(),
  supervisor: roleBindingSchema.optional(),
});

const updateDescriptionSchema = z.object({ description: descriptionInput });
const prioritySchema = z.object({ priority: z.string().min(1) });
const submitSchema = z.object({ priority: z.string().min(1).optional() });
const rejectSchema = z.object({ reason: z.string().trim().max(2000).optional() });
const externalLinkSchema = z.object({ externalTicketId: z.coerce.number().int().positive() });
const departmentStatusSchema = z.object({ status: z.string().min(1) });
const permissionUsersSchema = z.object({ users: z.unknown() });
const overviewMemberSchema = z.object({ userId: z.string().min(1) });
const overviewReplaceSchema = z.object({ members: z.unknown() });
const devLoginSchema = z.object({ email: z.string().email() });

const createDepartmentSchema = insertDepartmentSchema.extend({
  name: z.string().trim().min(1).max(255),
});

const listTicketsQuery = z.object({
  status: z.enum(TICKET_STATUSES).optional(),
  ticketType: z.enum(TICKET_TYPES).optional(),
  mine: z.enum(["true", "false"]).optional(),
});

function parseTicketId(raw: string): number {
  const id = Number(raw);
  if (!Number.isInteger(id) || id <= 0) {
    throw TicketError.invalidPayload(`Invalid ticket id: ${raw}`);
  }
  return id;
}

function validationError(res: Response, error: z.ZodError) {
  return res.status(400).json({ error: "Invalid request", code: "InvalidPayload", details: error.flatten() });
}

function sendError(res: Response, error: unknown, context: string) {
  if (isTicketError(error)) {
    return res.status(error.httpStatus).json({ error: error.message, code: error.code, details: error.details });
  }
  logError(context, error);
  return res.status(500).json({ error: "Internal server error" });
}

function actorOf(req: Request): Actor {
  if (!req.actor) {
    throw new TicketError("Forbidden", "Not authenticated");
  }
  return req.actor;
}

export async function registerRoutes(httpServer: Server, app: Express, services: AppServices): Promise<Server> {
  const { config, storage, permissions, overview, engine, lifecycle, sync } = services;

  app.use(
    session({
      store: services.sessionStore,
      secret: config.sessionSecret,
      resave: false,
      saveUninitialized: false,
      cookie: {
        secure: config.env === "production",
        httpOnly: true,
        sameSite: "lax",
        maxAge: 24 * 60 * 60 * 1000,
      },
    })
  );

  // Auth middleware. The user row is re-read on every request so deactivation takes effect at once.
  async function requireAuth(req: Request, res: Response, next: NextFunction) {
    if (!req.session.userId) {
      return res.status(401).json({ error: "Unauthorized" });
    }

    try {
      const user = await storage.getUser(req.session.userId);
      if (!user || !user.isActive) {
        req.session.destroy((err) => {
          if (err) logError("Session destroy error", err);
        });
        return res.status(401).json({ error: "Unauthorized" });
      }

      req.user = user;
      req.actor = { id: user.id, name: user.name, isAdmin: user.isAdmin };
      next();
    } catch (error) {
      sendError(res, error, "Auth lookup failed");
    }
  }

  function requireAdmin(req: Request, res: Response, next: NextFunction) {
    if (!req.user?.isAdmin) {
      return res.status(403).json({ error: "Forbidden - Admin access required", code: "Forbidden" });
    }
    next();
  }

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", externalSync: sync?.isRunning ?? false });
  });

  // ==================== AUTH ROUTES ====================

  app.get("/api/auth/me", requireAuth, (req, res) => {
    res.json(req.user);
  });

  // Sign-in through the identity provider is handled upstream; outside production a user can sign in by email.
  if (config.env !== "production") {
    app.post("/api/auth/dev/login", async (req, res) => {
      const parsed = devLoginSchema.safeParse(req.body);
      if (!parsed.success) return validationError(res, parsed.error);

      try {
        const user = await storage.getUserByEmail(parsed.data.email);
        if (!user || !user.isActive) {
          return res.status(401).json({ error: "Unknown or inactive user" });
        }
        req.session.userId = user.id;
        res.json(user);
      } catch (error) {
        sendError(res, error, "Dev login error");
      }
    });
  }

  app.post("/api/auth/logout", requireAuth, (req, res) => {
    req.session.destroy((err) => {
      if (err) {
        logError("Logout error", err);
        return res.status(500).json({ error: "Logout failed" });
      }
      res.json({ success: true });
    });
  });

  // ==================== TICKETS ====================

  app.get("/api/ticket-types", requireAuth, async (req, res) => {
    try {
      const creatable = await permissions.typesForUser(actorOf(req).id);
      res.json(creatable.map((type) => ({ type, label: TICKET_TYPE_LABELS[type] })));
    } catch (error) {
      sendError(res, error, "Get ticket types error");
    }
  });

  app.post("/api/tickets", requireAuth, async (req, res) => {
    const parsed = createTicketSchema.safeParse(req.body);
    if (!parsed.success) return validationError(res, parsed.error);

    try {
      const ticket = await lifecycle.create(actorOf(req), parsed.data);
      res.status(201).json(ticket);
    } catch (error) {
      sendError(res, error, "Create ticket error");
    }
  });

  app.get("/api/tickets", requireAuth, async (req, res) => {
    const parsed = listTicketsQuery.safeParse(req.query);
    if (!parsed.success) return validationError(res, parsed.error);

    try {
      const actor = actorOf(req);
      const filter: TicketFilter = { status: parsed.data.status, ticketType: parsed.data.ticketType };
      if (parsed.data.mine === "true") {
        filter.ownerId = actor.id;
      }
      res.json(await lifecycle.list(actor, filter));
    } catch (error) {
      sendError(res, error, "List tickets error");
    }
  });

  app.get("/api/tickets/:id", requireAuth, async (req, res) => {
    try {
      const ticketId = parseTicketId(req.params.id);
      const ticket = await lifecycle.get(actorOf(req), ticketId);
      const mine = await engine.departmentsForUser(ticketId, actorOf(req).id);
      const result: TicketWithDepartments = {
        ...ticket,
        myDepartments: Object.entries(mine).map(([departmentId, entry]) => ({
          departmentId,
          name: entry.name,
          status: entry.status,
        })),
      };
      res.json(result);
    } catch (error) {
      sendError(res, error, "Get ticket error");
    }
  });

  app.get("/api/tickets/:id/history", requireAuth, async (req, res) => {
    try {
      res.json(await lifecycle.listHistory(actorOf(req), parseTicketId(req.params.id)));
    } catch (error) {
      sendError(res, error, "Get ticket history error");
    }
  });

  app.patch("/api/tickets/:id/roles", requireAuth, async (req, res) => {
    const parsed = roleChangesSchema.safeParse(req.body);
    if (!parsed.success) return validationError(res, parsed.error);

    try {
      res.json(await lifecycle.assignRoles(actorOf(req), parseTicketId(req.params.id), parsed.data));
    } catch (error) {
      sendError(res, error, "Assign roles error");
    }
  });

  app.patch("/api/tickets/:id/description", requireAuth, async (req, res) => {
    const parsed = updateDescriptionSchema.safeParse(req.body);
    if (!parsed.success) return validationError(res, parsed.error);

    try {
      res.json(await lifecycle.updateDescription(actorOf(req), parseTicketId(req.params.id), parsed.data.description));
    } catch (error) {
      sendError(res, error, "Update description error");
    }
  });

  app.patch("/api/tickets/:id/priority", requireAuth, async (req, res) => {
    const parsed = prioritySchema.safeParse(req.body);
    if (!parsed.success) return validationError(res, parsed.error);

    try {
      res.json(await lifecycle.setPriority(actorOf(req), parseTicketId(req.params.id), parsed.data.priority));
    } catch (error) {
      sendError(res, error, "Set priority error");
    }
  });

  app.post("/api/tickets/:id/submit", requireAuth, async (req, res) => {
    const parsed = submitSchema.safeParse(req.body ?? {});
    if (!parsed.success) return validationError(res, parsed.error);

    try {
      res.json(await lifecycle.submit(actorOf(req), parseTicketId(req.params.id), parsed.data.priority));
    } catch (error) {
      sendError(res, error, "Submit ticket error");
    }
  });

  app.post("/api/tickets/:id/reject", requireAuth, requireAdmin, async (req, res) => {
    const parsed = rejectSchema.safeParse(req.body ?? {});
    if (!parsed.success) return validationError(res, parsed.error);

    try {
      res.json(await lifecycle.reject(actorOf(req), parseTicketId(req.params.id), parsed.data.reason));
    } catch (error) {
      sendError(res, error, "Reject ticket error");
    }
  });

  app.post("/api/tickets/:id/archive", requireAuth, requireAdmin, async (req, res) => {
    try {
      res.json(await lifecycle.archive(actorOf(req), parseTicketId(req.params.id)));
    } catch (error) {
      sendError(res, error, "Archive ticket error");
    }
  });

  app.post("/api/tickets/:id/workflow/rebuild", requireAuth, requireAdmin, async (req, res) => {
    try {
      res.json(await lifecycle.rebuildWorkflow(actorOf(req), parseTicketId(req.params.id)));
    } catch (error) {
      sendError(res, error, "Rebuild workflow error");
    }
  });

  app.post("/api/tickets/:id/external-link", requireAuth, async (req, res) => {
    const parsed = externalLinkSchema.safeParse(req.body);
    if (!parsed.success) return validationError(res, parsed.error);

    try {
      res.json(await lifecycle.linkExternal(actorOf(req), parseTicketId(req.params.id), parsed.data.externalTicketId));
    } catch (error) {
      sendError(res, error, "Link external ticket error");
    }
  });

  // ==================== DEPARTMENT ACTIONS ====================

  app.get("/api/departments/queue", requireAuth, async (req, res) => {
    try {
      res.json(await engine.departmentQueue(actorOf(req).id));
    } catch (error) {
      sendError(res, error, "Department queue error");
    }
  });

  app.post("/api/tickets/:id/departments/:departmentId/start", requireAuth, async (req, res) => {
    try {
      const ticketId = parseTicketId(req.params.id);
      res.json(await lifecycle.startDepartmentWork(actorOf(req), ticketId, req.params.departmentId));
    } catch (error) {
      sendError(res, error, "Start department work error");
    }
  });

  app.post("/api/tickets/:id/departments/:departmentId/status", requireAuth, async (req, res) => {
    const parsed = departmentStatusSchema.safeParse(req.body);
    if (!parsed.success) return validationError(res, parsed.error);

    try {
      const ticketId = parseTicketId(req.params.id);
      res.json(await lifecycle.departmentComplete(actorOf(req), ticketId, req.params.departmentId, parsed.data.status));
    } catch (error) {
      sendError(res, error, "Department status error");
    }
  });

  // ==================== ADMIN: TICKET PERMISSIONS ====================

  app.get("/api/admin/ticket-types", requireAuth, requireAdmin, (_req, res) => {
    res.json(Array.from(permissions.allowedTypes()).map((type) => ({ type, label: TICKET_TYPE_LABELS[type] })));
  });

  app.get("/api/admin/ticket-permissions", requireAuth, requireAdmin, async (_req, res) => {
    try {
      res.json(await permissions.list());
    } catch (error) {
      sendError(res, error, "Get ticket permissions error");
    }
  });

  app.put("/api/admin/ticket-permissions", requireAuth, requireAdmin, async (req, res) => {
    try {
      res.json(await permissions.replaceAll(req.body));
    } catch (error) {
      sendError(res, error, "Replace ticket permissions error");
    }
  });

  app.put("/api/admin/ticket-permissions/:ticketType", requireAuth, requireAdmin, async (req, res) => {
    const parsed = permissionUsersSchema.safeParse(req.body);
    if (!parsed.success) return validationError(res, parsed.error);

    try {
      const users = await permissions.setPermissions(req.params.ticketType, parsed.data.users);
      res.json({ ticketType: req.params.ticketType, users });
    } catch (error) {
      sendError(res, error, "Set ticket permissions error");
    }
  });

  app.post("/api/admin/ticket-permissions/:ticketType/users/:userId", requireAuth, requireAdmin, async (req, res) => {
    try {
      await permissions.addUser(req.params.ticketType, req.params.userId);
      res.json(await permissions.list());
    } catch (error) {
      sendError(res, error, "Add ticket permission error");
    }
  });

  app.delete("/api/admin/ticket-permissions/:ticketType/users/:userId", requireAuth, requireAdmin, async (req, res) => {
    try {
      await permissions.removeUser(req.params.ticketType, req.params.userId);
      res.json(await permissions.list());
    } catch (error) {
      sendError(res, error, "Remove ticket permission error");
    }
  });

  // ==================== ADMIN: TICKET OVERVIEW GROUP ====================

  app.get("/api/admin/ticket-overview-group", requireAuth, requireAdmin, async (_req, res) => {
    try {
      res.json({ members: await overview.list() });
    } catch (error) {
      sendError(res, error, "Get overview group error");
    }
  });

  app.put("/api/admin/ticket-overview-group", requireAuth, requireAdmin, async (req, res) => {
    const parsed = overviewReplaceSchema.safeParse(req.body);
    if (!parsed.success) return validationError(res, parsed.error);

    try {
      res.json({ members: await overview.replace(parsed.data.members) });
    } catch (error) {
      sendError(res, error, "Replace overview group error");
    }
  });

  app.post("/api/admin/ticket-overview-group/members", requireAuth, requireAdmin, async (req, res) => {
    const parsed = overviewMemberSchema.safeParse(req.body);
    if (!parsed.success) return validationError(res, parsed.error);

    try {
      const added = await overview.add(parsed.data.userId);
      res.json({ added, members: await overview.list() });
    } catch (error) {
      sendError(res, error, "Add overview member error");
    }
  });

  app.delete("/api/admin/ticket-overview-group/members/:userId", requireAuth, requireAdmin, async (req, res) => {
    try {
      const removed = await overview.remove(req.params.userId);
      res.json({ removed, members: await overview.list() });
    } catch (error) {
      sendError(res, error, "Remove overview member error");
    }
  });

  // ==================== ADMIN: DEPARTMENTS ====================

  app.get("/api/admin/departments", requireAuth, requireAdmin, async (_req, res) => {
    try {
      const all = await storage.getAllDepartments();
      const withMembers = await Promise.all(
        all.map(async (department) => ({
          ...department,
          memberIds: await storage.getDepartmentMemberIds(department.id),
        }))
      );
      res.json(withMembers);
    } catch (error) {
      sendError(res, error, "Get departments error");
    }
  });

  app.post("/api/admin/departments", requireAuth, requireAdmin, async (req, res) => {
    const parsed = createDepartmentSchema.safeParse(req.body);
    if (!parsed.success) return validationError(res, parsed.error);

    try {
      const existing = await storage.getAllDepartments();
      if (existing.some((d) => d.name.toLowerCase() === parsed.data.name.toLowerCase())) {
        return res.status(409).json({ error: "Department already exists", code: "InvalidPayload" });
      }
      res.status(201).json(await storage.createDepartment(parsed.data));
    } catch (error) {
      sendError(res, error, "Create department error");
    }
  });

  app.put("/api/admin/departments/:id/members/:userId", requireAuth, requireAdmin, async (req, res) => {
    try {
      const department = await storage.getDepartment(req.params.id);
      if (!department) throw TicketError.notFound("Department", req.params.id);
      await storage.addDepartmentMember(department.id, req.params.userId);
      res.json({ departmentId: department.id, memberIds: await storage.getDepartmentMemberIds(department.id) });
    } catch (error) {
      sendError(res, error, "Add department member error");
    }
  });

  app.delete("/api/admin/departments/:id/members/:userId", requireAuth, requireAdmin, async (req, res) => {
    try {
      const department = await storage.getDepartment(req.params.id);
      if (!department) throw TicketError.notFound("Department", req.params.id);
      await storage.removeDepartmentMember(department.id, req.params.userId);
      res.json({ departmentId: department.id, memberIds: await storage.getDepartmentMemberIds(department.id) });
    } catch (error) {
      sendError(res, error, "Remove department member error");
    }
  });

  return httpServer;
}
