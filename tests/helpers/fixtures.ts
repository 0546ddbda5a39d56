import type { Actor, Department, InsertTicket, Ticket, WorkflowState } from "@shared/schema";
import { DEFAULT_DEPARTMENT_NAMES } from "../../server/config";
import { createServices, type ServiceOptions, type Services } from "../../server/services";
import { MemStorage } from "./mem-storage";

export const FIXED_NOW = new Date("2025-03-14T09:26:00.000Z");

/** Returns `start`, then `start + stepMs`, and so on. */
export function steppingClock(start: Date = FIXED_NOW, stepMs = 1000): () => Date {
  let calls = 0;
  return () => new Date(start.getTime() + stepMs * calls++);
}

export const owner: Actor = { id: "u-owner", name: "Olivia Owner", isAdmin: false };
export const stranger: Actor = { id: "u-stranger", name: "Sam Stranger", isAdmin: false };
export const admin: Actor = { id: "u-admin", name: "Ada Admin", isAdmin: true };
export const itAgent: Actor = { id: "u-it", name: "Ian IT", isAdmin: false };
export const hrAgent: Actor = { id: "u-hr", name: "Hanna HR", isAdmin: false };
export const fleetAgent: Actor = { id: "u-fleet", name: "Finn Fleet", isAdmin: false };

export const assignee = { userId: "u-assignee", userName: "Alex Assignee" };
export const supervisor = { userId: "u-supervisor", userName: "Sue Supervisor" };

export interface Registry {
  it: Department;
  hr: Department;
  fleet: Department;
  facilities: Department;
  marketing: Department;
}

export interface TestContext extends Services {
  storage: MemStorage;
  registry: Registry;
}

/** MemStorage with the default departments, one agent per department and `owner` allowed to create every type. */
export async function createTestContext(options: ServiceOptions & { withDepartments?: boolean } = {}): Promise<TestContext> {
  const storage = new MemStorage();
  const services = createServices(storage, { departmentNames: DEFAULT_DEPARTMENT_NAMES, external: null }, {
    now: options.now ?? steppingClock(),
    externalClient: options.externalClient,
  });

  const registry: Registry = {
    it: await storage.createDepartment({ name: "IT" }),
    hr: await storage.createDepartment({ name: "HR" }),
    fleet: await storage.createDepartment({ name: "Fleet" }),
    facilities: await storage.createDepartment({ name: "Facilities" }),
    marketing: await storage.createDepartment({ name: "Marketing" }),
  };
  if (options.withDepartments === false) {
    storage.departments.clear();
  }

  await storage.addDepartmentMember(registry.it.id, itAgent.id);
  await storage.addDepartmentMember(registry.hr.id, hrAgent.id);
  await storage.addDepartmentMember(registry.fleet.id, fleetAgent.id);

  await services.permissions.ensureEntries();
  await services.permissions.replaceAll({
    hardware: [owner.id],
    "zugang-beantragen": [owner.id],
    "zugang-sperren": [owner.id],
    "niederlassung-anmelden": [owner.id],
    "niederlassung-umzug": [owner.id],
    "niederlassung-schliessen": [owner.id],
  });

  return { ...services, storage, registry };
}

export function workflowOf(entries: Array<[string, WorkflowState["departments"][string]]>): WorkflowState {
  const state: WorkflowState = { departments: {}, builtAt: FIXED_NOW.toISOString() };
  for (const [id, entry] of entries) {
    state.departments[id] = entry;
  }
  return state;
}

export async function insertTicket(storage: MemStorage, overrides: Partial<InsertTicket> = {}): Promise<Ticket> {
  return storage.createTicket({
    title: "Hardware order – Olivia Owner – 2025-03-14 09:26",
    ticketType: "hardware",
    description: "{}",
    ownerId: owner.id,
    ownerName: owner.name,
    assigneeId: assignee.userId,
    assigneeName: assignee.userName,
    supervisorId: supervisor.userId,
    supervisorName: supervisor.userName,
    ...overrides,
  });
}
