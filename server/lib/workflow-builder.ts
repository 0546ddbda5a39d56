import { isTicketType, type Department, type TicketType, type WorkflowState } from "@shared/schema";
import { isAffirmative, parseDescription, type DescriptionOf, type TicketDescription } from "@shared/descriptions";
import type { DepartmentNames, DepartmentRole } from "../config";
import { TicketError } from "./errors";
import { logWarn } from "./logger";

type WorkflowBuilders = {
  [T in TicketType]: (data: DescriptionOf<T>) => DepartmentRole[];
};

// Order matters: it is the order departments appear in the workflow.
const BUILDERS: WorkflowBuilders = {
  hardware: () => ["it"],
  "zugang-beantragen": (data) => ["it", "hr", ...(isAffirmative(data.fuhrpark?.car) ? ["fleet" as const] : [])],
  "zugang-sperren": (data) => ["it", "hr", ...(isAffirmative(data.fuhrpark?.car) ? ["fleet" as const] : [])],
  "niederlassung-anmelden": (data) => [
    "facilities",
    "it",
    "marketing",
    ...(isAffirmative(data.fuhrpark?.pool_cars) ? ["fleet" as const] : []),
  ],
  "niederlassung-umzug": (data) => [
    "facilities",
    "it",
    ...(isAffirmative(data.fuhrpark?.pool_cars) ? ["fleet" as const] : []),
  ],
  "niederlassung-schliessen": (data) => [
    "it",
    "hr",
    ...(isAffirmative(data.fuhrpark?.pool_cars) ? ["fleet" as const] : []),
  ],
};

function rolesFor<T extends TicketType>(description: { type: T; data: DescriptionOf<T> }): DepartmentRole[] {
  const builder: WorkflowBuilders[T] = BUILDERS[description.type];
  return builder(description.data);
}

/**
 * Decides which departments must sign off a ticket. The result depends only on
 * the ticket type, the parsed description and the department registry passed in.
 */
export class WorkflowBuilder {
  constructor(
    private readonly names: DepartmentNames,
    private readonly now: () => Date = () => new Date(),
  ) {}

  build(ticketType: string, description: string | TicketDescription, registry: readonly Department[]): WorkflowState {
    if (!isTicketType(ticketType)) {
      throw new TicketError("UnbuildableWorkflow", `No workflow builder for ticket type ${ticketType}`, { ticketType });
    }

    const parsed = typeof description === "string" ? parseDescription(ticketType, description) : { success: true as const, description };
    if (!parsed.success) {
      throw new TicketError("UnbuildableWorkflow", parsed.reason, { ticketType });
    }
    if (parsed.description.type !== ticketType) {
      throw new TicketError("UnbuildableWorkflow", `Description is for ${parsed.description.type}, not ${ticketType}`, { ticketType });
    }

    const byName = new Map(registry.map((d) => [d.name.trim().toLowerCase(), d]));
    const state: WorkflowState = { departments: {}, builtAt: this.now().toISOString() };

    for (const role of rolesFor(parsed.description)) {
      const name = this.names[role];
      const department = byName.get(name.trim().toLowerCase());
      if (!department) {
        logWarn(`Department "${name}" not found, skipped in ${ticketType} workflow`, "workflow");
        continue;
      }
      state.departments[department.id] = { name: department.name, required: true, status: "open" };
    }

    return state;
  }
}
