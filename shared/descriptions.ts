import { z } from "zod";
import type { TicketType } from "./schema";

// Form answers are loose: "Ja"/"Nein" strings from the request forms, or booleans from API clients.
const answer = z.union([z.string(), z.boolean()]).optional();

const fleetSection = z
  .object({
    car: answer,
    pool_cars: answer,
  })
  .passthrough();

const hardwareForm = z.object({}).passthrough();

const fleetForm = z
  .object({
    fuhrpark: fleetSection.optional(),
  })
  .passthrough();

export const descriptionSchemas = {
  hardware: hardwareForm,
  "zugang-beantragen": fleetForm,
  "zugang-sperren": fleetForm,
  "niederlassung-anmelden": fleetForm,
  "niederlassung-umzug": fleetForm,
  "niederlassung-schliessen": fleetForm,
} satisfies Record<TicketType, z.ZodTypeAny>;

type DescriptionSchemas = typeof descriptionSchemas;

export type DescriptionOf<T extends TicketType> = z.infer<DescriptionSchemas[T]>;

export type TicketDescription = {
  [T in TicketType]: { type: T; data: DescriptionOf<T> };
}[TicketType];

export type DescriptionParseResult =
  | { success: true; description: TicketDescription }
  | { success: false; reason: string };

function parseJson(raw: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch {
    return { ok: false };
  }
}

function mismatch(type: TicketType, error: z.ZodError): DescriptionParseResult {
  const issue = error.issues[0];
  const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
  return { success: false, reason: `Description does not match the ${type} form${where}` };
}

/**
 * Parses the serialized form submission of a ticket into its typed variant.
 * The text must be a JSON object; arrays and scalars are rejected.
 */
export function parseDescription(type: TicketType, raw: string): DescriptionParseResult {
  const json = parseJson(raw);
  if (!json.ok) {
    return { success: false, reason: "Description is not valid JSON" };
  }
  if (typeof json.value !== "object" || json.value === null || Array.isArray(json.value)) {
    return { success: false, reason: "Description must be a JSON object" };
  }
  switch (type) {
    case "hardware": {
      const parsed = hardwareForm.safeParse(json.value);
      return parsed.success ? { success: true, description: { type, data: parsed.data } } : mismatch(type, parsed.error);
    }
    default: {
      const parsed = fleetForm.safeParse(json.value);
      return parsed.success ? { success: true, description: { type, data: parsed.data } } : mismatch(type, parsed.error);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Writes shipment tracking into the description under `sendeverfolgung`.
 * Text that is not a JSON object is kept under `description`.
 */
export function withTracking(raw: string, tracking: string): string {
  const json = parseJson(raw);
  const data = json.ok && isRecord(json.value) ? json.value : { description: raw };
  return JSON.stringify({ ...data, sendeverfolgung: tracking });
}

export function isAffirmative(value: string | boolean | undefined): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value !== "string") return false;
  const normalized = value.trim().toLowerCase();
  return normalized === "ja" || normalized === "yes";
}
