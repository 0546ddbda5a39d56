/**
 * Environment configuration, validated once at startup.
 */

import { z } from "zod";

const departmentNamesSchema = z.object({
  it: z.string().min(1),
  hr: z.string().min(1),
  fleet: z.string().min(1),
  facilities: z.string().min(1),
  marketing: z.string().min(1),
});

export type DepartmentNames = z.infer<typeof departmentNamesSchema>;
export type DepartmentRole = keyof DepartmentNames;

export const DEFAULT_DEPARTMENT_NAMES: DepartmentNames = {
  it: "IT",
  hr: "HR",
  fleet: "Fleet",
  facilities: "Facilities",
  marketing: "Marketing",
};

const jsonDepartmentNames = z
  .string()
  .transform((raw, ctx) => {
    try {
      const value: unknown = JSON.parse(raw);
      return value;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "DEPARTMENT_NAMES must be JSON" });
      return z.NEVER;
    }
  })
  .pipe(departmentNamesSchema.partial())
  .transform((names) => ({ ...DEFAULT_DEPARTMENT_NAMES, ...names }));

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(5000),
  DATABASE_URL: z.string().min(1),
  SESSION_SECRET: z.string().min(16).optional(),

  // External helpdesk mirror
  EXTERNAL_API_URL: z.string().url().optional(),
  EXTERNAL_API_TOKEN: z.string().optional(),
  EXTERNAL_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),
  EXTERNAL_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  EXTERNAL_CLOSED_STATUS_ID: z.coerce.number().int().default(5000),
  EXTERNAL_OUTCOME_ATTRIBUTE_ID: z.coerce.number().int().default(201),
  EXTERNAL_COMMENT_ATTRIBUTE_ID: z.coerce.number().int().default(202),
  EXTERNAL_TRACKING_ATTRIBUTE_ID: z.coerce.number().int().optional(),
  EXTERNAL_APPROVED_MARKER: z.string().min(1).default("Erledigt"),
  EXTERNAL_REJECTED_MARKER: z.string().min(1).default("Abgelehnt"),

  DEPARTMENT_NAMES: jsonDepartmentNames.optional(),
  SEED_ADMIN_EMAIL: z.string().email().optional(),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  env: Env["NODE_ENV"];
  port: number;
  databaseUrl: string;
  sessionSecret: string;
  departmentNames: DepartmentNames;
  seedAdminEmail: string | null;
  external: {
    baseUrl: string;
    token: string;
    pollIntervalMs: number;
    timeoutMs: number;
    closedStatusId: number;
    outcomeAttributeId: number;
    commentAttributeId: number;
    trackingAttributeId: number | null;
    approvedMarker: string;
    rejectedMarker: string;
  } | null;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    console.error("Invalid environment variables:");
    console.error(parsed.error.issues.map((i) => `  - ${i.path.join(".")}: ${i.message}`).join("\n"));
    throw new Error("Environment validation failed");
  }

  const env = parsed.data;
  if (env.NODE_ENV === "production" && !env.SESSION_SECRET) {
    throw new Error("SESSION_SECRET environment variable is required in production");
  }

  const external = env.EXTERNAL_API_URL && env.EXTERNAL_API_TOKEN
    ? {
        baseUrl: env.EXTERNAL_API_URL.replace(/\/+$/, ""),
        token: env.EXTERNAL_API_TOKEN,
        pollIntervalMs: env.EXTERNAL_POLL_INTERVAL_MS,
        timeoutMs: env.EXTERNAL_TIMEOUT_MS,
        closedStatusId: env.EXTERNAL_CLOSED_STATUS_ID,
        outcomeAttributeId: env.EXTERNAL_OUTCOME_ATTRIBUTE_ID,
        commentAttributeId: env.EXTERNAL_COMMENT_ATTRIBUTE_ID,
        trackingAttributeId: env.EXTERNAL_TRACKING_ATTRIBUTE_ID ?? null,
        approvedMarker: env.EXTERNAL_APPROVED_MARKER,
        rejectedMarker: env.EXTERNAL_REJECTED_MARKER,
      }
    : null;

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    databaseUrl: env.DATABASE_URL,
    sessionSecret: env.SESSION_SECRET ?? "request-manager-dev-only-secret",
    departmentNames: env.DEPARTMENT_NAMES ?? DEFAULT_DEPARTMENT_NAMES,
    seedAdminEmail: env.SEED_ADMIN_EMAIL ?? null,
    external,
  };
}
