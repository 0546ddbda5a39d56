import type { DepartmentNames } from "./config";
import type { IStorage } from "./storage";
import { log } from "./lib/logger";

/**
 * Creates the departments the workflow builders refer to, matching existing
 * ones by case-insensitive name. Returns the names that were created.
 */
export async function ensureDefaultDepartments(storage: IStorage, names: DepartmentNames): Promise<string[]> {
  const existing = new Set((await storage.getAllDepartments()).map((d) => d.name.trim().toLowerCase()));
  const created: string[] = [];

  for (const name of Object.values(names)) {
    if (existing.has(name.toLowerCase())) continue;
    await storage.createDepartment({ name });
    existing.add(name.toLowerCase());
    created.push(name);
  }

  if (created.length > 0) {
    log(`Created departments: ${created.join(", ")}`, "seed");
  }
  return created;
}

/** Development seed: default departments plus an admin who belongs to all of them. */
export async function seed(storage: IStorage, names: DepartmentNames, adminEmail: string): Promise<void> {
  log("Seeding database...", "seed");
  await ensureDefaultDepartments(storage, names);

  let admin = await storage.getUserByEmail(adminEmail);
  if (!admin) {
    admin = await storage.createUser({ email: adminEmail, name: "Administrator", isActive: true, isAdmin: true });
    log(`Created admin user ${adminEmail}`, "seed");
  }

  for (const department of await storage.getAllDepartments()) {
    await storage.addDepartmentMember(department.id, admin.id);
  }
  log("Seeding complete", "seed");
}
