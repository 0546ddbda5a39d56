import { z } from "zod";
import { TICKET_TYPES, isTicketType, type TicketType } from "@shared/schema";
import type { IStorage, PermissionEntry } from "../storage";
import { TicketError } from "./errors";
import { log } from "./logger";

export type PermissionMap = Record<TicketType, string[]>;

// Identities arrive as strings; numeric ids from older clients are accepted and stringified
const userIdList = z.array(z.union([z.string().trim().min(1), z.number().int()]).transform(String));

function unique(ids: string[]): string[] {
  return Array.from(new Set(ids));
}

function fillMissing(map: Partial<PermissionMap>): PermissionMap {
  return {
    hardware: map.hardware ?? [],
    "zugang-beantragen": map["zugang-beantragen"] ?? [],
    "zugang-sperren": map["zugang-sperren"] ?? [],
    "niederlassung-anmelden": map["niederlassung-anmelden"] ?? [],
    "niederlassung-umzug": map["niederlassung-umzug"] ?? [],
    "niederlassung-schliessen": map["niederlassung-schliessen"] ?? [],
  };
}

function requireTicketType(ticketType: string): TicketType {
  if (!isTicketType(ticketType)) {
    throw new TicketError("InvalidTicketType", `Unknown ticket type: ${ticketType}`, { ticketType });
  }
  return ticketType;
}

function parseUsers(ticketType: TicketType, users: unknown): string[] {
  const parsed = userIdList.safeParse(users);
  if (!parsed.success) {
    throw TicketError.invalidPayload(`Users for ${ticketType} must be a list of user ids`, { ticketType });
  }
  return unique(parsed.data);
}

/**
 * Who may create which ticket type. An empty or missing entry means nobody
 * may create that type; admins get no exemption.
 */
export class PermissionStore {
  constructor(private readonly storage: IStorage) {}

  async list(): Promise<PermissionMap> {
    const rows = await this.storage.getTicketPermissions();
    const map: Partial<PermissionMap> = {};
    for (const row of rows) {
      map[row.ticketType] = unique(row.userIds);
    }
    return fillMissing(map);
  }

  async isAuthorized(ticketType: string, userId: string): Promise<boolean> {
    if (!ticketType || !userId || !isTicketType(ticketType)) return false;
    const permissions = await this.list();
    return permissions[ticketType].includes(userId);
  }

  allowedTypes(): Set<TicketType> {
    return new Set(TICKET_TYPES);
  }

  async typesForUser(userId: string): Promise<TicketType[]> {
    if (!userId) return [];
    const permissions = await this.list();
    return TICKET_TYPES.filter((type) => permissions[type].includes(userId));
  }

  async setPermissions(ticketType: string, users: unknown): Promise<string[]> {
    const type = requireTicketType(ticketType);
    const userIds = parseUsers(type, users);
    await this.storage.replaceTicketPermissionUsers([{ ticketType: type, userIds }]);
    log(`Permissions for ${type} replaced (${userIds.length} users)`, "permissions");
    return userIds;
  }

  /**
   * Bulk replace from the admin form. The whole payload is validated before
   * anything is written; types not named in the payload keep their entries.
   */
  async replaceAll(payload: unknown): Promise<PermissionMap> {
    if (typeof payload !== "object" || payload === null || Array.isArray(payload)) {
      throw TicketError.invalidPayload("Payload must be an object keyed by ticket type");
    }

    const entries: PermissionEntry[] = [];
    for (const [key, users] of Object.entries(payload)) {
      const ticketType = requireTicketType(key);
      entries.push({ ticketType, userIds: parseUsers(ticketType, users) });
    }

    await this.storage.replaceTicketPermissionUsers(entries);
    log(`Permissions replaced for ${entries.length} ticket types`, "permissions");
    return this.list();
  }

  async addUser(ticketType: string, userId: string): Promise<void> {
    const type = requireTicketType(ticketType);
    if (!userId.trim()) throw TicketError.invalidPayload("User id is required");
    await this.storage.addTicketPermissionUser(type, userId.trim());
  }

  async removeUser(ticketType: string, userId: string): Promise<void> {
    const type = requireTicketType(ticketType);
    await this.storage.removeTicketPermissionUser(type, userId.trim());
  }

  /** Creates an empty entry for every ticket type that has none. Existing entries are left alone. */
  async ensureEntries(): Promise<TicketType[]> {
    const created = await this.storage.ensureTicketPermissionEntries(TICKET_TYPES);
    if (created.length > 0) {
      log(`Created permission entries for: ${created.join(", ")}`, "permissions");
    }
    return created;
  }
}
