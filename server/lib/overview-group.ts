import { z } from "zod";
import type { IStorage } from "../storage";
import { TicketError } from "./errors";
import { log } from "./logger";

const memberList = z.array(z.string());

function normalizeMemberId(userId: string): string {
  const id = userId.trim();
  if (!id) throw TicketError.invalidPayload("User id is required");
  return id;
}

/**
 * Users who may read every ticket without being part of it. Membership
 * grants visibility only; it does not allow editing.
 */
export class OverviewGroup {
  constructor(private readonly storage: IStorage) {}

  list(): Promise<string[]> {
    return this.storage.getOverviewMemberIds();
  }

  async isMember(userId: string): Promise<boolean> {
    if (!userId.trim()) return false;
    return this.storage.isOverviewMember(userId.trim());
  }

  /** Returns false when the user was already a member. */
  async add(userId: string): Promise<boolean> {
    const id = normalizeMemberId(userId);
    const added = await this.storage.addOverviewMember(id);
    if (added) log(`User ${id} added to the ticket overview group`, "permissions");
    return added;
  }

  /** Returns false when the user was not a member. */
  async remove(userId: string): Promise<boolean> {
    const id = normalizeMemberId(userId);
    const removed = await this.storage.removeOverviewMember(id);
    if (removed) log(`User ${id} removed from the ticket overview group`, "permissions");
    return removed;
  }

  /** Blank ids are dropped and duplicates collapsed before the list is stored. */
  async replace(members: unknown): Promise<string[]> {
    const parsed = memberList.safeParse(members);
    if (!parsed.success) {
      throw TicketError.invalidPayload("Members must be a list of user ids");
    }

    const ids = Array.from(new Set(parsed.data.map((id) => id.trim()).filter((id) => id.length > 0)));
    await this.storage.replaceOverviewMembers(ids);
    log(`Ticket overview group replaced (${ids.length} members)`, "permissions");
    return this.list();
  }
}
