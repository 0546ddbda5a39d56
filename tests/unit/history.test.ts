import type { HistoryEvent } from "@shared/schema";
import { HistoryLog, sortHistory } from "../../server/lib/history";
import { FIXED_NOW, insertTicket, steppingClock } from "../helpers/fixtures";
import { MemStorage } from "../helpers/mem-storage";

function event(action: string, timestamp: string): HistoryEvent {
  return { timestamp, actor: { id: "u-1", name: "User One", type: "user" }, action, details: {} };
}

describe("HistoryLog", () => {
  let storage: MemStorage;

  beforeEach(() => {
    storage = new MemStorage();
  });

  it("appends events with the actor and details given", async () => {
    const history = new HistoryLog(storage, () => FIXED_NOW);
    const ticket = await insertTicket(storage);

    const appended = await history.append(ticket.id, null, "System", "system", "ticket_archived", { reason: "manual" });

    expect(appended).toEqual({
      timestamp: FIXED_NOW.toISOString(),
      actor: { id: null, name: "System", type: "system" },
      action: "ticket_archived",
      details: { reason: "manual" },
    });
    expect(await history.list(ticket.id)).toEqual([appended]);
  });

  it("lists in append order when timestamps increase", async () => {
    const history = new HistoryLog(storage, steppingClock());
    const ticket = await insertTicket(storage);

    await history.append(ticket.id, "u-1", "User One", "user", "first");
    await history.append(ticket.id, "u-1", "User One", "user", "second");
    await history.append(ticket.id, "u-1", "User One", "user", "third");

    expect((await history.list(ticket.id)).map((e) => e.action)).toEqual(["first", "second", "third"]);
  });

  it("sorts by timestamp and keeps append order for ties", () => {
    const events = [
      event("b", "2025-03-14T10:00:00.000Z"),
      event("a", "2025-03-14T09:00:00.000Z"),
      event("c", "2025-03-14T10:00:00.000Z"),
      event("d", "2025-03-14T10:00:00.000Z"),
    ];

    expect(sortHistory(events).map((e) => e.action)).toEqual(["a", "b", "c", "d"]);
    expect(events.map((e) => e.action)).toEqual(["b", "a", "c", "d"]);
  });

  it("keeps every event when appends race on one ticket", async () => {
    const history = new HistoryLog(storage, () => FIXED_NOW);
    const ticket = await insertTicket(storage);

    await Promise.all(
      Array.from({ length: 20 }, (_, i) => history.append(ticket.id, `u-${i}`, `User ${i}`, "user", `event_${i}`))
    );

    const stored = await storage.getTicket(ticket.id);
    expect(stored?.history).toHaveLength(20);
    expect(stored?.history.map((e) => e.action)).toEqual(Array.from({ length: 20 }, (_, i) => `event_${i}`));
    expect(stored?.version).toBe(21);
  });

  it("fails for a missing ticket", async () => {
    const history = new HistoryLog(storage);

    await expect(history.list(99)).rejects.toMatchObject({ code: "NotFound" });
    await expect(history.append(99, null, "System", "system", "noop")).rejects.toMatchObject({ code: "NotFound" });
  });
});
