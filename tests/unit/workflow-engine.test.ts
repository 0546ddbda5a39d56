import { canArchiveWorkflow } from "../../server/lib/workflow-engine";
import { createTestContext, insertTicket, itAgent, workflowOf, type TestContext } from "../helpers/fixtures";

describe("WorkflowEngine", () => {
  let ctx: TestContext;

  beforeEach(async () => {
    jest.spyOn(console, "log").mockImplementation(() => {});
    jest.spyOn(console, "warn").mockImplementation(() => {});
    ctx = await createTestContext();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  async function ticketWithWorkflow() {
    const { it, hr, fleet } = ctx.registry;
    return insertTicket(ctx.storage, {
      ticketType: "zugang-beantragen",
      status: "in_request",
      workflowState: workflowOf([
        [it.id, { name: "IT", required: true, status: "open" }],
        [hr.id, { name: "HR", required: true, status: "open" }],
        [fleet.id, { name: "Fleet", required: true, status: "open" }],
      ]),
    });
  }

  describe("setDepartmentStatus", () => {
    it("updates only the named department", async () => {
      const ticket = await ticketWithWorkflow();

      await expect(ctx.engine.setDepartmentStatus(ticket.id, ctx.registry.it.id, "done")).resolves.toBe(true);

      const statuses = await ctx.engine.getAllDepartmentStatuses(ticket.id);
      expect(statuses[ctx.registry.it.id].status).toBe("done");
      expect(statuses[ctx.registry.hr.id].status).toBe("open");
      expect(statuses[ctx.registry.fleet.id].status).toBe("open");
    });

    it("is a no-op when the status is already set", async () => {
      const ticket = await ticketWithWorkflow();
      await ctx.engine.setDepartmentStatus(ticket.id, ctx.registry.hr.id, "skipped");
      const writes = ctx.storage.ticketWrites;
      const before = await ctx.storage.getTicket(ticket.id);

      await expect(ctx.engine.setDepartmentStatus(ticket.id, ctx.registry.hr.id, "skipped")).resolves.toBe(false);

      expect(ctx.storage.ticketWrites).toBe(writes);
      expect(await ctx.storage.getTicket(ticket.id)).toEqual(before);
    });

    it("fails when the ticket has no workflow", async () => {
      const ticket = await insertTicket(ctx.storage);

      await expect(ctx.engine.setDepartmentStatus(ticket.id, ctx.registry.it.id, "done")).rejects.toMatchObject({
        code: "WorkflowNotInitialized",
      });
    });

    it("fails for a department outside the workflow", async () => {
      const ticket = await ticketWithWorkflow();

      await expect(ctx.engine.setDepartmentStatus(ticket.id, ctx.registry.marketing.id, "done")).rejects.toMatchObject({
        code: "UnknownDepartment",
      });
    });

    it("only accepts done, rejected and skipped", async () => {
      const ticket = await ticketWithWorkflow();

      await expect(ctx.engine.setDepartmentStatus(ticket.id, ctx.registry.it.id, "open")).rejects.toMatchObject({
        code: "InvalidPayload",
      });
      await expect(ctx.engine.setDepartmentStatus(ticket.id, ctx.registry.it.id, "in_progress")).rejects.toMatchObject({
        code: "InvalidPayload",
      });
    });

    it("fails for a missing ticket", async () => {
      await expect(ctx.engine.setDepartmentStatus(404, ctx.registry.it.id, "done")).rejects.toMatchObject({ code: "NotFound" });
    });
  });

  describe("canArchive", () => {
    it("is true only once every required department is done", async () => {
      const ticket = await ticketWithWorkflow();
      const { it, hr, fleet } = ctx.registry;

      await ctx.engine.setDepartmentStatus(ticket.id, it.id, "done");
      await ctx.engine.setDepartmentStatus(ticket.id, hr.id, "done");
      expect(await ctx.engine.canArchive(ticket.id)).toBe(false);

      await ctx.engine.setDepartmentStatus(ticket.id, fleet.id, "done");
      expect(await ctx.engine.canArchive(ticket.id)).toBe(true);
    });

    it("treats skipped required departments as blocking", () => {
      const state = workflowOf([
        ["a", { name: "A", required: true, status: "done" }],
        ["b", { name: "B", required: true, status: "skipped" }],
      ]);

      expect(canArchiveWorkflow(state)).toBe(false);
    });

    it("ignores departments that are not required", () => {
      const required = workflowOf([["a", { name: "A", required: true, status: "done" }]]);
      const statuses = ["open", "in_progress", "done", "skipped", "rejected"] as const;

      for (const status of statuses) {
        const withOptional = workflowOf([
          ["a", { name: "A", required: true, status: "done" }],
          ["b", { name: "B", required: false, status }],
        ]);
        expect(canArchiveWorkflow(withOptional)).toBe(canArchiveWorkflow(required));
      }
    });

    it("fails when the ticket has no workflow", async () => {
      const ticket = await insertTicket(ctx.storage);

      await expect(ctx.engine.canArchive(ticket.id)).rejects.toMatchObject({ code: "WorkflowNotInitialized" });
    });
  });

  describe("resetOnDescriptionChange", () => {
    it("reopens done departments and leaves the rest alone", async () => {
      const ticket = await ticketWithWorkflow();
      const { it, hr, fleet } = ctx.registry;
      await ctx.engine.setDepartmentStatus(ticket.id, it.id, "done");
      await ctx.engine.setDepartmentStatus(ticket.id, fleet.id, "skipped");

      await expect(ctx.engine.resetOnDescriptionChange(ticket.id)).resolves.toEqual([it.id]);

      expect(await ctx.engine.getDepartmentStatus(ticket.id, it.id)).toBe("open");
      expect(await ctx.engine.getDepartmentStatus(ticket.id, hr.id)).toBe("open");
      expect(await ctx.engine.getDepartmentStatus(ticket.id, fleet.id)).toBe("skipped");
    });

    it("writes nothing when no department was done", async () => {
      const ticket = await ticketWithWorkflow();
      const writes = ctx.storage.ticketWrites;

      await expect(ctx.engine.resetOnDescriptionChange(ticket.id)).resolves.toEqual([]);

      expect(ctx.storage.ticketWrites).toBe(writes);
    });

    it("does nothing for a ticket without workflow", async () => {
      const ticket = await insertTicket(ctx.storage);

      await expect(ctx.engine.resetOnDescriptionChange(ticket.id)).resolves.toEqual([]);
    });
  });

  describe("initialize", () => {
    it("builds and stores the workflow from the current registry", async () => {
      const ticket = await insertTicket(ctx.storage, { ticketType: "niederlassung-umzug", description: "{}" });

      const state = await ctx.engine.initialize(ticket.id);

      expect(Object.keys(state.departments)).toEqual([ctx.registry.facilities.id, ctx.registry.it.id]);
      expect((await ctx.storage.getTicket(ticket.id))?.workflowState).toEqual(state);
    });

    it("fails without writing when no department resolves", async () => {
      ctx.storage.departments.clear();
      const ticket = await insertTicket(ctx.storage);

      await expect(ctx.engine.initialize(ticket.id)).rejects.toMatchObject({ code: "WorkflowBuildFailed" });
      expect((await ctx.storage.getTicket(ticket.id))?.workflowState).toBeNull();
    });
  });

  describe("membership", () => {
    it("lists the workflow departments a user belongs to", async () => {
      const ticket = await ticketWithWorkflow();

      const mine = await ctx.engine.departmentsForUser(ticket.id, itAgent.id);

      expect(Object.keys(mine)).toEqual([ctx.registry.it.id]);
    });

    it("re-reads membership on every call", async () => {
      const ticket = await ticketWithWorkflow();
      await ctx.storage.removeDepartmentMember(ctx.registry.it.id, itAgent.id);

      expect(await ctx.engine.departmentsForUser(ticket.id, itAgent.id)).toEqual({});
      expect(await ctx.engine.isMember(ctx.registry.it.id, itAgent.id)).toBe(false);
    });

    it("queues in-request tickets still open for the user's departments", async () => {
      const pending = await ticketWithWorkflow();
      const finished = await ticketWithWorkflow();
      await ctx.engine.setDepartmentStatus(finished.id, ctx.registry.it.id, "done");

      const queue = await ctx.engine.departmentQueue(itAgent.id);

      expect(queue).toHaveLength(1);
      expect(queue[0].departmentId).toBe(ctx.registry.it.id);
      expect(queue[0].departmentName).toBe("IT");
      expect(queue[0].tickets.map((t) => t.id)).toEqual([pending.id]);
    });
  });
});
