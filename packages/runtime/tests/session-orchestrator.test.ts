import { describe, expect, it, vi } from "vitest";
import { type RuntimeResource, UnreachableError } from "@flotilla/core";
import {
  TEST_AGENT_ID,
  createFakeOrchestratorConfig,
  createFakeResources,
  sequentialIds,
} from "@flotilla/testing";
import {
  SessionOrchestrator,
  broadcastItems,
  closeResources,
  collectLifecycleResources,
  startResources,
} from "../src/index";

function buildOrchestrator(warmOnStart = false) {
  const resources = createFakeResources({ idFactory: sequentialIds() });
  const orchestrator = new SessionOrchestrator({
    config: createFakeOrchestratorConfig({ pool: { capacity: 3, warmOnStart } }),
    resources,
    poolInitialState: (slot) => ({ slot }),
  });
  return { orchestrator, resources };
}

describe("SessionOrchestrator", () => {
  it("warms the pool on start when configured", async () => {
    const { orchestrator, resources } = buildOrchestrator(true);
    const initialized: unknown[] = [];
    orchestrator.on("pool:initialized", (report) => initialized.push(report));

    await orchestrator.start();

    expect(initialized).toEqual([{ requested: 3, created: 3, failed: [] }]);
    expect(orchestrator.pool.stats().available).toBe(3);
    expect(resources.backend.sessionCount).toBe(3);
    const states = (await orchestrator.listSessions()).map((session) => session.state);
    expect(states).toEqual(expect.arrayContaining([{ slot: 0 }, { slot: 1 }, { slot: 2 }]));
    expect(resources.logger.logs.find((entry) => entry.msg === "Session orchestrator started")?.obj).toEqual({
      baseUrl: "http://fake-backend.local",
      concurrency: 4,
      poolCapacity: 3,
      maxAttempts: 3,
    });

    await orchestrator.close();
  });

  it("leaves the pool empty without warmOnStart", async () => {
    const { orchestrator, resources } = buildOrchestrator();

    await orchestrator.start();

    expect(orchestrator.pool.stats().empty).toBe(3);
    expect(resources.backend.callCount()).toBe(0);
    await orchestrator.close();
  });

  it("starts resources once and closes them after draining", async () => {
    const { orchestrator, resources } = buildOrchestrator(true);
    const start = vi.spyOn(resources.backend, "start");
    const close = vi.spyOn(resources.backend, "close");
    const drained: unknown[] = [];
    orchestrator.on("pool:drained", (report) => drained.push(report));

    await orchestrator.start();
    await orchestrator.start();
    const report = await orchestrator.close();

    expect(start).toHaveBeenCalledTimes(1);
    expect(close).toHaveBeenCalledTimes(1);
    expect(report).toEqual({ deleted: 3, failed: [] });
    expect(drained).toEqual([{ deleted: 3, failed: [] }]);
    expect(resources.backend.sessionCount).toBe(0);
  });

  it("counts sessions released during close", async () => {
    const { orchestrator, resources } = buildOrchestrator(true);
    await orchestrator.start();
    const busy = await orchestrator.pool.acquire();

    const closing = orchestrator.close();
    orchestrator.pool.release(busy);

    await expect(closing).resolves.toEqual({ deleted: 3, failed: [] });
    expect(resources.backend.sessionCount).toBe(0);
  });

  it("routes single calls through the shared limiter and retry policy", async () => {
    const { orchestrator, resources } = buildOrchestrator();
    const retries: unknown[] = [];
    orchestrator.on("call:retry", (notice) => retries.push(notice));
    await orchestrator.start();

    const session = await orchestrator.createSession({ user_name: "Ada" });
    resources.backend.failNext("message", () => new UnreachableError("blip"));
    const reply = await orchestrator.sendMessage(session, "hi");

    expect(session.agentId).toBe(TEST_AGENT_ID);
    expect(reply).toEqual({ text: "ack:hi" });
    expect(retries).toHaveLength(1);
    expect(retries[0]).toMatchObject({ label: "send message", attempt: 1, delayMs: 1 });
    await expect(orchestrator.getSession(session.id)).resolves.toMatchObject({ state: { user_name: "Ada" } });
    expect(orchestrator.chatUrl(session.id)).toBe("http://fake-backend.local/?session=s-1");

    await orchestrator.deleteSession(session.id);
    await expect(orchestrator.listSessions(TEST_AGENT_ID)).resolves.toEqual([]);
    expect(resources.telemetry.events.map((event) => event.operation)).toEqual([
      "create",
      "message",
      "message",
      "get",
      "delete",
      "list",
    ]);
    await orchestrator.close();
  });

  it("creates sessions for another agent when asked", async () => {
    const { orchestrator } = buildOrchestrator();

    const session = await orchestrator.createSession({}, "other-agent");

    expect(session.agentId).toBe("other-agent");
    expect(orchestrator.agentId).toBe(TEST_AGENT_ID);
  });

  it("emits batch:completed with the report", async () => {
    const { orchestrator, resources } = buildOrchestrator();
    resources.backend.seed("s-9", TEST_AGENT_ID);
    const reports: unknown[] = [];
    orchestrator.on("batch:completed", (report) => reports.push(report));

    const report = await orchestrator.runBatch(broadcastItems(["s-9"], "hello"));

    expect(report.succeeded).toBe(1);
    expect(reports).toEqual([report]);
  });
});

describe("runtime resource lifecycle", () => {
  function recorder(name: string, order: string[]): RuntimeResource {
    return {
      start: async () => {
        order.push(`start:${name}`);
      },
      close: async () => {
        order.push(`close:${name}`);
      },
    };
  }

  it("starts in order and closes in reverse", async () => {
    const order: string[] = [];
    const resources = [recorder("telemetry", order), recorder("backend", order), {}];

    await startResources(resources);
    await closeResources(resources);

    expect(order).toEqual(["start:telemetry", "start:backend", "close:backend", "close:telemetry"]);
  });

  it("collects each resource once", () => {
    const { backend, logger, telemetry } = createFakeResources();

    expect(collectLifecycleResources({ backend, logger, telemetry })).toEqual([telemetry, backend]);
    expect(collectLifecycleResources({ backend, logger })).toEqual([backend]);
  });
});
