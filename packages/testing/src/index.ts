import {
  FakeSessionBackend,
  FakeLogger,
  FakeTelemetrySink,
  type FakeSessionBackendOptions,
} from "@flotilla/adapters";
import {
  type OrchestratorConfig,
  type SessionState,
  BACKEND_DEFAULTS,
} from "@flotilla/core";

export { FakeSessionBackend, FakeLogger, FakeTelemetrySink };

export const TEST_AGENT_ID = "test-agent";

export interface FakeOrchestratorResources {
  backend: FakeSessionBackend;
  logger: FakeLogger;
  telemetry: FakeTelemetrySink;
}

/**
 * Config tuned for tests: no backoff sleeps worth waiting for, a short call
 * timeout, and small capacities so contention is easy to provoke.
 */
export function createFakeOrchestratorConfig(
  overrides?: Partial<OrchestratorConfig>,
): OrchestratorConfig {
  return {
    baseUrl: BACKEND_DEFAULTS.BASE_URL,
    agentId: TEST_AGENT_ID,
    callTimeoutMs: 1_000,
    retry: {
      maxAttempts: 3,
      baseDelayMs: 1,
      multiplier: 2,
      maxDelayMs: 10,
      jitterMs: 0,
    },
    concurrency: 4,
    pool: { capacity: 3, warmOnStart: false },
    logging: { level: "silent", prettyPrint: false },
    ...overrides,
  };
}

export function createFakeResources(
  backendOptions?: FakeSessionBackendOptions,
): FakeOrchestratorResources {
  return {
    backend: new FakeSessionBackend(backendOptions),
    logger: new FakeLogger(),
    telemetry: new FakeTelemetrySink(),
  };
}

/** Sequential ids (`s-1`, `s-2`, ...) so assertions can name sessions. */
export function sequentialIds(prefix = "s"): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
}

/** Distinct, deterministic states for `count` sessions. */
export function createSessionStates(count: number): SessionState[] {
  return Array.from({ length: count }, (_, index): SessionState => ({
    persona: `persona-${index}`,
    turn: 0,
    tags: ["load-test"],
  }));
}
