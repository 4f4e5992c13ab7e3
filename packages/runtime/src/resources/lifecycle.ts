import { type RuntimeResource, type Logger, type SessionBackendPort, type TelemetrySinkPort } from "@flotilla/core";

export interface OrchestratorResources {
  backend: SessionBackendPort;
  logger: Logger;
  telemetry?: TelemetrySinkPort;
}

export function collectLifecycleResources(resources: OrchestratorResources): RuntimeResource[] {
  const ordered: Array<RuntimeResource | undefined> = [
    resources.telemetry,
    resources.backend
  ];

  const unique = new Set<RuntimeResource>();
  for (const candidate of ordered) {
    if (candidate) {
      unique.add(candidate);
    }
  }

  return [...unique];
}

export async function startResources(resources: RuntimeResource[]): Promise<void> {
  for (const resource of resources) {
    await resource.start?.();
  }
}

export async function closeResources(resources: RuntimeResource[]): Promise<void> {
  for (const resource of [...resources].reverse()) {
    await resource.close?.();
  }
}
