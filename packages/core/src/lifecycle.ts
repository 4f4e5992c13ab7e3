/**
 * Anything the orchestrator may need to open before use and close at shutdown.
 * Both hooks are optional; adapters without connection state omit them.
 */
export interface RuntimeResource {
  start?(): Promise<void>;
  close?(): Promise<void>;
}
