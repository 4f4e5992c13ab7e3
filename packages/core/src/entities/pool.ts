import type { Session } from './session';

export type PoolSlotState = 'empty' | 'initializing' | 'available' | 'in_use';

/**
 * A pool-managed container for at most one Session.
 *
 *   empty ──fill──▶ initializing ──ok──▶ available ◀──release── in_use
 *     ▲                 │                   │ ▲                   │
 *     └────failed───────┘                   │ └──────acquire──────┘
 *     ▲                                     │
 *     └───────────────drain─────────────────┘
 */
export interface PoolSlot {
  readonly index: number;
  state: PoolSlotState;
  session: Session | null;
}

export interface PoolStats {
  capacity: number;
  empty: number;
  initializing: number;
  available: number;
  inUse: number;
  waiting: number;
  draining: boolean;
}

export interface SlotFailure {
  slot: number;
  error: { kind: string; message: string };
}

export interface PoolInitReport {
  requested: number;
  created: number;
  failed: SlotFailure[];
}

export interface PoolDrainReport {
  deleted: number;
  failed: SlotFailure[];
}
