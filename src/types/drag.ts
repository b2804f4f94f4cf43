import { Temporal } from 'temporal-polyfill';

export type DragKind = 'move' | 'resize-begin' | 'resize-end' | 'duplicate';

/**
 * snap: endpoints quantized to the grid
 * precision: continuous time, used while a modifier key is held
 */
export type DragPrecision = 'snap' | 'precision';

export interface DragMode {
  kind: DragKind;
  precision: DragPrecision;
}

export interface DragProposal {
  begin: Temporal.Instant;
  end: Temporal.Instant;
  valid: boolean;
}

export interface DragConfig {
  granularityMinutes: number;
  precisionQuantumMs: number;
  confineToDay: boolean;
}
