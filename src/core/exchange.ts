import type { SimulationState } from './types.js';
import { coordKey, neighborCoords } from './grid.js';
import { addHeat, recordVentedHeat, withdrawHeat } from './resources.js';

// ─── Snapshot-then-commit heat exchange ────────────────────────────────────
//
// Each neighbour phase reads the component list as it stood at phase start,
// collects a list of transfers, and commits them in one pass. Iteration
// order therefore never changes the outcome.

/**
 * Component index, the reactor hull, freshly generated heat (no debit) or
 * the open air (vented, counted as dissipated).
 */
export type HeatEndpoint = number | 'hull' | 'source' | 'air';

export interface HeatTransfer {
  from: HeatEndpoint;
  to: HeatEndpoint;
  amount: number;
}

export interface TransferOutcome {
  /** Net heat that entered (+) or left (−) the hull */
  hullDelta: number;
  vented: number;
}

/**
 * For each component index, the indices of the components occupying its
 * in-layer axis neighbours. Rebuilt per tick rather than kept in sync.
 */
export function buildNeighborIndex(state: SimulationState): number[][] {
  const byCoord = new Map<string, number>();
  state.components.forEach((c, i) => byCoord.set(coordKey(c.coord), i));

  return state.components.map((c) =>
    neighborCoords(state.grid, c.coord).flatMap((n) => {
      const j = byCoord.get(coordKey(n));
      return j === undefined ? [] : [j];
    }),
  );
}

function available(state: SimulationState, endpoint: HeatEndpoint): number {
  if (endpoint === 'hull') return state.resources.heat;
  if (typeof endpoint === 'number') return state.components[endpoint]?.heat ?? 0;
  return Infinity;
}

/**
 * Scale every donor's transfers down proportionally when their sum exceeds
 * what the donor holds, so no buffer is asked for heat it does not have.
 */
export function limitOutflow(state: SimulationState, transfers: HeatTransfer[]): HeatTransfer[] {
  const outflow = new Map<HeatEndpoint, number>();
  for (const t of transfers) {
    outflow.set(t.from, (outflow.get(t.from) ?? 0) + t.amount);
  }

  return transfers.map((t) => {
    const total = outflow.get(t.from) ?? 0;
    const held = available(state, t.from);
    if (total <= held || total <= 0) return t;
    return { ...t, amount: t.amount * (held / total) };
  });
}

/**
 * Commit a batch of transfers. Receivers keep what fits their heat capacity;
 * the excess this batch brought in spills to the hull.
 */
export function applyTransfers(state: SimulationState, transfers: HeatTransfer[]): TransferOutcome {
  const delta = new Array<number>(state.components.length).fill(0);
  let hullIn = 0;
  let hullOut = 0;
  let vented = 0;

  for (const t of transfers) {
    if (!(t.amount > 0)) continue;

    if (typeof t.from === 'number') delta[t.from] -= t.amount;
    else if (t.from === 'hull') hullOut += t.amount;

    if (typeof t.to === 'number') delta[t.to] += t.amount;
    else if (t.to === 'hull') hullIn += t.amount;
    else if (t.to === 'air') vented += t.amount;
  }

  state.components.forEach((c, i) => {
    const d = delta[i] ?? 0;
    if (d === 0) return;
    let next = Math.max(0, c.heat + d);
    if (d > 0 && next > c.stats.heatCapacity) {
      const overflow = Math.min(d, next - c.stats.heatCapacity);
      next -= overflow;
      hullIn += overflow;
    }
    c.heat = next;
  });

  const hullDelta = hullIn - hullOut;
  if (hullDelta > 0) addHeat(state.resources, hullDelta);
  else if (hullDelta < 0) withdrawHeat(state.resources, -hullDelta);
  recordVentedHeat(state.resources, vented);

  return { hullDelta, vented };
}
