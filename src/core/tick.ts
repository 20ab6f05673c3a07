import type { PlacedComponent, SimulationState } from './types.js';
import {
  addMoney,
  addPower,
  beginTick,
  clampStore,
  dissipateHeat,
  drainPower,
} from './resources.js';
import { applyTransfers, buildNeighborIndex, limitOutflow, type HeatTransfer } from './exchange.js';
import { cloneState, deplete, isFuel, recomputeCapacities } from '../state/reactorState.js';

/** Share of a heat gradient a coolant closes per tick. */
export const COOLANT_TRANSFER_FACTOR = 0.25;
/** Share of hull heat above capacity shed per tick. */
export const EMERGENCY_DISSIPATION_FACTOR = 0.05;

function active(c: PlacedComponent | undefined): c is PlacedComponent {
  return c !== undefined && !c.depleted;
}

// ─── Fixed-step tick ───────────────────────────────────────────────────────

/**
 * Pure deterministic tick function.
 * Returns a brand-new SimulationState; never mutates the input.
 */
export function processTick(state: SimulationState): SimulationState {
  const s = cloneState(state);

  // ── 1. Reset deltas; a paused reactor stops here ──────────────────────
  beginTick(s.resources);
  if (s.paused) return s;

  // ── 2. Advance the clock ──────────────────────────────────────────────
  s.tickIndex = Math.min(s.tickIndex + 1, Number.MAX_SAFE_INTEGER);

  // ── 3. Capacities ─────────────────────────────────────────────────────
  recomputeCapacities(s);
  clampStore(s.resources, s.maxPowerCapacity);

  // Neighbour lists are by index and stay valid: nothing is added or
  // removed for the rest of the tick.
  const neighbors = buildNeighborIndex(s);

  distributePulses(s, neighbors);
  drainDurability(s, neighbors);
  generatePowerAndHeat(s, neighbors);
  diffuseCoolant(s, neighbors);

  // ── 8. Hull exchange, each pass against the previous pass's result ────
  ventFromHull(s);
  pullThroughInlets(s, neighbors);
  pushThroughOutlets(s, neighbors);
  selfVent(s);

  // ── 9. Passive sell ───────────────────────────────────────────────────
  addMoney(s.resources, drainPower(s.resources, s.autoSellRatePerTick));

  // ── 10. Passive dissipation ───────────────────────────────────────────
  const overflow = Math.max(0, s.resources.heat - s.maxHeatCapacity);
  dissipateHeat(
    s.resources,
    Math.max(0, s.passiveHeatDissipationPerTick) + overflow * EMERGENCY_DISSIPATION_FACTOR,
  );

  // ── 11. Final clamp ───────────────────────────────────────────────────
  clampStore(s.resources, s.maxPowerCapacity);

  return s;
}

// ─── 4. Pulses ─────────────────────────────────────────────────────────────

export function distributePulses(s: SimulationState, neighbors: number[][]): void {
  const counts = new Array<number>(s.components.length).fill(0);

  s.components.forEach((c, i) => {
    if (c.depleted || !isFuel(c)) return;
    const pulses = Math.max(1, c.stats.pulsesProduced);
    counts[i] = (counts[i] ?? 0) + pulses;
    for (const j of neighbors[i] ?? []) {
      if (active(s.components[j])) counts[j] = (counts[j] ?? 0) + pulses;
    }
  });

  s.components.forEach((c, i) => {
    c.pulseCount = c.depleted ? 0 : counts[i] ?? 0;
  });
}

// ─── 5. Durability ─────────────────────────────────────────────────────────

export function drainDurability(s: SimulationState, neighbors: number[][]): void {
  const pulses = s.components.map((c) => c.pulseCount);
  const activeFuel = s.components.map((c) => !c.depleted && isFuel(c));

  s.components.forEach((c, i) => {
    if (c.depleted || c.stats.maxDurability <= 0) return;

    let drain = isFuel(c) ? 1 : 0;
    if (c.stats.reflectorBonusPct > 0) {
      for (const j of neighbors[i] ?? []) {
        if (activeFuel[j]) drain += pulses[j] ?? 0;
      }
    }
    if (drain <= 0) return;

    c.durability = Math.max(0, c.durability - drain);
    if (c.durability <= 0) deplete(c);
  });
}

// ─── 6. Power & heat generation ────────────────────────────────────────────

export function generatePowerAndHeat(s: SimulationState, neighbors: number[][]): void {
  const transfers: HeatTransfer[] = [];
  let power = 0;

  s.components.forEach((c, i) => {
    if (c.depleted || !isFuel(c)) return;
    if (c.pulseCount <= 0) {
      c.lastPower = 0;
      c.lastHeat = 0;
      return;
    }

    let multiplier = 1;
    const receivers: number[] = [];
    for (const j of neighbors[i] ?? []) {
      const n = s.components[j];
      if (!active(n)) continue;
      if (n.stats.reflectorBonusPct > 0) multiplier += n.stats.reflectorBonusPct;
      if (n.stats.heatCapacity > 0) receivers.push(j);
    }

    const produced = c.pulseCount * c.stats.energyPerPulse * multiplier;
    const heat = c.pulseCount * c.pulseCount * c.stats.heatPerPulse;
    c.lastPower = produced;
    c.lastHeat = heat;
    power += produced;

    if (receivers.length === 0) {
      transfers.push({ from: 'source', to: 'hull', amount: heat });
      return;
    }
    const share = heat / receivers.length;
    for (const j of receivers) transfers.push({ from: 'source', to: j, amount: share });
  });

  addPower(s.resources, power);
  applyTransfers(s, transfers);
}

// ─── 7. Coolant diffusion ──────────────────────────────────────────────────

export function diffuseCoolant(s: SimulationState, neighbors: number[][]): void {
  const transfers: HeatTransfer[] = [];

  s.components.forEach((source, i) => {
    if (source.depleted || source.stats.coolantAbsorbRate <= 0 || source.stats.heatCapacity <= 0) return;
    for (const j of neighbors[i] ?? []) {
      const n = s.components[j];
      if (!active(n) || n.heat <= source.heat) continue;
      const amount = Math.min(
        COOLANT_TRANSFER_FACTOR * (n.heat - source.heat),
        source.stats.coolantAbsorbRate,
        n.heat,
      );
      transfers.push({ from: j, to: i, amount });
    }
  });

  applyTransfers(s, limitOutflow(s, transfers));
}

// ─── 8. Hull exchange ──────────────────────────────────────────────────────

export function ventFromHull(s: SimulationState): void {
  const transfers: HeatTransfer[] = [];
  s.components.forEach((c, i) => {
    if (c.depleted || c.kind.family !== 'vent') return;
    if (c.stats.heatCapacity <= 0 || c.stats.reactorVentRate <= 0) return;
    transfers.push({ from: 'hull', to: i, amount: c.stats.reactorVentRate });
  });
  applyTransfers(s, limitOutflow(s, transfers));
}

export function pullThroughInlets(s: SimulationState, neighbors: number[][]): void {
  const transfers: HeatTransfer[] = [];
  s.components.forEach((c, i) => {
    if (c.depleted || c.kind.family !== 'inlet' || c.stats.reactorVentRate <= 0) return;
    for (const j of neighbors[i] ?? []) {
      const n = s.components[j];
      if (!active(n) || n.heat <= 0) continue;
      transfers.push({ from: j, to: 'hull', amount: Math.min(c.stats.reactorVentRate, n.heat) });
    }
  });
  applyTransfers(s, limitOutflow(s, transfers));
}

export function pushThroughOutlets(s: SimulationState, neighbors: number[][]): void {
  const transfers: HeatTransfer[] = [];
  s.components.forEach((c, i) => {
    if (c.depleted || c.kind.family !== 'outlet' || c.stats.reactorVentRate <= 0) return;
    for (const j of neighbors[i] ?? []) {
      const n = s.components[j];
      if (!active(n) || n.stats.heatCapacity <= 0) continue;
      transfers.push({ from: 'hull', to: j, amount: c.stats.reactorVentRate });
    }
  });
  applyTransfers(s, limitOutflow(s, transfers));
}

export function selfVent(s: SimulationState): void {
  const transfers: HeatTransfer[] = [];
  s.components.forEach((c, i) => {
    if (c.depleted || c.stats.selfVentRate <= 0 || c.heat <= 0) return;
    transfers.push({ from: i, to: 'air', amount: Math.min(c.stats.selfVentRate, c.heat) });
  });
  applyTransfers(s, transfers);
}

// ─── Batch replay ──────────────────────────────────────────────────────────

export interface TickRunSummary {
  ticksSimulated: number;
  moneyEarned: number;
  powerProduced: number;
  heatDissipated: number;
}

/** Runs `count` ticks back to back; used by the CLI and the smoke script. */
export function processTicks(
  state: SimulationState,
  count: number,
): { newState: SimulationState; summary: TickRunSummary } {
  const before = state.resources;
  let current = state;
  const total = Number.isFinite(count) ? Math.max(0, Math.floor(count)) : 0;
  for (let i = 0; i < total; i++) {
    current = processTick(current);
  }

  return {
    newState: current,
    summary: {
      ticksSimulated: total,
      moneyEarned: current.resources.moneyEarnedThisGame - before.moneyEarnedThisGame,
      powerProduced: current.resources.powerProducedThisGame - before.powerProducedThisGame,
      heatDissipated: current.resources.heatDissipatedThisGame - before.heatDissipatedThisGame,
    },
  };
}
