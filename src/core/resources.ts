import type { ResourceStore, TickDeltas } from './types.js';

// ─── Resource store: guarded mutators only ─────────────────────────────────

export function emptyDeltas(): TickDeltas {
  return { money: 0, power: 0, heat: 0, exoticParticles: 0 };
}

export function createResourceStore(): ResourceStore {
  return {
    money: 0,
    totalMoney: 0,
    moneyEarnedThisGame: 0,
    power: 0,
    totalPowerProduced: 0,
    powerProducedThisGame: 0,
    heat: 0,
    totalHeatDissipated: 0,
    heatDissipatedThisGame: 0,
    exoticParticles: 0,
    totalExoticParticles: 0,
    tickDeltas: emptyDeltas(),
  };
}

export function beginTick(store: ResourceStore): void {
  store.tickDeltas = emptyDeltas();
}

export function addMoney(store: ResourceStore, amount: number): void {
  if (!(amount > 0)) return;
  store.money += amount;
  store.totalMoney += amount;
  store.moneyEarnedThisGame += amount;
  store.tickDeltas.money += amount;
}

/** Returns the amount actually spent (bounded by current money). */
export function spendMoney(store: ResourceStore, amount: number): number {
  if (!(amount > 0)) return 0;
  const spent = Math.min(store.money, amount);
  store.money -= spent;
  store.tickDeltas.money -= spent;
  return spent;
}

/** Negative amounts are internal adjustments; the result is floored at zero. */
export function addPower(store: ResourceStore, amount: number): void {
  if (amount === 0 || !Number.isFinite(amount)) return;
  const previous = store.power;
  store.power = Math.max(0, store.power + amount);
  const applied = store.power - previous;
  if (applied === 0) return;
  store.tickDeltas.power += applied;
  if (applied > 0) {
    store.totalPowerProduced += applied;
    store.powerProducedThisGame += applied;
  }
}

/** Negative amounts count toward the dissipated totals. */
export function addHeat(store: ResourceStore, amount: number): void {
  if (amount === 0 || !Number.isFinite(amount)) return;
  const previous = store.heat;
  store.heat = Math.max(0, store.heat + amount);
  const applied = store.heat - previous;
  if (applied === 0) return;
  store.tickDeltas.heat += applied;
  if (applied < 0) {
    store.totalHeatDissipated -= applied;
    store.heatDissipatedThisGame -= applied;
  }
}

export function addExoticParticles(store: ResourceStore, amount: number): void {
  if (!(amount > 0)) return;
  store.exoticParticles += amount;
  store.totalExoticParticles += amount;
  store.tickDeltas.exoticParticles += amount;
}

export function drainPower(store: ResourceStore, amount: number): number {
  if (!(amount > 0)) return 0;
  const drained = Math.min(store.power, amount);
  if (drained > 0) {
    store.power -= drained;
    store.tickDeltas.power -= drained;
  }
  return drained;
}

export function dissipateHeat(store: ResourceStore, amount: number): number {
  if (!(amount > 0)) return 0;
  const dissipated = Math.min(store.heat, amount);
  if (dissipated > 0) {
    store.heat -= dissipated;
    store.tickDeltas.heat -= dissipated;
    store.totalHeatDissipated += dissipated;
    store.heatDissipatedThisGame += dissipated;
  }
  return dissipated;
}

/**
 * Moves hull heat into component buffers. Not dissipation: only the tick
 * delta moves.
 */
export function withdrawHeat(store: ResourceStore, amount: number): number {
  if (!(amount > 0)) return 0;
  const withdrawn = Math.min(store.heat, amount);
  if (withdrawn > 0) {
    store.heat -= withdrawn;
    store.tickDeltas.heat -= withdrawn;
  }
  return withdrawn;
}

/** Heat vented from component buffers straight to the air. */
export function recordVentedHeat(store: ResourceStore, amount: number): void {
  if (!(amount > 0)) return;
  store.totalHeatDissipated += amount;
  store.heatDissipatedThisGame += amount;
}

// ─── Absolute restore (save loading) ───────────────────────────────────────

export type StoreTotals = Omit<ResourceStore, 'tickDeltas'>;

export function storeTotals(store: ResourceStore): StoreTotals {
  return {
    money: store.money,
    totalMoney: store.totalMoney,
    moneyEarnedThisGame: store.moneyEarnedThisGame,
    power: store.power,
    totalPowerProduced: store.totalPowerProduced,
    powerProducedThisGame: store.powerProducedThisGame,
    heat: store.heat,
    totalHeatDissipated: store.totalHeatDissipated,
    heatDissipatedThisGame: store.heatDissipatedThisGame,
    exoticParticles: store.exoticParticles,
    totalExoticParticles: store.totalExoticParticles,
  };
}

/**
 * Restores absolute state. Bypasses delta tracking: a load is not an
 * in-tick event.
 */
export function restoreStore(store: ResourceStore, totals: StoreTotals): void {
  Object.assign(store, totals);
}

// ─── Capacity clamp ────────────────────────────────────────────────────────

/** Drains power above `maxPower` and floors a negative heat reading. */
export function clampStore(store: ResourceStore, maxPower: number): void {
  if (store.power > maxPower) drainPower(store, store.power - Math.max(0, maxPower));
  if (store.heat < 0) store.heat = 0;
}
