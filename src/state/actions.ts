import type { GridCoord, PlacedComponent, SimulationState } from '../core/types.js';
import { inBounds } from '../core/grid.js';
import { addMoney, dissipateHeat, drainPower, restoreStore, spendMoney, storeTotals } from '../core/resources.js';
import { BUILTIN_CATALOG, catalogEntry, costForKind, type ComponentCatalog } from '../content/catalog.js';
import { cloneState, componentAt, createSimulation, isFuel, placeInto, removeFrom } from './reactorState.js';

/** Below this much money + power, an empty reactor may scrounge. */
export const SCROUNGE_THRESHOLD = 10;
export const SCROUNGE_AMOUNT = 1;

// ─── Component shop ────────────────────────────────────────────────────────

/**
 * Buy the named component into an empty cell.
 * Returns null if the name is unknown, the cell is taken or off-grid, or
 * money does not cover the cost.
 */
export function buyComponent(
  state: SimulationState,
  at: GridCoord,
  name: string,
  catalog: ComponentCatalog = BUILTIN_CATALOG,
): SimulationState | null {
  const entry = catalogEntry(catalog, name);
  if (!entry) return null;
  if (!inBounds(state.grid, at) || componentAt(state, at)) return null;
  if (state.resources.money < entry.cost) return null;

  const s = cloneState(state);
  spendMoney(s.resources, entry.cost);
  const placed = placeInto(s, at, entry.kind, catalog);
  return placed.ok ? s : null;
}

/**
 * Refund for a placed component: full cost when cold and fresh, falling off
 * with the square of heat and of wear. Fuel has no resale value.
 */
export function sellValue(component: PlacedComponent, catalog: ComponentCatalog = BUILTIN_CATALOG): number {
  if (isFuel(component)) return 0;
  const cost = costForKind(catalog, component.kind);
  const { heatCapacity, maxDurability } = component.stats;

  const heatRatio = heatCapacity > 0 ? clamp01(1 - component.heat / heatCapacity) : 1;
  const wearRatio = maxDurability > 0 ? clamp01(component.durability / maxDurability) : 1;
  return cost * heatRatio * heatRatio * wearRatio * wearRatio;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/** Returns null if the cell is empty or off-grid. */
export function sellComponent(
  state: SimulationState,
  at: GridCoord,
  catalog: ComponentCatalog = BUILTIN_CATALOG,
): SimulationState | null {
  const component = componentAt(state, at);
  if (!component) return null;

  const s = cloneState(state);
  const refund = sellValue(component, catalog);
  if (!removeFrom(s, at).ok) return null;
  addMoney(s.resources, refund);
  return s;
}

// ─── Power & heat buttons ──────────────────────────────────────────────────

/**
 * Sell every unit of stored power. A broke reactor with nothing placed
 * scrounges a single coin instead, so a new game can never stall.
 */
export function sellAllPower(state: SimulationState): SimulationState {
  const s = cloneState(state);
  const { money, power } = s.resources;

  if (s.components.length === 0 && money + power < SCROUNGE_THRESHOLD) {
    addMoney(s.resources, SCROUNGE_AMOUNT);
    return s;
  }
  addMoney(s.resources, drainPower(s.resources, power));
  return s;
}

/** Returns null when the hull is already cold. */
export function ventHeatManually(state: SimulationState): SimulationState | null {
  if (state.resources.heat <= 0) return null;
  const s = cloneState(state);
  dissipateHeat(s.resources, Math.min(s.resources.heat, s.manualVentAmount));
  return s;
}

// ─── Session control ───────────────────────────────────────────────────────

export function setPaused(state: SimulationState, paused: boolean): SimulationState {
  return { ...state, paused };
}

/**
 * Start over on the same grid size and rate settings. All-time totals and
 * the prestige level survive; everything counted "this game" is zeroed.
 */
export function resetGame(state: SimulationState): SimulationState {
  const fresh = createSimulation({
    width: state.grid.width,
    height: state.grid.height,
    layers: state.grid.layers,
    basePowerCapacity: state.basePowerCapacity,
    baseHeatCapacity: state.baseHeatCapacity,
    autoSellRatePerTick: state.autoSellRatePerTick,
    passiveHeatDissipationPerTick: state.passiveHeatDissipationPerTick,
    manualVentAmount: state.manualVentAmount,
  });

  const previous = storeTotals(state.resources);
  restoreStore(fresh.resources, {
    ...storeTotals(fresh.resources),
    totalMoney: previous.totalMoney,
    totalPowerProduced: previous.totalPowerProduced,
    totalHeatDissipated: previous.totalHeatDissipated,
    totalExoticParticles: previous.totalExoticParticles,
  });
  fresh.prestigeLevel = state.prestigeLevel;
  fresh.upgradeLevels = [...state.upgradeLevels];
  return fresh;
}
