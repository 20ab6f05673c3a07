import type {
  ComponentKind,
  GridCoord,
  GridError,
  PlacedComponent,
  Result,
  SimulationState,
} from '../core/types.js';
import { fail, ok } from '../core/types.js';
import { clearCell, clearGrid, createGrid, inBounds, placeCell, sameCoord } from '../core/grid.js';
import { createResourceStore } from '../core/resources.js';
import { BUILTIN_CATALOG, statsForKind, type ComponentCatalog } from '../content/catalog.js';

// ─── Configuration ──────────────────────────────────────────────────────────

export interface SimulationConfig {
  width: number;
  height: number;
  layers: number;
  basePowerCapacity: number;
  baseHeatCapacity: number;
  autoSellRatePerTick: number;
  passiveHeatDissipationPerTick: number;
  manualVentAmount: number;
  startingMoney: number;
}

export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  width: 19,
  height: 16,
  layers: 1,
  basePowerCapacity: 100,
  baseHeatCapacity: 1000,
  autoSellRatePerTick: 0,
  passiveHeatDissipationPerTick: 0,
  manualVentAmount: 1,
  startingMoney: 0,
};

// ─── Initial state ──────────────────────────────────────────────────────────

export function createSimulation(config: Partial<SimulationConfig> = {}): SimulationState {
  const cfg: SimulationConfig = { ...DEFAULT_SIMULATION_CONFIG, ...config };
  const resources = createResourceStore();
  // Starting funds are not earnings.
  resources.money = Math.max(0, cfg.startingMoney);

  return {
    resources,
    grid: createGrid(cfg.width, cfg.height, cfg.layers),
    components: [],
    paused: false,
    tickIndex: 0,
    nextComponentId: 1,
    maxPowerCapacity: cfg.basePowerCapacity,
    maxHeatCapacity: cfg.baseHeatCapacity,
    basePowerCapacity: cfg.basePowerCapacity,
    baseHeatCapacity: cfg.baseHeatCapacity,
    autoSellRatePerTick: cfg.autoSellRatePerTick,
    passiveHeatDissipationPerTick: cfg.passiveHeatDissipationPerTick,
    manualVentAmount: cfg.manualVentAmount,
    upgradeLevels: [],
    prestigeLevel: 0,
  };
}

/** Every field of the state is plain data, so a structured clone is a full copy. */
export function cloneState(state: SimulationState): SimulationState {
  return structuredClone(state);
}

export function createPlacedComponent(
  kind: ComponentKind,
  at: GridCoord,
  id: number,
  placedAtTick: number,
  catalog: ComponentCatalog = BUILTIN_CATALOG,
): PlacedComponent {
  const stats = statsForKind(catalog, kind);
  return {
    id,
    kind: { ...kind },
    coord: { ...at },
    placedAtTick,
    heat: 0,
    durability: stats.maxDurability,
    lastPower: 0,
    lastHeat: 0,
    pulseCount: 0,
    depleted: false,
    stats,
  };
}

// ─── Lookups & derived capacity ─────────────────────────────────────────────

export function componentAt(state: SimulationState, at: GridCoord): PlacedComponent | null {
  return state.components.find((c) => sameCoord(c.coord, at)) ?? null;
}

export function isFuel(component: PlacedComponent): boolean {
  return component.stats.energyPerPulse > 0;
}

/** Mutates in place: callers pass a state they own. */
export function recomputeCapacities(state: SimulationState): void {
  let power = state.basePowerCapacity;
  let heat = state.baseHeatCapacity;
  for (const c of state.components) {
    if (c.depleted) continue;
    power += c.stats.reactorPowerCapacityIncrease;
    heat += c.stats.reactorHeatCapacityIncrease;
  }
  state.maxPowerCapacity = power;
  state.maxHeatCapacity = heat;
}

/** Marks a component permanently inert. */
export function deplete(component: PlacedComponent): void {
  component.depleted = true;
  component.pulseCount = 0;
  component.lastPower = 0;
  component.lastHeat = 0;
}

// ─── Placement / removal ────────────────────────────────────────────────────

/** In-place placement; the public wrappers below clone first. */
export function placeInto(
  state: SimulationState,
  at: GridCoord,
  kind: ComponentKind,
  catalog: ComponentCatalog = BUILTIN_CATALOG,
): Result<PlacedComponent> {
  if (!inBounds(state.grid, at)) return fail<GridError>({ kind: 'out_of_bounds', coord: at });

  const id = state.nextComponentId;
  const placed = placeCell(state.grid, at, { kind: { ...kind }, componentId: id, placedTick: state.tickIndex });
  if (!placed.ok) return placed;

  state.components = state.components.filter((c) => !sameCoord(c.coord, at));
  const component = createPlacedComponent(kind, at, id, state.tickIndex, catalog);
  state.components.push(component);
  state.nextComponentId = id + 1;
  recomputeCapacities(state);
  return ok(component);
}

export function removeFrom(state: SimulationState, at: GridCoord): Result<void> {
  const cleared = clearCell(state.grid, at);
  if (!cleared.ok) return cleared;
  state.components = state.components.filter((c) => !sameCoord(c.coord, at));
  recomputeCapacities(state);
  return ok(undefined);
}

/**
 * Place `kind` at `at`, replacing any occupant. Returns a new state; the
 * input is never mutated.
 */
export function placeComponent(
  state: SimulationState,
  at: GridCoord,
  kind: ComponentKind,
  catalog: ComponentCatalog = BUILTIN_CATALOG,
): Result<SimulationState> {
  const next = cloneState(state);
  const result = placeInto(next, at, kind, catalog);
  return result.ok ? ok(next) : result;
}

/** Clearing an empty in-bounds cell succeeds without changes. */
export function removeComponent(state: SimulationState, at: GridCoord): Result<SimulationState> {
  const next = cloneState(state);
  const result = removeFrom(next, at);
  return result.ok ? ok(next) : result;
}

export function clearAllComponents(state: SimulationState): void {
  clearGrid(state.grid);
  state.components = [];
  recomputeCapacities(state);
}
