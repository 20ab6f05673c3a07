import type { GridCoord, GridError, SimulationState } from '../core/types.js';
import { compareCoords, inBounds } from '../core/grid.js';
import { restoreStore, storeTotals, type StoreTotals } from '../core/resources.js';
import { canonicalName, kindFromName } from '../content/components.js';
import { BUILTIN_CATALOG, type ComponentCatalog } from '../content/catalog.js';
import { clearAllComponents, cloneState, deplete, placeInto, recomputeCapacities } from '../state/reactorState.js';

export const SAVE_VERSION = 1;

// ─── Save record (version 1) ───────────────────────────────────────────────

export interface SaveComponent {
  name: string;
  heat: number;
  durability: number;
  depleted: boolean;
  x: number;
  y: number;
  z: number;
}

export interface SaveRecord {
  version: number;
  store: StoreTotals;
  upgradeLevels: number[];
  /** Mirrors store.heat */
  reactorHeat: number;
  /** Mirrors store.power */
  storedPower: number;
  depletedProtiumCount: number;
  paused: boolean;
  replaceMode: boolean;
  totalTicks: number;
  prestigeLevel: number;
  shopPage: number;
  selectedComponentIndex: number;
  /** Sorted by (z, y, x) */
  components: SaveComponent[];
}

export function emptyStoreTotals(): StoreTotals {
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
  };
}

/** Defaults applied to any field a save leaves out. */
export function defaultSaveRecord(): SaveRecord {
  return {
    version: SAVE_VERSION,
    store: emptyStoreTotals(),
    upgradeLevels: [],
    reactorHeat: 0,
    storedPower: 0,
    depletedProtiumCount: 0,
    paused: false,
    replaceMode: true,
    totalTicks: 0,
    prestigeLevel: 0,
    shopPage: 0,
    selectedComponentIndex: -1,
    components: [],
  };
}

// ─── Simulation → record ───────────────────────────────────────────────────

export function toSaveRecord(state: SimulationState, selectedIndex: number, shopPage: number): SaveRecord {
  const components = [...state.components]
    .sort((a, b) => compareCoords(a.coord, b.coord))
    .map((c) => ({
      name: canonicalName(c.kind),
      heat: c.heat,
      durability: c.durability,
      depleted: c.depleted,
      x: c.coord.x,
      y: c.coord.y,
      z: c.coord.z,
    }));

  return {
    ...defaultSaveRecord(),
    store: storeTotals(state.resources),
    upgradeLevels: [...state.upgradeLevels],
    reactorHeat: state.resources.heat,
    storedPower: state.resources.power,
    paused: state.paused,
    totalTicks: state.tickIndex,
    prestigeLevel: state.prestigeLevel,
    shopPage,
    selectedComponentIndex: selectedIndex,
    components,
  };
}

// ─── Record → simulation ───────────────────────────────────────────────────

export type SkipReason = 'negative_coord' | 'out_of_bounds' | 'unknown_name';

export interface SkippedEntry {
  entry: SaveComponent;
  reason: SkipReason;
}

export interface ApplySummary {
  placed: number;
  skipped: SkippedEntry[];
}

export type ApplyResult =
  | { ok: true; state: SimulationState; summary: ApplySummary }
  | { ok: false; error: GridError };

/**
 * Replace the simulation with the saved one. Entries that cannot be placed
 * (off-grid, negative or unknown) are skipped and reported, never fatal.
 * Returns a new state; the input is never mutated.
 */
export function applySaveRecord(
  state: SimulationState,
  record: SaveRecord,
  catalog: ComponentCatalog = BUILTIN_CATALOG,
): ApplyResult {
  const s = cloneState(state);
  restoreStore(s.resources, record.store);
  s.tickIndex = record.totalTicks;
  s.paused = record.paused;
  s.upgradeLevels = [...record.upgradeLevels];
  s.prestigeLevel = record.prestigeLevel;

  clearAllComponents(s);

  const summary: ApplySummary = { placed: 0, skipped: [] };
  for (const entry of record.components) {
    if (entry.x < 0 || entry.y < 0 || entry.z < 0) {
      summary.skipped.push({ entry, reason: 'negative_coord' });
      continue;
    }
    const kind = kindFromName(entry.name);
    if (!kind) {
      summary.skipped.push({ entry, reason: 'unknown_name' });
      continue;
    }
    const at: GridCoord = { x: entry.x, y: entry.y, z: entry.z };
    if (!inBounds(s.grid, at)) {
      summary.skipped.push({ entry, reason: 'out_of_bounds' });
      continue;
    }

    const placed = placeInto(s, at, kind, catalog);
    if (!placed.ok) {
      return { ok: false, error: { kind: 'placement_failed', coord: at, cause: placed.error.kind } };
    }

    const component = placed.value;
    component.heat = Math.max(0, entry.heat);
    component.durability = Math.max(0, entry.durability);
    // Components that never wear hold durability 0 for their whole life.
    const worn = component.stats.maxDurability > 0 && component.durability <= 0;
    if (entry.depleted || worn) deplete(component);
    summary.placed++;
  }

  recomputeCapacities(s);
  return { ok: true, state: s, summary };
}
