import type { ComponentKind, ComponentStats, TieredFamily } from '../core/types.js';
import {
  FUEL_ORDER,
  TIERED_FAMILIES,
  UNTIERED_FAMILIES,
  builtinStats,
  canonicalName,
  displayName,
  kindFromName,
} from './components.js';

// ─── Component catalog: canonical name → { kind, cost, stats } ────────────

export interface CatalogEntry {
  name: string;
  displayName: string;
  kind: ComponentKind;
  cost: number;
  stats: ComponentStats;
  description: string;
}

export interface ComponentCatalog {
  /** Keyed by canonical name */
  entries: Record<string, CatalogEntry>;
  /** Canonical names in shop order */
  order: string[];
}

/**
 * External definition record, as shipped in data/component-types.json.
 * Field names follow the game's data export.
 */
export interface ComponentDefinition {
  Name: string;
  Cost?: number;
  Description?: string;
  CellData?: {
    EnergyPerPulse?: number;
    HeatPerPulse?: number;
    PulsesPerCore?: number;
    NumberOfCores?: number;
  } | null;
  HeatData?: {
    SelfVentRate?: number;
    ReactorVentRate?: number;
    ReflectorBonus?: number;
  } | null;
  MaxDurability?: number | null;
  HeatCapacity?: number | null;
  ReactorHeatCapacityIncrease?: number | null;
  ReactorPowerCapacityIncrease?: number | null;
  /** Flag (or count): anything above zero marks the component as a reflector. */
  ReflectsPulses?: number | null;
}

export const BUILTIN_MAX_TIER = 6;

const FUEL_BASE_COST = 10;
const FUEL_COST_GROWTH = 12;

/** Base cost of tier 1; each further tier multiplies by TIER_COST_GROWTH. */
const TIERED_BASE_COST: Record<TieredFamily, number> = {
  vent: 50,
  coolant: 500,
  capacitor: 1_000,
  reflector: 1_500,
  plating: 1_000,
  inlet: 160,
  outlet: 160,
  exchanger: 160,
};
const TIER_COST_GROWTH = 20;

/** Bonus given to a flagged reflector whose record carries no ReflectorBonus. */
const DEFAULT_REFLECTOR_BONUS = 0.1;

const UNTIERED_COSTS: Record<string, number> = {
  Clock: 1e9,
  GenericHeat: 1e6,
  GenericPower: 1e6,
  GenericInfinity: 1e12,
};

function builtinEntry(kind: ComponentKind, cost: number): CatalogEntry {
  return {
    name: canonicalName(kind),
    displayName: displayName(kind),
    kind,
    cost,
    stats: builtinStats(kind),
    description: '',
  };
}

function buildBuiltinCatalog(): ComponentCatalog {
  const kinds: { kind: ComponentKind; cost: number }[] = [];

  FUEL_ORDER.forEach((fuel, i) => {
    kinds.push({ kind: { family: 'fuel', fuel }, cost: FUEL_BASE_COST * Math.pow(FUEL_COST_GROWTH, i) });
  });
  for (const family of TIERED_FAMILIES) {
    for (let tier = 1; tier <= BUILTIN_MAX_TIER; tier++) {
      kinds.push({
        kind: { family, tier },
        cost: TIERED_BASE_COST[family] * Math.pow(TIER_COST_GROWTH, tier - 1),
      });
    }
  }
  for (const family of UNTIERED_FAMILIES) {
    const kind: ComponentKind = { family };
    kinds.push({ kind, cost: UNTIERED_COSTS[canonicalName(kind)] ?? 0 });
  }

  const entries: Record<string, CatalogEntry> = {};
  const order: string[] = [];
  for (const { kind, cost } of kinds) {
    const entry = builtinEntry(kind, cost);
    entries[entry.name] = entry;
    order.push(entry.name);
  }
  return { entries, order };
}

export const BUILTIN_CATALOG: ComponentCatalog = buildBuiltinCatalog();

// ─── External overrides ────────────────────────────────────────────────────

function pick(value: number | null | undefined, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

/**
 * Map an external definition onto a catalog entry. Fields the record leaves
 * out keep their built-in values. Returns null when the name does not parse.
 */
export function definitionToEntry(def: ComponentDefinition): CatalogEntry | null {
  const kind = kindFromName(def.Name);
  if (!kind) return null;

  const base = BUILTIN_CATALOG.entries[canonicalName(kind)] ?? builtinEntry(kind, 0);
  const stats: ComponentStats = { ...base.stats };

  if (def.CellData) {
    stats.energyPerPulse = pick(def.CellData.EnergyPerPulse, stats.energyPerPulse);
    stats.heatPerPulse = pick(def.CellData.HeatPerPulse, stats.heatPerPulse);
    if (def.CellData.PulsesPerCore !== undefined || def.CellData.NumberOfCores !== undefined) {
      const cores = pick(def.CellData.NumberOfCores, 1);
      stats.pulsesProduced = pick(def.CellData.PulsesPerCore, stats.pulsesProduced) * cores;
    }
  }
  if (def.HeatData) {
    stats.selfVentRate = pick(def.HeatData.SelfVentRate, stats.selfVentRate);
    stats.reactorVentRate = pick(def.HeatData.ReactorVentRate, stats.reactorVentRate);
    stats.reflectorBonusPct = pick(def.HeatData.ReflectorBonus, stats.reflectorBonusPct);
  }
  stats.maxDurability = pick(def.MaxDurability, stats.maxDurability);
  stats.heatCapacity = pick(def.HeatCapacity, stats.heatCapacity);
  stats.reactorHeatCapacityIncrease = pick(def.ReactorHeatCapacityIncrease, stats.reactorHeatCapacityIncrease);
  stats.reactorPowerCapacityIncrease = pick(def.ReactorPowerCapacityIncrease, stats.reactorPowerCapacityIncrease);
  if (typeof def.ReflectsPulses === 'number' && Number.isFinite(def.ReflectsPulses)) {
    if (def.ReflectsPulses <= 0) stats.reflectorBonusPct = 0;
    else if (stats.reflectorBonusPct <= 0) stats.reflectorBonusPct = DEFAULT_REFLECTOR_BONUS;
  }

  return {
    name: canonicalName(kind),
    displayName: base.displayName,
    kind,
    cost: pick(def.Cost, base.cost),
    stats,
    description: def.Description ?? base.description,
  };
}

/**
 * Built-in entries, overridden (or extended) by external definitions.
 * Unparseable names are dropped; later definitions win.
 */
export function createCatalog(definitions: ComponentDefinition[] = []): ComponentCatalog {
  const entries: Record<string, CatalogEntry> = { ...BUILTIN_CATALOG.entries };
  const order = [...BUILTIN_CATALOG.order];

  for (const def of definitions) {
    const entry = definitionToEntry(def);
    if (!entry) continue;
    if (!(entry.name in entries)) order.push(entry.name);
    entries[entry.name] = entry;
  }
  return { entries, order };
}

export function catalogEntry(catalog: ComponentCatalog, name: string): CatalogEntry | null {
  const kind = kindFromName(name);
  if (!kind) return null;
  return catalog.entries[canonicalName(kind)] ?? null;
}

export function entryForKind(catalog: ComponentCatalog, kind: ComponentKind): CatalogEntry | null {
  return catalog.entries[canonicalName(kind)] ?? null;
}

/** Catalog override if present, else the built-in stat table. */
export function statsForKind(catalog: ComponentCatalog, kind: ComponentKind): ComponentStats {
  const entry = entryForKind(catalog, kind);
  return entry ? { ...entry.stats } : builtinStats(kind);
}

export function costForKind(catalog: ComponentCatalog, kind: ComponentKind): number {
  return entryForKind(catalog, kind)?.cost ?? 0;
}

export function listEntries(catalog: ComponentCatalog): CatalogEntry[] {
  return catalog.order.flatMap((name) => {
    const entry = catalog.entries[name];
    return entry ? [entry] : [];
  });
}
