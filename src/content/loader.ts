import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { createCatalog, type ComponentCatalog, type ComponentDefinition } from './catalog.js';

export const DEFAULT_DEFINITIONS_PATH = fileURLToPath(
  new URL('../../data/component-types.json', import.meta.url),
);

// ─── Definition table parsing ──────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function parseDefinition(raw: unknown): ComponentDefinition | null {
  if (!isRecord(raw) || typeof raw['Name'] !== 'string') return null;

  const def: ComponentDefinition = { Name: raw['Name'] };
  const cost = optionalNumber(raw['Cost']);
  if (cost !== undefined) def.Cost = cost;
  if (typeof raw['Description'] === 'string') def.Description = raw['Description'];

  const cell = raw['CellData'];
  if (isRecord(cell)) {
    def.CellData = {
      EnergyPerPulse: optionalNumber(cell['EnergyPerPulse']),
      HeatPerPulse: optionalNumber(cell['HeatPerPulse']),
      PulsesPerCore: optionalNumber(cell['PulsesPerCore']),
      NumberOfCores: optionalNumber(cell['NumberOfCores']),
    };
  }
  const heat = raw['HeatData'];
  if (isRecord(heat)) {
    def.HeatData = {
      SelfVentRate: optionalNumber(heat['SelfVentRate']),
      ReactorVentRate: optionalNumber(heat['ReactorVentRate']),
    };
  }
  def.MaxDurability = optionalNumber(raw['MaxDurability']);
  def.HeatCapacity = optionalNumber(raw['HeatCapacity']);
  def.ReactorHeatCapacityIncrease = optionalNumber(raw['ReactorHeatCapacityIncrease']);
  def.ReactorPowerCapacityIncrease = optionalNumber(raw['ReactorPowerCapacityIncrease']);
  def.ReflectsPulses = optionalNumber(raw['ReflectsPulses']);
  return def;
}

/** Accepts either a bare array or a `{ components: [...] }` wrapper. */
export function parseComponentDefinitions(json: string): ComponentDefinition[] {
  const parsed: unknown = JSON.parse(json);
  const list = Array.isArray(parsed) ? parsed : isRecord(parsed) ? parsed['components'] : undefined;
  if (!Array.isArray(list)) {
    throw new Error('Component definition file must contain a components array');
  }
  return list.flatMap((raw: unknown) => {
    const def = parseDefinition(raw);
    return def ? [def] : [];
  });
}

// ─── File I/O ──────────────────────────────────────────────────────────────

export function loadComponentDefinitions(path = DEFAULT_DEFINITIONS_PATH): ComponentDefinition[] {
  if (!existsSync(path)) {
    console.warn(`[Catalog] No component definitions at ${path}; using built-in stats.`);
    return [];
  }
  try {
    return parseComponentDefinitions(readFileSync(path, 'utf8'));
  } catch (err) {
    console.error('[Catalog] Failed to load component definitions:', err);
    return [];
  }
}

export function loadCatalog(path = DEFAULT_DEFINITIONS_PATH): ComponentCatalog {
  return createCatalog(loadComponentDefinitions(path));
}
