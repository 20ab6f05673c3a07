import type { StoreTotals } from '../core/resources.js';
import {
  SAVE_VERSION,
  defaultSaveRecord,
  emptyStoreTotals,
  type SaveComponent,
  type SaveRecord,
} from './saveRecord.js';

export type SaveFormatErrorCode = 'INVALID_JSON' | 'INVALID_PAYLOAD' | 'UNSUPPORTED_VERSION' | 'INVALID_BASE64';

export class SaveFormatError extends Error {
  readonly code: SaveFormatErrorCode;

  constructor(code: SaveFormatErrorCode, message: string) {
    super(message);
    this.name = 'SaveFormatError';
    this.code = code;
  }
}

// ─── Wire shape (snake_case, as exported by the game) ──────────────────────

const STORE_KEYS: Record<keyof StoreTotals, string> = {
  money: 'money',
  totalMoney: 'total_money',
  moneyEarnedThisGame: 'money_earned_this_game',
  power: 'power',
  totalPowerProduced: 'total_power_produced',
  powerProducedThisGame: 'power_produced_this_game',
  heat: 'heat',
  totalHeatDissipated: 'total_heat_dissipated',
  heatDissipatedThisGame: 'heat_dissipated_this_game',
  exoticParticles: 'exotic_particles',
  totalExoticParticles: 'total_exotic_particles',
};

const STORE_FIELDS: (keyof StoreTotals)[] = [
  'money',
  'totalMoney',
  'moneyEarnedThisGame',
  'power',
  'totalPowerProduced',
  'powerProducedThisGame',
  'heat',
  'totalHeatDissipated',
  'heatDissipatedThisGame',
  'exoticParticles',
  'totalExoticParticles',
];

function toWire(record: SaveRecord): Record<string, unknown> {
  const store: Record<string, number> = {};
  for (const field of STORE_FIELDS) store[STORE_KEYS[field]] = record.store[field];

  return {
    version: record.version,
    store,
    upgrade_levels: record.upgradeLevels,
    reactor_heat: record.reactorHeat,
    stored_power: record.storedPower,
    depleted_protium_count: record.depletedProtiumCount,
    paused: record.paused,
    replace_mode: record.replaceMode,
    total_ticks: record.totalTicks,
    prestige_level: record.prestigeLevel,
    shop_page: record.shopPage,
    selected_component_index: record.selectedComponentIndex,
    components: record.components.map((c) => ({
      name: c.name,
      heat: c.heat,
      durability: c.durability,
      depleted: c.depleted,
      x: c.x,
      y: c.y,
      z: c.z,
    })),
  };
}

// ─── Field readers: missing → default, wrong type → INVALID_PAYLOAD ────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(raw: Record<string, unknown>, key: string, fallback: number, path: string): number {
  const value = raw[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new SaveFormatError('INVALID_PAYLOAD', `${path}${key} must be a finite number`);
  }
  return value;
}

/** Counters and indices: safe integers no smaller than `min`. */
function readCount(raw: Record<string, unknown>, key: string, fallback: number, path: string, min = 0): number {
  const value = raw[key];
  if (value === undefined || value === null) return fallback;
  if (!isCount(value, min)) {
    throw new SaveFormatError('INVALID_PAYLOAD', `${path}${key} must be an integer >= ${min}`);
  }
  return value;
}

function isCount(value: unknown, min: number): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= min;
}

function readBoolean(raw: Record<string, unknown>, key: string, fallback: boolean, path: string): boolean {
  const value = raw[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'boolean') {
    throw new SaveFormatError('INVALID_PAYLOAD', `${path}${key} must be a boolean`);
  }
  return value;
}

function readString(raw: Record<string, unknown>, key: string, fallback: string, path: string): string {
  const value = raw[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'string') {
    throw new SaveFormatError('INVALID_PAYLOAD', `${path}${key} must be a string`);
  }
  return value;
}

function readArray(raw: Record<string, unknown>, key: string): unknown[] {
  const value = raw[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new SaveFormatError('INVALID_PAYLOAD', `${key} must be an array`);
  }
  return value;
}

function readStore(raw: unknown): StoreTotals {
  const store = emptyStoreTotals();
  if (raw === undefined || raw === null) return store;
  if (!isRecord(raw)) throw new SaveFormatError('INVALID_PAYLOAD', 'store must be an object');
  for (const field of STORE_FIELDS) {
    store[field] = readNumber(raw, STORE_KEYS[field], 0, 'store.');
  }
  return store;
}

function readComponent(raw: unknown, index: number): SaveComponent {
  const path = `components[${index}].`;
  if (!isRecord(raw)) throw new SaveFormatError('INVALID_PAYLOAD', `components[${index}] must be an object`);
  return {
    name: readString(raw, 'name', '', path),
    heat: readNumber(raw, 'heat', 0, path),
    durability: readNumber(raw, 'durability', 0, path),
    depleted: readBoolean(raw, 'depleted', false, path),
    x: readNumber(raw, 'x', 0, path),
    y: readNumber(raw, 'y', 0, path),
    z: readNumber(raw, 'z', 0, path),
  };
}

export function parseSaveRecord(raw: unknown): SaveRecord {
  if (!isRecord(raw)) throw new SaveFormatError('INVALID_PAYLOAD', 'Save payload must be an object');

  const defaults = defaultSaveRecord();
  const version = readCount(raw, 'version', SAVE_VERSION, '');
  if (version !== SAVE_VERSION) {
    throw new SaveFormatError('UNSUPPORTED_VERSION', `Unsupported save version ${version}`);
  }

  return {
    version,
    store: readStore(raw['store']),
    upgradeLevels: readArray(raw, 'upgrade_levels').map((level, i) => {
      if (!isCount(level, 0)) {
        throw new SaveFormatError('INVALID_PAYLOAD', `upgrade_levels[${i}] must be an integer >= 0`);
      }
      return level;
    }),
    reactorHeat: readNumber(raw, 'reactor_heat', defaults.reactorHeat, ''),
    storedPower: readNumber(raw, 'stored_power', defaults.storedPower, ''),
    depletedProtiumCount: readCount(raw, 'depleted_protium_count', defaults.depletedProtiumCount, ''),
    paused: readBoolean(raw, 'paused', defaults.paused, ''),
    replaceMode: readBoolean(raw, 'replace_mode', defaults.replaceMode, ''),
    totalTicks: readCount(raw, 'total_ticks', defaults.totalTicks, ''),
    prestigeLevel: readCount(raw, 'prestige_level', defaults.prestigeLevel, ''),
    shopPage: readCount(raw, 'shop_page', defaults.shopPage, ''),
    selectedComponentIndex: readCount(raw, 'selected_component_index', defaults.selectedComponentIndex, '', -1),
    components: readArray(raw, 'components').map(readComponent),
  };
}

// ─── JSON ──────────────────────────────────────────────────────────────────

export function encodeSaveJson(record: SaveRecord): string {
  return JSON.stringify(toWire(record), null, 2);
}

export function decodeSaveJson(text: string): SaveRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new SaveFormatError('INVALID_JSON', `Save is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseSaveRecord(parsed);
}

// ─── Base64 ────────────────────────────────────────────────────────────────

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export function exportSaveBase64(record: SaveRecord): string {
  return Buffer.from(JSON.stringify(toWire(record)), 'utf8').toString('base64');
}

export function importSaveBase64(text: string): SaveRecord {
  const trimmed = text.trim();
  if (trimmed.length === 0 || trimmed.length % 4 !== 0 || !BASE64_PATTERN.test(trimmed)) {
    throw new SaveFormatError('INVALID_BASE64', 'Save text is not valid base64');
  }

  let json: string;
  try {
    json = new TextDecoder('utf-8', { fatal: true }).decode(Buffer.from(trimmed, 'base64'));
  } catch {
    throw new SaveFormatError('INVALID_BASE64', 'Decoded save payload is not UTF-8');
  }
  return decodeSaveJson(json);
}

/** Accepts a raw JSON export or its base64 form. */
export function importSaveText(text: string): SaveRecord {
  const trimmed = text.trim();
  return trimmed.startsWith('{') ? decodeSaveJson(trimmed) : importSaveBase64(trimmed);
}
