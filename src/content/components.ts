import type {
  ComponentKind,
  ComponentStats,
  FuelKind,
  TieredFamily,
  UntieredFamily,
} from '../core/types.js';

// ─── Fuel grades ───────────────────────────────────────────────────────────

export interface FuelDefinition {
  kind: FuelKind;
  /** Grade number used in canonical names (Fuel<grade>-1) */
  grade: number;
  displayName: string;
  energyPerPulse: number;
  heatPerPulse: number;
  maxDurability: number;
  pulsesProduced: number;
}

export const FUEL_DEFINITIONS: Record<FuelKind, FuelDefinition> = {
  uranium:    { kind: 'uranium',    grade: 1,  displayName: 'Uranium',    energyPerPulse: 1.0,  heatPerPulse: 1.0,  maxDurability: 120, pulsesProduced: 1 },
  plutonium:  { kind: 'plutonium',  grade: 2,  displayName: 'Plutonium',  energyPerPulse: 1.5,  heatPerPulse: 1.6,  maxDurability: 180, pulsesProduced: 1 },
  thorium:    { kind: 'thorium',    grade: 3,  displayName: 'Thorium',    energyPerPulse: 2.2,  heatPerPulse: 2.4,  maxDurability: 240, pulsesProduced: 1 },
  seaborgium: { kind: 'seaborgium', grade: 4,  displayName: 'Seaborgium', energyPerPulse: 3.5,  heatPerPulse: 3.8,  maxDurability: 300, pulsesProduced: 1 },
  dolorium:   { kind: 'dolorium',   grade: 5,  displayName: 'Dolorium',   energyPerPulse: 5.0,  heatPerPulse: 5.5,  maxDurability: 360, pulsesProduced: 1 },
  nefastium:  { kind: 'nefastium',  grade: 6,  displayName: 'Nefastium',  energyPerPulse: 8.0,  heatPerPulse: 8.8,  maxDurability: 420, pulsesProduced: 1 },
  protium:    { kind: 'protium',    grade: 7,  displayName: 'Protium',    energyPerPulse: 9.0,  heatPerPulse: 9.0,  maxDurability: 500, pulsesProduced: 1 },
  monastium:  { kind: 'monastium',  grade: 8,  displayName: 'Monastium',  energyPerPulse: 12.0, heatPerPulse: 10.0, maxDurability: 600, pulsesProduced: 1 },
  kymium:     { kind: 'kymium',     grade: 9,  displayName: 'Kymium',     energyPerPulse: 16.0, heatPerPulse: 16.0, maxDurability: 700, pulsesProduced: 1 },
  discurrium: { kind: 'discurrium', grade: 10, displayName: 'Discurrium', energyPerPulse: 24.0, heatPerPulse: 26.0, maxDurability: 800, pulsesProduced: 4 },
  stavrium:   { kind: 'stavrium',   grade: 11, displayName: 'Stavrium',   energyPerPulse: 32.0, heatPerPulse: 34.0, maxDurability: 900, pulsesProduced: 1 },
};

export const FUEL_ORDER: FuelKind[] = [
  'uranium',
  'plutonium',
  'thorium',
  'seaborgium',
  'dolorium',
  'nefastium',
  'protium',
  'monastium',
  'kymium',
  'discurrium',
  'stavrium',
];

// ─── Tiered families ───────────────────────────────────────────────────────

/** Per-tier coefficients; every listed stat scales linearly with tier. */
export type TierCoefficients = Partial<ComponentStats>;

export interface TieredDefinition {
  family: TieredFamily;
  /** Canonical name prefix (Plating saves as "Plate") */
  namePrefix: string;
  displayName: string;
  perTier: TierCoefficients;
}

export const TIERED_DEFINITIONS: Record<TieredFamily, TieredDefinition> = {
  vent: {
    family: 'vent',
    namePrefix: 'Vent',
    displayName: 'Heat Vent',
    perTier: { heatCapacity: 20, selfVentRate: 1.2, reactorVentRate: 0.6 },
  },
  coolant: {
    family: 'coolant',
    namePrefix: 'Coolant',
    displayName: 'Coolant Cell',
    perTier: { heatCapacity: 45, coolantAbsorbRate: 0.75, reactorHeatCapacityIncrease: 120 },
  },
  capacitor: {
    family: 'capacitor',
    namePrefix: 'Capacitor',
    displayName: 'Capacitor',
    perTier: { heatCapacity: 30, reactorPowerCapacityIncrease: 60 },
  },
  reflector: {
    family: 'reflector',
    namePrefix: 'Reflector',
    displayName: 'Neutron Reflector',
    perTier: { maxDurability: 100, reflectorBonusPct: 0.1 },
  },
  plating: {
    family: 'plating',
    namePrefix: 'Plate',
    displayName: 'Reactor Plating',
    perTier: { reactorHeatCapacityIncrease: 250 },
  },
  inlet: {
    family: 'inlet',
    namePrefix: 'Inlet',
    displayName: 'Heat Inlet',
    perTier: { heatCapacity: 10, reactorVentRate: 0.8 },
  },
  outlet: {
    family: 'outlet',
    namePrefix: 'Outlet',
    displayName: 'Heat Outlet',
    perTier: { heatCapacity: 10, reactorVentRate: 0.8 },
  },
  exchanger: {
    family: 'exchanger',
    namePrefix: 'Exchanger',
    displayName: 'Heat Exchanger',
    perTier: { heatCapacity: 15, coolantAbsorbRate: 0.6 },
  },
};

export const TIERED_FAMILIES: TieredFamily[] = [
  'vent',
  'coolant',
  'capacitor',
  'reflector',
  'plating',
  'inlet',
  'outlet',
  'exchanger',
];

// ─── Untiered specials ─────────────────────────────────────────────────────

export interface UntieredDefinition {
  family: UntieredFamily;
  name: string;
  displayName: string;
  stats: Partial<ComponentStats>;
}

export const UNTIERED_DEFINITIONS: Record<UntieredFamily, UntieredDefinition> = {
  clock: { family: 'clock', name: 'Clock', displayName: 'Clock', stats: {} },
  genericHeat: {
    family: 'genericHeat',
    name: 'GenericHeat',
    displayName: 'Heat Sink',
    stats: { heatCapacity: 10, selfVentRate: 0.5 },
  },
  genericPower: {
    family: 'genericPower',
    name: 'GenericPower',
    displayName: 'Power Bank',
    stats: { reactorPowerCapacityIncrease: 25 },
  },
  genericInfinity: { family: 'genericInfinity', name: 'GenericInfinity', displayName: 'Infinity Core', stats: {} },
};

export const UNTIERED_FAMILIES: UntieredFamily[] = ['clock', 'genericHeat', 'genericPower', 'genericInfinity'];

export const MAX_TIER = 255;

// ─── Stats derivation ──────────────────────────────────────────────────────

export function zeroStats(): ComponentStats {
  return {
    energyPerPulse: 0,
    heatPerPulse: 0,
    pulsesProduced: 0,
    maxDurability: 0,
    heatCapacity: 0,
    selfVentRate: 0,
    reactorVentRate: 0,
    coolantAbsorbRate: 0,
    reflectorBonusPct: 0,
    reactorPowerCapacityIncrease: 0,
    reactorHeatCapacityIncrease: 0,
  };
}

function scaleCoefficients(perTier: TierCoefficients, tier: number): Partial<ComponentStats> {
  const scaled: Partial<ComponentStats> = {};
  for (const key of Object.keys(perTier) as (keyof ComponentStats)[]) {
    scaled[key] = (perTier[key] ?? 0) * tier;
  }
  return scaled;
}

/** Built-in stats: a pure function of (kind, tier). */
export function builtinStats(kind: ComponentKind): ComponentStats {
  switch (kind.family) {
    case 'fuel': {
      const def = FUEL_DEFINITIONS[kind.fuel];
      return {
        ...zeroStats(),
        energyPerPulse: def.energyPerPulse,
        heatPerPulse: def.heatPerPulse,
        maxDurability: def.maxDurability,
        pulsesProduced: def.pulsesProduced,
      };
    }
    case 'vent':
    case 'coolant':
    case 'capacitor':
    case 'reflector':
    case 'plating':
    case 'inlet':
    case 'outlet':
    case 'exchanger':
      return { ...zeroStats(), ...scaleCoefficients(TIERED_DEFINITIONS[kind.family].perTier, kind.tier) };
    case 'clock':
    case 'genericHeat':
    case 'genericPower':
    case 'genericInfinity':
      return { ...zeroStats(), ...UNTIERED_DEFINITIONS[kind.family].stats };
  }
}

// ─── Canonical names ───────────────────────────────────────────────────────

export function canonicalName(kind: ComponentKind): string {
  switch (kind.family) {
    case 'fuel':
      return `Fuel${FUEL_DEFINITIONS[kind.fuel].grade}-1`;
    case 'vent':
    case 'coolant':
    case 'capacitor':
    case 'reflector':
    case 'plating':
    case 'inlet':
    case 'outlet':
    case 'exchanger':
      return `${TIERED_DEFINITIONS[kind.family].namePrefix}${kind.tier}`;
    case 'clock':
    case 'genericHeat':
    case 'genericPower':
    case 'genericInfinity':
      return UNTIERED_DEFINITIONS[kind.family].name;
  }
}

export function displayName(kind: ComponentKind): string {
  switch (kind.family) {
    case 'fuel':
      return FUEL_DEFINITIONS[kind.fuel].displayName;
    case 'vent':
    case 'coolant':
    case 'capacitor':
    case 'reflector':
    case 'plating':
    case 'inlet':
    case 'outlet':
    case 'exchanger':
      return `${TIERED_DEFINITIONS[kind.family].displayName} T${kind.tier}`;
    case 'clock':
    case 'genericHeat':
    case 'genericPower':
    case 'genericInfinity':
      return UNTIERED_DEFINITIONS[kind.family].displayName;
  }
}

const TIER_PATTERN = /^\d+$/;

function parseTier(text: string): number | null {
  if (!TIER_PATTERN.test(text)) return null;
  const tier = Number.parseInt(text, 10);
  return tier <= MAX_TIER ? tier : null;
}

function fuelFromName(name: string): FuelKind | null {
  if (!name.startsWith('Fuel')) return null;
  const grade = parseTier(name.slice('Fuel'.length).split('-')[0] ?? '');
  if (grade === null) return null;
  return FUEL_ORDER.find((f) => FUEL_DEFINITIONS[f].grade === grade) ?? null;
}

/** Alias prefixes accepted on parse, checked after the canonical ones. */
const PREFIX_ALIASES: { prefix: string; family: TieredFamily }[] = [{ prefix: 'Plating', family: 'plating' }];

/** Unknown names yield null; this never throws. */
export function kindFromName(name: string): ComponentKind | null {
  const trimmed = name.trim();
  if (trimmed.length === 0) return null;

  const fuel = fuelFromName(trimmed);
  if (fuel) return { family: 'fuel', fuel };

  const prefixes = [
    ...TIERED_FAMILIES.map((family) => ({ prefix: TIERED_DEFINITIONS[family].namePrefix, family })),
    ...PREFIX_ALIASES,
  ];
  for (const { prefix, family } of prefixes) {
    if (!trimmed.startsWith(prefix)) continue;
    const tier = parseTier(trimmed.slice(prefix.length));
    if (tier !== null) return { family, tier };
  }

  const untiered = UNTIERED_FAMILIES.find((family) => UNTIERED_DEFINITIONS[family].name === trimmed);
  return untiered ? { family: untiered } : null;
}

export function sameKind(a: ComponentKind, b: ComponentKind): boolean {
  return canonicalName(a) === canonicalName(b);
}
