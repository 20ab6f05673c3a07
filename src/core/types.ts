// ─── Shared type definitions ───────────────────────────────────────────────

export interface GridCoord {
  x: number;
  y: number;
  z: number;
}

export type FuelKind =
  | 'uranium'
  | 'plutonium'
  | 'thorium'
  | 'seaborgium'
  | 'dolorium'
  | 'nefastium'
  | 'protium'
  | 'monastium'
  | 'kymium'
  | 'discurrium'
  | 'stavrium';

export type TieredFamily =
  | 'vent'
  | 'coolant'
  | 'capacitor'
  | 'reflector'
  | 'plating'
  | 'inlet'
  | 'outlet'
  | 'exchanger';

export type UntieredFamily = 'clock' | 'genericHeat' | 'genericPower' | 'genericInfinity';

export type ComponentKind =
  | { family: 'fuel'; fuel: FuelKind }
  | { family: TieredFamily; tier: number }
  | { family: UntieredFamily };

export interface ComponentStats {
  energyPerPulse: number;
  heatPerPulse: number;
  /** Pulses emitted into the own cell and each neighbour (fuel only) */
  pulsesProduced: number;
  maxDurability: number;
  heatCapacity: number;
  /** Own buffer → air, per tick */
  selfVentRate: number;
  /** Hull ⇄ buffer exchange rate, per tick */
  reactorVentRate: number;
  coolantAbsorbRate: number;
  /** Fractional bonus: 0.1 = +10% power for each adjacent fuel */
  reflectorBonusPct: number;
  reactorPowerCapacityIncrease: number;
  reactorHeatCapacityIncrease: number;
}

export interface GridCell {
  kind: ComponentKind;
  componentId: number;
  placedTick: number;
}

export interface ReactorGrid {
  width: number;
  height: number;
  layers: number;
  /** Dense, indexed ((z * height + y) * width + x) */
  cells: (GridCell | null)[];
}

export interface PlacedComponent {
  id: number;
  kind: ComponentKind;
  coord: GridCoord;
  placedAtTick: number;
  heat: number;
  durability: number;
  lastPower: number;
  lastHeat: number;
  pulseCount: number;
  depleted: boolean;
  /** Resolved from the catalog at placement */
  stats: ComponentStats;
}

export interface TickDeltas {
  money: number;
  power: number;
  heat: number;
  exoticParticles: number;
}

export interface ResourceStore {
  money: number;
  totalMoney: number;
  moneyEarnedThisGame: number;
  power: number;
  totalPowerProduced: number;
  powerProducedThisGame: number;
  heat: number;
  totalHeatDissipated: number;
  heatDissipatedThisGame: number;
  exoticParticles: number;
  totalExoticParticles: number;
  tickDeltas: TickDeltas;
}

export interface SimulationState {
  resources: ResourceStore;
  grid: ReactorGrid;
  components: PlacedComponent[];
  paused: boolean;
  tickIndex: number;
  nextComponentId: number;
  maxPowerCapacity: number;
  maxHeatCapacity: number;
  basePowerCapacity: number;
  baseHeatCapacity: number;
  autoSellRatePerTick: number;
  passiveHeatDissipationPerTick: number;
  /** Heat removed by one press of the manual vent button */
  manualVentAmount: number;
  /** Carried through saves untouched */
  upgradeLevels: number[];
  prestigeLevel: number;
}

// ─── Results & errors ──────────────────────────────────────────────────────

export type GridError =
  | { kind: 'out_of_bounds'; coord: GridCoord }
  | { kind: 'placement_failed'; coord: GridCoord; cause: string };

export type Result<T, E = GridError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function describeGridError(error: GridError): string {
  const { x, y, z } = error.coord;
  switch (error.kind) {
    case 'out_of_bounds':
      return `coordinate (${x}, ${y}, ${z}) is outside the reactor grid`;
    case 'placement_failed':
      return `failed placing component at (${x}, ${y}, ${z}): ${error.cause}`;
  }
}
