import { describe, it, expect } from 'vitest';
import type { ComponentKind, PlacedComponent, SimulationState } from '../src/core/types.js';
import { coord } from '../src/core/grid.js';
import { addHeat, addPower } from '../src/core/resources.js';
import { diffuseCoolant, processTick, processTicks, ventFromHull } from '../src/core/tick.js';
import { buildNeighborIndex } from '../src/core/exchange.js';
import { createCatalog, type ComponentCatalog } from '../src/content/catalog.js';
import {
  cloneState,
  componentAt,
  createSimulation,
  placeComponent,
  removeComponent,
  type SimulationConfig,
} from '../src/state/reactorState.js';
import { setPaused } from '../src/state/actions.js';

const uranium: ComponentKind = { family: 'fuel', fuel: 'uranium' };

function build(
  config: Partial<SimulationConfig>,
  layout: [number, number, ComponentKind][],
  catalog?: ComponentCatalog,
): SimulationState {
  let s = createSimulation(config);
  for (const [x, y, kind] of layout) {
    const result = placeComponent(s, coord(x, y), kind, catalog);
    if (!result.ok) throw new Error(`placement failed at (${x}, ${y})`);
    s = result.value;
  }
  return s;
}

function at(s: SimulationState, x: number, y: number): PlacedComponent {
  const c = componentAt(s, coord(x, y));
  if (!c) throw new Error(`no component at (${x}, ${y})`);
  return c;
}

describe('processTick', () => {
  it('is deterministic: the same state produces an identical next state', () => {
    const s0 = build({ width: 4, height: 4 }, [[1, 1, uranium], [2, 1, { family: 'vent', tier: 1 }]]);
    expect(processTick(s0)).toEqual(processTick(s0));
  });

  it('stays deterministic over many ticks on independent copies', () => {
    const s0 = build({ width: 4, height: 3, autoSellRatePerTick: 1 }, [
      [0, 0, uranium],
      [1, 0, { family: 'reflector', tier: 1 }],
      [0, 1, { family: 'vent', tier: 1 }],
      [1, 1, { family: 'coolant', tier: 1 }],
      [2, 1, { family: 'inlet', tier: 1 }],
      [3, 1, { family: 'outlet', tier: 1 }],
      [3, 2, { family: 'capacitor', tier: 1 }],
    ]);
    let a = cloneState(s0);
    let b = cloneState(s0);
    for (let i = 0; i < 150; i++) {
      a = processTick(a);
      b = processTick(b);
      expect(a).toEqual(b);
    }
  });

  it('never mutates its input', () => {
    const s0 = build({ width: 3, height: 3 }, [[1, 1, uranium]]);
    const before = structuredClone(s0);
    processTick(s0);
    expect(s0).toEqual(before);
  });

  it('increments tickIndex by 1 per tick', () => {
    let s = createSimulation();
    s = processTick(s);
    expect(s.tickIndex).toBe(1);
    s = processTick(s);
    expect(s.tickIndex).toBe(2);
  });

  it('saturates tickIndex at the largest safe integer', () => {
    const s = { ...createSimulation(), tickIndex: Number.MAX_SAFE_INTEGER };
    expect(processTick(s).tickIndex).toBe(Number.MAX_SAFE_INTEGER);
  });

  it('does nothing but reset deltas while paused', () => {
    let s = build({ width: 3, height: 3 }, [[1, 1, uranium]]);
    s = processTick(s);
    s = setPaused(s, true);
    const next = processTick(s);
    expect(next.tickIndex).toBe(1);
    expect(next.resources.power).toBe(1);
    expect(next.resources.tickDeltas).toEqual({ money: 0, power: 0, heat: 0, exoticParticles: 0 });
    expect(at(next, 1, 1).durability).toBe(119);
  });

  it('clamps stored power to capacity', () => {
    const s = createSimulation();
    addPower(s.resources, 500);
    expect(processTick(s).resources.power).toBe(100);
  });

  it('keeps power within capacity every tick, including after a capacitor is removed', () => {
    let s = build({ width: 3, height: 1 }, [
      [0, 0, { family: 'fuel', fuel: 'discurrium' }],
      [2, 0, { family: 'capacitor', tier: 1 }],
    ]);
    const powers: number[] = [];
    for (let i = 0; i < 3; i++) {
      s = processTick(s);
      expect(s.resources.power).toBeGreaterThanOrEqual(0);
      expect(s.resources.power).toBeLessThanOrEqual(s.maxPowerCapacity);
      powers.push(s.resources.power);
    }
    expect(powers).toEqual([96, 160, 160]);

    const removed = removeComponent(s, coord(2, 0));
    if (!removed.ok) throw new Error('remove failed');
    s = processTick(removed.value);
    expect(s.maxPowerCapacity).toBe(100);
    expect(s.resources.power).toBe(100);
  });
});

describe('fuel, pulses and durability', () => {
  it('runs a single uranium cell', () => {
    const s = processTick(build({ width: 3, height: 3 }, [[1, 1, uranium]]));
    const fuel = at(s, 1, 1);
    expect(fuel.pulseCount).toBe(1);
    expect(fuel.durability).toBe(119);
    expect(fuel.lastPower).toBe(1);
    expect(fuel.lastHeat).toBe(1);
    expect(s.resources.power).toBe(1);
    expect(s.resources.heat).toBe(1);
    expect(s.resources.tickDeltas.power).toBe(1);
  });

  it('boosts power with an adjacent reflector and wears it by the fuel pulses', () => {
    const s = processTick(build({ width: 3, height: 1 }, [[0, 0, uranium], [1, 0, { family: 'reflector', tier: 1 }]]));
    expect(s.resources.power).toBeCloseTo(1.1, 10);
    expect(at(s, 1, 0).durability).toBe(99);
    expect(at(s, 1, 0).pulseCount).toBe(1);
    expect(at(s, 0, 0).durability).toBe(119);
  });

  it('gives adjacent fuel cells each other’s pulses, whatever the placement order', () => {
    const a = processTick(build({ width: 3, height: 1 }, [[0, 0, uranium], [1, 0, uranium]]));
    const b = processTick(build({ width: 3, height: 1 }, [[1, 0, uranium], [0, 0, uranium]]));
    for (const s of [a, b]) {
      expect(at(s, 0, 0).pulseCount).toBe(2);
      expect(at(s, 1, 0).pulseCount).toBe(2);
      expect(at(s, 0, 0).lastHeat).toBe(4);
      expect(s.resources.power).toBe(4);
      expect(s.resources.heat).toBe(8);
    }
  });

  it('depletes uranium exactly on tick 120', () => {
    const s0 = build({ width: 3, height: 3 }, [[1, 1, uranium]]);
    const { newState: s119 } = processTicks(s0, 119);
    expect(at(s119, 1, 1).depleted).toBe(false);
    expect(at(s119, 1, 1).durability).toBe(1);

    const s120 = processTick(s119);
    const fuel = at(s120, 1, 1);
    expect(fuel.depleted).toBe(true);
    expect(fuel.durability).toBe(0);
    expect(fuel.pulseCount).toBe(0);
    expect(fuel.lastPower).toBe(0);
    expect(s120.resources.totalPowerProduced).toBe(119);

    const s121 = processTick(s120);
    expect(s121.resources.tickDeltas.power).toBe(0);
    expect(s121.components).toHaveLength(1);
  });

  it('drops a reflector bonus the tick the reflector wears out', () => {
    const catalog = createCatalog([{ Name: 'Reflector1', MaxDurability: 1 }]);
    const s = processTick(
      build({ width: 2, height: 1 }, [[0, 0, uranium], [1, 0, { family: 'reflector', tier: 1 }]], catalog),
    );
    expect(at(s, 1, 0).depleted).toBe(true);
    expect(s.resources.power).toBe(1);
  });

  it('emits four pulses from discurrium and spills heat past a receiver’s capacity', () => {
    const s = processTick(
      build({ width: 2, height: 1 }, [[0, 0, { family: 'fuel', fuel: 'discurrium' }], [1, 0, { family: 'capacitor', tier: 1 }]]),
    );
    expect(at(s, 0, 0).pulseCount).toBe(4);
    expect(at(s, 0, 0).lastHeat).toBe(416);
    expect(s.resources.power).toBe(96);
    expect(at(s, 1, 0).heat).toBe(30);
    expect(s.resources.heat).toBe(386);
  });
});

describe('heat movement', () => {
  it('splits fuel heat among neighbours that can hold it', () => {
    const s = processTick(
      build({ width: 3, height: 1 }, [
        [0, 0, { family: 'vent', tier: 1 }],
        [1, 0, uranium],
        [2, 0, { family: 'capacitor', tier: 1 }],
      ]),
    );
    expect(at(s, 2, 0).heat).toBe(0.5);
    // The vent received 0.5 and vented all of it.
    expect(at(s, 0, 0).heat).toBe(0);
    expect(s.resources.heat).toBe(0);
    expect(s.resources.totalHeatDissipated).toBe(0.5);
  });

  it('vents hull heat through a tier-2 vent and sells power', () => {
    const s0 = build({ width: 3, height: 3, autoSellRatePerTick: 2 }, [[0, 0, { family: 'vent', tier: 2 }]]);
    addHeat(s0.resources, 10);
    addPower(s0.resources, 5);

    const s = processTick(s0);
    expect(s.resources.money).toBe(2);
    expect(s.resources.power).toBe(3);
    expect(s.resources.heat).toBeCloseTo(8.8, 10);
    expect(s.resources.totalHeatDissipated).toBeCloseTo(1.2, 10);
    expect(at(s, 0, 0).heat).toBeCloseTo(0, 10);
  });

  it('lets a coolant cell draw a quarter of the gradient up to its rate', () => {
    const s0 = build({ width: 2, height: 1 }, [[0, 0, { family: 'coolant', tier: 1 }], [1, 0, { family: 'vent', tier: 1 }]]);
    at(s0, 1, 0).heat = 8;

    const s = processTick(s0);
    expect(at(s, 0, 0).heat).toBe(0.75);
    // 8 − 0.75 to the coolant, then 1.2 vented.
    expect(at(s, 1, 0).heat).toBeCloseTo(6.05, 10);
  });

  it('spills coolant intake above its capacity into the hull', () => {
    const catalog = createCatalog([{ Name: 'Coolant1', HeatCapacity: 2 }]);
    const s = build(
      { width: 2, height: 1 },
      [[0, 0, { family: 'coolant', tier: 1 }], [1, 0, { family: 'vent', tier: 1 }]],
      catalog,
    );
    at(s, 0, 0).heat = 1.5;
    at(s, 1, 0).heat = 10;

    diffuseCoolant(s, buildNeighborIndex(s));
    expect(at(s, 0, 0).heat).toBe(2);
    expect(at(s, 1, 0).heat).toBe(9.25);
    expect(s.resources.heat).toBe(0.25);
  });

  it('returns hull heat a nearly full vent cannot hold', () => {
    const catalog = createCatalog([{ Name: 'Vent1', HeatData: { ReactorVentRate: 0.5 } }]);
    const s = build({ width: 2, height: 1 }, [[0, 0, { family: 'vent', tier: 1 }]], catalog);
    at(s, 0, 0).heat = 19.75;
    addHeat(s.resources, 10);

    ventFromHull(s);
    expect(at(s, 0, 0).heat).toBe(20);
    expect(s.resources.heat).toBe(9.75);
    expect(s.resources.totalHeatDissipated).toBe(0);
  });

  it('leaves a full vent and the hull as they were', () => {
    const catalog = createCatalog([{ Name: 'Vent1', HeatData: { ReactorVentRate: 0.5 } }]);
    const s = build({ width: 2, height: 1 }, [[0, 0, { family: 'vent', tier: 1 }]], catalog);
    at(s, 0, 0).heat = 20;
    addHeat(s.resources, 10);

    ventFromHull(s);
    expect(at(s, 0, 0).heat).toBe(20);
    expect(s.resources.heat).toBe(10);
  });

  it('pulls neighbour heat into the hull through an inlet', () => {
    const s0 = build({ width: 2, height: 1 }, [[0, 0, { family: 'vent', tier: 1 }], [1, 0, { family: 'inlet', tier: 1 }]]);
    at(s0, 0, 0).heat = 5;

    const s = processTick(s0);
    expect(s.resources.heat).toBeCloseTo(0.8, 10);
    expect(at(s, 0, 0).heat).toBeCloseTo(3, 10);
  });

  it('pushes hull heat out through an outlet, scaled to what the hull holds', () => {
    const s0 = build({ width: 3, height: 1 }, [
      [0, 0, { family: 'capacitor', tier: 1 }],
      [1, 0, { family: 'outlet', tier: 1 }],
      [2, 0, { family: 'capacitor', tier: 1 }],
    ]);
    addHeat(s0.resources, 1);

    const s = processTick(s0);
    expect(at(s, 0, 0).heat).toBeCloseTo(0.5, 10);
    expect(at(s, 2, 0).heat).toBeCloseTo(0.5, 10);
    expect(s.resources.heat).toBeCloseTo(0, 10);
    expect(s.resources.totalHeatDissipated).toBe(0);
  });

  it('sheds 5% of hull heat above capacity each tick', () => {
    const s0 = createSimulation();
    addHeat(s0.resources, 1100);
    const s = processTick(s0);
    expect(s.resources.heat).toBeCloseTo(1095, 10);
    expect(s.resources.totalHeatDissipated).toBeCloseTo(5, 10);
  });

  it('applies passive dissipation', () => {
    const s0 = createSimulation({ passiveHeatDissipationPerTick: 2 });
    addHeat(s0.resources, 3);
    expect(processTick(s0).resources.heat).toBe(1);
  });

  it('never lets heat or power go negative', () => {
    let s = build({ width: 3, height: 3, passiveHeatDissipationPerTick: 50, autoSellRatePerTick: 50 }, [
      [0, 0, uranium],
      [1, 0, { family: 'vent', tier: 3 }],
      [1, 1, { family: 'coolant', tier: 2 }],
      [2, 1, { family: 'inlet', tier: 1 }],
    ]);
    for (let i = 0; i < 30; i++) {
      s = processTick(s);
      expect(s.resources.heat).toBeGreaterThanOrEqual(0);
      expect(s.resources.power).toBeGreaterThanOrEqual(0);
      expect(s.resources.power).toBeLessThanOrEqual(s.maxPowerCapacity);
      for (const c of s.components) expect(c.heat).toBeGreaterThanOrEqual(0);
    }
  });
});

describe('processTicks', () => {
  it('summarises a batch of ticks', () => {
    const s0 = build({ width: 3, height: 3, autoSellRatePerTick: 1 }, [[1, 1, uranium]]);
    const { newState, summary } = processTicks(s0, 10);
    expect(newState.tickIndex).toBe(10);
    expect(summary).toEqual({ ticksSimulated: 10, moneyEarned: 10, powerProduced: 10, heatDissipated: 0 });
  });

  it('treats a negative, fractional or non-numeric count as whole ticks no lower than zero', () => {
    const s0 = createSimulation();
    expect(processTicks(s0, Number.NaN).summary.ticksSimulated).toBe(0);
    expect(processTicks(s0, -3).summary.ticksSimulated).toBe(0);
    expect(processTicks(s0, 2.9).newState.tickIndex).toBe(2);
  });
});
