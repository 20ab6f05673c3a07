import { describe, it, expect } from 'vitest';
import { coord, getCell, occupiedCount } from '../src/core/grid.js';
import { createCatalog } from '../src/content/catalog.js';
import {
  clearAllComponents,
  componentAt,
  createSimulation,
  placeComponent,
  removeComponent,
} from '../src/state/reactorState.js';
import type { ComponentKind, SimulationState } from '../src/core/types.js';

const uranium = { family: 'fuel', fuel: 'uranium' } as const;
const capacitor = { family: 'capacitor', tier: 2 } as const;
const plating = { family: 'plating', tier: 1 } as const;

function place(state: SimulationState, x: number, y: number, kind: Parameters<typeof placeComponent>[2]): SimulationState {
  const result = placeComponent(state, coord(x, y), kind);
  if (!result.ok) throw new Error(`placement failed at (${x}, ${y})`);
  return result.value;
}

describe('createSimulation', () => {
  it('uses the default 19×16×1 grid and base capacities', () => {
    const s = createSimulation();
    expect(s.grid.width).toBe(19);
    expect(s.grid.height).toBe(16);
    expect(s.grid.layers).toBe(1);
    expect(s.maxPowerCapacity).toBe(100);
    expect(s.maxHeatCapacity).toBe(1000);
    expect(s.tickIndex).toBe(0);
    expect(s.paused).toBe(false);
    expect(s.manualVentAmount).toBe(1);
  });

  it('starts with the configured money as funds, not earnings', () => {
    const s = createSimulation({ startingMoney: 25 });
    expect(s.resources.money).toBe(25);
    expect(s.resources.totalMoney).toBe(0);
  });
});

describe('placeComponent', () => {
  it('places a fresh component and never mutates the input', () => {
    const s0 = createSimulation({ width: 4, height: 4 });
    const s1 = place(s0, 1, 1, uranium);

    expect(s0.components).toHaveLength(0);
    expect(occupiedCount(s0.grid)).toBe(0);

    const c = componentAt(s1, coord(1, 1));
    expect(c?.id).toBe(1);
    expect(c?.durability).toBe(120);
    expect(c?.heat).toBe(0);
    expect(c?.depleted).toBe(false);
    expect(getCell(s1.grid, coord(1, 1))?.componentId).toBe(1);
  });

  it('replaces an existing occupant with a new id', () => {
    let s = createSimulation({ width: 4, height: 4 });
    s = place(s, 0, 0, uranium);
    s = place(s, 0, 0, capacitor);

    expect(s.components).toHaveLength(1);
    expect(componentAt(s, coord(0, 0))?.kind).toEqual(capacitor);
    expect(componentAt(s, coord(0, 0))?.id).toBe(2);
    expect(s.nextComponentId).toBe(3);
  });

  it('recomputes capacities from placed components', () => {
    let s = createSimulation({ width: 4, height: 4 });
    s = place(s, 0, 0, capacitor);
    s = place(s, 1, 0, plating);
    expect(s.maxPowerCapacity).toBe(100 + 120);
    expect(s.maxHeatCapacity).toBe(1000 + 250);
  });

  it('copies the kind so later changes to the caller’s object do not leak in', () => {
    const kind: ComponentKind = { family: 'capacitor', tier: 1 };
    const s = place(createSimulation({ width: 2, height: 2 }), 0, 0, kind);
    if (kind.family === 'capacitor') kind.tier = 5;
    expect(componentAt(s, coord(0, 0))?.kind).toEqual({ family: 'capacitor', tier: 1 });
    expect(getCell(s.grid, coord(0, 0))?.kind).toEqual({ family: 'capacitor', tier: 1 });
  });

  it('rejects an out-of-bounds coordinate', () => {
    const s = createSimulation({ width: 2, height: 2 });
    const result = placeComponent(s, coord(2, 0), uranium);
    expect(result).toEqual({ ok: false, error: { kind: 'out_of_bounds', coord: { x: 2, y: 0, z: 0 } } });
  });

  it('resolves stats through the given catalog', () => {
    const catalog = createCatalog([{ Name: 'Fuel1-1', MaxDurability: 5 }]);
    const result = placeComponent(createSimulation({ width: 2, height: 2 }), coord(0, 0), uranium, catalog);
    expect(result.ok && result.value.components[0]?.durability).toBe(5);
  });
});

describe('removeComponent', () => {
  it('clears both the grid cell and the list entry', () => {
    let s = createSimulation({ width: 3, height: 3 });
    s = place(s, 2, 2, capacitor);
    const result = removeComponent(s, coord(2, 2));
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.components).toHaveLength(0);
    expect(getCell(result.value.grid, coord(2, 2))).toBeNull();
    expect(result.value.maxPowerCapacity).toBe(100);
  });

  it('treats an empty cell as a no-op success', () => {
    const s = createSimulation({ width: 3, height: 3 });
    expect(removeComponent(s, coord(1, 1)).ok).toBe(true);
  });

  it('rejects an out-of-bounds coordinate', () => {
    const s = createSimulation({ width: 3, height: 3 });
    expect(removeComponent(s, coord(-1, 0)).ok).toBe(false);
  });
});

describe('clearAllComponents', () => {
  it('empties the grid and the list', () => {
    let s = createSimulation({ width: 3, height: 3 });
    s = place(s, 0, 0, uranium);
    s = place(s, 1, 0, capacitor);
    clearAllComponents(s);
    expect(s.components).toEqual([]);
    expect(occupiedCount(s.grid)).toBe(0);
    expect(s.maxPowerCapacity).toBe(100);
  });
});
