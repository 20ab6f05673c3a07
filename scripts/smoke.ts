#!/usr/bin/env tsx
/**
 * Reactor Core — Smoke Test
 *
 * Simulates an automated session: scrounging seed money, buying fuel,
 * selling power, expanding with vents and reflectors, running fuel to
 * depletion and round-tripping the reactor through an exported save.
 *
 * Run with: npm run smoke
 */
import type { SimulationState } from '../src/core/types.js';
import { coord } from '../src/core/grid.js';
import { processTick } from '../src/core/tick.js';
import { canonicalName } from '../src/content/components.js';
import { catalogEntry, type ComponentCatalog } from '../src/content/catalog.js';
import { loadCatalog } from '../src/content/loader.js';
import { createSimulation } from '../src/state/reactorState.js';
import { buyComponent, sellAllPower, sellComponent } from '../src/state/actions.js';
import { exportSaveBase64, importSaveBase64 } from '../src/persistence/codec.js';
import { applySaveRecord, toSaveRecord } from '../src/persistence/saveRecord.js';

// ─── Helpers ───────────────────────────────────────────────────────────────

function fmt(n: number, dec = 0): string {
  if (n >= 1_000_000) return `${(n / 1_000_000).toFixed(1)}M`;
  if (n >= 1_000) return `${(n / 1_000).toFixed(1)}k`;
  return n.toFixed(dec);
}

function milestone(tick: number, msg: string): void {
  console.log(`[Tick ${String(tick).padStart(4)}] ★ MILESTONE: ${msg}`);
}

function fail(msg: string): never {
  console.error(`\n  ✗ SMOKE FAIL: ${msg}`);
  process.exit(1);
}

// ─── Build order ───────────────────────────────────────────────────────────

/** Planned layout, bought in order as money allows. */
const BUILD_ORDER: { name: string; x: number; y: number }[] = [
  { name: 'Fuel1-1', x: 2, y: 2 },
  { name: 'Vent1', x: 1, y: 2 },
  { name: 'Fuel1-1', x: 4, y: 2 },
  { name: 'Vent1', x: 5, y: 2 },
  { name: 'Fuel1-1', x: 3, y: 3 },
  { name: 'Reflector1', x: 3, y: 2 },
];

/** Swap every depleted fuel cell for a fresh one of the same kind. */
function refuel(state: SimulationState, catalog: ComponentCatalog): { state: SimulationState; refuelled: number } {
  let s = state;
  let refuelled = 0;
  for (const c of state.components) {
    if (!c.depleted || c.kind.family !== 'fuel') continue;
    const cleared = sellComponent(s, c.coord, catalog);
    if (!cleared) continue;
    const bought = buyComponent(cleared, c.coord, canonicalName(c.kind), catalog);
    if (!bought) continue;
    s = bought;
    refuelled++;
  }
  return { state: s, refuelled };
}

// ─── Main smoke run ────────────────────────────────────────────────────────

function runSmoke(): void {
  console.log('╔══════════════════════════════════════════════════════╗');
  console.log('║   REACTOR CORE — SMOKE TEST                          ║');
  console.log('╚══════════════════════════════════════════════════════╝\n');

  const catalog = loadCatalog();
  let state: SimulationState = createSimulation({ width: 8, height: 6 });
  let nextBuild = 0;
  let firstDepletion: number | null = null;
  let refuels = 0;

  const MAX_TICKS = 1200;
  for (let tick = 1; tick <= MAX_TICKS; tick++) {
    state = processTick(state);
    state = sellAllPower(state);

    const plan = BUILD_ORDER[nextBuild];
    if (plan) {
      const cost = catalogEntry(catalog, plan.name)?.cost ?? Infinity;
      if (state.resources.money >= cost) {
        const next = buyComponent(state, coord(plan.x, plan.y), plan.name, catalog);
        if (!next) fail(`could not buy ${plan.name} at (${plan.x}, ${plan.y})`);
        state = next;
        nextBuild++;
        milestone(tick, `Bought ${plan.name} at (${plan.x}, ${plan.y}) for ${fmt(cost)}`);
      }
    }

    if (firstDepletion === null && state.components.some((c) => c.depleted)) {
      firstDepletion = tick;
      milestone(tick, 'First fuel cell depleted');
    }

    const swapped = refuel(state, catalog);
    if (swapped.refuelled > 0) {
      state = swapped.state;
      refuels += swapped.refuelled;
    }
  }

  if (nextBuild < BUILD_ORDER.length) fail(`only ${nextBuild}/${BUILD_ORDER.length} builds completed`);
  if (firstDepletion === null) fail('no fuel cell ever depleted');

  // Save round trip
  const encoded = exportSaveBase64(toSaveRecord(state, 0, 0));
  const restored = applySaveRecord(createSimulation({ width: 8, height: 6 }), importSaveBase64(encoded), catalog);
  if (!restored.ok) fail(`save did not apply: ${restored.error.kind}`);
  if (restored.summary.placed !== state.components.length) fail('save round trip lost components');
  if (restored.state.resources.money !== state.resources.money) fail('save round trip changed money');

  // Final report
  const r = state.resources;
  console.log('\n' + '═'.repeat(56));
  console.log('  SMOKE TEST COMPLETE');
  console.log('═'.repeat(56));
  console.log(`  Ticks simulated   : ${state.tickIndex}`);
  console.log(`  Money             : ${fmt(r.money, 1)}`);
  console.log(`  Total earned      : ${fmt(r.totalMoney, 1)}`);
  console.log(`  Power produced    : ${fmt(r.totalPowerProduced, 1)}`);
  console.log(`  Heat dissipated   : ${fmt(r.totalHeatDissipated, 1)}`);
  console.log(`  Hull heat         : ${fmt(r.heat, 1)} / ${fmt(state.maxHeatCapacity)}`);
  console.log(`  Components        : ${state.components.length} (${state.components.filter((c) => c.depleted).length} depleted)`);
  console.log(`  Fuel swaps        : ${refuels}`);
  console.log(`  Save size         : ${encoded.length} chars`);

  console.log('\n  ✓ All milestones reached. Smoke test PASSED.');
}

runSmoke();
