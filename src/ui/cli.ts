#!/usr/bin/env tsx
/**
 * Reactor Core — Interactive CLI
 * Run with: npm run dev  (or  tsx src/ui/cli.ts)
 */
import * as readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import type { ComponentKind, GridCoord, SimulationState } from '../core/types.js';
import { coord, getCell } from '../core/grid.js';
import { processTick, processTicks } from '../core/tick.js';
import { FUEL_DEFINITIONS } from '../content/components.js';
import { listEntries, type CatalogEntry, type ComponentCatalog } from '../content/catalog.js';
import { loadCatalog } from '../content/loader.js';
import { componentAt, createSimulation } from '../state/reactorState.js';
import {
  buyComponent,
  resetGame,
  sellAllPower,
  sellComponent,
  sellValue,
  setPaused,
  ventHeatManually,
} from '../state/actions.js';
import { exportSaveBase64, importSaveText } from '../persistence/codec.js';
import { applySaveRecord, toSaveRecord } from '../persistence/saveRecord.js';
import { hasSaveFile, loadSaveFile, saveToFile, shouldAutosave, type SaveUiState } from '../persistence/saveLoad.js';

const SHOP_PAGE_SIZE = 12;

// ─── Display helpers ───────────────────────────────────────────────────────

function fmt(n: number, decimals = 0): string {
  if (n >= 1_000_000) return `${(n / 1_000_000).toFixed(1)}M`;
  if (n >= 1_000) return `${(n / 1_000).toFixed(1)}k`;
  return n.toFixed(decimals);
}

function bar(value: number, max: number, width = 20): string {
  const filled = max > 0 ? Math.min(width, Math.round((value / max) * width)) : 0;
  return '[' + '█'.repeat(filled) + '░'.repeat(width - filled) + ']';
}

/** Three-character cell label. */
function glyph(kind: ComponentKind): string {
  switch (kind.family) {
    case 'fuel':
      return `F${FUEL_DEFINITIONS[kind.fuel].grade}`.padEnd(3);
    case 'vent':
      return `V${kind.tier}`.padEnd(3);
    case 'coolant':
      return `C${kind.tier}`.padEnd(3);
    case 'capacitor':
      return `P${kind.tier}`.padEnd(3);
    case 'reflector':
      return `R${kind.tier}`.padEnd(3);
    case 'plating':
      return `H${kind.tier}`.padEnd(3);
    case 'inlet':
      return `I${kind.tier}`.padEnd(3);
    case 'outlet':
      return `O${kind.tier}`.padEnd(3);
    case 'exchanger':
      return `X${kind.tier}`.padEnd(3);
    case 'clock':
      return 'CLK';
    case 'genericHeat':
      return 'GH ';
    case 'genericPower':
      return 'GP ';
    case 'genericInfinity':
      return 'INF';
  }
}

function printHeader(state: SimulationState): void {
  const r = state.resources;
  console.log('\n' + '═'.repeat(60));
  console.log(`  REACTOR CORE ─ Tick ${state.tickIndex}${state.paused ? ' ─ PAUSED' : ''}`);
  console.log('═'.repeat(60));
  console.log(`  Money : ${fmt(r.money, 1).padEnd(10)} (${r.tickDeltas.money >= 0 ? '+' : ''}${fmt(r.tickDeltas.money, 2)}/tick)`);
  console.log(`  Power : ${bar(r.power, state.maxPowerCapacity)} ${fmt(r.power, 1)} / ${fmt(state.maxPowerCapacity)}`);
  console.log(`  Heat  : ${bar(r.heat, state.maxHeatCapacity)} ${fmt(r.heat, 1)} / ${fmt(state.maxHeatCapacity)}`);
  console.log(`  Lifetime: ${fmt(r.totalPowerProduced, 1)} power, ${fmt(r.totalHeatDissipated, 1)} heat vented`);
  console.log('─'.repeat(60));
}

function printGrid(state: SimulationState, layer = 0): void {
  const header = Array.from({ length: state.grid.width }, (_, x) => String(x).padEnd(3)).join('');
  console.log(`     ${header}`);
  for (let y = 0; y < state.grid.height; y++) {
    let row = '';
    for (let x = 0; x < state.grid.width; x++) {
      const cell = getCell(state.grid, coord(x, y, layer));
      const component = cell ? componentAt(state, coord(x, y, layer)) : null;
      if (!cell) row += ' · ';
      else if (component?.depleted) row += ' x ';
      else row += glyph(cell.kind);
    }
    console.log(`  ${String(y).padStart(2)} ${row}`);
  }
}

function printShop(catalog: ComponentCatalog, ui: SaveUiState, money: number): void {
  const entries = listEntries(catalog);
  const pages = Math.max(1, Math.ceil(entries.length / SHOP_PAGE_SIZE));
  const start = ui.shopPage * SHOP_PAGE_SIZE;
  console.log(`\n  ─ SHOP (page ${ui.shopPage + 1}/${pages}) ────────────────────────────────`);
  entries.slice(start, start + SHOP_PAGE_SIZE).forEach((entry, i) => {
    const index = start + i;
    const marker = index === ui.selectedIndex ? '▶' : ' ';
    const afford = money >= entry.cost ? '' : ' (need more money)';
    console.log(`  ${marker}${String(index).padStart(3)}) ${entry.name.padEnd(16)} ${entry.displayName.padEnd(22)} ${fmt(entry.cost)}${afford}`);
  });
}

function printHelp(): void {
  console.log('\n  COMMANDS');
  console.log('  tick [n]          Run n ticks (default 1; Enter runs 1)');
  console.log('  grid [z]          Show the reactor layer');
  console.log('  shop [page]       List components      select <n>   Pick shop entry');
  console.log('  buy <x> <y> [z]   Buy selected entry   sell <x> <y> [z]');
  console.log('  inspect <x> <y>   Component details    power        Sell all power');
  console.log('  vent              Manual heat vent     pause        Toggle pause');
  console.log('  save / load       Save file            export / import <text>');
  console.log('  reset             Start over           quit');
}

function parseCoord(args: string[]): GridCoord | null {
  const [x, y, z = '0'] = args;
  if (x === undefined || y === undefined) return null;
  const values = [x, y, z].map((v) => Number.parseInt(v, 10));
  if (values.some((v) => Number.isNaN(v))) return null;
  return coord(values[0] ?? 0, values[1] ?? 0, values[2] ?? 0);
}

/** Saved cursors can outlive the catalog they were taken against. */
function restoreUi(ui: SaveUiState, saved: SaveUiState, catalog: ComponentCatalog): void {
  const count = listEntries(catalog).length;
  const pages = Math.max(1, Math.ceil(count / SHOP_PAGE_SIZE));
  ui.selectedIndex = saved.selectedIndex < count ? saved.selectedIndex : -1;
  ui.shopPage = Math.min(saved.shopPage, pages - 1);
}

function selectedEntry(catalog: ComponentCatalog, ui: SaveUiState): CatalogEntry | null {
  return listEntries(catalog)[ui.selectedIndex] ?? null;
}

function inspect(state: SimulationState, catalog: ComponentCatalog, at: GridCoord): void {
  const c = componentAt(state, at);
  if (!c) {
    console.log('  Empty cell.');
    return;
  }
  console.log(`  #${c.id} ${glyph(c.kind).trim()} at (${at.x}, ${at.y}, ${at.z})${c.depleted ? ' [DEPLETED]' : ''}`);
  console.log(`  heat ${fmt(c.heat, 2)} / ${fmt(c.stats.heatCapacity)}  durability ${fmt(c.durability)} / ${fmt(c.stats.maxDurability)}`);
  console.log(`  pulses ${c.pulseCount}  last power ${fmt(c.lastPower, 2)}  last heat ${fmt(c.lastHeat, 2)}`);
  console.log(`  sells for ${fmt(sellValue(c, catalog), 1)}`);
}

// ─── Main loop ─────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const rl = readline.createInterface({ input, output });
  const catalog = loadCatalog();
  const ui: SaveUiState = { selectedIndex: 0, shopPage: 0 };

  console.log('\n  ╔══════════════════════════════════════════════════════╗');
  console.log('  ║              REACTOR CORE — STARTUP                  ║');
  console.log('  ╚══════════════════════════════════════════════════════╝');

  let state = createSimulation({ startingMoney: 10 });

  if (hasSaveFile()) {
    const ans = (await rl.question('  Save file found. Load it? (yes/no) > ')).trim().toLowerCase();
    if (ans === 'yes' || ans === 'y') {
      const loaded = loadSaveFile(state, undefined, catalog);
      if (loaded) {
        state = loaded.state;
        restoreUi(ui, loaded.ui, catalog);
      } else {
        console.log('  Failed to load save. Starting fresh.');
      }
    }
  }

  printHelp();

  let running = true;
  while (running) {
    printHeader(state);
    const [command = '', ...args] = (await rl.question('  > ')).trim().split(/\s+/);

    switch (command.toLowerCase()) {
      case '':
        state = processTick(state);
        break;
      case 'tick': {
        const { newState, summary } = processTicks(state, Number.parseInt(args[0] ?? '1', 10) || 1);
        state = newState;
        console.log(`  ${summary.ticksSimulated} ticks: +${fmt(summary.powerProduced, 1)} power, +${fmt(summary.moneyEarned, 1)} money`);
        break;
      }
      case 'grid':
        printGrid(state, Number.parseInt(args[0] ?? '0', 10) || 0);
        break;
      case 'shop': {
        const page = Number.parseInt(args[0] ?? '', 10);
        if (!Number.isNaN(page)) ui.shopPage = Math.max(0, page - 1);
        printShop(catalog, ui, state.resources.money);
        break;
      }
      case 'select': {
        const index = Number.parseInt(args[0] ?? '', 10);
        if (Number.isNaN(index) || index < 0 || index >= catalog.order.length) {
          console.log('  ✗ No such shop entry.');
          break;
        }
        ui.selectedIndex = index;
        ui.shopPage = Math.floor(index / SHOP_PAGE_SIZE);
        console.log(`  ✓ Selected ${catalog.order[index]}.`);
        break;
      }
      case 'buy': {
        const at = parseCoord(args);
        const entry = selectedEntry(catalog, ui);
        const next = at && entry ? buyComponent(state, at, entry.name, catalog) : null;
        if (next) {
          state = next;
          console.log(`  ✓ Placed ${entry?.displayName ?? ''}.`);
        } else {
          console.log('  ✗ Cannot buy — check money, selection and that the cell is empty.');
        }
        break;
      }
      case 'sell': {
        const at = parseCoord(args);
        const next = at ? sellComponent(state, at, catalog) : null;
        if (next) {
          console.log(`  ✓ Sold for ${fmt(next.resources.money - state.resources.money, 1)}.`);
          state = next;
        } else {
          console.log('  ✗ Nothing to sell there.');
        }
        break;
      }
      case 'inspect': {
        const at = parseCoord(args);
        if (at) inspect(state, catalog, at);
        break;
      }
      case 'power':
        state = sellAllPower(state);
        break;
      case 'vent': {
        const next = ventHeatManually(state);
        if (next) state = next;
        else console.log('  Hull is already cold.');
        break;
      }
      case 'pause':
        state = setPaused(state, !state.paused);
        break;
      case 'save':
        saveToFile(state, undefined, ui);
        console.log('  ✓ Game saved.');
        break;
      case 'load': {
        const loaded = loadSaveFile(state, undefined, catalog);
        if (loaded) {
          state = loaded.state;
          restoreUi(ui, loaded.ui, catalog);
          console.log('  ✓ Game loaded.');
        } else {
          console.log('  ✗ No usable save file.');
        }
        break;
      }
      case 'export':
        console.log(`\n${exportSaveBase64(toSaveRecord(state, ui.selectedIndex, ui.shopPage))}\n`);
        break;
      case 'import': {
        try {
          const record = importSaveText(args.join(''));
          const result = applySaveRecord(state, record, catalog);
          if (result.ok) {
            state = result.state;
            restoreUi(ui, { selectedIndex: record.selectedComponentIndex, shopPage: record.shopPage }, catalog);
            console.log(`  ✓ Imported ${result.summary.placed} components (${result.summary.skipped.length} skipped).`);
          } else {
            console.log(`  ✗ Import failed: ${result.error.kind}`);
          }
        } catch (err) {
          console.log(`  ✗ Import failed: ${err instanceof Error ? err.message : String(err)}`);
        }
        break;
      }
      case 'reset': {
        const confirm = (await rl.question('  Start over? (yes/no) > ')).trim().toLowerCase();
        if (confirm === 'yes' || confirm === 'y') state = resetGame(state);
        break;
      }
      case 'help':
        printHelp();
        break;
      case 'quit':
        saveToFile(state, undefined, ui);
        console.log('  ✓ Game saved. Shutting down.');
        running = false;
        break;
      default:
        console.log('  Unknown command. Type "help".');
    }

    if (shouldAutosave(state)) {
      saveToFile(state, undefined, ui);
    }
  }

  rl.close();
}

main().catch(console.error);
