import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import type { SimulationState } from '../core/types.js';
import { describeGridError } from '../core/types.js';
import { BUILTIN_CATALOG, type ComponentCatalog } from '../content/catalog.js';
import { decodeSaveJson, encodeSaveJson } from './codec.js';
import { applySaveRecord, toSaveRecord } from './saveRecord.js';

export const DEFAULT_SAVE_PATH = './reactor-save.json';

/** Shop cursor state that rides along in the save but lives outside the simulation. */
export interface SaveUiState {
  selectedIndex: number;
  shopPage: number;
}

const NO_UI: SaveUiState = { selectedIndex: -1, shopPage: 0 };

// ─── File I/O ──────────────────────────────────────────────────────────────

export function saveToFile(state: SimulationState, path = DEFAULT_SAVE_PATH, ui: SaveUiState = NO_UI): void {
  writeFileSync(path, encodeSaveJson(toSaveRecord(state, ui.selectedIndex, ui.shopPage)), 'utf8');
}

export interface LoadedSave {
  state: SimulationState;
  ui: SaveUiState;
}

/**
 * Load a save on top of `state` (grid size and rate settings come from it),
 * along with the shop cursor it was written with.
 * Returns null, and logs, when the file is missing or cannot be applied.
 */
export function loadSaveFile(
  state: SimulationState,
  path = DEFAULT_SAVE_PATH,
  catalog: ComponentCatalog = BUILTIN_CATALOG,
): LoadedSave | null {
  if (!existsSync(path)) return null;
  try {
    const record = decodeSaveJson(readFileSync(path, 'utf8'));
    const result = applySaveRecord(state, record, catalog);
    if (!result.ok) {
      console.error('[SaveLoad] Failed to apply save:', describeGridError(result.error));
      return null;
    }
    for (const { entry, reason } of result.summary.skipped) {
      console.warn(`[SaveLoad] Skipped ${entry.name || '<unnamed>'} at (${entry.x}, ${entry.y}, ${entry.z}): ${reason}`);
    }
    return { state: result.state, ui: { selectedIndex: record.selectedComponentIndex, shopPage: record.shopPage } };
  } catch (err) {
    console.error('[SaveLoad] Failed to load save:', err);
    return null;
  }
}

export function loadFromFile(
  state: SimulationState,
  path = DEFAULT_SAVE_PATH,
  catalog: ComponentCatalog = BUILTIN_CATALOG,
): SimulationState | null {
  return loadSaveFile(state, path, catalog)?.state ?? null;
}

export function hasSaveFile(path = DEFAULT_SAVE_PATH): boolean {
  return existsSync(path);
}

// ─── Autosave helper ──────────────────────────────────────────────────────

export const AUTOSAVE_INTERVAL_TICKS = 60; // save every 60 ticks

export function shouldAutosave(state: SimulationState): boolean {
  return state.tickIndex > 0 && state.tickIndex % AUTOSAVE_INTERVAL_TICKS === 0;
}
