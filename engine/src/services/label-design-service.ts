import { z } from 'zod';

import { createDefaultDesign } from '../layout/default-layout.ts';
import {
  LabelDesignValidationError,
  customLabelDesignFromMap,
  customLabelDesignToMap,
  updateLabelDesign,
  type CustomLabelDesign,
  type CustomLabelDesignMap,
} from '../models/custom-label-design.ts';
import type { LabelConfig } from '../models/label-config.ts';
import { readJsonItem, writeJsonItem, type KeyValueStore, type StoredValueLog } from './key-value-store.ts';

export const LABEL_DESIGNS_KEY = 'custom_label_designs';
export const ACTIVE_LABEL_DESIGN_KEY = 'active_label_design_id';

export type LabelDesignServiceLog =
  | StoredValueLog
  | { level: 'info'; event: 'label_design_saved'; designId: string }
  | { level: 'info'; event: 'label_design_deleted'; designId: string }
  | { level: 'info'; event: 'label_design_activated'; designId: string }
  | { level: 'warn'; event: 'label_design_import_rejected'; issues: string[] }
  | { level: 'info'; event: 'label_designs_cleared' };

export type LabelDesignServiceDependencies = {
  store: KeyValueStore;
  now?: () => Date;
  onLog?: (entry: LabelDesignServiceLog) => void;
};

function currentTime(deps: LabelDesignServiceDependencies): Date {
  return deps.now?.() ?? new Date();
}

/**
 * Every readable stored design, in save order. Entries that no longer parse are
 * dropped and reported instead of failing the whole list.
 */
export async function getAllDesigns(deps: LabelDesignServiceDependencies): Promise<CustomLabelDesign[]> {
  const stored = await readJsonItem(deps.store, LABEL_DESIGNS_KEY, deps.onLog);
  if (stored === null) {
    return [];
  }

  const list = z.array(z.unknown()).safeParse(stored);
  if (!list.success) {
    deps.onLog?.({
      level: 'warn',
      event: 'stored_value_invalid',
      key: LABEL_DESIGNS_KEY,
      issues: ['designs: expected array'],
    });
    return [];
  }

  const designs: CustomLabelDesign[] = [];
  list.data.forEach((entry, index) => {
    try {
      designs.push(customLabelDesignFromMap(entry));
    } catch (error) {
      if (!(error instanceof LabelDesignValidationError)) {
        throw error;
      }

      deps.onLog?.({
        level: 'warn',
        event: 'stored_value_invalid',
        key: `${LABEL_DESIGNS_KEY}[${index}]`,
        issues: error.issues,
      });
    }
  });

  return designs;
}

async function writeDesigns(
  designs: readonly CustomLabelDesign[],
  deps: LabelDesignServiceDependencies
): Promise<void> {
  await writeJsonItem(deps.store, LABEL_DESIGNS_KEY, designs.map(customLabelDesignToMap));
}

/** Replaces any design with the same id; the saved design moves to the end of the list. */
export async function saveDesign(
  design: CustomLabelDesign,
  deps: LabelDesignServiceDependencies
): Promise<void> {
  const designs = await getAllDesigns(deps);
  await writeDesigns([...designs.filter((existing) => existing.id !== design.id), design], deps);
  deps.onLog?.({ level: 'info', event: 'label_design_saved', designId: design.id });
}

export async function deleteDesign(designId: string, deps: LabelDesignServiceDependencies): Promise<void> {
  const designs = await getAllDesigns(deps);
  await writeDesigns(
    designs.filter((design) => design.id !== designId),
    deps
  );
  deps.onLog?.({ level: 'info', event: 'label_design_deleted', designId });
}

export async function getDesignById(
  designId: string,
  deps: LabelDesignServiceDependencies
): Promise<CustomLabelDesign | null> {
  const designs = await getAllDesigns(deps);
  return designs.find((design) => design.id === designId) ?? null;
}

/** Designs drawn for the same physical size, whatever the config is named. */
export async function getDesignsForConfig(
  config: LabelConfig,
  deps: LabelDesignServiceDependencies
): Promise<CustomLabelDesign[]> {
  const designs = await getAllDesigns(deps);
  return designs.filter(
    (design) =>
      design.labelConfig.widthMm === config.widthMm && design.labelConfig.heightMm === config.heightMm
  );
}

export async function createAndSaveDefaultDesign(
  config: LabelConfig,
  deps: LabelDesignServiceDependencies
): Promise<CustomLabelDesign> {
  const design = createDefaultDesign(config, { now: () => currentTime(deps) });
  await saveDesign(design, deps);
  return design;
}

export async function duplicateDesign(
  original: CustomLabelDesign,
  newName: string,
  deps: LabelDesignServiceDependencies
): Promise<CustomLabelDesign> {
  const now = currentTime(deps);
  const duplicated = updateLabelDesign(original, {
    id: `custom_${now.getTime()}`,
    name: newName,
    description: `Copy of ${original.name}`,
    createdAt: now,
    updatedAt: now,
    isDefault: false,
  });

  await saveDesign(duplicated, deps);
  return duplicated;
}

export async function createBlankDesign(
  config: LabelConfig,
  name: string,
  deps: LabelDesignServiceDependencies
): Promise<CustomLabelDesign> {
  const now = currentTime(deps);
  const design: CustomLabelDesign = {
    id: `custom_${now.getTime()}`,
    name,
    description: `Custom design created ${now.toISOString().slice(0, 10)}`,
    labelConfig: config,
    elements: [],
    createdAt: now,
    updatedAt: now,
    isDefault: false,
  };

  await saveDesign(design, deps);
  return design;
}

/**
 * Stores an exported design under a fresh id. Returns null, with a warning log,
 * when the payload is not a valid design.
 */
export async function importDesign(
  payload: unknown,
  deps: LabelDesignServiceDependencies
): Promise<CustomLabelDesign | null> {
  let design: CustomLabelDesign;
  try {
    design = customLabelDesignFromMap(payload);
  } catch (error) {
    if (!(error instanceof LabelDesignValidationError)) {
      throw error;
    }

    deps.onLog?.({ level: 'warn', event: 'label_design_import_rejected', issues: error.issues });
    return null;
  }

  const now = currentTime(deps);
  const imported = updateLabelDesign(design, {
    id: `imported_${now.getTime()}`,
    name: `${design.name} (Imported)`,
    createdAt: now,
    updatedAt: now,
    isDefault: false,
  });

  await saveDesign(imported, deps);
  return imported;
}

export function exportDesign(design: CustomLabelDesign): CustomLabelDesignMap {
  return customLabelDesignToMap(design);
}

export async function setActiveDesign(designId: string, deps: LabelDesignServiceDependencies): Promise<void> {
  await deps.store.setItem(ACTIVE_LABEL_DESIGN_KEY, designId);
  deps.onLog?.({ level: 'info', event: 'label_design_activated', designId });
}

export async function getActiveDesignId(deps: LabelDesignServiceDependencies): Promise<string | null> {
  return deps.store.getItem(ACTIVE_LABEL_DESIGN_KEY);
}

export async function getActiveDesign(
  deps: LabelDesignServiceDependencies
): Promise<CustomLabelDesign | null> {
  const activeId = await getActiveDesignId(deps);
  return activeId === null ? null : getDesignById(activeId, deps);
}

export async function clearAllDesigns(deps: LabelDesignServiceDependencies): Promise<void> {
  await deps.store.removeItem(LABEL_DESIGNS_KEY);
  await deps.store.removeItem(ACTIVE_LABEL_DESIGN_KEY);
  deps.onLog?.({ level: 'info', event: 'label_designs_cleared' });
}
