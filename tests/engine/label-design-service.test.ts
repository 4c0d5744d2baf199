import { describe, expect, it } from 'vitest';

import { createDefaultDesign } from '../../engine/src/layout/default-layout.ts';
import { customLabelDesignToMap, updateLabelDesign } from '../../engine/src/models/custom-label-design.ts';
import { LABEL_CONFIG_PRESETS } from '../../engine/src/models/label-config.ts';
import {
  ACTIVE_LABEL_DESIGN_KEY,
  LABEL_DESIGNS_KEY,
  clearAllDesigns,
  createAndSaveDefaultDesign,
  createBlankDesign,
  deleteDesign,
  duplicateDesign,
  exportDesign,
  getActiveDesign,
  getActiveDesignId,
  getAllDesigns,
  getDesignById,
  getDesignsForConfig,
  importDesign,
  saveDesign,
  setActiveDesign,
  type LabelDesignServiceLog,
} from '../../engine/src/services/label-design-service.ts';
import { InMemoryKeyValueStore } from './helpers/in-memory-key-value-store.ts';

const NOW = new Date('2026-07-01T08:00:00.000Z');
const COMPACT = LABEL_CONFIG_PRESETS[0];
const SQUARE = LABEL_CONFIG_PRESETS[2];

function createDeps(store = new InMemoryKeyValueStore()) {
  const logs: LabelDesignServiceLog[] = [];
  return { store, logs, now: () => NOW, onLog: (entry: LabelDesignServiceLog) => logs.push(entry) };
}

describe('label-design-service', () => {
  it('stores a default design and finds it again', async () => {
    const deps = createDeps();

    const design = await createAndSaveDefaultDesign(COMPACT, deps);

    expect(design.id).toBe('default_80mm-x-50mm');
    expect(design.createdAt).toEqual(NOW);
    expect(await getAllDesigns(deps)).toEqual([design]);
    expect(await getDesignById('default_80mm-x-50mm', deps)).toEqual(design);
    expect(await getDesignById('missing', deps)).toBeNull();
    expect(deps.logs).toEqual([{ level: 'info', event: 'label_design_saved', designId: 'default_80mm-x-50mm' }]);
  });

  it('moves a re-saved design to the end of the list', async () => {
    const deps = createDeps();
    const compact = await createAndSaveDefaultDesign(COMPACT, deps);
    const square = await createAndSaveDefaultDesign(SQUARE, deps);

    await saveDesign(updateLabelDesign(compact, { name: 'Counter labels' }), deps);

    const designs = await getAllDesigns(deps);
    expect(designs.map((design) => design.id)).toEqual([square.id, compact.id]);
    expect(designs[1].name).toBe('Counter labels');
  });

  it('matches designs to a config by physical size', async () => {
    const deps = createDeps();
    await createAndSaveDefaultDesign(COMPACT, deps);
    await createAndSaveDefaultDesign(SQUARE, deps);

    const matches = await getDesignsForConfig({ ...COMPACT, name: 'Renamed roll' }, deps);

    expect(matches.map((design) => design.id)).toEqual(['default_80mm-x-50mm']);
  });

  it('duplicates a design under a new custom id', async () => {
    const deps = createDeps();
    const original = await createAndSaveDefaultDesign(COMPACT, deps);

    const copy = await duplicateDesign(original, 'Warehouse copy', deps);

    expect(copy).toMatchObject({
      id: 'custom_1782892800000',
      name: 'Warehouse copy',
      description: 'Copy of Default 80mm × 50mm',
      isDefault: false,
    });
    expect(copy.elements).toEqual(original.elements);
    expect((await getAllDesigns(deps)).map((design) => design.id)).toEqual([
      'default_80mm-x-50mm',
      'custom_1782892800000',
    ]);
  });

  it('creates blank designs dated by the injected clock', async () => {
    const deps = createDeps();

    const blank = await createBlankDesign(SQUARE, 'Gift tags', deps);

    expect(blank).toEqual({
      id: 'custom_1782892800000',
      name: 'Gift tags',
      description: 'Custom design created 2026-07-01',
      labelConfig: SQUARE,
      elements: [],
      createdAt: NOW,
      updatedAt: NOW,
      isDefault: false,
    });
  });

  it('imports an exported design under a fresh id', async () => {
    const deps = createDeps();
    const exported = exportDesign(createDefaultDesign(COMPACT, { now: () => new Date('2026-01-01T00:00:00.000Z') }));

    const imported = await importDesign(JSON.parse(JSON.stringify(exported)), deps);

    expect(imported).toMatchObject({
      id: 'imported_1782892800000',
      name: 'Default 80mm × 50mm (Imported)',
      createdAt: NOW,
      isDefault: false,
    });
    expect(await getDesignById('imported_1782892800000', deps)).toEqual(imported);
  });

  it('rejects imports that are not designs', async () => {
    const deps = createDeps();

    expect(await importDesign({ id: '', name: 'Broken' }, deps)).toBeNull();
    expect(await getAllDesigns(deps)).toEqual([]);
    expect(deps.logs).toEqual([
      expect.objectContaining({ level: 'warn', event: 'label_design_import_rejected' }),
    ]);
  });

  it('skips stored entries that no longer parse', async () => {
    const valid = customLabelDesignToMap(createDefaultDesign(COMPACT, { now: () => NOW }));
    const deps = createDeps(
      new InMemoryKeyValueStore({ [LABEL_DESIGNS_KEY]: JSON.stringify([valid, { id: 'broken' }]) })
    );

    const designs = await getAllDesigns(deps);

    expect(designs.map((design) => design.id)).toEqual(['default_80mm-x-50mm']);
    expect(deps.logs).toEqual([
      expect.objectContaining({ level: 'warn', event: 'stored_value_invalid', key: 'custom_label_designs[1]' }),
    ]);
  });

  it('tracks the active design and clears everything', async () => {
    const deps = createDeps();
    const design = await createAndSaveDefaultDesign(COMPACT, deps);

    expect(await getActiveDesign(deps)).toBeNull();

    await setActiveDesign(design.id, deps);
    expect(await getActiveDesignId(deps)).toBe('default_80mm-x-50mm');
    expect(await getActiveDesign(deps)).toEqual(design);

    await deleteDesign(design.id, deps);
    expect(await getActiveDesign(deps)).toBeNull();

    await clearAllDesigns(deps);
    expect(deps.store.values.has(LABEL_DESIGNS_KEY)).toBe(false);
    expect(deps.store.values.has(ACTIVE_LABEL_DESIGN_KEY)).toBe(false);
    expect(deps.logs.at(-1)).toEqual({ level: 'info', event: 'label_designs_cleared' });
  });
});
