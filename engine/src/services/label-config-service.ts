import { z } from 'zod';

import {
  DEFAULT_LABEL_CONFIG,
  LABEL_CONFIG_PRESETS,
  findLabelConfigByName,
  labelConfigMapSchema,
  labelConfigToMap,
  type LabelConfig,
} from '../models/label-config.ts';
import { readJsonItem, writeJsonItem, type KeyValueStore, type StoredValueLog } from './key-value-store.ts';

export const SELECTED_LABEL_CONFIG_KEY = 'selected_label_config';
export const CUSTOM_LABEL_CONFIGS_KEY = 'custom_label_configs';

const customConfigListSchema = z.array(labelConfigMapSchema);

export type LabelConfigServiceLog =
  | StoredValueLog
  | { level: 'info'; event: 'label_config_selected'; name: string }
  | { level: 'info'; event: 'custom_label_config_saved'; name: string }
  | { level: 'info'; event: 'custom_label_config_removed'; name: string }
  | { level: 'info'; event: 'label_config_reset' };

export type LabelConfigServiceDependencies = {
  store: KeyValueStore;
  onLog?: (entry: LabelConfigServiceLog) => void;
};

export async function getCustomLabelConfigs(deps: LabelConfigServiceDependencies): Promise<LabelConfig[]> {
  const stored = await readJsonItem(deps.store, CUSTOM_LABEL_CONFIGS_KEY, deps.onLog);
  if (stored === null) {
    return [];
  }

  const result = customConfigListSchema.safeParse(stored);
  if (!result.success) {
    deps.onLog?.({
      level: 'warn',
      event: 'stored_value_invalid',
      key: CUSTOM_LABEL_CONFIGS_KEY,
      issues: result.error.issues.map((issue) => {
        const path = issue.path.length ? issue.path.join('.') : 'configs';
        return `${path}: ${issue.message}`;
      }),
    });
    return [];
  }

  return result.data.map((config) => ({ ...config }));
}

export async function getAllLabelConfigs(deps: LabelConfigServiceDependencies): Promise<LabelConfig[]> {
  return [...LABEL_CONFIG_PRESETS, ...(await getCustomLabelConfigs(deps))];
}

/** The selected config by name, presets first; unknown or unset names yield the default. */
export async function getCurrentLabelConfig(deps: LabelConfigServiceDependencies): Promise<LabelConfig> {
  const selectedName = await deps.store.getItem(SELECTED_LABEL_CONFIG_KEY);
  if (selectedName === null) {
    return DEFAULT_LABEL_CONFIG;
  }

  const preset = findLabelConfigByName(selectedName);
  if (preset) {
    return preset;
  }

  const custom = await getCustomLabelConfigs(deps);
  return custom.find((config) => config.name === selectedName) ?? DEFAULT_LABEL_CONFIG;
}

export async function saveCurrentLabelConfig(
  config: LabelConfig,
  deps: LabelConfigServiceDependencies
): Promise<void> {
  await deps.store.setItem(SELECTED_LABEL_CONFIG_KEY, config.name);
  deps.onLog?.({ level: 'info', event: 'label_config_selected', name: config.name });
}

/** Stores a user-defined size, replacing any custom config with the same name. */
export async function saveCustomLabelConfig(
  config: LabelConfig,
  deps: LabelConfigServiceDependencies
): Promise<void> {
  const existing = await getCustomLabelConfigs(deps);
  const next = [...existing.filter((candidate) => candidate.name !== config.name), config];

  await writeJsonItem(deps.store, CUSTOM_LABEL_CONFIGS_KEY, next.map(labelConfigToMap));
  deps.onLog?.({ level: 'info', event: 'custom_label_config_saved', name: config.name });
}

export async function customLabelConfigExists(
  name: string,
  deps: LabelConfigServiceDependencies
): Promise<boolean> {
  const custom = await getCustomLabelConfigs(deps);
  return custom.some((config) => config.name === name);
}

export async function removeCustomLabelConfig(
  name: string,
  deps: LabelConfigServiceDependencies
): Promise<void> {
  const existing = await getCustomLabelConfigs(deps);
  await writeJsonItem(
    deps.store,
    CUSTOM_LABEL_CONFIGS_KEY,
    existing.filter((config) => config.name !== name).map(labelConfigToMap)
  );
  deps.onLog?.({ level: 'info', event: 'custom_label_config_removed', name });
}

export async function resetLabelConfig(deps: LabelConfigServiceDependencies): Promise<void> {
  await deps.store.removeItem(SELECTED_LABEL_CONFIG_KEY);
  deps.onLog?.({ level: 'info', event: 'label_config_reset' });
}
