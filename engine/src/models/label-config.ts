import { z } from 'zod';

export type LabelConfig = {
  readonly name: string;
  readonly widthMm: number;
  readonly heightMm: number;
  /** Gap between consecutive labels on the roll. */
  readonly spacingMm: number;
  readonly description: string;
};

const DEFAULT_SPACING_MM = 2;

// Missing and null keys both take the fallback.
const storedString = (fallback: string) =>
  z
    .string()
    .nullish()
    .transform((value) => value ?? fallback);
const storedNumber = (fallback: number) =>
  z
    .number()
    .nullish()
    .transform((value) => value ?? fallback);

export const labelConfigMapSchema = z.object({
  name: storedString(''),
  widthMm: storedNumber(0),
  heightMm: storedNumber(0),
  spacingMm: storedNumber(DEFAULT_SPACING_MM),
  description: storedString(''),
});

export type LabelConfigMap = {
  name: string;
  widthMm: number;
  heightMm: number;
  spacingMm: number;
  description: string;
};

export const LABEL_CONFIG_PRESETS: readonly LabelConfig[] = [
  {
    name: '80mm × 50mm',
    widthMm: 80,
    heightMm: 50,
    spacingMm: 2,
    description: 'Standard shipping label - compact',
  },
  {
    name: '80mm × 60mm',
    widthMm: 80,
    heightMm: 60,
    spacingMm: 3,
    description: 'Standard shipping label - medium',
  },
  {
    name: '80mm × 80mm',
    widthMm: 80,
    heightMm: 80,
    spacingMm: 3,
    description: 'Square shipping label',
  },
  {
    name: '80mm × 120mm',
    widthMm: 80,
    heightMm: 120,
    spacingMm: 3,
    description: 'Large shipping label',
  },
  {
    name: '101mm × 152mm',
    widthMm: 101,
    heightMm: 152,
    spacingMm: 4,
    description: '4×6 inch shipping label (US standard)',
  },
];

export const DEFAULT_LABEL_CONFIG: LabelConfig = LABEL_CONFIG_PRESETS[0];

export function findLabelConfigByName(name: string): LabelConfig | null {
  return LABEL_CONFIG_PRESETS.find((config) => config.name === name) ?? null;
}

export function labelConfigsEqual(a: LabelConfig, b: LabelConfig): boolean {
  return a.name === b.name && a.widthMm === b.widthMm && a.heightMm === b.heightMm;
}

export function describeLabelConfig(config: LabelConfig): string {
  return `${config.name} (${config.widthMm}mm × ${config.heightMm}mm)`;
}

/**
 * Stable identifier derived from the config name, e.g. `80mm × 50mm` becomes
 * `80mm-x-50mm`. Falls back to the dimensions when the name has no usable characters.
 */
export function labelConfigId(config: LabelConfig): string {
  const slug = config.name
    .toLowerCase()
    .replaceAll('×', 'x')
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');

  return slug !== '' ? slug : `${config.widthMm}x${config.heightMm}`;
}

export function labelConfigToMap(config: LabelConfig): LabelConfigMap {
  return {
    name: config.name,
    widthMm: config.widthMm,
    heightMm: config.heightMm,
    spacingMm: config.spacingMm,
    description: config.description,
  };
}

export function labelConfigFromMap(value: unknown): LabelConfig | null {
  const result = labelConfigMapSchema.safeParse(value);
  if (!result.success) {
    return null;
  }

  return { ...result.data };
}
