import { z } from 'zod';

import { clampInt, clampNumber } from '../layout/units.ts';
import { MAX_FONT_SIZE, MIN_FONT_SIZE, clampFontSize } from './label-element.ts';

export type FontSettings = {
  /** `TO:` and `FROM:` headers. */
  readonly headerFontSize: number;
  readonly headerBold: boolean;
  readonly nameFontSize: number;
  readonly nameBold: boolean;
  readonly addressFontSize: number;
  readonly addressBold: boolean;
  /** `TEL:` lines. */
  readonly phoneFontSize: number;
  readonly phoneBold: boolean;
  readonly labelTitleFontSize: number;
  readonly labelTitleBold: boolean;
  /** Cash-on-delivery amount. */
  readonly codFontSize: number;
  readonly codBold: boolean;
  readonly lineSpacingFactor: number;
  readonly enableAutoSizing: boolean;
  readonly maxLinesAddress: number;
};

export type FontSettingsPatch = Partial<FontSettings>;

export type FontSettingsMap = { -readonly [K in keyof FontSettings]: FontSettings[K] };

export const MIN_LINE_SPACING_FACTOR = 0.5;
export const MAX_LINE_SPACING_FACTOR = 3.0;
export const MIN_ADDRESS_LINES = 1;
export const MAX_ADDRESS_LINES = 10;

export const DEFAULT_FONT_SETTINGS: FontSettings = {
  headerFontSize: 4,
  headerBold: true,
  nameFontSize: 3,
  nameBold: false,
  addressFontSize: 2,
  addressBold: false,
  phoneFontSize: 2,
  phoneBold: false,
  labelTitleFontSize: 5,
  labelTitleBold: true,
  codFontSize: 3,
  codBold: true,
  lineSpacingFactor: 1.2,
  enableAutoSizing: true,
  maxLinesAddress: 3,
};

export const SMALL_LABEL_FONT_SETTINGS: FontSettings = {
  headerFontSize: 3,
  headerBold: true,
  nameFontSize: 2,
  nameBold: false,
  addressFontSize: 2,
  addressBold: false,
  phoneFontSize: 1,
  phoneBold: false,
  labelTitleFontSize: 3,
  labelTitleBold: true,
  codFontSize: 2,
  codBold: true,
  lineSpacingFactor: 1.0,
  enableAutoSizing: true,
  maxLinesAddress: 2,
};

export const LARGE_LABEL_FONT_SETTINGS: FontSettings = {
  headerFontSize: 5,
  headerBold: true,
  nameFontSize: 4,
  nameBold: true,
  addressFontSize: 3,
  addressBold: false,
  phoneFontSize: 2,
  phoneBold: false,
  labelTitleFontSize: 6,
  labelTitleBold: true,
  codFontSize: 4,
  codBold: true,
  lineSpacingFactor: 1.3,
  enableAutoSizing: true,
  maxLinesAddress: 4,
};

const FONT_SIZE_KEYS = [
  'headerFontSize',
  'nameFontSize',
  'addressFontSize',
  'phoneFontSize',
  'labelTitleFontSize',
  'codFontSize',
] as const;

const FONT_SETTINGS_KEYS = [
  ...FONT_SIZE_KEYS,
  'headerBold',
  'nameBold',
  'addressBold',
  'phoneBold',
  'labelTitleBold',
  'codBold',
  'lineSpacingFactor',
  'enableAutoSizing',
  'maxLinesAddress',
] as const satisfies ReadonlyArray<keyof FontSettings>;

// Stored `null` reads the same as a missing key.
const optionalSize = z.number().int().nullish();
const optionalFlag = z.boolean().nullish();

// Current keys plus the names older releases wrote before roles were split up.
const fontSettingsMapSchema = z.object({
  headerFontSize: optionalSize,
  headerBold: optionalFlag,
  nameFontSize: optionalSize,
  nameBold: optionalFlag,
  addressFontSize: optionalSize,
  addressBold: optionalFlag,
  phoneFontSize: optionalSize,
  phoneBold: optionalFlag,
  labelTitleFontSize: optionalSize,
  labelTitleBold: optionalFlag,
  codFontSize: optionalSize,
  codBold: optionalFlag,
  lineSpacingFactor: z.number().nullish(),
  enableAutoSizing: optionalFlag,
  maxLinesAddress: optionalSize,
  subtitleFontSize: optionalSize,
  subtitleBold: optionalFlag,
  contentFontSize: optionalSize,
  contentBold: optionalFlag,
  smallFontSize: optionalSize,
  smallBold: optionalFlag,
  titleFontSize: optionalSize,
  titleBold: optionalFlag,
});

export class FontSettingsMapError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('font settings map is malformed');
    this.name = 'FontSettingsMapError';
    this.issues = issues;
  }
}

export function withFontSettings(settings: FontSettings, patch: FontSettingsPatch): FontSettings {
  const next: FontSettings = { ...settings, ...patch };

  return {
    ...next,
    headerFontSize: clampFontSize(next.headerFontSize),
    nameFontSize: clampFontSize(next.nameFontSize),
    addressFontSize: clampFontSize(next.addressFontSize),
    phoneFontSize: clampFontSize(next.phoneFontSize),
    labelTitleFontSize: clampFontSize(next.labelTitleFontSize),
    codFontSize: clampFontSize(next.codFontSize),
  };
}

export function fontSettingsToMap(settings: FontSettings): FontSettingsMap {
  return {
    headerFontSize: settings.headerFontSize,
    headerBold: settings.headerBold,
    nameFontSize: settings.nameFontSize,
    nameBold: settings.nameBold,
    addressFontSize: settings.addressFontSize,
    addressBold: settings.addressBold,
    phoneFontSize: settings.phoneFontSize,
    phoneBold: settings.phoneBold,
    labelTitleFontSize: settings.labelTitleFontSize,
    labelTitleBold: settings.labelTitleBold,
    codFontSize: settings.codFontSize,
    codBold: settings.codBold,
    lineSpacingFactor: settings.lineSpacingFactor,
    enableAutoSizing: settings.enableAutoSizing,
    maxLinesAddress: settings.maxLinesAddress,
  };
}

/**
 * Reads a persisted settings map. Current keys win over legacy aliases, and any
 * key missing from both falls back to {@link DEFAULT_FONT_SETTINGS}.
 *
 * @throws FontSettingsMapError when a present key carries a value of the wrong type.
 */
export function fontSettingsFromMap(value: unknown): FontSettings {
  const result = fontSettingsMapSchema.safeParse(value);
  if (!result.success) {
    throw new FontSettingsMapError(
      result.error.issues.map((issue) => {
        const path = issue.path.length ? issue.path.join('.') : 'settings';
        return `${path}: ${issue.message}`;
      })
    );
  }

  const map = result.data;
  const defaults = DEFAULT_FONT_SETTINGS;

  return withFontSettings(defaults, {
    headerFontSize: map.headerFontSize ?? map.subtitleFontSize ?? defaults.headerFontSize,
    headerBold: map.headerBold ?? map.subtitleBold ?? defaults.headerBold,
    nameFontSize: map.nameFontSize ?? map.contentFontSize ?? defaults.nameFontSize,
    nameBold: map.nameBold ?? map.contentBold ?? defaults.nameBold,
    addressFontSize: map.addressFontSize ?? map.contentFontSize ?? defaults.addressFontSize,
    addressBold: map.addressBold ?? map.contentBold ?? defaults.addressBold,
    phoneFontSize: map.phoneFontSize ?? map.smallFontSize ?? defaults.phoneFontSize,
    phoneBold: map.phoneBold ?? map.smallBold ?? defaults.phoneBold,
    labelTitleFontSize: map.labelTitleFontSize ?? map.titleFontSize ?? defaults.labelTitleFontSize,
    labelTitleBold: map.labelTitleBold ?? map.titleBold ?? defaults.labelTitleBold,
    codFontSize: map.codFontSize ?? defaults.codFontSize,
    codBold: map.codBold ?? defaults.codBold,
    lineSpacingFactor: map.lineSpacingFactor ?? defaults.lineSpacingFactor,
    enableAutoSizing: map.enableAutoSizing ?? defaults.enableAutoSizing,
    maxLinesAddress: map.maxLinesAddress ?? defaults.maxLinesAddress,
  });
}

export function fontSettingsEqual(a: FontSettings, b: FontSettings): boolean {
  return FONT_SETTINGS_KEYS.every((key) => a[key] === b[key]);
}

export function describeFontSettings(settings: FontSettings): string {
  const flag = (bold: boolean) => (bold ? 'B' : 'N');

  return (
    `FontSettings(header: ${settings.headerFontSize}/${flag(settings.headerBold)}, ` +
    `name: ${settings.nameFontSize}/${flag(settings.nameBold)}, ` +
    `address: ${settings.addressFontSize}/${flag(settings.addressBold)}, ` +
    `phone: ${settings.phoneFontSize}/${flag(settings.phoneBold)}, ` +
    `labelTitle: ${settings.labelTitleFontSize}/${flag(settings.labelTitleBold)}, ` +
    `cod: ${settings.codFontSize}/${flag(settings.codBold)}, ` +
    `spacing: ${settings.lineSpacingFactor}x, ` +
    `autoSize: ${settings.enableAutoSizing}, ` +
    `maxLines: ${settings.maxLinesAddress})`
  );
}

export function validateFontSettings(settings: FontSettings): string[] {
  const errors: string[] = [];

  for (const key of FONT_SIZE_KEYS) {
    const size = settings[key];
    if (!Number.isInteger(size) || size < MIN_FONT_SIZE || size > MAX_FONT_SIZE) {
      errors.push(`${key} must be an integer between ${MIN_FONT_SIZE} and ${MAX_FONT_SIZE}`);
    }
  }

  if (
    !Number.isFinite(settings.lineSpacingFactor) ||
    settings.lineSpacingFactor < MIN_LINE_SPACING_FACTOR ||
    settings.lineSpacingFactor > MAX_LINE_SPACING_FACTOR
  ) {
    errors.push(
      `lineSpacingFactor must be between ${MIN_LINE_SPACING_FACTOR} and ${MAX_LINE_SPACING_FACTOR}`
    );
  }

  if (
    !Number.isInteger(settings.maxLinesAddress) ||
    settings.maxLinesAddress < MIN_ADDRESS_LINES ||
    settings.maxLinesAddress > MAX_ADDRESS_LINES
  ) {
    errors.push(
      `maxLinesAddress must be an integer between ${MIN_ADDRESS_LINES} and ${MAX_ADDRESS_LINES}`
    );
  }

  return errors;
}

export function clampLineSpacingFactor(value: number): number {
  return clampNumber(value, MIN_LINE_SPACING_FACTOR, MAX_LINE_SPACING_FACTOR);
}

export function clampAddressLines(value: number): number {
  return clampInt(value, MIN_ADDRESS_LINES, MAX_ADDRESS_LINES);
}
