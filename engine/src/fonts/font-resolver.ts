import type { FontSettings } from '../models/font-settings.ts';
import { clampFontSize } from '../models/label-element.ts';
import { clampInt } from '../layout/units.ts';
import type { FontRole } from './font-roles.ts';

/**
 * TSPL built-in bitmap font "2" is a 12x20 dot cell; every role prints with it and
 * scales through the magnification pair rather than switching font index.
 */
export const BASE_FONT_ID = '2';
export const BASE_GLYPH_WIDTH_DOTS = 12;
export const BASE_GLYPH_HEIGHT_DOTS = 20;
export const TEXT_ROTATION = 0;

const MIN_MAGNIFICATION = 1;
const MAX_MAGNIFICATION = 4;

export type RoleFont = {
  fontSize: number;
  bold: boolean;
};

export type Magnification = {
  x: number;
  y: number;
};

export type TextDimensions = {
  width: number;
  height: number;
};

export function resolveRoleFont(settings: FontSettings, role: FontRole): RoleFont {
  switch (role) {
    case 'header':
      return { fontSize: settings.headerFontSize, bold: settings.headerBold };
    case 'name':
      return { fontSize: settings.nameFontSize, bold: settings.nameBold };
    case 'address':
      return { fontSize: settings.addressFontSize, bold: settings.addressBold };
    case 'phone':
      return { fontSize: settings.phoneFontSize, bold: settings.phoneBold };
    case 'labelTitle':
      return { fontSize: settings.labelTitleFontSize, bold: settings.labelTitleBold };
    case 'cod':
      return { fontSize: settings.codFontSize, bold: settings.codBold };
  }
}

/**
 * Sizes 1-2 map to 1x, 3-4 to 2x, 5-6 to 3x and 7-8 to 4x. Bold widens the glyph by
 * one extra horizontal step.
 */
export function computeMagnification(fontSize: number, bold: boolean): Magnification {
  const size = clampFontSize(fontSize);
  const multiplier = clampInt(Math.floor((size + 1) / 2), MIN_MAGNIFICATION, MAX_MAGNIFICATION);

  return {
    x: bold ? multiplier + 1 : multiplier,
    y: multiplier,
  };
}

export function formatFontFragment(magnification: Magnification): string {
  return `"${BASE_FONT_ID}",${TEXT_ROTATION},${magnification.x},${magnification.y}`;
}

export function measureMagnifiedGlyph(magnification: Magnification): TextDimensions {
  return {
    width: BASE_GLYPH_WIDTH_DOTS * magnification.x,
    height: BASE_GLYPH_HEIGHT_DOTS * magnification.y,
  };
}

/** The `"font",rotation,x-mult,y-mult` part of a TSPL `TEXT` command for the role. */
export function buildTscFontCommand(settings: FontSettings, role: FontRole): string {
  const font = resolveRoleFont(settings, role);
  return formatFontFragment(computeMagnification(font.fontSize, font.bold));
}

/** Size of one glyph cell in dots, used for line heights and wrapping widths. */
export function estimateTextDimensions(settings: FontSettings, role: FontRole): TextDimensions {
  const font = resolveRoleFont(settings, role);
  return measureMagnifiedGlyph(computeMagnification(font.fontSize, font.bold));
}
