import { z } from 'zod';

import { clampInt, clampNumber, mmToDots } from '../layout/units.ts';
import type { LabelConfig } from './label-config.ts';

export const LABEL_ELEMENT_TYPES = [
  'toHeader',
  'fromHeader',
  'toName',
  'fromName',
  'toAddress',
  'fromAddress',
  'toPhone',
  'fromPhone',
  'text',
  'icon',
  'separator',
  'labelTitle',
] as const;

export type LabelElementType = (typeof LABEL_ELEMENT_TYPES)[number];

export const MIN_FONT_SIZE = 1;
export const MAX_FONT_SIZE = 8;

const DEFAULT_ELEMENT_FONT_SIZE = 3;

// Keeps a dragged element's anchor inside the printable area.
const MOVE_RIGHT_CLEARANCE_DOTS = 50;
const MOVE_BOTTOM_CLEARANCE_DOTS = 20;

export type LabelElement = {
  readonly id: string;
  readonly type: LabelElementType;
  readonly content: string;
  /** Dots from the left edge. */
  readonly x: number;
  /** Dots from the top edge. */
  readonly y: number;
  readonly fontSize: number;
  readonly isBold: boolean;
  readonly isVisible: boolean;
  readonly iconPath?: string;
  readonly iconWidth?: number;
  readonly iconHeight?: number;
};

export type LabelElementPatch = Partial<Omit<LabelElement, 'id'>>;

export type LabelElementMap = {
  id: string;
  type: LabelElementType;
  content: string;
  x: number;
  y: number;
  fontSize: number;
  isBold: boolean;
  isVisible: boolean;
  iconPath: string | null;
  iconWidth: number | null;
  iconHeight: number | null;
};

const labelElementTypeSchema = z.enum(LABEL_ELEMENT_TYPES);

export const labelElementMapSchema = z.object({
  id: z.string().min(1),
  // Element types written by newer releases read back as free text.
  type: z.string().transform((value) => {
    const parsed = labelElementTypeSchema.safeParse(value);
    return parsed.success ? parsed.data : 'text';
  }),
  content: z.string(),
  x: z.number(),
  y: z.number(),
  fontSize: z
    .number()
    .int()
    .nullish()
    .transform((value) => value ?? DEFAULT_ELEMENT_FONT_SIZE),
  isBold: z
    .boolean()
    .nullish()
    .transform((value) => value ?? false),
  isVisible: z
    .boolean()
    .nullish()
    .transform((value) => value ?? true),
  iconPath: z.string().nullish(),
  iconWidth: z.number().nullish(),
  iconHeight: z.number().nullish(),
});

const DISPLAY_NAMES: Record<LabelElementType, string> = {
  toHeader: 'TO Header',
  fromHeader: 'FROM Header',
  toName: 'TO Name',
  fromName: 'FROM Name',
  toAddress: 'TO Address',
  fromAddress: 'FROM Address',
  toPhone: 'TO Phone',
  fromPhone: 'FROM Phone',
  text: 'Custom Text',
  icon: 'Icon/Image',
  separator: 'Separator',
  labelTitle: 'Label Title',
};

const DEFAULT_CONTENT: Record<LabelElementType, string> = {
  toHeader: 'TO:',
  fromHeader: 'FROM:',
  toName: '[TO NAME]',
  fromName: '[FROM NAME]',
  toAddress: '[TO ADDRESS]',
  fromAddress: '[FROM ADDRESS]',
  toPhone: '[TO PHONE]',
  fromPhone: '[FROM PHONE]',
  text: 'Custom Text',
  icon: '',
  separator: '---------------',
  labelTitle: 'SHIPPING LABEL',
};

export function labelElementTypeDisplayName(type: LabelElementType): string {
  return DISPLAY_NAMES[type];
}

export function defaultElementContent(type: LabelElementType): string {
  return DEFAULT_CONTENT[type];
}

export function defaultElementFontSize(type: LabelElementType): number {
  switch (type) {
    case 'labelTitle':
      return 5;
    case 'toHeader':
    case 'fromHeader':
      return 4;
    case 'toName':
    case 'fromName':
      return 3;
    default:
      return 2;
  }
}

export function defaultElementBold(type: LabelElementType): boolean {
  return type === 'labelTitle' || type === 'toHeader' || type === 'fromHeader';
}

export function clampFontSize(fontSize: number): number {
  return clampInt(fontSize, MIN_FONT_SIZE, MAX_FONT_SIZE);
}

export function createLabelElement(
  type: LabelElementType,
  placement: { id: string; x: number; y: number },
  overrides: LabelElementPatch = {}
): LabelElement {
  return updateLabelElement(
    {
      id: placement.id,
      type,
      content: defaultElementContent(type),
      x: placement.x,
      y: placement.y,
      fontSize: defaultElementFontSize(type),
      isBold: defaultElementBold(type),
      isVisible: true,
    },
    overrides
  );
}

export function updateLabelElement(element: LabelElement, patch: LabelElementPatch): LabelElement {
  const next: LabelElement = { ...element, ...patch };
  return { ...next, fontSize: clampFontSize(next.fontSize) };
}

export function moveLabelElement(
  element: LabelElement,
  position: { x: number; y: number },
  config: LabelConfig
): LabelElement {
  const maxX = Math.max(0, mmToDots(config.widthMm) - MOVE_RIGHT_CLEARANCE_DOTS);
  const maxY = Math.max(0, mmToDots(config.heightMm) - MOVE_BOTTOM_CLEARANCE_DOTS);

  return updateLabelElement(element, {
    x: clampNumber(position.x, 0, maxX),
    y: clampNumber(position.y, 0, maxY),
  });
}

export function labelElementToMap(element: LabelElement): LabelElementMap {
  return {
    id: element.id,
    type: element.type,
    content: element.content,
    x: element.x,
    y: element.y,
    fontSize: element.fontSize,
    isBold: element.isBold,
    isVisible: element.isVisible,
    iconPath: element.iconPath ?? null,
    iconWidth: element.iconWidth ?? null,
    iconHeight: element.iconHeight ?? null,
  };
}

export function labelElementFromParsedMap(map: z.infer<typeof labelElementMapSchema>): LabelElement {
  return {
    id: map.id,
    type: map.type,
    content: map.content,
    x: map.x,
    y: map.y,
    fontSize: clampFontSize(map.fontSize),
    isBold: map.isBold,
    isVisible: map.isVisible,
    ...(map.iconPath != null ? { iconPath: map.iconPath } : {}),
    ...(map.iconWidth != null ? { iconWidth: map.iconWidth } : {}),
    ...(map.iconHeight != null ? { iconHeight: map.iconHeight } : {}),
  };
}

export function labelElementFromMap(value: unknown): LabelElement | null {
  const result = labelElementMapSchema.safeParse(value);
  return result.success ? labelElementFromParsedMap(result.data) : null;
}
