import type { CustomLabelDesign } from '../models/custom-label-design.ts';
import { labelConfigId, type LabelConfig } from '../models/label-config.ts';
import { createLabelElement, type LabelElement, type LabelElementType } from '../models/label-element.ts';
import { mmToDots } from './units.ts';

export const LAYOUT_TOP_MARGIN_DOTS = 20;
export const LAYOUT_LEFT_MARGIN_DOTS = 20;

/** Labels at least this tall get a `SHIPPING LABEL` title above the TO block. */
export const TITLE_MIN_LABEL_HEIGHT_MM = 80;

// Empirical clearances below the cursor; kept as measured on printed stock.
export const FROM_SECTION_CLEARANCE_DOTS = 120;
export const FROM_PHONE_CLEARANCE_DOTS = 30;

const CURSOR_ADVANCE_DOTS = {
  labelTitle: 60,
  toHeader: 40,
  toName: 35,
  toAddress: 60,
  toPhone: 50,
  fromHeader: 40,
  fromName: 35,
} as const;

type LayoutCursor = {
  readonly elements: LabelElement[];
  y: number;
};

function place(
  cursor: LayoutCursor,
  id: string,
  type: LabelElementType & keyof typeof CURSOR_ADVANCE_DOTS,
  x: number = LAYOUT_LEFT_MARGIN_DOTS
): void {
  cursor.elements.push(createLabelElement(type, { id, x, y: cursor.y }));
  cursor.y += CURSOR_ADVANCE_DOTS[type];
}

/**
 * Starting layout for a blank label: optional title, the TO block, then as much of
 * the FROM block as fits above the bottom edge. Deterministic in the label size.
 */
export function generateDefaultLayout(config: LabelConfig): LabelElement[] {
  const widthDots = mmToDots(config.widthMm);
  const heightDots = mmToDots(config.heightMm);
  const cursor: LayoutCursor = { elements: [], y: LAYOUT_TOP_MARGIN_DOTS };

  if (config.heightMm >= TITLE_MIN_LABEL_HEIGHT_MM) {
    place(cursor, 'title', 'labelTitle', widthDots / 2);
  }

  place(cursor, 'to_header', 'toHeader');
  place(cursor, 'to_name', 'toName');
  place(cursor, 'to_address', 'toAddress');
  place(cursor, 'to_phone', 'toPhone');

  if (cursor.y + FROM_SECTION_CLEARANCE_DOTS < heightDots) {
    place(cursor, 'from_header', 'fromHeader');
    place(cursor, 'from_name', 'fromName');

    if (cursor.y + FROM_PHONE_CLEARANCE_DOTS < heightDots) {
      cursor.elements.push(
        createLabelElement('fromPhone', {
          id: 'from_phone',
          x: LAYOUT_LEFT_MARGIN_DOTS,
          y: cursor.y,
        })
      );
    }
  }

  return cursor.elements;
}

export function createDefaultDesign(
  config: LabelConfig,
  options: { now?: () => Date } = {}
): CustomLabelDesign {
  const now = options.now?.() ?? new Date();

  return {
    id: `default_${labelConfigId(config)}`,
    name: `Default ${config.name}`,
    description: `Default layout for ${config.name} labels`,
    labelConfig: config,
    elements: generateDefaultLayout(config),
    createdAt: now,
    updatedAt: now,
    isDefault: true,
  };
}
