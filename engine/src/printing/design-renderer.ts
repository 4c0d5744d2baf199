import {
  computeMagnification,
  formatFontFragment,
  measureMagnifiedGlyph,
} from '../fonts/font-resolver.ts';
import type { CustomLabelDesign } from '../models/custom-label-design.ts';
import {
  defaultElementContent,
  type LabelElement,
  type LabelElementType,
} from '../models/label-element.ts';
import type { ContactInfo, ShippingLabel } from '../models/shipping-label.ts';
import { mmToWholeDots } from '../layout/units.ts';
import { splitAddress } from './address-lines.ts';
import { formatPhoneLine } from './shipping-label-renderer.ts';
import {
  barCommand,
  buildLabelSetupCommands,
  printCommand,
  sanitizeTsplText,
  textCommand,
  toTsplProgram,
} from './tspl-commands.ts';

const SEPARATOR_THICKNESS_DOTS = 2;
const RIGHT_MARGIN_DOTS = 20;

export type DesignRenderLog =
  | {
      level: 'info';
      event: 'label_design_rendered';
      designId: string;
      printedElements: number;
      skippedElements: number;
    }
  | {
      level: 'warn';
      event: 'label_design_element_skipped';
      designId: string;
      elementId: string;
      reason: 'icon_not_supported' | 'outside_label';
    };

export type RenderLabelDesignOptions = {
  /** Shipping label whose contacts replace the placeholder content of bound elements. */
  bindings?: ShippingLabel;
  onLog?: (entry: DesignRenderLog) => void;
};

export type RenderedLabelDesign = {
  commands: string[];
  program: string;
};

type ContactField = 'name' | 'address' | 'phone';

const CONTACT_BINDINGS: Partial<Record<LabelElementType, { side: 'to' | 'from'; field: ContactField }>> = {
  toName: { side: 'to', field: 'name' },
  toAddress: { side: 'to', field: 'address' },
  toPhone: { side: 'to', field: 'phone' },
  fromName: { side: 'from', field: 'name' },
  fromAddress: { side: 'from', field: 'address' },
  fromPhone: { side: 'from', field: 'phone' },
};

/**
 * Content lines for an element. Bound elements that still show their placeholder
 * take the contact's value; anything the user typed over the placeholder prints as is.
 */
export function resolveElementLines(
  element: LabelElement,
  bindings: ShippingLabel | undefined,
  addressWidthChars: number
): string[] {
  const binding = CONTACT_BINDINGS[element.type];
  if (!bindings || !binding || element.content !== defaultElementContent(element.type)) {
    return [sanitizeTsplText(element.content)];
  }

  const contact: ContactInfo = binding.side === 'to' ? bindings.toInfo : bindings.fromInfo;
  switch (binding.field) {
    case 'name':
      return [sanitizeTsplText(contact.name)];
    case 'address':
      return splitAddress(contact.address, addressWidthChars).map(sanitizeTsplText);
    case 'phone':
      return [formatPhoneLine(contact)];
  }
}

export function renderLabelDesign(
  design: CustomLabelDesign,
  options: RenderLabelDesignOptions = {}
): RenderedLabelDesign {
  const config = design.labelConfig;
  const widthDots = mmToWholeDots(config.widthMm);
  const heightDots = mmToWholeDots(config.heightMm);
  const commands = buildLabelSetupCommands(config);
  let printed = 0;
  let skipped = 0;

  const skip = (element: LabelElement, reason: 'icon_not_supported' | 'outside_label') => {
    skipped += 1;
    options.onLog?.({
      level: 'warn',
      event: 'label_design_element_skipped',
      designId: design.id,
      elementId: element.id,
      reason,
    });
  };

  for (const element of design.elements) {
    if (!element.isVisible) {
      continue;
    }

    if (element.x >= widthDots || element.y >= heightDots) {
      skip(element, 'outside_label');
      continue;
    }

    if (element.type === 'icon') {
      skip(element, 'icon_not_supported');
      continue;
    }

    if (element.type === 'separator') {
      const width = Math.max(0, widthDots - RIGHT_MARGIN_DOTS - element.x);
      commands.push(barCommand(element.x, element.y, width, SEPARATOR_THICKNESS_DOTS));
      printed += 1;
      continue;
    }

    const magnification = computeMagnification(element.fontSize, element.isBold);
    const glyph = measureMagnifiedGlyph(magnification);
    const fontFragment = formatFontFragment(magnification);
    const addressWidthChars = Math.trunc((widthDots - RIGHT_MARGIN_DOTS - element.x) / glyph.width);

    const lines = resolveElementLines(element, options.bindings, addressWidthChars);
    lines.forEach((line, index) => {
      commands.push(textCommand(element.x, element.y + index * glyph.height, fontFragment, line));
    });
    printed += 1;
  }

  commands.push(printCommand(1, 1));

  options.onLog?.({
    level: 'info',
    event: 'label_design_rendered',
    designId: design.id,
    printedElements: printed,
    skippedElements: skipped,
  });

  return {
    commands,
    program: toTsplProgram(commands),
  };
}
