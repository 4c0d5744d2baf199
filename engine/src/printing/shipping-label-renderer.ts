import { buildTscFontCommand, estimateTextDimensions } from '../fonts/font-resolver.ts';
import {
  clampAddressLines,
  clampLineSpacingFactor,
  describeFontSettings,
  withFontSettings,
  type FontSettings,
} from '../models/font-settings.ts';
import type { LabelConfig } from '../models/label-config.ts';
import { contactPhoneNumbers, type ContactInfo, type ShippingLabel } from '../models/shipping-label.ts';
import { clampNumber, mmToWholeDots } from '../layout/units.ts';
import { splitAddress } from './address-lines.ts';
import {
  buildLabelSetupCommands,
  printCommand,
  sanitizeTsplText,
  textCommand,
  toTsplProgram,
} from './tspl-commands.ts';

const TOP_MARGIN_DOTS = 20;
const LEFT_MARGIN_DOTS = 20;
const BOTTOM_MARGIN_DOTS = 20;
const HORIZONTAL_MARGINS_DOTS = 40;

const TITLE_BLOCK_MIN_HEIGHT_MM = 80;
const DETAILS_BLOCK_MIN_HEIGHT_MM = 60;

// Address wrap width used only while estimating height: ten characters per allowed line.
const ESTIMATE_CHARS_PER_ADDRESS_LINE = 10;

const AUTO_SIZE_SPACING_SCALE = 0.9;
const AUTO_SIZE_FALLBACK_SPACING = 0.8;
const TIGHT_LAYOUT_SPACING_SCALE = 0.8;

export type ShippingLabelRenderLog = {
  level: 'info' | 'warn';
  event: 'shipping_label_rendered';
  labelId: string;
  labelConfig: string;
  estimatedHeightDots: number;
  availableHeightDots: number;
  contentFits: boolean;
  autoSized: boolean;
  fontSettings: string;
};

export type RenderShippingLabelDependencies = {
  onLog?: (entry: ShippingLabelRenderLog) => void;
};

export type RenderedShippingLabel = {
  commands: string[];
  program: string;
  estimatedHeightDots: number;
  contentFits: boolean;
  autoSized: boolean;
  effectiveSettings: FontSettings;
};

/**
 * Rough height of the printed content in dots, used to decide whether the
 * configured fonts fit the label before any command is laid out.
 */
export function estimateContentHeight(
  label: ShippingLabel,
  config: LabelConfig,
  settings: FontSettings
): number {
  const spacing = settings.lineSpacingFactor;
  const titleHeight = estimateTextDimensions(settings, 'labelTitle').height;
  const headerHeight = estimateTextDimensions(settings, 'header').height;
  const contentHeight = estimateTextDimensions(settings, 'name').height;
  const phoneHeight = estimateTextDimensions(settings, 'phone').height;

  const baseLineSpacing = Math.round(contentHeight * spacing);
  const sectionSpacing = baseLineSpacing;
  const addressWidth = settings.maxLinesAddress * ESTIMATE_CHARS_PER_ADDRESS_LINE;

  const sectionHeight = (contact: ContactInfo): number => {
    let height = Math.round(headerHeight * spacing);
    height += Math.round(contentHeight * spacing) + 5;

    if (contact.address !== '') {
      const lines = splitAddress(contact.address, addressWidth);
      height += lines.length * (baseLineSpacing - 5) + 5;
    }

    if (contactPhoneNumbers(contact).length > 0) {
      height += Math.round(phoneHeight * spacing);
    }

    return height + sectionSpacing;
  };

  let total = TOP_MARGIN_DOTS;

  if (config.heightMm >= TITLE_BLOCK_MIN_HEIGHT_MM) {
    total += Math.round(titleHeight * spacing) + sectionSpacing;
    total += contentHeight;
  }

  total += sectionHeight(label.toInfo);
  total += sectionHeight(label.fromInfo);

  if (config.heightMm >= DETAILS_BLOCK_MIN_HEIGHT_MM) {
    total += Math.round(phoneHeight * spacing) * 2;
  }

  return total;
}

export function availableContentHeight(config: LabelConfig): number {
  return mmToWholeDots(config.heightMm) - BOTTOM_MARGIN_DOTS;
}

/**
 * Shrinks title, header and name one step and tightens spacing. When that still
 * overflows, the title drops a second step, addresses shrink and lose a line.
 */
export function autoSizeFontSettings(
  settings: FontSettings,
  label: ShippingLabel,
  config: LabelConfig
): FontSettings {
  const candidate = withFontSettings(settings, {
    labelTitleFontSize: settings.labelTitleFontSize - 1,
    headerFontSize: settings.headerFontSize - 1,
    nameFontSize: settings.nameFontSize - 1,
    lineSpacingFactor: clampLineSpacingFactor(settings.lineSpacingFactor * AUTO_SIZE_SPACING_SCALE),
  });

  if (estimateContentHeight(label, config, candidate) <= availableContentHeight(config)) {
    return candidate;
  }

  return withFontSettings(candidate, {
    labelTitleFontSize: settings.labelTitleFontSize - 2,
    addressFontSize: settings.addressFontSize - 1,
    lineSpacingFactor: AUTO_SIZE_FALLBACK_SPACING,
    maxLinesAddress: clampAddressLines(settings.maxLinesAddress - 1),
  });
}

export function formatPhoneLine(contact: ContactInfo): string {
  const phones = contactPhoneNumbers(contact).map(sanitizeTsplText);
  return phones.length > 0 ? `TEL: ${phones.join(' / ')}` : '';
}

export function formatCodLine(amount: number): string {
  return `COD: Rs ${amount.toFixed(2)}`;
}

export function renderShippingLabel(
  label: ShippingLabel,
  config: LabelConfig,
  settings: FontSettings,
  deps: RenderShippingLabelDependencies = {}
): RenderedShippingLabel {
  const commands = buildLabelSetupCommands(config);
  const widthDots = mmToWholeDots(config.widthMm);
  const maxTextWidthDots = widthDots - HORIZONTAL_MARGINS_DOTS;

  const estimatedHeightDots = estimateContentHeight(label, config, settings);
  const availableHeightDots = availableContentHeight(config);
  const contentFits = estimatedHeightDots <= availableHeightDots;
  const autoSized = settings.enableAutoSizing && !contentFits;

  const effective = autoSized ? autoSizeFontSettings(settings, label, config) : settings;
  const spacing = autoSized
    ? clampNumber(
        effective.lineSpacingFactor * TIGHT_LAYOUT_SPACING_SCALE,
        0.5,
        effective.lineSpacingFactor
      )
    : effective.lineSpacingFactor;

  const contentWidth = estimateTextDimensions(effective, 'name').width;
  const maxAddressChars = Math.trunc(maxTextWidthDots / contentWidth);

  const headerLineHeight = Math.round(estimateTextDimensions(effective, 'header').height * spacing * 1.5);
  const contentLineHeight = Math.round(estimateTextDimensions(effective, 'name').height * spacing * 1.2);
  const phoneLineHeight = Math.round(estimateTextDimensions(effective, 'phone').height * spacing);
  const sectionSpacing = contentLineHeight;

  const headerFont = buildTscFontCommand(effective, 'header');
  const nameFont = buildTscFontCommand(effective, 'name');
  const addressFont = buildTscFontCommand(effective, 'address');
  const phoneFont = buildTscFontCommand(effective, 'phone');

  let y = TOP_MARGIN_DOTS;

  const writeSection = (heading: string, contact: ContactInfo): void => {
    commands.push(textCommand(LEFT_MARGIN_DOTS, y, headerFont, heading));
    y += headerLineHeight + 5;

    commands.push(textCommand(LEFT_MARGIN_DOTS, y, nameFont, sanitizeTsplText(contact.name)));
    y += contentLineHeight + 10;

    if (contact.address !== '') {
      for (const line of splitAddress(contact.address, maxAddressChars)) {
        commands.push(textCommand(LEFT_MARGIN_DOTS, y, addressFont, sanitizeTsplText(line)));
        y += contentLineHeight - 2;
      }
      y += 10;
    }

    const phoneLine = formatPhoneLine(contact);
    if (phoneLine !== '') {
      commands.push(textCommand(LEFT_MARGIN_DOTS, y, phoneFont, phoneLine));
      y += phoneLineHeight;
    }

    y += sectionSpacing;
  };

  writeSection('TO:', label.toInfo);
  writeSection('FROM:', label.fromInfo);

  if (label.codEnabled && label.codAmount > 0) {
    commands.push(
      textCommand(
        LEFT_MARGIN_DOTS,
        y,
        buildTscFontCommand(effective, 'cod'),
        formatCodLine(label.codAmount)
      )
    );
  }

  commands.push(printCommand(1, 1));

  deps.onLog?.({
    level: contentFits ? 'info' : 'warn',
    event: 'shipping_label_rendered',
    labelId: label.id,
    labelConfig: config.name,
    estimatedHeightDots,
    availableHeightDots,
    contentFits,
    autoSized,
    fontSettings: describeFontSettings(effective),
  });

  return {
    commands,
    program: toTsplProgram(commands),
    estimatedHeightDots,
    contentFits,
    autoSized,
    effectiveSettings: effective,
  };
}
