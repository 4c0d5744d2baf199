import { describe, expect, it } from 'vitest';

import {
  DEFAULT_FONT_SETTINGS,
  withFontSettings,
  type FontSettings,
} from '../../engine/src/models/font-settings.ts';
import { LABEL_CONFIG_PRESETS, type LabelConfig } from '../../engine/src/models/label-config.ts';
import { EMPTY_CONTACT } from '../../engine/src/models/shipping-label.ts';
import {
  autoSizeFontSettings,
  availableContentHeight,
  estimateContentHeight,
  formatCodLine,
  formatPhoneLine,
  renderShippingLabel,
  type ShippingLabelRenderLog,
} from '../../engine/src/printing/shipping-label-renderer.ts';
import { createShippingLabel } from './fixtures/label-fixtures.ts';

const COMPACT = LABEL_CONFIG_PRESETS[0];
const LARGE = LABEL_CONFIG_PRESETS[4];

const label = createShippingLabel({
  id: 'label-100',
  toInfo: {
    name: 'Test Receiver',
    address: '12 Lake Road\nColombo 05',
    phoneNumber1: '0770000001',
    phoneNumber2: '',
  },
  fromInfo: {
    name: 'Test Sender',
    address: '8 Hill Street',
    phoneNumber1: '0110000002',
    phoneNumber2: '0770000003',
  },
});

describe('shipping-label-renderer', () => {
  it('estimates content height from the role fonts and spacing', () => {
    expect(estimateContentHeight(label, COMPACT, DEFAULT_FONT_SETTINGS)).toBe(505);
    expect(estimateContentHeight(label, LARGE, DEFAULT_FONT_SETTINGS)).toBe(713);
    expect(estimateContentHeight({ ...label, fromInfo: EMPTY_CONTACT }, COMPACT, DEFAULT_FONT_SETTINGS)).toBe(433);
    expect(availableContentHeight(COMPACT)).toBe(380);
  });

  it('shrinks fonts one step when that is enough to fit', () => {
    expect(autoSizeFontSettings(DEFAULT_FONT_SETTINGS, label, COMPACT)).toEqual({
      ...DEFAULT_FONT_SETTINGS,
      labelTitleFontSize: 4,
      headerFontSize: 3,
      nameFontSize: 2,
      lineSpacingFactor: 1.08,
    });
  });

  it('falls back to smaller addresses and tight spacing on very short labels', () => {
    const strip: LabelConfig = { name: 'Strip', widthMm: 80, heightMm: 20, spacingMm: 2, description: '' };

    expect(autoSizeFontSettings(DEFAULT_FONT_SETTINGS, label, strip)).toEqual({
      ...DEFAULT_FONT_SETTINGS,
      labelTitleFontSize: 3,
      headerFontSize: 3,
      nameFontSize: 2,
      addressFontSize: 1,
      lineSpacingFactor: 0.8,
      maxLinesAddress: 2,
    });
  });

  it('lays out an auto-sized compact label', () => {
    const logs: ShippingLabelRenderLog[] = [];
    const rendered = renderShippingLabel(label, COMPACT, DEFAULT_FONT_SETTINGS, {
      onLog: (entry) => logs.push(entry),
    });

    expect(rendered.commands.slice(10)).toEqual([
      'TEXT 20,20,"2",0,3,2,"TO:"',
      'TEXT 20,77,"2",0,1,1,"Test Receiver"',
      'TEXT 20,108,"2",0,1,1,"12 Lake Road"',
      'TEXT 20,127,"2",0,1,1,"Colombo 05"',
      'TEXT 20,156,"2",0,1,1,"TEL: 0770000001"',
      'TEXT 20,194,"2",0,3,2,"FROM:"',
      'TEXT 20,251,"2",0,1,1,"Test Sender"',
      'TEXT 20,282,"2",0,1,1,"8 Hill Street"',
      'TEXT 20,311,"2",0,1,1,"TEL: 0110000002 / 0770000003"',
      'PRINT 1,1',
    ]);
    expect(rendered.commands[0]).toBe('SIZE 80 mm, 50 mm');
    expect(rendered).toMatchObject({ estimatedHeightDots: 505, contentFits: false, autoSized: true });
    expect(logs).toEqual([
      {
        level: 'warn',
        event: 'shipping_label_rendered',
        labelId: 'label-100',
        labelConfig: '80mm × 50mm',
        estimatedHeightDots: 505,
        availableHeightDots: 380,
        contentFits: false,
        autoSized: true,
        fontSettings:
          'FontSettings(header: 3/B, name: 2/N, address: 2/N, phone: 2/N, labelTitle: 4/B, cod: 3/B, ' +
          'spacing: 1.08x, autoSize: true, maxLines: 3)',
      },
    ]);
  });

  it('keeps the configured fonts and prints COD when the content fits', () => {
    const codLabel = { ...label, codEnabled: true, codAmount: 1500 };
    const logs: ShippingLabelRenderLog[] = [];
    const rendered = renderShippingLabel(codLabel, LARGE, DEFAULT_FONT_SETTINGS, {
      onLog: (entry) => logs.push(entry),
    });

    expect(rendered.commands.slice(10)).toEqual([
      'TEXT 20,20,"2",0,3,2,"TO:"',
      'TEXT 20,97,"2",0,2,2,"Test Receiver"',
      'TEXT 20,165,"2",0,1,1,"12 Lake Road"',
      'TEXT 20,221,"2",0,1,1,"Colombo 05"',
      'TEXT 20,287,"2",0,1,1,"TEL: 0770000001"',
      'TEXT 20,369,"2",0,3,2,"FROM:"',
      'TEXT 20,446,"2",0,2,2,"Test Sender"',
      'TEXT 20,514,"2",0,1,1,"8 Hill Street"',
      'TEXT 20,580,"2",0,1,1,"TEL: 0110000002 / 0770000003"',
      'TEXT 20,662,"2",0,3,2,"COD: Rs 1500.00"',
      'PRINT 1,1',
    ]);
    expect(rendered.effectiveSettings).toBe(DEFAULT_FONT_SETTINGS);
    expect(rendered.program.endsWith('PRINT 1,1\r\n')).toBe(true);
    expect(logs[0]).toMatchObject({ level: 'info', contentFits: true, autoSized: false });
  });

  it('prints overflowing content unchanged when auto-sizing is off', () => {
    const fixed: FontSettings = withFontSettings(DEFAULT_FONT_SETTINGS, { enableAutoSizing: false });
    const rendered = renderShippingLabel(label, COMPACT, fixed);

    expect(rendered).toMatchObject({ contentFits: false, autoSized: false });
    expect(rendered.effectiveSettings).toBe(fixed);
    expect(rendered.commands[10]).toBe('TEXT 20,20,"2",0,3,2,"TO:"');
    expect(rendered.commands[11]).toBe('TEXT 20,97,"2",0,2,2,"Test Receiver"');
  });

  it('skips the COD line for a zero amount and sanitises contact text', () => {
    const rendered = renderShippingLabel(
      {
        ...label,
        toInfo: { ...label.toInfo, name: 'Test "Receiver", Jr' },
        codEnabled: true,
        codAmount: 0,
      },
      LARGE,
      DEFAULT_FONT_SETTINGS
    );

    expect(rendered.commands[11]).toBe(`TEXT 20,97,"2",0,2,2,"Test 'Receiver'  Jr"`);
    expect(rendered.commands.some((command) => command.includes('COD'))).toBe(false);
  });

  it('formats phone and COD lines', () => {
    expect(formatPhoneLine(EMPTY_CONTACT)).toBe('');
    expect(formatPhoneLine({ ...EMPTY_CONTACT, phoneNumber2: '0110000002' })).toBe('TEL: 0110000002');
    expect(formatCodLine(1250.5)).toBe('COD: Rs 1250.50');
  });
});
