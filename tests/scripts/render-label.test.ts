import { describe, expect, it } from 'vitest';

import { DEFAULT_FONT_SETTINGS } from '../../engine/src/models/font-settings.ts';
import { DEFAULT_LABEL_CONFIG } from '../../engine/src/models/label-config.ts';
import { parseShippingLabel } from '../../engine/src/models/shipping-label.ts';
import { renderShippingLabel } from '../../engine/src/printing/shipping-label-renderer.ts';
import { main, type RenderLabelIo } from '../../scripts/print/render-label.ts';

const NOW = new Date('2026-08-12T07:45:00.000Z');

const LABEL_YAML = [
  'id: label-200',
  'toInfo:',
  '  name: Test Receiver',
  '  address: "12 Lake Road\\nColombo 05"',
  '  phoneNumber1: "0770000001"',
  'fromInfo:',
  '  name: Test Sender',
  '  address: 8 Hill Street',
  '  phoneNumber1: "0110000002"',
  '  phoneNumber2: "0770000003"',
  '',
].join('\n');

const LABEL_JSON = JSON.stringify({
  id: 'label-201',
  toInfo: { name: 'Test Receiver', address: '12 Lake Road', phoneNumber1: '0770000001' },
});

function createIo(env: Record<string, string | undefined> = {}) {
  const files: Record<string, string> = {
    'label.yaml': LABEL_YAML,
    'label.json': LABEL_JSON,
    'missing-receiver.json': JSON.stringify({ id: 'label-202' }),
    'broken.yaml': 'id: [unclosed\n',
  };
  const stdout: string[] = [];
  const stderr: string[] = [];

  const io: RenderLabelIo = {
    stdout: (text) => stdout.push(text),
    stderr: (text) => stderr.push(text),
    readFile: async (filePath) => {
      if (filePath === 'locked.yaml') {
        throw Object.assign(new Error(`EACCES: permission denied, open '${filePath}'`), { code: 'EACCES' });
      }
      const text = files[filePath];
      if (text === undefined) {
        throw Object.assign(new Error(`ENOENT: no such file or directory, open '${filePath}'`), { code: 'ENOENT' });
      }
      return text;
    },
    env,
    now: () => NOW,
  };

  return { io, stdout, stderr };
}

describe('render-label', () => {
  it('renders a YAML label with the default size and fonts', async () => {
    const { io, stdout, stderr } = createIo();

    const code = await main(['label.yaml'], io);

    const expected = renderShippingLabel(
      parseShippingLabel(
        {
          id: 'label-200',
          toInfo: { name: 'Test Receiver', address: '12 Lake Road\nColombo 05', phoneNumber1: '0770000001' },
          fromInfo: {
            name: 'Test Sender',
            address: '8 Hill Street',
            phoneNumber1: '0110000002',
            phoneNumber2: '0770000003',
          },
        },
        () => NOW
      ),
      DEFAULT_LABEL_CONFIG,
      DEFAULT_FONT_SETTINGS
    );

    expect(code).toBe(0);
    expect(stdout).toEqual([expected.program]);
    expect(stdout[0]).toContain('TEXT 20,77,"2",0,1,1,"Test Receiver"\r\n');
    expect(stderr).toHaveLength(1);
    expect(JSON.parse(stderr[0])).toMatchObject({
      level: 'warn',
      event: 'shipping_label_rendered',
      labelId: 'label-200',
      autoSized: true,
    });
  });

  it('applies size and font preset flags to a JSON label', async () => {
    const { io, stdout, stderr } = createIo();

    const code = await main(['--label', '101mm-x-152mm', '--font-preset', 'large', 'label.json'], io);

    expect(code).toBe(0);
    expect(stdout[0].startsWith('SIZE 101 mm, 152 mm\r\nGAP 4 mm, 0 mm\r\n')).toBe(true);
    expect(stdout[0]).toContain('TEXT 20,20,"2",0,4,3,"TO:"\r\n');
    expect(stderr).toEqual([]);
  });

  it('prints the default design for the size chosen in the environment', async () => {
    const { io, stdout } = createIo({ LABEL_DESIGNER_LABEL_CONFIG: '80mm × 80mm' });

    const code = await main(['--design', 'default', 'label.yaml'], io);

    expect(code).toBe(0);
    expect(stdout[0]).toContain('TEXT 320,20,"2",0,4,3,"SHIPPING LABEL"\r\n');
    expect(stdout[0]).toContain('TEXT 20,120,"2",0,2,2,"Test Receiver"\r\n');
    expect(stdout[0].endsWith('PRINT 1,1\r\n')).toBe(true);
  });

  it('exits 1 when the label data is invalid', async () => {
    const { io, stdout, stderr } = createIo();

    expect(await main(['missing-receiver.json'], io)).toBe(1);
    expect(stdout).toEqual([]);
    expect(stderr[0]).toMatch(/^Invalid shipping label: toInfo: /);
  });

  it('exits 1 when the file cannot be parsed', async () => {
    const { io, stderr } = createIo();

    expect(await main(['broken.yaml'], io)).toBe(1);
    expect(stderr[0]).toMatch(/^Invalid label file: /);
  });

  it('exits 2 on usage errors', async () => {
    const { io, stderr } = createIo();

    expect(await main([], io)).toBe(2);
    expect(stderr[0]).toBe(
      'expected exactly one label file\n' +
        'usage: render-label [--label <size>] [--font-preset <name>] [--design default] <label-file>\n'
    );

    expect(await main(['--label'], io)).toBe(2);
    expect(stderr[1]).toMatch(/^--label requires a value\n/);

    expect(await main(['--design', 'fancy', 'label.yaml'], io)).toBe(2);
    expect(stderr[2]).toMatch(/^unsupported design fancy\n/);

    expect(await main(['--copies', '2', 'label.yaml'], io)).toBe(2);
    expect(stderr[3]).toMatch(/^unknown option --copies\n/);
  });

  it('exits 2 on unknown presets and missing files', async () => {
    const { io, stderr } = createIo({ LABEL_DESIGNER_FONT_PRESET: 'huge' });

    expect(await main(['label.yaml'], io)).toBe(2);
    expect(stderr[0]).toBe('Invalid render config: fontPreset must be one of default, small, large, got huge\n');

    expect(await main(['--font-preset', 'small', 'missing.yaml'], io)).toBe(2);
    expect(stderr[1]).toBe('label file not found: missing.yaml\n');
  });

  it('passes unreadable files up instead of calling them missing', async () => {
    const { io, stderr } = createIo();

    await expect(main(['locked.yaml'], io)).rejects.toThrow(/^EACCES: /);
    expect(stderr).toEqual([]);
  });
});
