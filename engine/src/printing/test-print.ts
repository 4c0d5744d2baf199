import type { LabelConfig } from '../models/label-config.ts';
import { buildLabelSetupCommands, printCommand, sanitizeTsplText } from './tspl-commands.ts';

const TEST_PAGE_X = 20;

function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}`
  );
}

/**
 * Self-test page that exercises several built-in fonts and echoes the label
 * geometry, so a misconfigured SIZE or GAP shows up on paper.
 */
export function buildTestPrintCommands(config: LabelConfig, now: Date): string[] {
  const lineHeight = config.heightMm < 60 ? 30 : 40;
  const titleFont = config.heightMm >= 80 ? '4' : '3';
  const width = Math.trunc(config.widthMm);
  const height = Math.trunc(config.heightMm);

  const lines: Array<[font: string, text: string]> = [
    [titleFont, 'TSC TEST PRINT'],
    ['3', 'TSPL LABEL PRINTER'],
    ['2', `Config: ${sanitizeTsplText(config.name)}`],
    ['2', formatTimestamp(now)],
    ['1', `Size: ${width}mm x ${height}mm`],
    ['1', `Gap: ${Math.trunc(config.spacingMm)}mm`],
  ];

  const commands = buildLabelSetupCommands(config);
  lines.forEach(([font, text], index) => {
    commands.push(`TEXT ${TEST_PAGE_X},${20 + index * lineHeight},"${font}",0,1,1,"${text}"`);
  });
  commands.push(printCommand(1, 1));

  return commands;
}
