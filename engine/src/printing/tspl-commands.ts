import type { LabelConfig } from '../models/label-config.ts';

export const TSPL_LINE_TERMINATOR = '\r\n';

/**
 * Quotes end a TSPL string argument and line breaks end the command, so both are
 * replaced. Commas are blanked as well; some firmware splits on them inside quotes.
 */
export function sanitizeTsplText(text: string): string {
  return text
    .replaceAll('"', "'")
    .replaceAll('\r\n', ' ')
    .replaceAll('\n', ' ')
    .replaceAll('\r', ' ')
    .replaceAll(',', ' ')
    .trim();
}

export function buildLabelSetupCommands(config: LabelConfig): string[] {
  return [
    `SIZE ${Math.trunc(config.widthMm)} mm, ${Math.trunc(config.heightMm)} mm`,
    `GAP ${Math.trunc(config.spacingMm)} mm, 0 mm`,
    'DIRECTION 0,0',
    'REFERENCE 0,0',
    'OFFSET 0 mm',
    'SET PEEL OFF',
    'SET CUTTER OFF',
    'SET PARTIAL_CUTTER OFF',
    'SET TEAR ON',
    'CLS',
  ];
}

/** `content` is written as given; run untrusted text through {@link sanitizeTsplText}. */
export function textCommand(x: number, y: number, fontFragment: string, content: string): string {
  return `TEXT ${Math.round(x)},${Math.round(y)},${fontFragment},"${content}"`;
}

export function barCommand(x: number, y: number, width: number, height: number): string {
  return `BAR ${Math.round(x)},${Math.round(y)},${Math.round(width)},${Math.round(height)}`;
}

export function printCommand(sets = 1, copies = 1): string {
  return `PRINT ${sets},${copies}`;
}

export function toTsplProgram(commands: readonly string[]): string {
  return `${commands.join(TSPL_LINE_TERMINATOR)}${TSPL_LINE_TERMINATOR}`;
}
