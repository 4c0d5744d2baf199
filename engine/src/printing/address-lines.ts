export const DEFAULT_ADDRESS_LINE_WIDTH = 35;
export const MAX_PRINTED_ADDRESS_LINES = 3;

const ELLIPSIS = '...';

/**
 * Breaks an address into printable lines: explicit line breaks first, then word
 * wrapping at `maxWidth` characters. A word longer than a whole line is cut. Output
 * stops at three lines and the last one is shortened with an ellipsis when needed.
 */
export function splitAddress(address: string, maxWidth: number = DEFAULT_ADDRESS_LINE_WIDTH): string[] {
  if (address === '') {
    return [];
  }

  const width = Math.max(1, Math.trunc(maxWidth));
  const explicitLines = address
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '');

  const lines: string[] = [];
  for (const line of explicitLines) {
    if (line.length <= width) {
      lines.push(line);
      continue;
    }

    lines.push(...wrapLine(line, width));
  }

  if (lines.length <= MAX_PRINTED_ADDRESS_LINES) {
    return lines;
  }

  const kept = lines.slice(0, MAX_PRINTED_ADDRESS_LINES);
  const lastIndex = MAX_PRINTED_ADDRESS_LINES - 1;
  const room = width - ELLIPSIS.length;
  if (room > 0 && kept[lastIndex].length > room) {
    kept[lastIndex] = `${kept[lastIndex].slice(0, room)}${ELLIPSIS}`;
  }

  return kept;
}

function wrapLine(line: string, width: number): string[] {
  const wrapped: string[] = [];
  let current = '';

  for (const word of line.split(' ').filter((part) => part !== '')) {
    const candidate = current === '' ? word : `${current} ${word}`;
    if (candidate.length <= width) {
      current = candidate;
      continue;
    }

    if (current !== '') {
      wrapped.push(current);
    }

    if (word.length <= width) {
      current = word;
    } else {
      wrapped.push(word.slice(0, width));
      current = '';
    }
  }

  if (current !== '') {
    wrapped.push(current);
  }

  return wrapped;
}
