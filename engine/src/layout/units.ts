// 203 DPI thermal heads address 8 dots per millimetre.
export const DOTS_PER_MM = 8;

export function mmToDots(mm: number): number {
  return mm * DOTS_PER_MM;
}

export function mmToWholeDots(mm: number): number {
  return Math.trunc(mm * DOTS_PER_MM);
}

export function clampInt(value: number, min: number, max: number): number {
  return Math.min(Math.max(Math.trunc(value), min), max);
}

export function clampNumber(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
