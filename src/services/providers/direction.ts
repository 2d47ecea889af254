import { CARDINAL_DIRECTIONS, type CardinalDirection } from '@/types/forecast';

/** Round half to even: 0.5 -> 0, 1.5 -> 2, 2.5 -> 2. */
export function roundHalfEven(x: number): number {
  const floor = Math.floor(x);
  const diff = x - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * One decimal place, ties to the even digit on the exact binary value:
 * 1.25 -> 1.2, 0.35 -> 0.3 (0.35 is stored just below the tie), 0.75 -> 0.8.
 */
export function roundToTenth(value: number): number {
  // x.x5 is only representable exactly when 4 * value is an odd integer
  const quarters = value * 4;
  if (Number.isInteger(quarters) && quarters % 2 !== 0) {
    return roundHalfEven(value * 10) / 10;
  }
  return Number(value.toFixed(1));
}

/**
 * Quantise a bearing in degrees to one of 8 compass labels: round(degrees / 45) mod 8.
 * Exact half-way bearings (22.5, 67.5, ...) go to the even index.
 */
export function degreesToCardinal(degrees: number): CardinalDirection {
  const index = ((roundHalfEven(degrees / 45) % 8) + 8) % 8;
  return CARDINAL_DIRECTIONS[index];
}
