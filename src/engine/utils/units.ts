/** 1 psi expressed in bar. */
export const PSI_TO_BAR = 0.0689476;
export const KG_TO_LB = 2.2046226218;
export const SECONDS_PER_HOUR = 3600;
export const ABSOLUTE_ZERO_C = -273.15;

export function psigToBarg(psig: number): number {
  return psig * PSI_TO_BAR;
}

export function celsiusToRankine(tempC: number): number {
  return (tempC - ABSOLUTE_ZERO_C) * 9 / 5;
}

/** kg/s → lb/h */
export function kgPerSecondToLbPerHour(kgPerSecond: number): number {
  return kgPerSecond * SECONDS_PER_HOUR * KG_TO_LB;
}

/** Equivalent circular diameter of an area (any consistent unit). */
export function diameterFromArea(area: number): number {
  return 2 * Math.sqrt(area / Math.PI);
}
