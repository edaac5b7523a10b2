/**
 * HeatLoadModule — fire heat input to a liquid-filled vessel.
 *
 * Method selection (MAWP only):
 *   MAWP ≤ 15 psig  → API 2000, fire height limit 9.14 m (30 ft)
 *   MAWP > 15 psig  → API 520,  fire height limit 7.62 m (25 ft)
 *
 * selectMethod must run before GeometrySolverModule: the fire height limit it
 * returns bounds the exposed liquid height.
 *
 * API 2000 (A in m², P in barg, Q in W), first matching band:
 *   A < 18.6                 Q = 63 150·A
 *   18.6 ≤ A < 93            Q = 224 200·A^0.566
 *   93 ≤ A < 260             Q = 630 400·A^0.338
 *   A ≥ 260, P ≥ 0.07        Q = 43 200·A^0.82
 *   A ≥ 260, P < 0.07        Q = 4 129 700
 *
 * API 520: Q = C·A^0.82, C = 43 200 with firefighting/drainage, else 70 900.
 */
import type { FireMethod } from '../../contracts/SizingOutputV1';
import type { HeatLoadResult, MethodSelection } from '../schema/SizingInputV1';
import { InputValidationError, InvalidFluidPropertyError } from '../errors';
import { findFirst } from '../utils/lookup';
import { psigToBarg, SECONDS_PER_HOUR } from '../utils/units';

/** Highest MAWP (psig) covered by API 2000. Inclusive. */
export const API2000_MAX_MAWP_PSIG = 15;
/** 15 psig in barg: the "1.034 barg" ceiling of the API 2000 table. */
export const API2000_MAX_PRESSURE_BARG = psigToBarg(API2000_MAX_MAWP_PSIG);

export const FIRE_HEIGHT_LIMITS_M: Record<FireMethod, number> = {
  API2000: 9.14,
  API520: 7.62,
};

export const API520_COEFFICIENT_FIREFIGHTING = 43_200;
export const API520_COEFFICIENT_NO_FIREFIGHTING = 70_900;
export const API520_EXPONENT = 0.82;

export interface Api2000Band {
  id: string;
  /** Inclusive lower bound on wetted area (m²). */
  minAreaM2: number;
  /** Exclusive upper bound on wetted area (m²). */
  maxAreaM2: number;
  /** Inclusive lower bound on design pressure (barg). */
  minPressureBarg: number;
  /** Exclusive upper bound on design pressure (barg); the table ceiling is handled separately. */
  maxPressureBarg: number;
  heatLoad: (areaM2: number) => number;
}

/** Ascending, evaluated in order; the first band whose bounds contain (A, P) wins. */
export const API2000_BANDS: readonly Api2000Band[] = [
  {
    id: 'api2000-a-lt-18.6',
    minAreaM2: 0, maxAreaM2: 18.6,
    minPressureBarg: Number.NEGATIVE_INFINITY, maxPressureBarg: Number.POSITIVE_INFINITY,
    heatLoad: a => 63_150 * a,
  },
  {
    id: 'api2000-a-18.6-93',
    minAreaM2: 18.6, maxAreaM2: 93,
    minPressureBarg: Number.NEGATIVE_INFINITY, maxPressureBarg: Number.POSITIVE_INFINITY,
    heatLoad: a => 224_200 * a ** 0.566,
  },
  {
    id: 'api2000-a-93-260',
    minAreaM2: 93, maxAreaM2: 260,
    minPressureBarg: Number.NEGATIVE_INFINITY, maxPressureBarg: Number.POSITIVE_INFINITY,
    heatLoad: a => 630_400 * a ** 0.338,
  },
  {
    id: 'api2000-a-ge-260',
    minAreaM2: 260, maxAreaM2: Number.POSITIVE_INFINITY,
    minPressureBarg: 0.07, maxPressureBarg: Number.POSITIVE_INFINITY,
    heatLoad: a => 43_200 * a ** 0.82,
  },
  {
    id: 'api2000-a-ge-260-low-pressure',
    minAreaM2: 260, maxAreaM2: Number.POSITIVE_INFINITY,
    minPressureBarg: Number.NEGATIVE_INFINITY, maxPressureBarg: 0.07,
    heatLoad: () => 4_129_700,
  },
];

/** Pick the governing standard and its fire height limit from MAWP alone. */
export function selectMethod(mawpPsig: number): MethodSelection {
  const method: FireMethod = mawpPsig <= API2000_MAX_MAWP_PSIG ? 'API2000' : 'API520';
  return { method, fireHeightLimitM: FIRE_HEIGHT_LIMITS_M[method] };
}

function assertArea(areaM2: number): void {
  if (!(areaM2 >= 0) || !Number.isFinite(areaM2)) {
    throw new InputValidationError([
      { path: 'wettedAreaM2', message: `Wetted area must be a non-negative number, got ${areaM2}.` },
    ]);
  }
}

/** API 2000 heat load (W) and the band that produced it. */
export function heatLoadApi2000(
  areaM2: number,
  designPressureBarg: number,
): { heatLoadW: number; band: string } {
  assertArea(areaM2);
  if (designPressureBarg > API2000_MAX_PRESSURE_BARG) {
    throw new InputValidationError([
      {
        path: 'reliefLine.mawpPsig',
        message:
          `API 2000 applies up to ${API2000_MAX_PRESSURE_BARG.toFixed(3)} barg ` +
          `(${API2000_MAX_MAWP_PSIG} psig); got ${designPressureBarg.toFixed(3)} barg.`,
      },
    ]);
  }

  const band = findFirst(API2000_BANDS, b =>
    areaM2 >= b.minAreaM2 && areaM2 < b.maxAreaM2 &&
    designPressureBarg >= b.minPressureBarg && designPressureBarg < b.maxPressureBarg,
  );
  // Bands tile the whole (A ≥ 0, P) quadrant, so this only trips on NaN.
  if (!band) {
    throw new InputValidationError([
      { path: 'reliefLine.mawpPsig', message: `No API 2000 band for A=${areaM2} m², P=${designPressureBarg} barg.` },
    ]);
  }
  return { heatLoadW: band.heatLoad(areaM2), band: band.id };
}

/** API 520 heat load (W). */
export function heatLoadApi520(areaM2: number, hasFirefighting: boolean): number {
  assertArea(areaM2);
  const c = hasFirefighting ? API520_COEFFICIENT_FIREFIGHTING : API520_COEFFICIENT_NO_FIREFIGHTING;
  return c * areaM2 ** API520_EXPONENT;
}

/**
 * Evaporation rate (kg/s) = heat load (W) / latent heat (J/kg).
 */
export function evaporationRate(heatLoadW: number, latentHeatJPerKg: number): number {
  if (!(latentHeatJPerKg > 0)) {
    throw new InvalidFluidPropertyError(
      'latentHeatJPerKg',
      `Enthalpy of vaporization must be positive, got ${latentHeatJPerKg} J/kg.`,
    );
  }
  return heatLoadW / latentHeatJPerKg;
}

export interface HeatLoadInput {
  selection: MethodSelection;
  wettedAreaM2: number;
  mawpPsig: number;
  hasFirefighting: boolean;
  latentHeatJPerKg: number;
}

/** Heat load by the selected method, then the resulting evaporation rate. */
export function runHeatLoadModule(input: HeatLoadInput): HeatLoadResult {
  const { selection, wettedAreaM2 } = input;

  let heatLoadW: number;
  let band: string;
  if (selection.method === 'API2000') {
    ({ heatLoadW, band } = heatLoadApi2000(wettedAreaM2, psigToBarg(input.mawpPsig)));
  } else {
    heatLoadW = heatLoadApi520(wettedAreaM2, input.hasFirefighting);
    band = 'api520';
  }

  const evaporationRateKgS = evaporationRate(heatLoadW, input.latentHeatJPerKg);

  return {
    method: selection.method,
    heatLoadW,
    band,
    evaporationRateKgS,
    evaporationRateKgH: evaporationRateKgS * SECONDS_PER_HOUR,
  };
}
