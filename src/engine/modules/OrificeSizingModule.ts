/**
 * OrificeSizingModule — API 520 gas/vapour sizing and API 526 orifice selection.
 *
 * US customary units throughout: W in lb/h, T in °R, P in psia, A in in².
 *
 * Critical:     A = W·√(T·Z/M) / (C·Kd·P1·Kb·Kc)
 *               C = 520·√(k·(2/(k+1))^((k+1)/(k−1)))
 * Subcritical:  A = W·√(Z·T / (M·P1·(P1 − P2))) / (735·F2·Kd·Ke)
 *               F2 = √((k/(k−1))·r^(2/k)·(1 − r^((k−1)/k)) / (1 − r)),  r = P2/P1
 */
import type { FlowRegime, OrificeSpec } from '../../contracts/SizingOutputV1';
import type { FluidProperties, OrificeSizingResult } from '../schema/SizingInputV1';
import type { InputIssue } from '../errors';
import { InputValidationError, InvalidFluidPropertyError, NoSuitableOrificeError } from '../errors';
import { ABSOLUTE_ZERO_C, celsiusToRankine, diameterFromArea, kgPerSecondToLbPerHour } from '../utils/units';
import { assertSpecificHeatRatio } from './ReliefConditionModule';
import { findFirst } from '../utils/lookup';

/** API 526 standard orifices, ascending by effective area. */
export const API526_ORIFICES: readonly OrificeSpec[] = [
  { letter: 'D', areaIn2: 0.110, diameterIn: 0.374, inletIn: 1.0 },
  { letter: 'E', areaIn2: 0.196, diameterIn: 0.500, inletIn: 1.0 },
  { letter: 'F', areaIn2: 0.307, diameterIn: 0.625, inletIn: 1.5 },
  { letter: 'G', areaIn2: 0.503, diameterIn: 0.800, inletIn: 1.5 },
  { letter: 'H', areaIn2: 0.785, diameterIn: 1.000, inletIn: 2.0 },
  { letter: 'J', areaIn2: 1.287, diameterIn: 1.280, inletIn: 3.0 },
  { letter: 'K', areaIn2: 1.838, diameterIn: 1.530, inletIn: 3.0 },
  { letter: 'L', areaIn2: 2.853, diameterIn: 1.906, inletIn: 4.0 },
  { letter: 'M', areaIn2: 3.600, diameterIn: 2.141, inletIn: 4.0 },
  { letter: 'N', areaIn2: 4.454, diameterIn: 2.381, inletIn: 4.0 },
  { letter: 'P', areaIn2: 6.380, diameterIn: 2.850, inletIn: 6.0 },
  { letter: 'Q', areaIn2: 11.050, diameterIn: 3.751, inletIn: 6.0 },
  { letter: 'R', areaIn2: 16.000, diameterIn: 4.514, inletIn: 8.0 },
  { letter: 'T', areaIn2: 26.000, diameterIn: 5.753, inletIn: 8.0 },
];

export const LARGEST_ORIFICE: OrificeSpec = API526_ORIFICES[API526_ORIFICES.length - 1];

export const SUBCRITICAL_CONSTANT = 735;
export const MIN_MOLECULAR_WEIGHT = 1;
export const MAX_COMPRESSIBILITY = 2;
export const GAS_CONSTANT_PREFACTOR = 520;

/** API 520 gas coefficient C (US units). */
export function gasCoefficient(k: number): number {
  assertSpecificHeatRatio(k);
  return GAS_CONSTANT_PREFACTOR * Math.sqrt(k * (2 / (k + 1)) ** ((k + 1) / (k - 1)));
}

/** API 520 subcritical flow coefficient F2 for pressure ratio r = P2/P1. */
export function subcriticalCoefficient(k: number, pressureRatio: number): number {
  assertSpecificHeatRatio(k);
  const r = pressureRatio;
  if (!(r > 0 && r < 1)) {
    throw new InputValidationError([
      { path: 'reliefLine.backpressurePsig', message: `Pressure ratio P2/P1 must lie in (0, 1), got ${r}.` },
    ]);
  }
  return Math.sqrt((k / (k - 1)) * r ** (2 / k) * ((1 - r ** ((k - 1) / k)) / (1 - r)));
}

export interface CriticalAreaInput {
  massFlowLbH: number;
  specificHeatRatio: number;
  temperatureR: number;
  compressibility: number;
  molecularWeight: number;
  relievingPressurePsia: number;
  kd: number;
  kb: number;
  kc: number;
}

export function requiredAreaCritical(input: CriticalAreaInput): number {
  const c = gasCoefficient(input.specificHeatRatio);
  const numerator = input.massFlowLbH * Math.sqrt((input.temperatureR * input.compressibility) / input.molecularWeight);
  return numerator / (c * input.kd * input.relievingPressurePsia * input.kb * input.kc);
}

export interface SubcriticalAreaInput {
  massFlowLbH: number;
  specificHeatRatio: number;
  temperatureR: number;
  compressibility: number;
  molecularWeight: number;
  relievingPressurePsia: number;
  backpressurePsia: number;
  kd: number;
  ke: number;
}

export function requiredAreaSubcritical(input: SubcriticalAreaInput): number {
  const p1 = input.relievingPressurePsia;
  const p2 = input.backpressurePsia;
  const f2 = subcriticalCoefficient(input.specificHeatRatio, p2 / p1);
  const numerator = input.massFlowLbH * Math.sqrt(
    (input.compressibility * input.temperatureR) / (input.molecularWeight * p1 * (p1 - p2)),
  );
  return numerator / (SUBCRITICAL_CONSTANT * f2 * input.kd * input.ke);
}

export type OrificeSelection =
  | { orifice: OrificeSpec; error: null }
  | { orifice: null; error: NoSuitableOrificeError };

/** Smallest standard orifice whose effective area covers the requirement. */
export function selectOrifice(requiredAreaIn2: number): OrificeSelection {
  const orifice = findFirst(API526_ORIFICES, o => o.areaIn2 >= requiredAreaIn2);
  if (orifice) return { orifice, error: null };
  return { orifice: null, error: new NoSuitableOrificeError(requiredAreaIn2, LARGEST_ORIFICE.areaIn2) };
}

function assertFluid(fluid: FluidProperties): void {
  assertSpecificHeatRatio(fluid.specificHeatRatio);
  if (!(fluid.molecularWeight > 0)) {
    throw new InvalidFluidPropertyError('molecularWeight', `Molecular weight must be positive, got ${fluid.molecularWeight}.`);
  }
  if (fluid.molecularWeight < MIN_MOLECULAR_WEIGHT) {
    throw new InvalidFluidPropertyError(
      'molecularWeight',
      `Molecular weight must be at least ${MIN_MOLECULAR_WEIGHT}, got ${fluid.molecularWeight}.`,
    );
  }
  if (!(fluid.compressibility > 0)) {
    throw new InvalidFluidPropertyError('compressibility', `Compressibility factor Z must be positive, got ${fluid.compressibility}.`);
  }
  if (fluid.compressibility > MAX_COMPRESSIBILITY) {
    throw new InvalidFluidPropertyError(
      'compressibility',
      `Compressibility factor Z must not exceed ${MAX_COMPRESSIBILITY}, got ${fluid.compressibility}.`,
    );
  }
  if (!(fluid.relievingTemperatureC > ABSOLUTE_ZERO_C)) {
    throw new InvalidFluidPropertyError(
      'relievingTemperatureC',
      `Relieving temperature must be above absolute zero, got ${fluid.relievingTemperatureC} °C.`,
    );
  }
}

export interface CorrectionFactors {
  kd: number;
  kb: number;
  kc: number;
  ke: number;
}

/** Inclusive upper bound per factor; every factor must also be positive. */
export const CORRECTION_FACTOR_MAX: Readonly<Record<keyof CorrectionFactors, number>> = {
  kd: 1,
  kb: 1,
  kc: 1,
  ke: 2,
};

function assertFactors(factors: CorrectionFactors): void {
  const issues: InputIssue[] = [];
  const paths: Record<keyof CorrectionFactors, string> = {
    kd: 'reliefLine.dischargeCoefficientKd',
    kb: 'reliefLine.backpressureCorrectionKb',
    kc: 'reliefLine.combinationFactorKc',
    ke: 'reliefLine.environmentalFactorKe',
  };
  for (const key of ['kd', 'kb', 'kc', 'ke'] as const) {
    const value = factors[key];
    if (!(value > 0)) {
      issues.push({ path: paths[key], message: `Correction factor must be positive, got ${value}.` });
    } else if (value > CORRECTION_FACTOR_MAX[key]) {
      issues.push({ path: paths[key], message: `Correction factor must not exceed ${CORRECTION_FACTOR_MAX[key]}, got ${value}.` });
    }
  }
  if (issues.length > 0) throw new InputValidationError(issues);
}

export interface OrificeSizingInput {
  evaporationRateKgS: number;
  relievingPressurePsia: number;
  backpressurePsia: number;
  flowRegime: FlowRegime;
  fluid: FluidProperties;
  factors: CorrectionFactors;
}

export function runOrificeSizingModule(input: OrificeSizingInput): OrificeSizingResult & { error: NoSuitableOrificeError | null } {
  const { fluid, factors, flowRegime } = input;
  assertFluid(fluid);
  assertFactors(factors);

  const massFlowLbH = kgPerSecondToLbPerHour(input.evaporationRateKgS);
  const temperatureR = celsiusToRankine(fluid.relievingTemperatureC);

  const common = {
    massFlowLbH,
    specificHeatRatio: fluid.specificHeatRatio,
    temperatureR,
    compressibility: fluid.compressibility,
    molecularWeight: fluid.molecularWeight,
    relievingPressurePsia: input.relievingPressurePsia,
    kd: factors.kd,
  };

  let requiredAreaIn2: number;
  let gasCoefficientC: number | undefined;
  let subcriticalCoefficientF2: number | undefined;
  if (flowRegime === 'critical') {
    gasCoefficientC = gasCoefficient(fluid.specificHeatRatio);
    requiredAreaIn2 = requiredAreaCritical({ ...common, kb: factors.kb, kc: factors.kc });
  } else {
    subcriticalCoefficientF2 = subcriticalCoefficient(
      fluid.specificHeatRatio,
      input.backpressurePsia / input.relievingPressurePsia,
    );
    requiredAreaIn2 = requiredAreaSubcritical({
      ...common,
      backpressurePsia: input.backpressurePsia,
      ke: factors.ke,
    });
  }

  const selection = selectOrifice(requiredAreaIn2);

  return {
    massFlowLbH,
    relievingTemperatureR: temperatureR,
    flowRegime,
    gasCoefficientC,
    subcriticalCoefficientF2,
    requiredAreaIn2,
    requiredDiameterIn: diameterFromArea(requiredAreaIn2),
    orifice: selection.orifice,
    // Oversized relief: the largest inlet is still the lower bound.
    minimumInletIn: (selection.orifice ?? LARGEST_ORIFICE).inletIn,
    error: selection.error,
  };
}
