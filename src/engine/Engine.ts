import type { SizingInputV1, SizingResultV1 } from './schema/SizingInputV1';
import { normalizeInput } from './normalizer/Normalizer';
import { selectMethod, runHeatLoadModule } from './modules/HeatLoadModule';
import { solveFireExposure } from './modules/GeometrySolverModule';
import { runReliefConditionModule } from './modules/ReliefConditionModule';
import { runOrificeSizingModule } from './modules/OrificeSizingModule';
import { buildSizingResultV1 } from './OutputBuilder';

/**
 * Fire-case relief sizing pipeline.
 *
 * Stages run strictly forward; method selection comes first because the
 * fire height limit it yields bounds the exposed liquid height.
 */
export function runSizingEngine(input: SizingInputV1): SizingResultV1 {
  const { geometry, fill, fluid, reliefLine } = input;

  const selection = selectMethod(reliefLine.mawpPsig);

  const exposure = solveFireExposure(geometry, fill, selection.fireHeightLimitM);

  const heatLoad = runHeatLoadModule({
    selection,
    wettedAreaM2: exposure.wettedAreaM2,
    mawpPsig: reliefLine.mawpPsig,
    hasFirefighting: reliefLine.hasFirefighting,
    latentHeatJPerKg: fluid.latentHeatJPerKg,
  });

  const relief = runReliefConditionModule({
    mawpPsig: reliefLine.mawpPsig,
    accumulationPct: reliefLine.accumulationPct,
    atmosphericPressurePsia: reliefLine.atmosphericPressurePsia,
    backpressurePsig: reliefLine.backpressurePsig,
    specificHeatRatio: fluid.specificHeatRatio,
  });

  const { error: orificeError, ...orifice } = runOrificeSizingModule({
    evaporationRateKgS: heatLoad.evaporationRateKgS,
    relievingPressurePsia: relief.relievingPressurePsia,
    backpressurePsia: relief.backpressurePsia,
    flowRegime: relief.flowRegime,
    fluid,
    factors: {
      kd: reliefLine.dischargeCoefficientKd,
      kb: reliefLine.backpressureCorrectionKb,
      kc: reliefLine.combinationFactorKc,
      ke: reliefLine.environmentalFactorKe,
    },
  });

  return buildSizingResultV1({ selection, exposure, heatLoad, relief, orifice, orificeError }, input);
}

/** Validate an untyped snapshot, then size. */
export function sizeFromRawInput(raw: unknown): SizingResultV1 {
  return runSizingEngine(normalizeInput(raw));
}
