import type { SizingFlag } from '../contracts/SizingOutputV1';
import { ENGINE_VERSION, CONTRACT_VERSION } from '../contracts/versions';
import type { NoSuitableOrificeError } from './errors';
import type {
  FireExposureResult,
  HeatLoadResult,
  MethodSelection,
  OrificeSizingResult,
  ReliefConditionResult,
  SizingInputV1,
  SizingResultV1,
} from './schema/SizingInputV1';

/** Orifices at or above this letter's area get an informational "large orifice" flag. */
export const LARGE_ORIFICE_AREA_IN2 = 16;

export interface SizingStages {
  selection: MethodSelection;
  exposure: FireExposureResult;
  heatLoad: HeatLoadResult;
  relief: ReliefConditionResult;
  orifice: OrificeSizingResult;
  orificeError: NoSuitableOrificeError | null;
}

function buildFlags(stages: SizingStages, input: SizingInputV1): SizingFlag[] {
  const { exposure, orifice, orificeError } = stages;
  const flags: SizingFlag[] = [];

  if (orificeError) {
    flags.push({
      id: 'no-suitable-orifice',
      severity: 'fail',
      title: 'No standard orifice is large enough',
      detail: orificeError.message,
      action: 'Consider multiple relief devices or a rupture disc.',
    });
  } else if (orifice.orifice && orifice.orifice.areaIn2 >= LARGE_ORIFICE_AREA_IN2) {
    flags.push({
      id: 'large-orifice',
      severity: 'info',
      title: `Large orifice (${orifice.orifice.letter})`,
      detail: `Selected orifice needs an ${orifice.orifice.inletIn}" inlet; check inlet pressure loss.`,
    });
  }

  if (exposure.fireLimitAboveBottomM <= 0) {
    flags.push({
      id: 'fire-below-vessel',
      severity: 'info',
      title: 'Fire does not reach the vessel',
      detail:
        `Vessel bottom at ${input.geometry.bottomElevationM.toFixed(2)} m is at or above the ` +
        `${exposure.fireHeightLimitM.toFixed(2)} m fire height limit.`,
    });
  } else if (exposure.wettedAreaM2 === 0) {
    flags.push({
      id: 'no-wetted-area',
      severity: 'info',
      title: 'No liquid exposed to fire',
      detail: 'Wetted area is zero, so the fire heat load and relief rate are zero.',
    });
  }

  if (exposure.liquidHeightM > exposure.exposedHeightM && exposure.exposedHeightM > 0) {
    flags.push({
      id: 'liquid-above-fire-limit',
      severity: 'info',
      title: 'Liquid level above fire height limit',
      detail:
        `Only ${exposure.exposedHeightM.toFixed(2)} m of the ${exposure.liquidHeightM.toFixed(2)} m ` +
        `liquid column is counted as fire-exposed.`,
    });
  }

  if (input.reliefLine.operatingPressurePsig > input.reliefLine.mawpPsig) {
    flags.push({
      id: 'operating-above-mawp',
      severity: 'warn',
      title: 'Operating pressure above MAWP',
      detail:
        `Operating pressure ${input.reliefLine.operatingPressurePsig} psig exceeds MAWP ` +
        `${input.reliefLine.mawpPsig} psig. Check the inputs.`,
    });
  }

  return flags;
}

function buildNotes(stages: SizingStages): string[] {
  const { selection, heatLoad, relief } = stages;
  const notes: string[] = [];

  notes.push(
    selection.method === 'API2000'
      ? `MAWP ≤ 15 psig: API 2000 applies (fire height limit ${selection.fireHeightLimitM} m).`
      : `MAWP > 15 psig: API 520 applies (fire height limit ${selection.fireHeightLimitM} m).`,
  );
  notes.push(`Heat load from ${heatLoad.band}: ${(heatLoad.heatLoadW / 1000).toFixed(1)} kW.`);
  notes.push(
    relief.flowRegime === 'critical'
      ? `Critical flow: backpressure ${relief.backpressurePsia.toFixed(2)} psia < ` +
        `critical pressure ${relief.criticalPressurePsia.toFixed(2)} psia.`
      : `Subcritical flow: backpressure ${relief.backpressurePsia.toFixed(2)} psia ≥ ` +
        `critical pressure ${relief.criticalPressurePsia.toFixed(2)} psia.`,
  );

  return notes;
}

/** Assemble the externally consumed result from the stage outputs. */
export function buildSizingResultV1(stages: SizingStages, input: SizingInputV1): SizingResultV1 {
  const { selection, exposure, heatLoad, relief, orifice } = stages;

  return {
    method: selection.method,
    fireHeightLimitM: selection.fireHeightLimitM,
    exposure,
    heatLoadW: heatLoad.heatLoadW,
    heatLoadBand: heatLoad.band,
    evaporationRateKgS: heatLoad.evaporationRateKgS,
    evaporationRateKgH: heatLoad.evaporationRateKgH,
    massFlowLbH: orifice.massFlowLbH,
    accumulationPsi: relief.accumulationPsi,
    relievingPressurePsia: relief.relievingPressurePsia,
    backpressurePsia: relief.backpressurePsia,
    criticalPressurePsia: relief.criticalPressurePsia,
    flowRegime: relief.flowRegime,
    gasCoefficientC: orifice.gasCoefficientC,
    subcriticalCoefficientF2: orifice.subcriticalCoefficientF2,
    requiredAreaIn2: orifice.requiredAreaIn2,
    requiredDiameterIn: orifice.requiredDiameterIn,
    selectedOrifice: orifice.orifice?.letter ?? null,
    orifice: orifice.orifice,
    minimumInletIn: orifice.minimumInletIn,
    operatingPressurePsig: input.reliefLine.operatingPressurePsig,
    flags: buildFlags(stages, input),
    notes: buildNotes(stages),
    meta: {
      engineVersion: ENGINE_VERSION,
      contractVersion: CONTRACT_VERSION,
    },
  };
}
