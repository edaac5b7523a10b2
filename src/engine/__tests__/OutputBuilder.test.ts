import { describe, it, expect } from 'vitest';
import { buildSizingResultV1 } from '../OutputBuilder';
import type { SizingStages } from '../OutputBuilder';
import { runSizingEngine } from '../Engine';
import { API526_ORIFICES } from '../modules/OrificeSizingModule';
import type { SizingInputV1 } from '../schema/SizingInputV1';

const input: SizingInputV1 = {
  geometry: {
    orientation: 'vertical',
    headType: 'hemispherical',
    outerDiameterM: 2,
    shellHeightM: 3,
    shellThicknessMm: 0,
    bottomElevationM: 0,
  },
  fill: { normalFillVolumeM3: 0 },
  fluid: {
    specificHeatRatio: 1.4,
    latentHeatJPerKg: 200_000,
    molecularWeight: 29,
    compressibility: 1,
    relievingTemperatureC: 25,
  },
  reliefLine: {
    mawpPsig: 100,
    operatingPressurePsig: 80,
    hasFirefighting: true,
    accumulationPct: 21,
    atmosphericPressurePsia: 14.7,
    backpressurePsig: 0,
    dischargeCoefficientKd: 0.975,
    backpressureCorrectionKb: 1,
    combinationFactorKc: 1,
    environmentalFactorKe: 1,
  },
};

function stages(overrides: Partial<SizingStages> = {}): SizingStages {
  return {
    selection: { method: 'API520', fireHeightLimitM: 7.62 },
    exposure: {
      innerDiameterM: 2,
      headDepthM: 1,
      totalHeightM: 5,
      totalVolumeM3: (13 * Math.PI) / 3,
      liquidHeightM: 2,
      exposedHeightM: 2,
      fireHeightLimitM: 7.62,
      fireLimitAboveBottomM: 7.62,
      liquidWettedAreaM2: 4 * Math.PI,
      wettedAreaM2: 4 * Math.PI,
    },
    heatLoad: {
      method: 'API520',
      heatLoadW: 250_000,
      band: 'api520',
      evaporationRateKgS: 1.25,
      evaporationRateKgH: 4500,
    },
    relief: {
      accumulationPsi: 21,
      relievingPressurePsia: 135.7,
      backpressurePsia: 14.7,
      criticalPressurePsia: 71.69,
      flowRegime: 'critical',
    },
    orifice: {
      massFlowLbH: 9920.8,
      relievingTemperatureR: 536.67,
      flowRegime: 'critical',
      gasCoefficientC: 356.06,
      requiredAreaIn2: 0.7,
      requiredDiameterIn: 0.944,
      orifice: API526_ORIFICES[4],
      minimumInletIn: 2,
    },
    orificeError: null,
    ...overrides,
  };
}

describe('OutputBuilder', () => {
  it('copies stage values onto the flat result', () => {
    const result = buildSizingResultV1(stages(), input);
    expect(result.method).toBe('API520');
    expect(result.heatLoadW).toBe(250_000);
    expect(result.heatLoadBand).toBe('api520');
    expect(result.evaporationRateKgH).toBe(4500);
    expect(result.massFlowLbH).toBe(9920.8);
    expect(result.selectedOrifice).toBe('H');
    expect(result.minimumInletIn).toBe(2);
    expect(result.operatingPressurePsig).toBe(80);
    expect(result.flags).toEqual([]);
  });

  it('formats the three stage notes', () => {
    expect(buildSizingResultV1(stages(), input).notes).toEqual([
      'MAWP > 15 psig: API 520 applies (fire height limit 7.62 m).',
      'Heat load from api520: 250.0 kW.',
      'Critical flow: backpressure 14.70 psia < critical pressure 71.69 psia.',
    ]);
  });

  it('flags zero wetted area when the fire reaches the vessel', () => {
    const base = stages();
    const result = buildSizingResultV1(
      stages({ exposure: { ...base.exposure, liquidHeightM: 0, exposedHeightM: 0, liquidWettedAreaM2: 0, wettedAreaM2: 0 } }),
      input,
    );
    expect(result.flags.map(f => f.id)).toEqual(['no-wetted-area']);
  });

  it('flags orifices of 16 in² and above as large', () => {
    const base = stages();
    const result = buildSizingResultV1(
      stages({ orifice: { ...base.orifice, requiredAreaIn2: 12, orifice: API526_ORIFICES[12], minimumInletIn: 8 } }),
      input,
    );
    expect(result.flags).toEqual([
      {
        id: 'large-orifice',
        severity: 'info',
        title: 'Large orifice (R)',
        detail: 'Selected orifice needs an 8" inlet; check inlet pressure loss.',
      },
    ]);
  });

  it('flags an empty vessel end to end', () => {
    const result = runSizingEngine(input);
    expect(result.exposure.liquidHeightM).toBe(0);
    expect(result.selectedOrifice).toBe('D');
    expect(result.flags.map(f => f.id)).toEqual(['no-wetted-area']);
  });
});
