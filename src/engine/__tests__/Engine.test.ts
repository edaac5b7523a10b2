import { describe, it, expect } from 'vitest';
import { runSizingEngine, sizeFromRawInput } from '../Engine';
import { GeometryError, InputValidationError, InvalidFluidPropertyError } from '../errors';
import type { SizingInputV1 } from '../schema/SizingInputV1';

const fdDrum: SizingInputV1 = {
  geometry: {
    orientation: 'vertical',
    headType: 'torispherical',
    outerDiameterM: 3,
    shellHeightM: 6,
    shellThicknessMm: 12,
    bottomElevationM: 1,
  },
  fill: { normalFillVolumeM3: 25 },
  fluid: {
    specificHeatRatio: 1.3,
    latentHeatJPerKg: 335_000,
    molecularWeight: 86,
    compressibility: 0.9,
    relievingTemperatureC: 120,
  },
  reliefLine: {
    mawpPsig: 150,
    operatingPressurePsig: 100,
    hasFirefighting: false,
    accumulationPct: 21,
    atmosphericPressurePsia: 14.7,
    backpressurePsig: 0,
    dischargeCoefficientKd: 0.975,
    backpressureCorrectionKb: 1,
    combinationFactorKc: 1,
    environmentalFactorKe: 1,
  },
};

const lowPressureTank: SizingInputV1 = {
  geometry: {
    orientation: 'vertical',
    headType: 'hemispherical',
    outerDiameterM: 2,
    shellHeightM: 3,
    shellThicknessMm: 0,
    bottomElevationM: 0.5,
  },
  fill: { normalFillVolumeM3: 5 },
  fluid: {
    specificHeatRatio: 1.1,
    latentHeatJPerKg: 400_000,
    molecularWeight: 44,
    compressibility: 1,
    relievingTemperatureC: 50,
  },
  reliefLine: {
    mawpPsig: 10,
    operatingPressurePsig: 5,
    hasFirefighting: false,
    accumulationPct: 10,
    atmosphericPressurePsia: 14.7,
    backpressurePsig: 0,
    dischargeCoefficientKd: 0.975,
    backpressureCorrectionKb: 1,
    combinationFactorKc: 1,
    environmentalFactorKe: 1,
  },
};

const tallColumn: SizingInputV1 = {
  geometry: {
    orientation: 'vertical',
    headType: 'ellipsoidal',
    outerDiameterM: 6,
    shellHeightM: 20,
    shellThicknessMm: 20,
    bottomElevationM: 0,
  },
  fill: { normalFillVolumeM3: 500 },
  fluid: {
    specificHeatRatio: 1.15,
    latentHeatJPerKg: 150_000,
    molecularWeight: 100,
    compressibility: 0.85,
    relievingTemperatureC: 200,
  },
  reliefLine: {
    mawpPsig: 300,
    operatingPressurePsig: 250,
    hasFirefighting: false,
    accumulationPct: 21,
    atmosphericPressurePsia: 14.7,
    backpressurePsig: 0,
    dischargeCoefficientKd: 0.975,
    backpressureCorrectionKb: 1,
    combinationFactorKc: 1,
    environmentalFactorKe: 1,
  },
};

function withFluid(input: SizingInputV1, fluid: Partial<SizingInputV1['fluid']>): SizingInputV1 {
  return { ...input, fluid: { ...input.fluid, ...fluid } };
}

function withReliefLine(input: SizingInputV1, reliefLine: Partial<SizingInputV1['reliefLine']>): SizingInputV1 {
  return { ...input, reliefLine: { ...input.reliefLine, ...reliefLine } };
}

describe('runSizingEngine', () => {
  describe('API 520 F&D drum, critical flow', () => {
    const result = runSizingEngine(fdDrum);

    it('selects API 520 from MAWP', () => {
      expect(result.method).toBe('API520');
      expect(result.fireHeightLimitM).toBe(7.62);
    });

    it('exposes the whole liquid column', () => {
      expect(result.exposure.liquidHeightM).toBeCloseTo(3.7910817945, 9);
      expect(result.exposure.exposedHeightM).toBe(result.exposure.liquidHeightM);
      expect(result.exposure.wettedAreaM2).toBeCloseTo(38.9744327427, 8);
    });

    it('derives the relief load', () => {
      expect(result.heatLoadW).toBeCloseTo(1_429_175.8652, 3);
      expect(result.heatLoadBand).toBe('api520');
      expect(result.evaporationRateKgH).toBeCloseTo(15_358.3078056, 5);
      expect(result.massFlowLbH).toBeCloseTo(33_859.2728208, 5);
    });

    it('sizes the orifice', () => {
      expect(result.relievingPressurePsia).toBeCloseTo(196.2, 12);
      expect(result.flowRegime).toBe('critical');
      expect(result.gasCoefficientC).toBeCloseTo(346.9764226452, 8);
      expect(result.requiredAreaIn2).toBeCloseTo(1.3882301252, 8);
      expect(result.requiredDiameterIn).toBeCloseTo(1.3294921935, 8);
      expect(result.selectedOrifice).toBe('K');
      expect(result.minimumInletIn).toBe(3);
    });

    it('raises no flags and explains each stage', () => {
      expect(result.flags).toEqual([]);
      expect(result.notes).toEqual([
        'MAWP > 15 psig: API 520 applies (fire height limit 7.62 m).',
        'Heat load from api520: 1429.2 kW.',
        'Critical flow: backpressure 14.70 psia < critical pressure 107.07 psia.',
      ]);
      expect(result.meta).toEqual({ engineVersion: '1.2.0', contractVersion: 'SizingOutputV1' });
    });
  });

  it('sizes a low-pressure tank by API 2000', () => {
    const result = runSizingEngine(lowPressureTank);
    expect(result.method).toBe('API2000');
    expect(result.fireHeightLimitM).toBe(9.14);
    expect(result.heatLoadBand).toBe('api2000-a-lt-18.6');
    expect(result.heatLoadW).toBeCloseTo(763_761.0507, 3);
    expect(result.relievingPressurePsia).toBeCloseTo(25.7, 12);
    expect(result.criticalPressurePsia).toBeCloseTo(15.0262577295, 8);
    expect(result.flowRegime).toBe('critical');
    expect(result.requiredAreaIn2).toBeCloseTo(6.7297121001, 8);
    expect(result.selectedOrifice).toBe('Q');
    expect(result.minimumInletIn).toBe(6);
    expect(result.notes[1]).toBe('Heat load from api2000-a-lt-18.6: 763.8 kW.');
  });

  it('switches to subcritical sizing under high backpressure', () => {
    const result = runSizingEngine(withReliefLine(fdDrum, { backpressurePsig: 100 }));
    expect(result.flowRegime).toBe('subcritical');
    expect(result.gasCoefficientC).toBeUndefined();
    expect(result.subcriticalCoefficientF2).toBeCloseTo(0.7295187572, 9);
    expect(result.requiredAreaIn2).toBeCloseTo(1.3938252407, 8);
    expect(result.selectedOrifice).toBe('K');
    expect(result.notes[2]).toBe('Subcritical flow: backpressure 114.70 psia ≥ critical pressure 107.07 psia.');
  });

  it('clips exposure at the fire limit for a tall column', () => {
    const result = runSizingEngine(tallColumn);
    expect(result.exposure.liquidHeightM).toBeCloseTo(18.4187133191, 6);
    expect(result.exposure.exposedHeightM).toBeCloseTo(7.62, 12);
    expect(result.exposure.wettedAreaM2).toBeCloseTo(153.2823528598, 7);
    expect(result.requiredAreaIn2).toBeCloseTo(5.1136449763, 7);
    expect(result.selectedOrifice).toBe('P');
    expect(result.flags.map(f => f.id)).toEqual(['liquid-above-fire-limit']);
    expect(result.flags[0].detail).toBe('Only 7.62 m of the 18.42 m liquid column is counted as fire-exposed.');
  });

  it('flags a large orifice', () => {
    const result = runSizingEngine(withFluid(tallColumn, { latentHeatJPerKg: 50_000 }));
    expect(result.requiredAreaIn2).toBeCloseTo(15.3409349288, 6);
    expect(result.selectedOrifice).toBe('R');
    expect(result.flags.map(f => f.id)).toEqual(['large-orifice', 'liquid-above-fire-limit']);
  });

  it('returns a null orifice with a fail flag when the load exceeds the largest letter', () => {
    const result = runSizingEngine(withFluid(tallColumn, { latentHeatJPerKg: 25_000 }));
    expect(result.requiredAreaIn2).toBeCloseTo(30.6818698576, 6);
    expect(result.selectedOrifice).toBeNull();
    expect(result.orifice).toBeNull();
    expect(result.minimumInletIn).toBe(8);
    expect(result.flags[0]).toEqual({
      id: 'no-suitable-orifice',
      severity: 'fail',
      title: 'No standard orifice is large enough',
      detail: "No standard API 526 orifice can pass 30.682 in²; the largest ('T') is 26.000 in².",
      action: 'Consider multiple relief devices or a rupture disc.',
    });
  });

  it('gives a zero relief load when the vessel sits above the fire', () => {
    const result = runSizingEngine({ ...fdDrum, geometry: { ...fdDrum.geometry, bottomElevationM: 8 } });
    expect(result.exposure.wettedAreaM2).toBe(0);
    expect(result.heatLoadW).toBe(0);
    expect(result.massFlowLbH).toBe(0);
    expect(result.requiredAreaIn2).toBe(0);
    expect(result.selectedOrifice).toBe('D');
    expect(result.flags.map(f => f.id)).toEqual(['fire-below-vessel']);
  });

  it('warns when operating pressure is above MAWP', () => {
    const result = runSizingEngine(withReliefLine(fdDrum, { operatingPressurePsig: 160 }));
    expect(result.flags).toEqual([
      {
        id: 'operating-above-mawp',
        severity: 'warn',
        title: 'Operating pressure above MAWP',
        detail: 'Operating pressure 160 psig exceeds MAWP 150 psig. Check the inputs.',
      },
    ]);
    expect(result.operatingPressurePsig).toBe(160);
  });

  it('applies the firefighting coefficient', () => {
    const result = runSizingEngine(withReliefLine(fdDrum, { hasFirefighting: true }));
    expect(result.heatLoadW).toBeCloseTo(43_200 * 38.9744327427 ** 0.82, 2);
  });

  describe('errors propagate from the stage that detects them', () => {
    it('overfilled vessel', () => {
      expect(() => runSizingEngine({ ...fdDrum, fill: { normalFillVolumeM3: 50 } })).toThrow(GeometryError);
    });

    it('non-physical latent heat', () => {
      expect(() => runSizingEngine(withFluid(fdDrum, { latentHeatJPerKg: 0 }))).toThrow(InvalidFluidPropertyError);
    });

    it('k ≤ 1', () => {
      expect(() => runSizingEngine(withFluid(fdDrum, { specificHeatRatio: 1 }))).toThrow(InvalidFluidPropertyError);
    });

    it('implausible fluid properties', () => {
      expect(() => runSizingEngine(withFluid(fdDrum, { specificHeatRatio: 5 }))).toThrow(InvalidFluidPropertyError);
      expect(() => runSizingEngine(withFluid(fdDrum, { molecularWeight: 0.001 }))).toThrow(InvalidFluidPropertyError);
      expect(() => runSizingEngine(withFluid(fdDrum, { compressibility: 50 }))).toThrow(InvalidFluidPropertyError);
    });

    it('correction factors above their limits', () => {
      expect(() =>
        runSizingEngine(
          withReliefLine(fdDrum, {
            dischargeCoefficientKd: 5,
            backpressureCorrectionKb: 3,
            combinationFactorKc: 2,
            environmentalFactorKe: 9,
          }),
        ),
      ).toThrow(InputValidationError);
    });

    it('backpressure at the relieving pressure', () => {
      expect(() => runSizingEngine(withReliefLine(fdDrum, { backpressurePsig: 181.5 }))).toThrow(InputValidationError);
    });
  });
});

describe('sizeFromRawInput', () => {
  it('validates then sizes', () => {
    expect(sizeFromRawInput(fdDrum).selectedOrifice).toBe('K');
  });

  it('rejects a malformed snapshot before any stage runs', () => {
    expect(() => sizeFromRawInput({ ...fdDrum, fill: { normalFillVolumeM3: 'full' } })).toThrow(
      'fill.normalFillVolumeM3: must be a number',
    );
  });
});
