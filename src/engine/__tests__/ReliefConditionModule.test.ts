import { describe, it, expect } from 'vitest';
import { criticalPressure, relievingPressure, runReliefConditionModule } from '../modules/ReliefConditionModule';
import { InputValidationError, InvalidFluidPropertyError } from '../errors';

const base = {
  mawpPsig: 150,
  accumulationPct: 21,
  atmosphericPressurePsia: 14.7,
  backpressurePsig: 0,
  specificHeatRatio: 1.3,
};

describe('ReliefConditionModule', () => {
  it('adds accumulation and atmospheric pressure to MAWP', () => {
    expect(relievingPressure(150, 21, 14.7)).toBeCloseTo(196.2, 12);
    expect(relievingPressure(10, 10, 14.7)).toBeCloseTo(25.7, 12);
  });

  it('computes the critical flow pressure', () => {
    expect(criticalPressure(196.2, 1.3)).toBeCloseTo(107.0717813743, 8);
  });

  it('classifies flow to atmosphere as critical', () => {
    const result = runReliefConditionModule(base);
    expect(result.accumulationPsi).toBeCloseTo(31.5, 12);
    expect(result.relievingPressurePsia).toBeCloseTo(196.2, 12);
    expect(result.backpressurePsia).toBe(14.7);
    expect(result.criticalPressurePsia).toBeCloseTo(107.0717813743, 8);
    expect(result.flowRegime).toBe('critical');
  });

  it('classifies backpressure above the critical pressure as subcritical', () => {
    const result = runReliefConditionModule({ ...base, backpressurePsig: 100 });
    expect(result.backpressurePsia).toBe(114.7);
    expect(result.flowRegime).toBe('subcritical');
  });

  it('rejects k ≤ 1', () => {
    expect(() => runReliefConditionModule({ ...base, specificHeatRatio: 1 })).toThrow(InvalidFluidPropertyError);
    expect(() => runReliefConditionModule({ ...base, specificHeatRatio: 0.9 })).toThrow(
      'Specific heat ratio k must be greater than 1, got 0.9.',
    );
  });

  it('rejects k above 2', () => {
    expect(() => runReliefConditionModule({ ...base, specificHeatRatio: 2.5 })).toThrow(
      'Specific heat ratio k must not exceed 2, got 2.5.',
    );
  });

  it('rejects backpressure at or above the relieving pressure', () => {
    expect(() => runReliefConditionModule({ ...base, backpressurePsig: 181.5 })).toThrow(InputValidationError);
    expect(() => runReliefConditionModule({ ...base, backpressurePsig: 200 })).toThrow(
      'reliefLine.backpressurePsig: Backpressure (214.70 psia) must be below the relieving pressure (196.20 psia).',
    );
  });

  it('collects every out-of-range relief-line value', () => {
    try {
      runReliefConditionModule({ ...base, mawpPsig: 0, accumulationPct: 150, backpressurePsig: -1 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InputValidationError);
      if (!(err instanceof InputValidationError)) return;
      expect(err.issues.map(i => i.path)).toEqual([
        'reliefLine.mawpPsig',
        'reliefLine.accumulationPct',
        'reliefLine.backpressurePsig',
      ]);
    }
  });
});
