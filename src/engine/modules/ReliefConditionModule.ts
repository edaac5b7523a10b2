/**
 * ReliefConditionModule
 *
 * All arithmetic is in absolute psi: gauge inputs are lifted by the local
 * atmospheric pressure before they are compared or summed.
 *
 *   P1    = MAWP + MAWP·(accumulation/100) + Patm
 *   P2    = backpressure + Patm
 *   Pcrit = P1·(2/(k+1))^(k/(k−1))
 *
 * Flow is critical when P2 < Pcrit.
 */
import type { ReliefConditionResult } from '../schema/SizingInputV1';
import type { InputIssue } from '../errors';
import { InputValidationError, InvalidFluidPropertyError } from '../errors';

export const MAX_ACCUMULATION_PCT = 100;
/** Upper plausibility bound on k; real gases sit between about 1.1 and 1.67. */
export const MAX_SPECIFIC_HEAT_RATIO = 2;

export function assertSpecificHeatRatio(k: number): void {
  if (!(k > 1)) {
    throw new InvalidFluidPropertyError(
      'specificHeatRatio',
      `Specific heat ratio k must be greater than 1, got ${k}.`,
    );
  }
  if (k > MAX_SPECIFIC_HEAT_RATIO) {
    throw new InvalidFluidPropertyError(
      'specificHeatRatio',
      `Specific heat ratio k must not exceed ${MAX_SPECIFIC_HEAT_RATIO}, got ${k}.`,
    );
  }
}

/** Relieving pressure P1 (psia). */
export function relievingPressure(mawpPsig: number, accumulationPct: number, atmosphericPsia: number): number {
  return mawpPsig + mawpPsig * (accumulationPct / 100) + atmosphericPsia;
}

/** Critical flow pressure (psia) for relieving pressure P1 and specific heat ratio k. */
export function criticalPressure(p1Psia: number, k: number): number {
  assertSpecificHeatRatio(k);
  return p1Psia * (2 / (k + 1)) ** (k / (k - 1));
}

export interface ReliefConditionInput {
  mawpPsig: number;
  accumulationPct: number;
  atmosphericPressurePsia: number;
  backpressurePsig: number;
  specificHeatRatio: number;
}

export function runReliefConditionModule(input: ReliefConditionInput): ReliefConditionResult {
  const issues: InputIssue[] = [];
  if (!(input.mawpPsig > 0)) {
    issues.push({ path: 'reliefLine.mawpPsig', message: `MAWP must be positive, got ${input.mawpPsig} psig.` });
  }
  if (!(input.accumulationPct >= 0 && input.accumulationPct <= MAX_ACCUMULATION_PCT)) {
    issues.push({
      path: 'reliefLine.accumulationPct',
      message: `Accumulation must be between 0 and ${MAX_ACCUMULATION_PCT} %, got ${input.accumulationPct} %.`,
    });
  }
  if (!(input.atmosphericPressurePsia > 0)) {
    issues.push({
      path: 'reliefLine.atmosphericPressurePsia',
      message: `Atmospheric pressure must be positive, got ${input.atmosphericPressurePsia} psia.`,
    });
  }
  if (!(input.backpressurePsig >= 0)) {
    issues.push({
      path: 'reliefLine.backpressurePsig',
      message: `Backpressure cannot be negative, got ${input.backpressurePsig} psig.`,
    });
  }
  if (issues.length > 0) throw new InputValidationError(issues);

  const accumulationPsi = input.mawpPsig * (input.accumulationPct / 100);
  const relievingPressurePsia = relievingPressure(
    input.mawpPsig,
    input.accumulationPct,
    input.atmosphericPressurePsia,
  );
  const backpressurePsia = input.backpressurePsig + input.atmosphericPressurePsia;
  const criticalPressurePsia = criticalPressure(relievingPressurePsia, input.specificHeatRatio);

  if (backpressurePsia >= relievingPressurePsia) {
    throw new InputValidationError([
      {
        path: 'reliefLine.backpressurePsig',
        message:
          `Backpressure (${backpressurePsia.toFixed(2)} psia) must be below the relieving ` +
          `pressure (${relievingPressurePsia.toFixed(2)} psia).`,
      },
    ]);
  }

  return {
    accumulationPsi,
    relievingPressurePsia,
    backpressurePsia,
    criticalPressurePsia,
    flowRegime: backpressurePsia < criticalPressurePsia ? 'critical' : 'subcritical',
  };
}
