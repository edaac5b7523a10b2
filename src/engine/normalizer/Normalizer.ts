import { z } from 'zod';
import type { SizingInputV1 } from '../schema/SizingInputV1';
import { InputValidationError } from '../errors';

// Shape and type checks only. Physical invariants (thickness vs radius,
// k > 1, fill vs capacity) belong to the module that owns them so that each
// raises its own error class.

const finite = () => z.number({ invalid_type_error: 'must be a number' }).finite();

export const VesselGeometrySchema = z.object({
  orientation: z.literal('vertical', {
    errorMap: () => ({ message: "only 'vertical' vessels are supported" }),
  }),
  headType: z.enum(['torispherical', 'ellipsoidal', 'hemispherical']),
  outerDiameterM: finite(),
  shellHeightM: finite(),
  shellThicknessMm: finite(),
  bottomElevationM: finite(),
});

export const FillStateSchema = z.object({
  normalFillVolumeM3: finite(),
});

export const FluidPropertiesSchema = z.object({
  specificHeatRatio: finite(),
  latentHeatJPerKg: finite(),
  molecularWeight: finite(),
  compressibility: finite(),
  relievingTemperatureC: finite(),
});

export const ReliefLineConfigSchema = z.object({
  mawpPsig: finite(),
  operatingPressurePsig: finite(),
  hasFirefighting: z.boolean(),
  accumulationPct: finite(),
  atmosphericPressurePsia: finite(),
  backpressurePsig: finite(),
  dischargeCoefficientKd: finite(),
  backpressureCorrectionKb: finite(),
  combinationFactorKc: finite(),
  environmentalFactorKe: finite(),
});

export const SizingInputSchema = z.object({
  geometry: VesselGeometrySchema,
  fill: FillStateSchema,
  fluid: FluidPropertiesSchema,
  reliefLine: ReliefLineConfigSchema,
});

/**
 * Validate an untyped snapshot (parsed JSON, form values) into engine input.
 * Every field is required; nothing is defaulted.
 *
 * @throws InputValidationError listing every failing field.
 */
export function normalizeInput(raw: unknown): SizingInputV1 {
  const parsed = SizingInputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InputValidationError(
      parsed.error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    );
  }
  return parsed.data;
}
