import type { HeadType } from '../../engine/schema/SizingInputV1';

/**
 * SizingFormModel
 *
 * Form state is kept as the strings the user typed. toRawSnapshot converts
 * them to numbers in engine units. Range checks belong to normalizeInput
 * and the engine modules.
 *
 * Latent heat is entered in kJ/kg (engine takes J/kg). Everything else is
 * entered in engine units.
 */

export type NumericFieldId =
  | 'outerDiameterM'
  | 'shellHeightM'
  | 'shellThicknessMm'
  | 'bottomElevationM'
  | 'normalFillVolumeM3'
  | 'specificHeatRatio'
  | 'latentHeatKJPerKg'
  | 'molecularWeight'
  | 'compressibility'
  | 'relievingTemperatureC'
  | 'mawpPsig'
  | 'operatingPressurePsig'
  | 'accumulationPct'
  | 'atmosphericPressurePsia'
  | 'backpressurePsig'
  | 'dischargeCoefficientKd'
  | 'backpressureCorrectionKb'
  | 'combinationFactorKc'
  | 'environmentalFactorKe';

export interface SizingFormValues {
  headType: HeadType;
  hasFirefighting: boolean;
  numbers: Record<NumericFieldId, string>;
}

export interface FieldDescriptor {
  id: NumericFieldId;
  label: string;
  unit: string;
}

export interface FieldGroup {
  title: string;
  fields: FieldDescriptor[];
}

export const FIELD_GROUPS: FieldGroup[] = [
  {
    title: 'Vessel',
    fields: [
      { id: 'outerDiameterM', label: 'Outer diameter', unit: 'm' },
      { id: 'shellHeightM', label: 'Shell height (T/T)', unit: 'm' },
      { id: 'shellThicknessMm', label: 'Shell thickness', unit: 'mm' },
      { id: 'bottomElevationM', label: 'Bottom elevation above grade', unit: 'm' },
      { id: 'normalFillVolumeM3', label: 'Normal fill volume', unit: 'm³' },
    ],
  },
  {
    title: 'Fluid',
    fields: [
      { id: 'specificHeatRatio', label: 'Specific heat ratio k', unit: '–' },
      { id: 'latentHeatKJPerKg', label: 'Latent heat', unit: 'kJ/kg' },
      { id: 'molecularWeight', label: 'Molecular weight', unit: 'g/mol' },
      { id: 'compressibility', label: 'Compressibility Z', unit: '–' },
      { id: 'relievingTemperatureC', label: 'Relieving temperature', unit: '°C' },
    ],
  },
  {
    title: 'Relief line',
    fields: [
      { id: 'mawpPsig', label: 'MAWP', unit: 'psig' },
      { id: 'operatingPressurePsig', label: 'Operating pressure', unit: 'psig' },
      { id: 'accumulationPct', label: 'Accumulation', unit: '%' },
      { id: 'atmosphericPressurePsia', label: 'Atmospheric pressure', unit: 'psia' },
      { id: 'backpressurePsig', label: 'Backpressure', unit: 'psig' },
      { id: 'dischargeCoefficientKd', label: 'Kd', unit: '–' },
      { id: 'backpressureCorrectionKb', label: 'Kb', unit: '–' },
      { id: 'combinationFactorKc', label: 'Kc', unit: '–' },
      { id: 'environmentalFactorKe', label: 'Ke', unit: '–' },
    ],
  },
];

export const HEAD_TYPE_LABELS: Record<HeadType, string> = {
  torispherical: 'Torispherical (ASME F&D)',
  ellipsoidal: 'Ellipsoidal 2:1',
  hemispherical: 'Hemispherical',
};

/** Demonstration case: hexane-like vapour, 3 m vertical drum, 21 % fire accumulation. */
export const DEFAULT_FORM_VALUES: SizingFormValues = {
  headType: 'torispherical',
  hasFirefighting: false,
  numbers: {
    outerDiameterM: '3',
    shellHeightM: '6',
    shellThicknessMm: '12',
    bottomElevationM: '1',
    normalFillVolumeM3: '25',
    specificHeatRatio: '1.3',
    latentHeatKJPerKg: '335',
    molecularWeight: '86',
    compressibility: '0.9',
    relievingTemperatureC: '120',
    mawpPsig: '150',
    operatingPressurePsig: '100',
    accumulationPct: '21',
    atmosphericPressurePsia: '14.7',
    backpressurePsig: '0',
    dischargeCoefficientKd: '0.975',
    backpressureCorrectionKb: '1',
    combinationFactorKc: '1',
    environmentalFactorKe: '1',
  },
};

/** Parse a typed value; blank becomes undefined so the schema reports it as missing. */
export function parseNumberField(value: string): number | undefined {
  const trimmed = value.trim();
  if (trimmed === '') return undefined;
  return Number(trimmed);
}

/** Build the untyped snapshot handed to sizeFromRawInput. */
export function toRawSnapshot(values: SizingFormValues): unknown {
  const n = (id: NumericFieldId) => parseNumberField(values.numbers[id]);
  const latentHeatKJPerKg = n('latentHeatKJPerKg');

  return {
    geometry: {
      orientation: 'vertical',
      headType: values.headType,
      outerDiameterM: n('outerDiameterM'),
      shellHeightM: n('shellHeightM'),
      shellThicknessMm: n('shellThicknessMm'),
      bottomElevationM: n('bottomElevationM'),
    },
    fill: {
      normalFillVolumeM3: n('normalFillVolumeM3'),
    },
    fluid: {
      specificHeatRatio: n('specificHeatRatio'),
      latentHeatJPerKg: latentHeatKJPerKg === undefined ? undefined : latentHeatKJPerKg * 1000,
      molecularWeight: n('molecularWeight'),
      compressibility: n('compressibility'),
      relievingTemperatureC: n('relievingTemperatureC'),
    },
    reliefLine: {
      mawpPsig: n('mawpPsig'),
      operatingPressurePsig: n('operatingPressurePsig'),
      hasFirefighting: values.hasFirefighting,
      accumulationPct: n('accumulationPct'),
      atmosphericPressurePsia: n('atmosphericPressurePsia'),
      backpressurePsig: n('backpressurePsig'),
      dischargeCoefficientKd: n('dischargeCoefficientKd'),
      backpressureCorrectionKb: n('backpressureCorrectionKb'),
      combinationFactorKc: n('combinationFactorKc'),
      environmentalFactorKe: n('environmentalFactorKe'),
    },
  };
}

export function setNumberField(
  values: SizingFormValues,
  id: NumericFieldId,
  value: string,
): SizingFormValues {
  return { ...values, numbers: { ...values.numbers, [id]: value } };
}
