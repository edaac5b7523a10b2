import type {
  FireMethod,
  FlowRegime,
  OrificeLetter,
  OrificeSpec,
  SizingFlag,
  SizingMetaV1,
} from '../../contracts/SizingOutputV1';

export type HeadType = 'torispherical' | 'ellipsoidal' | 'hemispherical';

export type VesselOrientation = 'vertical';

// ─── Input snapshot ───────────────────────────────────────────────────────────

export interface VesselGeometry {
  orientation: VesselOrientation;
  headType: HeadType;
  outerDiameterM: number;       // m
  shellHeightM: number;         // m, tangent-to-tangent
  shellThicknessMm: number;     // mm
  bottomElevationM: number;     // m above grade
}

export interface FillState {
  normalFillVolumeM3: number;   // m³, liquid at rest
}

export interface FluidProperties {
  specificHeatRatio: number;    // k = Cp/Cv
  latentHeatJPerKg: number;     // J/kg
  molecularWeight: number;      // g/mol (≡ lb/lbmol)
  compressibility: number;      // Z
  relievingTemperatureC: number; // °C
}

export interface ReliefLineConfig {
  mawpPsig: number;
  /** Echoed on the result; not used in sizing. */
  operatingPressurePsig: number;
  hasFirefighting: boolean;
  accumulationPct: number;      // % of MAWP
  atmosphericPressurePsia: number;
  backpressurePsig: number;
  dischargeCoefficientKd: number;
  backpressureCorrectionKb: number;
  combinationFactorKc: number;
  environmentalFactorKe: number;
}

export interface SizingInputV1 {
  geometry: VesselGeometry;
  fill: FillState;
  fluid: FluidProperties;
  reliefLine: ReliefLineConfig;
}

// ─── Stage results ────────────────────────────────────────────────────────────

export interface MethodSelection {
  method: FireMethod;
  /** Maximum elevation above grade considered exposed to a pool fire (m). */
  fireHeightLimitM: number;
}

export interface FireExposureResult {
  innerDiameterM: number;
  headDepthM: number;
  totalHeightM: number;
  totalVolumeM3: number;
  /** Liquid height from the bottom apex (m). */
  liquidHeightM: number;
  /** Liquid height within reach of the fire (m). */
  exposedHeightM: number;
  fireHeightLimitM: number;
  /** Fire height limit measured from the vessel bottom; negative when the fire stays below the vessel. */
  fireLimitAboveBottomM: number;
  /** Area wetted by the full liquid column, ignoring the fire limit (m²). */
  liquidWettedAreaM2: number;
  /** Wetted area exposed to fire (m²). */
  wettedAreaM2: number;
}

export interface HeatLoadResult {
  method: FireMethod;
  heatLoadW: number;
  /** API 2000 band id, or 'api520' for the API 520 branch. */
  band: string;
  evaporationRateKgS: number;
  evaporationRateKgH: number;
}

export interface ReliefConditionResult {
  accumulationPsi: number;
  relievingPressurePsia: number;
  backpressurePsia: number;
  criticalPressurePsia: number;
  flowRegime: FlowRegime;
}

export interface OrificeSizingResult {
  massFlowLbH: number;
  relievingTemperatureR: number;
  flowRegime: FlowRegime;
  /** Gas coefficient C, critical flow only. */
  gasCoefficientC?: number;
  /** F2, subcritical flow only. */
  subcriticalCoefficientF2?: number;
  requiredAreaIn2: number;
  requiredDiameterIn: number;
  orifice: OrificeSpec | null;
  minimumInletIn: number;
}

// ─── Terminal result ──────────────────────────────────────────────────────────

export interface SizingResultV1 {
  method: FireMethod;
  fireHeightLimitM: number;
  exposure: FireExposureResult;
  heatLoadW: number;
  heatLoadBand: string;
  evaporationRateKgS: number;
  evaporationRateKgH: number;
  massFlowLbH: number;
  accumulationPsi: number;
  relievingPressurePsia: number;
  backpressurePsia: number;
  criticalPressurePsia: number;
  flowRegime: FlowRegime;
  gasCoefficientC?: number;
  subcriticalCoefficientF2?: number;
  requiredAreaIn2: number;
  requiredDiameterIn: number;
  selectedOrifice: OrificeLetter | null;
  orifice: OrificeSpec | null;
  minimumInletIn: number;
  operatingPressurePsig: number;
  flags: SizingFlag[];
  notes: string[];
  meta: SizingMetaV1;
}
