import type { ENGINE_VERSION, CONTRACT_VERSION } from './versions';

export type FireMethod = 'API2000' | 'API520';

export type FlowRegime = 'critical' | 'subcritical';

export type OrificeLetter =
  | 'D' | 'E' | 'F' | 'G' | 'H' | 'J' | 'K'
  | 'L' | 'M' | 'N' | 'P' | 'Q' | 'R' | 'T';

export type SizingFlagId =
  | 'no-suitable-orifice'
  | 'fire-below-vessel'
  | 'liquid-above-fire-limit'
  | 'no-wetted-area'
  | 'operating-above-mawp'
  | 'large-orifice';

export interface SizingFlag {
  id: SizingFlagId;
  severity: 'info' | 'warn' | 'fail';
  title: string;
  detail: string;
  action?: string;
}

export interface SizingMetaV1 {
  engineVersion: typeof ENGINE_VERSION;
  contractVersion: typeof CONTRACT_VERSION;
}

/** One row of the API 526 standard orifice table. */
export interface OrificeSpec {
  letter: OrificeLetter;
  /** Effective orifice area (in²). */
  areaIn2: number;
  /** Effective orifice diameter (in). */
  diameterIn: number;
  /** Minimum inlet flange size (in). */
  inletIn: number;
}
