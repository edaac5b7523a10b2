/**
 * GeometrySolverModule
 *
 * Converts a stored liquid volume into the liquid height and the vessel
 * surface wetted by that liquid within reach of a pool fire.
 *
 * The vessel is a vertical stack, measured from the bottom apex:
 *
 *   0 ─────────── H        bottom head (apex down)
 *   H ─────────── H + L    cylindrical shell
 *   H + L ─────── 2H + L   top head (apex up, mirror of the bottom head)
 *
 * Height → volume/area is closed form everywhere. Volume → height is closed
 * form in the shell and a bounded bisection inside either head.
 *
 * The fire height limit depends on the governing standard and must be chosen
 * by the caller (see selectMethod in HeatLoadModule) before this runs.
 */
import type { FillState, FireExposureResult, VesselGeometry } from '../schema/SizingInputV1';
import { ConvergenceError, GeometryError } from '../errors';
import { bisectIncreasing, DEFAULT_BISECTION_OPTIONS } from '../utils/bisection';
import type { BisectionOptions } from '../utils/bisection';
import {
  buildHeadShape,
  headFullArea,
  headFullVolume,
  headRadiusAt,
  headVolumeTo,
  headWettedAreaTo,
} from './HeadGeometryModule';
import type { HeadShape } from './HeadGeometryModule';

export interface VesselModel {
  head: HeadShape;
  innerDiameterM: number;
  shellHeightM: number;
  headDepthM: number;
  totalHeightM: number;
  headVolumeM3: number;
  headAreaM2: number;
  shellVolumeM3: number;
  totalVolumeM3: number;
}

/** Validate the geometric invariants and precompute the vessel's fixed quantities. */
export function buildVessel(geometry: VesselGeometry): VesselModel {
  const { outerDiameterM, shellHeightM, shellThicknessMm } = geometry;

  if (geometry.orientation !== 'vertical') {
    throw new GeometryError(`Only vertical vessels are supported, got '${String(geometry.orientation)}'.`);
  }
  if (!(outerDiameterM > 0)) {
    throw new GeometryError(`Outer diameter must be positive, got ${outerDiameterM} m.`);
  }
  if (!(shellHeightM >= 0)) {
    throw new GeometryError(`Shell height cannot be negative, got ${shellHeightM} m.`);
  }
  if (!(shellThicknessMm >= 0)) {
    throw new GeometryError(`Shell thickness cannot be negative, got ${shellThicknessMm} mm.`);
  }
  if (!(geometry.bottomElevationM >= 0)) {
    throw new GeometryError(`Bottom elevation cannot be negative, got ${geometry.bottomElevationM} m.`);
  }

  const thicknessM = shellThicknessMm / 1000;
  if (thicknessM >= outerDiameterM / 2) {
    throw new GeometryError(
      `Shell thickness (${shellThicknessMm} mm) must be less than the vessel radius ` +
      `(${((outerDiameterM / 2) * 1000).toFixed(1)} mm).`,
    );
  }

  const innerDiameterM = outerDiameterM - 2 * thicknessM;
  const head = buildHeadShape(geometry.headType, innerDiameterM);
  const headVolumeM3 = headFullVolume(head);
  const shellVolumeM3 = Math.PI * head.radiusM ** 2 * shellHeightM;

  return {
    head,
    innerDiameterM,
    shellHeightM,
    headDepthM: head.depthM,
    totalHeightM: 2 * head.depthM + shellHeightM,
    headVolumeM3,
    headAreaM2: headFullArea(head),
    shellVolumeM3,
    totalVolumeM3: 2 * headVolumeM3 + shellVolumeM3,
  };
}

/** Liquid volume (m³) held below height h from the bottom apex. */
export function vesselVolumeAt(vessel: VesselModel, heightM: number): number {
  const { head, headDepthM: H, shellHeightM: L } = vessel;
  const h = Math.min(Math.max(heightM, 0), vessel.totalHeightM);

  if (h <= H) return headVolumeTo(head, h);
  if (h <= H + L) return vessel.headVolumeM3 + Math.PI * head.radiusM ** 2 * (h - H);
  // Top head is inverted: the part above the liquid is a bottom-head fill of (total − h).
  return vessel.headVolumeM3 + vessel.shellVolumeM3 + vessel.headVolumeM3 - headVolumeTo(head, vessel.totalHeightM - h);
}

/** Inner surface (m²) wetted by liquid standing at height h from the bottom apex. */
export function vesselWettedAreaAt(vessel: VesselModel, heightM: number): number {
  const { head, headDepthM: H, shellHeightM: L } = vessel;
  const h = Math.min(Math.max(heightM, 0), vessel.totalHeightM);

  if (h <= H) return headWettedAreaTo(head, h);
  const shellAreaM2 = Math.PI * vessel.innerDiameterM * (Math.min(h, H + L) - H);
  if (h <= H + L) return vessel.headAreaM2 + shellAreaM2;
  return vessel.headAreaM2 + shellAreaM2 + vessel.headAreaM2 - headWettedAreaTo(head, vessel.totalHeightM - h);
}

/** Inner radius (m) at height h from the bottom apex. */
export function vesselRadiusAt(vessel: VesselModel, heightM: number): number {
  const { head, headDepthM: H, shellHeightM: L } = vessel;
  const h = Math.min(Math.max(heightM, 0), vessel.totalHeightM);

  if (h <= H) return headRadiusAt(head, h);
  if (h <= H + L) return head.radiusM;
  return headRadiusAt(head, vessel.totalHeightM - h);
}

function solveHeadHeight(
  vessel: VesselModel,
  targetVolumeM3: number,
  options: BisectionOptions,
): number {
  const outcome = bisectIncreasing(
    h => headVolumeTo(vessel.head, h),
    targetVolumeM3,
    0,
    vessel.headDepthM,
    options,
  );
  if (!outcome.converged) {
    throw new ConvergenceError('Liquid height search in head did not converge', {
      lowerBound: outcome.lo,
      upperBound: outcome.hi,
      iterations: outcome.iterations,
      residual: outcome.residual,
    });
  }
  return outcome.x;
}

/**
 * Liquid height (m) from the bottom apex for a stored volume.
 * Throws GeometryError when the volume is negative or exceeds the vessel.
 */
export function liquidHeightFromVolume(
  vessel: VesselModel,
  volumeM3: number,
  options: BisectionOptions = DEFAULT_BISECTION_OPTIONS,
): number {
  if (!(volumeM3 >= 0)) {
    throw new GeometryError(`Fill volume cannot be negative, got ${volumeM3} m³.`);
  }
  if (volumeM3 > vessel.totalVolumeM3) {
    throw new GeometryError(
      `Fill volume of ${volumeM3.toFixed(3)} m³ exceeds the vessel capacity of ` +
      `${vessel.totalVolumeM3.toFixed(3)} m³.`,
    );
  }
  if (volumeM3 === 0) return 0;
  if (volumeM3 === vessel.totalVolumeM3) return vessel.totalHeightM;

  const { headDepthM: H } = vessel;

  if (volumeM3 <= vessel.headVolumeM3) {
    return solveHeadHeight(vessel, volumeM3, options);
  }

  const aboveHead = volumeM3 - vessel.headVolumeM3;
  if (aboveHead <= vessel.shellVolumeM3) {
    return H + aboveHead / (Math.PI * vessel.head.radiusM ** 2);
  }

  // Inverted top head: solve for the empty space above the liquid.
  const emptyM3 = vessel.totalVolumeM3 - volumeM3;
  return vessel.totalHeightM - solveHeadHeight(vessel, emptyM3, options);
}

/**
 * Solve liquid height, fire-exposed height and fire-wetted area.
 *
 * @param fireHeightLimitM  Elevation above grade reached by the fire for the governing standard.
 */
export function solveFireExposure(
  geometry: VesselGeometry,
  fill: FillState,
  fireHeightLimitM: number,
): FireExposureResult {
  const vessel = buildVessel(geometry);
  const liquidHeightM = liquidHeightFromVolume(vessel, fill.normalFillVolumeM3);

  const fireLimitAboveBottomM = fireHeightLimitM - geometry.bottomElevationM;
  const exposedHeightM = Math.max(0, Math.min(liquidHeightM, fireLimitAboveBottomM));

  return {
    innerDiameterM: vessel.innerDiameterM,
    headDepthM: vessel.headDepthM,
    totalHeightM: vessel.totalHeightM,
    totalVolumeM3: vessel.totalVolumeM3,
    liquidHeightM,
    exposedHeightM,
    fireHeightLimitM,
    fireLimitAboveBottomM,
    liquidWettedAreaM2: vesselWettedAreaAt(vessel, liquidHeightM),
    wettedAreaM2: exposedHeightM > 0 ? vesselWettedAreaAt(vessel, exposedHeightM) : 0,
  };
}
