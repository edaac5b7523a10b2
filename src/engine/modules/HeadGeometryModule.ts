/**
 * HeadGeometryModule
 *
 * Closed-form geometry for the three supported vessel heads, measured on the
 * inner surface from the head apex (h = 0) up to the tangent line (h = depth).
 *
 *   torispherical  ASME F&D: crown radius 1.00·Di, knuckle radius 0.06·Di
 *   ellipsoidal    2:1 semi-ellipsoid: semi-axes Di/2 and Di/4
 *   hemispherical  half sphere of radius Di/2
 *
 * Volume is ∫πr² dh and wetted area is the surface of revolution
 * ∫2πr·√(1 + r′²) dh; both are integrated analytically per profile segment.
 */
import type { HeadType } from '../schema/SizingInputV1';

/** ASME flanged & dished proportions (fractions of inner diameter). */
export const FD_CROWN_RATIO = 1.0;
export const FD_KNUCKLE_RATIO = 0.06;

/** Semi-axis ratio of a 2:1 ellipsoidal head (radius : depth). */
export const ELLIPSOIDAL_AXIS_RATIO = 2;

interface TorisphericalHead {
  kind: 'torispherical';
  radiusM: number;
  depthM: number;
  crownRadiusM: number;
  knuckleRadiusM: number;
  /** Radial offset of the knuckle circle centre from the axis. */
  knuckleOffsetM: number;
  /** Height of the knuckle circle centre above the apex (equals the depth). */
  knuckleCentreM: number;
  /** Height where the crown meets the knuckle. */
  crownTransitionM: number;
}

interface EllipsoidalHead {
  kind: 'ellipsoidal';
  radiusM: number;
  depthM: number;
}

interface HemisphericalHead {
  kind: 'hemispherical';
  radiusM: number;
  depthM: number;
}

export type HeadShape = TorisphericalHead | EllipsoidalHead | HemisphericalHead;

export function buildHeadShape(headType: HeadType, innerDiameterM: number): HeadShape {
  const radiusM = innerDiameterM / 2;

  switch (headType) {
    case 'hemispherical':
      return { kind: 'hemispherical', radiusM, depthM: radiusM };

    case 'ellipsoidal':
      return { kind: 'ellipsoidal', radiusM, depthM: radiusM / ELLIPSOIDAL_AXIS_RATIO };

    case 'torispherical': {
      const crownRadiusM = FD_CROWN_RATIO * innerDiameterM;
      const knuckleRadiusM = FD_KNUCKLE_RATIO * innerDiameterM;
      const knuckleOffsetM = radiusM - knuckleRadiusM;
      // Crown and knuckle circles are tangent: their centres lie Rc − rk apart.
      const centreSpacing = crownRadiusM - knuckleRadiusM;
      const verticalSpacing = Math.sqrt(centreSpacing ** 2 - knuckleOffsetM ** 2);
      const knuckleCentreM = crownRadiusM - verticalSpacing;
      const crownTransitionM = crownRadiusM * (1 - verticalSpacing / centreSpacing);
      return {
        kind: 'torispherical',
        radiusM,
        depthM: knuckleCentreM,
        crownRadiusM,
        knuckleRadiusM,
        knuckleOffsetM,
        knuckleCentreM,
        crownTransitionM,
      };
    }
  }
}

function clampToHead(head: HeadShape, h: number): number {
  return Math.min(Math.max(h, 0), head.depthM);
}

/** asin with its argument clamped to [−1, 1] against round-off. */
function safeAsin(x: number): number {
  return Math.asin(Math.min(1, Math.max(-1, x)));
}

/** Inner radius of the head at height h above the apex. */
export function headRadiusAt(head: HeadShape, heightM: number): number {
  const h = clampToHead(head, heightM);

  switch (head.kind) {
    case 'hemispherical':
      return Math.sqrt(Math.max(2 * head.radiusM * h - h * h, 0));

    case 'ellipsoidal': {
      const z = h - head.depthM;
      return head.radiusM * Math.sqrt(Math.max(1 - (z * z) / (head.depthM * head.depthM), 0));
    }

    case 'torispherical': {
      if (h <= head.crownTransitionM) {
        return Math.sqrt(Math.max(2 * head.crownRadiusM * h - h * h, 0));
      }
      const y = h - head.knuckleCentreM;
      return head.knuckleOffsetM + Math.sqrt(Math.max(head.knuckleRadiusM ** 2 - y * y, 0));
    }
  }
}

/** Spherical cap volume of radius R filled to height h from its pole. */
function capVolume(sphereRadiusM: number, h: number): number {
  return Math.PI * (sphereRadiusM * h * h - (h * h * h) / 3);
}

/** Antiderivative of π·r(y)² over the knuckle, y measured from the knuckle centre. */
function knuckleVolumeIntegral(head: TorisphericalHead, y: number): number {
  const rk = head.knuckleRadiusM;
  const c = head.knuckleOffsetM;
  const s = Math.sqrt(Math.max(rk * rk - y * y, 0));
  return (c * c + rk * rk) * y - (y * y * y) / 3 + c * (y * s + rk * rk * safeAsin(y / rk));
}

/** Antiderivative of r·√(1 + r′²) over the knuckle. */
function knuckleAreaIntegral(head: TorisphericalHead, y: number): number {
  const rk = head.knuckleRadiusM;
  return rk * (y + head.knuckleOffsetM * safeAsin(y / rk));
}

/** Liquid volume held by the head when filled from the apex to height h (m³). */
export function headVolumeTo(head: HeadShape, heightM: number): number {
  const h = clampToHead(head, heightM);

  switch (head.kind) {
    case 'hemispherical':
      return capVolume(head.radiusM, h);

    case 'ellipsoidal': {
      const a = head.radiusM;
      const b = head.depthM;
      const z = h - b;
      return Math.PI * a * a * ((z + b) - (z * z * z + b * b * b) / (3 * b * b));
    }

    case 'torispherical': {
      const h1 = head.crownTransitionM;
      if (h <= h1) return capVolume(head.crownRadiusM, h);
      return (
        capVolume(head.crownRadiusM, h1) +
        Math.PI * (
          knuckleVolumeIntegral(head, h - head.knuckleCentreM) -
          knuckleVolumeIntegral(head, h1 - head.knuckleCentreM)
        )
      );
    }
  }
}

/** Inner surface area of the head wetted from the apex to height h (m²). */
export function headWettedAreaTo(head: HeadShape, heightM: number): number {
  const h = clampToHead(head, heightM);

  switch (head.kind) {
    case 'hemispherical':
      // Zone of a sphere: 2πRh
      return 2 * Math.PI * head.radiusM * h;

    case 'ellipsoidal': {
      // Oblate spheroid zone: r·√(1 + r′²) = a·√(1 + κ²z²), κ = √(a² − b²)/b²
      const a = head.radiusM;
      const b = head.depthM;
      const kappa = Math.sqrt(a * a - b * b) / (b * b);
      const primitive = (z: number) =>
        (z * Math.sqrt(1 + kappa * kappa * z * z)) / 2 + Math.asinh(kappa * z) / (2 * kappa);
      return 2 * Math.PI * a * (primitive(h - b) - primitive(-b));
    }

    case 'torispherical': {
      const h1 = head.crownTransitionM;
      if (h <= h1) return 2 * Math.PI * head.crownRadiusM * h;
      return (
        2 * Math.PI * head.crownRadiusM * h1 +
        2 * Math.PI * (
          knuckleAreaIntegral(head, h - head.knuckleCentreM) -
          knuckleAreaIntegral(head, h1 - head.knuckleCentreM)
        )
      );
    }
  }
}

export function headFullVolume(head: HeadShape): number {
  return headVolumeTo(head, head.depthM);
}

export function headFullArea(head: HeadShape): number {
  return headWettedAreaTo(head, head.depthM);
}
