/**
 * Error taxonomy for the sizing engine.
 *
 * Every error is raised at the stage that detects it and propagates unchanged.
 * NoSuitableOrificeError is the only non-fatal one: OrificeSizingModule returns
 * it alongside a null selection and the engine turns it into a result flag.
 */

export abstract class SizingError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Shape parameters break a geometric invariant, or fill volume is out of bounds. */
export class GeometryError extends SizingError {
  readonly code = 'geometry';
}

export interface ConvergenceDiagnostics {
  lowerBound: number;
  upperBound: number;
  iterations: number;
  residual: number;
}

/** Bounded bisection ran out of iterations. Indicates a defect, never bad input. */
export class ConvergenceError extends SizingError {
  readonly code = 'convergence';

  constructor(message: string, readonly diagnostics: ConvergenceDiagnostics) {
    super(
      `${message} (bracket [${diagnostics.lowerBound}, ${diagnostics.upperBound}], ` +
      `${diagnostics.iterations} iterations, residual ${diagnostics.residual})`,
    );
  }
}

/** Non-physical fluid property (k ≤ 1, latent heat ≤ 0, …). */
export class InvalidFluidPropertyError extends SizingError {
  readonly code = 'invalid-fluid-property';

  constructor(readonly property: string, message: string) {
    super(message);
  }
}

export interface InputIssue {
  /** Dotted path of the offending field, e.g. "reliefLine.mawpPsig". */
  path: string;
  message: string;
}

/** Raw snapshot failed validation, or a relief-line value is out of range. */
export class InputValidationError extends SizingError {
  readonly code = 'input-validation';

  constructor(readonly issues: InputIssue[]) {
    super(issues.map(i => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; '));
  }
}

/** Required area exceeds the largest standard orifice. */
export class NoSuitableOrificeError extends SizingError {
  readonly code = 'no-suitable-orifice';

  constructor(readonly requiredAreaIn2: number, readonly largestAreaIn2: number) {
    super(
      `No standard API 526 orifice can pass ${requiredAreaIn2.toFixed(3)} in²; ` +
      `the largest ('T') is ${largestAreaIn2.toFixed(3)} in².`,
    );
  }
}
