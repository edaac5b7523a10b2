/**
 * What the error panel and the fatal-error screen show for a thrown value.
 */
import { InputValidationError, SizingError } from '../../engine/errors';

export interface ErrorLine {
  /** Stable React key: issue path plus position, so repeated text never collides. */
  key: string;
  text: string;
}

/** One line per validation issue, or a single line for any other sizing error. */
export function sizingErrorLines(err: SizingError): ErrorLine[] {
  if (err instanceof InputValidationError) {
    return err.issues.map((issue, index) => ({
      key: `${issue.path || err.code}-${index}`,
      text: issue.path ? `${issue.path}: ${issue.message}` : issue.message,
    }));
  }
  return [{ key: `${err.code}-0`, text: err.message }];
}

export interface FatalErrorSummary {
  code: string;
  message: string;
}

export function describeFatalError(error: unknown): FatalErrorSummary {
  if (error instanceof SizingError) return { code: error.code, message: error.message };
  if (error instanceof Error) return { code: error.name, message: error.message };
  return { code: 'unknown', message: String(error) };
}
