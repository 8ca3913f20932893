/**
 * Typed failures raised by the maze engine.
 *
 * Every error is a deterministic function of bad input; nothing here is
 * transient and nothing is retried. Callers narrow with `instanceof` or on the
 * `kind` discriminant and decide whether to abort, regenerate or report.
 *
 * @example
 * try {
 *   maze = decodeMaze(bytes);
 * } catch (err) {
 *   if (err instanceof MazeError && err.kind === 'MalformedEncoding') regenerate();
 *   else throw err;
 * }
 */
export type MazeErrorKind =
  | 'OutOfBounds'
  | 'MalformedEncoding'
  | 'InvalidDimensions'
  | 'StepLimitExceeded';

export abstract class MazeError extends Error {
  abstract readonly kind: MazeErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A coordinate or index lies outside the grid. */
export class OutOfBoundsError extends MazeError {
  readonly kind = 'OutOfBounds';
}

/** A byte buffer (maze or solution trace) cannot be decoded. */
export class MalformedEncodingError extends MazeError {
  readonly kind = 'MalformedEncoding';
}

/** Width / height are not positive integers or exceed what the codec stores. */
export class InvalidDimensionsError extends MazeError {
  readonly kind = 'InvalidDimensions';
}

/** A run-to-completion driver hit its `maxSteps` cap. */
export class StepLimitExceededError extends MazeError {
  readonly kind = 'StepLimitExceeded';

  constructor(readonly maxSteps: number) {
    super(`Step limit of ${maxSteps} exceeded before completion`);
  }
}
