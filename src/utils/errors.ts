/**
 * Fatal pipeline errors
 */

export class EncodingUndetectedError extends Error {
  constructor(
    readonly path: string,
    readonly candidates: readonly string[],
  ) {
    super(
      `Unable to detect file encoding of ${path} (tried ${candidates.join(", ")})`,
    );
    this.name = "EncodingUndetectedError";
  }
}

export class TargetNotFoundError extends Error {
  constructor(readonly path: string) {
    super(`Target directory not found: ${path}`);
    this.name = "TargetNotFoundError";
  }
}
