// src/errors.ts

export class RatingsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Engine or CLI options failed validation. */
export class RatingOptionsError extends RatingsError {
  constructor(
    message: string,
    readonly issues: ReadonlyArray<string> = []
  ) {
    super(message);
  }
}

/** The games file could not be read. */
export class GamesFileError extends RatingsError {
  constructor(
    readonly path: string,
    cause: unknown
  ) {
    super(`Could not read games file '${path}': ${stringifyError(cause)}`, { cause });
  }
}

/** The JSON export could not be written. */
export class ExportError extends RatingsError {
  constructor(
    readonly path: string,
    cause: unknown
  ) {
    super(`Could not write '${path}': ${stringifyError(cause)}`, { cause });
  }
}

export function stringifyError(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  return String(value);
}
