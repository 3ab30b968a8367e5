export const FILE_NOT_FOUND_MESSAGE = "Error: The specified file could not be found";

/** A dictionary or document file could not be read. */
export class InputFileError extends Error {
  readonly path: string;
  readonly notFound: boolean;

  constructor(path: string, cause: unknown) {
    const notFound = isErrnoException(cause) && cause.code === "ENOENT";
    super(
      notFound ? FILE_NOT_FOUND_MESSAGE : `Error: Could not read ${path}: ${describe(cause)}`,
      { cause }
    );
    this.name = "InputFileError";
    this.path = path;
    this.notFound = notFound;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
