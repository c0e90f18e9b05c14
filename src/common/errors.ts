export class BenchCompareError extends Error {
  readonly code: string;
  readonly exitCode: number;

  constructor(code: string, message: string, exitCode: number = 1, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BenchCompareError";
    this.code = code;
    this.exitCode = exitCode;
  }
}

export class ResultsDirectoryNotFoundError extends BenchCompareError {
  readonly directory: string;

  constructor(directory: string) {
    super("ResultsDirectoryNotFound", `Results directory not found: ${directory}`);
    this.name = "ResultsDirectoryNotFoundError";
    this.directory = directory;
  }
}

/** A single result file that could not be read, parsed or validated. The loader logs and skips these. */
export class ResultFileError extends BenchCompareError {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super("InvalidResultFile", `Could not load ${filePath}: ${describeCause(cause)}`, 1, { cause });
    this.name = "ResultFileError";
    this.filePath = filePath;
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
