import { isUpstreamError, type UpstreamErrorCode, type UpstreamSource } from "../pipeline/errors";

export const EXIT_SUCCESS = 0;
export const EXIT_USAGE = 1;
export const EXIT_EXECUTION = 2;

export interface CliErrorPayload {
  success: false;
  error: string;
  exitCode: number;
  upstream?: { code: UpstreamErrorCode; source?: UpstreamSource };
}

/** Ends a command with a JSON payload on stderr and a non-zero exit code. */
export class CliError extends Error {
  readonly exitCode: number;
  readonly upstream?: { code: UpstreamErrorCode; source?: UpstreamSource };

  constructor(
    message: string,
    exitCode: number,
    options: { upstream?: { code: UpstreamErrorCode; source?: UpstreamSource }; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "CliError";
    this.exitCode = exitCode;
    this.upstream = options.upstream;
  }
}

export const createUsageError = (message: string): CliError => new CliError(message, EXIT_USAGE);

export const toCliError = (error: unknown): CliError => {
  if (error instanceof CliError) {
    return error;
  }
  if (isUpstreamError(error)) {
    return new CliError(error.message, EXIT_EXECUTION, {
      upstream: { code: error.code, ...(error.source ? { source: error.source } : {}) },
      cause: error
    });
  }
  return new CliError(error instanceof Error ? error.message : String(error), EXIT_EXECUTION, { cause: error });
};

export const formatErrorPayload = (error: CliError): CliErrorPayload => ({
  success: false,
  error: error.message,
  exitCode: error.exitCode,
  ...(error.upstream ? { upstream: error.upstream } : {})
});
