// Error types shared by the driver, the service client and the round loop.
// Anything thrown with one of these names is fatal for the current session.

/**
 * Transport failure or malformed reply from the game service
 */
export class GameServiceError extends Error {
  readonly command: string;
  readonly url: string | null;

  constructor(command: string, message: string, options?: { url?: string; cause?: unknown }) {
    const target = options?.url ? ` to ${options.url}` : '';
    super(`${command} request${target} failed: ${message}`, { cause: options?.cause });
    this.name = 'GameServiceError';
    this.command = command;
    this.url = options?.url ?? null;
  }
}

/**
 * The render for the preview currently on screen failed.
 * Stale renders never raise this.
 */
export class RenderOracleError extends Error {
  readonly requestedFor: string;

  constructor(requestedFor: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause);
    super(`Preview render for move \`${requestedFor}\` failed: ${reason}`, options);
    this.name = 'RenderOracleError';
    this.requestedFor = requestedFor;
  }
}

/**
 * Terminal I/O failure (raw mode, overlapping key waits)
 */
export class TerminalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TerminalError';
  }
}

/**
 * Invalid command line
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
