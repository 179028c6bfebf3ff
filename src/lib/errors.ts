/**
 * Error types shared across the relay
 */

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Raised when the registry snapshot could not be replaced on disk.
 * The previously committed snapshot is still the one readers see.
 */
export class StorageWriteError extends Error {
  constructor(
    readonly filePath: string,
    cause: unknown,
  ) {
    super(
      `Failed to write ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = "StorageWriteError";
  }
}

export class TelegramApiError extends Error {
  constructor(
    readonly method: string,
    readonly status: number,
    readonly description: string,
    readonly errorCode?: number,
  ) {
    super(`Telegram API ${method} failed (${status}): ${description}`);
    this.name = "TelegramApiError";
  }
}
