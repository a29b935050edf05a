/**
 * Error types shared across scansplit core.
 *
 * Only path-level and configuration-level failures are thrown. Per-entry read
 * failures during a walk are returned as SkipRecords instead.
 */

/**
 * Base class for every error raised by scansplit.
 */
export class ScanSplitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScanSplitError';
    Object.setPrototypeOf(this, ScanSplitError.prototype);
  }
}

/**
 * Thrown when the scan target is missing or is not a directory.
 */
export class NotFoundError extends ScanSplitError {
  public readonly targetPath: string;

  constructor(targetPath: string, detail: string = 'not found or not a directory') {
    super(`Target directory ${targetPath} ${detail}`);
    this.name = 'NotFoundError';
    this.targetPath = targetPath;
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * Thrown for a missing or invalid configuration value, such as a
 * non-positive size threshold or a config file that fails its schema.
 */
export class InvalidConfigError extends ScanSplitError {
  public readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
    this.name = 'InvalidConfigError';
    this.details = details;
    Object.setPrototypeOf(this, InvalidConfigError.prototype);
  }
}
