export type ConfigErrorCode =
  | 'INVALID_CLOCK_RATE'
  | 'INVALID_SAMPLE_RATE'
  | 'UNSUPPORTED_VARIANT'
  | 'CLOCK_RATE_TOO_HIGH';

/**
 * Raised once, at construction, when the chip cannot be built from the given parameters.
 * Register writes and rendering never throw.
 */
export class ConfigError extends Error {
  readonly code: ConfigErrorCode;

  constructor(code: ConfigErrorCode, message: string) {
    super(message);
    this.name = 'ConfigError';
    this.code = code;
  }
}
