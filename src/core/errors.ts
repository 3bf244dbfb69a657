/**
 * Preference Engine Error Types
 *
 * Typed error classes so callers can tell recoverable input problems
 * from persistence trouble without string matching.
 */

/**
 * Error codes for classification.
 */
export type PreferenceErrorCode =
  | 'INVALID_TOPIC'
  | 'INVALID_PROFILE'
  | 'PROFILE_NOT_LOADED'
  | 'STORE_UNAVAILABLE'
  | 'TAXONOMY_INVALID'
  | 'CONFIG_INVALID';

/**
 * Base error class.
 */
export class PreferenceError extends Error {
  constructor(
    message: string,
    public readonly code: PreferenceErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PreferenceError';
  }
}

/**
 * Topic input is empty, too long or has no letter or digit.
 * UI should reject the input; nothing changed.
 */
export class InvalidTopicError extends PreferenceError {
  constructor(public readonly input: string) {
    super(`Invalid topic: ${JSON.stringify(input)}`, 'INVALID_TOPIC');
    this.name = 'InvalidTopicError';
  }
}

/**
 * Profile id is not usable as a storage key.
 */
export class InvalidProfileError extends PreferenceError {
  constructor(public readonly profileId: string) {
    super(`Invalid profile id: ${JSON.stringify(profileId)}`, 'INVALID_PROFILE');
    this.name = 'InvalidProfileError';
  }
}

/**
 * Synchronous read for a profile that was never opened.
 * Call open() (or any mutation) first.
 */
export class ProfileNotLoadedError extends PreferenceError {
  constructor(public readonly profileId: string) {
    super(`Profile ${profileId} is not loaded`, 'PROFILE_NOT_LOADED');
    this.name = 'ProfileNotLoadedError';
  }
}

/**
 * Persistence medium could not be read or written.
 * In-memory state stays authoritative for the session.
 */
export class StoreUnavailableError extends PreferenceError {
  constructor(
    public readonly profileId: string,
    public readonly operation: 'load' | 'save',
    cause: unknown
  ) {
    super(
      `Preference store ${operation} failed for ${profileId}: ${describeError(cause)}`,
      'STORE_UNAVAILABLE',
      { cause }
    );
    this.name = 'StoreUnavailableError';
  }
}

/**
 * Bundled or configured taxonomy file is malformed.
 */
export class TaxonomyError extends PreferenceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'TAXONOMY_INVALID', options);
    this.name = 'TaxonomyError';
  }
}

/**
 * Merged configuration failed validation.
 */
export class ConfigError extends PreferenceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIG_INVALID', options);
    this.name = 'ConfigError';
  }
}

/**
 * Check whether a value is a PreferenceError, optionally of a given code.
 */
export function isPreferenceError(
  error: unknown,
  code?: PreferenceErrorCode
): error is PreferenceError {
  if (!(error instanceof PreferenceError)) return false;
  return code === undefined || error.code === code;
}

/**
 * Best-effort message for an unknown thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown thrown value in an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
