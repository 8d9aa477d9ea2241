/**
 * Error definitions for rvm
 * Provides the structured error hierarchy surfaced by the version manager core
 */

/** Base error class for all rvm errors */
export class RvmError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'RvmError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RvmError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Requested version is not part of the release catalog */
export class UnknownVersionError extends RvmError {
  readonly version: string

  constructor(version: string) {
    super(`Unknown version of Resolc v${version}.`, 'UNKNOWN_VERSION', { version })
    this.name = 'UnknownVersionError'
    this.version = version
  }
}

/** Version is known but not present on disk */
export class NotInstalledError extends RvmError {
  readonly version: string

  constructor(version: string) {
    super(`Version of Resolc v${version} is not installed.`, 'NOT_INSTALLED', { version })
    this.name = 'NotInstalledError'
    this.version = version
  }
}

/** Offline mode was requested but nothing is installed locally */
export class NoVersionsInstalledError extends RvmError {
  constructor() {
    super('No versions are installed', 'NO_VERSIONS_INSTALLED')
    this.name = 'NoVersionsInstalledError'
  }
}

export class DefaultVersionNotSetError extends RvmError {
  constructor() {
    super('Default version of Resolc is not set', 'DEFAULT_VERSION_NOT_SET')
    this.name = 'DefaultVersionNotSetError'
  }
}

export class CantInstallOfflineError extends RvmError {
  constructor(context: Record<string, unknown> = {}) {
    super("Can't install new Resolc versions in offline mode", 'CANT_INSTALL_OFFLINE', context)
    this.name = 'CantInstallOfflineError'
  }
}

/** Downloaded binary does not hash to the digest published in the manifest */
export class ChecksumValidationError extends RvmError {
  readonly expected: string
  readonly actual: string

  constructor(expected: string, actual: string) {
    super(
      `Checksum validation error occurred when checking binary. Expected: ${expected}, got: ${actual}`,
      'CHECKSUM_VALIDATION',
      { expected, actual }
    )
    this.name = 'ChecksumValidationError'
    this.expected = expected
    this.actual = actual
  }
}

/** Requested solc version falls outside what a Resolc build supports */
export class SolcVersionNotSupportedError extends RvmError {
  readonly solcVersion: string
  readonly resolcVersion: string
  readonly supportedRange: string

  constructor(solcVersion: string, resolcVersion: string, supportedRange: string) {
    super(
      `Unsupported version of \`solc\` - v${solcVersion} for Resolc v${resolcVersion}. ` +
        `Only versions "${supportedRange}" are supported by this version of Resolc`,
      'SOLC_VERSION_NOT_SUPPORTED',
      { solcVersion, resolcVersion, supportedRange }
    )
    this.name = 'SolcVersionNotSupportedError'
    this.solcVersion = solcVersion
    this.resolcVersion = resolcVersion
    this.supportedRange = supportedRange
  }
}

export class PlatformNotSupportedError extends RvmError {
  constructor(os: string, arch: string) {
    super(`Unsupported platform ${os}_${arch}`, 'PLATFORM_NOT_SUPPORTED', { os, arch })
    this.name = 'PlatformNotSupportedError'
  }
}

/** A string that should hold a semantic version does not parse as one */
export class InvalidVersionError extends RvmError {
  constructor(value: string, context: Record<string, unknown> = {}) {
    super(`Invalid semantic version: "${value}"`, 'INVALID_VERSION', { value, ...context })
    this.name = 'InvalidVersionError'
  }
}

/** Network failure, timeout, or non-success HTTP status */
export class HttpRequestError extends RvmError {
  readonly statusCode: number | undefined

  constructor(message: string, url: string, statusCode?: number) {
    super(message, 'HTTP_REQUEST', { url, statusCode })
    this.name = 'HttpRequestError'
    this.statusCode = statusCode
  }
}

/** Release manifest or build sidecar is malformed */
export class ManifestParseError extends RvmError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'MANIFEST_PARSE', context)
    this.name = 'ManifestParseError'
  }
}

export class LockError extends RvmError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'LOCK_ERROR', context)
    this.name = 'LockError'
  }
}

/** Data directory cannot be resolved or is not a directory */
export class DataDirError extends RvmError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'DATA_DIR', context)
    this.name = 'DataDirError'
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends RvmError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Narrow an unknown thrown value to a Node.js system error with the given code */
export function isErrnoException(err: unknown, code?: string): err is NodeJS.ErrnoException {
  if (!(err instanceof Error) || !('code' in err)) return false
  return code === undefined || err.code === code
}
