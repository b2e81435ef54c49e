/**
 * Error taxonomy for the crawl pipeline.
 *
 * Only ConfigError is meant to reach the caller. Everything else is raised
 * close to where it happens and recovered by the page/item loop above it:
 * the offending page or item is skipped and the crawl continues.
 */

export type CatalogErrorCode = 'FETCH' | 'DECODE' | 'PARSE' | 'VALIDATION' | 'CONFIG'

export class CatalogError extends Error {
  readonly code: CatalogErrorCode

  constructor(code: CatalogErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/** Network-level failure on a single request: timeout, non-2xx, connection error */
export class FetchError extends CatalogError {
  readonly url: string
  readonly status: number | null

  constructor(url: string, message: string, status: number | null = null, options?: { cause?: unknown }) {
    super('FETCH', `${message} (${url})`, options)
    this.url = url
    this.status = status
  }
}

/** Response body was not valid JSON where JSON was required */
export class DecodeError extends CatalogError {
  readonly url: string

  constructor(url: string, options?: { cause?: unknown }) {
    super('DECODE', `Response body is not valid JSON (${url})`, options)
    this.url = url
  }
}

export type ParseSource = 'embedded' | 'linked-data'

/** Malformed embedded-script or linked-data payload inside an HTML page */
export class ParseError extends CatalogError {
  readonly source: ParseSource

  constructor(source: ParseSource, message: string, options?: { cause?: unknown }) {
    super('PARSE', `${source}: ${message}`, options)
    this.source = source
  }
}

/** A record failed a required-field invariant */
export class ValidationError extends CatalogError {
  readonly issues: string[]

  constructor(issues: string[]) {
    super('VALIDATION', `Invalid record: ${issues.join('; ')}`)
    this.issues = issues
  }
}

/** Caller-facing setup problem, e.g. an unknown store name or a broken store profile */
export class ConfigError extends CatalogError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG', message, options)
  }
}

/** Errors the page/item loops swallow (after logging) instead of aborting a store */
export function isRecoverable(err: unknown): err is FetchError | DecodeError | ParseError | ValidationError {
  return (
    err instanceof FetchError ||
    err instanceof DecodeError ||
    err instanceof ParseError ||
    err instanceof ValidationError
  )
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
