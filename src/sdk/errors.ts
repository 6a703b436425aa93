/**
 * SDK 错误基类
 *
 * - 约定：message 形如 `CODE: detail`，code 同时挂在实例上便于程序判断
 * - 传输层错误（fetch 抛出的 TypeError 等）不经过这里，原样抛给调用方
 */
export class EndpointClientError extends Error {
  readonly code: string

  constructor(code: string, detail: string, options?: ErrorOptions) {
    super(`${code}: ${detail}`, options)
    this.name = new.target.name
    this.code = code
  }
}

export class AuthenticationError extends EndpointClientError {
  readonly status?: number

  constructor(detail: string, opts?: { status?: number; cause?: unknown }) {
    super('AUTH_FAILED', detail, { cause: opts?.cause })
    this.status = opts?.status
  }
}

export class CatalogFetchError extends EndpointClientError {
  readonly status?: number

  constructor(detail: string, opts?: { status?: number; cause?: unknown }) {
    super('CATALOG_FETCH_FAILED', detail, { cause: opts?.cause })
    this.status = opts?.status
  }
}

export class UnknownEndpointError extends EndpointClientError {
  readonly endpoint: string

  constructor(endpoint: string) {
    super('UNKNOWN_ENDPOINT', endpoint)
    this.endpoint = endpoint
  }
}

export class MissingParameterError extends EndpointClientError {
  readonly endpoint: string
  readonly missing: readonly string[]

  constructor(endpoint: string, missing: readonly string[]) {
    super('MISSING_PARAMETER', `${endpoint} requires ${missing.join(', ')}`)
    this.endpoint = endpoint
    this.missing = missing
  }
}

export class TooManyArgumentsError extends EndpointClientError {
  readonly endpoint: string
  readonly expected: number
  readonly received: number

  constructor(endpoint: string, expected: number, received: number) {
    super('TOO_MANY_ARGUMENTS', `${endpoint} takes ${expected} positional argument(s), got ${received}`)
    this.endpoint = endpoint
    this.expected = expected
    this.received = received
  }
}
