// @latchkey/core — Key source resolution

import { ConfigurationError } from './errors.js'
import { utf8Encode } from './encoding.js'
import { MIN_SECRET_BYTES } from './types.js'

/**
 * An application endpoint that owns the secret key base in its
 * configuration. The secret is read on every call, never cached here.
 */
export interface Endpoint {
  /** Name used in error messages */
  readonly name: string
  /** Returns the configured secret key base, if any */
  secretKeyBase(): string | null | undefined
}

/** A request-scoped object that carries the secret itself */
export interface ConnectionKeySource {
  readonly kind: 'connection'
  readonly secretKeyBase: string | null | undefined
}

/** A long-lived object (e.g. a socket) that references its endpoint */
export interface SocketKeySource {
  readonly kind: 'socket'
  readonly endpoint: Endpoint
}

/** The endpoint itself */
export interface EndpointKeySource {
  readonly kind: 'endpoint'
  readonly endpoint: Endpoint
}

/**
 * Where the secret key base comes from. A plain string is the secret.
 */
export type KeySource = string | ConnectionKeySource | SocketKeySource | EndpointKeySource

/**
 * Resolves a key source to its secret key base and checks its strength.
 *
 * Resolution order:
 * 1. an explicit `secretKeyBase` field (connection)
 * 2. the `endpoint` referenced by a carrier object (socket)
 * 3. the endpoint itself
 * 4. a raw string
 *
 * Every failure is a deployment problem, so it throws instead of
 * returning a verification failure.
 *
 * @throws {ConfigurationError} If the endpoint has no secret configured,
 *   the secret is unset, or it is shorter than 20 bytes
 */
export function resolveSecret(source: KeySource): string {
  return validateSecret(secretKeyBaseOf(source))
}

function secretKeyBaseOf(source: KeySource): string | null | undefined {
  if (typeof source === 'string') {
    return source
  }

  switch (source.kind) {
    case 'connection':
      return source.secretKeyBase
    case 'socket':
    case 'endpoint':
      return endpointSecretKeyBase(source.endpoint)
  }
}

function endpointSecretKeyBase(endpoint: Endpoint): string {
  const secret = endpoint.secretKeyBase()
  if (secret === null || secret === undefined) {
    throw new ConfigurationError(`no secretKeyBase configuration found in ${endpoint.name}`)
  }
  return secret
}

/**
 * @throws {ConfigurationError} If the secret is unset or shorter than 20
 *   bytes when UTF-8 encoded
 */
export function validateSecret(secret: string | null | undefined): string {
  if (secret === null || secret === undefined) {
    throw new ConfigurationError('The secretKeyBase has not been set')
  }
  if (utf8Encode(secret).byteLength < MIN_SECRET_BYTES) {
    throw new ConfigurationError(
      `The secretKeyBase is too short. It should be at least ${String(MIN_SECRET_BYTES)} bytes long.`,
    )
  }
  return secret
}
