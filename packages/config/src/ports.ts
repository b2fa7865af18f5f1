/**
 * Default port allocation for the resolution chain
 *
 * Port range 53000-53004, one port per role. The .com and .org zones
 * share a TLD server; .edu has its own.
 *
 * Environment Variable Naming Convention:
 * - HOPDNS_{ROLE}_PORT (e.g., HOPDNS_ROOT_PORT, HOPDNS_TLD_EDU_PORT)
 */

import { getEnvVar } from './app-config'

/**
 * Safely parse a port number from environment variable
 * Returns the default if the env var is not set, empty, or invalid
 */
export function safeParsePort(
  envValue: string | undefined,
  defaultPort: number,
): number {
  if (!envValue) return defaultPort
  const parsed = parseInt(envValue, 10)
  if (Number.isNaN(parsed) || parsed < 0 || parsed > 65535) {
    return defaultPort
  }
  return parsed
}

function definePort<E extends string>(ENV_VAR: E, DEFAULT: number) {
  return {
    DEFAULT,
    ENV_VAR,
    get: () => safeParsePort(getEnvVar(ENV_VAR), DEFAULT),
  } as const
}

export const DNS_PORTS = {
  /** Root server - delegates to TLD servers */
  ROOT: definePort('HOPDNS_ROOT_PORT', 53000),

  /** TLD server for .com and .org */
  TLD_COM: definePort('HOPDNS_TLD_COM_PORT', 53001),

  /** TLD server for .edu */
  TLD_EDU: definePort('HOPDNS_TLD_EDU_PORT', 53002),

  /** Authoritative server - final answers */
  AUTH: definePort('HOPDNS_AUTH_PORT', 53003),

  /** Local resolver - client-facing, caching */
  LOCAL: definePort('HOPDNS_LOCAL_PORT', 53004),
} as const
