/**
 * App configuration factory and environment helpers.
 *
 * Each app builds its config once from defaults and env vars, and can
 * override fields at startup (CLI flags) through `configure`.
 */

/**
 * Create a mutable config holder seeded with defaults
 */
export function createAppConfig<T extends object>(
  defaults: T,
): {
  configure: (updates: Partial<T>) => void
  getConfig: () => T
} {
  let currentConfig: T = { ...defaults }

  function configure(updates: Partial<T>): void {
    currentConfig = { ...currentConfig, ...updates }
  }

  function getConfig(): T {
    return { ...currentConfig }
  }

  return { configure, getConfig }
}

/**
 * Helper to safely read process.env
 */
export function getEnvVar(
  key: string,
  defaultValue?: string,
): string | undefined {
  if (typeof process === 'undefined' || !process.env) {
    return defaultValue
  }
  return process.env[key] ?? defaultValue
}

/**
 * Helper to safely read process.env as an integer
 */
export function getEnvNumber(
  key: string,
  defaultValue?: number,
): number | undefined {
  const value = getEnvVar(key)
  if (value === undefined) return defaultValue
  const parsed = parseInt(value, 10)
  if (Number.isNaN(parsed)) return defaultValue
  return parsed
}

export function isProductionEnv(): boolean {
  return getEnvVar('NODE_ENV') === 'production'
}

export function getLogLevel(): string {
  return getEnvVar('LOG_LEVEL') ?? 'info'
}

export function getLocalhostHost(): string {
  return getEnvVar('HOPDNS_HOST') || getEnvVar('HOST') || '127.0.0.1'
}
