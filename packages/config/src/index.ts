/**
 * @hopdns/config
 *
 * Environment helpers, log level and default port allocation shared by
 * every hopdns service.
 *
 * @example
 * ```typescript
 * import { DNS_PORTS, getLogLevel } from '@hopdns/config'
 *
 * const rootPort = DNS_PORTS.ROOT.get()
 * const log = pino({ name: 'root', level: getLogLevel() })
 * ```
 */

export {
  createAppConfig,
  getEnvNumber,
  getEnvVar,
  getLocalhostHost,
  getLogLevel,
  isProductionEnv,
} from './app-config'
export { DNS_PORTS, safeParsePort } from './ports'
