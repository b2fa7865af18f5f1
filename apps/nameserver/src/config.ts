import { fileURLToPath } from 'node:url'
import {
  createAppConfig,
  DNS_PORTS,
  getEnvNumber,
  getEnvVar,
  getLocalhostHost,
} from '@hopdns/config'
import { z } from 'zod'

/**
 * Nameserver Configuration
 *
 * Defaults come from env vars; CLI flags override through
 * configureNameserver. Every update is validated as a whole.
 */

const DATA_DIR = fileURLToPath(new URL('../data/', import.meta.url))

const PortSchema = z.number().int().min(0).max(65535)

export const NameserverConfigSchema = z.object({
  host: z.string().min(1),
  rootPort: PortSchema,
  tldComPort: PortSchema,
  tldEduPort: PortSchema,
  authPort: PortSchema,
  localPort: PortSchema,
  cacheSize: z.number().int().positive(),
  cacheTtlSeconds: z.number().positive(),
  hopTimeoutMs: z.number().int().positive(),
  recordsPath: z.string().min(1),
  /** Unset means the built-in .com/.org/.edu table */
  rootHintsPath: z.string().min(1).optional(),
})

export type NameserverConfig = z.infer<typeof NameserverConfigSchema>

const { configure, getConfig } = createAppConfig<NameserverConfig>(
  NameserverConfigSchema.parse({
    host: getLocalhostHost(),
    rootPort: DNS_PORTS.ROOT.get(),
    tldComPort: DNS_PORTS.TLD_COM.get(),
    tldEduPort: DNS_PORTS.TLD_EDU.get(),
    authPort: DNS_PORTS.AUTH.get(),
    localPort: DNS_PORTS.LOCAL.get(),
    cacheSize: getEnvNumber('HOPDNS_CACHE_SIZE') ?? 1000,
    cacheTtlSeconds: getEnvNumber('HOPDNS_CACHE_TTL') ?? 300,
    hopTimeoutMs: getEnvNumber('HOPDNS_HOP_TIMEOUT_MS') ?? 5000,
    recordsPath:
      getEnvVar('HOPDNS_RECORDS_FILE') ?? `${DATA_DIR}dns_records.txt`,
    rootHintsPath: getEnvVar('HOPDNS_ROOT_HINTS_FILE'),
  }),
)

export { getConfig }

export function configureNameserver(updates: Partial<NameserverConfig>): void {
  const defined = Object.fromEntries(
    Object.entries(updates).filter(([, value]) => value !== undefined),
  )
  configure(NameserverConfigSchema.parse({ ...getConfig(), ...defined }))
}
