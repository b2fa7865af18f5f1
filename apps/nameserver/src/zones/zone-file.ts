/**
 * Zone data loading
 *
 * Flat text tables, one entry per line, `#` comments and blank lines
 * ignored, last entry for a key wins:
 *
 *   records:    <domain>,<ip>
 *   root hints: <tld>,<host>,<port>
 */

import { readFileSync } from 'node:fs'
import { DNS_PORTS, getLocalhostHost, safeParsePort } from '@hopdns/config'
import { normalizeDomain, type ServerAddress } from '@hopdns/protocol'
import { createLogger } from '../lib/logger'

const log = createLogger('zone-file')

function dataLines(text: string): string[][] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'))
    .map((line) => line.split(',').map((field) => field.trim()))
}

export function parseZoneRecords(text: string): Map<string, string> {
  const records = new Map<string, string>()
  for (const fields of dataLines(text)) {
    if (fields.length !== 2) continue
    const [domain, address] = fields
    if (!domain || !address) continue
    records.set(normalizeDomain(domain), address)
  }
  return records
}

export function parseRootHints(text: string): Map<string, ServerAddress> {
  const hints = new Map<string, ServerAddress>()
  for (const fields of dataLines(text)) {
    if (fields.length !== 3) continue
    const [tld, host, rawPort] = fields
    const port = safeParsePort(rawPort, -1)
    if (!tld || !host || port < 0) continue
    hints.set(normalizeDomain(tld), { host, port })
  }
  return hints
}

function readTable(path: string, kind: string): string | null {
  try {
    return readFileSync(path, 'utf-8')
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      log.warn(`${kind} file not found, starting with an empty table`, { path })
      return null
    }
    throw error
  }
}

export function loadZoneRecords(path: string): Map<string, string> {
  const text = readTable(path, 'Records')
  if (text === null) return new Map()
  const records = parseZoneRecords(text)
  log.info('Loaded DNS records', { path, count: records.size })
  return records
}

export function loadRootHints(path: string): Map<string, ServerAddress> {
  const text = readTable(path, 'Root hints')
  if (text === null) return new Map()
  const hints = parseRootHints(text)
  log.info('Loaded root hints', { path, tlds: [...hints.keys()] })
  return hints
}

/**
 * Built-in root table: .com and .org share a TLD server, .edu has its own
 */
export function defaultRootHints(
  host = getLocalhostHost(),
): Map<string, ServerAddress> {
  return new Map([
    ['com', { host, port: DNS_PORTS.TLD_COM.get() }],
    ['org', { host, port: DNS_PORTS.TLD_COM.get() }],
    ['edu', { host, port: DNS_PORTS.TLD_EDU.get() }],
  ])
}
