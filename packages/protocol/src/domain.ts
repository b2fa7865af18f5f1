import type { ServerAddress } from './types'

/** Matching key for a name: names compare case-insensitively */
export function normalizeDomain(domain: string): string {
  return domain.toLowerCase()
}

/**
 * Rightmost label of a name, lowercased. Returns null for unqualified
 * names (fewer than two labels), which have no TLD.
 */
export function extractTld(domain: string): string | null {
  const labels = domain.split('.')
  if (labels.length < 2) return null
  return normalizeDomain(labels[labels.length - 1])
}

export function formatAddress(address: ServerAddress): string {
  return `${address.host}:${address.port}`
}
