export { AuthoritativeZoneStub } from './authoritative'
export { BaseZoneStub } from './base'
export { RootZoneStub } from './root'
export { TldZoneStub } from './tld'
export { ZoneRole, type ZoneStub } from './types'
export {
  defaultRootHints,
  loadRootHints,
  loadZoneRecords,
  parseRootHints,
  parseZoneRecords,
} from './zone-file'
