/**
 * hopdns nameserver
 *
 * Root, TLD and authoritative zone stubs, the caching iterative
 * resolver, the TCP transport they share, and the client and benchmark
 * that drive them.
 */

export {
  Benchmark,
  type BenchmarkOptions,
  type BenchmarkSummary,
  type BenchmarkTarget,
  type CacheEffectiveness,
  formatCacheEffectiveness,
  formatReport,
  percentile,
  type QuerySample,
  type RunResult,
  summarize,
} from './benchmark'
export {
  type ClientResult,
  DnsClient,
  type DnsClientOptions,
  formatClientResult,
} from './client'
export {
  configureNameserver,
  getConfig,
  type NameserverConfig,
  NameserverConfigSchema,
} from './config'
export { createLogger, type Logger } from './lib/logger'
export {
  formatStats,
  type Hop,
  Resolver,
  type ResolverOptions,
  type ResolverStats,
} from './resolver'
export {
  type LocalServerOptions,
  type RunningResolver,
  type RunningServer,
  type Stack,
  startAuthServer,
  startLocalServer,
  startRootServer,
  startStack,
  startTldServer,
} from './servers'
export {
  DnsServer,
  type DnsServerOptions,
  InProcessChannel,
  type QueryChannel,
  TcpQueryChannel,
  type TcpQueryChannelOptions,
} from './transport'
export {
  AuthoritativeZoneStub,
  BaseZoneStub,
  defaultRootHints,
  loadRootHints,
  loadZoneRecords,
  parseRootHints,
  parseZoneRecords,
  RootZoneStub,
  TldZoneStub,
  ZoneRole,
  type ZoneStub,
} from './zones'
