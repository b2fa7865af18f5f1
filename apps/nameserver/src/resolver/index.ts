export {
  formatStats,
  type Hop,
  Resolver,
  type ResolverOptions,
  type ResolverStats,
} from './resolver'
