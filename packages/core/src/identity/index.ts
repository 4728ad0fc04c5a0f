export {
  IdentityResolver,
  groupKeyFor,
  type IdentityResolverOptions,
  type IdentitySource,
  type IdentityStats,
  type ResolvedIdentity,
} from "./resolver.js";
