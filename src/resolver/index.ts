export {
  CachingResolver,
  type CachingResolverDeps,
  type CachingResolverOptions,
  type GetOptions,
  type ReferenceState,
  type ResolverStats,
  type RotationEvent,
} from './resolver.js';
export {
  RetryPolicy,
  type ExecuteOptions,
  type RandomFn,
  type RetryListener,
  type RetryPolicyConfig,
  type RetryPolicyDeps,
  type SleepFn,
} from './retry.js';
