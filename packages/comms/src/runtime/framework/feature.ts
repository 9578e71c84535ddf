/**
 * A pluggable slice of a comm endpoint.
 *
 * The runtime drives every feature through three phases: contribute,
 * initialize and close.
 *
 * @template C What the feature contributes to the shared capability object.
 * @template R What the feature requires from the contributions of the others.
 */
export interface Feature<C extends object = {}, R extends object = {}> {
  /**
   * Phase 1. Returns this feature's contribution. It runs before any other
   * feature is initialized, so it must not touch other contributions.
   */
  contribute(): C;

  /**
   * Phase 2. Receives the assembled capability object, which holds every
   * feature's contribution.
   */
  init(capability: R): Promise<void> | void;

  /**
   * Phase 3. Releases listeners, timers and channels. Features close in the
   * reverse order of their initialization.
   *
   * @param contribution The object this feature returned from `contribute`.
   * @param error The reason for the shutdown, if it was abnormal.
   */
  close(contribution: C, error?: Error): Promise<void> | void;
}

// =================================================================
// Dependency checking
// Pull the contribution and requirement types out of a feature tuple so that
// `buildFeatures` can compare them at compile time.
// =================================================================

/** @internal */
export type Contributes<T> = T extends Feature<infer C, object> ? C : {};

/** @internal */
export type Requires<T> = T extends Feature<object, infer R> ? R : {};

/** Turns `A | B` into `A & B`. @internal */
type UnionToIntersection<U> = (U extends unknown ? (k: U) => void : never) extends (
  k: infer I,
) => void
  ? I
  : never;

/** Everything a tuple of features contributes, as one intersection. */
export type AllContributions<T extends readonly Feature<object, object>[]> =
  UnionToIntersection<{ [K in keyof T]: Contributes<T[K]> }[number]>;

/** Everything a tuple of features requires, as one intersection. */
export type AllRequirements<T extends readonly Feature<object, object>[]> =
  UnionToIntersection<{ [K in keyof T]: Requires<T[K]> }[number]>;
