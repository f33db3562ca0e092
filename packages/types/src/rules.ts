/**
 * Tag-predicate rules - what to look for along the route.
 *
 * A rule is a radius plus a conjunction of tag conditions. Each condition
 * is exactly one of three kinds, so a condition can never mix modes.
 */

/** Tag value must be one of the listed literals */
export interface MatchCondition {
  kind: "match";
  key: string;
  values: readonly string[];
}

/** Tag value must differ from every listed literal */
export interface ExcludeCondition {
  kind: "exclude";
  key: string;
  values: readonly string[];
}

/** Tag must be present (or absent), whatever its value */
export interface ExistsCondition {
  kind: "exists";
  key: string;
  present: boolean;
}

export type Condition = MatchCondition | ExcludeCondition | ExistsCondition;

export interface Rule {
  /** Label used in logs */
  name?: string;
  /** Search radius around the route in meters (default: 80) */
  radius?: number;
  /** All must hold. Never empty. */
  conditions: readonly Condition[];
}

/** Upstream element kinds a rule is compiled for */
export type ElementKind = "node" | "way";
