/**
 * Plainsh Core — Risk Types
 *
 * Defines the risk tier model and the immutable assessment produced by the
 * RiskClassifier for every candidate command.
 */

// ---------------------------------------------------------------------------
// Risk Tier Model
// ---------------------------------------------------------------------------

/**
 * Risk tier enumeration with strict ordering:
 * SAFE < LOW < MEDIUM < HIGH < CRITICAL.
 *
 * The tier of a command is the maximum tier of every rule it matches.
 */
export enum RiskTier {
  /** No rule matched. */
  Safe = 'SAFE',
  /** Potentially risky: deletes single files, privilege prefix, chained statements. */
  Low = 'LOW',
  /** Possible data loss or security exposure. */
  Medium = 'MEDIUM',
  /** Significant system impact. */
  High = 'HIGH',
  /** Irreversible system damage. */
  Critical = 'CRITICAL',
}

/**
 * The numeric ordering of risk tiers for comparison.
 */
export const RISK_TIER_ORDER: Readonly<Record<RiskTier, number>> = {
  [RiskTier.Safe]: 0,
  [RiskTier.Low]: 1,
  [RiskTier.Medium]: 2,
  [RiskTier.High]: 3,
  [RiskTier.Critical]: 4,
} as const;

/** All tiers, lowest first. */
export const RISK_TIERS: ReadonlyArray<RiskTier> = [
  RiskTier.Safe,
  RiskTier.Low,
  RiskTier.Medium,
  RiskTier.High,
  RiskTier.Critical,
];

/** Return the more severe of two tiers. */
export function maxTier(a: RiskTier, b: RiskTier): RiskTier {
  return RISK_TIER_ORDER[b] > RISK_TIER_ORDER[a] ? b : a;
}

/** True if `tier` is at least as severe as `threshold`. */
export function tierAtLeast(tier: RiskTier, threshold: RiskTier): boolean {
  return RISK_TIER_ORDER[tier] >= RISK_TIER_ORDER[threshold];
}

/** Narrow an arbitrary string to a RiskTier. */
export function isRiskTier(value: unknown): value is RiskTier {
  return typeof value === 'string' && (RISK_TIERS as ReadonlyArray<string>).includes(value);
}

// ---------------------------------------------------------------------------
// Risk Assessment
// ---------------------------------------------------------------------------

/**
 * One matched rule: the pattern name, the substring it matched, and the
 * tier and reason declared by the rule.
 */
export interface RiskTrigger {
  /** Rule identifier, e.g. `recursive-delete+root-path`. */
  readonly rule: string;
  /** The part of the command that matched. */
  readonly match: string;
  readonly tier: RiskTier;
  /** Human-readable reason shown to the operator. */
  readonly reason: string;
}

/**
 * Output of classification. Created once per CommandRequest, never mutated.
 *
 * Invariants:
 * - `tier` is the maximum tier among `triggers`
 * - empty `triggers` implies `tier === RiskTier.Safe`
 */
export interface RiskAssessment {
  readonly tier: RiskTier;
  /** Every matching rule, in rule registration order. */
  readonly triggers: ReadonlyArray<RiskTrigger>;
  /**
   * True when the confirmation gate must collect two affirmatives. Set by
   * the classifier when `tier` reaches its configurable double-confirmation
   * threshold (CRITICAL by default), not for every tier at or above HIGH.
   */
  readonly requires_double_confirmation: boolean;
}
