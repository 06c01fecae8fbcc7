/**
 * Plainsh Core — Risk Classifier
 *
 * The RiskClassifier maps a candidate command to a RiskAssessment. It is a
 * pure function of (rule table, options, command, context): no I/O, no
 * shared mutable state, and classifying the same input twice yields equal
 * assessments.
 *
 * Evaluation order:
 * 1. Normalize the command (trim, collapse whitespace). Empty ⇒ SAFE.
 * 2. Evaluate every rule against the whole command.
 * 3. If no command rule fired, split the command into segments and evaluate
 *    each segment independently. This catches a destructive sub-command
 *    hidden behind an innocuous compound.
 *
 * The classifier is total. It never throws for any string input.
 */

import { RiskTier, maxTier, tierAtLeast } from '../types/risk.js';
import type { RiskAssessment, RiskTrigger } from '../types/risk.js';
import { DEFAULT_RULES } from './rules.js';
import type { RiskRule, RuleMatcher } from './rules.js';
import { programName, splitSegments } from './segments.js';
import type { SegmentDepth } from './segments.js';

/** Facts about the environment a command will run in. */
export interface ClassificationContext {
  /** Working directory the command would run in. */
  readonly cwd?: string | undefined;
}

export interface RiskClassifierOptions {
  /** Rule table, highest tier first. Defaults to DEFAULT_RULES. */
  readonly rules?: ReadonlyArray<RiskRule>;
  /** How far the segment pass descends. Defaults to `substitutions`. */
  readonly segmentDepth?: SegmentDepth;
  /** Lowest tier that requires two affirmatives. Defaults to CRITICAL. */
  readonly doubleConfirmationFrom?: RiskTier;
}

/** A trigger tagged with the index of the rule that produced it. */
interface RankedTrigger {
  readonly index: number;
  /** False for rules that only look at the context, such as the cwd. */
  readonly fromCommand: boolean;
  readonly trigger: RiskTrigger;
}

// ---------------------------------------------------------------------------
// RiskClassifier
// ---------------------------------------------------------------------------

export class RiskClassifier {
  private readonly rules: ReadonlyArray<RiskRule>;
  private readonly segmentDepth: SegmentDepth;
  private readonly doubleConfirmationFrom: RiskTier;

  constructor(options: RiskClassifierOptions = {}) {
    const rules = options.rules ?? DEFAULT_RULES;
    const seen = new Set<string>();
    for (const rule of rules) {
      if (seen.has(rule.id)) {
        throw new Error(`Duplicate risk rule id: ${rule.id}`);
      }
      seen.add(rule.id);
    }
    this.rules = rules;
    this.segmentDepth = options.segmentDepth ?? 'substitutions';
    this.doubleConfirmationFrom = options.doubleConfirmationFrom ?? RiskTier.Critical;
  }

  /**
   * Classify a candidate command.
   *
   * Triggers are ordered by rule registration order; a rule that matches in
   * several segments contributes one trigger per distinct matched substring.
   */
  classify(command: string, context: ClassificationContext = {}): RiskAssessment {
    const normalized = normalize(command);
    if (normalized === '') {
      return freeze(RiskTier.Safe, [], false);
    }

    const ranked = this.evaluate(normalized, context, true);

    if (!ranked.some((r) => r.fromCommand)) {
      for (const segment of splitSegments(command, this.segmentDepth)) {
        const text = normalize(segment);
        if (text === '' || text === normalized) continue;
        ranked.push(...this.evaluate(text, context, false));
      }
    }

    const triggers = dedupe(ranked);
    const tier = triggers.reduce<RiskTier>((acc, t) => maxTier(acc, t.tier), RiskTier.Safe);
    const double = triggers.length > 0 && tierAtLeast(tier, this.doubleConfirmationFrom);
    return freeze(tier, triggers, double);
  }

  /** The rule table this classifier evaluates. */
  get ruleTable(): ReadonlyArray<RiskRule> {
    return this.rules;
  }

  /**
   * Evaluate every rule against `text`. Context-only rules (those that
   * never look at the command) are evaluated on the whole-string pass only.
   */
  private evaluate(text: string, context: ClassificationContext, wholeString: boolean): RankedTrigger[] {
    const out: RankedTrigger[] = [];
    this.rules.forEach((rule, index) => {
      const fromCommand = dependsOnCommand(rule.match);
      if (!wholeString && !fromCommand) return;
      const match = matchRule(rule.match, text, context);
      if (match !== null) {
        out.push({ index, fromCommand, trigger: { rule: rule.id, match, tier: rule.tier, reason: rule.reason } });
      }
    });
    return out;
  }
}

// ---------------------------------------------------------------------------
// Matching
// ---------------------------------------------------------------------------

/**
 * Return the substring a matcher recognised, or null.
 *
 * For `all`, the reported substring is the first inner match that depends
 * on the command text.
 */
function matchRule(matcher: RuleMatcher, text: string, context: ClassificationContext): string | null {
  switch (matcher.kind) {
    case 'pattern': {
      const m = matcher.pattern.exec(text);
      return m === null ? null : m[0];
    }
    case 'executable': {
      const name = programName(text);
      return name !== null && matcher.names.includes(name) ? name : null;
    }
    case 'cwd': {
      const cwd = context.cwd;
      if (cwd === undefined) return null;
      const hit = matcher.prefixes.find((prefix) => cwd === prefix || cwd.startsWith(`${prefix}/`));
      return hit === undefined ? null : cwd;
    }
    case 'all': {
      let reported: string | null = null;
      for (const inner of matcher.matchers) {
        const m = matchRule(inner, text, context);
        if (m === null) return null;
        if (reported === null && dependsOnCommand(inner)) reported = m;
      }
      return reported ?? text;
    }
  }
}

function dependsOnCommand(matcher: RuleMatcher): boolean {
  switch (matcher.kind) {
    case 'pattern':
    case 'executable':
      return true;
    case 'cwd':
      return false;
    case 'all':
      return matcher.matchers.some(dependsOnCommand);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function normalize(command: string): string {
  return command.trim().replace(/\s+/g, ' ');
}

/** Stable sort by rule index, dropping repeated (rule, match) pairs. */
function dedupe(ranked: ReadonlyArray<RankedTrigger>): RiskTrigger[] {
  const seen = new Set<string>();
  const out: RankedTrigger[] = [];
  for (const r of ranked) {
    const key = `${r.trigger.rule}\u0000${r.trigger.match}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(r);
  }
  return out
    .map((r, position) => ({ r, position }))
    .sort((a, b) => a.r.index - b.r.index || a.position - b.position)
    .map(({ r }) => r.trigger);
}

function freeze(tier: RiskTier, triggers: ReadonlyArray<RiskTrigger>, double: boolean): RiskAssessment {
  return Object.freeze({
    tier,
    triggers: Object.freeze(triggers.map((t) => Object.freeze({ ...t }))),
    requires_double_confirmation: double,
  });
}

