import type { WorkTiming } from './types';

export interface TimingRule {
  name: string;
  timing: WorkTiming;
  matches(description: string): boolean;
}

export interface TierRule {
  tier: string;
  matches(description: string): boolean;
}

export interface ClassifierOptions {
  timingRules?: TimingRule[];
  tierRules?: TierRule[];
  defaultTier?: string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Case-insensitive whole-word match on any of the given phrases. */
export function keywordMatcher(keywords: string[]): (description: string) => boolean {
  const pattern = new RegExp(`\\b(?:${keywords.map(escapeRegExp).join('|')})\\b`, 'i');
  return (description) => pattern.test(description);
}

/** Like keywordMatcher, but only the start of a word is anchored so "deletes" or "reviewing" still match. */
export function stemMatcher(keywords: string[]): (description: string) => boolean {
  const pattern = new RegExp(`\\b(?:${keywords.map(escapeRegExp).join('|')})`, 'i');
  return (description) => pattern.test(description);
}

const DESTRUCTIVE_SIGNALS = ['delete', 'remove', 'overwrite', 'destroy', 'drop', 'wipe', 'purge', 'force push'];

const JUDGMENT_SIGNALS = [
  'help me choose',
  'help me decide',
  'which',
  'should i',
  'decide',
  'choose',
  'review',
  'design',
  'architecture',
  'edit',
  'modify',
  'explain',
  'walk through',
  'discuss',
  'opinion',
];

const BATCH_SIGNALS = [
  'search',
  'find papers',
  'analyze',
  'analyse',
  'batch',
  'scan',
  'index',
  'generate report',
  'collect data',
  'overnight',
  "when i'm away",
  'compile',
  'lint',
  'test suite',
  'background',
];

const READ_ONLY_SIGNALS = ['read', 'find', 'list', 'show', 'count'];

export const DEFAULT_TIMING_RULES: TimingRule[] = [
  { name: 'destructive', timing: 'sync', matches: stemMatcher(DESTRUCTIVE_SIGNALS) },
  { name: 'judgment', timing: 'sync', matches: stemMatcher(JUDGMENT_SIGNALS) },
  { name: 'read-only-batch', timing: 'async', matches: keywordMatcher(BATCH_SIGNALS) },
  { name: 'read-only', timing: 'async', matches: keywordMatcher(READ_ONLY_SIGNALS) },
];

export const DEFAULT_TIER_RULES: TierRule[] = [
  {
    tier: 'opus',
    matches: keywordMatcher(['formalize', 'proof', 'theorem', 'derive', 'complex reasoning', 'mathematical', 'verify']),
  },
  {
    tier: 'sonnet',
    matches: keywordMatcher(['analyze', 'analyse', 'design', 'integrate', 'architect', 'refactor', 'plan', 'research', 'review']),
  },
  {
    tier: 'haiku',
    matches: keywordMatcher(['format', 'rename', 'list', 'count', 'summarize', 'lint', 'scan']),
  },
];

export interface TimingClassification {
  timing: WorkTiming;
  rule: string;
}

/**
 * Sync/async/flexible classification from an ordered rule table.
 * The first matching rule wins, so safety rules sit above convenience ones.
 */
export class TemporalClassifier {
  private timingRules: TimingRule[];
  private tierRules: TierRule[];
  private defaultTier: string;

  constructor(options?: ClassifierOptions) {
    this.timingRules = options?.timingRules ?? DEFAULT_TIMING_RULES;
    this.tierRules = options?.tierRules ?? DEFAULT_TIER_RULES;
    this.defaultTier = options?.defaultTier ?? 'sonnet';
  }

  explain(description: string): TimingClassification {
    if (description.trim() === '') {
      return { timing: 'sync', rule: 'no-signal' };
    }
    for (const rule of this.timingRules) {
      if (rule.matches(description)) {
        return { timing: rule.timing, rule: rule.name };
      }
    }
    return { timing: 'flexible', rule: 'default' };
  }

  classify(description: string): WorkTiming {
    return this.explain(description).timing;
  }

  estimateTier(description: string): string {
    return this.tierRules.find((rule) => rule.matches(description))?.tier ?? this.defaultTier;
  }
}
