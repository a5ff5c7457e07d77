/**
 * Rule Engine
 *
 * Blacklist, include and category rules for parsed channels.
 * Keywords are matched case-insensitively as whole words against the
 * channel name and its original group-title.
 */

import type { ChannelRecord, CurationRules } from './types';

/**
 * Escapes special regex characters in a string
 */
function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Predicate over lower-cased text
 */
export type KeywordMatcher = (text: string) => boolean;

/**
 * Compiles a keyword into a whole-word matcher
 *
 * The match may not touch a letter, digit or underscore on either side, so
 * "tv" matches "star tv" but not "startvchannel". Blank keywords never match.
 */
export function createKeywordMatcher(keyword: string): KeywordMatcher {
  const normalized = keyword.trim().toLowerCase();
  if (!normalized) {
    return () => false;
  }

  const pattern = new RegExp(
    `(?<![\\p{L}\\p{N}_])${escapeRegex(normalized)}(?![\\p{L}\\p{N}_])`,
    'u'
  );
  return (text) => pattern.test(text);
}

/**
 * Whether a keyword occurs as a whole word in the given text (case-insensitive)
 */
export function containsKeyword(text: string, keyword: string): boolean {
  return createKeywordMatcher(keyword)(text.toLowerCase());
}

/**
 * Lower-cased fields a record is matched against
 */
function searchableFields(record: ChannelRecord): string[] {
  return [record.name.toLowerCase(), (record.attributes['group-title'] ?? '').toLowerCase()];
}

function anyMatch(matchers: readonly KeywordMatcher[], fields: readonly string[]): boolean {
  return matchers.some(matches => fields.some(field => matches(field)));
}

/**
 * Outcome of evaluating one record
 */
export type RuleDecision =
  | { action: 'drop'; reason: 'blacklisted' | 'not-included' | 'uncategorized' }
  | { action: 'keep'; category: string; fallback: boolean };

/**
 * Rules compiled once per run
 */
export interface CompiledRules {
  evaluate(record: ChannelRecord): RuleDecision;
}

/**
 * Compiles curation rules into reusable matchers
 */
export function compileRules(rules: CurationRules): CompiledRules {
  const blacklist = rules.blacklist.map(createKeywordMatcher);
  const categories = rules.categories.map(category => ({
    name: category.name,
    matchers: category.keywords.map(createKeywordMatcher),
  }));
  // Category keywords always count towards the include gate
  const include = rules.includeKeywords.length > 0
    ? [...rules.includeKeywords.map(createKeywordMatcher), ...categories.flatMap(c => c.matchers)]
    : null;

  return {
    evaluate(record) {
      const fields = searchableFields(record);

      if (anyMatch(blacklist, fields)) {
        return { action: 'drop', reason: 'blacklisted' };
      }

      if (include && !anyMatch(include, fields)) {
        return { action: 'drop', reason: 'not-included' };
      }

      const category = categories.find(c => anyMatch(c.matchers, fields));
      if (category) {
        return { action: 'keep', category: category.name, fallback: false };
      }

      if (rules.mode === 'permissive') {
        return { action: 'keep', category: rules.fallbackCategory, fallback: true };
      }

      return { action: 'drop', reason: 'uncategorized' };
    },
  };
}

/**
 * Assigns a category to a record by rewriting its group-title
 */
export function assignCategory(record: ChannelRecord, category: string): ChannelRecord {
  return {
    ...record,
    attributes: { ...record.attributes, 'group-title': category },
  };
}

/**
 * Called with every record and the decision taken for it
 */
export type DecisionListener = (record: ChannelRecord, decision: RuleDecision) => void;

/**
 * Filters and relabels channels
 *
 * Returns the retained channels in input order, each with group-title set to
 * its assigned category. Input records are not modified.
 */
export function applyRules(
  channels: readonly ChannelRecord[],
  rules: CurationRules,
  onDecision?: DecisionListener
): ChannelRecord[] {
  const compiled = compileRules(rules);
  const retained: ChannelRecord[] = [];

  for (const channel of channels) {
    const decision = compiled.evaluate(channel);
    onDecision?.(channel, decision);
    if (decision.action === 'keep') {
      retained.push(assignCategory(channel, decision.category));
    }
  }

  return retained;
}
