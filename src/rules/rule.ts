import { z } from 'zod';

/**
 * How a rule's pattern is compared against a transaction description.
 * Values are the strings persisted in the rules file.
 */
export enum MatchType {
  CONTAINS = 'contains',
  EXACT = 'exact',
  STARTS_WITH = 'starts_with',
  ENDS_WITH = 'ends_with',
  REGEX = 'regex',
}

export const MATCH_TYPES: readonly MatchType[] = Object.values(MatchType);

export interface Rule {
  pattern: string;
  matchType: MatchType;
  category?: string; // Sets the transaction's user category
  tags: string[]; // Tags to add
  removeTags: string[]; // Tags to remove
  description?: string; // Human-readable note
  enabled: boolean;
}

export interface RuleInput {
  pattern: string;
  matchType?: MatchType;
  category?: string;
  tags?: string[];
  removeTags?: string[];
  description?: string;
  enabled?: boolean;
}

/**
 * Serialized form of a rule, as it appears in the rules file.
 */
export interface RuleRecord {
  pattern: string;
  match_type?: MatchType;
  category?: string;
  tags?: string[];
  remove_tags?: string[];
  description?: string;
  enabled?: boolean;
}

const text = z.union([z.string(), z.number()]).transform(String);

export const RuleRecordSchema = z.object({
  pattern: text.refine(pattern => pattern.length > 0, { message: 'pattern must not be empty' }),
  match_type: z.string().nullish(),
  category: text.nullish(),
  tags: z.array(text).nullish(),
  remove_tags: z.array(text).nullish(),
  description: text.nullish(),
  enabled: z.boolean().nullish(),
});

export type ParsedRuleRecord = z.infer<typeof RuleRecordSchema>;

export function isMatchType(value: string): value is MatchType {
  return MATCH_TYPES.some(type => type === value);
}

/**
 * Parse a persisted match type. Unknown values fall back to `contains`.
 */
export function parseMatchType(value: string | null | undefined): MatchType {
  if (value === null || value === undefined) return MatchType.CONTAINS;
  if (isMatchType(value)) return value;

  console.warn(`Unknown match_type '${value}', defaulting to '${MatchType.CONTAINS}'`);
  return MatchType.CONTAINS;
}

export function createRule(input: RuleInput): Rule {
  return {
    pattern: input.pattern,
    matchType: input.matchType ?? MatchType.CONTAINS,
    category: input.category || undefined,
    tags: [...(input.tags ?? [])],
    removeTags: [...(input.removeTags ?? [])],
    description: input.description || undefined,
    enabled: input.enabled ?? true,
  };
}

export function cloneRule(rule: Rule): Rule {
  return { ...rule, tags: [...rule.tags], removeTags: [...rule.removeTags] };
}

export function matches(rule: Rule, text: string | null | undefined): boolean {
  if (!rule.enabled) return false;
  if (!text) return false;

  const textLower = text.toLowerCase();
  const patternLower = rule.pattern.toLowerCase();

  switch (rule.matchType) {
    case MatchType.CONTAINS:
      return textLower.includes(patternLower);
    case MatchType.EXACT:
      return textLower === patternLower;
    case MatchType.STARTS_WITH:
      return textLower.startsWith(patternLower);
    case MatchType.ENDS_WITH:
      return textLower.endsWith(patternLower);
    case MatchType.REGEX:
      try {
        return new RegExp(rule.pattern, 'i').test(text);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        console.warn(`Invalid regex pattern: ${rule.pattern} (${reason})`);
        return false;
      }
  }
}

/**
 * Convert a rule to its file form, omitting fields that hold their default.
 */
export function ruleToRecord(rule: Rule): RuleRecord {
  const record: RuleRecord = { pattern: rule.pattern };

  if (rule.matchType !== MatchType.CONTAINS) record.match_type = rule.matchType;
  if (rule.category) record.category = rule.category;
  if (rule.tags.length > 0) record.tags = [...rule.tags];
  if (rule.removeTags.length > 0) record.remove_tags = [...rule.removeTags];
  if (rule.description) record.description = rule.description;
  if (!rule.enabled) record.enabled = false;

  return record;
}

export function ruleFromRecord(record: ParsedRuleRecord): Rule {
  return createRule({
    pattern: record.pattern,
    matchType: parseMatchType(record.match_type),
    category: record.category ?? undefined,
    tags: record.tags ?? [],
    removeTags: record.remove_tags ?? [],
    description: record.description ?? undefined,
    enabled: record.enabled ?? true,
  });
}
