import type { ApplyResult, Transaction, TransactionChange, TransactionStore } from '../types';
import { AppError, ErrorType } from '../utils/errors';
import { MatchType, type Rule, type RuleInput, cloneRule, createRule, matches } from './rule';
import type { RuleStore } from './store';

export interface ApplyRulesOptions {
  transactionIds?: number[]; // Empty array selects no transactions
  onlyUncategorized?: boolean;
  dryRun?: boolean;
  ruleIndices?: number[]; // 0-based positions in the rule list
}

export interface ApplyToTransactionOptions {
  dryRun?: boolean;
  rules?: Rule[];
}

export interface PatternTestResult {
  total: number;
  matches: Transaction[];
}

export interface RuleSelection {
  indices: number[];
  unresolved: string[];
}

interface ResolvedEffects {
  category: string | null;
  tagsToAdd: string[];
  tagsToRemove: string[];
}

export const NO_RULES_MESSAGE = 'No rules defined';

/**
 * Applies the ordered rule list to stored transactions.
 *
 * Rules are read from the RuleStore once per engine and cached; create a new
 * engine to pick up edits made elsewhere.
 */
export class RulesEngine {
  private rules: Rule[] | null = null;

  constructor(
    private readonly store: RuleStore,
    private readonly transactions: TransactionStore
  ) {}

  getRules(): Rule[] {
    return this.loadedRules().map(cloneRule);
  }

  listRules(): Rule[] {
    return this.getRules();
  }

  /**
   * Append a rule and persist the list. Throws VALIDATION_ERROR for a blank
   * pattern and CONFIGURATION_ERROR when the rules file can't be written; the
   * rule list is unchanged in both cases.
   */
  addRule(input: RuleInput): Rule {
    if (!input.pattern.trim()) {
      throw new AppError({
        type: ErrorType.VALIDATION_ERROR,
        message: 'Rule pattern must not be empty',
        retryable: false,
        context: { pattern: input.pattern },
      });
    }

    const rule = createRule(input);
    this.persist([...this.loadedRules(), rule]);
    return cloneRule(rule);
  }

  /**
   * Remove the first rule whose pattern equals `pattern`, ignoring case.
   */
  removeRule(pattern: string): boolean {
    const target = pattern.toLowerCase();
    const index = this.loadedRules().findIndex(rule => rule.pattern.toLowerCase() === target);
    return this.removeRuleAt(index) !== null;
  }

  /**
   * Remove the rule at a 0-based position. Returns the removed rule, or null
   * when the position is out of range.
   */
  removeRuleAt(index: number): Rule | null {
    const rules = this.loadedRules();
    if (!Number.isInteger(index) || index < 0 || index >= rules.length) return null;

    const removed = rules[index];
    this.persist(rules.filter((_, i) => i !== index));
    return cloneRule(removed);
  }

  createDefaultDocument(): boolean {
    const created = this.store.createDefaultDocument();
    if (created) {
      this.rules = [];
    }
    return created;
  }

  findMatchingRules(description: string, rules?: Rule[]): Rule[] {
    return matchingRules(rules ?? this.loadedRules(), description).map(cloneRule);
  }

  /**
   * Map CLI rule selectors (1-based numbers or patterns) to rule indices.
   */
  resolveRuleSelectors(selectors: string[]): RuleSelection {
    const rules = this.loadedRules();
    const indices: number[] = [];
    const unresolved: string[] = [];

    for (const selector of selectors) {
      const index = /^\d+$/.test(selector)
        ? parseInt(selector, 10) - 1
        : rules.findIndex(rule => rule.pattern.toLowerCase() === selector.toLowerCase());

      if (index >= 0 && index < rules.length) {
        if (!indices.includes(index)) indices.push(index);
      } else {
        unresolved.push(selector);
      }
    }

    return { indices, unresolved };
  }

  testPattern(pattern: string, matchType: MatchType = MatchType.CONTAINS, limit?: number): PatternTestResult {
    const rule = createRule({ pattern, matchType });
    const matched = this.transactions.queryTransactions().filter(t => matches(rule, t.description));
    return {
      total: matched.length,
      matches: limit === undefined ? matched : matched.slice(0, limit),
    };
  }

  applyRulesToTransaction(transaction: Transaction, options: ApplyToTransactionOptions = {}): TransactionChange {
    const dryRun = options.dryRun ?? false;
    const change = this.applyToTransaction(transaction, options.rules ?? this.loadedRules(), dryRun);
    if (!dryRun) {
      this.commitOrRollback();
    }
    return change;
  }

  applyRules(options: ApplyRulesOptions = {}): ApplyResult {
    const { transactionIds, onlyUncategorized = false, dryRun = false, ruleIndices } = options;
    const allRules = this.loadedRules();

    const rulesToApply = ruleIndices
      ? ruleIndices.filter(i => i >= 0 && i < allRules.length).map(i => allRules[i])
      : allRules;

    if (rulesToApply.length === 0) {
      return { processed: 0, modified: 0, details: [], message: NO_RULES_MESSAGE };
    }

    const result: ApplyResult = { processed: 0, modified: 0, details: [] };

    try {
      const transactions = this.transactions.queryTransactions({
        ids: transactionIds,
        onlyUncategorized,
      });

      for (const transaction of transactions) {
        result.processed++;

        const change = this.applyToTransaction(transaction, rulesToApply, dryRun);
        if (hasEffect(change)) {
          result.modified++;
          result.details.push(change);
        }
      }
    } catch (error) {
      if (!dryRun) this.transactions.rollback();
      throw error;
    }

    if (!dryRun) {
      this.commitOrRollback();
    }

    return result;
  }

  private loadedRules(): Rule[] {
    if (this.rules === null) {
      this.rules = this.store.load();
    }
    return this.rules;
  }

  // Stages changes without committing
  private applyToTransaction(transaction: Transaction, rules: Rule[], dryRun: boolean): TransactionChange {
    const matchedRules = matchingRules(rules, transaction.description);
    const change: TransactionChange = {
      transactionId: transaction.id,
      description: transaction.description,
      category: null,
      tagsAdded: [],
      tagsRemoved: [],
      matchedRulePatterns: matchedRules.map(rule => rule.pattern),
    };

    if (matchedRules.length === 0) {
      return change;
    }

    const effects = resolveEffects(matchedRules);

    if (effects.category && effects.category !== transaction.userCategory) {
      change.category = effects.category;
    }

    // Additions go first, removals after: a tag both added and removed ends up absent
    const current = new Set(transaction.tags.map(tagKey));
    const removing = new Set(effects.tagsToRemove.map(tagKey));
    change.tagsAdded = effects.tagsToAdd.filter(tag => !current.has(tagKey(tag)) && !removing.has(tagKey(tag)));
    change.tagsRemoved = transaction.tags.filter(tag => removing.has(tagKey(tag)));

    if (!dryRun) {
      if (change.category) {
        this.transactions.setUserCategory(transaction.id, change.category);
      }
      if (change.tagsAdded.length > 0) {
        this.transactions.addTags(transaction.id, change.tagsAdded);
      }
      if (change.tagsRemoved.length > 0) {
        this.transactions.removeTags(transaction.id, change.tagsRemoved);
      }
    }

    return change;
  }

  // The cache only changes once the file is written
  private persist(rules: Rule[]): void {
    if (!this.store.save(rules)) {
      throw new AppError({
        type: ErrorType.CONFIGURATION_ERROR,
        message: `Could not save rules to ${this.store.filePath}`,
        retryable: false,
        context: { rulesFile: this.store.filePath },
      });
    }
    this.rules = rules;
  }

  private commitOrRollback(): void {
    try {
      this.transactions.commit();
    } catch (error) {
      this.transactions.rollback();
      throw error;
    }
  }
}

function matchingRules(rules: Rule[], description: string): Rule[] {
  return rules.filter(rule => matches(rule, description));
}

/**
 * First matching rule with a category wins; tags are unioned across all
 * matching rules, keeping the first spelling seen.
 */
function resolveEffects(matchedRules: Rule[]): ResolvedEffects {
  const category = matchedRules.find(rule => rule.category)?.category ?? null;
  return {
    category,
    tagsToAdd: unionTags(matchedRules.map(rule => rule.tags)),
    tagsToRemove: unionTags(matchedRules.map(rule => rule.removeTags)),
  };
}

function unionTags(tagLists: string[][]): string[] {
  const seen = new Map<string, string>();
  for (const tag of tagLists.flat()) {
    const name = tag.trim();
    if (name && !seen.has(tagKey(name))) {
      seen.set(tagKey(name), name);
    }
  }
  return [...seen.values()];
}

function tagKey(tag: string): string {
  return tag.trim().toLowerCase();
}

function hasEffect(change: TransactionChange): boolean {
  return change.category !== null || change.tagsAdded.length > 0 || change.tagsRemoved.length > 0;
}
