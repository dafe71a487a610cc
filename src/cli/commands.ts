import { spawnSync } from 'child_process';
import readline from 'readline';
import { format, isValid, parseISO } from 'date-fns';
import type { Database as DatabaseType } from 'better-sqlite3';
import { initDB } from '../db';
import { SqliteTransactionStore } from '../db/transactions';
import { RulesEngine } from '../rules/engine';
import { MATCH_TYPES, MatchType, type Rule, isMatchType } from '../rules/rule';
import { RuleStore } from '../rules/store';
import { type Settings, createConfigTemplate, loadSettings } from '../config/settings';
import type { TransactionChange } from '../types';
import { classifyError, formatError } from '../utils/errors';

const MAX_DETAIL_ROWS = 20;
const SEPARATOR = '─'.repeat(60);

interface Context {
  settings: Settings;
  db: DatabaseType;
  store: RuleStore;
  engine: RulesEngine;
}

function openContext(): Context {
  const settings = loadSettings();
  const db = initDB(settings.databasePath);
  const store = new RuleStore(settings.rulesFile);
  const engine = new RulesEngine(store, new SqliteTransactionStore(db));
  return { settings, db, store, engine };
}

async function withContext(action: string, fn: (ctx: Context) => void | Promise<void>): Promise<void> {
  let ctx: Context | undefined;
  try {
    ctx = openContext();
    await fn(ctx);
  } catch (error) {
    const appError = classifyError(error, { action });
    console.error(`\n❌ Failed to ${action}:`, formatError(appError));
    process.exitCode = 1;
  } finally {
    ctx?.db.close();
  }
}

export function parseTagList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map(tag => tag.trim()).filter(tag => tag.length > 0);
}

function parseMatchOption(value: string): MatchType | null {
  if (isMatchType(value)) return value;
  console.error(`Error: Invalid match type '${value}'`);
  console.error(`Valid types: ${MATCH_TYPES.join(', ')}`);
  process.exitCode = 1;
  return null;
}

export function formatRuleLine(rule: Rule, position: number): string {
  const parts = [`#${position}`, rule.enabled ? '' : '(disabled)', `"${rule.pattern}"`, `[${rule.matchType}]`];
  if (rule.category) parts.push(`→ ${rule.category}`);
  if (rule.tags.length > 0) parts.push(`+${rule.tags.join(', +')}`);
  if (rule.removeTags.length > 0) parts.push(`-${rule.removeTags.join(', -')}`);
  return parts.filter(Boolean).join(' ');
}

export function formatChange(change: TransactionChange): string {
  const description = change.description.length > 40
    ? `${change.description.substring(0, 40)}…`
    : change.description;
  const parts = [`${change.transactionId}`.padStart(6), description];
  if (change.category) parts.push(`category: ${change.category}`);
  if (change.tagsAdded.length > 0) parts.push(`added: ${change.tagsAdded.join(', ')}`);
  if (change.tagsRemoved.length > 0) parts.push(`removed: ${change.tagsRemoved.join(', ')}`);
  parts.push(`(rules: ${change.matchedRulePatterns.join(', ')})`);
  return parts.join(' | ');
}

function formatDate(date: string): string {
  const parsed = parseISO(date);
  return isValid(parsed) ? format(parsed, 'dd MMM yyyy') : date;
}

function confirm(question: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise(resolve => {
    rl.question(`${question} [y/N] `, (answer) => {
      rl.close();
      resolve(/^y(es)?$/i.test(answer.trim()));
    });
  });
}

export async function listRules() {
  await withContext('list rules', ({ settings, engine }) => {
    const rules = engine.listRules();

    if (rules.length === 0) {
      console.log('No rules defined.');
      console.log(`Create rules file at: ${settings.rulesFile}`);
      console.log('Or run: fin rules init');
      return;
    }

    console.log(`\nCategory Rules (${rules.length} rules):`);
    console.log(SEPARATOR);
    rules.forEach((rule, i) => {
      console.log(formatRuleLine(rule, i + 1));
      if (rule.description) {
        console.log(`     ${rule.description}`);
      }
    });
    console.log(SEPARATOR);
    console.log(`Rules file: ${settings.rulesFile}`);
  });
}

export async function addRule(pattern: string, options: {
  category?: string;
  tags?: string;
  removeTags?: string;
  match: string;
  description?: string;
}) {
  if (!pattern.trim()) {
    console.error('Error: Pattern must not be empty');
    process.exitCode = 1;
    return;
  }

  const tags = parseTagList(options.tags);
  const removeTags = parseTagList(options.removeTags);

  if (!options.category && tags.length === 0 && removeTags.length === 0) {
    console.error('Error: Must specify at least --category, --tags, or --remove-tags');
    process.exitCode = 1;
    return;
  }

  const matchType = parseMatchOption(options.match);
  if (!matchType) return;

  await withContext('add rule', ({ engine }) => {
    const rule = engine.addRule({
      pattern,
      matchType,
      category: options.category,
      tags,
      removeTags,
      description: options.description,
    });

    console.log('✅ Rule added:');
    console.log(`  Pattern: ${rule.pattern} (${rule.matchType})`);
    if (rule.category) console.log(`  Category: ${rule.category}`);
    if (rule.tags.length > 0) console.log(`  Tags to add: ${rule.tags.join(', ')}`);
    if (rule.removeTags.length > 0) console.log(`  Tags to remove: ${rule.removeTags.join(', ')}`);
  });
}

export async function removeRule(patternOrNumber: string) {
  await withContext('remove rule', ({ engine }) => {
    if (/^\d+$/.test(patternOrNumber)) {
      const position = parseInt(patternOrNumber, 10);
      const removed = engine.removeRuleAt(position - 1);
      if (!removed) {
        console.warn(`Invalid rule number: ${position}. Use 'fin rules list' to see rule numbers.`);
        return;
      }
      console.log(`✅ Rule #${position} removed: ${removed.pattern}`);
      return;
    }

    if (engine.removeRule(patternOrNumber)) {
      console.log(`✅ Rule removed: ${patternOrNumber}`);
    } else {
      console.warn(`Rule not found: ${patternOrNumber}`);
      console.log("Tip: Use the rule number from 'fin rules list' instead, e.g. 'fin rules remove 3'");
    }
  });
}

export async function applyRules(options: {
  rule?: string[];
  dryRun?: boolean;
  uncategorized?: boolean;
  id?: string;
}) {
  let transactionIds: number[] | undefined;
  if (options.id !== undefined) {
    const id = parseInt(options.id, 10);
    if (Number.isNaN(id)) {
      console.error(`Error: Invalid transaction id '${options.id}'`);
      process.exitCode = 1;
      return;
    }
    transactionIds = [id];
  }

  await withContext('apply rules', ({ engine }) => {
    const allRules = engine.getRules();
    if (allRules.length === 0) {
      console.warn("No rules defined. Run 'fin rules init' or add rules first.");
      return;
    }

    let ruleIndices: number[] | undefined;
    if (options.rule && options.rule.length > 0) {
      const selection = engine.resolveRuleSelectors(options.rule);
      selection.unresolved.forEach(selector => {
        console.warn(`Warning: Rule '${selector}' not found (max: #${allRules.length})`);
      });

      if (selection.indices.length === 0) {
        console.error('No valid rules specified');
        process.exitCode = 1;
        return;
      }

      ruleIndices = selection.indices;
      console.log(`Applying ${ruleIndices.length} selected rule(s):`);
      ruleIndices.forEach(i => console.log(`  #${i + 1}: ${allRules[i].pattern}`));
    } else {
      console.log(`Applying ${allRules.length} rules...`);
    }

    if (options.dryRun) {
      console.log('(Dry run - no changes will be saved)');
    }

    const result = engine.applyRules({
      transactionIds,
      onlyUncategorized: options.uncategorized ?? false,
      dryRun: options.dryRun ?? false,
      ruleIndices,
    });

    console.log(`\nProcessed: ${result.processed} transactions`);
    console.log(`Modified: ${result.modified} transactions`);

    if (result.details.length > 0) {
      console.log('\nChanges:');
      console.log(SEPARATOR);
      result.details.slice(0, MAX_DETAIL_ROWS).forEach(change => console.log(formatChange(change)));
      if (result.details.length > MAX_DETAIL_ROWS) {
        console.log(`... and ${result.details.length - MAX_DETAIL_ROWS} more`);
      }
    }

    if (options.dryRun && result.modified > 0) {
      console.log('\nRun without --dry-run to apply changes');
    }
  });
}

export async function initRules(options: { force?: boolean }) {
  await withContext('create rules file', async ({ settings, store, engine }) => {
    if (store.exists()) {
      console.warn(`Rules file already exists: ${settings.rulesFile}`);
      const overwrite = options.force || await confirm('Overwrite with empty rules file?');
      if (!overwrite) return;

      const backupPath = store.backup();
      console.log(`Backed up to: ${backupPath}`);
    }

    if (!engine.createDefaultDocument()) {
      console.error(`Could not create rules file at ${settings.rulesFile}`);
      process.exitCode = 1;
      return;
    }

    console.log(`✅ Created rules file: ${settings.rulesFile}`);
    console.log('\nThe file contains format documentation and examples (commented out).');
    console.log('\nAdd rules with:');
    console.log('  fin rules add "pango" -c "Transportation" -t "parking,car"');
    console.log('\nOr edit the file directly:');
    console.log('  fin rules edit');
  });
}

export async function testRule(pattern: string, options: { match: string; limit: string }) {
  const matchType = parseMatchOption(options.match);
  if (!matchType) return;

  const limit = parseInt(options.limit, 10);

  await withContext('test pattern', ({ engine }) => {
    const result = engine.testPattern(pattern, matchType, Number.isNaN(limit) ? undefined : limit);

    console.log(`\nPattern: '${pattern}' (${matchType})`);
    console.log(`Matches: ${result.total} transactions\n`);

    if (result.total === 0) {
      console.log('No matching transactions found');
      return;
    }

    console.log(SEPARATOR);
    result.matches.forEach(t => {
      const category = t.userCategory ?? t.category ?? '-';
      console.log(`${`${t.id}`.padStart(6)} | ${formatDate(t.date)} | ${t.description} | ${category}`);
    });

    if (result.total > result.matches.length) {
      console.log(`... and ${result.total - result.matches.length} more`);
    }
  });
}

export async function editRules() {
  let settings: Settings;
  try {
    settings = loadSettings();
  } catch (error) {
    console.error('Failed to load settings:', formatError(classifyError(error)));
    process.exitCode = 1;
    return;
  }

  const store = new RuleStore(settings.rulesFile);
  if (!store.exists()) {
    console.log("Rules file doesn't exist. Creating...");
    store.createDefaultDocument();
  }

  const editor = process.env.EDITOR || 'nano';
  const result = spawnSync(editor, [settings.rulesFile], { stdio: 'inherit' });

  if (result.error) {
    console.warn(`Editor '${editor}' could not be started: ${result.error.message}`);
    console.log(`Edit manually: ${settings.rulesFile}`);
  }
}

export async function setupConfig() {
  try {
    createConfigTemplate(loadSettings());
  } catch (error) {
    console.error('Failed to create config template:', formatError(classifyError(error)));
    process.exitCode = 1;
  }
}
