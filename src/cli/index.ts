#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import {
  listRules,
  addRule,
  removeRule,
  applyRules,
  initRules,
  testRule,
  editRules,
  setupConfig
} from './commands';

const program = new Command();

program
  .name('fin')
  .description('Categorize and tag synced transactions with pattern rules')
  .version('1.0.0');

const rules = program.command('rules')
  .description('Manage auto-categorization rules');

rules.command('list')
  .description('List all defined rules')
  .action(async () => {
    await listRules();
  });

rules.command('add')
  .description('Add a new categorization rule')
  .argument('<pattern>', 'Pattern to match in transaction description')
  .option('-c, --category <category>', 'Category to set')
  .option('-t, --tags <tags>', 'Comma-separated tags to add')
  .option('-r, --remove-tags <tags>', 'Comma-separated tags to remove')
  .option('-m, --match <type>', 'Match type: contains, exact, starts_with, ends_with, regex', 'contains')
  .option('-d, --description <text>', 'Rule description')
  .action(async (pattern: string, options) => {
    await addRule(pattern, options);
  });

rules.command('remove')
  .description("Remove a rule by pattern or by its number in 'rules list'")
  .argument('<patternOrNumber>', 'Pattern or rule number (#) to remove')
  .action(async (patternOrNumber: string) => {
    await removeRule(patternOrNumber);
  });

rules.command('apply')
  .description('Apply rules to transactions')
  .option('-r, --rule <selector...>', 'Apply only these rules, by number or pattern')
  .option('-n, --dry-run', 'Show what would be changed without applying')
  .option('-u, --uncategorized', 'Only apply to transactions without a user category')
  .option('--id <id>', 'Apply to a specific transaction ID')
  .action(async (options) => {
    await applyRules(options);
  });

rules.command('init')
  .description('Create a rules file with format documentation')
  .option('-f, --force', 'Back up and overwrite an existing rules file without asking')
  .action(async (options) => {
    await initRules(options);
  });

rules.command('test')
  .description('Test a pattern against existing transactions')
  .argument('<pattern>', 'Pattern to test')
  .option('-m, --match <type>', 'Match type', 'contains')
  .option('-l, --limit <number>', 'Max transactions to show', '10')
  .action(async (pattern: string, options) => {
    await testRule(pattern, options);
  });

rules.command('edit')
  .description('Open the rules file in $EDITOR')
  .action(async () => {
    await editRules();
  });

program.command('setup-config')
  .description('Create a config.json template in the config directory')
  .action(async () => {
    await setupConfig();
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
