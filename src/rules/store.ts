import fs from 'fs-extra';
import { Document, isMap, parse, parseDocument } from 'yaml';
import { type Rule, RuleRecordSchema, ruleFromRecord, ruleToRecord } from './rule';
import { formatError } from '../utils/errors';

const DEFAULT_DOCUMENT = `# Category rules for fin
#
# These rules automatically set categories and tags on transactions
# based on pattern matching against the transaction description.
#
# Fields:
#   pattern      (required) text to look for in the description
#   match_type   contains (default), exact, starts_with, ends_with, regex
#   category     category to set on matching transactions
#   tags         tags to add
#   remove_tags  tags to remove
#   description  note for yourself, no effect
#   enabled      set to false to keep a rule without applying it
#
# Matching is case-insensitive for every match type.
#
# Example rules (uncomment and modify to use):
#
#   - pattern: "pango"
#     category: "Transportation"
#     tags: ["parking", "car"]
#     description: "Pango parking app"
#
#   - pattern: "wolt"
#     category: "Food & Dining"
#     tags: ["delivery", "food"]
#
#   - pattern: "^paypal \\\\*"
#     match_type: regex
#     tags: ["online"]
#
# Rules are applied in order. The first matching rule with a category wins.
# Tags from all matching rules are combined; removals are applied after additions.
#
# Add rules using: fin rules add "pattern" -c "Category" -t "tag1,tag2"
# Or edit this file directly.

rules: []
`;

/**
 * Reads and writes the ordered rule list kept in a YAML file.
 * Nothing here throws: failures are logged and reported through return values.
 */
export class RuleStore {
  constructor(public readonly filePath: string) {}

  exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  load(): Rule[] {
    if (!this.exists()) {
      return [];
    }

    let data: unknown;
    try {
      data = parse(fs.readFileSync(this.filePath, 'utf8'));
    } catch (error) {
      console.error(`Error parsing rules file ${this.filePath}: ${formatError(error)}`);
      return [];
    }

    if (data === null || data === undefined) {
      return [];
    }

    if (typeof data !== 'object' || Array.isArray(data)) {
      console.error(`Error parsing rules file ${this.filePath}: expected a mapping with a 'rules' list`);
      return [];
    }

    const entries: unknown = 'rules' in data ? data.rules : undefined;
    if (entries === null || entries === undefined) {
      return [];
    }

    if (!Array.isArray(entries)) {
      console.error(`Error parsing rules file ${this.filePath}: 'rules' must be a list`);
      return [];
    }

    const rules: Rule[] = [];
    entries.forEach((entry: unknown, index: number) => {
      const result = RuleRecordSchema.safeParse(entry);
      if (!result.success) {
        const issues = result.error.issues
          .map(issue => `${issue.path.join('.') || 'entry'}: ${issue.message}`)
          .join('; ');
        console.warn(`Skipping invalid rule #${index + 1} (${issues}): ${JSON.stringify(entry)}`);
        return;
      }
      rules.push(ruleFromRecord(result.data));
    });

    return rules;
  }

  save(rules: Rule[]): boolean {
    try {
      const doc = this.readDocument() ?? new Document({});
      doc.set('rules', doc.createNode(rules.map(ruleToRecord)));
      fs.outputFileSync(this.filePath, doc.toString());
      return true;
    } catch (error) {
      console.error(`Error saving rules to ${this.filePath}: ${formatError(error)}`);
      return false;
    }
  }

  /**
   * Write the starter document. Never overwrites an existing file.
   */
  createDefaultDocument(): boolean {
    if (this.exists()) {
      return false;
    }

    try {
      fs.outputFileSync(this.filePath, DEFAULT_DOCUMENT);
      return true;
    } catch (error) {
      console.error(`Error creating rules file ${this.filePath}: ${formatError(error)}`);
      return false;
    }
  }

  /**
   * Move the current file aside to `<file>.bak`, replacing an older backup.
   */
  backup(): string {
    const backupPath = `${this.filePath}.bak`;
    fs.moveSync(this.filePath, backupPath, { overwrite: true });
    return backupPath;
  }

  // Existing document, so its comments survive a save
  private readDocument(): Document | null {
    if (!this.exists()) return null;

    const doc = parseDocument(fs.readFileSync(this.filePath, 'utf8'));
    if (doc.errors.length > 0 || !isMap(doc.contents)) return null;
    return doc;
  }
}
