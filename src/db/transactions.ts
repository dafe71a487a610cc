import type { Database as DatabaseType, Statement } from 'better-sqlite3';
import type { Transaction, TransactionFilter, TransactionStore } from '../types';
import { AppError, ErrorType } from '../utils/errors';

interface TransactionRow {
  id: number;
  transaction_date: string;
  description: string;
  amount: number;
  category: string | null;
  user_category: string | null;
}

export interface NewTransaction {
  date: string; // YYYY-MM-DD
  description: string;
  amount?: number;
  category?: string | null;
  userCategory?: string | null;
}

/**
 * better-sqlite3 backed TransactionStore. Mutations open a SQLite transaction
 * lazily and stay invisible to other connections until commit().
 */
export class SqliteTransactionStore implements TransactionStore {
  private readonly selectTags: Statement<[number], { name: string }>;
  private readonly selectTagId: Statement<[string], { id: number }>;
  private readonly insertTag: Statement<[string]>;
  private readonly insertTransactionTag: Statement<[number, number]>;
  private readonly deleteTransactionTag: Statement<[number, string]>;
  private readonly updateUserCategory: Statement<[string | null, number]>;
  private readonly transactionExists: Statement<[number], { id: number }>;

  constructor(private readonly db: DatabaseType) {
    this.selectTags = db.prepare(`
      SELECT t.name FROM tags t
      JOIN transaction_tags tt ON tt.tag_id = t.id
      WHERE tt.transaction_id = ?
      ORDER BY t.name
    `);
    this.selectTagId = db.prepare('SELECT id FROM tags WHERE name = ?');
    this.insertTag = db.prepare('INSERT INTO tags (name) VALUES (?)');
    this.insertTransactionTag = db.prepare(
      'INSERT OR IGNORE INTO transaction_tags (transaction_id, tag_id) VALUES (?, ?)'
    );
    this.deleteTransactionTag = db.prepare(`
      DELETE FROM transaction_tags
      WHERE transaction_id = ? AND tag_id = (SELECT id FROM tags WHERE name = ?)
    `);
    this.updateUserCategory = db.prepare('UPDATE transactions SET user_category = ? WHERE id = ?');
    this.transactionExists = db.prepare('SELECT id FROM transactions WHERE id = ?');
  }

  queryTransactions(filter: TransactionFilter = {}): Transaction[] {
    const conditions: string[] = [];
    const params: Array<number | string> = [];

    if (filter.ids) {
      if (filter.ids.length === 0) return [];
      conditions.push(`id IN (${filter.ids.map(() => '?').join(', ')})`);
      params.push(...filter.ids);
    }

    if (filter.onlyUncategorized) {
      conditions.push('user_category IS NULL');
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = this.db
      .prepare<Array<number | string>, TransactionRow>(
        `SELECT id, transaction_date, description, amount, category, user_category
         FROM transactions ${where}
         ORDER BY transaction_date ASC, id ASC`
      )
      .all(...params);

    return rows.map(row => ({
      id: row.id,
      date: row.transaction_date,
      description: row.description,
      amount: row.amount,
      category: row.category,
      userCategory: row.user_category,
      tags: this.getTransactionTags(row.id),
    }));
  }

  getTransactionTags(transactionId: number): string[] {
    return this.selectTags.all(transactionId).map(row => row.name);
  }

  setUserCategory(transactionId: number, category: string | null): void {
    this.begin();
    this.updateUserCategory.run(category, transactionId);
  }

  /**
   * Associate tags with a transaction, creating tags that don't exist yet.
   * Returns how many associations were new.
   */
  addTags(transactionId: number, tagNames: string[]): number {
    if (!this.transactionExists.get(transactionId)) {
      throw new AppError({
        type: ErrorType.NOT_FOUND,
        message: `Transaction ${transactionId} not found`,
        retryable: false,
        context: { transactionId },
      });
    }

    this.begin();
    let added = 0;
    for (const tagName of normalizeTagNames(tagNames)) {
      const tagId = this.getOrCreateTag(tagName);
      added += this.insertTransactionTag.run(transactionId, tagId).changes;
    }
    return added;
  }

  removeTags(transactionId: number, tagNames: string[]): number {
    this.begin();
    let removed = 0;
    for (const tagName of normalizeTagNames(tagNames)) {
      removed += this.deleteTransactionTag.run(transactionId, tagName).changes;
    }
    return removed;
  }

  commit(): void {
    if (this.db.inTransaction) {
      this.db.exec('COMMIT');
    }
  }

  rollback(): void {
    if (this.db.inTransaction) {
      this.db.exec('ROLLBACK');
    }
  }

  insertTransaction(transaction: NewTransaction): number {
    const info = this.db
      .prepare<[string, string, number, string | null, string | null]>(`
        INSERT INTO transactions (transaction_date, description, amount, category, user_category)
        VALUES (?, ?, ?, ?, ?)
      `)
      .run(
        transaction.date,
        transaction.description,
        transaction.amount ?? 0,
        transaction.category ?? null,
        transaction.userCategory ?? null
      );
    return Number(info.lastInsertRowid);
  }

  // Tag names are case-insensitive: 'Car' and 'car' are the same tag
  private getOrCreateTag(name: string): number {
    const existing = this.selectTagId.get(name);
    if (existing) return existing.id;
    return Number(this.insertTag.run(name).lastInsertRowid);
  }

  private begin(): void {
    if (!this.db.inTransaction) {
      this.db.exec('BEGIN');
    }
  }
}

function normalizeTagNames(tagNames: string[]): string[] {
  return tagNames.map(name => name.trim()).filter(name => name.length > 0);
}
