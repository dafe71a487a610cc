export interface Transaction {
  id: number;
  date: string; // YYYY-MM-DD
  description: string;
  amount: number;
  category: string | null; // Category reported by the institution
  userCategory: string | null; // Category assigned by the user or by rules
  tags: string[];
}

export interface TransactionFilter {
  ids?: number[];
  onlyUncategorized?: boolean;
}

/**
 * Storage the rules engine reads transactions from and pushes tag / category
 * changes to. Mutations are staged until commit().
 */
export interface TransactionStore {
  queryTransactions(filter?: TransactionFilter): Transaction[];
  setUserCategory(transactionId: number, category: string | null): void;
  addTags(transactionId: number, tagNames: string[]): number;
  removeTags(transactionId: number, tagNames: string[]): number;
  commit(): void;
  rollback(): void;
}

export interface TransactionChange {
  transactionId: number;
  description: string;
  category: string | null;
  tagsAdded: string[];
  tagsRemoved: string[];
  matchedRulePatterns: string[];
}

export interface ApplyResult {
  processed: number;
  modified: number;
  details: TransactionChange[];
  message?: string;
}
