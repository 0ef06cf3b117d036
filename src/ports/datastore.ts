import type { Budget, LedgerSnapshot, SavingsGoal, Transaction } from '../domain/types';

/**
 * Durable storage behind the ledger. Each save replaces one whole collection
 * and either fully succeeds or throws a StorageError leaving the previous
 * content in place.
 */
export interface IDataStore {
  load(): LedgerSnapshot;
  saveTransactions(items: readonly Transaction[]): void;
  saveGoals(items: readonly SavingsGoal[]): void;
  saveBudgets(items: readonly Budget[]): void;
}
