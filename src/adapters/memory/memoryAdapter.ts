import type { IDataStore } from '../../ports/datastore';
import type { Budget, LedgerSnapshot, SavingsGoal, Transaction } from '../../domain/types';
import { StorageError } from '../../domain/errors';

/** In-process datastore. `failWrites` makes every save throw, as an unwritable disk would. */
export class MemoryAdapter implements IDataStore {
  failWrites = false;
  private data: LedgerSnapshot;

  constructor(initial?: Partial<LedgerSnapshot>) {
    this.data = {
      transactions: structuredClone(initial?.transactions ?? []),
      goals: structuredClone(initial?.goals ?? []),
      budgets: structuredClone(initial?.budgets ?? []),
    };
  }

  load(): LedgerSnapshot {
    return structuredClone(this.data);
  }

  saveTransactions(items: readonly Transaction[]): void {
    this.guard();
    this.data.transactions = structuredClone([...items]);
  }

  saveGoals(items: readonly SavingsGoal[]): void {
    this.guard();
    this.data.goals = structuredClone([...items]);
  }

  saveBudgets(items: readonly Budget[]): void {
    this.guard();
    this.data.budgets = structuredClone([...items]);
  }

  private guard(): void {
    if (this.failWrites) throw new StorageError('storage is read-only');
  }
}
