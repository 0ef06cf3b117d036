import type { IDataStore } from '../ports/datastore';
import type {
  Budget,
  EntityKind,
  GoalProgress,
  GroupBy,
  ImportStrategy,
  LedgerSnapshot,
  SavingsGoal,
  Transaction,
  TransactionFilter,
} from '../domain/types';
import { LedgerError, NotFoundError, StorageError } from '../domain/errors';
import {
  budgetInputSchema,
  goalInputSchema,
  toGoal,
  toTransaction,
  transactionInputSchema,
  validate,
  type GoalInput,
  type TransactionInput,
} from '../domain/validation';
import { uuid } from '../utils/uuid';
import { monthKey } from '../utils/dates';
import { addAmounts, sumAmounts } from '../utils/money';
import { createLogger } from '../utils/log';

const log = createLogger('ledger');

export function matchesFilter(t: Transaction, f: TransactionFilter): boolean {
  if (f.range?.start && t.date < f.range.start) return false;
  if (f.range?.end && t.date > f.range.end) return false;
  if (f.category && t.category !== f.category) return false;
  if (f.type && t.type !== f.type) return false;
  if (f.minAmount !== undefined && t.amount < f.minAmount) return false;
  if (f.maxAmount !== undefined && t.amount > f.maxAmount) return false;
  if (f.goalId && t.goalId !== f.goalId) return false;
  if (f.tag) {
    const tag = f.tag.toLowerCase();
    if (!t.tags?.some((x) => x.toLowerCase() === tag)) return false;
  }
  if (f.search) {
    const term = f.search.toLowerCase();
    const inNote = t.note?.toLowerCase().includes(term) ?? false;
    const inTags = t.tags?.some((x) => x.toLowerCase().includes(term)) ?? false;
    if (!inNote && !inTags) return false;
  }
  return true;
}

const groupKey: Record<GroupBy, (t: Transaction) => string> = {
  category: (t) => t.category,
  month: (t) => monthKey(t.date),
  type: (t) => t.type,
};

/**
 * Owns every transaction, savings goal and budget. All writes go through
 * here: the next collection is built, handed to the datastore, and only
 * becomes visible once the datastore accepted it.
 */
export class LedgerStore {
  private transactions: Transaction[];
  private goals: SavingsGoal[];
  private budgets: Budget[];

  constructor(private readonly store: IDataStore) {
    const snap = this.storage('load ledger', () => store.load());
    this.transactions = snap.transactions;
    this.goals = snap.goals;
    this.budgets = snap.budgets;
  }

  addTransaction(input: TransactionInput): Transaction {
    const parsed = validate(transactionInputSchema, input, 'transaction');
    this.assertGoal(parsed.goalId);
    const tx = toTransaction(uuid(), parsed);
    this.commitTransactions([...this.transactions, tx]);
    log.debug(`added transaction ${tx.id}`);
    return structuredClone(tx);
  }

  /** Replaces the whole record; the id and its position are kept. */
  updateTransaction(id: string, input: TransactionInput): Transaction {
    const idx = this.transactions.findIndex((t) => t.id === id);
    if (idx < 0) throw new NotFoundError('transaction', id);
    const parsed = validate(transactionInputSchema, input, 'transaction');
    this.assertGoal(parsed.goalId);
    const tx = toTransaction(id, parsed);
    const next = [...this.transactions];
    next[idx] = tx;
    this.commitTransactions(next);
    log.debug(`replaced transaction ${id}`);
    return structuredClone(tx);
  }

  listTransactions(filter: TransactionFilter = {}): Transaction[] {
    return this.transactions.filter((t) => matchesFilter(t, filter)).map((t) => structuredClone(t));
  }

  /**
   * Sums amounts per group, keys in order of first occurrence.
   *
   * Amounts are unsigned, so grouping by `month` or `category` adds income
   * and expense together. Pass `filter.type` to total one side only, or group
   * by `type` to get both sides apart.
   */
  aggregate(filter: TransactionFilter, groupBy: GroupBy): Map<string, number> {
    const keyOf = groupKey[groupBy];
    const totals = new Map<string, number>();
    for (const t of this.transactions) {
      if (!matchesFilter(t, filter)) continue;
      const key = keyOf(t);
      totals.set(key, addAmounts(totals.get(key) ?? 0, t.amount));
    }
    return totals;
  }

  tags(): string[] {
    const all = new Set<string>();
    for (const t of this.transactions) t.tags?.forEach((x) => all.add(x));
    return [...all].sort((a, b) => a.localeCompare(b));
  }

  addGoal(input: GoalInput): SavingsGoal {
    const goal = toGoal(uuid(), validate(goalInputSchema, input, 'goal'));
    this.commitGoals([...this.goals, goal]);
    log.debug(`added goal ${goal.id}`);
    return structuredClone(goal);
  }

  updateGoal(id: string, input: GoalInput): SavingsGoal {
    const idx = this.goals.findIndex((g) => g.id === id);
    if (idx < 0) throw new NotFoundError('goal', id);
    const goal = toGoal(id, validate(goalInputSchema, input, 'goal'));
    const next = [...this.goals];
    next[idx] = goal;
    this.commitGoals(next);
    log.debug(`replaced goal ${id}`);
    return structuredClone(goal);
  }

  listGoals(): SavingsGoal[] {
    return this.goals.map((g) => structuredClone(g));
  }

  getGoal(id: string): SavingsGoal {
    const goal = this.goals.find((g) => g.id === id);
    if (!goal) throw new NotFoundError('goal', id);
    return structuredClone(goal);
  }

  goalProgress(goalId: string): GoalProgress {
    const { targetAmount } = this.getGoal(goalId);
    const currentTotal = sumAmounts(this.transactions.filter((t) => t.goalId === goalId).map((t) => t.amount));
    return { currentTotal, targetAmount, fraction: Math.min(currentTotal / targetAmount, 1) };
  }

  /**
   * Removes a transaction or a goal. With `kind`, only records of that kind
   * are looked at. Transactions that pointed at a removed goal are kept.
   */
  delete(entityId: string, kind?: EntityKind): EntityKind {
    if (kind !== 'goal') {
      const next = this.transactions.filter((t) => t.id !== entityId);
      if (next.length !== this.transactions.length) {
        this.commitTransactions(next);
        log.debug(`deleted transaction ${entityId}`);
        return 'transaction';
      }
    }
    if (kind !== 'transaction') {
      const next = this.goals.filter((g) => g.id !== entityId);
      if (next.length !== this.goals.length) {
        this.commitGoals(next);
        log.debug(`deleted goal ${entityId}`);
        return 'goal';
      }
    }
    throw new NotFoundError(kind ?? 'record', entityId);
  }

  /** Creates or replaces the monthly limit for a category. */
  setBudget(category: string, monthlyLimit: number | string): Budget {
    const budget = validate(budgetInputSchema, { category, monthlyLimit }, 'budget');
    const idx = this.budgets.findIndex((b) => b.category === budget.category);
    const next = [...this.budgets];
    if (idx < 0) next.push(budget);
    else next[idx] = budget;
    this.commitBudgets(next);
    return { ...budget };
  }

  listBudgets(): Budget[] {
    return this.budgets.map((b) => ({ ...b }));
  }

  deleteBudget(category: string): void {
    const next = this.budgets.filter((b) => b.category !== category);
    if (next.length === this.budgets.length) throw new NotFoundError('budget', category);
    this.commitBudgets(next);
  }

  snapshot(): LedgerSnapshot {
    return structuredClone({ transactions: this.transactions, goals: this.goals, budgets: this.budgets });
  }

  /**
   * Restores records from a backup. `overwrite` replaces everything; `merge`
   * appends records whose ids are new and upserts budgets by category.
   * Returns how many records of each kind were written. Goals are saved
   * before transactions so a restored `goalId` never names an unsaved goal.
   */
  importSnapshot(snapshot: LedgerSnapshot, strategy: ImportStrategy = 'overwrite'): { transactions: number; goals: number; budgets: number } {
    const incoming = structuredClone(snapshot);
    if (strategy === 'overwrite') {
      this.commitGoals(incoming.goals);
      this.commitTransactions(incoming.transactions);
      this.commitBudgets(incoming.budgets);
      log.info(`imported ledger (overwrite): ${incoming.transactions.length} transactions`);
      return { transactions: incoming.transactions.length, goals: incoming.goals.length, budgets: incoming.budgets.length };
    }

    const txIds = new Set(this.transactions.map((t) => t.id));
    const newTx = incoming.transactions.filter((t) => !txIds.has(t.id));
    const goalIds = new Set(this.goals.map((g) => g.id));
    const newGoals = incoming.goals.filter((g) => !goalIds.has(g.id));
    const budgets = [...this.budgets];
    for (const b of incoming.budgets) {
      const idx = budgets.findIndex((x) => x.category === b.category);
      if (idx < 0) budgets.push(b);
      else budgets[idx] = b;
    }
    this.commitGoals([...this.goals, ...newGoals]);
    this.commitTransactions([...this.transactions, ...newTx]);
    this.commitBudgets(budgets);
    log.info(`imported ledger (merge): ${newTx.length} new transactions`);
    return { transactions: newTx.length, goals: newGoals.length, budgets: incoming.budgets.length };
  }

  private assertGoal(goalId: string | undefined): void {
    if (goalId && !this.goals.some((g) => g.id === goalId)) throw new NotFoundError('goal', goalId);
  }

  private commitTransactions(next: Transaction[]): void {
    this.storage('save transactions', () => this.store.saveTransactions(next));
    this.transactions = next;
  }

  private commitGoals(next: SavingsGoal[]): void {
    this.storage('save goals', () => this.store.saveGoals(next));
    this.goals = next;
  }

  private commitBudgets(next: Budget[]): void {
    this.storage('save budgets', () => this.store.saveBudgets(next));
    this.budgets = next;
  }

  private storage<T>(what: string, fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      log.error(`${what} failed`, e);
      if (e instanceof LedgerError) throw e;
      throw new StorageError(`${what} failed`, { cause: e });
    }
  }
}
