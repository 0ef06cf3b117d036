import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { LedgerStore } from './ledger';
import { MemoryAdapter } from '../adapters/memory/memoryAdapter';
import { NotFoundError, StorageError, ValidationError } from '../domain/errors';
import type { TransactionInput } from '../domain/validation';

const expense = (category: string, amount: number, date = '2024-03-01'): TransactionInput =>
  ({ date, type: 'Expense', category, amount });

describe('LedgerStore', () => {
  let storage: MemoryAdapter;
  let ledger: LedgerStore;

  beforeEach(() => {
    storage = new MemoryAdapter();
    ledger = new LedgerStore(storage);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('addTransaction', () => {
    it('stores exactly one record with the given fields and a fresh id', () => {
      const tx = ledger.addTransaction({
        date: '2024-03-02', type: 'Income', category: 'Salary', amount: 2500.75, note: 'March pay',
      });
      const all = ledger.listTransactions();
      expect(all).toEqual([
        { id: tx.id, date: '2024-03-02', type: 'Income', category: 'Salary', amount: 2500.75, note: 'March pay' },
      ]);
      expect(tx.id).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('assigns distinct ids', () => {
      const a = ledger.addTransaction(expense('Food', 1));
      const b = ledger.addTransaction(expense('Food', 1));
      expect(a.id).not.toBe(b.id);
    });

    it('persists before returning', () => {
      const tx = ledger.addTransaction(expense('Food', 3));
      expect(storage.load().transactions).toEqual([tx]);
    });

    it('rejects a negative amount and leaves the store unchanged', () => {
      ledger.addTransaction(expense('Food', 10));
      expect(() => ledger.addTransaction(expense('Food', -0.01))).toThrow(ValidationError);
      expect(ledger.listTransactions()).toHaveLength(1);
    });

    it('reports which field was wrong', () => {
      try {
        ledger.addTransaction({ date: '2024-02-30', type: 'Expense', category: 'Food', amount: 5 });
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(ValidationError);
        expect((e as ValidationError).details).toEqual(['date: must be a valid YYYY-MM-DD date']);
      }
    });

    it('accepts a zero amount', () => {
      expect(ledger.addTransaction(expense('Food', 0)).amount).toBe(0);
    });

    it('rejects a goal link to an unknown goal', () => {
      expect(() => ledger.addTransaction({ ...expense('Savings', 5), goalId: 'missing' })).toThrow(NotFoundError);
      expect(ledger.listTransactions()).toEqual([]);
    });

    it('surfaces storage failures and keeps the last good view', () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const first = ledger.addTransaction(expense('Food', 10));
      storage.failWrites = true;
      expect(() => ledger.addTransaction(expense('Rent', 20))).toThrow(StorageError);
      expect(ledger.listTransactions()).toEqual([first]);
    });
  });

  describe('updateTransaction', () => {
    it('replaces the record in place', () => {
      const a = ledger.addTransaction(expense('Food', 10));
      const b = ledger.addTransaction(expense('Rent', 20));
      const updated = ledger.updateTransaction(a.id, { ...expense('Groceries', 12), note: 'fixed' });
      expect(updated).toEqual({ id: a.id, date: '2024-03-01', type: 'Expense', category: 'Groceries', amount: 12, note: 'fixed' });
      expect(ledger.listTransactions().map((t) => t.id)).toEqual([a.id, b.id]);
    });

    it('fails for an unknown id', () => {
      expect(() => ledger.updateTransaction('nope', expense('Food', 1))).toThrow(NotFoundError);
    });
  });

  describe('listTransactions', () => {
    beforeEach(() => {
      ledger.addTransaction({ date: '2024-01-15', type: 'Income', category: 'Salary', amount: 3000 });
      ledger.addTransaction({ ...expense('Food', 42.5, '2024-02-03'), note: 'Dinner out', tags: ['friends'] });
      ledger.addTransaction({ ...expense('Rent', 1200, '2024-02-01'), tags: 'home, monthly' });
      ledger.addTransaction(expense('Food', 8, '2024-03-10'));
    });

    it('returns records in insertion order', () => {
      expect(ledger.listTransactions().map((t) => t.date)).toEqual(['2024-01-15', '2024-02-03', '2024-02-01', '2024-03-10']);
    });

    it('filters by inclusive date range', () => {
      const got = ledger.listTransactions({ range: { start: '2024-02-01', end: '2024-02-03' } });
      expect(got.map((t) => t.category)).toEqual(['Food', 'Rent']);
    });

    it('filters by category and type', () => {
      expect(ledger.listTransactions({ category: 'Food' }).map((t) => t.amount)).toEqual([42.5, 8]);
      expect(ledger.listTransactions({ type: 'Income' }).map((t) => t.category)).toEqual(['Salary']);
    });

    it('searches notes and tags case-insensitively', () => {
      expect(ledger.listTransactions({ search: 'dinner' }).map((t) => t.amount)).toEqual([42.5]);
      expect(ledger.listTransactions({ search: 'MONTH' }).map((t) => t.amount)).toEqual([1200]);
    });

    it('filters by tag and amount bounds', () => {
      expect(ledger.listTransactions({ tag: 'Home' }).map((t) => t.category)).toEqual(['Rent']);
      expect(ledger.listTransactions({ minAmount: 10, maxAmount: 1200 }).map((t) => t.amount)).toEqual([42.5, 1200]);
    });

    it('returns an empty list when nothing matches', () => {
      expect(ledger.listTransactions({ category: 'Travel' })).toEqual([]);
    });

    it('hands out copies', () => {
      const [first] = ledger.listTransactions();
      first.amount = 1;
      expect(ledger.listTransactions()[0].amount).toBe(3000);
    });
  });

  describe('aggregate', () => {
    it('sums per category', () => {
      ledger.addTransaction(expense('food', 10));
      ledger.addTransaction(expense('food', 5));
      ledger.addTransaction(expense('rent', 20));
      expect(ledger.aggregate({}, 'category')).toEqual(new Map([['food', 15], ['rent', 20]]));
    });

    it('keeps income and expense apart when grouping by type', () => {
      ledger.addTransaction({ date: '2024-03-01', type: 'Income', category: 'Salary', amount: 100 });
      ledger.addTransaction(expense('Food', 40));
      expect([...ledger.aggregate({}, 'type')]).toEqual([['Income', 100], ['Expense', 40]]);
    });

    it('groups by month in order of first occurrence', () => {
      ledger.addTransaction(expense('Food', 1, '2024-05-02'));
      ledger.addTransaction(expense('Food', 2, '2024-04-30'));
      ledger.addTransaction(expense('Food', 3, '2024-05-20'));
      expect([...ledger.aggregate({}, 'month')]).toEqual([['2024-05', 4], ['2024-04', 2]]);
    });

    it('adds decimal amounts without drift', () => {
      ledger.addTransaction(expense('Food', 0.1));
      ledger.addTransaction(expense('Food', 0.2));
      expect(ledger.aggregate({}, 'category').get('Food')).toBe(0.3);
    });

    it('keeps amounts finer than a cent', () => {
      ledger.addTransaction(expense('Fuel', 1.125));
      ledger.addTransaction(expense('Fuel', 0.005));
      expect(ledger.aggregate({}, 'category').get('Fuel')).toBe(1.13);
    });

    it('totals one side of a month when filtered by type', () => {
      ledger.addTransaction({ date: '2024-03-01', type: 'Income', category: 'Salary', amount: 1000 });
      ledger.addTransaction(expense('Rent', 400, '2024-03-02'));
      expect([...ledger.aggregate({}, 'month')]).toEqual([['2024-03', 1400]]);
      expect([...ledger.aggregate({ type: 'Expense' }, 'month')]).toEqual([['2024-03', 400]]);
      expect([...ledger.aggregate({ type: 'Income' }, 'month')]).toEqual([['2024-03', 1000]]);
    });

    it('applies the filter first', () => {
      ledger.addTransaction(expense('Food', 10, '2024-01-01'));
      ledger.addTransaction(expense('Food', 7, '2024-02-01'));
      expect(ledger.aggregate({ range: { start: '2024-02-01' } }, 'category')).toEqual(new Map([['Food', 7]]));
    });
  });

  describe('goals', () => {
    it('keeps milestones sorted and hands out copies of them', () => {
      const goal = ledger.addGoal({ name: 'Car', targetAmount: 5000, milestones: '2500,1000' });
      expect(goal.milestones).toEqual([1000, 2500]);
      ledger.getGoal(goal.id).milestones?.push(1);
      expect(ledger.getGoal(goal.id).milestones).toEqual([1000, 2500]);
    });

    it('rejects a non-positive target', () => {
      expect(() => ledger.addGoal({ name: 'Trip', targetAmount: 0 })).toThrow(ValidationError);
      expect(ledger.listGoals()).toEqual([]);
    });

    it('sums linked transactions and clamps the fraction', () => {
      const goal = ledger.addGoal({ name: 'Laptop', targetAmount: 200, targetDate: '2024-12-31' });
      ledger.addTransaction({ ...expense('Savings', 150), goalId: goal.id });
      expect(ledger.goalProgress(goal.id)).toEqual({ currentTotal: 150, targetAmount: 200, fraction: 0.75 });
      ledger.addTransaction({ ...expense('Savings', 100), goalId: goal.id });
      ledger.addTransaction(expense('Savings', 999));
      expect(ledger.goalProgress(goal.id)).toEqual({ currentTotal: 250, targetAmount: 200, fraction: 1 });
    });

    it('fails for an unknown goal', () => {
      expect(() => ledger.goalProgress('nope')).toThrow(NotFoundError);
    });

    it('replaces a goal by id', () => {
      const goal = ledger.addGoal({ name: 'Car', targetAmount: 5000 });
      expect(ledger.updateGoal(goal.id, { name: 'Car', targetAmount: 6000 })).toEqual({ id: goal.id, name: 'Car', targetAmount: 6000 });
      expect(ledger.getGoal(goal.id).targetAmount).toBe(6000);
    });
  });

  describe('delete', () => {
    it('removes a transaction, then reports it missing', () => {
      const keep = ledger.addTransaction(expense('Food', 1));
      const gone = ledger.addTransaction(expense('Food', 2));
      expect(ledger.delete(gone.id)).toBe('transaction');
      expect(ledger.listTransactions()).toEqual([keep]);
      expect(() => ledger.delete(gone.id)).toThrow(NotFoundError);
      expect(ledger.listTransactions()).toEqual([keep]);
    });

    it('removes goals and keeps their contributions', () => {
      const goal = ledger.addGoal({ name: 'Trip', targetAmount: 300 });
      const tx = ledger.addTransaction({ ...expense('Savings', 50), goalId: goal.id });
      expect(ledger.delete(goal.id)).toBe('goal');
      expect(ledger.listGoals()).toEqual([]);
      expect(ledger.listTransactions()).toEqual([tx]);
    });

    it('only looks at the requested kind', () => {
      const goal = ledger.addGoal({ name: 'Trip', targetAmount: 300 });
      expect(() => ledger.delete(goal.id, 'transaction')).toThrow('transaction not found');
      expect(ledger.listGoals()).toHaveLength(1);
    });
  });

  describe('budgets', () => {
    it('upserts by category', () => {
      ledger.setBudget('Food', 300);
      ledger.setBudget('Rent', 1200);
      ledger.setBudget('Food', '350.50');
      expect(ledger.listBudgets()).toEqual([
        { category: 'Food', monthlyLimit: 350.5 },
        { category: 'Rent', monthlyLimit: 1200 },
      ]);
    });

    it('rejects a non-positive limit', () => {
      expect(() => ledger.setBudget('Food', 0)).toThrow(ValidationError);
    });

    it('deletes by category', () => {
      ledger.setBudget('Food', 300);
      ledger.deleteBudget('Food');
      expect(ledger.listBudgets()).toEqual([]);
      expect(() => ledger.deleteBudget('Food')).toThrow(NotFoundError);
    });
  });

  it('lists unique tags sorted', () => {
    ledger.addTransaction({ ...expense('Food', 1), tags: ['work', 'lunch'] });
    ledger.addTransaction({ ...expense('Food', 1), tags: 'lunch,cafe' });
    expect(ledger.tags()).toEqual(['cafe', 'lunch', 'work']);
  });

  describe('importSnapshot', () => {
    const snapshot = {
      transactions: [{ id: 't-1', date: '2024-01-01', type: 'Expense' as const, category: 'Food', amount: 5 }],
      goals: [{ id: 'g-1', name: 'Trip', targetAmount: 100 }],
      budgets: [{ category: 'Food', monthlyLimit: 50 }],
    };

    it('overwrites everything', () => {
      ledger.addTransaction(expense('Rent', 1));
      expect(ledger.importSnapshot(snapshot, 'overwrite')).toEqual({ transactions: 1, goals: 1, budgets: 1 });
      expect(ledger.snapshot()).toEqual(snapshot);
    });

    it('merges by id', () => {
      const mine = ledger.addTransaction(expense('Rent', 1));
      ledger.importSnapshot(snapshot, 'merge');
      expect(ledger.importSnapshot(snapshot, 'merge')).toEqual({ transactions: 0, goals: 0, budgets: 1 });
      expect(ledger.listTransactions().map((t) => t.id)).toEqual([mine.id, 't-1']);
      expect(ledger.listGoals()).toHaveLength(1);
    });
  });
});
