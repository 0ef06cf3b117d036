import { describe, expect, it } from 'vitest';
import { BudgetService } from './budgets';
import { LedgerStore } from './ledger';
import { MemoryAdapter } from '../adapters/memory/memoryAdapter';

function setup() {
  const ledger = new LedgerStore(new MemoryAdapter({
    budgets: [
      { category: 'Food', monthlyLimit: 100 },
      { category: 'Rent', monthlyLimit: 500 },
      { category: 'Fun', monthlyLimit: 50 },
    ],
  }));
  ledger.addTransaction({ date: '2024-03-02', type: 'Expense', category: 'Food', amount: 60 });
  ledger.addTransaction({ date: '2024-03-20', type: 'Expense', category: 'Food', amount: 25 });
  ledger.addTransaction({ date: '2024-03-01', type: 'Expense', category: 'Rent', amount: 600 });
  ledger.addTransaction({ date: '2024-04-01', type: 'Expense', category: 'Fun', amount: 80 });
  ledger.addTransaction({ date: '2024-03-05', type: 'Income', category: 'Fun', amount: 80 });
  return new BudgetService(ledger);
}

describe('BudgetService', () => {
  it('compares the month spending with each limit', () => {
    expect(setup().status('2024-03')).toEqual([
      { category: 'Food', monthlyLimit: 100, spent: 85, percentage: 85, status: 'Warning' },
      { category: 'Rent', monthlyLimit: 500, spent: 600, percentage: 120, status: 'Over Budget' },
      { category: 'Fun', monthlyLimit: 50, spent: 0, percentage: 0, status: 'Good' },
    ]);
  });

  it('treats exactly 80% as good', () => {
    const ledger = new LedgerStore(new MemoryAdapter({ budgets: [{ category: 'Food', monthlyLimit: 100 }] }));
    ledger.addTransaction({ date: '2024-03-02', type: 'Expense', category: 'Food', amount: 80 });
    expect(new BudgetService(ledger).status('2024-03')[0].status).toBe('Good');
  });

  it('classifies on the exact share before rounding it for display', () => {
    const ledger = new LedgerStore(new MemoryAdapter({ budgets: [{ category: 'Food', monthlyLimit: 100 }] }));
    ledger.addTransaction({ date: '2024-03-02', type: 'Expense', category: 'Food', amount: 80.004 });
    const service = new BudgetService(ledger);
    expect(service.status('2024-03')).toEqual([
      { category: 'Food', monthlyLimit: 100, spent: 80.004, percentage: 80, status: 'Warning' },
    ]);
    expect(service.alerts('2024-03')).toEqual(['Food is approaching budget limit (80.0% used)']);
  });

  it('raises alerts for budgets at risk', () => {
    expect(setup().alerts('2024-03')).toEqual([
      'Food is approaching budget limit (85.0% used)',
      'Rent is over budget by 100.00',
    ]);
  });

  it('has nothing to say about a quiet month', () => {
    expect(setup().alerts('2024-05')).toEqual([]);
  });
});
