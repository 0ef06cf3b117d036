import { Router } from 'express';
import { z } from 'zod';
import type { AppDeps } from './app';
import type { ChartData } from '../ports/chart';
import { DEFAULT_CATEGORIES, type TransactionFilter } from '../domain/types';
import { NotFoundError } from '../domain/errors';
import { monthKeySchema, transactionFilterSchema, validate } from '../domain/validation';
import { currentMonth } from '../utils/dates';

const groupBySchema = z.enum(['category', 'month', 'type']);
const strategySchema = z.enum(['overwrite', 'merge']).default('overwrite');
const budgetBodySchema = z.object({ monthlyLimit: z.union([z.number(), z.string()]) });
const goalIdSchema = z.string().trim().min(1, 'is required');

const XLSX_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export function createRouter(deps: AppDeps): Router {
  const { ledger, analytics, budgets, backup, charts } = deps;
  const r = Router();

  const filterOf = (query: unknown): TransactionFilter => validate(transactionFilterSchema, query, 'filter');
  const monthOf = (value: unknown): string =>
    value === undefined ? currentMonth(deps.now()) : validate(monthKeySchema, value, 'month');

  r.get('/transactions', (req, res) => {
    res.json(ledger.listTransactions(filterOf(req.query)));
  });

  r.post('/transactions', (req, res) => {
    res.status(201).json(ledger.addTransaction(req.body));
  });

  r.put('/transactions/:id', (req, res) => {
    res.json(ledger.updateTransaction(req.params.id, req.body));
  });

  r.delete('/transactions/:id', (req, res) => {
    ledger.delete(req.params.id, 'transaction');
    res.status(204).end();
  });

  r.get('/aggregate', (req, res) => {
    const groupBy = validate(groupBySchema, req.query.groupBy, 'groupBy');
    const totals = ledger.aggregate(filterOf(req.query), groupBy);
    res.json([...totals].map(([key, total]) => ({ key, total })));
  });

  // Suggested labels for entry forms, followed by any others already in use.
  r.get('/categories', (_req, res) => {
    const used = ledger.listTransactions().map((t) => t.category);
    res.json([...new Set<string>([...DEFAULT_CATEGORIES, ...used])]);
  });

  r.get('/tags', (_req, res) => {
    res.json(ledger.tags());
  });

  r.get('/goals', (_req, res) => {
    res.json(ledger.listGoals());
  });

  r.post('/goals', (req, res) => {
    res.status(201).json(ledger.addGoal(req.body));
  });

  r.put('/goals/:id', (req, res) => {
    res.json(ledger.updateGoal(req.params.id, req.body));
  });

  r.delete('/goals/:id', (req, res) => {
    ledger.delete(req.params.id, 'goal');
    res.status(204).end();
  });

  r.get('/goals/:id/progress', (req, res) => {
    res.json({ goalId: req.params.id, ...ledger.goalProgress(req.params.id) });
  });

  r.get('/budgets', (_req, res) => {
    res.json(ledger.listBudgets());
  });

  r.get('/budgets/status', (req, res) => {
    const month = monthOf(req.query.month);
    res.json({ month, budgets: budgets.status(month), alerts: budgets.alerts(month) });
  });

  r.put('/budgets/:category', (req, res) => {
    const { monthlyLimit } = validate(budgetBodySchema, req.body, 'budget');
    res.json(ledger.setBudget(req.params.category, monthlyLimit));
  });

  r.delete('/budgets/:category', (req, res) => {
    ledger.deleteBudget(req.params.category);
    res.status(204).end();
  });

  r.get('/summary', (req, res) => {
    res.json(analytics.monthlySummary(monthOf(req.query.month)));
  });

  r.get('/trends', (req, res) => {
    res.json(analytics.monthlyTrends(filterOf(req.query)));
  });

  r.get('/charts/:chart', (req, res) => {
    const render: Record<string, () => ChartData> = {
      categories: () => charts.pie(analytics.categoryDistribution(filterOf(req.query)), 'Spending by Category', 'No expense data available'),
      monthly: () =>
        charts.bar(
          analytics.monthlyTrends(filterOf(req.query)).map((t) => ({ label: t.month, values: { Income: t.income, Expense: t.expense } })),
          ['Income', 'Expense'],
          'Monthly Income vs Expenses',
          'No transaction data available',
        ),
      balance: () => charts.line({ name: 'Balance', data: analytics.getMonthlySeries('balance') }, 'Running Balance'),
      goals: () =>
        charts.bar(
          ledger.listGoals().map((g) => ({
            label: g.name,
            values: { Progress: Math.round(ledger.goalProgress(g.id).fraction * 1000) / 10 },
          })),
          ['Progress'],
          'Goal Progress',
          'No goals available',
        ),
      budgets: () =>
        charts.bar(
          budgets.status(monthOf(req.query.month)).map((s) => ({
            label: s.category,
            values: { 'Budget Limit': s.monthlyLimit, 'Actual Spending': s.spent },
          })),
          ['Budget Limit', 'Actual Spending'],
          'Budget vs Actual Spending by Category',
          'No budgets defined',
        ),
      milestones: () => {
        const goal = ledger.getGoal(validate(goalIdSchema, req.query.goalId, 'goalId'));
        const saved = ledger.goalProgress(goal.id).currentTotal;
        const steps = goal.milestones ?? [];
        const rows = steps.map((amount, i) => ({ label: `Milestone ${i + 1}`, values: { Amount: amount, Saved: Math.min(saved, amount) } }));
        if (rows.length) rows.push({ label: 'Target', values: { Amount: goal.targetAmount, Saved: Math.min(saved, goal.targetAmount) } });
        return charts.bar(rows, ['Amount', 'Saved'], `Milestones for ${goal.name}`, 'No milestones defined');
      },
    };
    const build = Object.hasOwn(render, req.params.chart) ? render[req.params.chart] : undefined;
    if (!build) throw new NotFoundError('chart', req.params.chart);
    res.json(build());
  });

  r.get('/export/transactions.csv', (req, res) => {
    res.type('text/csv').attachment('transactions.csv').send(backup.exportTransactionsCsv(filterOf(req.query)));
  });

  r.get('/export/transactions.xlsx', (req, res, next) => {
    backup
      .exportTransactionsXlsx(filterOf(req.query))
      .then((body) => {
        res.type(XLSX_TYPE).attachment('transactions.xlsx').send(body);
      })
      .catch(next);
  });

  r.get('/backup', (_req, res) => {
    res.type('application/json').attachment('ledger-backup.json').send(backup.exportAsJson());
  });

  r.post('/backup', (req, res) => {
    const strategy = validate(strategySchema, req.query.strategy, 'strategy');
    res.json(backup.importData(req.body, { strategy }));
  });

  return r;
}
