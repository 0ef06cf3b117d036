import fs from 'node:fs';
import path from 'node:path';
import type { z } from 'zod';
import type { IDataStore } from '../../ports/datastore';
import type { Budget, LedgerSnapshot, SavingsGoal, Transaction } from '../../domain/types';
import { StorageError } from '../../domain/errors';
import {
  budgetRecordSchema,
  duplicateIndexes,
  formatIssues,
  goalRecordSchema,
  transactionRecordSchema,
} from '../../domain/validation';
import { createLogger } from '../../utils/log';
import { readTable, toCsv } from './csv';

const log = createLogger('csv-store');

export const TRANSACTIONS_FILE = 'transactions.csv';
export const GOALS_FILE = 'goals.csv';
export const BUDGETS_FILE = 'budgets.csv';

const TX_HEADERS = ['id', 'date', 'type', 'category', 'amount', 'note', 'tags', 'goal_id'];
const GOAL_HEADERS = ['id', 'name', 'target_amount', 'target_date', 'milestones'];
// Files written before milestones existed have no such column.
const GOAL_REQUIRED = GOAL_HEADERS.filter((h) => h !== 'milestones');
const BUDGET_HEADERS = ['category', 'monthly_limit'];

/**
 * Keeps the ledger as three CSV files in one directory. Files that do not
 * exist yet are created with just their header row.
 */
export class CsvFileAdapter implements IDataStore {
  constructor(private readonly dir: string) {}

  load(): LedgerSnapshot {
    this.ensureDir();
    const transactions = this.readRows(TRANSACTIONS_FILE, TX_HEADERS).map((row, n) =>
      decode(transactionRecordSchema, {
        id: row.id,
        date: row.date,
        type: row.type,
        category: row.category,
        amount: row.amount,
        note: row.note,
        tags: row.tags,
        goalId: row.goal_id,
      }, TRANSACTIONS_FILE, n));
    const goals = this.readRows(GOALS_FILE, GOAL_HEADERS, GOAL_REQUIRED).map((row, n) =>
      decode(goalRecordSchema, {
        id: row.id,
        name: row.name,
        targetAmount: row.target_amount,
        targetDate: row.target_date,
        milestones: row.milestones,
      }, GOALS_FILE, n));
    const budgets = this.readRows(BUDGETS_FILE, BUDGET_HEADERS).map((row, n) =>
      decode(budgetRecordSchema, { category: row.category, monthlyLimit: row.monthly_limit }, BUDGETS_FILE, n));
    assertUnique(transactions, (t) => t.id, TRANSACTIONS_FILE, 'id');
    assertUnique(goals, (g) => g.id, GOALS_FILE, 'id');
    assertUnique(budgets, (b) => b.category, BUDGETS_FILE, 'category');
    log.debug(`loaded ${transactions.length} transactions, ${goals.length} goals, ${budgets.length} budgets from ${this.dir}`);
    return { transactions, goals, budgets };
  }

  saveTransactions(items: readonly Transaction[]): void {
    const rows = items.map((t) => ({
      id: t.id,
      date: t.date,
      type: t.type,
      category: t.category,
      amount: t.amount,
      note: t.note,
      tags: t.tags?.join(','),
      goal_id: t.goalId,
    }));
    this.writeFile(TRANSACTIONS_FILE, toCsv(rows, TX_HEADERS));
  }

  saveGoals(items: readonly SavingsGoal[]): void {
    const rows = items.map((g) => ({
      id: g.id,
      name: g.name,
      target_amount: g.targetAmount,
      target_date: g.targetDate,
      milestones: g.milestones?.join(','),
    }));
    this.writeFile(GOALS_FILE, toCsv(rows, GOAL_HEADERS));
  }

  saveBudgets(items: readonly Budget[]): void {
    const rows = items.map((b) => ({ category: b.category, monthly_limit: b.monthlyLimit }));
    this.writeFile(BUDGETS_FILE, toCsv(rows, BUDGET_HEADERS));
  }

  private ensureDir(): void {
    try {
      fs.mkdirSync(this.dir, { recursive: true });
    } catch (e) {
      throw new StorageError(`cannot create data directory ${this.dir}`, { cause: e });
    }
  }

  private readRows(name: string, headers: readonly string[], required = headers): Record<string, string>[] {
    const file = path.join(this.dir, name);
    if (!fs.existsSync(file)) {
      this.writeFile(name, toCsv([], headers));
      return [];
    }
    let text: string;
    try {
      text = fs.readFileSync(file, 'utf8');
    } catch (e) {
      throw new StorageError(`cannot read ${file}`, { cause: e });
    }
    try {
      return readTable(text, required);
    } catch (e) {
      throw new StorageError(`${name} is malformed: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
    }
  }

  // Write beside the target, then rename over it: readers see the old file or the new one.
  private writeFile(name: string, text: string): void {
    const file = path.join(this.dir, name);
    const tmp = `${file}.${process.pid}.tmp`;
    try {
      fs.writeFileSync(tmp, `${text}\r\n`, 'utf8');
      fs.renameSync(tmp, file);
    } catch (e) {
      if (fs.existsSync(tmp)) fs.rmSync(tmp, { force: true });
      throw new StorageError(`cannot write ${file}`, { cause: e });
    }
  }
}

function decode<S extends z.ZodTypeAny>(schema: S, row: Record<string, string | undefined>, file: string, n: number): z.output<S> {
  const res = schema.safeParse(row);
  if (!res.success) {
    throw new StorageError(`${file} row ${n + 2}: ${formatIssues(res.error).join('; ')}`);
  }
  return res.data;
}

function assertUnique<T>(items: readonly T[], keyOf: (item: T) => string, file: string, field: string): void {
  const [first] = duplicateIndexes(items, keyOf);
  if (first !== undefined) {
    throw new StorageError(`${file} row ${first + 2}: duplicate ${field} "${keyOf(items[first])}"`);
  }
}
