import { z } from 'zod';
import { ValidationError } from './errors';
import type { Budget, SavingsGoal, Transaction } from './types';
import { isCalendarDate, isMonthKey } from '../utils/dates';

// Form and query values arrive as strings, JSON bodies as numbers; accept both.
const numeric = z.union([z.number(), z.string().trim().min(1).transform(Number)]).pipe(z.number().finite());

const amount = numeric.refine((n) => n >= 0, 'must not be negative');

const positiveAmount = amount.refine((n) => n > 0, 'must be greater than zero');

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '') || v === null ? undefined : v;

export const calendarDate = z.string().trim().refine(isCalendarDate, 'must be a valid YYYY-MM-DD date');
export const monthKeySchema = z.string().trim().refine(isMonthKey, 'must be a YYYY-MM month');

const label = z.string().trim().min(1, 'must not be empty');

const note = z.preprocess(blankToUndefined, z.string().trim().optional());

const tags = z
  .union([z.array(z.string()), z.string()])
  .nullish()
  .transform((v) => {
    const raw = typeof v === 'string' ? [v] : v ?? [];
    const out: string[] = [];
    for (const part of raw.flatMap((t) => t.split(','))) {
      const tag = part.trim();
      if (tag && !out.includes(tag)) out.push(tag);
    }
    return out.length ? out : undefined;
  });

export const txTypeSchema = z.enum(['Income', 'Expense']);

export const transactionInputSchema = z.object({
  date: calendarDate,
  type: txTypeSchema,
  category: label,
  amount,
  note,
  tags,
  goalId: z.preprocess(blankToUndefined, z.string().trim().optional()),
});

export type TransactionInput = z.input<typeof transactionInputSchema>;
export type ParsedTransaction = z.output<typeof transactionInputSchema>;

// "250, 500" from a form or CSV cell, or a JSON array; kept ascending without repeats.
const milestones = z
  .preprocess(
    (v) => (typeof v === 'string' ? v.split(',').map((s) => s.trim()).filter(Boolean) : v ?? undefined),
    z.array(positiveAmount).optional(),
  )
  .transform((v) => (v?.length ? [...new Set(v)].sort((a, b) => a - b) : undefined));

export const goalInputSchema = z.object({
  name: label,
  targetAmount: positiveAmount,
  targetDate: z.preprocess(blankToUndefined, calendarDate.optional()),
  milestones,
});

export type GoalInput = z.input<typeof goalInputSchema>;
export type ParsedGoal = z.output<typeof goalInputSchema>;

export const budgetInputSchema = z.object({
  category: label,
  monthlyLimit: positiveAmount,
});

export function toTransaction(id: string, p: ParsedTransaction): Transaction {
  const tx: Transaction = { id, date: p.date, type: p.type, category: p.category, amount: p.amount };
  if (p.note) tx.note = p.note;
  if (p.tags) tx.tags = p.tags;
  if (p.goalId) tx.goalId = p.goalId;
  return tx;
}

export function toGoal(id: string, p: ParsedGoal): SavingsGoal {
  const goal: SavingsGoal = { id, name: p.name, targetAmount: p.targetAmount };
  if (p.targetDate) goal.targetDate = p.targetDate;
  if (p.milestones) goal.milestones = p.milestones;
  return goal;
}

const recordId = z.string().trim().min(1);

export const transactionRecordSchema = transactionInputSchema
  .extend({ id: recordId })
  .transform(({ id, ...rest }) => toTransaction(id, rest));

export const goalRecordSchema = goalInputSchema
  .extend({ id: recordId })
  .transform(({ id, ...rest }) => toGoal(id, rest));

export const budgetRecordSchema = budgetInputSchema.transform((b): Budget => ({ ...b }));

/** Indexes of items whose key already appeared earlier in the list. */
export function duplicateIndexes<T>(items: readonly T[], keyOf: (item: T) => string): number[] {
  const seen = new Set<string>();
  const out: number[] = [];
  items.forEach((item, i) => {
    const key = keyOf(item);
    if (seen.has(key)) out.push(i);
    seen.add(key);
  });
  return out;
}

export const snapshotSchema = z
  .object({
    schemaVersion: z.literal(1),
    exportedAt: z.string().optional(),
    transactions: z.array(transactionRecordSchema),
    goals: z.array(goalRecordSchema).default([]),
    budgets: z.array(budgetRecordSchema).default([]),
  })
  .superRefine((snap, ctx) => {
    const flag = (list: 'transactions' | 'goals' | 'budgets', field: string, key: string, i: number) =>
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [list, i, field], message: `duplicate ${field} "${key}"` });
    for (const i of duplicateIndexes(snap.transactions, (t) => t.id)) flag('transactions', 'id', snap.transactions[i].id, i);
    for (const i of duplicateIndexes(snap.goals, (g) => g.id)) flag('goals', 'id', snap.goals[i].id, i);
    for (const i of duplicateIndexes(snap.budgets, (b) => b.category)) flag('budgets', 'category', snap.budgets[i].category, i);
  });

export const transactionFilterSchema = z
  .object({
    start: z.preprocess(blankToUndefined, calendarDate.optional()),
    end: z.preprocess(blankToUndefined, calendarDate.optional()),
    category: z.preprocess(blankToUndefined, z.string().trim().optional()),
    type: z.preprocess(blankToUndefined, txTypeSchema.optional()),
    search: z.preprocess(blankToUndefined, z.string().trim().optional()),
    minAmount: z.preprocess(blankToUndefined, numeric.optional()),
    maxAmount: z.preprocess(blankToUndefined, numeric.optional()),
    tag: z.preprocess(blankToUndefined, z.string().trim().optional()),
    goalId: z.preprocess(blankToUndefined, z.string().trim().optional()),
  })
  .transform(({ start, end, ...rest }) => ({
    ...rest,
    range: start || end ? { start, end } : undefined,
  }));

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
}

export function validate<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(`invalid ${what}`, formatIssues(result.error));
  }
  return result.data;
}
