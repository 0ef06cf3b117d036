import type { ImportStrategy, TransactionFilter } from '../domain/types';

export interface ImportCounts { transactions: number; goals: number; budgets: number }

export interface IBackupService {
  exportAsJson(): string;
  importFromJson(text: string, opts?: { strategy?: ImportStrategy }): ImportCounts;
  importData(data: unknown, opts?: { strategy?: ImportStrategy }): ImportCounts;
  exportTransactionsCsv(filter?: TransactionFilter): string;
  exportTransactionsXlsx(filter?: TransactionFilter): Promise<Buffer>;
}
