import ExcelJS from 'exceljs';
import type { IBackupService, ImportCounts } from '../ports/backup';
import type { ImportStrategy, TransactionFilter } from '../domain/types';
import { ValidationError } from '../domain/errors';
import { snapshotSchema, validate } from '../domain/validation';
import { toCsv } from '../adapters/csv/csv';
import type { LedgerStore } from './ledger';

const EXPORT_HEADERS = ['date', 'type', 'category', 'amount', 'note', 'tags'];

export class BackupService implements IBackupService {
  constructor(private readonly ledger: LedgerStore, private readonly now: () => Date = () => new Date()) {}

  exportAsJson(): string {
    const snap = this.ledger.snapshot();
    return JSON.stringify({ schemaVersion: 1, exportedAt: this.now().toISOString(), ...snap }, null, 2);
  }

  importFromJson(text: string, opts?: { strategy?: ImportStrategy }): ImportCounts {
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (e) {
      throw new ValidationError('backup is not valid JSON', [e instanceof Error ? e.message : String(e)]);
    }
    return this.importData(data, opts);
  }

  importData(data: unknown, opts?: { strategy?: ImportStrategy }): ImportCounts {
    const { transactions, goals, budgets } = validate(snapshotSchema, data, 'backup');
    return this.ledger.importSnapshot({ transactions, goals, budgets }, opts?.strategy ?? 'overwrite');
  }

  exportTransactionsCsv(filter?: TransactionFilter): string {
    return toCsv(this.exportRows(filter), EXPORT_HEADERS);
  }

  /** Same rows as the CSV export, as one 'Transactions' sheet with numeric amounts. */
  async exportTransactionsXlsx(filter?: TransactionFilter): Promise<Buffer> {
    const workbook = new ExcelJS.Workbook();
    workbook.created = this.now();
    const sheet = workbook.addWorksheet('Transactions');
    sheet.columns = EXPORT_HEADERS.map((key) => ({ header: key, key, width: key === 'note' ? 40 : 14 }));
    sheet.getRow(1).font = { bold: true };
    sheet.addRows(this.exportRows(filter));
    return Buffer.from(await workbook.xlsx.writeBuffer());
  }

  private exportRows(filter?: TransactionFilter) {
    return this.ledger.listTransactions(filter).map((t) => ({
      date: t.date,
      type: t.type,
      category: t.category,
      amount: t.amount,
      note: t.note,
      tags: t.tags?.join(','),
    }));
  }
}
