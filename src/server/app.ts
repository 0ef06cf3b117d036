import express, { type Express } from 'express';
import type { IAnalyticsService } from '../ports/analytics';
import type { IBackupService } from '../ports/backup';
import type { IChartProvider } from '../ports/chart';
import type { LedgerStore } from '../usecases/ledger';
import { AnalyticsService } from '../usecases/analytics';
import { BudgetService } from '../usecases/budgets';
import { BackupService } from '../usecases/backup';
import { ChartDataProvider } from '../adapters/chart/chartData';
import { errorHandler, notFoundRoute, requestLog } from './errors';
import { createRouter } from './routes';

export interface AppDeps {
  ledger: LedgerStore;
  analytics: IAnalyticsService;
  budgets: BudgetService;
  backup: IBackupService;
  charts: IChartProvider;
  now: () => Date;
}

export function createServices(ledger: LedgerStore, now: () => Date = () => new Date()): AppDeps {
  return {
    ledger,
    analytics: new AnalyticsService(ledger),
    budgets: new BudgetService(ledger),
    backup: new BackupService(ledger, now),
    charts: ChartDataProvider,
    now,
  };
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  app.use(express.json({ limit: '5mb' }));
  app.use(requestLog);
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });
  app.use('/api', createRouter(deps));
  app.use(notFoundRoute);
  app.use(errorHandler);
  return app;
}
