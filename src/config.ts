import { parseArgs } from 'node:util';
import { z } from 'zod';
import { formatIssues } from './domain/validation';
import { ValidationError } from './domain/errors';
import type { LogLevel } from './utils/log';

export interface AppConfig {
  host: string;
  port: number;
  dataDir: string;
  logLevel: LogLevel;
}

const configSchema = z.object({
  host: z.string().trim().min(1).default('127.0.0.1'),
  port: z.coerce.number().int().min(0).max(65535).default(3000),
  dataDir: z.string().trim().min(1).default('./data'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

/**
 * Flags win over LEDGER_* environment variables, which win over defaults.
 */
export function loadConfig(argv: string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env): AppConfig {
  const { values } = parseArgs({
    args: argv,
    options: {
      host: { type: 'string' },
      port: { type: 'string', short: 'p' },
      'data-dir': { type: 'string' },
      'log-level': { type: 'string' },
    },
    strict: true,
  });
  const res = configSchema.safeParse({
    host: pick(values.host, env.LEDGER_HOST),
    port: pick(values.port, env.LEDGER_PORT),
    dataDir: pick(values['data-dir'], env.LEDGER_DATA_DIR),
    logLevel: pick(values['log-level'], env.LEDGER_LOG_LEVEL),
  });
  if (!res.success) {
    throw new ValidationError('invalid configuration', formatIssues(res.error));
  }
  return res.data;
}

function pick(...candidates: Array<string | undefined>): string | undefined {
  return candidates.find((v) => v !== undefined && v !== '');
}
