#!/usr/bin/env node
import 'reflect-metadata';
import { config as loadEnv } from 'dotenv';
import { NestFactory } from '@nestjs/core';
import { Command, InvalidArgumentError } from 'commander';
import { AppModule } from '../src/app.module';
import { BookingApi, RebuildTarget } from '../src/application/booking-api';

const program = new Command();

function parseOffset(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('must be a non-negative integer');
  }
  return parsed;
}

function parseLimit(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return parsed;
}

async function withApi<T>(run: (api: BookingApi) => Promise<T>): Promise<T> {
  const app = await NestFactory.createApplicationContext(AppModule, { logger: ['fatal', 'error', 'warn'] });
  try {
    return await run(app.get(BookingApi));
  } finally {
    await app.close();
  }
}

function resolveTarget(aggregateId: string | undefined, all: boolean): RebuildTarget {
  if (all) {
    return 'all';
  }
  if (aggregateId) {
    return { aggregateId };
  }
  return program.error('pass an aggregate id or --all');
}

async function main() {
  loadEnv();

  program
    .name('booking-ledger')
    .description('Replay and audit tooling for the booking event log')
    .version('0.1.0');

  program
    .command('rebuild')
    .description('Rebuild read-model rows by folding their event streams from version 1')
    .argument('[aggregateId]', 'aggregate to rebuild')
    .option('--all', 'rebuild every aggregate in the log')
    .action(async (aggregateId: string | undefined, options: { all?: boolean }) => {
      const target = resolveTarget(aggregateId, options.all === true);
      const report = await withApi((api) => api.rebuildReadModel(target));
      process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
      if (report.failed.length > 0) {
        process.exitCode = 1;
      }
    });

  program
    .command('export')
    .description('Print events in global append order as JSON lines')
    .option('--from <offset>', 'first global offset to include', parseOffset, 0)
    .option('--limit <count>', 'maximum number of events', parseLimit)
    .action(async (options: { from: number; limit?: number }) => {
      const page = await withApi((api) => api.exportEvents(options.from, options.limit));
      for (const event of page.events) {
        process.stdout.write(`${JSON.stringify(event)}\n`);
      }
      process.stderr.write(`next offset: ${page.nextOffset}\n`);
    });

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
  process.exit(1);
});
