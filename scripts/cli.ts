#!/usr/bin/env ts-node
/**
 * Recurring Billing CLI - run the daily jobs by hand
 *
 * Usage:
 *   npm run cli -- run-scheduler [YYYY-MM-DD]
 *   npm run cli -- sweep-overdue [YYYY-MM-DD]
 *   npm run cli -- materialize <instanceId>
 *   npm run cli -- preview <recurringInvoiceId> [count]
 */

import 'tsconfig-paths/register';
import 'reflect-metadata';
import * as dotenv from 'dotenv';
import { INestApplicationContext } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import {
  InvoiceGenerationService,
  OverdueSweepService,
  RecurringBillingSchedulerService,
  RecurringInvoiceService,
} from '@invoicing/billing';
import { AppModule } from '../src/app.module';

// Load environment variables
dotenv.config();

// Work runs in this process; no pg-boss workers or cron schedules
process.env.QUEUE_DISABLED = 'true';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'error', 'warn'],
  });

  const command = process.argv[2];
  const args = process.argv.slice(3);
  let exitCode = 0;

  try {
    switch (command) {
      case 'run-scheduler':
        exitCode = await runScheduler(app, args);
        break;
      case 'sweep-overdue':
        exitCode = await sweepOverdue(app, args);
        break;
      case 'materialize':
        exitCode = await materialize(app, args);
        break;
      case 'preview':
        exitCode = await preview(app, args);
        break;
      case 'help':
      default:
        showHelp();
        break;
    }
  } catch (error) {
    console.error('❌ Error:', error instanceof Error ? error.message : String(error));
    if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    exitCode = 1;
  } finally {
    await app.close();
  }

  process.exit(exitCode);
}

/**
 * Generate due occurrences, then invoice every instance still waiting for one
 */
async function runScheduler(app: INestApplicationContext, args: string[]): Promise<number> {
  const scheduler = app.get(RecurringBillingSchedulerService);
  const generation = app.get(InvoiceGenerationService);

  const summary = await scheduler.run({ asOf: args[0] });
  if (summary.skipped) {
    console.log('⏭️  Another scheduler run holds the lock; nothing done');
    return 0;
  }

  console.log(`📅 Run date: ${summary.asOf}`);
  console.log(`   Due: ${summary.processed}`);
  console.log(`   Generated: ${summary.generated.length}`);
  console.log(`   Failed: ${summary.failed.length}`);

  // Includes instances left without an invoice by earlier runs
  const awaiting = await scheduler.findAwaitingInvoice();
  let materializeFailures = 0;
  for (const instance of awaiting) {
    try {
      const result = await generation.materialize(instance.id);
      console.log(
        `   ✅ #${instance.occurrenceNumber} of ${instance.recurringInvoiceId} → ${result.invoice?.invoiceNumber ?? 'no invoice'}`,
      );
    } catch (error) {
      materializeFailures++;
      console.error(
        `   ❌ Instance ${instance.id}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  for (const failure of summary.failed) {
    console.error(`   ❌ ${failure.recurringInvoiceId}: ${failure.error}`);
  }
  for (const id of summary.fallbacks) {
    console.warn(`   ⚠️  ${id} used the 1-month fallback (unrecognized frequency)`);
  }

  return summary.failed.length + materializeFailures > 0 ? 1 : 0;
}

async function sweepOverdue(app: INestApplicationContext, args: string[]): Promise<number> {
  const summary = await app.get(OverdueSweepService).sweep({ asOf: args[0] });

  console.log(`📅 Sweep date: ${summary.asOf}`);
  console.log(`   Invoices marked overdue: ${summary.invoicesMarked.length}`);
  console.log(`   Installments marked overdue: ${summary.installmentsMarked.length}`);
  console.log(`   Payment plans updated: ${summary.plansUpdated.length}`);

  for (const failure of summary.failed) {
    console.error(`   ❌ ${failure.entityId}: ${failure.error}`);
  }

  return summary.failed.length > 0 ? 1 : 0;
}

async function materialize(app: INestApplicationContext, args: string[]): Promise<number> {
  const instanceId = args[0];
  if (!instanceId) {
    console.error('❌ Usage: materialize <instanceId>');
    return 1;
  }

  const result = await app.get(InvoiceGenerationService).materialize(instanceId);
  console.log(
    result.created
      ? `✅ Created invoice ${result.invoice?.invoiceNumber}`
      : `ℹ️  Instance already ${result.instance.status}`,
  );
  return 0;
}

async function preview(app: INestApplicationContext, args: string[]): Promise<number> {
  const [id, count] = args;
  if (!id) {
    console.error('❌ Usage: preview <recurringInvoiceId> [count]');
    return 1;
  }

  const occurrences = await app
    .get(RecurringInvoiceService)
    .preview(id, count ? Number(count) : 5, true);

  if (occurrences.length === 0) {
    console.log('No upcoming occurrences');
    return 0;
  }
  for (const occurrence of occurrences) {
    console.log(`  #${occurrence.occurrenceNumber}  ${occurrence.date}  ${occurrence.amount ?? ''}`);
  }
  return 0;
}

function showHelp() {
  console.log(`
Recurring Billing CLI

Commands:
  run-scheduler [YYYY-MM-DD]       Generate due recurring invoices (default: today)
  sweep-overdue [YYYY-MM-DD]       Flag overdue invoices and installments
  materialize <instanceId>         Create the invoice for one scheduled instance
  preview <id> [count]             Show upcoming occurrence dates
  help                             Show this message
`);
}

bootstrap().catch((error: unknown) => {
  console.error('❌ Failed to start:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
