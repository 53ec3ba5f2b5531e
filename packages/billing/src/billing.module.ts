import { Module, DynamicModule, Global, InjectionToken, Provider } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { BILLING_OPTIONS, BILLING_STORE, SCHEDULER_LOCK } from './billing.tokens';
import { BillingOptions, DEFAULT_BILLING_OPTIONS } from './config/billing.config';
import { AdvisorySchedulerLock, TypeOrmBillingStore } from './repositories/typeorm-billing.store';
import {
  InvoiceBalanceService,
  InvoiceGenerationService,
  InvoiceService,
  OverdueSweepService,
  PaymentPlanService,
  RecurringBillingSchedulerService,
  RecurringInvoiceService,
} from './services';

const BILLING_SERVICES = [
  InvoiceService,
  InvoiceBalanceService,
  InvoiceGenerationService,
  RecurringBillingSchedulerService,
  RecurringInvoiceService,
  OverdueSweepService,
  PaymentPlanService,
];

export interface BillingModuleAsyncOptions {
  useFactory: (...args: never[]) => Partial<BillingOptions> | Promise<Partial<BillingOptions>>;
  inject?: InjectionToken[];
}

/**
 * Billing package module. Needs a TypeORM DataSource registered with
 * BILLING_ENTITIES.
 */
@Global()
@Module({})
export class BillingPackageModule {
  static forRoot(options: Partial<BillingOptions> = {}): DynamicModule {
    return BillingPackageModule.build({
      provide: BILLING_OPTIONS,
      useValue: { ...DEFAULT_BILLING_OPTIONS, ...options },
    });
  }

  static forRootAsync(options: BillingModuleAsyncOptions): DynamicModule {
    return BillingPackageModule.build({
      provide: BILLING_OPTIONS,
      useFactory: async (...args: never[]) => ({
        ...DEFAULT_BILLING_OPTIONS,
        ...(await options.useFactory(...args)),
      }),
      inject: options.inject ?? [],
    });
  }

  private static build(optionsProvider: Provider): DynamicModule {
    return {
      module: BillingPackageModule,
      providers: [
        optionsProvider,
        {
          provide: BILLING_STORE,
          useFactory: (dataSource: DataSource) => new TypeOrmBillingStore(dataSource.manager),
          inject: [DataSource],
        },
        {
          provide: SCHEDULER_LOCK,
          useFactory: (dataSource: DataSource) => new AdvisorySchedulerLock(dataSource),
          inject: [DataSource],
        },
        ...BILLING_SERVICES,
      ],
      exports: [BILLING_OPTIONS, BILLING_STORE, SCHEDULER_LOCK, ...BILLING_SERVICES],
    };
  }
}
