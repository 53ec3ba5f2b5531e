import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import { TypeOrmModule } from '@nestjs/typeorm';
import { BILLING_ENTITIES, BillingExceptionFilter } from '@invoicing/billing';
import { CustomNamingStrategy } from './configs/custom-naming.strategy';
import { QueueModule } from './modules/queue/queue.module';
import { BillingModule } from './modules/billing/billing.module';

@Module({
  imports: [
    // Configuration module to load .env file
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
    }),

    // Database configuration
    TypeOrmModule.forRootAsync({
      useFactory: async () => ({
        type: 'postgres' as const,
        host: process.env?.DB_HOST ?? 'localhost',
        port: parseInt(process.env?.DB_PORT ?? '5432'),
        username: process.env?.DB_USERNAME ?? 'postgres',
        password: process.env?.DB_PASSWORD ?? '',
        database: process.env?.DB_DATABASE ?? 'invoicing',
        namingStrategy: new CustomNamingStrategy(),
        entities: BILLING_ENTITIES,
        synchronize: false,
        migrations: [__dirname + '/db/migrations/**/*{.ts,.js}'],
        migrationsTableName: 'typeorm_migrations',
        logging: (process.env?.DB_LOGGING ?? 'false') === 'true',
      }),
    }),

    // Job queue (pg-boss)
    QueueModule,

    // Recurring billing, invoices and payment plans
    BillingModule,
  ],
  providers: [
    {
      provide: APP_FILTER,
      useClass: BillingExceptionFilter,
    },
  ],
})
export class AppModule {}
