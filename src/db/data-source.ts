import 'reflect-metadata';
import * as dotenv from 'dotenv';
import { DataSource } from 'typeorm';
import { BILLING_ENTITIES } from '@invoicing/billing';
import { CustomNamingStrategy } from '../configs/custom-naming.strategy';

dotenv.config();

// Used by the TypeORM CLI (migration:run / migration:revert)
export default new DataSource({
    type: 'postgres',
    host: process.env.DB_HOST ?? 'localhost',
    port: parseInt(process.env.DB_PORT ?? '5432'),
    username: process.env.DB_USERNAME ?? 'postgres',
    password: process.env.DB_PASSWORD ?? '',
    database: process.env.DB_DATABASE ?? 'invoicing',
    entities: BILLING_ENTITIES,
    namingStrategy: new CustomNamingStrategy(),
    synchronize: false,
    migrations: [__dirname + '/migrations/**/*{.ts,.js}'],
    migrationsTableName: 'typeorm_migrations',
    logging: (process.env.DB_LOGGING ?? 'false') === 'true',
});
