import 'reflect-metadata';
import { config } from 'dotenv';
import { DataSource, DataSourceOptions } from 'typeorm';
import { join } from 'path';

import { Document } from './entities/document.entity';

/**
 * Load env vars from the project root .env file.
 * Supports both running from dist/ and from the project root.
 */
config({ path: join(__dirname, '../../../.env') });
config({ path: join(__dirname, '../../../../.env') });

/**
 * TypeORM DataSource for CLI-driven migrations:
 *
 *   npm run migration:run    : applies pending migrations
 *   npm run migration:revert: reverts the last applied migration
 *
 * Credentials come from environment variables with local dev defaults.
 */
const dataSourceOptions: DataSourceOptions = {
  type: 'postgres',
  host: process.env['POSTGRES_HOST'] || 'localhost',
  port: parseInt(process.env['POSTGRES_PORT'] || '5432', 10),
  username: process.env['POSTGRES_USER'] || 'intake',
  password: process.env['POSTGRES_PASSWORD'] || 'intake_secret',
  database: process.env['POSTGRES_DB'] || 'invoice_intake',
  entities: [Document],
  migrations: [join(__dirname, 'migrations', '*{.ts,.js}')],
  synchronize: false,
  logging: process.env['NODE_ENV'] !== 'production',
};

const AppDataSource = new DataSource(dataSourceOptions);

export default AppDataSource;
