import 'dotenv/config';
import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { join } from 'path';
import { validateEnv } from '../config/env.schema';

const env = validateEnv(process.env);
const sslEnabled = env.DB_SSL || env.NODE_ENV === 'production';

// Migrations own the schema: synchronize stays off for the CLI.
export default new DataSource({
  type: 'postgres',
  url: env.DATABASE_URL,
  synchronize: false,
  logging: env.DB_LOG,
  entities: [join(__dirname, '..', '**', '*.entity.{ts,js}')],
  migrations: [join(__dirname, '..', 'migrations', '*.{ts,js}')],
  ssl: sslEnabled ? { rejectUnauthorized: false } : false,
});
