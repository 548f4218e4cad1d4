import 'dotenv/config';
import { DataSource } from 'typeorm';
import { join } from 'path';
import { validateEnv } from '../config/env.schema';

const env = validateEnv(process.env);

// Used by the TypeORM CLI for migrations only; the app builds its own.
export default new DataSource({
  type: 'postgres',
  url: env.DATABASE_URL,
  synchronize: false,
  logging: env.DB_LOG,
  entities: [join(__dirname, '..', '**', '*.entity.{ts,js}')],
  migrations: [join(__dirname, '..', 'migrations', '*.{ts,js}')],
  ssl: env.NODE_ENV === 'production' ? { rejectUnauthorized: false } : false,
});
