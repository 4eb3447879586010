import { DataSource } from 'typeorm';
import { config } from 'dotenv';
import { join } from 'path';
import { Account } from './entities/account.entity';

config();

/**
 * Standalone data source for the TypeORM CLI (migration:run). The Nest app
 * builds its own connection in AppModule.
 */
export const AppDataSource = new DataSource({
  type: 'postgres',
  host: process.env.DATABASE_HOST || 'localhost',
  port: parseInt(process.env.DATABASE_PORT || '5432', 10),
  username: process.env.DATABASE_USER || 'identity',
  password: process.env.DATABASE_PASSWORD || 'identity_password',
  database: process.env.DATABASE_NAME || 'identity_db',
  entities: [Account],
  migrations: [join(__dirname, 'migrations', '*.{ts,js}')],
  synchronize: false, // Always false - use migrations
  logging: process.env.NODE_ENV === 'development',
});
