import 'reflect-metadata';
import { join } from 'node:path';

import { DataSource } from 'typeorm';

import { env } from '../config/env';
import { Classroom } from './entities/Classroom';
import { EmbeddingCacheRecord } from './entities/EmbeddingCacheRecord';
import { Learner } from './entities/Learner';

export const AppDataSource = new DataSource({
  type: 'postgres',
  host: env.DB_HOST,
  port: env.DB_PORT,
  username: env.DB_USERNAME,
  password: env.DB_PASSWORD,
  database: env.DB_NAME,
  synchronize: false,
  logging: env.DB_LOGGING,
  entities: [Classroom, Learner, EmbeddingCacheRecord],
  migrations: [join(__dirname, 'migrations/*.{ts,js}')],
  migrationsTableName: 'typeorm_migrations',
});
