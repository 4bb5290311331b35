import 'reflect-metadata';
import 'dotenv/config';

import { DataSource } from 'typeorm';
import path from 'path';

const isCompiled = path.extname(__filename) === '.js';
const DATABASE_URL = process.env.DATABASE_URL;

const migrationsGlob = path.join(__dirname, 'migrations', isCompiled ? '*.js' : '*.ts');

const entitiesArr: string[] = [
  path.join(__dirname, '..', 'storage', 'entities', '*.entity.{ts,js}'),
  path.join(__dirname, '..', 'pipeline', '*.entity.{ts,js}'),
];

const dataSource = new DataSource({
  type: 'postgres',
  url: DATABASE_URL,
  ssl: { rejectUnauthorized: false },

  entities: entitiesArr,

  migrations: [migrationsGlob],
  migrationsTableName: 'typeorm_migrations',
  logging: false,
});

export default dataSource;
