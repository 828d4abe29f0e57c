import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { config } from '@api/config';
import * as schema from './schema/index';

const client = postgres(config.database.url, { max: 5 });

export const db = drizzle(client, { schema });
export type Database = typeof db;
