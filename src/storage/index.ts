import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';
import { config } from '../config/index.js';

export function createDatabase(connectionString: string = config.postgres.url) {
    if (!connectionString) {
        throw new Error('DATABASE_URL is not set');
    }

    // Disable prefetch as it is not supported for "Transaction" pool mode
    const client = postgres(connectionString, { prepare: false });
    const db = drizzle(client, { schema });
    return { client, db };
}

export type Database = ReturnType<typeof createDatabase>;
