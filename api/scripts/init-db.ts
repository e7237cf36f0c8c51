import 'dotenv/config';
import { readFile } from 'fs/promises';
import * as path from 'path';
import postgres from 'postgres';

/**
 * Applies api/drizzle/init.sql. Every statement is IF NOT EXISTS, so this is
 * safe to run on every deploy.
 */
async function initDb(): Promise<void> {
    const databaseUrl = process.env.DATABASE_URL;
    if (!databaseUrl) {
        throw new Error('DATABASE_URL is not set');
    }

    const sqlPath = path.resolve(__dirname, '..', 'drizzle', 'init.sql');
    const initSql = await readFile(sqlPath, 'utf8');

    const client = postgres(databaseUrl, { max: 1 });
    try {
        console.log(`Applying ${sqlPath}...`);
        // Multi-statement text needs the simple query protocol
        await client.unsafe(initSql).simple();
        console.log('Schema is up to date.');
    } finally {
        await client.end();
    }
}

initDb().catch((error: unknown) => {
    console.error('Schema initialisation failed:', error);
    process.exit(1);
});
