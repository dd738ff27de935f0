import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';
import { v4 as uuid } from 'uuid';
import { createLogger } from '@/lib/debug';

const logger = createLogger('SQLite');

// Database file path
const DB_PATH = process.env.DATABASE_PATH || path.join(process.cwd(), 'drillwise.db');
const SCHEMA_PATH = fileURLToPath(new URL('./schema.sql', import.meta.url));

export const IN_MEMORY = ':memory:';

/**
 * Open a connection with foreign keys on and the schema applied.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(filename: string = DB_PATH): Database.Database {
    if (filename !== IN_MEMORY) {
        // Ensure the parent directory exists before opening the database
        const dbDir = path.dirname(filename);
        if (!fs.existsSync(dbDir)) {
            fs.mkdirSync(dbDir, { recursive: true });
            logger.info('Created database directory', { path: dbDir });
        }
    }

    const database = new Database(filename);
    database.pragma('foreign_keys = ON');
    if (filename !== IN_MEMORY) {
        database.pragma('journal_mode = WAL');
    }

    initializeSchema(database);
    return database;
}

function initializeSchema(database: Database.Database): void {
    const schema = fs.readFileSync(SCHEMA_PATH, 'utf-8');
    database.exec(schema);
    logger.debug('Schema initialized', { path: SCHEMA_PATH });
}

// Shared connection for the configured DATABASE_PATH
let db: Database.Database | null = null;

export function getDatabase(): Database.Database {
    if (!db) {
        db = openDatabase(DB_PATH);
    }
    return db;
}

// Close database connection (for cleanup)
export function closeDatabase(): void {
    if (db) {
        db.close();
        db = null;
    }
}

// Helper: Generate UUID
export function generateId(): string {
    return uuid();
}

// Helper: Get current ISO timestamp
export function now(): string {
    return new Date().toISOString();
}

export { DB_PATH };
