import Database from 'better-sqlite3';
import fs from 'fs';
import { toInternalError } from './errors.js';

// Every domain file holds a single table; the item name lives in the key column
// and each attribute name ever written becomes a nullable TEXT column.
export const DATA_TABLE = 'datatable';
export const ITEM_KEY_COLUMN = 'sdbkey';

export type DomainDb = Database.Database;

export interface StoreOptions {
    /** Create the file when missing. Without it a missing file yields `null`. */
    create?: boolean;
}

export const quoteIdentifier = (name: string): string => `"${name.replace(/"/g, '""')}"`;

export const ensureDataTable = (db: DomainDb) => {
    db.exec(
        `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(DATA_TABLE)} (${quoteIdentifier(ITEM_KEY_COLUMN)} TEXT PRIMARY KEY NOT NULL)`
    );
};

export const hasDataTable = (db: DomainDb): boolean => {
    const row = db.prepare("SELECT 1 FROM sqlite_master WHERE type = 'table' AND name = ?").get(DATA_TABLE);
    return row !== undefined;
};

/**
 * Column names of the data table in table order, key column included.
 * Empty when the table has not been created yet.
 */
export const listColumns = (db: DomainDb): string[] => {
    const names = db
        .prepare('SELECT name FROM pragma_table_info(?) ORDER BY cid')
        .pluck()
        .all(DATA_TABLE);
    return names.filter((name): name is string => typeof name === 'string');
};

/** Attribute columns only (key column excluded), in table order. */
export const listAttributeColumns = (db: DomainDb): string[] =>
    listColumns(db).filter((name) => name !== ITEM_KEY_COLUMN);

/**
 * Opens the domain file, runs `work` and closes the handle before returning.
 * Nothing is cached between calls. Unexpected engine errors surface as
 * `InternalError`; faults raised inside `work` pass through unchanged.
 */
export const withDomainStore = <T>(filePath: string, work: (db: DomainDb) => T, options: StoreOptions = {}): T | null => {
    if (!options.create && !fs.existsSync(filePath)) return null;

    let db: DomainDb;
    try {
        db = new Database(filePath, { fileMustExist: !options.create });
    } catch (error) {
        throw toInternalError(error, `Failed to open backing store ${filePath}`);
    }

    try {
        return work(db);
    } catch (error) {
        throw toInternalError(error, 'Backing store operation failed');
    } finally {
        db.close();
    }
};
