import type { AttributeMap, BatchItem } from '../types.js';
import type { DomainDirectory } from './domainService.js';
import {
    DATA_TABLE,
    type DomainDb,
    ITEM_KEY_COLUMN,
    ensureDataTable,
    hasDataTable,
    listAttributeColumns,
    listColumns,
    quoteIdentifier,
    withDomainStore,
} from './domainStore.js';
import { SimpleDbFault, faults } from './errors.js';
import { loggerService } from './loggerService.js';

// Size limits of the hosted service, in UTF-8 bytes.
export const MAX_NAME_BYTES = 1024;
export const MAX_VALUE_BYTES = 1024;

const byteLength = (value: string) => Buffer.byteLength(value, 'utf8');

const validateItemName = (itemName: string) => {
    if (itemName.length === 0 || byteLength(itemName) > MAX_NAME_BYTES) {
        throw faults.invalidParameterValue('ItemName', itemName);
    }
};

const validateAttribute = (name: string, value: string) => {
    if (
        name.length === 0 ||
        byteLength(name) > MAX_NAME_BYTES ||
        name.includes('\u0000') ||
        name.toLowerCase() === ITEM_KEY_COLUMN
    ) {
        throw faults.invalidParameterValue('Attribute.Name', name);
    }
    if (byteLength(value) > MAX_VALUE_BYTES) {
        throw faults.invalidParameterValue('Attribute.Value', value);
    }
};

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null;

/**
 * Adds a column for every name the table does not have yet. Runs inside the
 * write transaction, so the column list read here is current and a name added
 * by another writer a moment ago is simply skipped.
 */
const addMissingColumns = (db: DomainDb, names: string[]) => {
    const known = new Map(listColumns(db).map((column) => [column.toLowerCase(), column]));

    for (const name of names) {
        const existing = known.get(name.toLowerCase());
        if (existing === name) continue;
        if (existing !== undefined) {
            // Column names are case-insensitive in the engine; attribute names are not.
            throw new SimpleDbFault(
                'InvalidParameterValue',
                `Attribute name ${name} conflicts with existing attribute ${existing}.`
            );
        }
        db.exec(`ALTER TABLE ${quoteIdentifier(DATA_TABLE)} ADD COLUMN ${quoteIdentifier(name)} TEXT`);
        known.set(name.toLowerCase(), name);
        loggerService.debug('AttributeTableManager: Added attribute column', { name });
    }
};

const upsertRow = (db: DomainDb, itemName: string, names: string[], attributes: AttributeMap) => {
    const columns = [ITEM_KEY_COLUMN, ...names].map(quoteIdentifier);
    const placeholders = columns.map(() => '?').join(', ');
    const updates = names.map((name) => `${quoteIdentifier(name)} = excluded.${quoteIdentifier(name)}`).join(', ');

    db.prepare(
        `INSERT INTO ${quoteIdentifier(DATA_TABLE)} (${columns.join(', ')}) VALUES (${placeholders}) ` +
        `ON CONFLICT(${quoteIdentifier(ITEM_KEY_COLUMN)}) DO UPDATE SET ${updates}`
    ).run(itemName, ...names.map((name) => attributes[name]));
};

export const rowToAttributes = (row: unknown, columns: string[], wanted: string[] = []): AttributeMap => {
    const attributes: AttributeMap = {};
    if (!isRecord(row)) return attributes;

    const filter = new Set(wanted);
    for (const column of columns) {
        if (filter.size > 0 && !filter.has(column)) continue;
        const value = row[column];
        if (value === null || value === undefined) continue;
        attributes[column] = typeof value === 'string' ? value : String(value);
    }
    return attributes;
};

/**
 * Reads and writes item attributes inside one domain's backing store.
 * Each item is a single row keyed by its name; a put replaces the named
 * attributes and leaves the item's other attributes as they were.
 */
export class AttributeTableManager {
    constructor(private readonly directory: DomainDirectory) {}

    async putAttributes(domainName: string, itemName: string, attributes: AttributeMap): Promise<void> {
        const filePath = this.directory.resolveStorePath(domainName);
        validateItemName(itemName);

        const names = Object.keys(attributes).sort();
        if (names.length === 0) return;
        for (const name of names) validateAttribute(name, attributes[name]);

        const written = withDomainStore(filePath, (db) => {
            const write = db.transaction(() => {
                ensureDataTable(db);
                addMissingColumns(db, names);
                upsertRow(db, itemName, names, attributes);
            });
            // IMMEDIATE takes the write lock before the schema is read.
            write.immediate();
            return true;
        });

        if (written === null) throw faults.noSuchDomain(domainName);
        loggerService.debug('AttributeTableManager: Put attributes', { domainName, itemName, count: names.length });
    }

    /**
     * Puts each item in order. A failure stops the batch; items already
     * written stay written.
     */
    async batchPutAttributes(domainName: string, items: BatchItem[]): Promise<void> {
        for (const item of items) {
            await this.putAttributes(domainName, item.itemName, item.attributes);
        }
    }

    /**
     * Removes the item. Naming a subset of attributes still removes the whole
     * item. Unknown domains and items are ignored.
     */
    async deleteAttributes(domainName: string, itemName: string, attributeNames: string[] = []): Promise<void> {
        const filePath = this.directory.resolveStorePath(domainName);

        if (attributeNames.length > 0) {
            loggerService.debug('AttributeTableManager: Partial delete removes the whole item', {
                domainName,
                itemName,
                attributeNames,
            });
        }

        withDomainStore(filePath, (db) => {
            if (!hasDataTable(db)) return;
            db.prepare(`DELETE FROM ${quoteIdentifier(DATA_TABLE)} WHERE ${quoteIdentifier(ITEM_KEY_COLUMN)} = ?`).run(itemName);
        });
    }

    /**
     * Returns the item's attributes, optionally only the named ones. Missing
     * domains and items give an empty mapping.
     */
    async getAttributes(domainName: string, itemName: string, attributeNames: string[] = []): Promise<AttributeMap> {
        const filePath = this.directory.resolveStorePath(domainName);

        const attributes = withDomainStore<AttributeMap>(filePath, (db) => {
            if (!hasDataTable(db)) return {};
            const row = db
                .prepare(`SELECT * FROM ${quoteIdentifier(DATA_TABLE)} WHERE ${quoteIdentifier(ITEM_KEY_COLUMN)} = ? LIMIT 1`)
                .get(itemName);
            return rowToAttributes(row, listAttributeColumns(db), attributeNames);
        });

        return attributes ?? {};
    }
}
