import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { AttributeTableManager } from '../services/attributeService.js';
import { DomainDirectory } from '../services/domainService.js';
import { InternalError } from '../services/errors.js';
import { QueryTranslator, buildSelectQuery, parseSelectExpression, tokenize } from '../services/selectService.js';

describe('select expression parsing', () => {
    it('should tokenize quoted values, names and operators', () => {
        const tokens = tokenize("select `my attr` from items where a >= 'it''s' and b != \"x\"");
        expect(tokens.map((t) => [t.kind, t.text])).toEqual([
            ['word', 'select'],
            ['name', 'my attr'],
            ['word', 'from'],
            ['word', 'items'],
            ['word', 'where'],
            ['word', 'a'],
            ['symbol', '>='],
            ['string', "it's"],
            ['word', 'and'],
            ['word', 'b'],
            ['symbol', '!='],
            ['string', 'x'],
        ]);
    });

    it('should read numbers with a decimal part as one token', () => {
        expect(tokenize('LIMIT 2.5').map((t) => t.kind)).toEqual(['word', 'number']);
    });

    it.each([
        ['SELECT * FROM products', 'products'],
        ['select * from products where x = "1"', 'products'],
        ["SELECT * FROM 'products'", 'products'],
        ['SELECT * FROM "products"', 'products'],
        ['SELECT * FROM `my.products-2`', 'my.products-2'],
    ])('should extract the domain from %j', (expression, domainName) => {
        expect(parseSelectExpression(expression).domainName).toBe(domainName);
    });

    it('should recognise each output form', () => {
        expect(parseSelectExpression('SELECT * FROM dom').output).toEqual({ kind: 'all' });
        expect(parseSelectExpression('SELECT itemName() FROM dom').output).toEqual({ kind: 'itemName' });
        expect(parseSelectExpression('SELECT COUNT(*) FROM dom').output).toEqual({ kind: 'count' });
        expect(parseSelectExpression('SELECT color, `the size` FROM dom').output).toEqual({
            kind: 'attributes',
            names: ['color', 'the size'],
        });
    });

    it.each([
        ['', 'The select expression must start with SELECT.'],
        ['DELETE FROM dom', 'The select expression must start with SELECT.'],
        ['SELECT *', 'The select expression must name a domain in a FROM clause.'],
        ['SELECT * FROM', 'Missing domain name after FROM.'],
        ['SELECT FROM dom', 'Expected *, itemName(), count(*) or a list of attribute names after SELECT.'],
        ["SELECT * FROM dom WHERE a = 'x", 'Unterminated quoted text starting at position 28.'],
        ['SELECT * FROM dom; DROP TABLE datatable', "Unexpected character ';' at position 17."],
        ['SELECT * FROM dom, other', "Unexpected ',' at position 17; expected WHERE, ORDER BY or LIMIT."],
        ['SELECT * FROM dom WHERE a IN (SELECT b FROM other)', 'SELECT is not supported here; queries address a single domain.'],
        ['SELECT * FROM dom JOIN other', "Unexpected 'JOIN' at position 18; expected WHERE, ORDER BY or LIMIT."],
        ["SELECT * FROM dom WHERE (a = 'x'", 'Unbalanced parentheses.'],
        ['SELECT * FROM dom LIMIT 5 extra', 'LIMIT must be followed by a whole number and end the expression.'],
        ['SELECT * FROM dom LIMIT 2.5', 'LIMIT must be followed by a whole number and end the expression.'],
    ])('should reject %j', (expression, message) => {
        let caught: unknown;
        try {
            parseSelectExpression(expression);
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(InternalError);
        expect(caught).toMatchObject({ code: 'InvalidQueryExpression', message });
    });
});

describe('select query rewriting', () => {
    it('should bind only the FROM target to the data table', () => {
        const parsed = parseSelectExpression("SELECT * FROM owner WHERE owner = 'owner'");
        const query = buildSelectQuery(parsed, ['owner', 'color']);

        expect(query.sql).toBe('SELECT "sdbkey", "owner", "color" FROM "datatable" WHERE "owner" = ?');
        expect(query.params).toEqual(['owner']);
    });

    it('should map itemName() to the key column and unknown attributes to NULL', () => {
        const parsed = parseSelectExpression("select itemName() from dom where itemName() like 'a%' or ghost = '1'");
        const query = buildSelectQuery(parsed, ['color']);

        expect(query.sql).toBe('SELECT "sdbkey" FROM "datatable" WHERE "sdbkey" LIKE ? OR NULL = ?');
        expect(query.params).toEqual(['a%', '1']);
        expect(query.columns).toEqual([]);
    });

    it('should project requested attributes in table order', () => {
        const parsed = parseSelectExpression('SELECT size, color, nothing FROM dom ORDER BY `size` desc LIMIT 10');
        const query = buildSelectQuery(parsed, ['color', 'shape', 'size']);

        expect(query.sql).toBe('SELECT "sdbkey", "color", "size" FROM "datatable" ORDER BY "size" DESC LIMIT 10');
        expect(query.columns).toEqual(['color', 'size']);
    });

    it('should build a count query', () => {
        const query = buildSelectQuery(parseSelectExpression("SELECT count(*) FROM dom WHERE color = 'red'"), ['color']);

        expect(query).toEqual({
            sql: 'SELECT count(*) FROM "datatable" WHERE "color" = ?',
            params: ['red'],
            columns: [],
            count: true,
        });
    });
});

describe('QueryTranslator', () => {
    let dataDir: string;
    let directory: DomainDirectory;
    let attributes: AttributeTableManager;
    let translator: QueryTranslator;

    beforeEach(async () => {
        dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sdb-select-'));
        directory = new DomainDirectory({ dataDir, domainCap: 100 });
        attributes = new AttributeTableManager(directory);
        translator = new QueryTranslator(directory);

        await directory.createDomain('fruit');
        await attributes.putAttributes('fruit', 'apple', { color: 'red', taste: 'sweet' });
        await attributes.putAttributes('fruit', 'lemon', { color: 'yellow', taste: 'sour' });
        await attributes.putAttributes('fruit', 'cherry', { color: 'red' });
    });

    afterEach(() => {
        fs.rmSync(dataDir, { recursive: true, force: true });
    });

    it('should return only items matching the condition', async () => {
        const items = await translator.select('SELECT * FROM fruit WHERE color = "red"');

        expect(items).toEqual([
            { name: 'apple', attributes: { color: 'red', taste: 'sweet' } },
            { name: 'cherry', attributes: { color: 'red' } },
        ]);
    });

    it('should return every item for an unconditioned select', async () => {
        const items = await translator.select('SELECT * FROM fruit');
        expect(items.map((item) => item.name)).toEqual(['apple', 'lemon', 'cherry']);
    });

    it('should expose attributes added by later puts', async () => {
        await attributes.putAttributes('fruit', 'apple', { size: 'large' });

        const items = await translator.select("SELECT * FROM fruit WHERE itemName() = 'apple'");
        expect(items).toEqual([{ name: 'apple', attributes: { color: 'red', taste: 'sweet', size: 'large' } }]);
    });

    it('should honour ORDER BY and LIMIT', async () => {
        const items = await translator.select('SELECT itemName() FROM `fruit` WHERE color IS NOT NULL ORDER BY itemName() DESC LIMIT 2');
        expect(items).toEqual([
            { name: 'lemon', attributes: {} },
            { name: 'cherry', attributes: {} },
        ]);
    });

    it('should count matching items', async () => {
        const items = await translator.select("SELECT count(*) FROM fruit WHERE color = 'red'");
        expect(items).toEqual([{ name: 'Domain', attributes: { Count: '2' } }]);
    });

    it('should not match on attributes the domain has never seen', async () => {
        expect(await translator.select("SELECT * FROM fruit WHERE ghost = 'x'")).toEqual([]);
    });

    it('should not confuse the domain name with a value', async () => {
        await attributes.putAttributes('fruit', 'basket', { label: 'fruit' });

        const items = await translator.select("SELECT label FROM fruit WHERE label = 'fruit'");
        expect(items).toEqual([{ name: 'basket', attributes: { label: 'fruit' } }]);
    });

    it('should return no items for a domain without a backing store', async () => {
        expect(await translator.select('SELECT * FROM missing_domain')).toEqual([]);
        expect(await directory.hasDomain('missing_domain')).toBe(false);
    });

    it('should reject expressions the engine cannot evaluate', async () => {
        await expect(translator.select('SELECT * FROM fruit WHERE')).rejects.toMatchObject({
            code: 'InvalidQueryExpression',
        });
    });

    it('should reject a fractional LIMIT before running the query', async () => {
        await expect(translator.select('SELECT * FROM fruit LIMIT 2.5')).rejects.toMatchObject({
            code: 'InvalidQueryExpression',
        });
    });

    it('should reject an invalid domain token', async () => {
        await expect(translator.select('SELECT * FROM `no way`')).rejects.toMatchObject({
            code: 'InvalidParameterValue',
            message: 'Value (no way) for parameter DomainName is invalid.',
        });
    });
});
