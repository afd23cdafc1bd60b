import type Database from 'better-sqlite3';
import type { AttributeMap, SelectedItem } from '../types.js';
import type { DomainDirectory } from './domainService.js';
import { DATA_TABLE, ITEM_KEY_COLUMN, hasDataTable, listAttributeColumns, quoteIdentifier, withDomainStore } from './domainStore.js';
import { invalidQuery } from './errors.js';
import { loggerService } from './loggerService.js';

// --- Lexing ---

export type Token =
    | { kind: 'word'; text: string; position: number }
    | { kind: 'name'; text: string; position: number }
    | { kind: 'string'; text: string; position: number }
    | { kind: 'number'; text: string; position: number }
    | { kind: 'symbol'; text: string; position: number };

const QUOTES = new Set(["'", '"', '`']);
const WORD_CHAR = /[A-Za-z0-9_$]/;
const NUMBER = /^\d+(\.\d+)?$/;
const TWO_CHAR_SYMBOLS = new Set(['<=', '>=', '!=', '<>']);
const ONE_CHAR_SYMBOLS = new Set(['=', '<', '>', '(', ')', ',', '*']);

/**
 * Splits a select expression into tokens. Values are quoted with `'` or `"`,
 * names with backticks; a quote is escaped by doubling it.
 */
export const tokenize = (expression: string): Token[] => {
    const tokens: Token[] = [];
    let i = 0;

    while (i < expression.length) {
        const ch = expression[i];

        if (/\s/.test(ch)) {
            i++;
            continue;
        }

        if (QUOTES.has(ch)) {
            const start = i;
            let text = '';
            i++;
            for (;;) {
                if (i >= expression.length) {
                    throw invalidQuery(`Unterminated quoted text starting at position ${start}.`);
                }
                if (expression[i] === ch) {
                    if (expression[i + 1] === ch) {
                        text += ch;
                        i += 2;
                        continue;
                    }
                    i++;
                    break;
                }
                text += expression[i];
                i++;
            }
            tokens.push({ kind: ch === '`' ? 'name' : 'string', text, position: start });
            continue;
        }

        if (WORD_CHAR.test(ch)) {
            const start = i;
            while (i < expression.length && WORD_CHAR.test(expression[i])) i++;
            // decimal part of a numeric literal
            if (/^\d+$/.test(expression.slice(start, i)) && expression[i] === '.' && /\d/.test(expression[i + 1] ?? '')) {
                i++;
                while (i < expression.length && /\d/.test(expression[i])) i++;
            }
            const text = expression.slice(start, i);
            tokens.push({ kind: NUMBER.test(text) ? 'number' : 'word', text, position: start });
            continue;
        }

        const pair = expression.slice(i, i + 2);
        if (TWO_CHAR_SYMBOLS.has(pair)) {
            tokens.push({ kind: 'symbol', text: pair, position: i });
            i += 2;
            continue;
        }
        if (ONE_CHAR_SYMBOLS.has(ch)) {
            tokens.push({ kind: 'symbol', text: ch, position: i });
            i++;
            continue;
        }

        throw invalidQuery(`Unexpected character '${ch}' at position ${i}.`);
    }

    return tokens;
};

// --- Parsing ---

export type SelectOutput =
    | { kind: 'all' }
    | { kind: 'itemName' }
    | { kind: 'count' }
    | { kind: 'attributes'; names: string[] };

export interface ParsedSelect {
    domainName: string;
    output: SelectOutput;
    /** Tokens following the domain: WHERE, ORDER BY and LIMIT clauses. */
    clauses: Token[];
}

const CLAUSE_KEYWORDS = new Set([
    'WHERE', 'AND', 'OR', 'NOT', 'LIKE', 'IN', 'BETWEEN', 'IS', 'NULL', 'ORDER', 'BY', 'ASC', 'DESC', 'LIMIT',
]);
const FORBIDDEN_KEYWORDS = new Set(['SELECT', 'FROM', 'JOIN', 'UNION']);
const CLAUSE_STARTS = new Set(['WHERE', 'ORDER', 'LIMIT']);
const WHOLE_NUMBER = /^\d+$/;

const isKeyword = (token: Token | undefined, keyword: string): boolean =>
    token?.kind === 'word' && token.text.toUpperCase() === keyword;

const isSymbol = (token: Token | undefined, symbol: string): boolean =>
    token?.kind === 'symbol' && token.text === symbol;

const isCall = (tokens: Token[], index: number, fn: string, args: string[] = []): boolean => {
    const head = tokens[index];
    if (head?.kind !== 'word' || head.text.toLowerCase() !== fn.toLowerCase()) return false;
    const expected = ['(', ...args, ')'];
    return expected.every((symbol, offset) => isSymbol(tokens[index + 1 + offset], symbol));
};

const parseOutput = (tokens: Token[], start: number): { output: SelectOutput; next: number } => {
    if (isSymbol(tokens[start], '*')) return { output: { kind: 'all' }, next: start + 1 };
    if (isCall(tokens, start, 'itemName')) return { output: { kind: 'itemName' }, next: start + 3 };
    if (isCall(tokens, start, 'count', ['*'])) return { output: { kind: 'count' }, next: start + 4 };

    const names: string[] = [];
    let i = start;
    for (;;) {
        const token = tokens[i];
        if (!token || (token.kind !== 'word' && token.kind !== 'name') || (token.kind === 'word' && isKeyword(token, 'FROM'))) {
            throw invalidQuery('Expected *, itemName(), count(*) or a list of attribute names after SELECT.');
        }
        names.push(token.text);
        i++;
        if (!isSymbol(tokens[i], ',')) break;
        i++;
    }
    return { output: { kind: 'attributes', names }, next: i };
};

const validateClauses = (clauses: Token[]) => {
    if (clauses.length === 0) return;

    const [first] = clauses;
    if (first.kind !== 'word' || !CLAUSE_STARTS.has(first.text.toUpperCase())) {
        throw invalidQuery(`Unexpected '${first.text}' at position ${first.position}; expected WHERE, ORDER BY or LIMIT.`);
    }

    let depth = 0;
    clauses.forEach((token, index) => {
        if (token.kind === 'word' && FORBIDDEN_KEYWORDS.has(token.text.toUpperCase())) {
            throw invalidQuery(`${token.text.toUpperCase()} is not supported here; queries address a single domain.`);
        }
        if (isSymbol(token, '(')) depth++;
        if (isSymbol(token, ')')) depth--;
        if (depth < 0) throw invalidQuery(`Unbalanced parenthesis at position ${token.position}.`);
        if (isKeyword(token, 'LIMIT')) {
            const count = clauses[index + 1];
            if (count?.kind !== 'number' || !WHOLE_NUMBER.test(count.text) || index + 2 !== clauses.length) {
                throw invalidQuery('LIMIT must be followed by a whole number and end the expression.');
            }
        }
    });
    if (depth !== 0) throw invalidQuery('Unbalanced parentheses.');
};

/**
 * Parses `SELECT output FROM domain [clauses]`. The domain token may be bare
 * or quoted with `'`, `"` or a backtick.
 */
export const parseSelectExpression = (expression: string): ParsedSelect => {
    const tokens = tokenize(expression);

    if (!isKeyword(tokens[0], 'SELECT')) {
        throw invalidQuery('The select expression must start with SELECT.');
    }

    const { output, next } = parseOutput(tokens, 1);

    if (!isKeyword(tokens[next], 'FROM')) {
        throw invalidQuery('The select expression must name a domain in a FROM clause.');
    }

    const target = tokens[next + 1];
    if (!target || target.kind === 'symbol' || target.kind === 'number') {
        throw invalidQuery('Missing domain name after FROM.');
    }

    const clauses = tokens.slice(next + 2);
    validateClauses(clauses);

    return { domainName: target.text, output, clauses };
};

// --- Rewriting ---

export interface SelectQuery {
    sql: string;
    params: string[];
    /** Attribute columns following the key column in each result row. */
    columns: string[];
    count: boolean;
}

/**
 * Builds the statement run against the domain's table. Only the domain token
 * is rebound, so a domain name used as a value or attribute elsewhere in the
 * expression is left alone. Attribute names outside the schema become NULL.
 */
export const buildSelectQuery = (parsed: ParsedSelect, attributeColumns: string[]): SelectQuery => {
    const known = new Set(attributeColumns);
    const resolve = (name: string) => (known.has(name) ? quoteIdentifier(name) : 'NULL');

    const params: string[] = [];
    const parts: string[] = [];
    const { clauses } = parsed;

    for (let i = 0; i < clauses.length; i++) {
        const token = clauses[i];
        switch (token.kind) {
        case 'string':
            parts.push('?');
            params.push(token.text);
            break;
        case 'number':
        case 'symbol':
            parts.push(token.text);
            break;
        case 'name':
            parts.push(resolve(token.text));
            break;
        case 'word': {
            const upper = token.text.toUpperCase();
            if (CLAUSE_KEYWORDS.has(upper)) {
                parts.push(upper);
            } else if (isCall(clauses, i, 'itemName')) {
                parts.push(quoteIdentifier(ITEM_KEY_COLUMN));
                i += 2;
            } else {
                parts.push(resolve(token.text));
            }
            break;
        }
        }
    }

    const table = quoteIdentifier(DATA_TABLE);
    const tail = parts.length > 0 ? ` ${parts.join(' ')}` : '';

    if (parsed.output.kind === 'count') {
        return { sql: `SELECT count(*) FROM ${table}${tail}`, params, columns: [], count: true };
    }

    let columns: string[] = [];
    if (parsed.output.kind === 'all') {
        columns = attributeColumns;
    } else if (parsed.output.kind === 'attributes') {
        const requested = new Set(parsed.output.names);
        columns = attributeColumns.filter((column) => requested.has(column));
    }

    const projection = [ITEM_KEY_COLUMN, ...columns].map(quoteIdentifier).join(', ');
    return { sql: `SELECT ${projection} FROM ${table}${tail}`, params, columns, count: false };
};

const isRow = (value: unknown): value is unknown[] => Array.isArray(value);

const asText = (value: unknown): string => (typeof value === 'string' ? value : String(value));

export const reshapeRows = (rows: unknown[], query: SelectQuery): SelectedItem[] => {
    if (query.count) {
        const first = rows.find(isRow);
        return [{ name: 'Domain', attributes: { Count: asText(first?.[0] ?? 0) } }];
    }

    return rows.filter(isRow).map((row) => {
        const attributes: AttributeMap = {};
        query.columns.forEach((column, index) => {
            const value = row[index + 1];
            if (value !== null && value !== undefined) attributes[column] = asText(value);
        });
        return { name: asText(row[0]), attributes };
    });
};

// --- Execution ---

/**
 * Runs select expressions against the domain they name.
 */
export class QueryTranslator {
    constructor(private readonly directory: DomainDirectory) {}

    async select(expression: string): Promise<SelectedItem[]> {
        const parsed = parseSelectExpression(expression);
        const filePath = this.directory.resolveStorePath(parsed.domainName);

        const items = withDomainStore<SelectedItem[]>(filePath, (db) => {
            if (!hasDataTable(db)) return [];

            const query = buildSelectQuery(parsed, listAttributeColumns(db));
            let statement: Database.Statement;
            try {
                statement = db.prepare(query.sql);
            } catch (error) {
                const detail = error instanceof Error ? error.message : String(error);
                throw invalidQuery(`The select expression could not be evaluated: ${detail}`, error);
            }

            const rows = statement.raw(true).all(...query.params);
            return reshapeRows(rows, query);
        });

        loggerService.debug('QueryTranslator: Select', {
            domainName: parsed.domainName,
            found: items !== null,
            count: items?.length ?? 0,
        });
        return items ?? [];
    }
}
