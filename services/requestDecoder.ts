import type { AttributeMap, BatchItem, RequestParams } from '../types.js';
import { faults } from './errors.js';

/**
 * Indexed parameters are numbered from 0 by some clients and from 1 by
 * others; whichever of the two is present first starts the sequence, and the
 * first gap after it ends it.
 */
const firstIndex = (params: RequestParams, keyFor: (index: number) => string): number | null => {
    if (keyFor(0) in params) return 0;
    if (keyFor(1) in params) return 1;
    return null;
};

const readIndexed = <T>(
    params: RequestParams,
    keyFor: (index: number) => string,
    read: (index: number) => T
): T[] => {
    const start = firstIndex(params, keyFor);
    if (start === null) return [];

    const values: T[] = [];
    for (let index = start; keyFor(index) in params; index++) {
        values.push(read(index));
    }
    return values;
};

export const requireParameter = (params: RequestParams, name: string): string => {
    const value = params[name];
    if (value === undefined || value === '') throw faults.missingParameter(name);
    return value;
};

/**
 * Collects `<prefix>Attribute.N.Name` / `<prefix>Attribute.N.Value` pairs into
 * a mapping. A later pair with the same name overwrites an earlier one.
 */
export const readAttributes = (params: RequestParams, prefix = ''): AttributeMap => {
    const nameKey = (index: number) => `${prefix}Attribute.${index}.Name`;
    const valueKey = (index: number) => `${prefix}Attribute.${index}.Value`;

    const pairs = readIndexed(params, nameKey, (index) => {
        const value = params[valueKey(index)];
        if (value === undefined) throw faults.missingParameter(valueKey(index));
        return [params[nameKey(index)], value] as const;
    });

    const attributes: AttributeMap = {};
    for (const [name, value] of pairs) attributes[name] = value;
    return attributes;
};

/** `Item.N.ItemName` with its nested `Item.N.Attribute.M.*` pairs. */
export const readBatchItems = (params: RequestParams): BatchItem[] =>
    readIndexed(
        params,
        (index) => `Item.${index}.ItemName`,
        (index) => ({
            itemName: params[`Item.${index}.ItemName`],
            attributes: readAttributes(params, `Item.${index}.`),
        })
    );

/** `AttributeName.N`, as sent with GetAttributes. */
export const readAttributeNames = (params: RequestParams): string[] =>
    readIndexed(params, (index) => `AttributeName.${index}`, (index) => params[`AttributeName.${index}`]);

/** `Attribute.N.Name` without values, as sent with DeleteAttributes. */
export const readAttributeNamesToDelete = (params: RequestParams): string[] =>
    readIndexed(params, (index) => `Attribute.${index}.Name`, (index) => params[`Attribute.${index}.Name`]);

/**
 * Flattens a parsed query string or form body into string values. Repeated
 * keys keep their first value.
 */
export const toRequestParams = (...sources: unknown[]): RequestParams => {
    const params: RequestParams = {};
    for (const source of sources) {
        if (typeof source !== 'object' || source === null) continue;
        const entries: [string, unknown][] = Object.entries(source);
        for (const [key, raw] of entries) {
            const value: unknown = Array.isArray(raw) ? raw[0] : raw;
            if (typeof value === 'string' && !(key in params)) params[key] = value;
        }
    }
    return params;
};
