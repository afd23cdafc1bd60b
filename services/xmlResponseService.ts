import { randomUUID } from 'crypto';
import type { ActionName, AttributeMap, SelectedItem } from '../types.js';

export const XML_NAMESPACE = 'http://sdb.amazonaws.com/doc/2009-04-15/';

// Fixed usage figure; the emulator does not meter requests.
export const BOX_USAGE = '0.0000219907';

export const escapeXml = (text: string): string =>
    text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;');

const element = (name: string, content: string) => `<${name}>${content}</${name}>`;

const attributeElements = (attributes: AttributeMap): string =>
    Object.entries(attributes)
        .map(([name, value]) => element('Attribute', element('Name', escapeXml(name)) + element('Value', escapeXml(value))))
        .join('');

const document = (action: ActionName, result: string, requestId: string) =>
    '<?xml version="1.0" encoding="UTF-8"?>\n' +
    `<${action}Response xmlns="${XML_NAMESPACE}">` +
    result +
    element('ResponseMetadata', element('RequestId', requestId) + element('BoxUsage', BOX_USAGE)) +
    `</${action}Response>`;

export const xmlResponseService = {
    newRequestId: (): string => randomUUID(),

    /** Response for actions that return nothing but metadata. */
    empty: (action: ActionName, requestId: string = randomUUID()): string => document(action, '', requestId),

    listDomains: (domains: string[], requestId: string = randomUUID()): string =>
        document(
            'ListDomains',
            element('ListDomainsResult', domains.map((name) => element('DomainName', escapeXml(name))).join('')),
            requestId
        ),

    getAttributes: (attributes: AttributeMap, requestId: string = randomUUID()): string =>
        document('GetAttributes', element('GetAttributesResult', attributeElements(attributes)), requestId),

    select: (items: SelectedItem[], requestId: string = randomUUID()): string =>
        document(
            'Select',
            element(
                'SelectResult',
                items.map((item) => element('Item', element('Name', escapeXml(item.name)) + attributeElements(item.attributes))).join('')
            ),
            requestId
        ),

    error: (code: string, message: string, requestId: string = randomUUID()): string =>
        '<?xml version="1.0" encoding="UTF-8"?>\n' +
        element(
            'Response',
            element(
                'Errors',
                element('Error', element('Code', escapeXml(code)) + element('Message', escapeXml(message)) + element('BoxUsage', BOX_USAGE))
            ) + element('RequestID', requestId)
        ),
};
