import express from 'express';
import cors from 'cors';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import type { ActionName, EmulatorSettings, RequestParams } from './types.js';
import { AttributeTableManager } from './services/attributeService.js';
import { DomainDirectory } from './services/domainService.js';
import { InternalError, SimpleDbFault, toInternalError } from './services/errors.js';
import { loggerService } from './services/loggerService.js';
import {
    readAttributeNames,
    readAttributeNamesToDelete,
    readAttributes,
    readBatchItems,
    requireParameter,
    toRequestParams,
} from './services/requestDecoder.js';
import { QueryTranslator } from './services/selectService.js';
import { settingsService } from './services/settingsService.js';
import { xmlResponseService } from './services/xmlResponseService.js';

dotenv.config();

export interface EmulatorServices {
    settings: Readonly<EmulatorSettings>;
    domains: DomainDirectory;
    attributes: AttributeTableManager;
    query: QueryTranslator;
}

export const createServices = (settings: Readonly<EmulatorSettings>): EmulatorServices => {
    const domains = new DomainDirectory(settings);
    return {
        settings,
        domains,
        attributes: new AttributeTableManager(domains),
        query: new QueryTranslator(domains),
    };
};

type ActionHandler = (params: RequestParams, services: EmulatorServices, requestId: string) => Promise<string>;

const actions: Record<ActionName, ActionHandler> = {
    CreateDomain: async (params, { domains }, requestId) => {
        await domains.createDomain(requireParameter(params, 'DomainName'));
        return xmlResponseService.empty('CreateDomain', requestId);
    },

    DeleteDomain: async (params, { domains }, requestId) => {
        await domains.deleteDomain(requireParameter(params, 'DomainName'));
        return xmlResponseService.empty('DeleteDomain', requestId);
    },

    ListDomains: async (_params, { domains }, requestId) => {
        const names = await domains.listDomains();
        return xmlResponseService.listDomains(names, requestId);
    },

    DeleteAttributes: async (params, { attributes }, requestId) => {
        await attributes.deleteAttributes(
            requireParameter(params, 'DomainName'),
            requireParameter(params, 'ItemName'),
            readAttributeNamesToDelete(params)
        );
        return xmlResponseService.empty('DeleteAttributes', requestId);
    },

    PutAttributes: async (params, { attributes }, requestId) => {
        await attributes.putAttributes(
            requireParameter(params, 'DomainName'),
            requireParameter(params, 'ItemName'),
            readAttributes(params)
        );
        return xmlResponseService.empty('PutAttributes', requestId);
    },

    GetAttributes: async (params, { attributes }, requestId) => {
        const found = await attributes.getAttributes(
            requireParameter(params, 'DomainName'),
            requireParameter(params, 'ItemName'),
            readAttributeNames(params)
        );
        return xmlResponseService.getAttributes(found, requestId);
    },

    BatchPutAttributes: async (params, { attributes }, requestId) => {
        await attributes.batchPutAttributes(requireParameter(params, 'DomainName'), readBatchItems(params));
        return xmlResponseService.empty('BatchPutAttributes', requestId);
    },

    Select: async (params, { query }, requestId) => {
        const items = await query.select(requireParameter(params, 'SelectExpression'));
        return xmlResponseService.select(items, requestId);
    },
};

const isActionName = (value: string): value is ActionName => Object.hasOwn(actions, value);

const statusFor = (error: SimpleDbFault | InternalError): number => {
    switch (error.code) {
    case 'NumberDomainsExceeded':
        return 409;
    case 'InternalError':
        return 500;
    default:
        return 400;
    }
};

export const UNSUPPORTED_ACTION_RESPONSE = 'Action not supported by this emulator.';

export const createApp = (services: EmulatorServices) => {
    const app = express();
    // Parameter names such as Attribute.0.Name must stay flat.
    app.set('query parser', 'simple');
    app.use(cors());
    app.use(express.urlencoded({ extended: false, limit: '1mb' }));

    // Request Logging Middleware
    app.use((req, res, next) => {
        loggerService.info(`Request: ${req.method} ${req.path}`, {
            action: toRequestParams(req.query, req.body).Action,
        });
        next();
    });

    // Health Check Endpoint
    app.get('/health', async (req, res) => {
        const writable = await services.domains.healthCheck();
        res.status(writable ? 200 : 503).json({
            status: writable ? 'healthy' : 'degraded',
            dataDir: services.settings.dataDir,
            timestamp: new Date().toISOString(),
        });
    });

    // Service endpoint: every action arrives here, by GET or POST.
    app.all('/', async (req, res) => {
        const requestId = xmlResponseService.newRequestId();
        const params = toRequestParams(req.query, req.body);

        try {
            const action = requireParameter(params, 'Action');
            if (!isActionName(action)) {
                loggerService.warn('Unsupported action', { action });
                res.type('text/plain').send(UNSUPPORTED_ACTION_RESPONSE);
                return;
            }

            const body = await actions[action](params, services, requestId);
            res.type('text/xml').send(body);
        } catch (e) {
            const error = toInternalError(e, 'Request failed');
            const status = statusFor(error);
            if (status >= 500) loggerService.error(`Error in ${req.method} ${req.path}`, { error: e, requestId });
            else loggerService.warn(`Rejected ${req.method} ${req.path}`, { code: error.code, message: error.message, requestId });

            res.status(status).type('text/xml').send(xmlResponseService.error(error.code, error.message, requestId));
        }
    });

    return app;
};

if (process.argv[1] === fileURLToPath(import.meta.url)) {
    const settings = settingsService.load();
    loggerService.setLevel(settings.logLevel);

    const services = createServices(settings);
    const app = createApp(services);

    app.listen(settings.port, settings.bindAddress, async () => {
        loggerService.info(`Attribute store emulator listening on ${settings.bindAddress}:${settings.port}`, {
            dataDir: settings.dataDir,
            domainCap: settings.domainCap,
        });

        // Startup Health Check
        const healthy = await services.domains.healthCheck();
        if (healthy) loggerService.info('Data directory: OK');
        else loggerService.error('Data directory: NOT WRITABLE', { dataDir: settings.dataDir });
    });
}
