import fs from 'fs';
import fsp from 'fs/promises';
import path from 'path';
import type { EmulatorSettings } from '../types.js';
import { ensureDataTable, withDomainStore } from './domainStore.js';
import { faults, toInternalError } from './errors.js';
import { loggerService } from './loggerService.js';

// Same restriction the hosted service applies to domain names.
const DOMAIN_NAME_PATTERN = /^[A-Za-z0-9_.-]{3,255}$/;

export const isValidDomainName = (name: string): boolean => DOMAIN_NAME_PATTERN.test(name);

export type DomainDirectorySettings = Pick<EmulatorSettings, 'dataDir' | 'domainCap'>;

/**
 * Owns the set of domains: one SQLite file per domain, named exactly as the
 * domain, inside the data directory.
 *
 * The cap check in `createDomain` counts and then creates without a lock, so
 * two concurrent creators near the cap can both get through.
 */
export class DomainDirectory {
    readonly dataDir: string;
    readonly domainCap: number;

    constructor(settings: DomainDirectorySettings) {
        this.dataDir = settings.dataDir;
        this.domainCap = settings.domainCap;
        fs.mkdirSync(this.dataDir, { recursive: true });
    }

    /**
     * Health Check
     */
    async healthCheck(): Promise<boolean> {
        try {
            await fsp.access(this.dataDir, fs.constants.W_OK);
            return true;
        } catch {
            return false;
        }
    }

    /** Validates the name and returns the path of its backing file. */
    resolveStorePath(domainName: string): string {
        if (!isValidDomainName(domainName)) {
            throw faults.invalidParameterValue('DomainName', domainName);
        }
        return path.join(this.dataDir, domainName);
    }

    async hasDomain(domainName: string): Promise<boolean> {
        const filePath = this.resolveStorePath(domainName);
        try {
            const stat = await fsp.stat(filePath);
            return stat.isFile();
        } catch (error) {
            if (isMissingFile(error)) return false;
            throw toInternalError(error, `Failed to stat domain ${domainName}`);
        }
    }

    /**
     * Creates the domain's backing store. Creating an existing domain succeeds
     * without touching it.
     */
    async createDomain(domainName: string): Promise<void> {
        const filePath = this.resolveStorePath(domainName);

        if (await this.hasDomain(domainName)) {
            loggerService.debug('DomainDirectory: Domain already exists', { domainName });
            return;
        }

        const domains = await this.listDomains();
        if (domains.length >= this.domainCap) {
            loggerService.warn('DomainDirectory: Domain cap reached', { domainName, cap: this.domainCap });
            throw faults.numberDomainsExceeded();
        }

        withDomainStore(filePath, ensureDataTable, { create: true });
        loggerService.info('DomainDirectory: Created domain', { domainName });
    }

    /**
     * Removes the domain's backing store. A missing domain is not an error.
     */
    async deleteDomain(domainName: string): Promise<void> {
        const filePath = this.resolveStorePath(domainName);
        try {
            await fsp.unlink(filePath);
        } catch (error) {
            if (isMissingFile(error)) return;
            throw toInternalError(error, `Failed to delete domain ${domainName}`);
        }
        loggerService.info('DomainDirectory: Deleted domain', { domainName });
    }

    /**
     * Returns the names of all domains in the data directory.
     */
    async listDomains(): Promise<string[]> {
        let entries: fs.Dirent[];
        try {
            entries = await fsp.readdir(this.dataDir, { withFileTypes: true });
        } catch (error) {
            throw toInternalError(error, 'Failed to read data directory');
        }

        return entries
            .filter((entry) => entry.isFile() && isValidDomainName(entry.name))
            .map((entry) => entry.name)
            .sort();
    }
}

const isMissingFile = (error: unknown): boolean =>
    error instanceof Error && 'code' in error && error.code === 'ENOENT';
