import { describe, it, expect, vi, afterEach } from 'vitest';
import path from 'path';
import { loggerService } from '../services/loggerService.js';
import { DEFAULT_DOMAIN_CAP, settingsService } from '../services/settingsService.js';

describe('SettingsService', () => {
    const cwd = path.resolve('/srv/emulator');

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should fall back to defaults when nothing is set', () => {
        expect(settingsService.load({}, cwd)).toEqual({
            port: 8080,
            bindAddress: '0.0.0.0',
            dataDir: path.join(cwd, 'sdb-data'),
            domainCap: DEFAULT_DOMAIN_CAP,
            logLevel: 'info',
        });
    });

    it('should read every setting from the environment', () => {
        const settings = settingsService.load(
            {
                SDB_EMULATOR_PORT: '9090',
                SDB_EMULATOR_BIND_ADDR: '127.0.0.1',
                SDB_EMULATOR_DATA_DIR: 'var/domains',
                SDB_EMULATOR_DOMAIN_CAP: '250',
                LOG_LEVEL: 'DEBUG',
            },
            cwd
        );

        expect(settings).toEqual({
            port: 9090,
            bindAddress: '127.0.0.1',
            dataDir: path.join(cwd, 'var', 'domains'),
            domainCap: 250,
            logLevel: 'debug',
        });
    });

    it('should keep an absolute data directory as given', () => {
        const dataDir = path.resolve('/tmp/sdb-elsewhere');
        expect(settingsService.load({ SDB_EMULATOR_DATA_DIR: dataDir }, cwd).dataDir).toBe(dataDir);
    });

    it('should warn and use defaults for invalid values', () => {
        const warn = vi.spyOn(loggerService, 'warn').mockImplementation(() => {});

        const settings = settingsService.load(
            { SDB_EMULATOR_PORT: 'http', SDB_EMULATOR_DOMAIN_CAP: '-3', LOG_LEVEL: 'loud' },
            cwd
        );

        expect(settings.port).toBe(8080);
        expect(settings.domainCap).toBe(DEFAULT_DOMAIN_CAP);
        expect(settings.logLevel).toBe('info');
        expect(warn).toHaveBeenCalledTimes(3);
        expect(warn).toHaveBeenCalledWith('SettingsService: Ignoring invalid SDB_EMULATOR_PORT', { value: 'http', fallback: 8080 });
    });

    it('should not accept object prototype members as log levels', () => {
        const warn = vi.spyOn(loggerService, 'warn').mockImplementation(() => {});

        expect(settingsService.load({ LOG_LEVEL: 'constructor' }, cwd).logLevel).toBe('info');
        expect(warn).toHaveBeenCalledWith('SettingsService: Ignoring invalid LOG_LEVEL', { value: 'constructor' });
    });

    it('should return a frozen value', () => {
        expect(Object.isFrozen(settingsService.load({}, cwd))).toBe(true);
    });
});
