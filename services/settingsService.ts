import path from 'path';
import type { EmulatorSettings } from '../types.js';
import { isLogLevel, loggerService } from './loggerService.js';

// Environment keys
const KEYS = {
  PORT: 'SDB_EMULATOR_PORT',
  BIND_ADDR: 'SDB_EMULATOR_BIND_ADDR',
  DATA_DIR: 'SDB_EMULATOR_DATA_DIR',
  DOMAIN_CAP: 'SDB_EMULATOR_DOMAIN_CAP',
  LOG_LEVEL: 'LOG_LEVEL',
};

// Mirrors the hosted service's default per-account domain limit.
export const DEFAULT_DOMAIN_CAP = 100;
export const DEFAULT_PORT = 8080;
export const DEFAULT_BIND_ADDR = '0.0.0.0';

type Env = Record<string, string | undefined>;

const readPositiveInt = (env: Env, key: string, fallback: number): number => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    loggerService.warn(`SettingsService: Ignoring invalid ${key}`, { value: raw, fallback });
    return fallback;
  }
  return parsed;
};

export const settingsService = {
  /**
   * Builds the process configuration from environment variables. Call once at
   * startup and pass the result to the services that need it.
   */
  load: (env: Env = process.env, cwd: string = process.cwd()): Readonly<EmulatorSettings> => {
    const rawLevel = env[KEYS.LOG_LEVEL]?.toLowerCase();
    let logLevel: EmulatorSettings['logLevel'] = 'info';
    if (rawLevel !== undefined && rawLevel !== '') {
      if (isLogLevel(rawLevel)) logLevel = rawLevel;
      else loggerService.warn(`SettingsService: Ignoring invalid ${KEYS.LOG_LEVEL}`, { value: rawLevel });
    }

    const dataDir = env[KEYS.DATA_DIR] || path.join(cwd, 'sdb-data');

    return Object.freeze({
      port: readPositiveInt(env, KEYS.PORT, DEFAULT_PORT),
      bindAddress: env[KEYS.BIND_ADDR] || DEFAULT_BIND_ADDR,
      dataDir: path.resolve(cwd, dataDir),
      domainCap: readPositiveInt(env, KEYS.DOMAIN_CAP, DEFAULT_DOMAIN_CAP),
      logLevel,
    });
  },
};
