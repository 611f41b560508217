/**
 * PetLogConfig - Runtime configuration with environment-based defaults.
 */

import { homedir } from 'os';
import { join } from 'path';
import { type LogLevel, isLogLevel } from '../infrastructure/observability/Logger.js';

/**
 * Name of the snapshot file inside the data directory.
 */
export const PET_LOG_FILE_NAME = 'petlog.json';

export interface PetLogConfig {
    /** Application's private data directory */
    dataDirectory: string;
    fileName: string;
    /** Replace the snapshot through a temp file and rename */
    atomicWrites: boolean;
    logLevel: LogLevel;
}

export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

/**
 * Build configuration from environment variables.
 *
 * Environment variables:
 * - PETLOG_DATA_DIR: Data directory (default: ~/.petlog)
 * - PETLOG_ATOMIC_WRITES: 'false' or '0' disables atomic writes (default: enabled)
 * - PETLOG_LOG_LEVEL: 'debug' | 'info' | 'warn' | 'error' (default: 'info')
 */
export function loadConfigFromEnv(
    env: NodeJS.ProcessEnv = process.env,
    homeDirectory: string = homedir()
): PetLogConfig {
    const dataDirectory = env.PETLOG_DATA_DIR?.trim();
    const atomicWrites = env.PETLOG_ATOMIC_WRITES?.trim().toLowerCase();
    const logLevel = env.PETLOG_LOG_LEVEL?.trim().toLowerCase();

    return {
        dataDirectory: dataDirectory ? dataDirectory : join(homeDirectory, '.petlog'),
        fileName: PET_LOG_FILE_NAME,
        atomicWrites: atomicWrites !== 'false' && atomicWrites !== '0',
        logLevel: isLogLevel(logLevel) ? logLevel : DEFAULT_LOG_LEVEL,
    };
}

export function resolveDataFilePath(config: PetLogConfig): string {
    return join(config.dataDirectory, config.fileName);
}
