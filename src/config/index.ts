import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

export const DEFAULT_BASE_URL = 'http://localhost:8000';

/**
 * Transcription client configuration loaded from environment variables.
 */
export interface Config {
    // Transcription service
    baseUrl: string;

    // Transport timeouts
    connectTimeoutMs: number;
    readTimeoutMs: number;
    writeTimeoutMs: number;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        baseUrl: getEnvVar('TRANSCRIBE_BASE_URL', DEFAULT_BASE_URL).replace(/\/+$/, ''),

        connectTimeoutMs: getEnvVarNumber('TRANSCRIBE_CONNECT_TIMEOUT_MS', 30000),
        readTimeoutMs: getEnvVarNumber('TRANSCRIBE_READ_TIMEOUT_MS', 60000),
        writeTimeoutMs: getEnvVarNumber('TRANSCRIBE_WRITE_TIMEOUT_MS', 60000),
    };
}

/**
 * Validates the loaded values. Returns one message per problem.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!/^https?:\/\//.test(config.baseUrl)) {
        errors.push(`TRANSCRIBE_BASE_URL must be an http(s) URL, got: ${config.baseUrl}`);
    }

    const timeouts: Array<[string, number]> = [
        ['TRANSCRIBE_CONNECT_TIMEOUT_MS', config.connectTimeoutMs],
        ['TRANSCRIBE_READ_TIMEOUT_MS', config.readTimeoutMs],
        ['TRANSCRIBE_WRITE_TIMEOUT_MS', config.writeTimeoutMs],
    ];
    for (const [key, value] of timeouts) {
        if (value <= 0) {
            errors.push(`${key} must be positive, got: ${value}`);
        }
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
