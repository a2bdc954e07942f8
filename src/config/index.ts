import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;
    corsOrigins: string[];

    // OpenAI
    openaiApiKey: string;
    openaiModel: string;
    openaiBaseUrl: string;
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

function getEnvVarList(key: string, defaultValue: string): string[] {
    return getEnvVar(key, defaultValue)
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
}

/**
 * Loads configuration from environment variables.
 * Missing credentials are reported by validateConfig, not here.
 */
export function loadConfig(): Config {
    return {
        // Server
        port: getEnvVarNumber('PORT', 3000),
        environment: getEnvVar('NODE_ENV', 'development'),
        corsOrigins: getEnvVarList('CORS_ORIGINS', 'http://localhost:3000,http://localhost:8080'),

        // OpenAI
        openaiApiKey: getEnvVar('OPENAI_API_KEY', ''),
        openaiModel: getEnvVar('OPENAI_MODEL', 'gpt-4o-mini'),
        openaiBaseUrl: getEnvVar('OPENAI_BASE_URL', 'https://api.openai.com').replace(/\/+$/, ''),
    };
}

/**
 * Validates that the configuration is usable before the server starts.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!config.openaiApiKey) {
        errors.push('OPENAI_API_KEY is required for post generation');
    }
    if (!config.openaiModel) {
        errors.push('OPENAI_MODEL cannot be empty');
    }
    if (!Number.isInteger(config.port) || config.port <= 0) {
        errors.push(`PORT must be a positive integer, got: ${config.port}`);
    }

    return errors;
}
