import dotenv from 'dotenv';

dotenv.config();

export interface Config {
    // Upstream sensor API
    sensorApiBaseUrl: string;
    httpTimeoutMs: number;

    // HTTP endpoint
    port: number;

    // Logging
    logLevel: string;
    logDir: string;

    // File output
    outputDir: string;
}

export const DEFAULT_SENSOR_API_BASE_URL = 'https://smart-urban-heat-map.ch/api/v2';

function getEnvVarOptional(name: string, defaultValue: string): string {
    return process.env[name] || defaultValue;
}

export function getEnvVarNumber(name: string, defaultValue: number): number {
    const value = process.env[name];
    if (!value) return defaultValue;
    const parsed = parseFloat(value);
    if (isNaN(parsed)) return defaultValue;
    return parsed;
}

export const config: Config = {
    sensorApiBaseUrl: getEnvVarOptional('SENSOR_API_BASE_URL', DEFAULT_SENSOR_API_BASE_URL),
    httpTimeoutMs: getEnvVarNumber('HTTP_TIMEOUT_MS', 15000),

    port: getEnvVarNumber('PORT', 5000),

    logLevel: getEnvVarOptional('LOG_LEVEL', 'info'),
    logDir: getEnvVarOptional('LOG_DIR', 'logs'),

    outputDir: getEnvVarOptional('OUTPUT_DIR', '.'),
};

export function validateConfig(cfg: Config = config): void {
    if (!/^https?:\/\//.test(cfg.sensorApiBaseUrl)) {
        throw new Error(`SENSOR_API_BASE_URL must be an http(s) URL, got "${cfg.sensorApiBaseUrl}"`);
    }
    if (cfg.httpTimeoutMs <= 0) {
        throw new Error('HTTP_TIMEOUT_MS must be positive');
    }
    if (!Number.isInteger(cfg.port) || cfg.port < 0 || cfg.port > 65535) {
        throw new Error(`PORT must be an integer between 0 and 65535, got ${cfg.port}`);
    }
}
