import dotenv from 'dotenv';

// Load environment variables from .env file
dotenv.config();

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVEL_NAMES: readonly string[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && LOG_LEVEL_NAMES.includes(value);
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
    const normalized = value?.trim().toLowerCase();
    return isLogLevel(normalized) ? normalized : fallback;
}

export function parseBooleanFlag(value: string | undefined, fallback = false): boolean {
    if (value === undefined) return fallback;
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true' || normalized === '1' || normalized === 'yes') return true;
    if (normalized === 'false' || normalized === '0' || normalized === 'no' || normalized === '') return false;
    return fallback;
}

export type ModelResponseConfig = {
    logging: {
        level: LogLevel;
    };
    response: {
        /** Run accumulated tool arguments through jsonrepair before giving up on them */
        repairToolArguments: boolean;
    };
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ModelResponseConfig {
    return {
        logging: {
            level: parseLogLevel(env.LOG_LEVEL)
        },
        response: {
            repairToolArguments: parseBooleanFlag(env.MODEL_RESPONSE_REPAIR_TOOL_ARGUMENTS)
        }
    };
}

export const config = loadConfig();
