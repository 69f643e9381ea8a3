type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMetadata = Record<string, unknown>;

export const getLogMode = (): 'production' | 'development' | 'test' => {
    const env = typeof process !== 'undefined' ? process.env : undefined;
    if (env?.NODE_ENV === 'production') return 'production';
    if (env?.NODE_ENV === 'test' || env?.VITEST === 'true') return 'test';
    return 'development';
};

// Anything that could hold document text or secrets
const REDACT_KEYS = [/text$/i, /original/i, /canonical/i, /snippet/i, /salt/i, /secret/i, /document/i, /entity/i];

export const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

export const redactValue = (value: unknown): unknown => {
    if (typeof value === 'string') {
        // Short labels and ids pass; long payloads never do
        if (value.length > 120 || value.includes('\n')) {
            return '[REDACTED]';
        }
        return value;
    }

    if (Array.isArray(value)) {
        return value.map((v) => redactValue(v));
    }

    if (isRecord(value)) {
        const out: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(value)) {
            out[k] = REDACT_KEYS.some((re) => re.test(k)) ? '[REDACTED]' : redactValue(v);
        }
        return out;
    }

    return value;
};

const shouldLog = (level: LogLevel): boolean => {
    const mode = getLogMode();
    if (mode === 'development') return true;
    return level === 'warn' || level === 'error';
};

const emit = (level: LogLevel, message: string, metadata?: LogMetadata): void => {
    if (!shouldLog(level)) return;

    const redacted = metadata ? redactValue(metadata) : undefined;
    const entry = {
        timestamp: new Date().toISOString(),
        level,
        message: redactValue(message),
        ...(isRecord(redacted) ? redacted : {}),
    };

    if (level === 'error') {
        console.error(JSON.stringify(entry));
    } else if (level === 'warn') {
        console.warn(JSON.stringify(entry));
    } else if (level === 'info') {
        console.info(JSON.stringify(entry));
    } else {
        console.log(JSON.stringify(entry));
    }
};

export const appLogger = {
    debug(message: string, metadata?: LogMetadata) {
        emit('debug', message, metadata);
    },
    info(message: string, metadata?: LogMetadata) {
        emit('info', message, metadata);
    },
    warn(message: string, metadata?: LogMetadata) {
        emit('warn', message, metadata);
    },
    error(message: string, metadata?: LogMetadata) {
        emit('error', message, metadata);
    },
};

export type AppLogger = typeof appLogger;
