import pino from 'pino';
import { config } from '../config';

const REDACTED_PATHS = [
    'req.headers.authorization',
    'req.headers.cookie',
    '*.password',
    '*.newPassword',
    '*.refreshToken',
    '*.accessToken',
];

function resolveLevel(): string {
    if (config.logLevel) return config.logLevel;
    switch (config.nodeEnv) {
        case 'production':
            return 'info';
        case 'test':
            return 'silent';
        default:
            return 'debug';
    }
}

/** Pretty output for local development, when the optional transport is installed */
function prettyTransport(): pino.LoggerOptions['transport'] {
    if (config.nodeEnv !== 'development') return undefined;
    try {
        require.resolve('pino-pretty');
    } catch {
        return undefined;
    }
    return { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l' } };
}

export const logger = pino({
    level: resolveLevel(),
    serializers: pino.stdSerializers,
    base: { service: 'contacts-auth' },
    redact: REDACTED_PATHS,
    transport: prettyTransport(),
});

export function createChildLogger(context: Record<string, unknown>) {
    return logger.child(context);
}
