import pino from 'pino';
import { loadConfig } from './env.js';

const config = loadConfig();
const isTest = process.env.NODE_ENV === 'test';

export const logger = pino({
    level: isTest ? 'silent' : config.log.level,
    transport:
        process.env.NODE_ENV !== 'production' && !isTest
            ? {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'SYS:standard',
                    ignore: 'pid,hostname',
                },
            }
            : undefined,
});
