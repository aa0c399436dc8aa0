import { config } from 'dotenv';

// Load .env file if present
config();

export const HEARTBEAT_POLICIES = ['every-run', 'daily'] as const;
export type HeartbeatPolicy = (typeof HEARTBEAT_POLICIES)[number];

export interface AppConfig {
    source: {
        url: string;
        timeoutMs: number;
        userAgent: string;
        regions: string[];
    };
    contracts: {
        path: string;
    };
    thresholds: {
        path: string;
    };
    state: {
        path: string;
    };
    feed: {
        path: string;
        title: string;
        description: string;
        link: string;
        heartbeatPolicy: HeartbeatPolicy;
    };
    schedule: {
        cron: string;
    };
    log: {
        level: string;
    };
}

const DEFAULT_SOURCE_URL = 'https://www.redhidrosurmedioambiente.es/saih/resumen/rios';

function getEnv(key: string, defaultValue: string): string {
    return process.env[key] || defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (!value) return defaultValue;
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
        throw new Error(`Invalid number for environment variable ${key}: ${value}`);
    }
    return parsed;
}

function getEnvList(key: string): string[] {
    return getEnv(key, '')
        .split(',')
        .map((item) => item.trim().toUpperCase())
        .filter((item) => item.length > 0);
}

function getHeartbeatPolicy(key: string, defaultValue: HeartbeatPolicy): HeartbeatPolicy {
    const value = process.env[key];
    if (!value) return defaultValue;
    const policy = HEARTBEAT_POLICIES.find((candidate) => candidate === value);
    if (!policy) {
        throw new Error(
            `Invalid value for environment variable ${key}: ${value} (expected ${HEARTBEAT_POLICIES.join(' or ')})`,
        );
    }
    return policy;
}

export function loadConfig(): AppConfig {
    const sourceUrl = getEnv('SOURCE_URL', DEFAULT_SOURCE_URL);

    return {
        source: {
            url: sourceUrl,
            timeoutMs: getEnvNumber('SOURCE_TIMEOUT_MS', 30000),
            userAgent: getEnv('SOURCE_USER_AGENT', 'river-level-alerts/1.0'),
            regions: getEnvList('REGION_FILTER'),
        },
        contracts: {
            path: getEnv('CONTRACTS_PATH', './contracts'),
        },
        thresholds: {
            path: getEnv('THRESHOLDS_PATH', './config/thresholds.json'),
        },
        state: {
            path: getEnv('STATE_PATH', './state.json'),
        },
        feed: {
            path: getEnv('FEED_PATH', './rss.xml'),
            title: getEnv('FEED_TITLE', 'River level alerts'),
            description: getEnv(
                'FEED_DESCRIPTION',
                'Automatic alerts when a gauging station mean level crosses severity level 1, 2 or 3.',
            ),
            link: getEnv('FEED_LINK', sourceUrl),
            heartbeatPolicy: getHeartbeatPolicy('HEARTBEAT_POLICY', 'every-run'),
        },
        schedule: {
            cron: getEnv('SCHEDULE', ''),
        },
        log: {
            level: getEnv('LOG_LEVEL', 'info'),
        },
    };
}
