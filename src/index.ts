import cron from 'node-cron';
import { loadConfig } from './config/env.js';
import { logger } from './config/logger.js';
import { SchemaValidator } from './contracts/schema-validator.js';
import { CrossingEngine } from './engine/crossing.js';
import { FeedPublisher } from './feed/rss.js';
import { Metrics } from './metrics/counter.js';
import { FloodMonitor } from './monitor/flood-monitor.js';
import { HttpReadingSource } from './source/http-source.js';
import { AlertStateStore } from './state/store.js';
import { loadThresholds } from './thresholds/loader.js';

async function main() {
    logger.info('Starting river level alerts');

    // Load configuration
    const config = loadConfig();
    logger.info({ config }, 'Configuration loaded');

    // Initialize schema validator
    const validator = new SchemaValidator(config.contracts.path);
    validator.loadSchemas();

    // Static threshold table and hysteresis margin
    const thresholds = loadThresholds(config.thresholds.path, validator);

    const monitor = new FloodMonitor(
        new HttpReadingSource({
            url: config.source.url,
            timeoutMs: config.source.timeoutMs,
            userAgent: config.source.userAgent,
        }),
        thresholds.table,
        new CrossingEngine(thresholds.hysteresis),
        new AlertStateStore(config.state.path, validator),
        new FeedPublisher(config.feed.path, {
            title: config.feed.title,
            link: config.feed.link,
            description: config.feed.description,
        }),
        new Metrics(),
        {
            regions: config.source.regions,
            heartbeatPolicy: config.feed.heartbeatPolicy,
            link: config.feed.link,
        },
    );

    if (!config.schedule.cron) {
        await monitor.runCycle();
        return;
    }

    if (!cron.validate(config.schedule.cron)) {
        throw new Error(`Invalid cron expression in SCHEDULE: ${config.schedule.cron}`);
    }

    let running = false;
    const task = cron.schedule(config.schedule.cron, () => {
        if (running) {
            logger.warn('Previous cycle still running, tick skipped');
            return;
        }
        running = true;
        monitor
            .runCycle()
            .catch((err) => {
                logger.error({ error: err }, 'Cycle failed');
            })
            .finally(() => {
                running = false;
            });
    });

    logger.info({ schedule: config.schedule.cron }, 'Scheduled mode running');

    // Graceful shutdown
    const shutdown = () => {
        logger.info('Shutting down');
        task.stop();
        process.exit(0);
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
}

main().catch((err) => {
    logger.error({ error: err }, 'Fatal error');
    process.exit(1);
});
