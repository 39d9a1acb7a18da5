import { createApp } from './app';
import { settings } from './config/settings';
import { logger } from './config/logger';
import { createPool, testConnection } from './config/database';
import { createHistoricalDataProvider } from './services/historicalDataProviderFactory';
import { SqlClient } from './services/postgresHistoricalDataProvider';

const pool = settings.historicalDataSource == 'postgres' ? createPool(settings.database) : undefined;

if (pool) {
    testConnection(pool).catch(err => logger.error('Database connection check failed', err));
}

if (!settings.functionKey) {
    logger.warn('FUNCTION_KEY is not set: transaction and account routes accept unauthenticated calls');
}

const db: SqlClient | undefined = pool && {
    query: (text, values) => pool.query(text, values)
};

const historicalData = createHistoricalDataProvider(settings, db);
const app = createApp({ settings, historicalData });

const server = app.listen(settings.port, () => {
    logger.info(`Transaction Risk API running on port ${settings.port}`);
    logger.info(`Health check: http://localhost:${settings.port}${settings.routePrefix}/health`);
    logger.info(`Historical data source: ${historicalData.name}`);
});

const shutdown = (signal: string) => {
    logger.info(`${signal} signal received: closing HTTP server`);
    server.close(() => {
        logger.info('HTTP server closed');

        const closePool = pool ? pool.end() : Promise.resolve();
        closePool
            .catch(err => logger.error('Error closing database pool', err))
            .finally(() => process.exit(0));
    });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
