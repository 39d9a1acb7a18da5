import { Pool, PoolConfig } from 'pg';
import { DatabaseSettings } from './settings';
import { logger } from './logger';

export const createPool = (database: DatabaseSettings): Pool => {
    const dbConfig: PoolConfig = {
        host: database.host,
        port: database.port,
        database: database.database,
        user: database.user,
        password: database.password,

        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 5000,
    };

    const pool = new Pool(dbConfig);

    pool.on('connect', () => {
        logger.debug('New PostgreSQL client connected');
    });

    pool.on('error', (err) => {
        logger.error('PostgreSQL client error:', err);
    });

    return pool;
};

export const testConnection = async (pool: Pool): Promise<boolean> => {
    try {
        const client = await pool.connect();
        const result = await client.query('SELECT NOW()');

        client.release();

        logger.info('Database connection successful', result.rows[0]);
        return true;
    } catch (error) {
        logger.error('Database connection failed', error);
        return false;
    }
};
