import Joi from 'joi';

export type HistoricalDataSource = 'synthetic' | 'postgres' | 'warehouse';

export interface DatabaseSettings {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
}

export interface WarehouseSettings {
    baseUrl?: string;
    apiKey?: string;
    timeoutMs: number;
}

export interface Settings {
    nodeEnv: 'development' | 'production' | 'test';
    port: number;
    logLevel: string;
    /** Reported by the health endpoint. */
    environment: string;
    version: string;
    routePrefix: string;
    functionKey?: string;
    historicalDataSource: HistoricalDataSource;
    database: DatabaseSettings;
    warehouse: WarehouseSettings;
}

interface EnvVars {
    NODE_ENV: Settings['nodeEnv'];
    PORT: number;
    LOG_LEVEL: string;
    APP_ENVIRONMENT: string;
    APP_VERSION: string;
    ROUTE_PREFIX: string;
    FUNCTION_KEY: string;
    HISTORICAL_DATA_SOURCE: HistoricalDataSource;
    DB_HOST: string;
    DB_PORT: number;
    DB_NAME: string;
    DB_USER: string;
    DB_PASSWORD: string;
    WAREHOUSE_API_URL?: string;
    WAREHOUSE_API_KEY?: string;
    WAREHOUSE_TIMEOUT_MS: number;
}

const envSchema = Joi.object<EnvVars>({
    NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
    PORT: Joi.number().port().default(3000),
    LOG_LEVEL: Joi.string()
        .valid('error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly')
        .default('info'),
    APP_ENVIRONMENT: Joi.string().default('development'),
    APP_VERSION: Joi.string().default('1.0.0'),
    ROUTE_PREFIX: Joi.string().pattern(/^\/[\w\-/]*$/).default('/api'),
    FUNCTION_KEY: Joi.string().allow('').default(''),
    HISTORICAL_DATA_SOURCE: Joi.string().valid('synthetic', 'postgres', 'warehouse').default('synthetic'),
    DB_HOST: Joi.string().default('localhost'),
    DB_PORT: Joi.number().port().default(5432),
    DB_NAME: Joi.string().default('account_history'),
    DB_USER: Joi.string().default('risk_reader'),
    DB_PASSWORD: Joi.string().allow('').default(''),
    WAREHOUSE_API_URL: Joi.string().uri({ scheme: ['http', 'https'] }).when('HISTORICAL_DATA_SOURCE', {
        is: 'warehouse',
        then: Joi.string().required()
    }),
    WAREHOUSE_API_KEY: Joi.string().optional(),
    WAREHOUSE_TIMEOUT_MS: Joi.number().integer().min(100).default(5000)
}).unknown(true);

export const loadSettings = (env: NodeJS.ProcessEnv = process.env): Readonly<Settings> => {
    const result = envSchema.validate(env, { abortEarly: false });

    if (result.error) {
        throw new Error(`Invalid configuration: ${result.error.details.map(d => d.message).join('; ')}`);
    }
    const value = result.value;

    return Object.freeze({
        nodeEnv: value.NODE_ENV,
        port: value.PORT,
        logLevel: value.LOG_LEVEL,
        environment: value.APP_ENVIRONMENT,
        version: value.APP_VERSION,
        routePrefix: value.ROUTE_PREFIX,
        functionKey: value.FUNCTION_KEY || undefined,
        historicalDataSource: value.HISTORICAL_DATA_SOURCE,
        database: Object.freeze({
            host: value.DB_HOST,
            port: value.DB_PORT,
            database: value.DB_NAME,
            user: value.DB_USER,
            password: value.DB_PASSWORD
        }),
        warehouse: Object.freeze({
            baseUrl: value.WAREHOUSE_API_URL,
            apiKey: value.WAREHOUSE_API_KEY,
            timeoutMs: value.WAREHOUSE_TIMEOUT_MS
        })
    });
};

export const settings = loadSettings();
