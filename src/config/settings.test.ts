import { loadSettings } from './settings';

describe('loadSettings', () => {
    it('applies defaults', () => {
        const settings = loadSettings({});

        expect(settings).toEqual({
            nodeEnv: 'development',
            port: 3000,
            logLevel: 'info',
            environment: 'development',
            version: '1.0.0',
            routePrefix: '/api',
            functionKey: undefined,
            historicalDataSource: 'synthetic',
            database: {
                host: 'localhost',
                port: 5432,
                database: 'account_history',
                user: 'risk_reader',
                password: ''
            },
            warehouse: {
                baseUrl: undefined,
                apiKey: undefined,
                timeoutMs: 5000
            }
        });
    });

    it('reads overrides from the environment', () => {
        const settings = loadSettings({
            NODE_ENV: 'production',
            PORT: '8080',
            APP_ENVIRONMENT: 'staging',
            FUNCTION_KEY: 'test-secret',
            HISTORICAL_DATA_SOURCE: 'warehouse',
            WAREHOUSE_API_URL: 'https://warehouse.example.test',
            WAREHOUSE_TIMEOUT_MS: '1500'
        });

        expect(settings.nodeEnv).toBe('production');
        expect(settings.port).toBe(8080);
        expect(settings.environment).toBe('staging');
        expect(settings.functionKey).toBe('test-secret');
        expect(settings.historicalDataSource).toBe('warehouse');
        expect(settings.warehouse).toEqual({
            baseUrl: 'https://warehouse.example.test',
            apiKey: undefined,
            timeoutMs: 1500
        });
    });

    it('treats an empty function key as unset', () => {
        expect(loadSettings({ FUNCTION_KEY: '' }).functionKey).toBeUndefined();
    });

    it('returns a frozen object', () => {
        const settings = loadSettings({});

        expect(Object.isFrozen(settings)).toBe(true);
        expect(Object.isFrozen(settings.database)).toBe(true);
    });

    it('rejects an invalid port', () => {
        expect(() => loadSettings({ PORT: 'eighty' })).toThrow('Invalid configuration: "PORT" must be a number');
    });

    it('rejects an unknown data source', () => {
        expect(() => loadSettings({ HISTORICAL_DATA_SOURCE: 'csv' })).toThrow(/HISTORICAL_DATA_SOURCE/);
    });

    it('requires a warehouse URL for the warehouse source', () => {
        expect(() => loadSettings({ HISTORICAL_DATA_SOURCE: 'warehouse' }))
            .toThrow('Invalid configuration: "WAREHOUSE_API_URL" is required');
    });
});
