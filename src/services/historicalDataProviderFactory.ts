import { Settings } from '../config/settings';
import { HistoricalDataProvider } from './historicalDataProvider';
import { PostgresHistoricalDataProvider, SqlClient } from './postgresHistoricalDataProvider';
import { SyntheticHistoricalDataProvider } from './syntheticHistoricalDataProvider';
import { WarehouseHistoricalDataProvider } from './warehouseHistoricalDataProvider';

export const createHistoricalDataProvider = (
    settings: Pick<Settings, 'historicalDataSource' | 'warehouse'>,
    db?: SqlClient
): HistoricalDataProvider => {
    switch (settings.historicalDataSource) {
        case 'synthetic':
            return new SyntheticHistoricalDataProvider();
        case 'postgres':
            if (!db) {
                throw new Error('The postgres historical data source needs a database client');
            }
            return new PostgresHistoricalDataProvider(db);
        case 'warehouse':
            if (!settings.warehouse.baseUrl) {
                throw new Error('WAREHOUSE_API_URL is required for the warehouse historical data source');
            }
            return new WarehouseHistoricalDataProvider(settings.warehouse.baseUrl, settings.warehouse);
    }
};
