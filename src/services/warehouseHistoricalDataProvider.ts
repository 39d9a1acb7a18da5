import axios, { AxiosInstance } from 'axios';
import { HistoricalSnapshot } from '../types/transaction';
import { HistoricalDataProvider, validateHistoricalSnapshot } from './historicalDataProvider';
import { NotFoundError, UpstreamServiceError } from '../middleware/errorHandler';
import { WarehouseSettings } from '../config/settings';
import { logger } from '../config/logger';

/**
 * Reads precomputed account metrics from the analytics warehouse API.
 * A single attempt per request; failures are not retried.
 */
export class WarehouseHistoricalDataProvider implements HistoricalDataProvider {
    readonly name = 'warehouse';
    private client: AxiosInstance;

    constructor(baseUrl: string, options: Pick<WarehouseSettings, 'apiKey' | 'timeoutMs'>) {
        this.client = axios.create({
            baseURL: baseUrl,
            timeout: options.timeoutMs,
            headers: {
                'Accept': 'application/json',
                ...(options.apiKey ? { 'x-api-key': options.apiKey } : {})
            }
        });
    }

    async getHistoricalData(accountNumber: string): Promise<HistoricalSnapshot> {
        const path = `/accounts/${encodeURIComponent(accountNumber)}/historical-metrics`;

        let payload: unknown;
        try {
            const response = await this.client.get<unknown>(path);
            payload = response.data;
        } catch (error) {
            if (axios.isAxiosError(error) && error.response?.status == 404) {
                throw new NotFoundError(`Account ${accountNumber} not found`);
            }

            logger.error('Error calling historical data warehouse', {
                accountNumber,
                error: error instanceof Error ? error.message : String(error)
            });
            throw new UpstreamServiceError('Historical data warehouse unavailable');
        }

        return validateHistoricalSnapshot(payload, this.name);
    }
}
