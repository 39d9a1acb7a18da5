import { HistoricalSnapshot } from '../types/transaction';
import { HistoricalDataProvider } from './historicalDataProvider';
import { RandomSource, randomInt, uniform } from '../utils/random';
import { formatLocalTimestamp, MS_PER_DAY } from '../utils/time';

/**
 * Stand-in for a data warehouse: fabricates a plausible snapshot for any
 * account number.
 */
export class SyntheticHistoricalDataProvider implements HistoricalDataProvider {
    readonly name = 'synthetic';

    constructor(
        private readonly random: RandomSource = Math.random,
        private readonly clock: () => Date = () => new Date()
    ) {}

    async getHistoricalData(_accountNumber: string): Promise<HistoricalSnapshot> {
        const daysSinceLast = randomInt(this.random, 1, 30);
        const lastTransaction = new Date(this.clock().getTime() - daysSinceLast * MS_PER_DAY);

        return {
            avg_transaction_amount: uniform(this.random, 100, 1000),
            std_transaction_amount: uniform(this.random, 50, 200),
            transaction_count_30d: randomInt(this.random, 10, 100),
            avg_daily_transactions: uniform(this.random, 1, 10),
            max_transaction_amount: uniform(this.random, 1000, 5000),
            min_transaction_amount: uniform(this.random, 10, 100),
            account_age_days: randomInt(this.random, 30, 1000),
            last_transaction_date: formatLocalTimestamp(lastTransaction),
            common_channels: ['WEB', 'MOBILE', 'ATM'],
            common_causals: ['TRANSFER', 'PAYMENT', 'WITHDRAWAL']
        };
    }
}
