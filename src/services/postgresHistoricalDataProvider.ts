import { HistoricalSnapshot } from '../types/transaction';
import { HistoricalDataProvider, validateHistoricalSnapshot } from './historicalDataProvider';
import { DatabaseError, NotFoundError } from '../middleware/errorHandler';
import { logger } from '../config/logger';

/** The slice of `pg.Pool` this provider needs. */
export interface SqlClient {
    query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

const SNAPSHOT_QUERY = `
    WITH history AS (
        SELECT amount, channel, causal_code, created_at
        FROM account_transactions
        WHERE account_number = $1
    )
    SELECT
        COALESCE(AVG(h.amount), 0)::float8 AS avg_transaction_amount,
        COALESCE(STDDEV_POP(h.amount), 0)::float8 AS std_transaction_amount,
        COUNT(*) FILTER (WHERE h.created_at >= NOW() - INTERVAL '30 days')::int AS transaction_count_30d,
        (COUNT(*) FILTER (WHERE h.created_at >= NOW() - INTERVAL '30 days') / 30.0)::float8 AS avg_daily_transactions,
        COALESCE(MAX(h.amount), 0)::float8 AS max_transaction_amount,
        COALESCE(MIN(h.amount), 0)::float8 AS min_transaction_amount,
        GREATEST(DATE_PART('day', NOW() - a.opened_at), 0)::int AS account_age_days,
        TO_CHAR(COALESCE(MAX(h.created_at), a.opened_at), 'YYYY-MM-DD"T"HH24:MI:SS') AS last_transaction_date,
        ARRAY(
            SELECT channel FROM history GROUP BY channel ORDER BY COUNT(*) DESC, channel LIMIT 3
        ) AS common_channels,
        ARRAY(
            SELECT causal_code FROM history GROUP BY causal_code ORDER BY COUNT(*) DESC, causal_code LIMIT 3
        ) AS common_causals
    FROM accounts a
    LEFT JOIN history h ON TRUE
    WHERE a.account_number = $1
    GROUP BY a.opened_at
`;

export class PostgresHistoricalDataProvider implements HistoricalDataProvider {
    readonly name = 'postgres';

    constructor(private readonly db: SqlClient) {}

    async getHistoricalData(accountNumber: string): Promise<HistoricalSnapshot> {
        let rows: unknown[];

        try {
            const result = await this.db.query(SNAPSHOT_QUERY, [accountNumber]);
            rows = result.rows;
        } catch (error) {
            logger.error('Error loading historical data', {
                accountNumber,
                error: error instanceof Error ? error.message : String(error)
            });
            throw new DatabaseError('Historical data lookup failed');
        }

        if (rows.length == 0) {
            throw new NotFoundError(`Account ${accountNumber} not found`);
        }

        return validateHistoricalSnapshot(rows[0], this.name);
    }
}
