import Joi from 'joi';
import { HistoricalSnapshot } from '../types/transaction';

/**
 * Source of per-account history. Implementations may be random, backed by a
 * database, or a remote warehouse; the scoring code only relies on the shape.
 */
export interface HistoricalDataProvider {
    readonly name: string;
    getHistoricalData(accountNumber: string): Promise<HistoricalSnapshot>;
}

// kept as sent: Joi's isoDate() would rewrite naive local times as UTC
const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)?(?:Z|[+-]\d{2}:?\d{2})?$/;

const historicalSnapshotSchema = Joi.object<HistoricalSnapshot>({
    avg_transaction_amount: Joi.number().min(0).required(),
    std_transaction_amount: Joi.number().min(0).required(),
    transaction_count_30d: Joi.number().integer().min(0).required(),
    avg_daily_transactions: Joi.number().min(0).required(),
    max_transaction_amount: Joi.number().required(),
    min_transaction_amount: Joi.number().required(),
    account_age_days: Joi.number().integer().min(0).required(),
    last_transaction_date: Joi.string().pattern(ISO_TIMESTAMP, 'ISO-8601 timestamp').required(),
    common_channels: Joi.array().items(Joi.string()).required(),
    common_causals: Joi.array().items(Joi.string()).required()
}).options({ stripUnknown: true });

export const validateHistoricalSnapshot = (raw: unknown, source: string): HistoricalSnapshot => {
    const result = historicalSnapshotSchema.validate(raw, { abortEarly: false });

    if (result.error) {
        throw new Error(
            `Malformed historical data from ${source}: ${result.error.details.map(d => d.message).join('; ')}`
        );
    }

    return result.value;
};
