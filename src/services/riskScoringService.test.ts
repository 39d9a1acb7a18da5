import { classifyRiskLevel, RiskScoringService } from './riskScoringService';
import { HistoricalSnapshot } from '../types/transaction';

const now = new Date(2026, 5, 15, 12, 0, 0);

const snapshot = (overrides: Partial<HistoricalSnapshot> = {}): HistoricalSnapshot => ({
    avg_transaction_amount: 200,
    std_transaction_amount: 50,
    transaction_count_30d: 300,
    avg_daily_transactions: 10,
    max_transaction_amount: 900,
    min_transaction_amount: 20,
    account_age_days: 1825,
    last_transaction_date: '2026-06-15T12:00:00',
    common_channels: ['WEB', 'MOBILE'],
    common_causals: ['PAYMENT'],
    ...overrides
});

describe('RiskScoringService', () => {
    const service = new RiskScoringService();

    it('uses zero deviation when the historical spread is zero', () => {
        const result = service.calculateRiskMetrics(
            { transaction_amount: 5000 },
            snapshot({ std_transaction_amount: 0 }),
            now
        );

        expect(result.metrics.amount_deviation).toBe(0);
    });

    it('uses a ratio of one when the historical average is zero', () => {
        const result = service.calculateRiskMetrics(
            { transaction_amount: 75 },
            snapshot({ avg_transaction_amount: 0 }),
            now
        );

        expect(result.metrics.amount_ratio).toBe(1);
    });

    it('derives every metric for an ordinary account', () => {
        const result = service.calculateRiskMetrics(
            { transaction_amount: 220 },
            snapshot({
                std_transaction_amount: 100,
                transaction_count_30d: 240,
                account_age_days: 1460,
                last_transaction_date: '2026-05-31T12:00:00'
            }),
            now
        );

        expect(result.metrics.amount_deviation).toBeCloseTo(0.2, 10);
        expect(result.metrics.amount_ratio).toBeCloseTo(1.1, 10);
        expect(result.metrics.frequency_score).toBe(8);
        expect(result.metrics.time_since_last).toBe(15);
        expect(result.metrics.account_maturity).toBe(4);
        expect(result.risk_score).toBeCloseTo(66, 2);
        expect(result.risk_level).toBe('MEDIUM');
        expect(result.recommendations).toEqual(['review patterns', 'additional monitoring recommended']);
    });

    it('scores a routine transaction on a mature, busy account as LOW', () => {
        const result = service.calculateRiskMetrics(
            { transaction_amount: 200 },
            snapshot({ last_transaction_date: '2026-06-09T12:00:00' }),
            now
        );

        expect(result.metrics).toEqual({
            amount_deviation: 0,
            amount_ratio: 1,
            frequency_score: 10,
            time_since_last: 6,
            account_maturity: 5
        });
        expect(result.risk_score).toBe(3);
        expect(result.risk_level).toBe('LOW');
        expect(result.recommendations).toEqual(['normal transaction', 'continue standard monitoring']);
    });

    it('only penalises ratios above one', () => {
        const result = service.calculateRiskMetrics({ transaction_amount: 250 }, snapshot(), now);

        expect(result.risk_score).toBeCloseTo(36.25, 2);
        expect(result.risk_level).toBe('MEDIUM');
    });

    it('caps the score at 100', () => {
        const result = service.calculateRiskMetrics(
            { transaction_amount: 10000 },
            snapshot({ avg_transaction_amount: 100, transaction_count_30d: 5, account_age_days: 30 }),
            now
        );

        expect(result.risk_score).toBe(100);
        expect(result.risk_level).toBe('HIGH');
        expect(result.recommendations).toEqual(['manual review required', 'possible fraudulent transaction']);
    });

    it('floors the score at 0 when the last transaction is in the future', () => {
        const result = service.calculateRiskMetrics(
            { transaction_amount: 200 },
            snapshot({ last_transaction_date: '2026-08-14T12:00:00' }),
            now
        );

        expect(result.metrics.time_since_last).toBe(-60);
        expect(result.risk_score).toBe(0);
        expect(result.risk_level).toBe('LOW');
    });

    it('caps frequency at 10 and maturity at 5', () => {
        const result = service.calculateRiskMetrics(
            { transaction_amount: 200 },
            snapshot({ transaction_count_30d: 600, account_age_days: 3650 }),
            now
        );

        expect(result.metrics.frequency_score).toBe(10);
        expect(result.metrics.account_maturity).toBe(5);
    });

    it('counts days on the wall clock when the span crosses a daylight saving change', () => {
        const result = service.calculateRiskMetrics(
            { transaction_amount: 200 },
            snapshot({ last_transaction_date: '2026-03-01T12:00:00' }),
            new Date(2026, 2, 15, 12, 0, 0)
        );

        expect(result.metrics.time_since_last).toBe(14);
    });

    it('reads a trailing UTC designator as local wall-clock time', () => {
        const result = service.calculateRiskMetrics(
            { transaction_amount: 200 },
            snapshot({ last_transaction_date: '2026-06-09T12:00:00Z' }),
            now
        );

        expect(result.metrics.time_since_last).toBe(6);
    });

    it('treats a date-only value as local midnight', () => {
        const result = service.calculateRiskMetrics(
            { transaction_amount: 200 },
            snapshot({ last_transaction_date: '2026-06-05' }),
            now
        );

        expect(result.metrics.time_since_last).toBe(10);
    });

    it('rejects a last transaction date with a non-UTC offset', () => {
        expect(() => service.calculateRiskMetrics(
            { transaction_amount: 200 },
            snapshot({ last_transaction_date: '2026-06-09T12:00:00+02:00' }),
            now
        )).toThrow('Unsupported timezone offset in timestamp: 2026-06-09T12:00:00+02:00');
    });
});

describe('classifyRiskLevel', () => {
    it.each([
        [0, 'LOW'],
        [29.99, 'LOW'],
        [30, 'MEDIUM'],
        [69.99, 'MEDIUM'],
        [70, 'HIGH'],
        [100, 'HIGH']
    ])('classifies %p as %s', (score, level) => {
        expect(classifyRiskLevel(score).risk_level).toBe(level);
    });
});
