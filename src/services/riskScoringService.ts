import { HistoricalSnapshot, RiskAssessment, RiskLevel, RiskMetrics, TransactionRequest } from '../types/transaction';
import { daysBetween, parseNaiveTimestamp } from '../utils/time';

export interface RiskTier {
    risk_level: RiskLevel;
    recommendations: string[];
}

const round2 = (value: number): number => Math.round(value * 100) / 100;

/** Tiers are closed below: 30 is MEDIUM and 70 is HIGH. */
export const classifyRiskLevel = (riskScore: number): RiskTier => {
    if (riskScore < 30) {
        return {
            risk_level: 'LOW',
            recommendations: ['normal transaction', 'continue standard monitoring']
        };
    }
    if (riskScore < 70) {
        return {
            risk_level: 'MEDIUM',
            recommendations: ['review patterns', 'additional monitoring recommended']
        };
    }
    return {
        risk_level: 'HIGH',
        recommendations: ['manual review required', 'possible fraudulent transaction']
    };
};

export class RiskScoringService {

    calculateRiskMetrics(
        transaction: Pick<TransactionRequest, 'transaction_amount'>,
        snapshot: HistoricalSnapshot,
        now: Date = new Date()
    ): RiskAssessment {
        const metrics = this.deriveMetrics(transaction.transaction_amount, snapshot, now);

        const riskComponents = [
            metrics.amount_deviation * 0.3,
            metrics.amount_ratio > 1 ? (metrics.amount_ratio - 1) * 0.25 : 0,
            (10 - metrics.frequency_score) * 0.2,
            Math.min(metrics.time_since_last / 30, 1) * 0.15,
            (5 - metrics.account_maturity) * 0.1
        ];

        const rawScore = riskComponents.reduce((sum, component) => sum + component, 0) * 100;
        const riskScore = round2(Math.max(0, Math.min(100, rawScore)));

        return {
            risk_score: riskScore,
            ...classifyRiskLevel(riskScore),
            metrics
        };
    }

    private deriveMetrics(amount: number, snapshot: HistoricalSnapshot, now: Date): RiskMetrics {
        const avgAmount = snapshot.avg_transaction_amount;
        const stdAmount = snapshot.std_transaction_amount;

        return {
            amount_deviation: stdAmount > 0 ? Math.abs(amount - avgAmount) / stdAmount : 0,
            amount_ratio: avgAmount > 0 ? amount / avgAmount : 1,
            frequency_score: Math.min(snapshot.transaction_count_30d / 30, 10),
            // TODO: compare in UTC once providers agree on offset-aware timestamps
            time_since_last: daysBetween(parseNaiveTimestamp(snapshot.last_transaction_date), now),
            account_maturity: Math.min(snapshot.account_age_days / 365, 5)
        };
    }
}
