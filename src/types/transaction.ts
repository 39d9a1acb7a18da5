export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH';

export interface TransactionRequest {
    tenant_id: string;
    client_id: string;
    account_number: string;
    transaction_amount: number;
    causal_code: string;
    currency: string;
    channel: string;
    timestamp: string;
}

export interface HistoricalSnapshot {
    avg_transaction_amount: number;
    std_transaction_amount: number;
    transaction_count_30d: number;
    avg_daily_transactions: number;
    max_transaction_amount: number;
    min_transaction_amount: number;
    account_age_days: number;
    last_transaction_date: string;
    common_channels: string[];
    common_causals: string[];
}

export interface RiskMetrics {
    amount_deviation: number;
    amount_ratio: number;
    frequency_score: number;
    /** Whole days between the last known transaction and now. */
    time_since_last: number;
    account_maturity: number;
}

export interface RiskAssessment {
    risk_score: number;
    risk_level: RiskLevel;
    metrics: RiskMetrics;
    recommendations: string[];
}

export interface AccountProfile {
    profile_type: string;
    risk_factor: number;
    stability_score: number;
}

export type TimePattern = 'DAYTIME' | 'NIGHTTIME' | 'MIXED';

export interface BehavioralPatterns {
    transaction_regularity: number;
    amount_consistency: number;
    channel_preference: string;
    time_pattern: TimePattern;
    seasonal_variation: number;
}

export type AnomalyIndicator =
    | 'ATYPICAL_HIGH_TRANSACTION'
    | 'HIGH_FREQUENCY'
    | 'NEW_ACCOUNT'
    | 'NORMAL_BEHAVIOR';

export interface ProcessTransactionResponse extends RiskAssessment {
    transaction_id: string;
    account_number: string;
    processing_timestamp: string;
}

export interface AccountMetricsResponse {
    account_number: string;
    historical_metrics: HistoricalSnapshot;
    calculated_metrics: {
        risk_profile: AccountProfile;
        behavioral_patterns: BehavioralPatterns;
        anomaly_indicators: AnomalyIndicator[];
    };
    last_updated: string;
}
