import { HistoricalDataProvider } from './historicalDataProvider';
import { RiskScoringService } from './riskScoringService';
import { AccountProfileService } from './accountProfileService';
import { BehavioralPatternService } from './behavioralPatternService';
import { AnomalyDetectionService } from './anomalyDetectionService';
import { AccountMetricsResponse, ProcessTransactionResponse, TransactionRequest } from '../types/transaction';
import { formatLocalTimestamp, formatTransactionId } from '../utils/time';
import { logger } from '../config/logger';

export interface RiskAnalysisDependencies {
    historicalData: HistoricalDataProvider;
    riskScoring?: RiskScoringService;
    accountProfile?: AccountProfileService;
    behavioralPatterns?: BehavioralPatternService;
    anomalyDetection?: AnomalyDetectionService;
    clock?: () => Date;
}

export class RiskAnalysisService {
    private historicalData: HistoricalDataProvider;
    private riskScoring: RiskScoringService;
    private accountProfile: AccountProfileService;
    private behavioralPatterns: BehavioralPatternService;
    private anomalyDetection: AnomalyDetectionService;
    private clock: () => Date;

    constructor(deps: RiskAnalysisDependencies) {
        this.historicalData = deps.historicalData;
        this.riskScoring = deps.riskScoring ?? new RiskScoringService();
        this.accountProfile = deps.accountProfile ?? new AccountProfileService();
        this.behavioralPatterns = deps.behavioralPatterns ?? new BehavioralPatternService();
        this.anomalyDetection = deps.anomalyDetection ?? new AnomalyDetectionService();
        this.clock = deps.clock ?? (() => new Date());
    }

    async processTransaction(transaction: TransactionRequest): Promise<ProcessTransactionResponse> {
        const snapshot = await this.historicalData.getHistoricalData(transaction.account_number);

        const now = this.clock();
        const assessment = this.riskScoring.calculateRiskMetrics(transaction, snapshot, now);

        const result: ProcessTransactionResponse = {
            transaction_id: formatTransactionId(now),
            account_number: transaction.account_number,
            ...assessment,
            processing_timestamp: formatLocalTimestamp(now)
        };

        logger.info('Transaction scored', {
            transactionId: result.transaction_id,
            tenantId: transaction.tenant_id,
            accountNumber: transaction.account_number,
            amount: transaction.transaction_amount,
            riskScore: result.risk_score,
            riskLevel: result.risk_level,
            source: this.historicalData.name
        });

        return result;
    }

    async getAccountMetrics(accountNumber: string): Promise<AccountMetricsResponse> {
        const snapshot = await this.historicalData.getHistoricalData(accountNumber);

        const result: AccountMetricsResponse = {
            account_number: accountNumber,
            historical_metrics: snapshot,
            calculated_metrics: {
                risk_profile: this.accountProfile.calculateAccountRiskProfile(snapshot),
                behavioral_patterns: this.behavioralPatterns.analyzeBehavioralPatterns(snapshot),
                anomaly_indicators: this.anomalyDetection.detectAnomalyIndicators(snapshot)
            },
            last_updated: formatLocalTimestamp(this.clock())
        };

        logger.debug('Account metrics calculated', {
            accountNumber,
            profile: result.calculated_metrics.risk_profile.profile_type,
            anomalies: result.calculated_metrics.anomaly_indicators
        });

        return result;
    }
}
