import { AnomalyIndicator, HistoricalSnapshot } from '../types/transaction';

export class AnomalyDetectionService {

    /** Every rule is evaluated; an account that trips none is `NORMAL_BEHAVIOR`. */
    detectAnomalyIndicators(snapshot: HistoricalSnapshot): AnomalyIndicator[] {
        const indicators: AnomalyIndicator[] = [];

        if (snapshot.max_transaction_amount > snapshot.avg_transaction_amount * 5) {
            indicators.push('ATYPICAL_HIGH_TRANSACTION');
        }

        if (snapshot.transaction_count_30d > 80) {
            indicators.push('HIGH_FREQUENCY');
        }

        if (snapshot.account_age_days < 30) {
            indicators.push('NEW_ACCOUNT');
        }

        return indicators.length > 0 ? indicators : ['NORMAL_BEHAVIOR'];
    }
}
