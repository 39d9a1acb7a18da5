import { AccountProfile, HistoricalSnapshot } from '../types/transaction';

export class AccountProfileService {

    calculateAccountRiskProfile(snapshot: HistoricalSnapshot): AccountProfile {
        const avgAmount = snapshot.avg_transaction_amount;
        const transactionCount = snapshot.transaction_count_30d;
        const accountAge = snapshot.account_age_days;

        let profile: string;
        let riskFactor: number;

        if (avgAmount > 1000 && transactionCount > 50) {
            profile = 'HIGH_VOLUME';
            riskFactor = 0.8;
        } else if (avgAmount < 200 && transactionCount < 10) {
            profile = 'LOW_VOLUME';
            riskFactor = 0.3;
        } else {
            profile = 'MEDIUM_VOLUME';
            riskFactor = 0.5;
        }

        if (accountAge < 90) {
            riskFactor += 0.2;
            profile += '_NEW';
        } else if (accountAge > 365) {
            riskFactor -= 0.1;
            profile += '_ESTABLISHED';
        }

        return {
            profile_type: profile,
            risk_factor: Math.round(riskFactor * 100) / 100,
            stability_score: Math.min(accountAge / 365 * 100, 100)
        };
    }
}
