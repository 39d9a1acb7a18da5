import { BehavioralPatterns, HistoricalSnapshot, TimePattern } from '../types/transaction';
import { pick, RandomSource, uniform } from '../utils/random';

const TIME_PATTERNS: readonly TimePattern[] = ['DAYTIME', 'NIGHTTIME', 'MIXED'];

/**
 * Descriptive indicators only; nothing downstream makes decisions on them.
 */
export class BehavioralPatternService {
    constructor(private readonly random: RandomSource = Math.random) {}

    analyzeBehavioralPatterns(snapshot: HistoricalSnapshot): BehavioralPatterns {
        return {
            transaction_regularity: uniform(this.random, 0.5, 1.0),
            amount_consistency: uniform(this.random, 0.3, 0.9),
            channel_preference: pick(this.random, snapshot.common_channels) ?? 'UNKNOWN',
            time_pattern: pick(this.random, TIME_PATTERNS) ?? 'MIXED',
            seasonal_variation: uniform(this.random, 0.1, 0.5)
        };
    }
}
