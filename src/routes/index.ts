import { Router } from 'express';
import { Settings } from '../config/settings';
import { RiskAnalysisService } from '../services/riskAnalysisService';
import { requireFunctionKey } from '../middleware/functionKey';
import { createTransactionRouter } from './transactions';
import { createAccountRouter } from './accounts';
import { createHealthRouter } from './health';

/**
 * Route table. Health is anonymous; everything else sits behind the
 * function key.
 */
export const createRoutes = (settings: Readonly<Settings>, analysis: RiskAnalysisService): Router => {
    const router = Router();

    const authorize = requireFunctionKey(settings.functionKey);

    router.use(createHealthRouter(settings));
    router.use(createTransactionRouter(analysis, authorize));
    router.use(createAccountRouter(analysis, authorize));

    return router;
};
