import { Router, Request, Response, RequestHandler } from 'express';
import { RiskAnalysisService } from '../services/riskAnalysisService';
import { ValidationError, asyncHandler } from '../middleware/errorHandler';

export const createAccountRouter = (analysis: RiskAnalysisService, authorize: RequestHandler): Router => {
    const router = Router();

    router.get('/account/:account_number/metrics', authorize, asyncHandler(async (req: Request, res: Response) => {
        const accountNumber = req.params.account_number?.trim();

        if (!accountNumber) {
            throw new ValidationError('Account number is required');
        }

        const result = await analysis.getAccountMetrics(accountNumber);
        res.json(result);
    }));

    return router;
};
