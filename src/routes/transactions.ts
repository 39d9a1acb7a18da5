import { Router, Request, Response, RequestHandler } from 'express';
import Joi from 'joi';
import { RiskAnalysisService } from '../services/riskAnalysisService';
import { TransactionRequest } from '../types/transaction';
import { ValidationError, asyncHandler } from '../middleware/errorHandler';

const transactionSchema = Joi.object<TransactionRequest>({
    tenant_id: Joi.string().required(),
    client_id: Joi.string().required(),
    account_number: Joi.string().required(),
    transaction_amount: Joi.number().positive().required(),
    causal_code: Joi.string().required(),
    currency: Joi.string().default('USD'),
    channel: Joi.string().default('WEB'),
    timestamp: Joi.string().isoDate().default(() => new Date().toISOString())
}).options({ stripUnknown: true });

const isJsonObject = (body: unknown): body is Record<string, unknown> =>
    typeof body == 'object' && body !== null && !Array.isArray(body);

export const validateTransactionRequest = (body: unknown): TransactionRequest => {
    if (!isJsonObject(body) || Object.keys(body).length == 0) {
        throw new ValidationError('No transaction data provided');
    }

    const result = transactionSchema.validate(body, { abortEarly: false });
    if (!result.error) {
        return result.value;
    }

    const missingFields = result.error.details
        .filter(detail => detail.type == 'any.required')
        .map(detail => String(detail.path[0]));

    if (missingFields.length > 0) {
        throw new ValidationError(`Missing required fields: ${missingFields.join(', ')}`);
    }

    throw new ValidationError(
        `Invalid transaction data: ${result.error.details.map(detail => detail.message).join('; ')}`
    );
};

export const createTransactionRouter = (analysis: RiskAnalysisService, authorize: RequestHandler): Router => {
    const router = Router();

    router.post('/process-transaction', authorize, asyncHandler(async (req: Request, res: Response) => {
        const transaction = validateTransactionRequest(req.body);
        const result = await analysis.processTransaction(transaction);

        res.json(result);
    }));

    return router;
};
