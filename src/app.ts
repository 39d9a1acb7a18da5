import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { Settings } from './config/settings';
import { errorHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { createRoutes } from './routes';
import { HistoricalDataProvider } from './services/historicalDataProvider';
import { RiskAnalysisService } from './services/riskAnalysisService';
import { NotFoundResponse } from './types/api';

export interface AppDependencies {
    settings: Readonly<Settings>;
    historicalData: HistoricalDataProvider;
    analysis?: RiskAnalysisService;
}

export const createApp = ({ settings, historicalData, analysis }: AppDependencies): Express => {
    const app = express();

    app.use(helmet({
        contentSecurityPolicy: false
    }));

    app.use(cors({
        origin: settings.nodeEnv == 'production' ? false : true,
        credentials: true
    }));

    app.use(express.json({ limit: '10mb' }));
    app.use(requestLogger);

    app.use(settings.routePrefix, createRoutes(settings, analysis ?? new RiskAnalysisService({ historicalData })));

    app.use('*', (req, res) => {
        const notFound: NotFoundResponse = {
            error: 'Endpoint not found',
            path: req.originalUrl,
            method: req.method
        };
        res.status(404).json(notFound);
    });

    app.use(errorHandler);

    return app;
};
