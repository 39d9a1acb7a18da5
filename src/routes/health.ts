import { Router } from 'express';
import { Settings } from '../config/settings';
import { HealthCheckResponse } from '../types/api';

export const createHealthRouter = (settings: Pick<Settings, 'version' | 'environment'>): Router => {
    const router = Router();

    router.get('/health', (req, res) => {
        const health: HealthCheckResponse = {
            status: 'healthy',
            timestamp: new Date().toISOString(),
            version: settings.version,
            environment: settings.environment
        };

        res.json(health);
    });

    return router;
};
