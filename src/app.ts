// src/app.ts

import express from 'express';
import type { Harness } from './bootstrap';
import { createConvertRouter } from './routes/convert';

export function createApp(harness: Harness, defaultMaxTokens: number): express.Express {
    const app = express();
    app.use(express.json({ limit: '1mb' }));

    app.get('/health', (_req, res) => {
        res.json({ status: 'ok', backends: [...harness.gateways.keys()] });
    });
    app.use('/api', createConvertRouter({ ...harness, defaultMaxTokens }));

    return app;
}
