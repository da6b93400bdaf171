import type { Server } from 'http';
import express, { type NextFunction, type Request, type Response } from 'express';
import { DEFAULT_CONFIG } from '../config/default';
import { describeError, ExternalFailure, PoolError } from '../core/errors';
import type { MultiStrategyPool } from '../engine/MultiStrategyPool';
import logger from '../utils/logger';
import {
    buildInvariantView,
    buildMetricsView,
    buildStrategyViews,
    buildWithdrawalViews,
    renderDashboardHtml,
} from './views';

/**
 * Read-only HTTP view of a running pool.
 */
export function createDashboardApp(pool: MultiStrategyPool): express.Express {
    const app = express();

    app.use((_req, res, next) => {
        res.setHeader('Cache-Control', 'no-store, no-cache, must-revalidate, proxy-revalidate');
        res.setHeader('Pragma', 'no-cache');
        res.setHeader('Expires', '0');
        next();
    });

    app.get('/health', (_req, res) => {
        res.json({ status: 'ok', paused: pool.paused() });
    });

    app.get('/metrics', (_req, res) => {
        res.json(buildMetricsView(pool));
    });

    app.get('/strategies', (_req, res) => {
        res.json(buildStrategyViews(pool));
    });

    app.get('/withdrawals/:holder', (req, res) => {
        res.json(buildWithdrawalViews(pool, req.params.holder));
    });

    app.get('/invariants', (_req, res) => {
        const view = buildInvariantView(pool);
        res.status(view.valid ? 200 : 500).json(view);
    });

    app.get('/', (_req, res) => {
        res.send(renderDashboardHtml(buildMetricsView(pool), buildStrategyViews(pool)));
    });

    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
        logger.error(`[DASHBOARD] ${req.method} ${req.path} failed: ${describeError(err)}`);
        const status = err instanceof ExternalFailure ? 502 : 500;
        res.status(status).json({
            error: err instanceof PoolError ? err.code : 'INTERNAL_ERROR',
            message: describeError(err),
        });
    });

    return app;
}

export function startDashboard(pool: MultiStrategyPool, port: number = DEFAULT_CONFIG.DASHBOARD_PORT): Server {
    return createDashboardApp(pool).listen(port, () => {
        logger.info(`[DASHBOARD] listening on http://localhost:${port}`);
    });
}
