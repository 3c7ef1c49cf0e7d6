import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors, { type CorsOptions } from 'cors';
import http from 'http';
import type { Config } from './config';
import logger from './logger';
import { metricsContentType, renderPrometheus, setGaugeValue } from './observability/metrics';
import { asyncHandler } from './routes/asyncHandler';
import { createForecastRouter, type ForecastReadModel } from './routes/forecast';
import type { RefreshMonitor } from './state/refreshMonitor';

export interface ServerDependencies {
  forecast: ForecastReadModel;
  monitor: RefreshMonitor;
  /** Absent when the database sink is disabled. */
  db?: { ping(): Promise<boolean> };
  clock?: () => number;
}

export type ServerSettings = Pick<Config, 'http' | 'observability'> & { timezone: string };

export interface StartedServer {
  app: Express;
  server: http.Server;
  port: number;
  stop: () => Promise<void>;
}

export function createApp(settings: ServerSettings, deps: ServerDependencies): Express {
  const clock = deps.clock ?? Date.now;
  const app = express();

  const allowedOrigins = new Set(settings.http.corsAllowedOrigins);
  const corsOptions: CorsOptions = {
    origin(origin, callback) {
      if (!origin) return callback(null, true);
      return callback(null, allowedOrigins.has(origin));
    },
    methods: ['GET'],
    optionsSuccessStatus: 204,
  };
  app.use(cors(corsOptions));

  app.get(
    '/api/health',
    asyncHandler(async (_req, res) => {
      const now = clock();
      const refresh = deps.monitor.getState(now);
      const snapshot = deps.forecast.getLatest();
      const dbOk = deps.db ? await deps.db.ping() : null;

      const refreshHealthy = refresh.status === 'ok' || refresh.status === 'unchanged';
      const healthy = refreshHealthy && snapshot !== null && dbOk !== false;
      setGaugeValue('mosmix_refresh_ok', refreshHealthy ? 1 : 0);

      res.status(healthy ? 200 : 503).json({
        status: healthy ? 'ok' : 'degraded',
        refresh,
        snapshot: snapshot
          ? {
              fingerprint: snapshot.fingerprint,
              issueTime: snapshot.issueTime?.toISOString() ?? null,
              observations: snapshot.observations.length,
              ageSeconds: Math.round((now - snapshot.fetchedAt.getTime()) / 1000),
            }
          : null,
        db: { enabled: deps.db !== undefined, ok: dbOk },
      });
    }),
  );

  app.use('/api/forecast', createForecastRouter(deps.forecast, settings.timezone));

  if (settings.observability.prometheusEnabled) {
    app.get(settings.observability.prometheusPath, (_req, res) => {
      const state = deps.monitor.getState(clock());
      setGaugeValue('mosmix_refresh_ok', state.status === 'ok' || state.status === 'unchanged' ? 1 : 0);
      setGaugeValue('mosmix_refresh_consecutive_failures', state.consecutiveFailures);
      res.setHeader('Content-Type', metricsContentType());
      res.send(renderPrometheus());
    });
  }

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error({ err }, '[http] request failed');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export async function startServer(
  settings: ServerSettings,
  deps: ServerDependencies,
  port: number = settings.http.port,
): Promise<StartedServer> {
  const app = createApp(settings, deps);
  const server = http.createServer(app);

  const actualPort = await new Promise<number>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      const address = server.address();
      const bound = typeof address === 'object' && address ? address.port : port;
      logger.info(`Forecast status API listening on http://localhost:${bound}`);
      resolve(bound);
    });
  });

  const stop = () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });

  return { app, server, port: actualPort, stop };
}
