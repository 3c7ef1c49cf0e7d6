import type { Config } from './config';
import logger from './logger';
import type { ForecastPipeline } from './pipeline';
import { type StartedServer, startServer } from './server';

/** Prepares, fetches once and writes. Resolves to the process exit code. */
export async function runOnce(pipeline: ForecastPipeline): Promise<number> {
  try {
    await pipeline.prepare();
    const result = await pipeline.runOnce();
    if (result.failures.length > 0) {
      logger.error({ failedSinks: result.failures.map((f) => f.sink) }, '[startup] one-shot run finished with sink failures');
      return 1;
    }
    return 0;
  } catch (err) {
    logger.error({ err }, '[startup] one-shot run failed');
    return 1;
  } finally {
    await pipeline.close();
  }
}

/**
 * Polls until the pipeline is stopped (SIGINT/SIGTERM), serving the status
 * API when enabled. The pipeline is closed however this ends.
 */
export async function runContinuous(config: Config, pipeline: ForecastPipeline): Promise<number> {
  let server: StartedServer | null = null;

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info('[shutdown] signal received', { signal });
    pipeline.stop().catch((err: unknown) => {
      logger.error({ err }, '[shutdown] failed to stop polling');
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    await pipeline.prepare();
    if (config.http.enabled) {
      server = await startServer(
        { http: config.http, observability: config.observability, timezone: config.system.timezone },
        { forecast: pipeline, monitor: pipeline.monitor, db: pipeline.database },
      );
    }
    await pipeline.start();
    return 0;
  } finally {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
    await server?.stop();
    await pipeline.close();
  }
}
