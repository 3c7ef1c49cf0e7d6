#!/usr/bin/env node
import { type Config, getConfig } from './config';
import { ConfigError } from './errors';
import logger from './logger';
import { ForecastPipeline } from './pipeline';
import { runContinuous, runOnce } from './runModes';

async function main(): Promise<number> {
  let config: Config;
  let pipeline: ForecastPipeline;
  try {
    config = getConfig();
    // Resolves module and inverter from the catalog, so a bad name fails here.
    pipeline = new ForecastPipeline(config);
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error({ variable: err.variable }, err.message);
      return 1;
    }
    throw err;
  }

  logger.info('[startup] forecast poller starting', {
    mode: config.runMode,
    station: config.station.id,
    url: config.station.url,
  });

  return config.runMode === 'once' ? runOnce(pipeline) : runContinuous(config, pipeline);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error({ err }, '[startup] fatal error');
    process.exitCode = 1;
  });
