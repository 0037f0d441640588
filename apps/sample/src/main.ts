import * as dotenv from 'dotenv';
dotenv.config();

import { createSampleApp, type SampleApp } from './app';
import { getConfig } from './config';
import { createLogger } from './observability/logger';

const config = getConfig();
const logger = createLogger({ level: config.logLevel });

let app: SampleApp | null = null;

export function main(): SampleApp {
  app = createSampleApp({ config, logger });
  app.start();
  logger.info(
    { failureRatePercent: config.failureRatePercent, removeOnFailure: config.removeOnFailure },
    'Timer sample is running; press Ctrl+C to exit',
  );
  return app;
}

export async function shutdown(): Promise<void> {
  logger.info('Shutting down timer sample');
  if (app) {
    const running = app;
    app = null;
    await running.stop();
  }
}

if (process.env.NODE_ENV !== 'test') {
  const handleFatal = (error: unknown) => {
    logger.error({ err: error }, 'Timer sample failed');
    process.exit(1);
  };

  const exitAfterShutdown = () => {
    shutdown().then(() => process.exit(0), handleFatal);
  };

  process.on('SIGINT', exitAfterShutdown);
  process.on('SIGTERM', exitAfterShutdown);

  try {
    main();
  } catch (error) {
    handleFatal(error);
  }
}
