import 'reflect-metadata';
import { config as loadEnv } from 'dotenv';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { loadAppConfig } from './config/app-config';
import { enableDefaultMetrics, httpMetricsMiddleware } from './infrastructure/metrics/prom';

async function bootstrap() {
  loadEnv();
  const config = loadAppConfig();
  const app = await NestFactory.create(AppModule, { abortOnError: true, logger: config.logLevels });
  app.enableShutdownHooks();

  // HTTP Metrics for all paths
  enableDefaultMetrics();
  app.use(httpMetricsMiddleware);

  await app.listen(config.port);
  new Logger('Bootstrap').log(`booking-ledger up on http://localhost:${config.port}  (/healthz, /metrics)`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').fatal(error instanceof Error ? error.stack ?? error.message : String(error));
  process.exit(1);
});
