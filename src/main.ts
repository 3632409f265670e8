import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { config as loadEnv } from 'dotenv';
import { AppModule } from './app.module';
import { loadConfig, redactConfig, resolveLogLevels } from './config/app-config';

async function bootstrap(): Promise<void> {
  loadEnv();
  const config = loadConfig();
  const app = await NestFactory.create(AppModule.register(config), {
    logger: resolveLogLevels(config.logLevel),
  });
  app.enableShutdownHooks();

  await app.listen(config.server.port);
  const logger = new Logger('Bootstrap');
  logger.log(`listening: port=${config.server.port}`);
  logger.debug(`config: ${JSON.stringify(redactConfig(config))}`);
}

bootstrap().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  new Logger('Bootstrap').error(`startup failed: ${message}`);
  process.exitCode = 1;
});
