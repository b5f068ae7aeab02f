import 'reflect-metadata';
import { BadRequestException, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { json, urlencoded } from 'express';
import type { IncomingMessage } from 'node:http';
import helmet from 'helmet';
import { AppModule } from './app.module';
import { INVALID_PAYLOAD_MESSAGE } from './common/constants/error-messages.constants';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { requestIdMiddleware } from './common/middleware/request-id.middleware';
import { validateEnv } from './common/config/env.validation';
import { createLogger, logger } from './common/utils/logger';

const BODY_LIMIT = '1mb';

async function bootstrap(): Promise<void> {
  logger.boot();

  const validatedEnv = validateEnv(process.env);
  const nestLogLevel = validatedEnv.LOG_LEVEL === 'info' ? 'log' : validatedEnv.LOG_LEVEL;
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bodyParser: false,
    logger: [nestLogLevel, 'warn', 'error'],
  });

  app.use(helmet());

  // Slack signs the exact bytes it sent, so both parsers keep the raw body.
  app.use(json({ limit: BODY_LIMIT, verify: keepRawBody }));
  app.use(urlencoded({ extended: false, limit: BODY_LIMIT, verify: keepRawBody }));

  app.use(requestIdMiddleware);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      exceptionFactory: () => new BadRequestException(INVALID_PAYLOAD_MESSAGE),
    }),
  );

  app.useGlobalFilters(new HttpExceptionFilter());

  app.enableShutdownHooks();

  await app.listen(validatedEnv.PORT);

  createLogger('Bootstrap').info(`Feedback collector listening on port ${validatedEnv.PORT}`);
}

function keepRawBody(req: IncomingMessage, _res: unknown, buf: Buffer): void {
  Object.assign(req, { rawBody: buf.toString('utf8') });
}

bootstrap().catch((error: unknown) => {
  createLogger('Bootstrap').error(
    'Failed to bootstrap feedback collector',
    error instanceof Error ? error : undefined,
  );
  process.exit(1);
});
