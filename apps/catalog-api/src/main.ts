// Import reflect-metadata to enable TypeScript decorators and metadata reflection
// This is required for NestJS dependency injection and decorator functionality
import 'reflect-metadata';
// Import NestFactory to bootstrap the NestJS application
import { NestFactory } from '@nestjs/core';
// Import the Express adapter type for Express-specific settings
import type { NestExpressApplication } from '@nestjs/platform-express';
// Import ConfigService to read validated settings
import { ConfigService } from '@nestjs/config';
// Import Swagger utilities for API documentation generation
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
// Import the root application module
import { AppModule } from './app.module';
// Import custom error filter to standardize HTTP error responses
import { HttpErrorFilter } from './common/filters/http-error.filter';
// Import middleware to attach unique request IDs for tracing and logging
import { requestIdMiddleware } from './common/request/request-id.middleware';
// Import the global DTO validation pipe
import { createValidationPipe } from './common/validation/validation-pipe';
// Import validated environment type
import type { AppEnv } from './config/env.validation';
// Import the configuration snapshot holder
import { SecurityConfigService } from './config/security-config.service';
// Import logging
import { createHttpLoggingMiddleware } from './logging/http-logging.middleware';
import { JsonLogger } from './logging/json-logger.service';
// Import response hardening
import { createHardeningMiddleware } from './security/headers/hardening.middleware';

/**
 * Bootstrap function - Entry point for the NestJS application
 * Initializes the app, configures middleware, validation, error handling, and Swagger docs
 */
async function bootstrap(): Promise<void> {
  // bufferLogs: true queues logs until the JSON logger is attached
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true
  });

  const logger = app.get(JsonLogger);
  app.useLogger(logger);

  const config = app.get<ConfigService<AppEnv, true>>(ConfigService);
  const security = app.get(SecurityConfigService);

  // req.secure and req.ip follow X-Forwarded-* only behind a trusted proxy
  app.set('trust proxy', config.get('TRUST_PROXY', { infer: true }));
  app.disable('x-powered-by');

  const corsOrigins = config.get('CORS_ORIGINS', { infer: true });
  if (corsOrigins) {
    app.enableCors({ origin: corsOrigins.split(',').map((origin) => origin.trim()) });
  }

  // Order matters: request ID first, hardening registered before any handler can write headers
  app.use(requestIdMiddleware);
  app.use(createHardeningMiddleware(security));
  app.use(createHttpLoggingMiddleware(logger));

  app.useGlobalPipes(createValidationPipe());
  app.useGlobalFilters(new HttpErrorFilter(logger));

  const swaggerEnabled = config.get('NODE_ENV', { infer: true }) !== 'production';
  if (swaggerEnabled) {
    const document = SwaggerModule.createDocument(
      app,
      new DocumentBuilder()
        .setTitle('Library Catalog API')
        .setDescription('Book catalog with sanitized input, role-based access and hardened responses')
        .setVersion('1.0.0')
        .addBearerAuth({ type: 'http', scheme: 'bearer', bearerFormat: 'JWT' }, 'bearer')
        .build()
    );
    SwaggerModule.setup('docs', app, document, {
      swaggerOptions: { persistAuthorization: true }
    });
  }

  const port = config.get('PORT', { infer: true });
  await app.listen(port);
  logger.log('Catalog API listening', { port, swagger: swaggerEnabled });
}

bootstrap().catch((err: unknown) => {
  // The JSON logger may not exist yet; write a single structured line and exit.
  const error = err instanceof Error ? { name: err.name, message: err.message, stack: err.stack } : { value: String(err) };
  process.stderr.write(`${JSON.stringify({ ts: new Date().toISOString(), level: 'error', msg: 'Bootstrap failed', error })}\n`);
  process.exit(1);
});
