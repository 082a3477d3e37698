// Import NestJS module utilities
import { Global, Module } from '@nestjs/common';
// Import ConfigService to read the validated LOG_LEVEL
import { ConfigService } from '@nestjs/config';
// Import validated environment type
import type { AppEnv } from '../config/env.validation';
// Import the JSON logger
import { JsonLogger } from './json-logger.service';

/**
 * LoggingModule - Provides one JsonLogger for the whole application
 * Global so every feature module can inject it without importing this module
 */
@Global()
@Module({
  providers: [
    {
      provide: JsonLogger,
      useFactory: (config: ConfigService<AppEnv, true>) =>
        new JsonLogger('catalog-api', config.get('LOG_LEVEL', { infer: true })),
      inject: [ConfigService]
    }
  ],
  exports: [JsonLogger]
})
export class LoggingModule {}
