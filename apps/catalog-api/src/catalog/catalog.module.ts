// Import path helpers to resolve the sample file
import { resolve } from 'node:path';
// Import NestJS module utilities
import { Module } from '@nestjs/common';
// Import ConfigService for startup settings
import { ConfigService } from '@nestjs/config';
// Import validated environment type
import type { AppEnv } from '../config/env.validation';
// Import logger
import { JsonLogger } from '../logging/json-logger.service';
// Import catalog pieces
import { BookController } from './book.controller';
import { BookRepository, InMemoryBookRepository } from './book.repository';
import { CatalogOperationService } from './catalog-operation.service';
import { readSampleBooks, seedBooks } from './sample-books.loader';

/**
 * CatalogModule - Book catalog behind the trust boundary
 * Persistence is the in-memory repository, optionally seeded with sample books
 */
@Module({
  controllers: [BookController],
  providers: [
    CatalogOperationService,
    {
      provide: BookRepository,
      useFactory: async (config: ConfigService<AppEnv, true>, logger: JsonLogger): Promise<BookRepository> => {
        const repository = new InMemoryBookRepository();
        if (config.get('CATALOG_SEED_SAMPLE_BOOKS', { infer: true })) {
          const file = resolve(process.cwd(), config.get('CATALOG_SAMPLE_BOOKS_FILE', { infer: true }));
          const count = await seedBooks(repository, readSampleBooks(file));
          logger.log('Sample books loaded', { count, file });
        }
        return repository;
      },
      inject: [ConfigService, JsonLogger]
    }
  ]
})
export class CatalogModule {}
