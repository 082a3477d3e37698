// Import NestJS Module decorator to define the root module
import { Module } from '@nestjs/common';
// Import ConfigModule to manage environment variables and configuration
import { ConfigModule } from '@nestjs/config';
// Import environment variable validation function
import { validateEnv } from './config/env.validation';
// Import logging module (JsonLogger)
import { LoggingModule } from './logging/logging.module';
// Import audit module for RBAC change records
import { AuditModule } from './audit/audit.module';
// Import security configuration snapshot module
import { SecurityModule } from './security/security.module';
// Import IAM module (RBAC, principals, role administration)
import { IamModule } from './iam/iam.module';
// Import feature modules
import { CatalogModule } from './catalog/catalog.module';
import { FeedbackModule } from './feedback/feedback.module';
// Import health check module for monitoring application status
import { HealthModule } from './health/health.module';

/**
 * AppModule - Root module of the application
 * Orchestrates all feature modules and provides global configuration
 */
@Module({
  imports: [
    // Configure environment variable loading and validation
    ConfigModule.forRoot({
      isGlobal: true, // Make ConfigService available globally without re-importing
      envFilePath: ['.env.local', '.env'], // First file wins, so local overrides come first
      validate: validateEnv // Fail fast on missing or invalid variables
    }),
    LoggingModule,
    AuditModule,
    SecurityModule,
    IamModule,
    CatalogModule,
    FeedbackModule,
    HealthModule
  ]
})
export class AppModule {}
