// Import NestJS Injectable decorator
import { Injectable } from '@nestjs/common';
// Import node crypto for message IDs
import { randomUUID } from 'node:crypto';
// Import validation failure value
import { ValidationError } from '../common/errors/catalog-errors';
// Import the configuration snapshot holder (validation settings)
import { SecurityConfigService } from '../config/security-config.service';
// Import logger
import { JsonLogger } from '../logging/json-logger.service';
// Import sanitizer
import { FEEDBACK_FORM } from '../security/sanitizer/field-classes';
import { type RawFields, validateFields } from '../security/sanitizer/sanitizing-validator';
// Import feedback types
import type { FeedbackMessage, FeedbackResult } from './feedback.types';

/**
 * FeedbackService - Public contact form
 * Submissions are cleaned by the sanitizing validator and kept in an in-memory inbox
 */
@Injectable()
export class FeedbackService {
  private readonly inbox: FeedbackMessage[] = [];

  constructor(
    private readonly security: SecurityConfigService,
    private readonly logger: JsonLogger
  ) {}

  /**
   * Validate and store a submission
   * @param rawFields - Unvalidated name, email and message
   */
  submit(rawFields: RawFields): FeedbackResult {
    const form = validateFields(FEEDBACK_FORM, rawFields, this.security.current().validation);
    if (form.violations.length > 0) {
      return { status: 'validation_error', error: new ValidationError(form.violations) };
    }

    const message: FeedbackMessage = Object.freeze({
      id: randomUUID(),
      name: form.values.name ?? '',
      email: form.values.email ?? '',
      message: form.values.message ?? '',
      receivedAt: new Date().toISOString()
    });
    this.inbox.push(message);
    // Content stays out of the log.
    this.logger.log('Feedback received', { feedbackId: message.id, length: message.message.length });

    return { status: 'accepted', id: message.id };
  }

  /** Accepted submissions, oldest first */
  messages(): readonly FeedbackMessage[] {
    return [...this.inbox];
  }
}
