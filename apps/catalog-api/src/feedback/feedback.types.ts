// Import validation failure value
import type { ValidationError } from '../common/errors/catalog-errors';

/**
 * FeedbackMessage - An accepted contact form submission
 */
export interface FeedbackMessage {
  readonly id: string;
  readonly name: string;
  readonly email: string;
  readonly message: string;
  readonly receivedAt: string;
}

export type FeedbackResult =
  | { readonly status: 'accepted'; readonly id: string }
  | { readonly status: 'validation_error'; readonly error: ValidationError };
