// Import Module decorator
import { Module } from '@nestjs/common';
// Import feedback pieces
import { FeedbackController } from './feedback.controller';
import { FeedbackService } from './feedback.service';

/**
 * FeedbackModule - Public contact form and its inbox
 */
@Module({
  controllers: [FeedbackController],
  providers: [FeedbackService]
})
export class FeedbackModule {}
