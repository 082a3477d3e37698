// Import NestJS controller decorators
import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
// Import Swagger decorators
import { ApiTags } from '@nestjs/swagger';
// Import DTO
import { FeedbackInputDto } from './dto/feedback-input.dto';
// Import feedback service
import { FeedbackService } from './feedback.service';

/**
 * FeedbackController - Public contact form
 * Route: POST /feedback (no authentication)
 */
@ApiTags('feedback')
@Controller('feedback')
export class FeedbackController {
  constructor(private readonly feedback: FeedbackService) {}

  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  submit(@Body() dto: FeedbackInputDto): { id: string } {
    const result = this.feedback.submit({ ...dto });
    if (result.status === 'validation_error') throw result.error;
    return { id: result.id };
  }
}
