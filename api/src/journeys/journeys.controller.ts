import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import { ZodValidationPipe } from '../common/zod-validation.pipe';
import { JourneyRequestSchema } from './journey-request.schema';
import type { JourneyRequest } from './journey-request.schema';
import { JourneysService } from './journeys.service';
import type { PlanJourneyResponse } from './journeys.service';

@Controller('api')
export class JourneysController {
  constructor(private readonly journeysService: JourneysService) {}

  @Post('plan-journey')
  @HttpCode(200)
  planJourney(@Body(new ZodValidationPipe(JourneyRequestSchema)) body: JourneyRequest): Promise<PlanJourneyResponse> {
    return this.journeysService.planJourney(body);
  }
}
