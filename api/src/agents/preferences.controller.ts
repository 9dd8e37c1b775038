import { Body, Controller, Get, Param, Put } from '@nestjs/common';
import { z } from 'zod';
import { ZodValidationPipe } from '../common/zod-validation.pipe';
import { PersonalizationAgent } from './personalization.agent';
import type { PreferenceRecord } from './transit.types';

export const PreferenceRecordSchema = z.object({
  mode: z.string(),
  accessibility: z.boolean(),
});

@Controller('api/preferences')
export class PreferencesController {
  constructor(private readonly personalizationAgent: PersonalizationAgent) {}

  @Get(':userId')
  get(@Param('userId') userId: string): PreferenceRecord {
    return this.personalizationAgent.getPersonalizedSuggestions(userId);
  }

  @Put(':userId')
  learn(
    @Param('userId') userId: string,
    @Body(new ZodValidationPipe(PreferenceRecordSchema)) body: PreferenceRecord,
  ): PreferenceRecord {
    this.personalizationAgent.learnPreference(userId, body);
    return this.personalizationAgent.getPersonalizedSuggestions(userId);
  }
}
