import { Injectable, Logger } from '@nestjs/common';
import { DataAggregationAgent } from '../agents/data-aggregation.agent';
import type { TransportData } from '../agents/data-aggregation.agent';
import { LanguageAgent } from '../agents/language.agent';
import type { TranslatedPayload } from '../agents/language.agent';
import { DEFAULT_USER_ID, PersonalizationAgent } from '../agents/personalization.agent';
import { RouteOptimizationAgent } from '../agents/route-optimization.agent';
import type { RouteOption } from '../agents/transit.types';
import type { JourneyRequest } from './journey-request.schema';

export type JourneyOptions = {
  origin: string;
  destination: string;
  routes: RouteOption[];
  preference_applied: string;
  accessibility_considered: boolean;
};

export type PlanJourneyResponse = {
  success: true;
  processed_by: string;
  timestamp: string;
  backend_status: string | null;
  journey_options: JourneyOptions | TranslatedPayload<JourneyOptions>;
};

function statusOf(transportData: TransportData): string | null {
  const status = transportData.status;
  return typeof status === 'string' ? status : null;
}

@Injectable()
export class JourneysService {
  private readonly logger = new Logger(JourneysService.name);

  constructor(
    private readonly dataAgent: DataAggregationAgent,
    private readonly routeAgent: RouteOptimizationAgent,
    private readonly personalizationAgent: PersonalizationAgent,
    private readonly languageAgent: LanguageAgent,
  ) {}

  async planJourney(request: JourneyRequest): Promise<PlanJourneyResponse> {
    this.logger.log(
      `[plan-journey] origin=${request.origin} destination=${request.destination} ` +
        `mode=${request.mode_preference} language=${request.language}`,
    );

    const transportData = await this.dataAgent.getTransportData();
    const network = this.dataAgent.getSriLankanRoutes();
    this.logger.debug(`[plan-journey] networkRoutes=${network.routes.length}`);

    const routes = this.routeAgent.optimizeRoute(request);

    // Always the shared key: requests carry no caller identity yet.
    const preference = this.personalizationAgent.getPersonalizedSuggestions(DEFAULT_USER_ID);
    this.logger.debug(
      `[plan-journey] preference user=${DEFAULT_USER_ID} mode=${preference.mode} accessibility=${preference.accessibility}`,
    );

    const journeyOptions = this.languageAgent.translateResponse<JourneyOptions>(
      {
        origin: request.origin,
        destination: request.destination,
        routes,
        preference_applied: request.mode_preference,
        accessibility_considered: request.accessibility_needs,
      },
      request.language,
    );

    return {
      success: true,
      processed_by: '7 AI agents',
      timestamp: new Date().toISOString(),
      backend_status: statusOf(transportData),
      journey_options: journeyOptions,
    };
  }
}
