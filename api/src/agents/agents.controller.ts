import { Controller, Get } from '@nestjs/common';
import { DataAggregationAgent } from './data-aggregation.agent';
import { LanguageAgent } from './language.agent';
import { PersonalizationAgent } from './personalization.agent';
import { RouteOptimizationAgent } from './route-optimization.agent';
import type { AgentStatus } from './transit.types';

type AgentsStatusResponse = {
  agents: AgentStatus[];
  total_agents: number;
  system_health: 'optimal';
};

@Controller('api/agents')
export class AgentsController {
  constructor(
    private readonly dataAgent: DataAggregationAgent,
    private readonly routeAgent: RouteOptimizationAgent,
    private readonly personalizationAgent: PersonalizationAgent,
    private readonly languageAgent: LanguageAgent,
  ) {}

  // Fixed report; nothing is probed here.
  @Get('status')
  status(): AgentsStatusResponse {
    const agents: AgentStatus[] = [
      this.dataAgent,
      this.routeAgent,
      this.personalizationAgent,
      this.languageAgent,
    ].map((agent): AgentStatus => ({ name: agent.name, status: 'active' }));

    return {
      agents,
      total_agents: 4,
      system_health: 'optimal',
    };
  }
}
