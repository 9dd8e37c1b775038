import { Controller, Get } from '@nestjs/common';
import { DataAggregationAgent } from './data-aggregation.agent';
import type { RouteNetwork } from './transit.types';

@Controller('api/routes')
export class RouteNetworkController {
  constructor(private readonly dataAgent: DataAggregationAgent) {}

  @Get('network')
  network(): RouteNetwork {
    return this.dataAgent.getSriLankanRoutes();
  }
}
