import { Inject, Injectable } from '@nestjs/common';
import { BackendHealthClient } from './backend-health.client';
import type { BackendHealthBody } from './backend-health.client';
import { ROUTE_CATALOG_REPOSITORY } from './route-catalog.repository';
import type { RouteCatalogRepository } from './route-catalog.repository';
import type { RouteNetwork } from './transit.types';

export const BACKEND_OFFLINE_STATUS = 'backend_offline';

export type OfflineTransportData = {
  status: typeof BACKEND_OFFLINE_STATUS;
  using_cache: true;
};

export type TransportData = BackendHealthBody | OfflineTransportData;

@Injectable()
export class DataAggregationAgent {
  readonly name = 'Data Aggregation Agent';

  constructor(
    private readonly healthClient: BackendHealthClient,
    @Inject(ROUTE_CATALOG_REPOSITORY) private readonly catalog: RouteCatalogRepository,
  ) {}

  async getTransportData(): Promise<TransportData> {
    const result = await this.healthClient.check();
    if (result.ok) {
      return result.body;
    }
    return { status: BACKEND_OFFLINE_STATUS, using_cache: true };
  }

  getSriLankanRoutes(): RouteNetwork {
    return {
      routes: this.catalog.listNetwork(),
      real_time_status: 'active',
    };
  }
}
