import type { RouteNetworkEntry, RouteOption } from './transit.types';

export interface RouteCatalogRepository {
  listNetwork(): RouteNetworkEntry[];
  listBaseOptions(): RouteOption[];
}

export const ROUTE_CATALOG_REPOSITORY = Symbol('ROUTE_CATALOG_REPOSITORY');
