import { z } from 'zod';
import networkSeed from './seed/route-network.json';
import optionsSeed from './seed/route-options.json';
import type { RouteCatalogRepository } from './route-catalog.repository';
import type { RouteNetworkEntry, RouteOption } from './transit.types';

export const COST_PATTERN = /^Rs\. \d+$/;

export const RouteNetworkEntrySchema = z.object({
  id: z.number().int(),
  name: z.string(),
  modes: z.array(z.string()),
  distance: z.number(),
});

export const RouteOptionSchema = z.object({
  mode: z.string(),
  duration: z.string(),
  cost: z.string().regex(COST_PATTERN, 'cost must look like "Rs. <integer>"'),
  steps: z.array(z.string()),
  accessibility_score: z.number().int(),
});

type RouteCatalogSeed = {
  network: unknown;
  options: unknown;
};

/**
 * Route catalog backed by the JSON seed shipped with the service.
 *
 * Rows are validated once at construction; every read hands out copies so the
 * table itself stays read-only.
 */
export class SeedRouteCatalogRepository implements RouteCatalogRepository {
  private readonly network: readonly RouteNetworkEntry[];
  private readonly options: readonly RouteOption[];

  constructor(seed: RouteCatalogSeed = { network: networkSeed, options: optionsSeed }) {
    this.network = z.array(RouteNetworkEntrySchema).parse(seed.network);
    this.options = z.array(RouteOptionSchema).parse(seed.options);
  }

  listNetwork(): RouteNetworkEntry[] {
    return this.network.map((entry) => ({ ...entry, modes: [...entry.modes] }));
  }

  listBaseOptions(): RouteOption[] {
    return this.options.map((option) => ({ ...option, steps: [...option.steps] }));
  }
}
