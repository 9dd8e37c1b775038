import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { AgentsController } from './agents.controller';
import { BACKEND_HTTP, BackendHealthClient } from './backend-health.client';
import { DataAggregationAgent } from './data-aggregation.agent';
import { InMemoryPreferenceStore } from './in-memory-preference.store';
import { LanguageAgent } from './language.agent';
import { PersonalizationAgent } from './personalization.agent';
import { PREFERENCE_STORE } from './preference.store';
import { PreferencesController } from './preferences.controller';
import { ROUTE_CATALOG_REPOSITORY } from './route-catalog.repository';
import { RouteNetworkController } from './route-network.controller';
import { RouteOptimizationAgent } from './route-optimization.agent';
import { SeedRouteCatalogRepository } from './seed-route-catalog.repository';

@Module({
  controllers: [AgentsController, RouteNetworkController, PreferencesController],
  providers: [
    DataAggregationAgent,
    RouteOptimizationAgent,
    PersonalizationAgent,
    LanguageAgent,
    BackendHealthClient,
    {
      provide: BACKEND_HTTP,
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        axios.create({
          baseURL: config.get<string>('BACKEND_URL', 'http://localhost:3000'),
          timeout: config.get<number>('BACKEND_HEALTH_TIMEOUT_MS', 2000),
        }),
    },
    {
      provide: ROUTE_CATALOG_REPOSITORY,
      useFactory: () => new SeedRouteCatalogRepository(),
    },
    {
      provide: PREFERENCE_STORE,
      useClass: InMemoryPreferenceStore,
    },
  ],
  exports: [DataAggregationAgent, RouteOptimizationAgent, PersonalizationAgent, LanguageAgent],
})
export class AgentsModule {}
