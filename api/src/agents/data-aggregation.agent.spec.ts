import { BackendHealthClient } from './backend-health.client';
import { DataAggregationAgent } from './data-aggregation.agent';
import { SeedRouteCatalogRepository } from './seed-route-catalog.repository';
import { backendHealthy, backendOffline, stubBackendHttp } from '../testing/stub-backend-http';
import type { StubBackendHttp } from '../testing/stub-backend-http';

function agentWith(stub: StubBackendHttp): DataAggregationAgent {
  return new DataAggregationAgent(new BackendHealthClient(stub.http), new SeedRouteCatalogRepository());
}

describe('DataAggregationAgent', () => {
  it('passes the backend health body through', async () => {
    const agent = agentWith(backendHealthy({ status: 'healthy', db: 'up' }));

    await expect(agent.getTransportData()).resolves.toEqual({ status: 'healthy', db: 'up' });
  });

  it('falls back to the offline marker when the backend is unreachable', async () => {
    const agent = agentWith(backendOffline());

    await expect(agent.getTransportData()).resolves.toEqual({ status: 'backend_offline', using_cache: true });
  });

  it('falls back to the offline marker on a non-200 response', async () => {
    const agent = agentWith(stubBackendHttp({ status: 500, data: { status: 'error' } }));

    await expect(agent.getTransportData()).resolves.toEqual({ status: 'backend_offline', using_cache: true });
  });

  it('returns the route network with its real-time flag', () => {
    const network = agentWith(backendOffline()).getSriLankanRoutes();

    expect(network.real_time_status).toBe('active');
    expect(network.routes.map((route) => route.name)).toEqual(['Colombo-Galle', 'Colombo-Kandy', 'Colombo-Negombo']);
  });
});
