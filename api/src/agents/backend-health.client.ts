import { Inject, Injectable, Logger } from '@nestjs/common';
import { isAxiosError } from 'axios';
import type { AxiosInstance } from 'axios';

export const BACKEND_HTTP = Symbol('BACKEND_HTTP');

export const BACKEND_HEALTH_PATH = '/api/health';

export type BackendHealthBody = Record<string, unknown>;

export type BackendHealthResult =
  | { ok: true; body: BackendHealthBody }
  | { ok: false; reason: string };

function isRecord(value: unknown): value is BackendHealthBody {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Probes the transit backend once per call. The axios instance carries the
 * base URL and the timeout; every failure comes back as `{ ok: false }`.
 */
@Injectable()
export class BackendHealthClient {
  private readonly logger = new Logger(BackendHealthClient.name);

  constructor(@Inject(BACKEND_HTTP) private readonly http: AxiosInstance) {}

  async check(): Promise<BackendHealthResult> {
    const startedAt = Date.now();
    try {
      const response = await this.http.get<unknown>(BACKEND_HEALTH_PATH, {
        validateStatus: () => true,
      });
      const durationMs = Date.now() - startedAt;

      if (response.status !== 200) {
        return this.fail(`unexpected status ${response.status}`, durationMs);
      }
      if (!isRecord(response.data)) {
        return this.fail('response body is not a JSON object', durationMs);
      }

      this.logger.debug(`[backend-health] ok durationMs=${durationMs}`);
      return { ok: true, body: response.data };
    } catch (error) {
      return this.fail(this.describe(error), Date.now() - startedAt);
    }
  }

  private fail(reason: string, durationMs: number): BackendHealthResult {
    this.logger.warn(`[backend-health] unavailable durationMs=${durationMs} reason=${reason}`);
    return { ok: false, reason };
  }

  private describe(error: unknown): string {
    if (isAxiosError(error)) {
      return error.code ? `${error.code}: ${error.message}` : error.message;
    }
    return error instanceof Error ? error.message : String(error);
  }
}
