/**
 * Backend API Service
 *
 * Stateless HTTP client for the REST backend, the secondary delivery path.
 * Both write endpoints are idempotent from the relay's side, so callers may
 * retry freely.
 *
 * @module services/backend-api
 * @security SEC-014: Response validation, LM-001: Structured logging
 */

import axios, { type AxiosError, type AxiosInstance } from 'axios';
import { z } from 'zod';
import { CircuitBreakerService, type CircuitState } from './circuit-breaker.service';
import { APP_NAME, APP_VERSION } from '../utils/app-info';
import { BackendApiError } from '../utils/errors';
import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export const BackendResponseSchema = z.object({
  success: z.boolean(),
  message: z.string().optional(),
});
export type BackendResponse = z.infer<typeof BackendResponseSchema>;

export interface ScanReport {
  deviceId: string;
  code: string;
  quantity: number;
}

export interface BackendApiOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
  /** Defaults to a dedicated 'backend-api' breaker */
  circuitBreaker?: CircuitBreakerService;
}

const log = createLogger('backend-api');

// ============================================================================
// Backend API Service
// ============================================================================

export class BackendApiService {
  private readonly client: AxiosInstance;
  private readonly breaker: CircuitBreakerService;

  constructor(options: BackendApiOptions) {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'User-Agent': `${APP_NAME}/${APP_VERSION}`,
    };
    if (options.apiKey) {
      headers.Authorization = `Bearer ${options.apiKey}`;
    }

    this.client = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      headers,
    });

    this.client.interceptors.response.use(
      (response) => {
        log.debug('API response received', { status: response.status, url: response.config.url });
        return response;
      },
      (error: AxiosError) => {
        log.warn('API request failed', {
          status: error.response?.status,
          url: error.config?.url,
          error: error.message,
        });
        return Promise.reject(error);
      }
    );

    this.breaker = options.circuitBreaker ?? new CircuitBreakerService('backend-api');

    log.info('BackendApiService initialized', { baseUrl: options.baseUrl });
  }

  /**
   * POST /scan: report a quantity update
   *
   * @throws BackendApiError when the call fails or the backend answers success=false
   * @throws CircuitOpenError while the backend is considered down
   */
  async postScan(report: ScanReport): Promise<BackendResponse> {
    return this.post('/scan', report);
  }

  /**
   * POST /registration/confirm: confirm a newly provisioned identity
   */
  async confirmRegistration(deviceId: string): Promise<BackendResponse> {
    return this.post('/registration/confirm', { deviceId });
  }

  getCircuitState(): CircuitState {
    return this.breaker.getState();
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  private async post(path: string, body: object): Promise<BackendResponse> {
    const data = await this.breaker.execute(
      async () => {
        try {
          const response = await this.client.post<unknown>(path, body);
          return response.data;
        } catch (error) {
          if (axios.isAxiosError(error)) {
            throw new BackendApiError(`POST ${path} failed: ${error.message}`, error.response?.status);
          }
          throw error;
        }
      },
      (error) => (error instanceof BackendApiError ? error.httpStatus : undefined)
    );

    const parsed = BackendResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new BackendApiError(`POST ${path} returned an invalid response body`);
    }
    if (!parsed.data.success) {
      throw new BackendApiError(`POST ${path} rejected: ${parsed.data.message ?? 'no message'}`);
    }

    return parsed.data;
  }
}
