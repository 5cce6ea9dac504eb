/**
 * Hub Provisioning Service
 *
 * HTTP client for the cloud hub's identity registry. `provisionOrFetchIdentity`
 * is idempotent: an identity that already exists remotely is returned as-is,
 * never duplicated.
 *
 * Registry contract:
 * - GET /devices/{id}  -> 200 ProvisionedDevice | 404
 * - PUT /devices/{id}  -> 200/201 ProvisionedDevice | 409 (already exists)
 *
 * @module services/provisioning
 * @security SEC-014: Response validation
 * @security LM-001: Connection strings are never logged
 */

import axios, { type AxiosError, type AxiosInstance } from 'axios';
import { z } from 'zod';
import { classifyError } from './error-classifier.service';
import { APP_NAME, APP_VERSION } from '../utils/app-info';
import { InvalidCodeError, ProvisioningUnavailableError } from '../utils/errors';
import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export const ProvisionedDeviceSchema = z.object({
  deviceId: z.string().min(1),
  connectionString: z.string().min(1),
  status: z.enum(['enabled', 'disabled']).default('enabled'),
});

export interface ProvisionedIdentity {
  identityId: string;
  credential: string;
  /** false when the hub disabled this device */
  enabled: boolean;
  /** true when this call created the identity */
  created: boolean;
}

/**
 * Provisioning capability consumed by the Identity Resolver
 */
export interface IdentityProvisioner {
  provisionOrFetchIdentity(identityId: string): Promise<ProvisionedIdentity>;
}

export interface ProvisioningServiceOptions {
  endpoint: string;
  apiKey?: string;
  timeoutMs: number;
}

/** Statuses meaning "this id is unacceptable"; auth failures are not the code's fault */
const ID_REJECTED_STATUSES = new Set([400, 422]);

const log = createLogger('provisioning');

// ============================================================================
// Provisioning Service
// ============================================================================

export class HubProvisioningService implements IdentityProvisioner {
  private readonly client: AxiosInstance;

  constructor(options: ProvisioningServiceOptions) {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'User-Agent': `${APP_NAME}/${APP_VERSION}`,
    };
    if (options.apiKey) {
      headers.Authorization = options.apiKey;
    }

    this.client = axios.create({
      baseURL: options.endpoint,
      timeout: options.timeoutMs,
      headers,
    });

    this.client.interceptors.response.use(
      (response) => {
        log.debug('Registry response received', { status: response.status, url: response.config.url });
        return response;
      },
      (error: AxiosError) => {
        log.warn('Registry request failed', {
          status: error.response?.status,
          url: error.config?.url,
          error: error.message,
        });
        return Promise.reject(error);
      }
    );
  }

  /**
   * Fetch the identity, creating it when the registry does not know it
   *
   * @throws ProvisioningUnavailableError on network failure, timeout or 5xx
   * @throws InvalidCodeError when the registry rejects the id (400/422)
   */
  async provisionOrFetchIdentity(identityId: string): Promise<ProvisionedIdentity> {
    const path = `/devices/${encodeURIComponent(identityId)}`;

    try {
      const existing = await this.client.get<unknown>(path, {
        validateStatus: (status) => status === 200 || status === 404,
      });
      if (existing.status === 200) {
        return this.parseDevice(identityId, existing.data, false);
      }

      const created = await this.client.put<unknown>(
        path,
        { deviceId: identityId },
        { validateStatus: (status) => status === 200 || status === 201 || status === 409 }
      );
      if (created.status !== 409) {
        const identity = this.parseDevice(identityId, created.data, true);
        log.info('Identity created on hub', { identityId });
        return identity;
      }

      // Another relay created it between our GET and PUT
      const raced = await this.client.get<unknown>(path);
      return this.parseDevice(identityId, raced.data, false);
    } catch (error) {
      throw this.toProvisioningError(identityId, error);
    }
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  private parseDevice(identityId: string, data: unknown, created: boolean): ProvisionedIdentity {
    const parsed = ProvisionedDeviceSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProvisioningUnavailableError(identityId, 'Registry returned an invalid device record');
    }
    if (parsed.data.deviceId !== identityId) {
      throw new ProvisioningUnavailableError(
        identityId,
        `Registry returned device ${parsed.data.deviceId} for ${identityId}`
      );
    }

    return {
      identityId,
      credential: parsed.data.connectionString,
      enabled: parsed.data.status === 'enabled',
      created,
    };
  }

  private toProvisioningError(identityId: string, error: unknown): Error {
    if (error instanceof ProvisioningUnavailableError) {
      return error;
    }

    const classification = classifyError(error);
    if (
      classification.category === 'PERMANENT' &&
      classification.httpStatus !== undefined &&
      ID_REJECTED_STATUSES.has(classification.httpStatus)
    ) {
      return new InvalidCodeError(identityId, `Registry rejected identity (${classification.reason})`);
    }

    const message = error instanceof Error ? error.message : 'Unknown error';
    return new ProvisioningUnavailableError(
      identityId,
      `Provisioning unavailable: ${message}`,
      classification.httpStatus
    );
  }
}
