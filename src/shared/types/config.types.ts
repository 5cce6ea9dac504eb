/**
 * Configuration Types for the scan relay
 *
 * Type definitions with Zod validation schemas. Every option is bounded so a
 * typo in a field-deployed config file fails at startup rather than producing
 * a retry storm.
 *
 * @module shared/types/config.types
 * @security SEC-014: Strict input validation schemas
 */

import { z } from 'zod';

// ============================================================================
// Validation Schemas (SEC-014: Input Validation)
// ============================================================================

/**
 * Endpoint URL validation schema
 * Allows HTTP for localhost/127.0.0.1, requires HTTPS otherwise
 */
export const EndpointUrlSchema = z
  .string()
  .min(1, 'URL is required')
  .max(500, 'URL too long')
  .url('Invalid URL format')
  .refine((url) => {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      // Reported by .url()
      return true;
    }
    const { hostname, protocol } = parsed;
    if (hostname === 'localhost' || hostname === '127.0.0.1') {
      return protocol === 'http:' || protocol === 'https:';
    }
    return protocol === 'https:';
  }, 'URL must use HTTPS (HTTP only allowed for localhost)');

/**
 * API Key validation schema
 */
export const ApiKeySchema = z
  .string()
  .min(1, 'API Key is required')
  .max(500, 'API Key too long')
  .regex(/^[a-zA-Z0-9_\-.=+/]+$/, 'API Key contains invalid characters');

/**
 * Bounded whole-second duration
 */
const seconds = (label: string, min: number, max: number) =>
  z
    .number()
    .int(`${label} must be an integer`)
    .min(min, `${label} must be at least ${min}`)
    .max(max, `${label} cannot exceed ${max}`);

export const DeliveryPathSchema = z.enum(['hub', 'api']);

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

// ============================================================================
// Relay Configuration
// ============================================================================

export const RelayConfigSchema = z
  .object({
    // Endpoints
    hubProvisioningEndpoint: EndpointUrlSchema,
    apiBaseUrl: EndpointUrlSchema,
    provisioningApiKey: ApiKeySchema.optional(),
    apiKey: ApiKeySchema.optional(),

    // Retry policy
    maxRetries: z.number().int().min(0).max(100),
    baseBackoffSeconds: seconds('baseBackoffSeconds', 1, 3600),
    maxBackoffSeconds: seconds('maxBackoffSeconds', 1, 86_400),
    jitterFactor: z.number().min(0).max(1),

    // Identity rules
    reservedTestCodes: z.array(z.string().min(1).max(64)).max(100),
    minCodeLength: z.number().int().min(1).max(64),
    reservedCodeMaxEditDistance: z.number().int().min(0).max(10),
    duplicateCooldownSeconds: seconds('duplicateCooldownSeconds', 0, 86_400),

    // Scheduling
    connectivityPollIntervalSeconds: seconds('connectivityPollIntervalSeconds', 1, 3600),
    drainIntervalSeconds: seconds('drainIntervalSeconds', 1, 3600),
    drainBatchSize: z.number().int().min(1).max(500),

    // Deadlines
    provisioningTimeoutSeconds: seconds('provisioningTimeoutSeconds', 1, 120),
    apiTimeoutSeconds: seconds('apiTimeoutSeconds', 1, 120),
    hubSendTimeoutSeconds: seconds('hubSendTimeoutSeconds', 1, 120),
    deliveryTimeoutSeconds: seconds('deliveryTimeoutSeconds', 1, 300),
    staleAckSeconds: seconds('staleAckSeconds', 1, 600),

    // Connectivity probe
    connectivityProbeHost: z.string().min(1).max(253),
    connectivityProbePort: z.number().int().min(1).max(65_535),

    // Delivery
    requiredSinks: z.array(DeliveryPathSchema).min(1),

    // Runtime
    databasePath: z.string().min(1).max(500),
    sourceDeviceTag: z.string().min(1).max(100),
    logLevel: LogLevelSchema,
  })
  .refine((config) => config.maxBackoffSeconds >= config.baseBackoffSeconds, {
    message: 'maxBackoffSeconds must be >= baseBackoffSeconds',
    path: ['maxBackoffSeconds'],
  });

export type RelayConfig = z.infer<typeof RelayConfigSchema>;

/**
 * Shape accepted from a config file: any subset of keys, unknown keys rejected
 */
export const RelayConfigFileSchema = RelayConfigSchema.innerType().partial().strict();
export type RelayConfigFile = z.infer<typeof RelayConfigFileSchema>;

// ============================================================================
// Defaults
// ============================================================================

/**
 * Defaults for everything except the two endpoints, which have no sane value
 */
export const DEFAULT_CONFIG: Omit<RelayConfig, 'hubProvisioningEndpoint' | 'apiBaseUrl'> = {
  maxRetries: 5,
  baseBackoffSeconds: 2,
  maxBackoffSeconds: 300,
  jitterFactor: 0.3,
  reservedTestCodes: ['817994ccfe14'],
  minCodeLength: 6,
  reservedCodeMaxEditDistance: 2,
  duplicateCooldownSeconds: 0,
  connectivityPollIntervalSeconds: 15,
  drainIntervalSeconds: 10,
  drainBatchSize: 20,
  provisioningTimeoutSeconds: 10,
  apiTimeoutSeconds: 30,
  hubSendTimeoutSeconds: 10,
  deliveryTimeoutSeconds: 30,
  staleAckSeconds: 60,
  connectivityProbeHost: '1.1.1.1',
  connectivityProbePort: 443,
  requiredSinks: ['hub'],
  databasePath: './data/scan-relay.db',
  sourceDeviceTag: 'scanner-01',
  logLevel: 'info',
};
