/**
 * Hub credential helpers
 *
 * Credentials are device connection strings of the form
 * `HostName=<host>;DeviceId=<id>;SharedAccessKey=<base64 key>`. The MQTT
 * password is a shared access signature derived from the key.
 *
 * @module utils/hub-credentials
 * @security LM-001: Keys and tokens must never reach a log line
 */

import { createHmac } from 'crypto';

export interface HubCredential {
  hostName: string;
  deviceId: string;
  sharedAccessKey: string;
}

/** MQTT API version announced in the username */
export const HUB_API_VERSION = '2021-04-12';

/** Lifetime of a generated SAS token */
export const SAS_TOKEN_TTL_SECONDS = 3600;

/**
 * Parse a device connection string
 *
 * @throws Error when a required part is missing (the message never includes the key)
 */
export function parseConnectionString(connectionString: string): HubCredential {
  const parts = new Map<string, string>();
  for (const segment of connectionString.split(';')) {
    const index = segment.indexOf('=');
    if (index <= 0) continue;
    parts.set(segment.slice(0, index).trim(), segment.slice(index + 1).trim());
  }

  const hostName = parts.get('HostName');
  const deviceId = parts.get('DeviceId');
  const sharedAccessKey = parts.get('SharedAccessKey');

  const missing = [
    hostName ? null : 'HostName',
    deviceId ? null : 'DeviceId',
    sharedAccessKey ? null : 'SharedAccessKey',
  ].filter((name): name is string => name !== null);

  if (!hostName || !deviceId || !sharedAccessKey) {
    throw new Error(`Connection string is missing ${missing.join(', ')}`);
  }

  return { hostName, deviceId, sharedAccessKey };
}

/**
 * Build a shared access signature for a device
 *
 * @param expiresAt - Unix time in seconds
 */
export function generateSasToken(credential: HubCredential, expiresAt: number): string {
  const resourceUri = encodeURIComponent(`${credential.hostName}/devices/${credential.deviceId}`);
  const signature = createHmac('sha256', Buffer.from(credential.sharedAccessKey, 'base64'))
    .update(`${resourceUri}\n${expiresAt}`)
    .digest('base64');

  return `SharedAccessSignature sr=${resourceUri}&sig=${encodeURIComponent(signature)}&se=${expiresAt}`;
}

export function mqttUsername(credential: HubCredential): string {
  return `${credential.hostName}/${credential.deviceId}/?api-version=${HUB_API_VERSION}`;
}

export function telemetryTopic(deviceId: string): string {
  return `devices/${deviceId}/messages/events/`;
}
