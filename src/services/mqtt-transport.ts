/**
 * MQTT transport for the cloud hub
 *
 * One MQTT session per device identity, authenticated with a SAS token.
 * Automatic reconnect in the mqtt library is disabled: reconnect timing
 * belongs to HubClientService so it can apply the relay's backoff policy.
 *
 * @module services/mqtt-transport
 */

import { connect, type IClientOptions, type MqttClient } from 'mqtt';
import {
  SAS_TOKEN_TTL_SECONDS,
  generateSasToken,
  mqttUsername,
  type HubCredential,
} from '../utils/hub-credentials';
import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

/**
 * A live, authenticated link to the hub for one identity
 */
export interface HubConnection {
  /** Resolves once the hub acknowledged the message (QoS 1 PUBACK) */
  publish(topic: string, payload: string): Promise<void>;
  end(): Promise<void>;
  /** Called at most once, when the link drops after being established */
  onDisconnect(listener: (reason: string) => void): void;
}

/**
 * Opens a connection; resolves only once the hub accepted it
 */
export type HubConnectionFactory = (credential: HubCredential) => Promise<HubConnection>;

export interface MqttTransportOptions {
  connectTimeoutMs: number;
  port?: number;
}

const MQTTS_PORT = 8883;

const log = createLogger('mqtt-transport');

// ============================================================================
// MQTT Connection
// ============================================================================

class MqttHubConnection implements HubConnection {
  private readonly listeners: Array<(reason: string) => void> = [];
  private dropped = false;

  constructor(private readonly client: MqttClient) {
    client.on('close', () => this.drop('connection closed'));
    client.on('offline', () => this.drop('client offline'));
    client.on('error', (error) => this.drop(error.message));
  }

  async publish(topic: string, payload: string): Promise<void> {
    await this.client.publishAsync(topic, payload, { qos: 1 });
  }

  async end(): Promise<void> {
    this.dropped = true;
    await this.client.endAsync(true);
  }

  onDisconnect(listener: (reason: string) => void): void {
    this.listeners.push(listener);
  }

  private drop(reason: string): void {
    if (this.dropped) return;
    this.dropped = true;
    for (const listener of this.listeners) {
      listener(reason);
    }
  }
}

/**
 * Build the default connection factory
 */
export function createMqttConnectionFactory(options: MqttTransportOptions): HubConnectionFactory {
  return (credential) =>
    new Promise<HubConnection>((resolve, reject) => {
      const clientOptions: IClientOptions = {
        clientId: credential.deviceId,
        username: mqttUsername(credential),
        password: generateSasToken(credential, Math.floor(Date.now() / 1000) + SAS_TOKEN_TTL_SECONDS),
        protocolVersion: 4,
        clean: false,
        reconnectPeriod: 0,
        connectTimeout: options.connectTimeoutMs,
        keepalive: 60,
      };

      const client = connect(`mqtts://${credential.hostName}:${options.port ?? MQTTS_PORT}`, clientOptions);

      const fail = (reason: string) => {
        client.removeAllListeners();
        // The socket may still report errors while it is torn down
        client.on('error', (error) => log.debug('Error after failed connect', { error: error.message }));
        client.end(true);
        reject(new Error(`Hub connection for ${credential.deviceId} failed: ${reason}`));
      };

      client.once('connect', () => {
        client.removeAllListeners();
        resolve(new MqttHubConnection(client));
      });
      client.once('error', (error) => fail(error.message));
      client.once('close', () => fail('closed before CONNACK'));
    });
}
