import mqtt, { MqttClient } from 'mqtt';
import { describeError } from '../errors/CustomError';
import { Reading, toReadingPayload } from '../types/telemetry';

/**
 * Republishes recorded readings to an MQTT topic with the retain flag, so a
 * late subscriber immediately gets the latest value.
 *
 * One long-lived client is kept for the whole acquisition (a reading per tick
 * would otherwise mean a connection per tick). Publish failures are reported
 * to the caller; the lifecycle only logs them.
 */
export class MqttPublisher {
  private client: MqttClient | null = null;

  constructor(
    private readonly broker: string,
    private readonly topic: string,
  ) {}

  start(): void {
    if (this.client) return;
    const client = mqtt.connect(this.broker, { reconnectPeriod: 2000 });
    client.on('connect', () => {
      console.log(`[MQTT] Connected to ${this.broker}, publishing to ${this.topic}`);
    });
    client.on('error', err => {
      console.error('[MQTT] Publisher error:', err.message);
    });
    this.client = client;
  }

  publish(reading: Reading): Promise<void> {
    const client = this.client;
    if (!client) {
      return Promise.reject(new Error('MQTT publisher not started'));
    }
    const payload = JSON.stringify(toReadingPayload(reading));
    return new Promise<void>((resolve, reject) => {
      client.publish(this.topic, payload, { retain: true, qos: 0 }, err => {
        if (err) return reject(err);
        resolve();
      });
    });
  }

  /** Publishes without letting a broker problem reach the acquisition. */
  forward(reading: Reading): void {
    this.publish(reading).catch(err => {
      console.warn(`[MQTT] Publish failed: ${describeError(err)}`);
    });
  }

  stop(): void {
    if (!this.client) return;
    this.client.end();
    this.client = null;
  }
}
