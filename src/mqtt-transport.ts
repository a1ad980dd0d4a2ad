import mqtt, { IClientOptions, IClientPublishOptions, MqttClient } from 'mqtt';
import { MqttConfig } from './types';

export interface PublishOptions {
  retain: boolean;
  qos?: IClientPublishOptions['qos'];
}

export interface MessageBus {
  publish(topic: string, payload: string, options: PublishOptions): void;
}

export type MessageHandler = (topic: string, payload: string) => void;

export interface LastWill {
  topic: string;
  payload: string;
}

export class MQTTTransport implements MessageBus {
  private client: MqttClient | null = null;
  private subscriptions = new Set<string>();
  private messageHandlers: MessageHandler[] = [];
  private connectHandlers: Array<() => void> = [];

  constructor(
    private config: MqttConfig,
    private will?: LastWill
  ) {}

  connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const options: IClientOptions = {
        clientId: this.config.clientId || `zense-bridge-${Date.now()}`,
        reconnectPeriod: 5000,
        connectTimeout: 10000,
        clean: true,
      };

      if (this.config.username) {
        options.username = this.config.username;
      }
      if (this.config.password) {
        options.password = this.config.password;
      }
      if (this.will) {
        options.will = { topic: this.will.topic, payload: this.will.payload, qos: 0, retain: true };
      }

      this.client = mqtt.connect(this.config.brokerUrl, options);

      this.client.on('connect', () => {
        console.log(`[MQTT] Connected to broker at ${this.config.brokerUrl}`);
        this.subscribe(Array.from(this.subscriptions));
        for (const handler of this.connectHandlers) {
          handler();
        }
        resolve();
      });

      this.client.on('error', (error) => {
        console.error('[MQTT] Error:', error);
        reject(error);
      });

      this.client.on('message', (topic, payload) => {
        const text = payload.toString().trim();
        for (const handler of this.messageHandlers) {
          handler(topic, text);
        }
      });

      this.client.on('reconnect', () => {
        console.log('[MQTT] Reconnecting...');
      });

      this.client.on('close', () => {
        console.log('[MQTT] Connection closed');
      });
    });
  }

  isConnected(): boolean {
    return this.client?.connected ?? false;
  }

  /** Runs on the first connect and on every reconnect */
  onConnect(handler: () => void): void {
    this.connectHandlers.push(handler);
  }

  onMessage(handler: MessageHandler): void {
    this.messageHandlers.push(handler);
  }

  /** Remembered topics are re-subscribed after every reconnect */
  subscribe(topics: string[]): void {
    for (const topic of topics) {
      this.subscriptions.add(topic);
    }
    if (!this.client?.connected) {
      return;
    }
    for (const topic of topics) {
      this.client.subscribe(topic, (err) => {
        if (err) {
          console.error(`[MQTT] Failed to subscribe to ${topic}:`, err);
        } else {
          console.log(`[MQTT] Subscribed to ${topic}`);
        }
      });
    }
  }

  unsubscribe(topics: string[]): void {
    for (const topic of topics) {
      this.subscriptions.delete(topic);
    }
    if (this.client?.connected && topics.length > 0) {
      this.client.unsubscribe(topics);
    }
  }

  publish(topic: string, payload: string, options: PublishOptions): void {
    if (!this.client) {
      console.warn(`[MQTT] Cannot publish to ${topic}: MQTT client not initialized`);
      return;
    }

    if (!this.client.connected) {
      console.warn(`[MQTT] Cannot publish to ${topic}: MQTT client not connected`);
      return;
    }

    this.client.publish(topic, payload, { retain: options.retain, qos: options.qos ?? 0 }, (err) => {
      if (err) {
        console.error(`[MQTT] Failed to publish to ${topic}:`, err);
      }
    });
  }

  disconnect(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (!client) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      client.end(false, {}, () => resolve());
    });
  }
}
