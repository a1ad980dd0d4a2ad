import { CommandTranslator } from './command-translator';
import { DeviceChannel, LinkStateListener } from './device-link';
import { describeError } from './errors';
import { MessageBus, MessageHandler } from './mqtt-transport';
import { MAX_LEVEL } from './protocol';
import { PollLoop } from './poll-loop';
import { EntityRegistry } from './registry';
import { StatePublisher } from './state-publisher';
import { HA_STATUS_TOPIC, commandSubscriptions, parseCommandTopic } from './topics';
import { BridgeConfig } from './types';

/** What the bridge needs from the gateway connection */
export interface GatewayLink extends DeviceChannel {
  start(): void;
  close(): void;
  isConnected(): boolean;
  onStateChange(listener: LinkStateListener): () => void;
  listDevices(): Promise<string[]>;
  getName(id: string): Promise<string>;
}

/** What the bridge needs from the MQTT connection */
export interface BusTransport extends MessageBus {
  connect(): Promise<void>;
  onConnect(handler: () => void): void;
  onMessage(handler: MessageHandler): void;
  subscribe(topics: string[]): void;
  unsubscribe(topics: string[]): void;
  disconnect(): Promise<void>;
}

/**
 * Brightness payloads arrive on the 0-100 scale declared in discovery, but
 * values above 100 are taken as the 0-255 scale some clients still send.
 */
export function parseBrightnessPayload(payload: string): number | null {
  const text = payload.trim();
  if (text === '') {
    return null;
  }
  const value = Number(text);
  if (!Number.isFinite(value)) {
    return null;
  }
  const raw = Math.round(value);
  if (raw < 0) {
    return 0;
  }
  if (raw <= MAX_LEVEL) {
    return raw;
  }
  return Math.round((Math.min(raw, 255) / 255) * MAX_LEVEL);
}

export function parseSwitchPayload(payload: string): boolean | null {
  const upper = payload.trim().toUpperCase();
  if (upper === 'ON') {
    return true;
  }
  if (upper === 'OFF') {
    return false;
  }
  return null;
}

export class Bridge {
  readonly registry: EntityRegistry;
  private publisher: StatePublisher;
  private translator: CommandTranslator;
  private poller: PollLoop;
  private syncing: Promise<void> | null = null;
  private resync = false;
  // Gateway ids whose Get Name failed; their placeholder names are retried on the next sync
  private unnamed = new Set<string>();
  private detachLink: (() => void) | null = null;
  private stopped = false;

  constructor(
    private config: BridgeConfig,
    private transport: BusTransport,
    private link: GatewayLink
  ) {
    this.registry = new EntityRegistry(config.devices);
    this.publisher = new StatePublisher(transport, this.registry, config.topics, config.debug);
    this.translator = new CommandTranslator(
      link,
      this.registry,
      {
        levelOnWindowMs: config.levelOnWindowMs,
        debounceMs: config.debounceMs,
        debug: config.debug,
      },
      (entityId, level) => {
        this.publisher.publishState(entityId, level);
      }
    );
    this.poller = new PollLoop(link, this.registry, this.publisher, config.statePollMs);
  }

  start(): void {
    this.transport.onMessage((topic, payload) => {
      this.handleMessage(topic, payload).catch((error) => {
        console.error(`[Bridge] Failed to handle ${topic}:`, error);
      });
    });
    this.transport.onConnect(() => this.onBusConnected());
    this.transport.subscribe(this.subscriptions());

    this.detachLink = this.link.onStateChange((state) => {
      if (state === 'authenticated') {
        this.scheduleSync();
      }
    });

    this.link.start();
    // The client keeps retrying; onBusConnected runs once the broker is back
    this.transport.connect().catch((error) => {
      console.error(`[Bridge] MQTT broker not reachable yet: ${describeError(error)}`);
    });
    console.log(`[Bridge] Started with ${this.registry.size} configured light(s)`);
  }

  /** Route one inbound MQTT message. Resolves once the resulting frame is handled. */
  handleMessage(topic: string, payload: string): Promise<void> {
    if (this.stopped) {
      return Promise.resolve();
    }

    if (topic === HA_STATUS_TOPIC) {
      if (payload.trim().toLowerCase() === 'online') {
        console.log('[Bridge] Home Assistant came online, republishing discovery');
        this.publisher.publishDiscovery();
        this.rediscoverIfIncomplete();
      }
      return Promise.resolve();
    }

    const target = parseCommandTopic(this.config.topics, topic);
    if (!target) {
      return Promise.resolve();
    }
    if (this.config.debug) {
      console.log(`[Bridge] RX topic=${topic} payload=${JSON.stringify(payload)}`);
    }

    if (target.kind === 'brightness') {
      const level = parseBrightnessPayload(payload);
      if (level === null) {
        console.warn(`[Bridge] Ignoring brightness payload ${JSON.stringify(payload)} on ${topic}`);
        return Promise.resolve();
      }
      return this.translator.handle(target.entityId, 'brightness', level);
    }

    const on = parseSwitchPayload(payload);
    if (on === null) {
      console.warn(`[Bridge] Ignoring switch payload ${JSON.stringify(payload)} on ${topic}`);
      return Promise.resolve();
    }
    return this.translator.handle(target.entityId, 'on_off', on);
  }

  async stop(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    console.log('[Bridge] Shutting down...');

    this.poller.stop();
    this.translator.dispose();
    this.detachLink?.();
    this.detachLink = null;
    this.publisher.publishAvailability(false);
    this.link.close();
    this.transport.unsubscribe(this.subscriptions());
    await this.transport.disconnect();
  }

  private subscriptions(): string[] {
    return [HA_STATUS_TOPIC, ...commandSubscriptions(this.config.topics)];
  }

  private onBusConnected(): void {
    if (this.stopped) {
      return;
    }
    // A cold-started broker has lost every retained message
    this.publisher.invalidate();
    this.publisher.publishAvailability(true);
    this.rediscoverIfIncomplete();
    if (this.registry.size === 0) {
      return;
    }
    this.publisher.publishDiscovery();
    for (const entity of this.registry.list()) {
      if (entity.level !== null) {
        this.publisher.publishState(entity.id, entity.level);
      }
    }
  }

  /** Ask the gateway again when it has not told us every device and name yet */
  private rediscoverIfIncomplete(): void {
    const incomplete = this.registry.size === 0 || this.unnamed.size > 0;
    if (incomplete && this.link.isConnected()) {
      this.scheduleSync();
    }
  }

  private scheduleSync(): void {
    if (this.stopped) {
      return;
    }
    if (this.syncing) {
      this.resync = true;
      return;
    }
    this.syncing = this.syncWithGateway()
      .catch((error) => {
        console.error(`[Bridge] Sync with gateway failed: ${describeError(error)}`);
      })
      .finally(() => {
        this.syncing = null;
        if (this.resync) {
          this.resync = false;
          this.scheduleSync();
        }
      });
  }

  /** Runs after every gateway login */
  private async syncWithGateway(): Promise<void> {
    if (this.registry.size === 0) {
      await this.discoverEntities();
      if (this.registry.size === 0) {
        console.warn('[Bridge] Gateway reported no devices');
        return;
      }
    } else if (this.unnamed.size > 0) {
      await this.refreshNames();
    }
    if (this.stopped) {
      return;
    }
    this.publisher.publishDiscovery();

    const answered = await this.poller.runOnce();
    console.log(`[Bridge] Initial state for ${answered}/${this.registry.size} light(s)`);
    if (!this.stopped) {
      this.poller.start();
    }
  }

  private async discoverEntities(): Promise<void> {
    const ids = await this.link.listDevices();
    console.log(`[Bridge] Gateway reports device(s): ${ids.join(', ') || 'none'}`);
    for (const id of ids) {
      if (this.stopped) {
        return;
      }
      let name: string;
      try {
        name = await this.link.getName(id);
      } catch (error) {
        console.warn(`[Bridge] Get Name ${id} failed: ${describeError(error)}`);
        name = `Device_${id}`;
        this.unnamed.add(id);
      }
      this.registry.add({ id, name });
    }
  }

  private async refreshNames(): Promise<void> {
    for (const id of Array.from(this.unnamed)) {
      if (this.stopped) {
        return;
      }
      const entity = this.registry.get(id);
      if (!entity) {
        this.unnamed.delete(id);
        continue;
      }
      try {
        entity.name = await this.link.getName(id);
        this.unnamed.delete(id);
      } catch (error) {
        console.warn(`[Bridge] Get Name ${id} failed again: ${describeError(error)}`);
      }
    }
  }
}
