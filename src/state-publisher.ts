import { MessageBus } from './mqtt-transport';
import { clampLevel, MAX_LEVEL } from './protocol';
import { EntityRegistry } from './registry';
import { AVAILABLE, NOT_AVAILABLE, availabilityTopic, entityTopics } from './topics';
import { Entity, MQTTDiscoveryConfig, MQTTSwitchPayload, TopicConfig } from './types';

export class StatePublisher {
  // Last level sent per entity; identical levels are not re-sent
  private lastPublished = new Map<string, number>();

  constructor(
    private bus: MessageBus,
    private registry: EntityRegistry,
    private topics: TopicConfig,
    private debug = false
  ) {}

  publishDiscovery(entities: Entity[] = this.registry.list()): void {
    const availability = availabilityTopic(this.topics);
    for (const entity of entities) {
      const t = entityTopics(this.topics, entity.id);
      const payload: MQTTDiscoveryConfig = {
        name: `${entity.name} (Zense)`,
        unique_id: t.uniqueId,
        command_topic: t.command,
        state_topic: t.state,
        brightness_command_topic: t.brightnessCommand,
        brightness_state_topic: t.brightnessState,
        brightness_scale: MAX_LEVEL,
        payload_on: 'ON',
        payload_off: 'OFF',
        availability_topic: availability,
        payload_available: AVAILABLE,
        payload_not_available: NOT_AVAILABLE,
        optimistic: false,
        qos: 0,
      };
      this.bus.publish(t.discovery, JSON.stringify(payload), { retain: true });
    }
    console.log(`[State] Published discovery for ${entities.length} light(s)`);
  }

  /**
   * Publish a confirmed device level (0-100) as retained ON/OFF plus brightness.
   * Returns false when the entity is unknown or the level was already published.
   */
  publishState(entityId: string, level: number): boolean {
    const entity = this.registry.get(entityId);
    if (!entity) {
      console.warn(`[State] Ignoring state for unknown entity ${entityId}`);
      return false;
    }

    const lvl = clampLevel(level);
    entity.level = lvl;
    if (this.lastPublished.get(entityId) === lvl) {
      return false;
    }
    this.lastPublished.set(entityId, lvl);

    const t = entityTopics(this.topics, entityId);
    const power: MQTTSwitchPayload = lvl > 0 ? 'ON' : 'OFF';
    if (this.debug) {
      console.log(`[State] ${entityId} -> ${power} ${lvl}`);
    }
    this.bus.publish(t.state, power, { retain: true });
    this.bus.publish(t.brightnessState, String(lvl), { retain: true });
    return true;
  }

  publishAvailability(online: boolean): void {
    this.bus.publish(availabilityTopic(this.topics), online ? AVAILABLE : NOT_AVAILABLE, { retain: true });
  }

  /** Forget what was sent so the next state for every entity goes out again */
  invalidate(): void {
    this.lastPublished.clear();
  }
}
