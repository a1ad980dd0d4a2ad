import { DeviceConfig, Entity } from './types';

/**
 * Fixed list of lights for this session. Entities are added at startup and
 * never removed; only the state publisher changes their level.
 */
export class EntityRegistry {
  private entities = new Map<string, Entity>();

  constructor(devices: DeviceConfig[] = []) {
    for (const device of devices) {
      this.add(device);
    }
  }

  add(device: DeviceConfig): Entity {
    const existing = this.entities.get(device.id);
    if (existing) {
      return existing;
    }
    const entity: Entity = { id: device.id, name: device.name, level: null };
    this.entities.set(device.id, entity);
    return entity;
  }

  has(id: string): boolean {
    return this.entities.has(id);
  }

  get(id: string): Entity | undefined {
    return this.entities.get(id);
  }

  list(): Entity[] {
    return Array.from(this.entities.values());
  }

  get size(): number {
    return this.entities.size;
  }
}
