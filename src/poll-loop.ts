import { DeviceChannel } from './device-link';
import { delay } from './delay';
import { describeError } from './errors';
import { getCommand, parseLevel } from './protocol';
import { EntityRegistry } from './registry';
import { StatePublisher } from './state-publisher';

/**
 * Periodic Get sweep so changes made at wall switches reach MQTT.
 * Shares the link's request lane with command traffic.
 */
export class PollLoop {
  private running: Promise<void> | null = null;
  private sweep: Promise<number> | null = null;
  private stopper: AbortController | null = null;
  private halted = false;

  constructor(
    private channel: DeviceChannel,
    private registry: EntityRegistry,
    private publisher: StatePublisher,
    private intervalMs: number
  ) {}

  get enabled(): boolean {
    return this.intervalMs > 0;
  }

  isRunning(): boolean {
    return this.running !== null;
  }

  start(): void {
    if (!this.enabled) {
      console.log('[Poll] State polling disabled');
      return;
    }
    if (this.running) {
      return;
    }
    this.halted = false;
    const stopper = new AbortController();
    this.stopper = stopper;
    console.log(`[Poll] Polling ${this.registry.size} light(s) every ${this.intervalMs / 1000}s`);
    this.running = this.loop(stopper.signal)
      .catch((error) => {
        console.error('[Poll] Loop failed:', error);
      })
      .finally(() => {
        if (this.stopper === stopper) {
          this.running = null;
          this.stopper = null;
        }
      });
  }

  stop(): void {
    this.halted = true;
    this.stopper?.abort();
    this.stopper = null;
    this.running = null;
  }

  /**
   * Query every entity once. A failing entity is logged and skipped.
   * Overlapping calls share the sweep already in progress.
   * Resolves with the number of entities that answered.
   */
  runOnce(): Promise<number> {
    if (!this.sweep) {
      this.sweep = this.pollAll().finally(() => {
        this.sweep = null;
      });
    }
    return this.sweep;
  }

  private async loop(signal: AbortSignal): Promise<void> {
    while (await delay(this.intervalMs, signal)) {
      await this.runOnce();
    }
  }

  private async pollAll(): Promise<number> {
    let answered = 0;
    for (const entity of this.registry.list()) {
      if (this.halted) {
        break;
      }
      try {
        const level = await this.channel.request(getCommand(entity.id), parseLevel);
        this.publisher.publishState(entity.id, level);
        answered += 1;
      } catch (error) {
        console.warn(`[Poll] Get ${entity.id} failed: ${describeError(error)}`);
      }
    }
    return answered;
  }
}
