import { DeviceChannel } from './device-link';
import { delay } from './delay';
import { describeError } from './errors';
import { clampLevel, fadeCommand, MAX_LEVEL, parseAck, setCommand } from './protocol';
import { EntityRegistry } from './registry';
import { CommandKind, DeviceOp } from './types';

export interface TranslatorOptions {
  levelOnWindowMs: number;
  debounceMs: number;
  debug?: boolean;
  now?: () => number;
}

export type AppliedListener = (entityId: string, level: number) => void;

interface PendingBrightness {
  level: number;
  at: number;
}

interface QueuedOp extends DeviceOp {
  settle: Array<() => void>;
}

/**
 * Maps on/off and brightness intents onto Set/Fade frames.
 *
 * Home Assistant sends "brightness" and "ON" as two messages for a single
 * slider move. An ON that follows a brightness command for the same entity
 * within levelOnWindowMs is dropped, otherwise it would override the level
 * with Set 100.
 */
export class CommandTranslator {
  private pending = new Map<string, PendingBrightness>();
  private queue: QueuedOp[] = [];
  private draining: Promise<void> | null = null;
  private disposed = new AbortController();
  private now: () => number;

  constructor(
    private channel: DeviceChannel,
    private registry: EntityRegistry,
    private options: TranslatorOptions,
    private onApplied: AppliedListener = () => undefined
  ) {
    this.now = options.now ?? (() => Date.now());
  }

  handle(entityId: string, kind: 'on_off', value: boolean): Promise<void>;
  handle(entityId: string, kind: 'brightness', value: number): Promise<void>;
  handle(entityId: string, kind: CommandKind, value: boolean | number): Promise<void> {
    if (!this.registry.has(entityId)) {
      console.warn(`[Command] Unknown entity ${entityId}, ignoring ${kind}`);
      return Promise.resolve();
    }

    if (kind === 'brightness') {
      if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > MAX_LEVEL) {
        console.warn(`[Command] Invalid brightness ${String(value)} for ${entityId}`);
        return Promise.resolve();
      }
      this.pending.set(entityId, { level: value, at: this.now() });
      return this.enqueue({ entityId, verb: 'Fade', level: value });
    }

    if (value === false) {
      this.pending.delete(entityId);
      return this.enqueue({ entityId, verb: 'Set', level: 0 });
    }

    const pending = this.pending.get(entityId);
    this.pending.delete(entityId);
    if (pending && this.now() - pending.at <= this.options.levelOnWindowMs) {
      if (this.options.debug) {
        console.log(`[Command] Ignoring ON for ${entityId}: brightness ${pending.level} was just requested`);
      }
      return Promise.resolve();
    }
    return this.enqueue({ entityId, verb: 'Set', level: MAX_LEVEL });
  }

  /** Resolves once every queued frame has been sent or dropped */
  async idle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  /** Drop queued frames and stop the worker */
  dispose(): void {
    this.disposed.abort();
    const dropped = this.queue.splice(0);
    for (const op of dropped) {
      op.settle.forEach((settle) => settle());
    }
    this.pending.clear();
  }

  private enqueue(op: DeviceOp): Promise<void> {
    if (this.disposed.signal.aborted) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      const last = this.queue[this.queue.length - 1];
      // Consecutive slider positions for one light collapse into the latest
      if (last && op.verb === 'Fade' && last.verb === 'Fade' && last.entityId === op.entityId) {
        last.level = op.level;
        last.settle.push(resolve);
      } else {
        this.queue.push({ ...op, settle: [resolve] });
      }
      this.startWorker();
    });
  }

  private startWorker(): void {
    if (this.draining) {
      return;
    }
    this.draining = this.drain()
      .catch((error) => {
        console.error('[Command] Worker failed:', error);
      })
      .finally(() => {
        this.draining = null;
        if (this.queue.length > 0 && !this.disposed.signal.aborted) {
          this.startWorker();
        }
      });
  }

  private async drain(): Promise<void> {
    if (this.options.debounceMs > 0) {
      const elapsed = await delay(this.options.debounceMs, this.disposed.signal);
      if (!elapsed) {
        return;
      }
    }

    let op = this.queue.shift();
    while (op) {
      try {
        await this.execute(op);
      } finally {
        op.settle.forEach((settle) => settle());
      }
      op = this.queue.shift();
    }
  }

  private async execute(op: QueuedOp): Promise<void> {
    const level = clampLevel(op.level);
    const command = op.verb === 'Fade' ? fadeCommand(op.entityId, level) : setCommand(op.entityId, level);
    if (this.options.debug) {
      console.log(`[Command] TX ${command}`);
    }

    try {
      await this.channel.request(command, parseAck);
    } catch (error) {
      console.error(`[Command] ${command} failed: ${describeError(error)}`);
      return;
    }
    this.onApplied(op.entityId, level);
  }
}
