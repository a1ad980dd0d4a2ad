import { vi } from 'vitest';
import { MQTTTransport } from './mqtt-transport';

const { mockMqttClient, connectFn } = vi.hoisted(() => {
  type Listener = (...args: unknown[]) => void;
  const listeners = new Map<string, Listener[]>();

  const mockMqttClient = {
    connected: false,
    listeners,
    on: vi.fn((event: string, listener: Listener) => {
      listeners.set(event, [...(listeners.get(event) ?? []), listener]);
    }),
    subscribe: vi.fn((_topic: string, callback?: (err: Error | null) => void) => {
      callback?.(null);
    }),
    unsubscribe: vi.fn(),
    publish: vi.fn((_topic: string, _payload: string, _options: object, callback?: (err?: Error) => void) => {
      callback?.();
    }),
    end: vi.fn((_force: boolean, _options: object, callback?: () => void) => {
      callback?.();
    }),
    emit(event: string, ...args: unknown[]) {
      for (const listener of listeners.get(event) ?? []) {
        listener(...args);
      }
    },
  };

  const connectFn = vi.fn((_url: string, _options: object) => mockMqttClient);
  return { mockMqttClient, connectFn };
});

vi.mock('mqtt', () => ({
  __esModule: true,
  default: { connect: connectFn },
}));

describe('MQTTTransport', () => {
  let transport: MQTTTransport;

  const connectNow = async () => {
    const connecting = transport.connect();
    mockMqttClient.connected = true;
    mockMqttClient.emit('connect');
    await connecting;
  };

  beforeEach(() => {
    vi.clearAllMocks();
    mockMqttClient.listeners.clear();
    mockMqttClient.connected = false;

    transport = new MQTTTransport(
      { brokerUrl: 'mqtt://localhost:1883', username: 'bridge', password: 'test-secret' },
      { topic: 'zense/availability', payload: 'offline' }
    );
  });

  describe('Connection', () => {
    it('should connect to MQTT broker with credentials and last will', async () => {
      await connectNow();

      expect(connectFn).toHaveBeenCalledWith(
        'mqtt://localhost:1883',
        expect.objectContaining({
          reconnectPeriod: 5000,
          connectTimeout: 10000,
          clean: true,
          username: 'bridge',
          password: 'test-secret',
          will: { topic: 'zense/availability', payload: 'offline', qos: 0, retain: true },
        })
      );
      expect(transport.isConnected()).toBe(true);
    });

    it('should leave credentials out when none are configured', async () => {
      transport = new MQTTTransport({ brokerUrl: 'mqtt://localhost:1883' });

      await connectNow();

      const options = connectFn.mock.calls[0][1];
      expect(options).not.toHaveProperty('username');
      expect(options).not.toHaveProperty('password');
      expect(options).not.toHaveProperty('will');
    });

    it('should use the configured client id', async () => {
      transport = new MQTTTransport({ brokerUrl: 'mqtt://localhost:1883', clientId: 'bridge-1' });

      await connectNow();

      expect(connectFn.mock.calls[0][1]).toHaveProperty('clientId', 'bridge-1');
    });

    it('should reject when the broker errors before connecting', async () => {
      const connecting = transport.connect();
      mockMqttClient.emit('error', new Error('Connection refused'));

      await expect(connecting).rejects.toThrow('Connection refused');
    });

    it('should run connect handlers on every connect', async () => {
      const handler = vi.fn();
      transport.onConnect(handler);

      await connectNow();
      mockMqttClient.emit('connect');

      expect(handler).toHaveBeenCalledTimes(2);
    });

    it('should end the client on disconnect', async () => {
      await connectNow();

      await transport.disconnect();

      expect(mockMqttClient.end).toHaveBeenCalledWith(false, {}, expect.any(Function));
      expect(transport.isConnected()).toBe(false);
    });

    it('should resolve disconnect when never connected', async () => {
      await expect(transport.disconnect()).resolves.toBeUndefined();
      expect(mockMqttClient.end).not.toHaveBeenCalled();
    });
  });

  describe('Subscriptions', () => {
    it('should subscribe remembered topics once connected', async () => {
      transport.subscribe(['zense/+/set', 'zense/+/brightness/set']);
      expect(mockMqttClient.subscribe).not.toHaveBeenCalled();

      await connectNow();

      expect(mockMqttClient.subscribe.mock.calls.map((call) => call[0])).toEqual([
        'zense/+/set',
        'zense/+/brightness/set',
      ]);
    });

    it('should resubscribe after a reconnect', async () => {
      transport.subscribe(['zense/+/set']);
      await connectNow();
      mockMqttClient.emit('connect');

      expect(mockMqttClient.subscribe).toHaveBeenCalledTimes(2);
    });

    it('should forget unsubscribed topics', async () => {
      transport.subscribe(['zense/+/set', 'homeassistant/status']);
      await connectNow();

      transport.unsubscribe(['zense/+/set']);
      mockMqttClient.emit('connect');

      expect(mockMqttClient.unsubscribe).toHaveBeenCalledWith(['zense/+/set']);
      expect(mockMqttClient.subscribe.mock.calls.map((call) => call[0])).toEqual([
        'zense/+/set',
        'homeassistant/status',
        'homeassistant/status',
      ]);
    });

    it('should deliver trimmed message payloads', async () => {
      const handler = vi.fn();
      transport.onMessage(handler);
      await connectNow();

      mockMqttClient.emit('message', 'zense/z_12/set', Buffer.from(' ON\n'));

      expect(handler).toHaveBeenCalledWith('zense/z_12/set', 'ON');
    });
  });

  describe('Publishing', () => {
    it('should publish with retain and qos 0 by default', async () => {
      await connectNow();

      transport.publish('zense/z_12/state', 'ON', { retain: true });

      expect(mockMqttClient.publish).toHaveBeenCalledWith(
        'zense/z_12/state',
        'ON',
        { retain: true, qos: 0 },
        expect.any(Function)
      );
    });

    it('should pass an explicit qos through', async () => {
      await connectNow();

      transport.publish('zense/z_12/state', 'OFF', { retain: false, qos: 1 });

      expect(mockMqttClient.publish).toHaveBeenCalledWith(
        'zense/z_12/state',
        'OFF',
        { retain: false, qos: 1 },
        expect.any(Function)
      );
    });

    it('should not publish before the client exists', () => {
      transport.publish('zense/z_12/state', 'ON', { retain: true });

      expect(mockMqttClient.publish).not.toHaveBeenCalled();
    });

    it('should not publish while disconnected', async () => {
      await connectNow();
      mockMqttClient.connected = false;

      transport.publish('zense/z_12/state', 'ON', { retain: true });

      expect(mockMqttClient.publish).not.toHaveBeenCalled();
    });
  });
});
