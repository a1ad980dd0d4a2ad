export interface Entity {
  /** Device id token used by the gateway protocol */
  id: string;
  name: string;
  level: number | null; // 0-100, null until the gateway confirms a value
}

export interface DeviceConfig {
  id: string;
  name: string;
}

export type CommandKind = 'on_off' | 'brightness';

export type DeviceVerb = 'Set' | 'Fade';

export interface DeviceOp {
  entityId: string;
  verb: DeviceVerb;
  level: number;
}

export type LinkState = 'idle' | 'connecting' | 'authenticated' | 'backoff' | 'cooldown' | 'closed';

export interface GatewayConfig {
  host: string;
  port: number;
  code: string;
  socketTimeoutMs: number;
  cmdGapMs: number;
  keepAliveMs: number;
  reconnectMinMs: number;
  reconnectMaxMs: number;
  authCooldownMs: number;
  maxProtocolErrors: number;
}

export interface MqttConfig {
  brokerUrl: string;
  username?: string;
  password?: string;
  clientId?: string;
}

export interface TopicConfig {
  discoveryPrefix: string;
  baseTopic: string;
  uidPrefix: string;
}

export interface BridgeConfig {
  gateway: GatewayConfig;
  mqtt: MqttConfig;
  topics: TopicConfig;
  devices: DeviceConfig[];
  statePollMs: number;
  debounceMs: number;
  levelOnWindowMs: number;
  debug: boolean;
}

export type MQTTSwitchPayload = 'ON' | 'OFF';

export interface MQTTDiscoveryConfig {
  name: string;
  unique_id: string;
  command_topic: string;
  state_topic: string;
  brightness_command_topic: string;
  brightness_state_topic: string;
  brightness_scale: number;
  payload_on: MQTTSwitchPayload;
  payload_off: MQTTSwitchPayload;
  availability_topic: string;
  payload_available: string;
  payload_not_available: string;
  optimistic: boolean;
  qos: 0 | 1 | 2;
}
