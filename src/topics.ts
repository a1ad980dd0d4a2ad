import { CommandKind, TopicConfig } from './types';

export const HA_STATUS_TOPIC = 'homeassistant/status';
export const AVAILABLE = 'online';
export const NOT_AVAILABLE = 'offline';

export interface EntityTopics {
  uniqueId: string;
  command: string;
  state: string;
  brightnessCommand: string;
  brightnessState: string;
  discovery: string;
}

export function uniqueId(config: TopicConfig, entityId: string): string {
  return `${config.uidPrefix}${entityId}`;
}

export function entityTopics(config: TopicConfig, entityId: string): EntityTopics {
  const uid = uniqueId(config, entityId);
  return {
    uniqueId: uid,
    command: `${config.baseTopic}/${uid}/set`,
    state: `${config.baseTopic}/${uid}/state`,
    brightnessCommand: `${config.baseTopic}/${uid}/brightness/set`,
    brightnessState: `${config.baseTopic}/${uid}/brightness/state`,
    discovery: `${config.discoveryPrefix}/light/${uid}/config`,
  };
}

export function availabilityTopic(config: TopicConfig): string {
  return `${config.baseTopic}/availability`;
}

export function commandSubscriptions(config: TopicConfig): string[] {
  return [`${config.baseTopic}/+/set`, `${config.baseTopic}/+/brightness/set`];
}

/**
 * Topic format: {base}/{uidPrefix}{entityId}/set or .../brightness/set
 */
export function parseCommandTopic(
  config: TopicConfig,
  topic: string
): { entityId: string; kind: CommandKind } | null {
  const base = `${config.baseTopic}/`;
  if (!topic.startsWith(base)) {
    return null;
  }
  const parts = topic.slice(base.length).split('/');

  let kind: CommandKind;
  if (parts.length === 2 && parts[1] === 'set') {
    kind = 'on_off';
  } else if (parts.length === 3 && parts[1] === 'brightness' && parts[2] === 'set') {
    kind = 'brightness';
  } else {
    return null;
  }

  const uid = parts[0];
  if (!uid.startsWith(config.uidPrefix) || uid.length === config.uidPrefix.length) {
    return null;
  }
  return { entityId: uid.slice(config.uidPrefix.length), kind };
}
