/**
 * Topic layout shared by the broker and its clients.
 */

export const PRESENCE_TOPIC = 'broker/presence';

export const Topics = {
  presence: PRESENCE_TOPIC,
  reserveRequest: (channelId: string) => `channel/${channelId}/reserve/request`,
  reserveRenew: (channelId: string) => `channel/${channelId}/reserve/renew`,
  reserveRelease: (channelId: string) => `channel/${channelId}/reserve/release`,
  reserveGrant: (channelId: string) => `channel/${channelId}/reserve/grant`,
  reserveReply: (channelId: string) => `channel/${channelId}/reserve/reply`,
  invokeRequest: (channelId: string) => `channel/${channelId}/invoke/request`,
  invokeCancel: (channelId: string) => `channel/${channelId}/invoke/cancel`,
  invokeStatus: (channelId: string) => `channel/${channelId}/invoke/status`,
  clientStatus: (clientId: string) => `client/${clientId}/status`,
  deviceState: (device: string) => `device/${device}/state`,
  deviceCommand: (device: string) => `device/${device}/command`,
  deviceReply: (device: string) => `device/${device}/reply`,
} as const;

export const TopicPatterns = {
  reserveRequest: 'channel/+/reserve/request',
  reserveRenew: 'channel/+/reserve/renew',
  reserveRelease: 'channel/+/reserve/release',
  reserveGrant: 'channel/+/reserve/grant',
  reserveReply: 'channel/+/reserve/reply',
  invokeRequest: 'channel/+/invoke/request',
  invokeCancel: 'channel/+/invoke/cancel',
  invokeStatus: 'channel/+/invoke/status',
  clientStatus: 'client/+/status',
  deviceState: 'device/+/state',
  deviceReply: 'device/+/reply',
} as const;

/**
 * MQTT-style wildcard match: `+` matches exactly one level, a trailing `#`
 * matches the rest (including nothing).
 */
export function topicMatches(pattern: string, topic: string): boolean {
  const patternLevels = pattern.split('/');
  const topicLevels = topic.split('/');

  for (let i = 0; i < patternLevels.length; i++) {
    const level = patternLevels[i];
    if (level === '#') {
      return i === patternLevels.length - 1;
    }
    const actual = topicLevels[i];
    if (actual === undefined) {
      return false;
    }
    if (level !== '+' && level !== actual) {
      return false;
    }
  }
  return patternLevels.length === topicLevels.length;
}

/**
 * Second level of a `<kind>/<id>/...` topic: the channel id, client id or
 * device name.
 */
export function topicSubject(topic: string): string | undefined {
  const subject = topic.split('/')[1];
  return subject === undefined || subject === '' ? undefined : subject;
}
