import type { ChatPlatformPort } from './ports/chat-platform.port';
import type {
  ChannelMessage,
  ChannelPolicy,
  ChannelRef,
  DeletableSet,
  HistoryQuery,
  RetentionRule,
} from '../types/retention.types';

const MINUTE_MS = 60 * 1000;

export function toRetentionRule(policy: ChannelPolicy): RetentionRule {
  const { timeThresholdMinutes, maxMessages } = policy;
  if (timeThresholdMinutes !== undefined && maxMessages !== undefined) {
    return { kind: 'age-and-count', timeThresholdMinutes, maxMessages };
  }
  if (timeThresholdMinutes !== undefined) return { kind: 'age', timeThresholdMinutes };
  if (maxMessages !== undefined) return { kind: 'count', maxMessages };
  return { kind: 'none' };
}

export function ageCutoff(timeThresholdMinutes: number, now: Date): Date {
  return new Date(now.getTime() - timeThresholdMinutes * MINUTE_MS);
}

function byCreation(a: ChannelMessage, b: ChannelMessage): number {
  return a.createdAt.getTime() - b.createdAt.getTime();
}

/**
 * Selects the messages of one channel that its policy allows deleting.
 *
 * Pinned messages are never selected and do not count towards `maxMessages`.
 * The result is oldest first whatever the order of `history`.
 */
export function evaluateRetention(history: readonly ChannelMessage[], policy: ChannelPolicy, now: Date): DeletableSet {
  const rule = toRetentionRule(policy);
  const unpinned = history.filter((message) => !message.pinned).sort(byCreation);

  switch (rule.kind) {
    case 'none':
      return [];
    case 'age': {
      const cutoff = ageCutoff(rule.timeThresholdMinutes, now).getTime();
      return unpinned.filter((message) => message.createdAt.getTime() < cutoff);
    }
    case 'count':
      return unpinned.slice(0, Math.max(0, unpinned.length - rule.maxMessages));
    case 'age-and-count': {
      const cutoff = ageCutoff(rule.timeThresholdMinutes, now).getTime();
      const firstKept = unpinned.length - rule.maxMessages;
      return unpinned.filter((message, index) => index < firstKept || message.createdAt.getTime() < cutoff);
    }
    default: {
      const unreachable: never = rule;
      return unreachable;
    }
  }
}

/**
 * History query a rule needs. Only the age rule can stop at the cutoff; anything that
 * counts positions from the newest message has to read the whole channel.
 */
export function historyQueryFor(rule: RetentionRule, now: Date): HistoryQuery | null {
  switch (rule.kind) {
    case 'none':
      return null;
    case 'age':
      return { oldestFirst: true, before: ageCutoff(rule.timeThresholdMinutes, now) };
    case 'count':
    case 'age-and-count':
      return { oldestFirst: true };
    default: {
      const unreachable: never = rule;
      return unreachable;
    }
  }
}

function formatMinutes(minutes: number): string {
  if (minutes > 0 && minutes % 60 === 0) {
    const hours = minutes / 60;
    return `${hours} hour${hours === 1 ? '' : 's'}`;
  }
  return `${minutes} minute${minutes === 1 ? '' : 's'}`;
}

/** Announcement for the channel's members, or `null` when the policy sets no limit. */
export function policyChangeNotice(policy: ChannelPolicy): string | null {
  const rule = toRetentionRule(policy);
  const prefix = 'Auto-delete settings for this channel have been updated:';
  switch (rule.kind) {
    case 'none':
      return null;
    case 'age':
      return `${prefix} messages older than ${formatMinutes(rule.timeThresholdMinutes)} will be deleted.`;
    case 'count':
      return `${prefix} there will be a maximum of ${rule.maxMessages} messages.`;
    case 'age-and-count':
      return (
        `${prefix} messages older than ${formatMinutes(rule.timeThresholdMinutes)} will be deleted, ` +
        `and there will be a maximum of ${rule.maxMessages} messages.`
      );
    default: {
      const unreachable: never = rule;
      return unreachable;
    }
  }
}

export async function collectDeletableMessages(
  platform: ChatPlatformPort,
  channel: ChannelRef,
  policy: ChannelPolicy,
  now: Date = new Date()
): Promise<DeletableSet> {
  const query = historyQueryFor(toRetentionRule(policy), now);
  if (!query) return [];

  const history: ChannelMessage[] = [];
  for await (const message of platform.fetchHistory(channel, query)) {
    if (!message.pinned) history.push(message);
  }
  return evaluateRetention(history, policy, now);
}
