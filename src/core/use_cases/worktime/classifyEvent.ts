import type { EventCategory, EventKind, SystemEvent } from '../../entities/WorkEntry';
import type { ProviderFilter } from '../../ports/EventSource';

export const PROVIDERS = {
  KERNEL_GENERAL: 'Microsoft-Windows-Kernel-General',
  KERNEL_POWER: 'Microsoft-Windows-Kernel-Power',
  POWER_TROUBLESHOOTER: 'Microsoft-Windows-Power-Troubleshooter',
  WINLOGON: 'Microsoft-Windows-Winlogon',
} as const;

export interface EventRule {
  provider: string;
  eventId: number;
  payloadPattern?: RegExp;
  /** Only applies when logon/lock tracking is enabled */
  requiresShowLogoff: boolean;
  category: Exclude<EventCategory, 'ignored'>;
}

// Winlogon 811: "The winlogon notification subscriber <SessionEnv> began handling the notification event (N)"
// where 7 is a lock and 8 an unlock.
export const EVENT_RULES: readonly EventRule[] = [
  { provider: PROVIDERS.KERNEL_GENERAL, eventId: 12, requiresShowLogoff: false, category: 'boot_wake' },
  { provider: PROVIDERS.KERNEL_GENERAL, eventId: 13, requiresShowLogoff: false, category: 'suspend_shutdown' },
  { provider: PROVIDERS.POWER_TROUBLESHOOTER, eventId: 1, requiresShowLogoff: false, category: 'boot_wake' },
  { provider: PROVIDERS.KERNEL_POWER, eventId: 107, requiresShowLogoff: false, category: 'boot_wake' },
  { provider: PROVIDERS.KERNEL_POWER, eventId: 507, requiresShowLogoff: false, category: 'boot_wake' },
  { provider: PROVIDERS.KERNEL_POWER, eventId: 42, requiresShowLogoff: false, category: 'suspend_shutdown' },
  { provider: PROVIDERS.KERNEL_POWER, eventId: 506, requiresShowLogoff: false, category: 'suspend_shutdown' },
  { provider: PROVIDERS.WINLOGON, eventId: 7001, requiresShowLogoff: true, category: 'session_unlock' },
  { provider: PROVIDERS.WINLOGON, eventId: 7002, requiresShowLogoff: true, category: 'session_lock' },
  { provider: PROVIDERS.WINLOGON, eventId: 811, payloadPattern: /<SessionEnv>.*\(8\)/, requiresShowLogoff: true, category: 'session_unlock' },
  { provider: PROVIDERS.WINLOGON, eventId: 811, payloadPattern: /<SessionEnv>.*\(7\)/, requiresShowLogoff: true, category: 'session_lock' },
];

const KIND_BY_CATEGORY: Record<EventCategory, EventKind> = {
  boot_wake: 'start',
  session_unlock: 'start',
  suspend_shutdown: 'stop',
  session_lock: 'stop',
  ignored: 'unclassified',
};

function ruleMatches(rule: EventRule, event: SystemEvent, showLogoff: boolean): boolean {
  if (rule.requiresShowLogoff && !showLogoff) return false;
  if (rule.provider !== event.provider || rule.eventId !== event.id) return false;
  if (rule.payloadPattern) return rule.payloadPattern.test(event.payload ?? '');
  return true;
}

export function categorizeEvent(
  event: SystemEvent,
  showLogoff: boolean,
  rules: readonly EventRule[] = EVENT_RULES,
): EventCategory {
  const rule = rules.find((r) => ruleMatches(r, event, showLogoff));
  return rule ? rule.category : 'ignored';
}

export function classifyEvent(
  event: SystemEvent,
  showLogoff: boolean,
  rules: readonly EventRule[] = EVENT_RULES,
): EventKind {
  return KIND_BY_CATEGORY[categorizeEvent(event, showLogoff, rules)];
}

/**
 * One filter per provider, holding the ids of every rule that can apply.
 */
export function buildProviderFilters(
  showLogoff: boolean,
  since: Date,
  rules: readonly EventRule[] = EVENT_RULES,
): ProviderFilter[] {
  const idsByProvider = new Map<string, Set<number>>();
  for (const rule of rules) {
    if (rule.requiresShowLogoff && !showLogoff) continue;
    const ids = idsByProvider.get(rule.provider) ?? new Set<number>();
    ids.add(rule.eventId);
    idsByProvider.set(rule.provider, ids);
  }
  return [...idsByProvider.entries()].map(([provider, ids]) => ({
    provider,
    ids: [...ids].sort((a, b) => a - b),
    since,
  }));
}
