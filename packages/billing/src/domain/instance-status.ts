export const INSTANCE_STATUSES = [
  'scheduled',
  'generated',
  'sent',
  'paid',
  'failed',
  'cancelled',
] as const;

export type InstanceStatus = (typeof INSTANCE_STATUSES)[number];

const ALLOWED_TRANSITIONS: Record<InstanceStatus, readonly InstanceStatus[]> = {
  scheduled: ['generated', 'sent', 'failed', 'cancelled'],
  generated: ['sent', 'paid', 'failed', 'cancelled'],
  sent: ['paid', 'failed', 'cancelled'],
  failed: ['scheduled', 'generated', 'sent', 'cancelled'],
  // paid and cancelled instances are immutable
  paid: [],
  cancelled: [],
};

export function canTransitionInstance(
  from: InstanceStatus,
  to: InstanceStatus,
): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function isInstanceStatus(value: string): value is InstanceStatus {
  return (INSTANCE_STATUSES as readonly string[]).includes(value);
}
