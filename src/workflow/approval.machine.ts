/**
 * Approval request state machine
 *
 *   pending ──approve──▶ approved ──expire──▶ expired
 *      └──────deny─────▶ denied
 *
 * No backward edges; denied and expired are terminal. Everything here is a
 * pure function of (state, event).
 */

import type { ApprovalRequest, ApprovalStatus } from '../types';
import { InvalidTransitionError } from '../utils/errors.utils';

export type ApprovalEvent =
  | { type: 'approve'; reviewerId: string; at: Date; grantMinutes: number }
  | { type: 'deny'; reviewerId: string; at: Date }
  | { type: 'expire'; at: Date };

export type ApprovalEventType = ApprovalEvent['type'];

const TRANSITIONS: Record<ApprovalStatus, Partial<Record<ApprovalEventType, ApprovalStatus>>> = {
  pending: { approve: 'approved', deny: 'denied' },
  approved: { expire: 'expired' },
  denied: {},
  expired: {},
};

/**
 * Column changes a transition produces
 */
export interface ApprovalTransition {
  from: ApprovalStatus;
  status: ApprovalStatus;
  reviewer_id?: string;
  decided_at?: Date;
  expires_at?: Date;
  updated_at: Date;
}

export function nextApprovalStatus(from: ApprovalStatus, event: ApprovalEventType): ApprovalStatus {
  const to = TRANSITIONS[from][event];
  if (!to) {
    throw new InvalidTransitionError('approval request', from, event);
  }
  return to;
}

export function grantExpiry(decidedAt: Date, grantMinutes: number): Date {
  return new Date(decidedAt.getTime() + grantMinutes * 60_000);
}

/**
 * Apply `event` to a request in state `from`
 * @throws InvalidTransitionError when the event is not allowed from `from`
 */
export function transitionApproval(from: ApprovalStatus, event: ApprovalEvent): ApprovalTransition {
  const status = nextApprovalStatus(from, event.type);

  switch (event.type) {
    case 'approve':
      return {
        from,
        status,
        reviewer_id: event.reviewerId,
        decided_at: event.at,
        expires_at: grantExpiry(event.at, event.grantMinutes),
        updated_at: event.at,
      };
    case 'deny':
      return { from, status, reviewer_id: event.reviewerId, decided_at: event.at, updated_at: event.at };
    case 'expire':
      return { from, status, updated_at: event.at };
  }
}

/**
 * An approved grant is still usable at exactly its expiry instant
 */
export function isGrantExpired(request: Pick<ApprovalRequest, 'status' | 'expires_at'>, now: Date): boolean {
  return (
    request.status === 'approved' &&
    request.expires_at !== null &&
    now.getTime() > request.expires_at.getTime()
  );
}

/**
 * Pending, or approved and not yet past expiry. At most one per (requester, sample).
 */
export function isActiveRequest(request: Pick<ApprovalRequest, 'status' | 'expires_at'>, now: Date): boolean {
  if (request.status === 'pending') {
    return true;
  }
  return request.status === 'approved' && !isGrantExpired(request, now);
}
