/**
 * Annotation review state machine
 *
 *   submitted ──begin_review──▶ under_review ──accept──▶ accepted
 *                                    └───────reject──▶ rejected
 */

import type { AnnotationOutcome, AnnotationStatus } from '../types';
import { InvalidTransitionError } from '../utils/errors.utils';

export type AnnotationEvent =
  | { type: 'begin_review'; reviewerId: string; at: Date }
  | { type: 'accept'; at: Date }
  | { type: 'reject'; at: Date };

export type AnnotationEventType = AnnotationEvent['type'];

const TRANSITIONS: Record<AnnotationStatus, Partial<Record<AnnotationEventType, AnnotationStatus>>> = {
  submitted: { begin_review: 'under_review' },
  under_review: { accept: 'accepted', reject: 'rejected' },
  accepted: {},
  rejected: {},
};

export interface AnnotationTransition {
  from: AnnotationStatus;
  status: AnnotationStatus;
  reviewer_id?: string;
  review_started_at?: Date;
  decided_at?: Date;
}

export function nextAnnotationStatus(from: AnnotationStatus, event: AnnotationEventType): AnnotationStatus {
  const to = TRANSITIONS[from][event];
  if (!to) {
    throw new InvalidTransitionError('annotation', from, event);
  }
  return to;
}

export function decisionEvent(outcome: AnnotationOutcome, at: Date): AnnotationEvent {
  return outcome === 'accepted' ? { type: 'accept', at } : { type: 'reject', at };
}

/**
 * @throws InvalidTransitionError when the event is not allowed from `from`
 */
export function transitionAnnotation(from: AnnotationStatus, event: AnnotationEvent): AnnotationTransition {
  const status = nextAnnotationStatus(from, event.type);

  if (event.type === 'begin_review') {
    return { from, status, reviewer_id: event.reviewerId, review_started_at: event.at };
  }
  return { from, status, decided_at: event.at };
}
