/**
 * Annotation Service
 *
 * Submission and review of annotations. State changes follow
 * workflow/annotation.machine and are applied with a compare-and-set on the
 * stored status, so two reviewers racing on one annotation cannot both win.
 */

import { v4 as uuidv4 } from 'uuid';
import { Annotation, AnnotationStatus, RequestContext, SubmitAnnotationRequest } from '../types';
import type { AnnotationRepository, SampleRepository } from '../models';
import { InvalidTransitionError, NotFoundError, ValidationError } from '../utils/errors.utils';
import {
  assertValid,
  isAnnotationType,
  validateAnnotation,
  validateAnnotationOutcome,
} from '../utils/validation.utils';
import { AnnotationEvent, decisionEvent, transitionAnnotation } from '../workflow/annotation.machine';
import type { AuditService } from './audit.service';
import type { DatasetService } from './dataset.service';
import { ROLES, requirePrincipal, requireRole } from './identity.service';

export interface AnnotationService {
  submit(ctx: RequestContext, sampleId: string, data: Partial<SubmitAnnotationRequest>): Promise<Annotation>;
  beginReview(ctx: RequestContext, annotationId: string): Promise<Annotation>;
  decide(ctx: RequestContext, annotationId: string, outcome: unknown): Promise<Annotation>;
  listBySample(ctx: RequestContext, sampleId: string): Promise<Annotation[]>;
}

export interface AnnotationServiceDeps {
  annotations: AnnotationRepository;
  samples: SampleRepository;
  datasets: DatasetService;
  audit: AuditService;
  now: () => Date;
}

export function createAnnotationService(deps: AnnotationServiceDeps): AnnotationService {
  const { annotations, samples, datasets, audit, now } = deps;

  async function findAnnotation(annotationId: string): Promise<Annotation> {
    const annotation = await annotations.findById(annotationId);
    if (!annotation) {
      throw new NotFoundError('Annotation', 'ANNOTATION_NOT_FOUND');
    }
    return annotation;
  }

  /**
   * Validate the event against the current status, then apply it only if the
   * stored status has not moved in the meantime
   */
  async function applyEvent(annotation: Annotation, event: AnnotationEvent): Promise<Annotation> {
    const change = transitionAnnotation(annotation.status, event);
    const updated = await annotations.transition(annotation.id, change.from, change);
    if (updated) {
      return updated;
    }
    const current = await findAnnotation(annotation.id);
    throw new InvalidTransitionError('annotation', current.status, event.type);
  }

  function transitionMetadata(from: AnnotationStatus) {
    return (annotation: Annotation) => ({ metadata: { from, to: annotation.status } });
  }

  return {
    async submit(ctx, sampleId, data) {
      return audit.audited(
        ctx,
        {
          action: 'annotation.submit',
          targetType: 'annotation',
          metadata: { sample_id: sampleId },
          onSuccess: (annotation) => ({
            targetId: annotation.id,
            metadata: { to: annotation.status, version: annotation.version },
          }),
        },
        async () => {
          const principal = requireRole(ctx, ROLES.annotate);
          const validation = validateAnnotation(data);
          if (!validation.isValid || !isAnnotationType(data.anno_type) || !data.payload) {
            throw new ValidationError(validation.errors);
          }
          const annoType = data.anno_type;
          const payload = data.payload;

          const sample = await samples.findById(sampleId);
          if (!sample) {
            throw new NotFoundError('Sample', 'SAMPLE_NOT_FOUND');
          }
          await datasets.requireVisible(principal, sample.dataset_id);

          if (data.supersedes_id) {
            const previous = await annotations.findById(data.supersedes_id);
            if (!previous || previous.sample_id !== sampleId) {
              throw new NotFoundError('Superseded annotation', 'ANNOTATION_NOT_FOUND');
            }
          }

          return annotations.create({
            id: uuidv4(),
            sample_id: sampleId,
            author_id: principal.userId,
            anno_type: annoType,
            payload,
            supersedes_id: data.supersedes_id ?? null,
            submitted_at: now(),
          });
        }
      );
    },

    async beginReview(ctx, annotationId) {
      return audit.audited(
        ctx,
        {
          action: 'annotation.begin_review',
          targetType: 'annotation',
          targetId: annotationId,
          onSuccess: transitionMetadata('submitted'),
        },
        async () => {
          const principal = requireRole(ctx, ROLES.review);
          const annotation = await findAnnotation(annotationId);
          return applyEvent(annotation, { type: 'begin_review', reviewerId: principal.userId, at: now() });
        }
      );
    },

    async decide(ctx, annotationId, outcome) {
      return audit.audited(
        ctx,
        {
          action: 'annotation.decide',
          targetType: 'annotation',
          targetId: annotationId,
          onSuccess: transitionMetadata('under_review'),
        },
        async () => {
          requireRole(ctx, ROLES.review);
          assertValid(validateAnnotationOutcome(outcome));
          const annotation = await findAnnotation(annotationId);
          return applyEvent(annotation, decisionEvent(outcome === 'accepted' ? 'accepted' : 'rejected', now()));
        }
      );
    },

    async listBySample(ctx, sampleId) {
      return audit.recordDenials(ctx, { type: 'sample', id: sampleId }, async () => {
        const principal = requirePrincipal(ctx);
        const sample = await samples.findById(sampleId);
        if (!sample) {
          throw new NotFoundError('Sample', 'SAMPLE_NOT_FOUND');
        }
        await datasets.requireVisible(principal, sample.dataset_id);
        return annotations.listBySample(sampleId);
      });
    },
  };
}
