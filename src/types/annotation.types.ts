export type AnnotationStatus = 'submitted' | 'under_review' | 'accepted' | 'rejected';

export type AnnotationType = 'bbox' | 'polygon' | 'brush' | 'tag';

export const ANNOTATION_TYPES: readonly AnnotationType[] = ['bbox', 'polygon', 'brush', 'tag'];

/**
 * Annotation attached to a sample.
 * Never deleted; a correction is a new annotation that `supersedes_id` the old one.
 */
export interface Annotation {
  id: string;
  sample_id: string;
  author_id: string;
  anno_type: AnnotationType;
  payload: Record<string, unknown>;
  status: AnnotationStatus;
  version: number; // per sample, starts at 1
  supersedes_id: string | null;
  reviewer_id: string | null;
  submitted_at: Date;
  review_started_at: Date | null;
  decided_at: Date | null;
}

export interface SubmitAnnotationRequest {
  anno_type: AnnotationType;
  payload: Record<string, unknown>;
  supersedes_id?: string;
}

export type AnnotationOutcome = 'accepted' | 'rejected';
