/**
 * Input Validation Utilities
 *
 * NEVER trust user input! Always validate on the server.
 * Each validator returns a FieldError or null; the `validate*` aggregates
 * return a ValidationResult that services turn into a ValidationError.
 */

import {
  RegisterRequest,
  UserRole,
  USER_ROLES,
  CreateDatasetRequest,
  DatasetVisibility,
  DATASET_VISIBILITIES,
  SubmitAnnotationRequest,
  AnnotationType,
  ANNOTATION_TYPES,
  FileApprovalRequest,
  DecideApprovalRequest,
  ApprovalStatus,
  AnnotationOutcome,
  AuditQuery,
  AuditAction,
  AuditTargetType,
} from '../types';
import { FieldError, ValidationError } from './errors.utils';

export interface ValidationResult {
  isValid: boolean;
  errors: FieldError[];
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const GROUP_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

function result(errors: FieldError[]): ValidationResult {
  return { isValid: errors.length === 0, errors };
}

/**
 * Throw a ValidationError when the result has errors
 */
export function assertValid(validation: ValidationResult): void {
  if (!validation.isValid) {
    throw new ValidationError(validation.errors);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate username
 * - 3-64 characters
 * - Alphanumeric, dots and underscores only
 */
export function validateUsername(username: unknown): FieldError | null {
  if (typeof username !== 'string' || username.length < 3) {
    return { field: 'username', message: 'Username must be at least 3 characters' };
  }
  if (username.length > 64) {
    return { field: 'username', message: 'Username must be at most 64 characters' };
  }
  if (!/^[a-zA-Z0-9_.]+$/.test(username)) {
    return { field: 'username', message: 'Username can only contain letters, numbers, dots and underscores' };
  }
  return null;
}

/**
 * Validate password strength
 * - 8-128 characters
 * - At least one uppercase, one lowercase, one number and one special character
 */
export function validatePassword(password: unknown): FieldError | null {
  if (typeof password !== 'string' || password.length < 8) {
    return { field: 'password', message: 'Password must be at least 8 characters' };
  }
  if (password.length > 128) {
    return { field: 'password', message: 'Password must be at most 128 characters' };
  }
  if (!/[A-Z]/.test(password)) {
    return { field: 'password', message: 'Password must contain at least one uppercase letter' };
  }
  if (!/[a-z]/.test(password)) {
    return { field: 'password', message: 'Password must contain at least one lowercase letter' };
  }
  if (!/[0-9]/.test(password)) {
    return { field: 'password', message: 'Password must contain at least one number' };
  }
  if (!/[!@#$%^&*()_+\-=[\]{};':"\\|,.<>/?]/.test(password)) {
    return { field: 'password', message: 'Password must contain at least one special character' };
  }
  return null;
}

export function isUserRole(value: unknown): value is UserRole {
  return typeof value === 'string' && USER_ROLES.some((role) => role === value);
}

export function validateRole(role: unknown): FieldError | null {
  if (!isUserRole(role)) {
    return { field: 'role', message: `Role must be one of: ${USER_ROLES.join(', ')}` };
  }
  return null;
}

export function validateGroupId(groupId: unknown, field = 'group_id'): FieldError | null {
  if (typeof groupId !== 'string' || !GROUP_PATTERN.test(groupId)) {
    return { field, message: `${field} must be 1-64 letters, numbers, dashes or underscores` };
  }
  return null;
}

export function validateId(value: unknown, field: string): FieldError | null {
  if (typeof value !== 'string' || !UUID_PATTERN.test(value)) {
    return { field, message: `${field} must be a valid id` };
  }
  return null;
}

/**
 * Validate complete registration request
 */
export function validateRegistration(data: Partial<RegisterRequest>): ValidationResult {
  const errors: FieldError[] = [];

  const usernameError = validateUsername(data.username);
  if (usernameError) errors.push(usernameError);

  const passwordError = validatePassword(data.password);
  if (passwordError) errors.push(passwordError);

  if (data.role !== undefined) {
    const roleError = validateRole(data.role);
    if (roleError) errors.push(roleError);
  }

  if (data.group_id !== undefined) {
    const groupError = validateGroupId(data.group_id);
    if (groupError) errors.push(groupError);
  }

  return result(errors);
}

export function validateDataset(data: Partial<CreateDatasetRequest>): ValidationResult {
  const errors: FieldError[] = [];

  if (typeof data.name !== 'string' || data.name.trim().length === 0) {
    errors.push({ field: 'name', message: 'name is required' });
  } else if (data.name.length > 128) {
    errors.push({ field: 'name', message: 'name must be at most 128 characters' });
  }
  if (data.description !== undefined && typeof data.description !== 'string') {
    errors.push({ field: 'description', message: 'description must be a string' });
  }
  if (data.version !== undefined && (typeof data.version !== 'string' || data.version.length > 32)) {
    errors.push({ field: 'version', message: 'version must be a string of at most 32 characters' });
  }
  if (data.owner_group_id !== undefined) {
    const groupError = validateGroupId(data.owner_group_id, 'owner_group_id');
    if (groupError) errors.push(groupError);
  }
  if (data.visibility !== undefined && !isDatasetVisibility(data.visibility)) {
    errors.push({ field: 'visibility', message: `visibility must be one of: ${DATASET_VISIBILITIES.join(', ')}` });
  }

  return result(errors);
}

export function isDatasetVisibility(value: unknown): value is DatasetVisibility {
  return typeof value === 'string' && DATASET_VISIBILITIES.some((visibility) => visibility === value);
}

export function isAnnotationType(value: unknown): value is AnnotationType {
  return typeof value === 'string' && ANNOTATION_TYPES.some((type) => type === value);
}

export function validateAnnotation(data: Partial<SubmitAnnotationRequest>): ValidationResult {
  const errors: FieldError[] = [];

  if (!isAnnotationType(data.anno_type)) {
    errors.push({ field: 'anno_type', message: `anno_type must be one of: ${ANNOTATION_TYPES.join(', ')}` });
  }
  if (!isRecord(data.payload)) {
    errors.push({ field: 'payload', message: 'payload must be a JSON object' });
  }
  if (data.supersedes_id !== undefined) {
    const idError = validateId(data.supersedes_id, 'supersedes_id');
    if (idError) errors.push(idError);
  }

  return result(errors);
}

export function validateAnnotationOutcome(outcome: unknown): ValidationResult {
  const valid: AnnotationOutcome[] = ['accepted', 'rejected'];
  return result(
    valid.some((o) => o === outcome)
      ? []
      : [{ field: 'outcome', message: 'outcome must be "accepted" or "rejected"' }]
  );
}

export function validateApprovalFiling(data: Partial<FileApprovalRequest>): ValidationResult {
  const errors: FieldError[] = [];

  const idError = validateId(data.sample_id, 'sample_id');
  if (idError) errors.push(idError);

  if (typeof data.justification !== 'string' || data.justification.trim().length === 0) {
    errors.push({ field: 'justification', message: 'justification is required' });
  } else if (data.justification.length > 2000) {
    errors.push({ field: 'justification', message: 'justification must be at most 2000 characters' });
  }

  return result(errors);
}

const APPROVAL_STATUSES: readonly ApprovalStatus[] = ['pending', 'approved', 'denied', 'expired'];

export function isApprovalStatus(value: unknown): value is ApprovalStatus {
  return typeof value === 'string' && APPROVAL_STATUSES.some((status) => status === value);
}

export function validateApprovalDecision(
  data: Partial<DecideApprovalRequest>,
  maxGrantMinutes: number
): ValidationResult {
  const errors: FieldError[] = [];

  if (data.outcome !== 'approved' && data.outcome !== 'denied') {
    errors.push({ field: 'outcome', message: 'outcome must be "approved" or "denied"' });
  }
  if (data.grant_minutes !== undefined) {
    const minutes = data.grant_minutes;
    if (!Number.isInteger(minutes) || minutes < 1 || minutes > maxGrantMinutes) {
      errors.push({ field: 'grant_minutes', message: `grant_minutes must be an integer between 1 and ${maxGrantMinutes}` });
    }
  }

  return result(errors);
}

const AUDIT_ACTIONS: readonly AuditAction[] = [
  'auth.register',
  'auth.login',
  'auth.login_failed',
  'auth.logout',
  'access.denied',
  'user.role_change',
  'user.deactivate',
  'dataset.create',
  'sample.upload',
  'sample.download',
  'annotation.submit',
  'annotation.begin_review',
  'annotation.decide',
  'approval.request',
  'approval.decide',
  'approval.expire',
  'download_authorized',
];

const AUDIT_TARGET_TYPES: readonly AuditTargetType[] = [
  'user',
  'dataset',
  'sample',
  'annotation',
  'approval_request',
  'route',
];

function parseDate(value: unknown, field: string, errors: FieldError[]): Date | undefined {
  if (value === undefined) return undefined;
  const date = typeof value === 'string' ? new Date(value) : undefined;
  if (!date || isNaN(date.getTime())) {
    errors.push({ field, message: `${field} must be an ISO-8601 date` });
    return undefined;
  }
  return date;
}

function parseCount(value: unknown, field: string, max: number, errors: FieldError[]): number | undefined {
  if (value === undefined) return undefined;
  const n = typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isInteger(n) || n < 0 || n > max) {
    errors.push({ field, message: `${field} must be an integer between 0 and ${max}` });
    return undefined;
  }
  return n;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Parse audit-log query-string filters
 */
export function parseAuditQuery(raw: Record<string, unknown>): { query: AuditQuery; validation: ValidationResult } {
  const errors: FieldError[] = [];
  const query: AuditQuery = {};

  const actorId = optionalString(raw.actor_id);
  if (actorId) {
    const idError = validateId(actorId, 'actor_id');
    if (idError) errors.push(idError);
    else query.actorId = actorId;
  }

  const targetId = optionalString(raw.target_id);
  if (targetId) query.targetId = targetId;

  const targetType = optionalString(raw.target_type);
  if (targetType) {
    const match = AUDIT_TARGET_TYPES.find((t) => t === targetType);
    if (match) query.targetType = match;
    else errors.push({ field: 'target_type', message: 'Unknown target_type' });
  }

  const action = optionalString(raw.action);
  if (action) {
    const match = AUDIT_ACTIONS.find((a) => a === action);
    if (match) query.action = match;
    else errors.push({ field: 'action', message: 'Unknown action' });
  }

  query.from = parseDate(raw.from, 'from', errors);
  query.to = parseDate(raw.to, 'to', errors);
  query.limit = parseCount(raw.limit, 'limit', 500, errors);
  query.offset = parseCount(raw.offset, 'offset', 1_000_000, errors);

  return { query, validation: result(errors) };
}
