/**
 * Audit Log Entry
 *
 * Append-only forensic record. Entries are chained: `entry_hash` covers the
 * entry's fields plus the previous entry's hash, so any edit or deletion
 * breaks verification from that point on.
 *
 * Network identifiers (IP, user agent) are stored as SHA-256 hashes only.
 */
export interface AuditLogEntry {
  id: string;
  seq: number;
  timestamp: Date;
  actor_id: string | null; // null for system or unauthenticated attempts
  action: AuditAction;
  target_type: AuditTargetType;
  target_id: string | null;
  ip_address_hash: string | null;
  user_agent_hash: string | null;
  outcome: AuditOutcome;
  reason_code: string | null;
  metadata: Record<string, unknown>;
  prev_hash: string;
  entry_hash: string;
}

/**
 * Types of events we audit
 */
export type AuditAction =
  // Authentication events
  | 'auth.register'
  | 'auth.login'
  | 'auth.login_failed'
  | 'auth.logout'
  // Access control events
  | 'access.denied'
  // User administration
  | 'user.role_change'
  | 'user.deactivate'
  // Datasets and samples
  | 'dataset.create'
  | 'sample.upload'
  | 'sample.download'
  // Annotation lifecycle
  | 'annotation.submit'
  | 'annotation.begin_review'
  | 'annotation.decide'
  // Approval workflow
  | 'approval.request'
  | 'approval.decide'
  | 'approval.expire'
  | 'download_authorized';

export type AuditTargetType =
  | 'user'
  | 'dataset'
  | 'sample'
  | 'annotation'
  | 'approval_request'
  | 'route';

export type AuditOutcome = 'success' | 'failure' | 'denied';

/**
 * Input for creating an audit log
 */
export interface CreateAuditLogInput {
  actor_id?: string | null;
  action: AuditAction;
  target_type: AuditTargetType;
  target_id?: string | null;
  ip_address?: string; // Will be hashed before storage
  user_agent?: string; // Will be hashed before storage
  outcome: AuditOutcome;
  reason_code?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Filter for compliance review queries. All fields are optional and combined with AND.
 */
export interface AuditQuery {
  actorId?: string;
  targetType?: AuditTargetType;
  targetId?: string;
  action?: AuditAction;
  from?: Date;
  to?: Date;
  limit?: number;
  offset?: number;
}

export interface AuditChainVerification {
  valid: boolean;
  checked: number;
  brokenAtSeq: number | null;
}
