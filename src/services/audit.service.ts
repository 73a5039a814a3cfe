/**
 * Audit Service
 *
 * Appends one entry per security-relevant action and answers compliance
 * queries. Entries are hash-chained: each `entry_hash` is the SHA-256 of the
 * entry's canonical JSON, which includes `prev_hash`. `verifyChain` walks the
 * log and recomputes every hash.
 *
 * RECORDING NEVER THROWS. A failed write is logged as a system error and the
 * caller's own result (or error) is what the client sees. A sink that is
 * broken from the start is caught by `verifySink` at startup.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  AuditAction,
  AuditChainVerification,
  AuditLogEntry,
  AuditQuery,
  AuditTargetType,
  CreateAuditLogInput,
  RequestContext,
} from '../types';
import type { AuditChainTail, AuditRepository } from '../models/audit.model';
import { AppError, isAuthorizationError, reasonCodeOf } from '../utils/errors.utils';
import { canonicalJson, sha256Hash } from '../utils/hash.utils';
import { logError, createRequestContext } from '../utils/logger.utils';
import { ROLES, requireRole } from './identity.service';

export const GENESIS_HASH = '0'.repeat(64);

const VERIFY_PAGE_SIZE = 500;

/**
 * Describes the single entry an audited operation produces
 */
export interface AuditedOperation<T> {
  action: AuditAction;
  /** Recorded instead of `action` when the operation fails */
  failureAction?: AuditAction;
  targetType: AuditTargetType;
  targetId?: string | null;
  metadata?: Record<string, unknown>;
  /** Target id and extra metadata known only once the operation succeeded */
  onSuccess?: (result: T) => { targetId?: string; metadata?: Record<string, unknown> };
}

export interface AuditService {
  record(input: CreateAuditLogInput): Promise<void>;
  /**
   * Run `operation` and record exactly one entry for it, after it settles.
   * The operation's result or error is passed through unchanged.
   */
  audited<T>(ctx: RequestContext, details: AuditedOperation<T>, operation: () => Promise<T>): Promise<T>;
  /**
   * Run a read; authorization failures are recorded as `access.denied`
   */
  recordDenials<T>(
    ctx: RequestContext,
    target: { type: AuditTargetType; id?: string | null },
    operation: () => Promise<T>
  ): Promise<T>;
  query(ctx: RequestContext, filter: AuditQuery): Promise<AuditLogEntry[]>;
  verifyChain(ctx?: RequestContext): Promise<AuditChainVerification>;
  /** Throws if the audit sink cannot be reached */
  verifySink(): Promise<void>;
}

export interface AuditServiceDeps {
  repository: AuditRepository;
  now: () => Date;
}

/**
 * The hashed portion of an entry: everything except `entry_hash` itself
 */
export function computeEntryHash(entry: Omit<AuditLogEntry, 'entry_hash'>): string {
  return sha256Hash(
    canonicalJson({
      id: entry.id,
      seq: entry.seq,
      timestamp: entry.timestamp,
      actor_id: entry.actor_id,
      action: entry.action,
      target_type: entry.target_type,
      target_id: entry.target_id,
      ip_address_hash: entry.ip_address_hash,
      user_agent_hash: entry.user_agent_hash,
      outcome: entry.outcome,
      reason_code: entry.reason_code,
      metadata: entry.metadata,
      prev_hash: entry.prev_hash,
    })
  );
}

function buildEntry(input: CreateAuditLogInput, timestamp: Date, tail: AuditChainTail | null): AuditLogEntry {
  const unhashed: Omit<AuditLogEntry, 'entry_hash'> = {
    id: uuidv4(),
    seq: tail ? tail.seq + 1 : 1,
    timestamp,
    actor_id: input.actor_id ?? null,
    action: input.action,
    target_type: input.target_type,
    target_id: input.target_id ?? null,
    ip_address_hash: input.ip_address ? sha256Hash(input.ip_address) : null,
    user_agent_hash: input.user_agent ? sha256Hash(input.user_agent) : null,
    outcome: input.outcome,
    reason_code: input.reason_code ?? null,
    metadata: input.metadata ?? {},
    prev_hash: tail ? tail.entry_hash : GENESIS_HASH,
  };
  return { ...unhashed, entry_hash: computeEntryHash(unhashed) };
}

export function createAuditService({ repository, now }: AuditServiceDeps): AuditService {
  async function record(input: CreateAuditLogInput): Promise<void> {
    const timestamp = now();
    try {
      await repository.append((tail) => buildEntry(input, timestamp, tail));
    } catch (error) {
      logError(
        'audit.write_failed',
        'Failed to write audit log entry',
        error,
        createRequestContext(undefined, input.actor_id ?? undefined, input.target_type, input.target_id ?? undefined),
        { action: input.action, outcome: input.outcome }
      );
    }
  }

  function origin(ctx: RequestContext): Pick<CreateAuditLogInput, 'actor_id' | 'ip_address' | 'user_agent'> {
    return {
      actor_id: ctx.principal?.userId ?? null,
      ip_address: ctx.ipAddress,
      user_agent: ctx.userAgent,
    };
  }

  async function audited<T>(
    ctx: RequestContext,
    details: AuditedOperation<T>,
    operation: () => Promise<T>
  ): Promise<T> {
    let result: T;
    try {
      result = await operation();
    } catch (error) {
      await record({
        ...origin(ctx),
        action: details.failureAction ?? details.action,
        target_type: details.targetType,
        target_id: details.targetId,
        outcome: isAuthorizationError(error) ? 'denied' : 'failure',
        reason_code: reasonCodeOf(error),
        metadata: {
          ...details.metadata,
          ...(error instanceof AppError ? error.auditMetadata() : {}),
        },
      });
      throw error;
    }

    const extra = details.onSuccess?.(result);
    await record({
      ...origin(ctx),
      action: details.action,
      target_type: details.targetType,
      target_id: extra?.targetId ?? details.targetId,
      outcome: 'success',
      metadata: { ...details.metadata, ...extra?.metadata },
    });
    return result;
  }

  async function recordDenials<T>(
    ctx: RequestContext,
    target: { type: AuditTargetType; id?: string | null },
    operation: () => Promise<T>
  ): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (isAuthorizationError(error)) {
        await record({
          ...origin(ctx),
          action: 'access.denied',
          target_type: target.type,
          target_id: target.id,
          outcome: 'denied',
          reason_code: reasonCodeOf(error),
        });
      }
      throw error;
    }
  }

  async function verifyChain(): Promise<AuditChainVerification> {
    let expectedPrev = GENESIS_HASH;
    let expectedSeq = 1;
    let checked = 0;

    for (;;) {
      const page = await repository.listAfter(expectedSeq - 1, VERIFY_PAGE_SIZE);
      for (const entry of page) {
        const intact =
          entry.seq === expectedSeq &&
          entry.prev_hash === expectedPrev &&
          entry.entry_hash === computeEntryHash(entry);
        if (!intact) {
          return { valid: false, checked, brokenAtSeq: expectedSeq };
        }
        checked++;
        expectedSeq++;
        expectedPrev = entry.entry_hash;
      }
      if (page.length < VERIFY_PAGE_SIZE) {
        return { valid: true, checked, brokenAtSeq: null };
      }
    }
  }

  return {
    record,
    audited,
    recordDenials,

    async query(ctx, filter) {
      return recordDenials(ctx, { type: 'route', id: 'audit-logs' }, async () => {
        requireRole(ctx, ROLES.readAudit);
        return repository.query(filter);
      });
    },

    async verifyChain(ctx) {
      if (!ctx) {
        return verifyChain();
      }
      return recordDenials(ctx, { type: 'route', id: 'audit-logs/verify' }, async () => {
        requireRole(ctx, ROLES.administer);
        return verifyChain();
      });
    },

    async verifySink() {
      await repository.ping();
    },
  };
}
