/**
 * Approval Service
 *
 * Download access to a sample goes through a request that a reviewer decides:
 *
 * 1. A user files a request with a justification (one active request per
 *    user and sample)
 * 2. A reviewer or admin approves it with a grant window, or denies it.
 *    Nobody decides their own request.
 * 3. The requester calls authorizeDownload while the grant is running and
 *    gets a capability token bound to that request and sample
 * 4. The token is redeemed for the sample bytes
 *
 * EXPIRY:
 * Grants expire lazily: authorizeDownload and redeem move an approved request
 * past its expiry to `expired` when they see it. An optional periodic sweep
 * (startExpirySweep) does the same for requests nobody touches.
 *
 * Every call records exactly one audit entry, success or failure.
 */

import jwt from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import {
  ApprovalRequest,
  ApprovalStatus,
  DecideApprovalRequest,
  DownloadGrant,
  FileApprovalRequest,
  RequestContext,
} from '../types';
import type { ApprovalRepository } from '../models';
import {
  DuplicateActiveRequestError,
  ForbiddenError,
  GrantExpiredError,
  InvalidTransitionError,
  NotApprovedError,
  NotFoundError,
  SelfApprovalForbiddenError,
} from '../utils/errors.utils';
import { logInfo, logSystemError } from '../utils/logger.utils';
import { assertValid, validateApprovalDecision, validateApprovalFiling } from '../utils/validation.utils';
import {
  ApprovalEvent,
  isGrantExpired,
  transitionApproval,
} from '../workflow/approval.machine';
import type { AuditService } from './audit.service';
import { ROLES, requirePrincipal, requireRole } from './identity.service';
import type { SampleContent, SampleStore } from './sample-store.service';

export const DOWNLOAD_TOKEN_AUDIENCE = 'sample-download';

export interface ApprovalListQuery {
  status?: ApprovalStatus;
  sampleId?: string;
}

export interface ApprovalService {
  fileRequest(ctx: RequestContext, data: Partial<FileApprovalRequest>): Promise<ApprovalRequest>;
  decide(ctx: RequestContext, requestId: string, data: Partial<DecideApprovalRequest>): Promise<ApprovalRequest>;
  authorizeDownload(ctx: RequestContext, requestId: string): Promise<DownloadGrant>;
  /** Exchange a capability token for the sample's bytes */
  redeem(ctx: RequestContext, token: string): Promise<SampleContent>;
  /** Own requests; reviewers and admins see everyone's */
  list(ctx: RequestContext, query: ApprovalListQuery): Promise<ApprovalRequest[]>;
  get(ctx: RequestContext, requestId: string): Promise<ApprovalRequest>;
  /** Expire every overdue grant now; returns how many were expired */
  sweepExpired(): Promise<number>;
  /** Run sweepExpired every `intervalMs`; returns a stop function */
  startExpirySweep(intervalMs: number): () => void;
}

export interface ApprovalServiceDeps {
  approvals: ApprovalRepository;
  sampleStore: SampleStore;
  audit: AuditService;
  jwtSecret: string;
  defaultGrantMinutes: number;
  maxGrantMinutes: number;
  downloadTokenMinutes: number;
  now: () => Date;
}

interface DownloadClaims {
  requestId: string;
  sampleId: string;
  requesterId: string;
}

function epochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export function createApprovalService(deps: ApprovalServiceDeps): ApprovalService {
  const { approvals, sampleStore, audit, jwtSecret, now } = deps;

  async function findRequest(requestId: string): Promise<ApprovalRequest> {
    const request = await approvals.findById(requestId);
    if (!request) {
      throw new NotFoundError('Approval request', 'REQUEST_NOT_FOUND');
    }
    return request;
  }

  /**
   * Apply `event` to `request` with a compare-and-set on its current status.
   * Losing a race surfaces as InvalidTransition from the status that won.
   */
  async function applyEvent(request: ApprovalRequest, event: ApprovalEvent): Promise<ApprovalRequest> {
    const change = transitionApproval(request.status, event);
    const updated = await approvals.transition(request.id, change.from, change);
    if (updated) {
      return updated;
    }
    const current = await findRequest(request.id);
    throw new InvalidTransitionError('approval request', current.status, event.type);
  }

  /**
   * The request as a usable grant at `at`, expiring it first if it is overdue
   * @throws NotApprovedError | GrantExpiredError
   */
  async function requireLiveGrant(request: ApprovalRequest, at: Date): Promise<ApprovalRequest & { expires_at: Date }> {
    if (request.status === 'expired') {
      throw new GrantExpiredError(false);
    }
    if (request.status !== 'approved' || request.expires_at === null) {
      throw new NotApprovedError(request.status);
    }
    if (isGrantExpired(request, at)) {
      const change = transitionApproval(request.status, { type: 'expire', at });
      const transitioned = await approvals.transition(request.id, change.from, change);
      throw new GrantExpiredError(transitioned !== null);
    }
    return { ...request, expires_at: request.expires_at };
  }

  function issueDownloadToken(request: ApprovalRequest, grantExpiresAt: Date, at: Date): DownloadGrant {
    const issuedAt = epochSeconds(at);
    const exp = Math.min(issuedAt + deps.downloadTokenMinutes * 60, epochSeconds(grantExpiresAt));

    const token = jwt.sign({ requestId: request.id, sampleId: request.sample_id, iat: issuedAt, exp }, jwtSecret, {
      algorithm: 'HS256',
      audience: DOWNLOAD_TOKEN_AUDIENCE,
      subject: request.requester_id,
    });

    return {
      token,
      requestId: request.id,
      sampleId: request.sample_id,
      expiresAt: new Date(exp * 1000),
    };
  }

  function verifyDownloadToken(token: string, at: Date): DownloadClaims {
    try {
      const payload = jwt.verify(token, jwtSecret, {
        algorithms: ['HS256'],
        audience: DOWNLOAD_TOKEN_AUDIENCE,
        clockTimestamp: epochSeconds(at),
      });
      if (
        typeof payload === 'string' ||
        typeof payload.requestId !== 'string' ||
        typeof payload.sampleId !== 'string' ||
        typeof payload.sub !== 'string'
      ) {
        throw new ForbiddenError('DOWNLOAD_TOKEN_INVALID', 'This download link is not valid.');
      }
      return { requestId: payload.requestId, sampleId: payload.sampleId, requesterId: payload.sub };
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new ForbiddenError('DOWNLOAD_TOKEN_EXPIRED', 'This download link has expired. Authorize the download again.');
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw new ForbiddenError('DOWNLOAD_TOKEN_INVALID', 'This download link is not valid.');
      }
      throw error;
    }
  }

  async function sweepExpired(): Promise<number> {
    const change = transitionApproval('approved', { type: 'expire', at: now() });
    const expired = await approvals.expireStale(change);
    for (const request of expired) {
      await audit.record({
        actor_id: null,
        action: 'approval.expire',
        target_type: 'approval_request',
        target_id: request.id,
        outcome: 'success',
        metadata: { from: change.from, to: change.status, sample_id: request.sample_id },
      });
    }
    return expired.length;
  }

  return {
    sweepExpired,

    async fileRequest(ctx, data) {
      return audit.audited(
        ctx,
        {
          action: 'approval.request',
          targetType: 'approval_request',
          metadata: { sample_id: data.sample_id },
          onSuccess: (request) => ({ targetId: request.id, metadata: { to: request.status } }),
        },
        async () => {
          const principal = requirePrincipal(ctx);
          assertValid(validateApprovalFiling(data));
          const sample = await sampleStore.requireSample(data.sample_id ?? '');

          const at = now();
          const created = await approvals.createIfNoActive(
            {
              id: uuidv4(),
              requester_id: principal.userId,
              sample_id: sample.id,
              justification: (data.justification ?? '').trim(),
              status: 'pending',
              reviewer_id: null,
              decided_at: null,
              expires_at: null,
              created_at: at,
              updated_at: at,
            },
            at
          );
          if (!created) {
            throw new DuplicateActiveRequestError();
          }
          return created;
        }
      );
    },

    async decide(ctx, requestId, data) {
      return audit.audited(
        ctx,
        {
          action: 'approval.decide',
          targetType: 'approval_request',
          targetId: requestId,
          metadata: { outcome: data.outcome },
          onSuccess: (request) => ({
            metadata: { from: 'pending', to: request.status, expires_at: request.expires_at },
          }),
        },
        async () => {
          const reviewer = requireRole(ctx, ROLES.review);
          assertValid(validateApprovalDecision(data, deps.maxGrantMinutes));

          const request = await findRequest(requestId);
          if (request.requester_id === reviewer.userId) {
            throw new SelfApprovalForbiddenError();
          }

          const at = now();
          const event: ApprovalEvent =
            data.outcome === 'approved'
              ? {
                  type: 'approve',
                  reviewerId: reviewer.userId,
                  at,
                  grantMinutes: data.grant_minutes ?? deps.defaultGrantMinutes,
                }
              : { type: 'deny', reviewerId: reviewer.userId, at };

          return applyEvent(request, event);
        }
      );
    },

    async authorizeDownload(ctx, requestId) {
      return audit.audited(
        ctx,
        {
          action: 'download_authorized',
          targetType: 'approval_request',
          targetId: requestId,
          onSuccess: (grant) => ({
            metadata: { sample_id: grant.sampleId, token_expires_at: grant.expiresAt },
          }),
        },
        async () => {
          const principal = requirePrincipal(ctx);
          const request = await findRequest(requestId);
          if (request.requester_id !== principal.userId) {
            throw new ForbiddenError('NOT_REQUESTER', 'Only the requester can use this approval.');
          }

          const at = now();
          const grant = await requireLiveGrant(request, at);
          await sampleStore.requireSample(grant.sample_id);

          return issueDownloadToken(grant, grant.expires_at, at);
        }
      );
    },

    async redeem(ctx, token) {
      let requestId: string | null = null;
      return audit.audited(
        ctx,
        {
          action: 'sample.download',
          targetType: 'sample',
          onSuccess: (content) => ({ targetId: content.sample.id, metadata: { request_id: requestId } }),
        },
        async () => {
          const principal = requirePrincipal(ctx);
          const at = now();
          const claims = verifyDownloadToken(token, at);
          requestId = claims.requestId;

          if (claims.requesterId !== principal.userId) {
            throw new ForbiddenError('NOT_REQUESTER', 'Only the requester can use this download link.');
          }

          const request = await findRequest(claims.requestId);
          if (request.sample_id !== claims.sampleId || request.requester_id !== principal.userId) {
            throw new ForbiddenError('DOWNLOAD_TOKEN_INVALID', 'This download link is not valid.');
          }
          await requireLiveGrant(request, at);

          return sampleStore.get(request.sample_id);
        }
      );
    },

    async list(ctx, query) {
      const principal = requirePrincipal(ctx);
      const isReviewer = ROLES.review.some((role) => role === principal.role);
      return approvals.list({
        requesterId: isReviewer ? undefined : principal.userId,
        status: query.status,
        sampleId: query.sampleId,
      });
    },

    async get(ctx, requestId) {
      return audit.recordDenials(ctx, { type: 'approval_request', id: requestId }, async () => {
        const principal = requirePrincipal(ctx);
        const request = await findRequest(requestId);
        const isReviewer = ROLES.review.some((role) => role === principal.role);
        if (!isReviewer && request.requester_id !== principal.userId) {
          throw new ForbiddenError('NOT_REQUESTER');
        }
        return request;
      });
    },

    startExpirySweep(intervalMs) {
      const timer = setInterval(() => {
        sweepExpired()
          .then((count) => {
            if (count > 0) {
              logInfo('approval.sweep', 'Expired overdue grants', undefined, { count });
            }
          })
          .catch((error: unknown) => {
            logSystemError('approval.sweep_failed', 'Expiry sweep failed', error);
          });
      }, intervalMs);
      timer.unref();
      return () => clearInterval(timer);
    },
  };
}
