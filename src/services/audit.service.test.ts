import { describe, it, expect, beforeEach } from 'vitest';
import type { RequestContext } from '../types';
import { ForbiddenError, NotFoundError } from '../utils/errors.utils';
import { sha256Hash } from '../utils/hash.utils';
import { MemoryAuditRepository, createMemoryAuditRepository } from '../__tests__/helpers/memory-repositories';
import { createClock } from '../__tests__/helpers/test-context';
import { AuditService, GENESIS_HASH, computeEntryHash, createAuditService } from './audit.service';

const admin: RequestContext = { principal: { userId: 'u-admin', role: 'admin', groupId: null } };
const reviewer: RequestContext = { principal: { userId: 'u-reviewer', role: 'reviewer', groupId: 'radiology' } };
const viewer: RequestContext = {
  principal: { userId: 'u-viewer', role: 'viewer', groupId: 'radiology' },
  ipAddress: '203.0.113.7',
  userAgent: 'vitest',
};

describe('audit service', () => {
  let repository: MemoryAuditRepository;
  let audit: AuditService;

  beforeEach(() => {
    repository = createMemoryAuditRepository();
    audit = createAuditService({ repository, now: createClock().now });
  });

  async function recordSome(count: number) {
    for (let i = 0; i < count; i++) {
      await audit.record({
        actor_id: 'u-admin',
        action: 'dataset.create',
        target_type: 'dataset',
        target_id: `d-${i}`,
        outcome: 'success',
        metadata: { index: i },
      });
    }
  }

  describe('chain', () => {
    it('links every entry to the one before it', async () => {
      await recordSome(3);
      const [first, second, third] = repository.entries;

      expect([first.seq, second.seq, third.seq]).toEqual([1, 2, 3]);
      expect(first.prev_hash).toBe(GENESIS_HASH);
      expect(second.prev_hash).toBe(first.entry_hash);
      expect(third.prev_hash).toBe(second.entry_hash);
      expect(second.entry_hash).toBe(computeEntryHash(second));
    });

    it('verifies an intact log', async () => {
      await recordSome(3);
      expect(await audit.verifyChain()).toEqual({ valid: true, checked: 3, brokenAtSeq: null });
    });

    it('verifies an empty log', async () => {
      expect(await audit.verifyChain()).toEqual({ valid: true, checked: 0, brokenAtSeq: null });
    });

    it('detects an edited entry', async () => {
      await recordSome(3);
      repository.entries[1].metadata = { index: 99 };

      expect(await audit.verifyChain()).toEqual({ valid: false, checked: 1, brokenAtSeq: 2 });
    });

    it('detects a deleted entry', async () => {
      await recordSome(3);
      repository.entries.splice(1, 1);

      expect(await audit.verifyChain()).toEqual({ valid: false, checked: 1, brokenAtSeq: 2 });
    });
  });

  describe('record', () => {
    it('stores network identifiers as hashes only', async () => {
      await audit.record({
        action: 'auth.login_failed',
        target_type: 'user',
        ip_address: '203.0.113.7',
        user_agent: 'vitest',
        outcome: 'failure',
      });

      const [entry] = repository.entries;
      expect(entry.ip_address_hash).toBe(sha256Hash('203.0.113.7'));
      expect(entry.user_agent_hash).toBe(sha256Hash('vitest'));
      expect(entry.actor_id).toBeNull();
      expect(entry.metadata).toEqual({});
    });

    it('never throws when the sink fails', async () => {
      repository.failWrites = true;
      await expect(recordSome(1)).resolves.toBeUndefined();
      expect(repository.entries).toHaveLength(0);
    });
  });

  describe('audited', () => {
    it('records success after the operation and passes the result through', async () => {
      const result = await audit.audited(
        viewer,
        {
          action: 'approval.request',
          targetType: 'approval_request',
          metadata: { sample_id: 's-1' },
          onSuccess: (value: { id: string }) => ({ targetId: value.id, metadata: { to: 'pending' } }),
        },
        async () => ({ id: 'r-1' })
      );

      expect(result).toEqual({ id: 'r-1' });
      expect(repository.entries).toHaveLength(1);
      expect(repository.entries[0]).toMatchObject({
        actor_id: 'u-viewer',
        action: 'approval.request',
        target_id: 'r-1',
        outcome: 'success',
        reason_code: null,
        metadata: { sample_id: 's-1', to: 'pending' },
      });
    });

    it('records authorization failures as denied and rethrows', async () => {
      const error = new ForbiddenError('ROLE_NOT_PERMITTED');
      await expect(
        audit.audited(viewer, { action: 'dataset.create', targetType: 'dataset' }, async () => {
          throw error;
        })
      ).rejects.toBe(error);

      expect(repository.entries[0]).toMatchObject({ outcome: 'denied', reason_code: 'ROLE_NOT_PERMITTED' });
    });

    it('records other failures under the failure action', async () => {
      await expect(
        audit.audited(
          viewer,
          { action: 'auth.login', failureAction: 'auth.login_failed', targetType: 'user' },
          async () => {
            throw new NotFoundError('User', 'USER_NOT_FOUND');
          }
        )
      ).rejects.toBeInstanceOf(NotFoundError);

      expect(repository.entries[0]).toMatchObject({
        action: 'auth.login_failed',
        outcome: 'failure',
        reason_code: 'USER_NOT_FOUND',
      });
    });

    it('uses INTERNAL_ERROR for unexpected errors', async () => {
      await expect(
        audit.audited(viewer, { action: 'sample.upload', targetType: 'sample' }, async () => {
          throw new Error('disk on fire');
        })
      ).rejects.toThrow('disk on fire');

      expect(repository.entries[0].reason_code).toBe('INTERNAL_ERROR');
    });

    it('still returns the result when the sink is down', async () => {
      repository.failWrites = true;
      const result = await audit.audited(viewer, { action: 'dataset.create', targetType: 'dataset' }, async () => 42);
      expect(result).toBe(42);
    });
  });

  describe('query', () => {
    it('is limited to reviewers and admins and records the refusal', async () => {
      await expect(audit.query(viewer, {})).rejects.toMatchObject({ reason: 'ROLE_NOT_PERMITTED' });

      expect(repository.entries[0]).toMatchObject({
        action: 'access.denied',
        actor_id: 'u-viewer',
        target_type: 'route',
        target_id: 'audit-logs',
        outcome: 'denied',
      });
    });

    it('filters and returns newest first', async () => {
      await recordSome(2);
      await audit.record({ action: 'auth.logout', target_type: 'user', target_id: 'u-admin', outcome: 'success' });

      const creates = await audit.query(reviewer, { action: 'dataset.create' });
      expect(creates.map((e) => e.target_id)).toEqual(['d-1', 'd-0']);

      const limited = await audit.query(reviewer, { limit: 1 });
      expect(limited.map((e) => e.seq)).toEqual([3]);
    });
  });

  describe('verifyChain with a caller', () => {
    it('is admin only', async () => {
      await expect(audit.verifyChain(reviewer)).rejects.toBeInstanceOf(ForbiddenError);
      expect(await audit.verifyChain(admin)).toEqual({ valid: true, checked: 1, brokenAtSeq: null });
    });
  });

  it('verifySink rejects when the sink is unavailable', async () => {
    await expect(audit.verifySink()).resolves.toBeUndefined();
    repository.failWrites = true;
    await expect(audit.verifySink()).rejects.toThrow('audit sink unavailable');
  });
});
