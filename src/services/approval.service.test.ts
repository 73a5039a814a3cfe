import { rm } from 'fs/promises';
import path from 'path';
import { text } from 'stream/consumers';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { RequestContext, Sample } from '../types';
import {
  DuplicateActiveRequestError,
  GrantExpiredError,
  InvalidTransitionError,
  NotApprovedError,
  SelfApprovalForbiddenError,
  ValidationError,
} from '../utils/errors.utils';
import { START_TIME, TestContext, createTestContext, userIdOf } from '../__tests__/helpers/test-context';

const JUSTIFICATION = 'Needed for the reader study';

describe('approval service', () => {
  let t: TestContext;
  let uploader: RequestContext;
  let requester: RequestContext;
  let reviewer: RequestContext;
  let sample: Sample;

  const minutesAfterStart = (minutes: number) => new Date(START_TIME.getTime() + minutes * 60_000);

  async function fileRequest(ctx: RequestContext = requester) {
    return t.services.approvals.fileRequest(ctx, { sample_id: sample.id, justification: JUSTIFICATION });
  }

  async function approvedRequest(grantMinutes = 60) {
    const request = await fileRequest();
    return t.services.approvals.decide(reviewer, request.id, { outcome: 'approved', grant_minutes: grantMinutes });
  }

  beforeEach(async () => {
    t = await createTestContext();
    uploader = await t.seedUser('uploader');
    requester = await t.seedUser('viewer');
    reviewer = await t.seedUser('reviewer');

    const dataset = await t.services.datasets.create(uploader, { name: 'Chest CT' });
    sample = await t.services.sampleStore.put(uploader, {
      datasetId: dataset.id,
      bytes: Buffer.from('ABC'),
      mimeType: 'image/png',
      filename: 'abc.png',
    });
  });

  afterEach(async () => {
    await t.cleanup();
  });

  describe('fileRequest', () => {
    it('creates a pending request for the caller', async () => {
      const request = await fileRequest();

      expect(request.status).toBe('pending');
      expect(request.requester_id).toBe(userIdOf(requester));
      expect(request.sample_id).toBe(sample.id);
      expect(request.justification).toBe(JUSTIFICATION);
      expect(request.expires_at).toBeNull();
    });

    it('trims the justification', async () => {
      const request = await t.services.approvals.fileRequest(requester, {
        sample_id: sample.id,
        justification: '  follow-up read  ',
      });
      expect(request.justification).toBe('follow-up read');
    });

    it('rejects a second active request for the same sample', async () => {
      await fileRequest();
      await expect(fileRequest()).rejects.toBeInstanceOf(DuplicateActiveRequestError);
    });

    it('allows a new request once the previous one was denied', async () => {
      const first = await fileRequest();
      await t.services.approvals.decide(reviewer, first.id, { outcome: 'denied' });

      const second = await fileRequest();
      expect(second.id).not.toBe(first.id);
      expect(second.status).toBe('pending');
    });

    it('allows a new request once the grant has run out, before anything marks it expired', async () => {
      await approvedRequest(60);
      t.clock.advanceMinutes(61);

      const second = await fileRequest();
      expect(second.status).toBe('pending');
    });

    it('rejects a missing justification', async () => {
      await expect(
        t.services.approvals.fileRequest(requester, { sample_id: sample.id, justification: '   ' })
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('rejects an unknown sample', async () => {
      await expect(
        t.services.approvals.fileRequest(requester, {
          sample_id: '00000000-0000-4000-8000-000000000000',
          justification: JUSTIFICATION,
        })
      ).rejects.toMatchObject({ code: 'NOT_FOUND', reason: 'SAMPLE_NOT_FOUND' });
    });
  });

  describe('decide', () => {
    it('approves with a grant window counted from the decision', async () => {
      const request = await fileRequest();
      t.clock.advanceMinutes(5);

      const decided = await t.services.approvals.decide(reviewer, request.id, {
        outcome: 'approved',
        grant_minutes: 60,
      });

      expect(decided.status).toBe('approved');
      expect(decided.reviewer_id).toBe(userIdOf(reviewer));
      expect(decided.decided_at).toEqual(minutesAfterStart(5));
      expect(decided.expires_at).toEqual(minutesAfterStart(65));
    });

    it('uses the configured default grant when none is given', async () => {
      const request = await fileRequest();
      const decided = await t.services.approvals.decide(reviewer, request.id, { outcome: 'approved' });
      expect(decided.expires_at).toEqual(minutesAfterStart(t.config.defaultGrantMinutes));
    });

    it('succeeds at most once per request', async () => {
      const request = await fileRequest();
      await t.services.approvals.decide(reviewer, request.id, { outcome: 'approved' });

      await expect(
        t.services.approvals.decide(reviewer, request.id, { outcome: 'denied' })
      ).rejects.toMatchObject({ code: 'INVALID_TRANSITION', from: 'approved', attempted: 'deny' });

      const stored = await t.repositories.approvals.findById(request.id);
      expect(stored?.status).toBe('approved');
    });

    it('forbids deciding your own request', async () => {
      const own = await fileRequest(reviewer);
      await expect(
        t.services.approvals.decide(reviewer, own.id, { outcome: 'approved' })
      ).rejects.toBeInstanceOf(SelfApprovalForbiddenError);

      const stored = await t.repositories.approvals.findById(own.id);
      expect(stored?.status).toBe('pending');
    });

    it('requires a reviewer or admin', async () => {
      const request = await fileRequest();
      await expect(
        t.services.approvals.decide(uploader, request.id, { outcome: 'approved' })
      ).rejects.toMatchObject({ code: 'FORBIDDEN', reason: 'ROLE_NOT_PERMITTED' });
    });

    it('rejects a grant longer than the configured maximum', async () => {
      const request = await fileRequest();
      await expect(
        t.services.approvals.decide(reviewer, request.id, {
          outcome: 'approved',
          grant_minutes: t.config.maxGrantMinutes + 1,
        })
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('reports an unknown request as not found', async () => {
      await expect(
        t.services.approvals.decide(reviewer, '00000000-0000-4000-8000-000000000000', { outcome: 'denied' })
      ).rejects.toMatchObject({ code: 'NOT_FOUND', reason: 'REQUEST_NOT_FOUND' });
    });

    it('lets exactly one of two concurrent decisions win', async () => {
      const secondReviewer = await t.seedUser('admin');
      const request = await fileRequest();

      const results = await Promise.allSettled([
        t.services.approvals.decide(reviewer, request.id, { outcome: 'approved' }),
        t.services.approvals.decide(secondReviewer, request.id, { outcome: 'denied' }),
      ]);

      const fulfilled = results.filter((r) => r.status === 'fulfilled');
      const rejected = results.filter((r) => r.status === 'rejected');
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);

      const winner = results.find((r) => r.status === 'fulfilled');
      const loser = results.find((r) => r.status === 'rejected');
      if (winner?.status !== 'fulfilled' || loser?.status !== 'rejected') {
        throw new Error('expected one winner and one loser');
      }
      expect(loser.reason).toBeInstanceOf(InvalidTransitionError);

      const stored = await t.repositories.approvals.findById(request.id);
      expect(stored?.status).toBe(winner.value.status);
      expect(stored?.reviewer_id).toBe(winner.value.reviewer_id);
      if (stored?.status === 'denied') {
        expect(stored.expires_at).toBeNull();
      }
    });
  });

  describe('authorizeDownload', () => {
    it('issues a token right after approval and fails with GrantExpired after the window', async () => {
      const request = await approvedRequest(60);

      const grant = await t.services.approvals.authorizeDownload(requester, request.id);
      expect(grant.requestId).toBe(request.id);
      expect(grant.sampleId).toBe(sample.id);
      expect(grant.token.split('.')).toHaveLength(3);

      t.clock.advanceMinutes(61);
      await expect(t.services.approvals.authorizeDownload(requester, request.id)).rejects.toBeInstanceOf(
        GrantExpiredError
      );
    });

    it('caps the token lifetime at the download token window', async () => {
      const request = await approvedRequest(60);
      const grant = await t.services.approvals.authorizeDownload(requester, request.id);
      expect(grant.expiresAt).toEqual(minutesAfterStart(t.config.downloadTokenMinutes));
    });

    it('caps the token lifetime at the grant expiry', async () => {
      const request = await approvedRequest(60);
      t.clock.advanceMinutes(50);

      const grant = await t.services.approvals.authorizeDownload(requester, request.id);
      expect(grant.expiresAt).toEqual(minutesAfterStart(60));
    });

    it('still works at exactly the expiry instant', async () => {
      const request = await approvedRequest(60);
      t.clock.advanceMinutes(60);

      const grant = await t.services.approvals.authorizeDownload(requester, request.id);
      expect(grant.expiresAt).toEqual(minutesAfterStart(60));
    });

    it('moves an overdue grant to expired and keeps failing the same way', async () => {
      const request = await approvedRequest(60);
      t.clock.advanceMinutes(90);

      const first = t.services.approvals.authorizeDownload(requester, request.id);
      await expect(first).rejects.toMatchObject({ code: 'GRANT_EXPIRED', transitioned: true });
      expect((await t.repositories.approvals.findById(request.id))?.status).toBe('expired');

      const second = t.services.approvals.authorizeDownload(requester, request.id);
      await expect(second).rejects.toMatchObject({ code: 'GRANT_EXPIRED', transitioned: false });
      expect((await t.repositories.approvals.findById(request.id))?.status).toBe('expired');
    });

    it('expires through the state machine transition', async () => {
      const request = await approvedRequest(60);
      t.clock.advanceMinutes(90);
      const transition = vi.spyOn(t.repositories.approvals, 'transition');

      await expect(t.services.approvals.authorizeDownload(requester, request.id)).rejects.toBeInstanceOf(
        GrantExpiredError
      );
      expect(transition).toHaveBeenCalledWith(request.id, 'approved', {
        from: 'approved',
        status: 'expired',
        updated_at: minutesAfterStart(90),
      });
    });

    it('refuses a pending request', async () => {
      const request = await fileRequest();
      await expect(t.services.approvals.authorizeDownload(requester, request.id)).rejects.toBeInstanceOf(
        NotApprovedError
      );
    });

    it('refuses a denied request', async () => {
      const request = await fileRequest();
      await t.services.approvals.decide(reviewer, request.id, { outcome: 'denied' });
      await expect(t.services.approvals.authorizeDownload(requester, request.id)).rejects.toMatchObject({
        code: 'NOT_APPROVED',
        status: 'denied',
      });
    });

    it('is only for the requester', async () => {
      const request = await approvedRequest();
      await expect(t.services.approvals.authorizeDownload(reviewer, request.id)).rejects.toMatchObject({
        code: 'FORBIDDEN',
        reason: 'NOT_REQUESTER',
      });
    });

    it('reports BLOB_MISSING when the sample bytes are gone', async () => {
      const request = await approvedRequest();
      await rm(path.join(t.storageRoot, sample.storage_path));

      await expect(t.services.approvals.authorizeDownload(requester, request.id)).rejects.toMatchObject({
        code: 'NOT_FOUND',
        reason: 'BLOB_MISSING',
      });
    });
  });

  describe('redeem', () => {
    it('streams the sample bytes to the requester', async () => {
      const request = await approvedRequest();
      const grant = await t.services.approvals.authorizeDownload(requester, request.id);

      const content = await t.services.approvals.redeem(requester, grant.token);
      expect(content.sample.id).toBe(sample.id);
      expect(await text(content.stream)).toBe('ABC');
    });

    it('refuses a token presented by someone else', async () => {
      const request = await approvedRequest();
      const grant = await t.services.approvals.authorizeDownload(requester, request.id);

      await expect(t.services.approvals.redeem(reviewer, grant.token)).rejects.toMatchObject({
        code: 'FORBIDDEN',
        reason: 'NOT_REQUESTER',
      });
    });

    it('refuses an expired token', async () => {
      const request = await approvedRequest();
      const grant = await t.services.approvals.authorizeDownload(requester, request.id);
      t.clock.advanceMinutes(t.config.downloadTokenMinutes + 1);

      await expect(t.services.approvals.redeem(requester, grant.token)).rejects.toMatchObject({
        code: 'FORBIDDEN',
        reason: 'DOWNLOAD_TOKEN_EXPIRED',
      });
    });

    it('refuses a malformed token', async () => {
      await expect(t.services.approvals.redeem(requester, 'not-a-token')).rejects.toMatchObject({
        code: 'FORBIDDEN',
        reason: 'DOWNLOAD_TOKEN_INVALID',
      });
    });
  });

  describe('auditing', () => {
    it('records exactly one entry per call with the matching outcome', async () => {
      const entries = t.repositories.audit.entries;

      let before = entries.length;
      const request = await fileRequest();
      expect(entries.slice(before)).toHaveLength(1);
      expect(entries[entries.length - 1]).toMatchObject({
        action: 'approval.request',
        outcome: 'success',
        target_id: request.id,
      });

      before = entries.length;
      await expect(fileRequest()).rejects.toBeInstanceOf(DuplicateActiveRequestError);
      expect(entries.slice(before)).toHaveLength(1);
      expect(entries[entries.length - 1]).toMatchObject({
        action: 'approval.request',
        outcome: 'failure',
        reason_code: 'DUPLICATE_ACTIVE_REQUEST',
      });

      before = entries.length;
      await t.services.approvals.decide(reviewer, request.id, { outcome: 'approved', grant_minutes: 60 });
      expect(entries.slice(before)).toHaveLength(1);
      expect(entries[entries.length - 1]).toMatchObject({
        action: 'approval.decide',
        outcome: 'success',
        actor_id: userIdOf(reviewer),
        metadata: { outcome: 'approved', from: 'pending', to: 'approved', expires_at: minutesAfterStart(60) },
      });

      before = entries.length;
      await expect(t.services.approvals.decide(reviewer, request.id, { outcome: 'denied' })).rejects.toBeInstanceOf(
        InvalidTransitionError
      );
      expect(entries.slice(before)).toHaveLength(1);
      expect(entries[entries.length - 1]).toMatchObject({
        action: 'approval.decide',
        outcome: 'failure',
        reason_code: 'INVALID_TRANSITION',
        metadata: { outcome: 'denied', from: 'approved', attempted: 'deny' },
      });

      before = entries.length;
      await t.services.approvals.authorizeDownload(requester, request.id);
      expect(entries.slice(before)).toHaveLength(1);
      expect(entries[entries.length - 1]).toMatchObject({
        action: 'download_authorized',
        outcome: 'success',
        target_id: request.id,
      });

      before = entries.length;
      await expect(t.services.approvals.authorizeDownload(reviewer, request.id)).rejects.toThrow();
      expect(entries.slice(before)).toHaveLength(1);
      expect(entries[entries.length - 1]).toMatchObject({
        action: 'download_authorized',
        outcome: 'denied',
        reason_code: 'NOT_REQUESTER',
      });

      t.clock.advanceMinutes(61);
      before = entries.length;
      await expect(t.services.approvals.authorizeDownload(requester, request.id)).rejects.toThrow();
      expect(entries.slice(before)).toHaveLength(1);
      expect(entries[entries.length - 1]).toMatchObject({
        action: 'download_authorized',
        outcome: 'failure',
        reason_code: 'GRANT_EXPIRED',
        metadata: { from: 'approved', to: 'expired' },
      });
    });

    it('records self-approval attempts as denied', async () => {
      const own = await fileRequest(reviewer);
      await expect(t.services.approvals.decide(reviewer, own.id, { outcome: 'approved' })).rejects.toThrow();

      const last = t.repositories.audit.entries[t.repositories.audit.entries.length - 1];
      expect(last.outcome).toBe('denied');
      expect(last.reason_code).toBe('SELF_APPROVAL_FORBIDDEN');
      expect(last.target_id).toBe(own.id);
    });

    it('records the download with the request it came from', async () => {
      const request = await approvedRequest();
      const grant = await t.services.approvals.authorizeDownload(requester, request.id);
      const content = await t.services.approvals.redeem(requester, grant.token);
      content.stream.destroy();

      const last = t.repositories.audit.entries[t.repositories.audit.entries.length - 1];
      expect(last).toMatchObject({
        action: 'sample.download',
        outcome: 'success',
        target_type: 'sample',
        target_id: sample.id,
        metadata: { request_id: request.id },
      });
    });
  });

  describe('list and get', () => {
    it('shows viewers only their own requests', async () => {
      const other = await t.seedUser('viewer');
      await fileRequest();
      await fileRequest(other);

      const own = await t.services.approvals.list(requester, {});
      expect(own.map((r) => r.requester_id)).toEqual([userIdOf(requester)]);

      const all = await t.services.approvals.list(reviewer, {});
      expect(all).toHaveLength(2);
    });

    it('filters by status', async () => {
      const first = await fileRequest();
      await t.services.approvals.decide(reviewer, first.id, { outcome: 'denied' });
      await fileRequest();

      const pending = await t.services.approvals.list(reviewer, { status: 'pending' });
      expect(pending).toHaveLength(1);
      expect(pending[0].status).toBe('pending');
    });

    it('records access.denied when a viewer reads another user\'s request', async () => {
      const other = await t.seedUser('viewer');
      const request = await fileRequest();

      await expect(t.services.approvals.get(other, request.id)).rejects.toMatchObject({ reason: 'NOT_REQUESTER' });

      const last = t.repositories.audit.entries[t.repositories.audit.entries.length - 1];
      expect(last).toMatchObject({
        action: 'access.denied',
        actor_id: userIdOf(other),
        target_type: 'approval_request',
        target_id: request.id,
        outcome: 'denied',
      });
    });
  });

  describe('sweepExpired', () => {
    it('expires overdue grants once and records each as a system action', async () => {
      const request = await approvedRequest(60);
      t.clock.advanceMinutes(61);

      expect(await t.services.approvals.sweepExpired()).toBe(1);
      expect((await t.repositories.approvals.findById(request.id))?.status).toBe('expired');

      const last = t.repositories.audit.entries[t.repositories.audit.entries.length - 1];
      expect(last).toMatchObject({
        action: 'approval.expire',
        actor_id: null,
        target_id: request.id,
        outcome: 'success',
        metadata: { from: 'approved', to: 'expired', sample_id: sample.id },
      });

      expect(await t.services.approvals.sweepExpired()).toBe(0);
    });

    it('hands the machine\'s expire transition to the repository', async () => {
      await approvedRequest(60);
      t.clock.advanceMinutes(61);
      const expireStale = vi.spyOn(t.repositories.approvals, 'expireStale');

      await t.services.approvals.sweepExpired();
      expect(expireStale).toHaveBeenCalledWith({
        from: 'approved',
        status: 'expired',
        updated_at: minutesAfterStart(61),
      });
    });

    it('leaves running grants alone', async () => {
      await approvedRequest(60);
      t.clock.advanceMinutes(30);
      expect(await t.services.approvals.sweepExpired()).toBe(0);
    });
  });
});
