/**
 * Service wiring
 *
 * Builds every service from a set of repositories and a blob store. The
 * server passes the PostgreSQL repositories; tests pass in-memory ones.
 */

import type { AppConfig } from './config';
import {
  AnnotationRepository,
  ApprovalRepository,
  AuditRepository,
  DatasetRepository,
  SampleRepository,
  SessionRepository,
  UserRepository,
  pgAnnotationRepository,
  pgApprovalRepository,
  pgAuditRepository,
  pgDatasetRepository,
  pgSampleRepository,
  pgSessionRepository,
  pgUserRepository,
} from './models';
import { AnnotationService, createAnnotationService } from './services/annotation.service';
import { ApprovalService, createApprovalService } from './services/approval.service';
import { AuditService, createAuditService } from './services/audit.service';
import type { BlobStore } from './services/blob.service';
import { DatasetService, createDatasetService } from './services/dataset.service';
import { IdentityService, createIdentityService } from './services/identity.service';
import { SampleStore, createSampleStore } from './services/sample-store.service';

export interface Repositories {
  users: UserRepository;
  sessions: SessionRepository;
  datasets: DatasetRepository;
  samples: SampleRepository;
  annotations: AnnotationRepository;
  approvals: ApprovalRepository;
  audit: AuditRepository;
}

export const pgRepositories: Repositories = {
  users: pgUserRepository,
  sessions: pgSessionRepository,
  datasets: pgDatasetRepository,
  samples: pgSampleRepository,
  annotations: pgAnnotationRepository,
  approvals: pgApprovalRepository,
  audit: pgAuditRepository,
};

export interface Services {
  audit: AuditService;
  identity: IdentityService;
  datasets: DatasetService;
  sampleStore: SampleStore;
  annotations: AnnotationService;
  approvals: ApprovalService;
  checkDatabase: () => Promise<boolean>;
}

export interface ServiceDeps {
  repositories: Repositories;
  blobs: BlobStore;
  config: AppConfig;
  now?: () => Date;
  checkDatabase?: () => Promise<boolean>;
}

export function createServices(deps: ServiceDeps): Services {
  const { repositories, blobs, config } = deps;
  const now = deps.now ?? (() => new Date());

  const audit = createAuditService({ repository: repositories.audit, now });

  const identity = createIdentityService({
    users: repositories.users,
    sessions: repositories.sessions,
    audit,
    jwtSecret: config.jwtSecret,
    accessTokenExpireMinutes: config.accessTokenExpireMinutes,
    bcryptRounds: config.bcryptRounds,
    now,
  });

  const datasets = createDatasetService({ datasets: repositories.datasets, audit, now });

  const sampleStore = createSampleStore({
    samples: repositories.samples,
    blobs,
    datasets,
    audit,
    allowedMimeTypes: config.allowedMimeTypes,
    digestAlgorithm: config.digestAlgorithm,
    storageTimeoutMs: config.storageTimeoutMs,
    storageWriteRetries: config.storageWriteRetries,
    now,
  });

  const annotations = createAnnotationService({
    annotations: repositories.annotations,
    samples: repositories.samples,
    datasets,
    audit,
    now,
  });

  const approvals = createApprovalService({
    approvals: repositories.approvals,
    sampleStore,
    audit,
    jwtSecret: config.jwtSecret,
    defaultGrantMinutes: config.defaultGrantMinutes,
    maxGrantMinutes: config.maxGrantMinutes,
    downloadTokenMinutes: config.downloadTokenMinutes,
    now,
  });

  return {
    audit,
    identity,
    datasets,
    sampleStore,
    annotations,
    approvals,
    checkDatabase: deps.checkDatabase ?? (async () => true),
  };
}
