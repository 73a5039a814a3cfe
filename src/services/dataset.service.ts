/**
 * Dataset Service
 *
 * Datasets belong to a group. Admins see everything. Everyone else sees
 * their own private datasets and the group datasets of their own group,
 * plus ungrouped ones.
 */

import { v4 as uuidv4 } from 'uuid';
import { CreateDatasetRequest, Dataset, Principal, RequestContext } from '../types';
import type { DatasetRepository } from '../models';
import { ForbiddenError, NotFoundError, datasetNameTakenError } from '../utils/errors.utils';
import { assertValid, validateDataset } from '../utils/validation.utils';
import type { AuditService } from './audit.service';
import { ROLES, requirePrincipal, requireRole } from './identity.service';

export function canViewDataset(
  principal: Principal,
  dataset: Pick<Dataset, 'owner_group_id' | 'visibility' | 'created_by'>
): boolean {
  if (principal.role === 'admin') {
    return true;
  }
  if (dataset.visibility === 'private') {
    return dataset.created_by === principal.userId;
  }
  return dataset.owner_group_id === null || dataset.owner_group_id === principal.groupId;
}

export interface DatasetService {
  create(ctx: RequestContext, data: Partial<CreateDatasetRequest>): Promise<Dataset>;
  list(ctx: RequestContext): Promise<Dataset[]>;
  get(ctx: RequestContext, datasetId: string): Promise<Dataset>;
  /** Dataset lookup plus visibility check, for services acting inside a dataset */
  requireVisible(principal: Principal, datasetId: string): Promise<Dataset>;
}

export interface DatasetServiceDeps {
  datasets: DatasetRepository;
  audit: AuditService;
  now: () => Date;
}

export function createDatasetService({ datasets, audit, now }: DatasetServiceDeps): DatasetService {
  async function requireVisible(principal: Principal, datasetId: string): Promise<Dataset> {
    const dataset = await datasets.findById(datasetId);
    if (!dataset) {
      throw new NotFoundError('Dataset', 'DATASET_NOT_FOUND');
    }
    if (!canViewDataset(principal, dataset)) {
      throw new ForbiddenError('DATASET_ACCESS_DENIED');
    }
    return dataset;
  }

  return {
    requireVisible,

    async create(ctx, data) {
      return audit.audited(
        ctx,
        {
          action: 'dataset.create',
          targetType: 'dataset',
          onSuccess: (dataset) => ({ targetId: dataset.id }),
        },
        async () => {
          const principal = requireRole(ctx, ROLES.upload);
          assertValid(validateDataset(data));

          const name = (data.name ?? '').trim();
          if (await datasets.nameExists(name)) {
            throw datasetNameTakenError();
          }

          // Only admins may create a dataset for a group other than their own
          let ownerGroupId = principal.groupId;
          if (data.owner_group_id !== undefined && data.owner_group_id !== principal.groupId) {
            if (principal.role !== 'admin') {
              throw new ForbiddenError('GROUP_NOT_PERMITTED', 'You can only create datasets in your own group.');
            }
            ownerGroupId = data.owner_group_id;
          }

          return datasets.create({
            id: uuidv4(),
            name,
            description: data.description ?? null,
            version: data.version ?? null,
            owner_group_id: ownerGroupId,
            visibility: data.visibility ?? 'group',
            created_by: principal.userId,
            created_at: now(),
          });
        }
      );
    },

    async list(ctx) {
      const principal = requirePrincipal(ctx);
      const all = await datasets.listAll();
      return all.filter((dataset) => canViewDataset(principal, dataset));
    },

    async get(ctx, datasetId) {
      return audit.recordDenials(ctx, { type: 'dataset', id: datasetId }, async () =>
        requireVisible(requirePrincipal(ctx), datasetId)
      );
    },
  };
}
