/**
 * `group` datasets are shared with the owning group; `private` ones only
 * with their creator (and admins).
 */
export type DatasetVisibility = 'group' | 'private';

export const DATASET_VISIBILITIES: readonly DatasetVisibility[] = ['group', 'private'];

/**
 * A named collection of samples, scoped to the group that owns it.
 * Immutable once created.
 */
export interface Dataset {
  id: string;
  name: string;
  description: string | null;
  version: string | null;
  owner_group_id: string | null;
  visibility: DatasetVisibility;
  created_by: string;
  created_at: Date;
}

export interface CreateDatasetRequest {
  name: string;
  description?: string;
  version?: string;
  owner_group_id?: string; // admins only; others always create in their own group
  visibility?: DatasetVisibility;
}
