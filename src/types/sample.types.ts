/**
 * Sample metadata record.
 *
 * `digest` is the content identity. Several samples may point at the same
 * blob when their bytes are identical; the record itself never changes.
 */
export interface Sample {
  id: string;
  dataset_id: string;
  digest: string;
  digest_algorithm: string;
  storage_path: string; // relative to the blob root, derived from the digest
  mime_type: string;
  original_filename: string;
  size_bytes: number;
  uploaded_by: string;
  created_at: Date;
}

/**
 * Sample as returned to clients (no storage layout).
 */
export interface SamplePublic {
  id: string;
  dataset_id: string;
  digest: string;
  mime_type: string;
  original_filename: string;
  size_bytes: number;
  uploaded_by: string;
  created_at: Date;
}

export interface UploadSampleInput {
  datasetId: string;
  bytes: Buffer;
  mimeType: string;
  filename: string;
}
