export type ApprovalStatus = 'pending' | 'approved' | 'denied' | 'expired';

export type ApprovalOutcome = 'approved' | 'denied';

/**
 * Download request for one sample.
 * Decided once by a reviewer; `expires_at` is set only on approval.
 */
export interface ApprovalRequest {
  id: string;
  requester_id: string;
  sample_id: string;
  justification: string;
  status: ApprovalStatus;
  reviewer_id: string | null;
  decided_at: Date | null;
  expires_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export interface FileApprovalRequest {
  sample_id: string;
  justification: string;
}

export interface DecideApprovalRequest {
  outcome: ApprovalOutcome;
  grant_minutes?: number;
}

/**
 * Returned by authorizeDownload. The token is bound to one request and one sample.
 */
export interface DownloadGrant {
  token: string;
  requestId: string;
  sampleId: string;
  expiresAt: Date;
}
