export type SyncResult = {
  success: number;
  skipped: number;
  errors: number;
  total_chunks: number;
};

export type SyncJobStatus = 'running' | 'completed' | 'failed';

export type SyncJob = {
  id: string;
  database_id: string;
  status: SyncJobStatus;
  force_update: boolean;
  page_limit: number | null;
  started_at: string; // ISO 8601
  finished_at?: string;
  result?: SyncResult;
  error?: string;
};
