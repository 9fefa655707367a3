export type SyncStartedResponse = {
  status: 'started';
  message: string;
  force_update: boolean;
  job_ids: string[];
};

export type VectorHealth = {
  status: 'healthy';
  vector_db: 'connected';
  embedding_model: string;
  embedding_dimension: number;
  /** Generation model name; the key predates the switch to Ollama. */
  google_ai_model: string;
  total_chunks: number;
  unique_pages: number;
};

export type ChatResponse = {
  question: string;
  answer: string;
  context_used: boolean;
  sources_count: number;
  model: string;
  source_urls?: string[];
};
