export type RagSource = {
  page_id: string;
  page_title: string;
  page_url: string;
  score: number;
};

export type RagAnswer = {
  answer: string;
  context_used: boolean;
  sources: RagSource[];
  model_used: string;
};
