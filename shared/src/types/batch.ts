export type BatchItemStatus = 'succeeded' | 'skipped' | 'failed';

export type BatchItemResult = {
  file: string;
  status: BatchItemStatus;
  output?: string;
  warnings: string[];
  error?: string;
};

/** Outcome of one directory conversion; failures never abort the batch. */
export type BatchReport = {
  succeeded: number;
  skipped: number;
  failed: number;
  warnings: number;
  items: BatchItemResult[];
};
