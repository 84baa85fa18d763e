// AnalysisHistory interface - past analyses used to estimate complexity

import { SimilarFileRecord } from '../types/queue.js';

export interface AnalysisHistoryInterface {
  record(entry: SimilarFileRecord): Promise<void>;

  // Entries whose file size lies within ±tolerance of fileSize
  findSimilar(fileSize: number, tolerance: number, limit: number): Promise<SimilarFileRecord[]>;
}
