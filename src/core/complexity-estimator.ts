// ComplexityEstimator - synthetic 0-1 estimate of how expensive a spreadsheet
// will be to analyze, from its size, extension and similar past analyses

import * as path from 'path';
import { MEGABYTE } from './config/queue-configurations.js';
import { SimilarFileRecord } from './types/queue.js';

export interface ComplexityInput {
  file_size: number;
  file_name?: string;
  file_extension?: string;
  similar_file_history?: SimilarFileRecord[];
}

const WEIGHTS = {
  file_size: 0.4,
  file_type: 0.3,
  historical_data: 0.3,
} as const;

const EXTENSION_COMPLEXITY: Readonly<Record<string, number>> = {
  '.csv': 0.2,
  '.xls': 0.5,
  '.xlsx': 0.6,
  '.xlsm': 0.8, // macros
};

const BARE_EXTENSION = /^\.[^.]+$/;

export const SIMILAR_SIZE_TOLERANCE = 0.2;
export const SIMILAR_FILE_LIMIT = 10;

export class ComplexityEstimator {
  estimateComplexity(input: ComplexityInput): number {
    const score =
      WEIGHTS.file_size * this.sizeComplexity(input.file_size) +
      WEIGHTS.file_type * this.fileTypeComplexity(input.file_extension ?? input.file_name ?? '') +
      WEIGHTS.historical_data *
        this.historicalComplexity(input.file_size, input.similar_file_history ?? []);

    return Math.min(score, 1.0);
  }

  sizeComplexity(fileSize: number): number {
    if (fileSize <= 1 * MEGABYTE) return 0.1;
    if (fileSize <= 5 * MEGABYTE) return 0.3;
    if (fileSize <= 20 * MEGABYTE) return 0.5;
    if (fileSize <= 50 * MEGABYTE) return 0.7;
    return 0.9;
  }

  // Accepts a file name ("report.xlsx") or a bare extension (".xlsx")
  fileTypeComplexity(fileNameOrExtension: string): number {
    const extension = BARE_EXTENSION.test(fileNameOrExtension)
      ? fileNameOrExtension
      : path.extname(fileNameOrExtension);
    return EXTENSION_COMPLEXITY[extension.toLowerCase()] ?? 0.5;
  }

  /**
   * Average AI tier used by similar-sized files (±20%), bucketed.
   * 0.5 when nothing similar has been analyzed yet.
   */
  historicalComplexity(fileSize: number, history: SimilarFileRecord[]): number {
    const similar = selectSimilarFiles(fileSize, history);
    if (similar.length === 0) return 0.5;

    const avgTier =
      similar.reduce((sum, entry) => sum + entry.historical_ai_tier, 0) / similar.length;

    if (avgTier <= 1.3) return 0.3;
    if (avgTier <= 1.7) return 0.6;
    return 0.9;
  }
}

export function selectSimilarFiles(
  fileSize: number,
  history: SimilarFileRecord[],
  tolerance: number = SIMILAR_SIZE_TOLERANCE,
  limit: number = SIMILAR_FILE_LIMIT
): SimilarFileRecord[] {
  const min = fileSize * (1 - tolerance);
  const max = fileSize * (1 + tolerance);
  return history
    .filter(entry => entry.file_size >= min && entry.file_size <= max)
    .slice(0, limit);
}
