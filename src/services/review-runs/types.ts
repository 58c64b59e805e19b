import type { IssueStateLog, ReviewRun } from '../../domain/types.js';

export interface ReviewRunWithHistory {
  run: ReviewRun;
  history: IssueStateLog[];
}
