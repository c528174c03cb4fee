/**
 * Review statistics
 */

import type { ReviewRecord, ReviewStatistics } from '../types/index.js';

/**
 * Numeric value of a score, or null when it is not a number
 */
function toNumericScore(score: number | string): number | null {
  if (typeof score === 'number') {
    return Number.isFinite(score) ? score : null;
  }
  if (score.trim() === '') {
    return null;
  }
  const value = Number(score);
  return Number.isFinite(value) ? value : null;
}

export function computeStatistics(
  records: readonly ReviewRecord[],
  apiReportedTotal: number | null
): ReviewStatistics | null {
  if (records.length === 0) {
    return null;
  }

  const scores = records
    .map((record) => toNumericScore(record.score))
    .filter((score): score is number => score !== null);
  const totalUseful = records.reduce((sum, record) => sum + record.usefulCount, 0);

  let scoreSum = 0;
  let maxScore = -Infinity;
  let minScore = Infinity;
  for (const score of scores) {
    scoreSum += score;
    if (score > maxScore) maxScore = score;
    if (score < minScore) minScore = score;
  }
  const hasScores = scores.length > 0;

  return {
    totalReviews: records.length,
    apiReportedTotal,
    averageScore: hasScores ? scoreSum / scores.length : null,
    maxScore: hasScores ? maxScore : null,
    minScore: hasScores ? minScore : null,
    totalUseful,
    averageUseful: totalUseful / records.length,
  };
}
