import { DANGER_SCORE_THRESHOLD, RECENT_WINDOW_MS } from '../config/agents.config';
import type {
  AnswerRecord,
  Severity,
  StudentPerformanceSnapshot,
  StudentRef,
  TopicStats,
} from '../types/agents.types';

/** Rounds to one decimal place; all reported percentages go through this. */
export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function percentage(correct: number, total: number): number {
  return total > 0 ? round1((correct / total) * 100) : 0;
}

export function severityForScore(score: number): Severity {
  return score < DANGER_SCORE_THRESHOLD ? 'danger' : 'warning';
}

/** Per-topic totals in first-answer order. */
export function topicStats(answers: AnswerRecord[]): Map<string, TopicStats> {
  const counts = new Map<string, { total: number; correct: number }>();
  for (const answer of answers) {
    const entry = counts.get(answer.topicId) ?? { total: 0, correct: 0 };
    entry.total += 1;
    if (answer.isCorrect) entry.correct += 1;
    counts.set(answer.topicId, entry);
  }
  const stats = new Map<string, TopicStats>();
  for (const [topicId, { total, correct }] of counts) {
    stats.set(topicId, { total, correct, percentage: percentage(correct, total) });
  }
  return stats;
}

/**
 * Returns null for a student without answers; such students are never
 * classified.
 */
export function buildSnapshot(
  student: StudentRef,
  answers: AnswerRecord[],
  now: Date
): StudentPerformanceSnapshot | null {
  if (answers.length === 0) return null;
  const correct = answers.filter((a) => a.isCorrect).length;
  const cutoff = now.getTime() - RECENT_WINDOW_MS;
  const recent = answers.filter((a) => a.createdAt.getTime() >= cutoff);
  const recentCorrect = recent.filter((a) => a.isCorrect).length;
  return {
    studentId: student.id,
    studentName: student.name,
    total: answers.length,
    correct,
    score: percentage(correct, answers.length),
    recentScore: recent.length > 0 ? percentage(recentCorrect, recent.length) : null,
    topics: topicStats(answers),
  };
}

export function withinWindow(createdAt: Date, now: Date, windowMs: number): boolean {
  return createdAt.getTime() > now.getTime() - windowMs;
}
