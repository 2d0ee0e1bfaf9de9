import type { ErrorPatternAnalysis, TopicResult } from '../types/agents.types';
import { round1 } from './performance.service';

/** Title used for recommendations that are not tied to one topic. */
export const GENERAL_PROGRAM_TITLE = 'general program';

/** Rule-based text; depends only on the score bucket and the topic title. */
export function fallbackRecommendation(topicTitle: string, scorePct: number): string {
  if (scorePct < 30) {
    return (
      `Review the topic "${topicTitle}" from the very beginning. ` +
      `The current result (${scorePct}%) shows the material has not been absorbed. ` +
      `Start with the theory, then move on to practice.`
    );
  }
  if (scorePct < 50) {
    return (
      `Review the topic "${topicTitle}" (current result: ${scorePct}%). ` +
      `Pay attention to the explanations for the questions that caused difficulty.`
    );
  }
  return `Result for the topic "${topicTitle}" is ${scorePct}%. Retake the test to consolidate.`;
}

export function fallbackErrorAnalysis(results: TopicResult[]): ErrorPatternAnalysis {
  const weakAreas = results.filter((r) => r.pct < 50).map((r) => r.topicTitle);
  const avg = results.length > 0 ? results.reduce((sum, r) => sum + r.pct, 0) / results.length : 0;
  return {
    summary: `Average score: ${round1(avg)}%. Weak topics: ${weakAreas.join(', ') || 'none identified'}.`,
    weakAreas,
    suggestedDifficulty: avg < 60 ? 1 : 2,
  };
}
