import type { ErrorPatternAnalysis, TopicResult } from '../../types/agents.types';

export interface RecommendationRequest {
  studentName: string;
  topicTitle: string;
  scorePct: number;
  totalAnswers: number;
  correctAnswers: number;
}

export interface ErrorAnalysisRequest {
  studentName: string;
  topicResults: TopicResult[];
}

export type GenerationResult<T> =
  | { kind: 'generated'; value: T }
  | { kind: 'failed'; reason: string };

/**
 * External, possibly slow and possibly failing text generator. Implementations
 * never throw; every failure is reported as `{ kind: 'failed' }`.
 */
export interface RecommendationGeneratorPort {
  readonly enabled: boolean;
  generateRecommendation(request: RecommendationRequest): Promise<GenerationResult<string>>;
  analyzeErrorPatterns(request: ErrorAnalysisRequest): Promise<GenerationResult<ErrorPatternAnalysis>>;
  shutdown?(): Promise<void>;
}
