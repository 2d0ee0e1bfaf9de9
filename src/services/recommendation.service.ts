import type { ErrorPatternAnalysis, RecommendationSource, TopicResult } from '../types/agents.types';
import type {
  GenerationResult,
  RecommendationGeneratorPort,
  RecommendationRequest,
} from './ports/recommendation-generator.port';
import { describeError } from '../utils/errors';
import { fallbackErrorAnalysis, fallbackRecommendation } from './recommendation-fallback.service';

export interface Sourced<T> {
  value: T;
  source: RecommendationSource;
}

// A generator that throws anyway is treated like one that reported failure.
async function settle<T>(call: () => Promise<GenerationResult<T>>): Promise<GenerationResult<T>> {
  try {
    return await call();
  } catch (err) {
    return { kind: 'failed', reason: describeError(err) };
  }
}

/**
 * Maps every `failed` generator result onto the rule-based fallback, so
 * callers always get text and know where it came from.
 */
export class RecommendationService {
  constructor(private readonly generator: RecommendationGeneratorPort) {}

  async recommend(request: RecommendationRequest): Promise<Sourced<string>> {
    const result = await settle(() => this.generator.generateRecommendation(request));
    if (result.kind === 'generated') return { value: result.value, source: 'external' };
    return { value: fallbackRecommendation(request.topicTitle, request.scorePct), source: 'rule' };
  }

  async analyzeErrors(studentName: string, topicResults: TopicResult[]): Promise<Sourced<ErrorPatternAnalysis>> {
    const result = await settle(() => this.generator.analyzeErrorPatterns({ studentName, topicResults }));
    if (result.kind === 'generated') return { value: result.value, source: 'external' };
    return { value: fallbackErrorAnalysis(topicResults), source: 'rule' };
  }
}
