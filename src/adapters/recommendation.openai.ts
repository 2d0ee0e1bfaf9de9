import axios from 'axios';
import Bottleneck from 'bottleneck';
import CircuitBreaker from 'opossum';
import { z } from 'zod';
import type {
  ErrorAnalysisRequest,
  GenerationResult,
  RecommendationGeneratorPort,
  RecommendationRequest,
} from '../services/ports/recommendation-generator.port';
import type { ErrorPatternAnalysis, SuggestedDifficulty } from '../types/agents.types';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface ChatOptions {
  temperature: number;
  maxTokens: number;
}

/** Narrow seam over an OpenAI-compatible chat-completions endpoint. */
export interface ChatCompletionClient {
  complete(messages: ChatMessage[], options: ChatOptions): Promise<string>;
}

export interface ChatClientConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

export interface GeneratorOptions {
  concurrency: number;
  timeoutMs: number;
  /** Breaker opens when this share of recent calls failed. */
  errorThresholdPercentage?: number;
  resetTimeoutMs?: number;
}

const log = logger.child({ component: 'recommendation.generator' });

const completionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
});

const analysisSchema = z.object({
  summary: z.string(),
  weak_areas: z.array(z.string()).default([]),
  suggested_difficulty: z.coerce.number().int(),
});

function toDifficulty(value: number): SuggestedDifficulty {
  if (value <= 1) return 1;
  if (value >= 3) return 3;
  return 2;
}

/** Drops a surrounding ``` fence (with or without a language tag). */
export function stripCodeFence(raw: string): string {
  let text = raw.trim();
  if (text.startsWith('```')) {
    const newline = text.indexOf('\n');
    text = newline >= 0 ? text.slice(newline + 1) : text.slice(3);
  }
  if (text.endsWith('```')) text = text.slice(0, -3);
  return text.trim();
}

export function parseErrorAnalysis(raw: string): ErrorPatternAnalysis | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(raw));
  } catch {
    return null;
  }
  const result = analysisSchema.safeParse(parsed);
  if (!result.success) return null;
  return {
    summary: result.data.summary,
    weakAreas: result.data.weak_areas,
    suggestedDifficulty: toDifficulty(result.data.suggested_difficulty),
  };
}

export function createAxiosChatClient(config: ChatClientConfig): ChatCompletionClient {
  const http = axios.create({
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    headers: { Authorization: `Bearer ${config.apiKey}`, 'Content-Type': 'application/json' },
    validateStatus: () => true,
  });
  return {
    async complete(messages, options) {
      const resp = await http.post('/chat/completions', {
        model: config.model,
        messages,
        temperature: options.temperature,
        max_tokens: options.maxTokens,
      });
      if (resp.status < 200 || resp.status >= 300) {
        throw new Error(`Chat completion error: ${resp.status}`);
      }
      const body = completionSchema.safeParse(resp.data);
      if (!body.success) throw new Error('Chat completion response has an unexpected shape');
      const content = body.data.choices[0].message.content?.trim() ?? '';
      if (!content) throw new Error('Chat completion returned empty content');
      return content;
    },
  };
}

/**
 * External generator with a global concurrency limit and a circuit breaker.
 * Every failure (HTTP, timeout, open breaker, unparseable answer) comes back
 * as `{ kind: 'failed' }`.
 */
export class OpenAIRecommendationGenerator implements RecommendationGeneratorPort {
  readonly enabled = true;
  private readonly limiter: Bottleneck;
  private readonly breaker: CircuitBreaker<[ChatMessage[], ChatOptions], string>;

  constructor(private readonly client: ChatCompletionClient, options: GeneratorOptions) {
    this.limiter = new Bottleneck({ maxConcurrent: options.concurrency, minTime: 0 });
    this.breaker = new CircuitBreaker((messages: ChatMessage[], chatOptions: ChatOptions) =>
      this.client.complete(messages, chatOptions), {
      timeout: options.timeoutMs,
      errorThresholdPercentage: options.errorThresholdPercentage ?? 50,
      resetTimeout: options.resetTimeoutMs ?? 30_000,
      name: 'RecommendationGenerator',
    });
    this.breaker.on('open', () => log.warn('generator-breaker-open'));
    this.breaker.on('halfOpen', () => log.info('generator-breaker-half-open'));
    this.breaker.on('close', () => log.info('generator-breaker-closed'));
  }

  private async chat(messages: ChatMessage[], options: ChatOptions): Promise<GenerationResult<string>> {
    try {
      const text = await this.limiter.schedule(() => this.breaker.fire(messages, options));
      return { kind: 'generated', value: text };
    } catch (err) {
      return { kind: 'failed', reason: describeError(err) };
    }
  }

  async generateRecommendation(request: RecommendationRequest): Promise<GenerationResult<string>> {
    const prompt =
      `You are an assistant in a distance-learning system. ` +
      `Student "${request.studentName}" is studying the topic "${request.topicTitle}". ` +
      `Their current result is ${request.scorePct}% (${request.correctAnswers} of ${request.totalAnswers} correct). ` +
      `Write a short personalised recommendation (2-4 sentences) with concrete steps to improve.`;
    const result = await this.chat(
      [
        { role: 'system', content: 'You are an experienced teacher. Answer briefly and to the point.' },
        { role: 'user', content: prompt },
      ],
      { temperature: 0.7, maxTokens: 300 }
    );
    if (result.kind === 'failed') {
      log.warn('recommendation-generation-failed', { topic: request.topicTitle, reason: result.reason });
    }
    return result;
  }

  async analyzeErrorPatterns(request: ErrorAnalysisRequest): Promise<GenerationResult<ErrorPatternAnalysis>> {
    const lines = request.topicResults.map((t) => `- ${t.topicTitle}: ${t.pct}% (${t.correct}/${t.total})`).join('\n');
    const prompt =
      `Student "${request.studentName}" has the following results:\n${lines}\n\n` +
      `Analyse the error pattern. Identify weak areas and suggest a difficulty level ` +
      `(1=easy, 2=medium, 3=hard).\n\n` +
      `Answer strictly in JSON:\n{"summary": "...", "weak_areas": ["..."], "suggested_difficulty": 1}`;
    const result = await this.chat(
      [
        { role: 'system', content: 'You are a learning-data analyst. Answer in JSON.' },
        { role: 'user', content: prompt },
      ],
      { temperature: 0.5, maxTokens: 500 }
    );
    if (result.kind === 'failed') {
      log.warn('error-analysis-failed', { reason: result.reason });
      return result;
    }
    const analysis = parseErrorAnalysis(result.value);
    if (!analysis) {
      log.warn('error-analysis-unparseable');
      return { kind: 'failed', reason: 'unparseable analysis' };
    }
    return { kind: 'generated', value: analysis };
  }

  async shutdown(): Promise<void> {
    this.breaker.shutdown();
    await this.limiter.stop({ dropWaitingJobs: true });
  }
}

/** Used when no API key is configured; callers fall back to rule-based text. */
export class DisabledRecommendationGenerator implements RecommendationGeneratorPort {
  readonly enabled = false;

  async generateRecommendation(_request: RecommendationRequest): Promise<GenerationResult<string>> {
    return { kind: 'failed', reason: 'generator_disabled' };
  }

  async analyzeErrorPatterns(): Promise<GenerationResult<ErrorPatternAnalysis>> {
    return { kind: 'failed', reason: 'generator_disabled' };
  }
}
