import { z } from 'zod';
import type { SuggestedDifficulty } from '../../types/agents.types';
import type { AgentMessage, AgentMessageType, MessageOf } from '../../types/messages.types';

// Wire payloads are flat snake_case records; unknown keys are stripped.

const idSchema = z.union([z.string().min(1), z.number().int()]).transform((v) => String(v));
const optionalIdSchema = z
  .union([z.string().min(1), z.number().int()])
  .nullish()
  .transform((v) => (v == null ? null : String(v)));
const nameSchema = z.string().nullish().transform((v) => v ?? '');
const scoreSchema = z.number().finite();
const severitySchema = z.enum(['warning', 'danger']);
const difficultySchema = z
  .number()
  .int()
  .transform((v): SuggestedDifficulty => (v <= 1 ? 1 : v >= 3 ? 3 : 2));

const studentRiskSchema = z
  .object({
    student_id: idSchema,
    student_name: nameSchema,
    score: scoreSchema,
    recent_score: scoreSchema.nullish().transform((v) => v ?? null),
    severity: severitySchema,
  })
  .transform((v) => ({
    type: 'student_risk' as const,
    studentId: v.student_id,
    studentName: v.student_name,
    score: v.score,
    recentScore: v.recent_score,
    severity: v.severity,
  }));

const generateRecommendationsSchema = z
  .object({
    student_id: idSchema,
    student_name: nameSchema,
    score: scoreSchema,
  })
  .transform((v) => ({
    type: 'generate_recommendations' as const,
    studentId: v.student_id,
    studentName: v.student_name,
    score: v.score,
  }));

const createAlertSchema = z
  .object({
    student_id: idSchema,
    student_name: nameSchema,
    score: scoreSchema,
    severity: severitySchema,
  })
  .transform((v) => ({
    type: 'create_alert' as const,
    studentId: v.student_id,
    studentName: v.student_name,
    score: v.score,
    severity: v.severity,
  }));

const recommendationsReadySchema = z
  .object({
    student_id: optionalIdSchema,
    recommendations_count: z.number().int().min(0),
    ai_used: z.boolean(),
  })
  .transform((v) => ({
    type: 'recommendations_ready' as const,
    studentId: v.student_id,
    recommendationsCount: v.recommendations_count,
    aiUsed: v.ai_used,
  }));

const adaptationAnalysisSchema = z
  .object({
    student_id: optionalIdSchema,
    suggested_difficulty: difficultySchema,
    summary: z.string().nullish().transform((v) => v ?? null),
    weak_areas: z.array(z.string()).nullish().transform((v) => v ?? []),
  })
  .transform((v) => ({
    type: 'adaptation_analysis' as const,
    studentId: v.student_id,
    suggestedDifficulty: v.suggested_difficulty,
    summary: v.summary,
    weakAreas: v.weak_areas,
  }));

const analyzeErrorsSchema = z
  .object({
    student_id: idSchema,
    student_name: nameSchema,
  })
  .transform((v) => ({
    type: 'analyze_errors' as const,
    studentId: v.student_id,
    studentName: v.student_name,
  }));

const MESSAGE_SCHEMAS: { [K in AgentMessageType]: z.ZodType<MessageOf<K>, z.ZodTypeDef, unknown> } = {
  student_risk: studentRiskSchema,
  generate_recommendations: generateRecommendationsSchema,
  create_alert: createAlertSchema,
  recommendations_ready: recommendationsReadySchema,
  adaptation_analysis: adaptationAnalysisSchema,
  analyze_errors: analyzeErrorsSchema,
};

export const AGENT_MESSAGE_TYPES: readonly AgentMessageType[] = [
  'student_risk',
  'generate_recommendations',
  'create_alert',
  'recommendations_ready',
  'adaptation_analysis',
  'analyze_errors',
];

export function isAgentMessageType(value: string): value is AgentMessageType {
  return AGENT_MESSAGE_TYPES.some((t) => t === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

export type BodyParseResult =
  | { ok: true; payload: Record<string, unknown> }
  | { ok: false; reason: string };

/** JSON-decodes a mailbox body; only a JSON object counts as a message. */
export function parseMessageBody(body: string): BodyParseResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : 'invalid JSON' };
  }
  if (!isRecord(parsed)) {
    return { ok: false, reason: 'body is not a JSON object' };
  }
  return { ok: true, payload: parsed };
}

export function readMessageType(payload: Record<string, unknown>): string | null {
  return typeof payload.type === 'string' && payload.type.length > 0 ? payload.type : null;
}

export type DecodeResult =
  | { ok: true; message: AgentMessage }
  | { ok: false; kind: 'unknown_type'; type: string | null }
  | { ok: false; kind: 'invalid'; type: AgentMessageType; issues: string[] };

export function decodeMessage(payload: Record<string, unknown>): DecodeResult {
  const type = readMessageType(payload);
  if (type === null || !isAgentMessageType(type)) {
    return { ok: false, kind: 'unknown_type', type };
  }
  const result = MESSAGE_SCHEMAS[type].safeParse(payload);
  if (!result.success) {
    return {
      ok: false,
      kind: 'invalid',
      type,
      issues: result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    };
  }
  return { ok: true, message: result.data };
}

export function toWirePayload(message: AgentMessage): Record<string, unknown> {
  switch (message.type) {
    case 'student_risk':
      return {
        type: message.type,
        student_id: message.studentId,
        student_name: message.studentName,
        score: message.score,
        recent_score: message.recentScore,
        severity: message.severity,
      };
    case 'generate_recommendations':
      return {
        type: message.type,
        student_id: message.studentId,
        student_name: message.studentName,
        score: message.score,
      };
    case 'create_alert':
      return {
        type: message.type,
        student_id: message.studentId,
        student_name: message.studentName,
        score: message.score,
        severity: message.severity,
      };
    case 'recommendations_ready':
      return {
        type: message.type,
        student_id: message.studentId,
        recommendations_count: message.recommendationsCount,
        ai_used: message.aiUsed,
      };
    case 'adaptation_analysis':
      return {
        type: message.type,
        student_id: message.studentId,
        suggested_difficulty: message.suggestedDifficulty,
        summary: message.summary,
        weak_areas: message.weakAreas,
      };
    case 'analyze_errors':
      return {
        type: message.type,
        student_id: message.studentId,
        student_name: message.studentName,
      };
  }
}

export function encodeMessage(message: AgentMessage): string {
  return JSON.stringify(toWirePayload(message));
}
