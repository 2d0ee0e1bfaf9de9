import type { Severity, SuggestedDifficulty } from './agents.types';

export interface StudentRiskMessage {
  type: 'student_risk';
  studentId: string;
  studentName: string;
  score: number;
  recentScore: number | null;
  severity: Severity;
}

export interface GenerateRecommendationsMessage {
  type: 'generate_recommendations';
  studentId: string;
  studentName: string;
  score: number;
}

export interface CreateAlertMessage {
  type: 'create_alert';
  studentId: string;
  studentName: string;
  score: number;
  severity: Severity;
}

export interface RecommendationsReadyMessage {
  type: 'recommendations_ready';
  studentId: string | null;
  recommendationsCount: number;
  aiUsed: boolean;
}

export interface AdaptationAnalysisMessage {
  type: 'adaptation_analysis';
  studentId: string | null;
  suggestedDifficulty: SuggestedDifficulty;
  summary: string | null;
  weakAreas: string[];
}

export interface AnalyzeErrorsMessage {
  type: 'analyze_errors';
  studentId: string;
  studentName: string;
}

export type AgentMessage =
  | StudentRiskMessage
  | GenerateRecommendationsMessage
  | CreateAlertMessage
  | RecommendationsReadyMessage
  | AdaptationAnalysisMessage
  | AnalyzeErrorsMessage;

export type AgentMessageType = AgentMessage['type'];

export type MessageOf<T extends AgentMessageType> = Extract<AgentMessage, { type: T }>;

/** Events the router accepts; everything else in the union is a command. */
export type RouterEvent = StudentRiskMessage | RecommendationsReadyMessage | AdaptationAnalysisMessage;

export type AdaptationCommand = GenerateRecommendationsMessage | AnalyzeErrorsMessage;

export type NotificationCommand = CreateAlertMessage;

export interface Envelope {
  id: string;
  from: string;
  to: string;
  sentAt: Date;
  /** JSON text; kept raw so receivers can reject malformed traffic themselves */
  body: string;
}
