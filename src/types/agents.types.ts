export type AgentName = 'router' | 'monitoring' | 'adaptation' | 'notification';

export type Severity = 'warning' | 'danger';

export type AlertAgentType = 'monitoring' | 'notification';

export type RecommendationSource = 'rule' | 'external';

export interface StudentRef {
  id: string;
  name: string;
}

export interface TopicRef {
  id: string;
  title: string;
}

export interface AnswerRecord {
  studentId: string;
  topicId: string;
  isCorrect: boolean;
  createdAt: Date;
}

export interface TopicStats {
  total: number;
  correct: number;
  percentage: number;
}

/**
 * Derived view of one student's answers, recomputed on every scan and never
 * persisted. `recentScore` covers the trailing 24 hours and is null when the
 * student answered nothing in that window.
 */
export interface StudentPerformanceSnapshot {
  studentId: string;
  studentName: string;
  total: number;
  correct: number;
  score: number;
  recentScore: number | null;
  topics: Map<string, TopicStats>;
}

export interface AlertRecord {
  id: string;
  agentType: AlertAgentType;
  studentId: string;
  text: string;
  severity: Severity;
  isRead: boolean;
  createdAt: Date;
}

export type NewAlertRecord = Omit<AlertRecord, 'id' | 'isRead'>;

export interface RecommendationRecord {
  id: string;
  studentId: string;
  /** null means the recommendation covers the whole program */
  topicId: string | null;
  text: string;
  generatedBy: RecommendationSource;
  createdAt: Date;
}

export type NewRecommendationRecord = Omit<RecommendationRecord, 'id'>;

export interface DecisionLogEntry {
  id: string;
  eventType: string;
  sourceAgent: string;
  targetAgent: string | null;
  studentId: string | null;
  payload: Record<string, unknown> | null;
  decision: string | null;
  createdAt: Date;
}

export type NewDecisionLogEntry = Omit<DecisionLogEntry, 'id'>;

export interface TopicResult {
  topicTitle: string;
  total: number;
  correct: number;
  pct: number;
}

export type SuggestedDifficulty = 1 | 2 | 3;

export interface ErrorPatternAnalysis {
  summary: string;
  weakAreas: string[];
  suggestedDifficulty: SuggestedDifficulty;
}
