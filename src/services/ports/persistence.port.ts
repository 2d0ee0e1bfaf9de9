import type {
  AlertAgentType,
  AlertRecord,
  AnswerRecord,
  DecisionLogEntry,
  NewAlertRecord,
  NewDecisionLogEntry,
  NewRecommendationRecord,
  RecommendationRecord,
  StudentRef,
  TopicRef,
} from '../../types/agents.types';

export interface AlertFilter {
  studentId?: string;
  agentType?: AlertAgentType;
  unreadOnly?: boolean;
  limit?: number;
}

export interface RecommendationFilter {
  studentId?: string;
  limit?: number;
}

/**
 * The only shared mutable resource between workers. Writes are appends,
 * except `markAlertsRead`, which is idempotent. A single append is atomic;
 * a read followed by a write is not.
 */
export interface PersistenceGatewayPort {
  readonly kind: 'memory' | 'postgres';
  open(): Promise<void>;
  close(): Promise<void>;

  listStudents(): Promise<StudentRef[]>;
  listAnswers(studentId: string): Promise<AnswerRecord[]>;
  getTopic(topicId: string): Promise<TopicRef | null>;

  findLatestAlert(agentType: AlertAgentType, studentId: string): Promise<AlertRecord | null>;
  appendAlert(alert: NewAlertRecord): Promise<AlertRecord>;
  markAlertsRead(alertIds: string[]): Promise<number>;
  listAlerts(filter?: AlertFilter): Promise<AlertRecord[]>;

  /** `topicId === null` looks up "general program" recommendations. */
  findLatestRecommendation(studentId: string, topicId: string | null): Promise<RecommendationRecord | null>;
  appendRecommendation(recommendation: NewRecommendationRecord): Promise<RecommendationRecord>;
  listRecommendations(filter?: RecommendationFilter): Promise<RecommendationRecord[]>;

  appendDecisionLog(entry: NewDecisionLogEntry): Promise<DecisionLogEntry>;
  /** Newest first. Read-only audit view; never consulted for routing. */
  listDecisionLog(limit?: number): Promise<DecisionLogEntry[]>;
}
