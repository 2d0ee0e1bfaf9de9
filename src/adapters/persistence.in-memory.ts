import { v4 as uuidv4 } from 'uuid';
import type { AlertFilter, PersistenceGatewayPort, RecommendationFilter } from '../services/ports/persistence.port';
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
} from '../types/agents.types';

export interface LearningSeed {
  students?: StudentRef[];
  topics?: TopicRef[];
  answers?: AnswerRecord[];
}

function latest<T extends { createdAt: Date }>(rows: T[]): T | null {
  let best: T | null = null;
  for (const row of rows) {
    if (!best || row.createdAt.getTime() >= best.createdAt.getTime()) best = row;
  }
  return best;
}

function newestFirst<T extends { createdAt: Date }>(rows: T[]): T[] {
  // stable: equal timestamps keep reverse insertion order
  return rows
    .map((row, index) => ({ row, index }))
    .sort((a, b) => b.row.createdAt.getTime() - a.row.createdAt.getTime() || b.index - a.index)
    .map(({ row }) => row);
}

/**
 * Process-local gateway for tests and single-process runs. Records are
 * copied on the way in and out so callers cannot mutate stored history.
 */
export class InMemoryPersistenceGateway implements PersistenceGatewayPort {
  readonly kind = 'memory' as const;
  private students: StudentRef[] = [];
  private readonly topics = new Map<string, TopicRef>();
  private answers: AnswerRecord[] = [];
  private readonly alerts: AlertRecord[] = [];
  private readonly recommendations: RecommendationRecord[] = [];
  private readonly decisionLog: DecisionLogEntry[] = [];
  private opened = false;

  constructor(seed: LearningSeed = {}) {
    this.seed(seed);
  }

  seed({ students = [], topics = [], answers = [] }: LearningSeed): void {
    this.students.push(...students.map((s) => ({ ...s })));
    for (const topic of topics) this.topics.set(topic.id, { ...topic });
    this.answers.push(...answers.map((a) => ({ ...a })));
  }

  addAnswer(answer: AnswerRecord): void {
    this.answers.push({ ...answer });
  }

  get isOpen(): boolean {
    return this.opened;
  }

  async open(): Promise<void> {
    this.opened = true;
  }

  async close(): Promise<void> {
    this.opened = false;
  }

  async listStudents(): Promise<StudentRef[]> {
    return this.students.map((s) => ({ ...s }));
  }

  async listAnswers(studentId: string): Promise<AnswerRecord[]> {
    return this.answers.filter((a) => a.studentId === studentId).map((a) => ({ ...a }));
  }

  async getTopic(topicId: string): Promise<TopicRef | null> {
    const topic = this.topics.get(topicId);
    return topic ? { ...topic } : null;
  }

  async findLatestAlert(agentType: AlertAgentType, studentId: string): Promise<AlertRecord | null> {
    const row = latest(this.alerts.filter((a) => a.agentType === agentType && a.studentId === studentId));
    return row ? { ...row } : null;
  }

  async appendAlert(alert: NewAlertRecord): Promise<AlertRecord> {
    const row: AlertRecord = { ...alert, id: uuidv4(), isRead: false };
    this.alerts.push(row);
    return { ...row };
  }

  async markAlertsRead(alertIds: string[]): Promise<number> {
    const ids = new Set(alertIds);
    let updated = 0;
    for (const alert of this.alerts) {
      if (ids.has(alert.id) && !alert.isRead) {
        alert.isRead = true;
        updated += 1;
      }
    }
    return updated;
  }

  async listAlerts(filter: AlertFilter = {}): Promise<AlertRecord[]> {
    const rows = this.alerts.filter(
      (a) =>
        (filter.studentId === undefined || a.studentId === filter.studentId) &&
        (filter.agentType === undefined || a.agentType === filter.agentType) &&
        (!filter.unreadOnly || !a.isRead)
    );
    return newestFirst(rows)
      .slice(0, filter.limit ?? rows.length)
      .map((a) => ({ ...a }));
  }

  async findLatestRecommendation(studentId: string, topicId: string | null): Promise<RecommendationRecord | null> {
    const row = latest(this.recommendations.filter((r) => r.studentId === studentId && r.topicId === topicId));
    return row ? { ...row } : null;
  }

  async appendRecommendation(recommendation: NewRecommendationRecord): Promise<RecommendationRecord> {
    const row: RecommendationRecord = { ...recommendation, id: uuidv4() };
    this.recommendations.push(row);
    return { ...row };
  }

  async listRecommendations(filter: RecommendationFilter = {}): Promise<RecommendationRecord[]> {
    const rows = this.recommendations.filter((r) => filter.studentId === undefined || r.studentId === filter.studentId);
    return newestFirst(rows)
      .slice(0, filter.limit ?? rows.length)
      .map((r) => ({ ...r }));
  }

  async appendDecisionLog(entry: NewDecisionLogEntry): Promise<DecisionLogEntry> {
    const row: DecisionLogEntry = { ...entry, payload: entry.payload ? { ...entry.payload } : null, id: uuidv4() };
    this.decisionLog.push(row);
    return { ...row };
  }

  async listDecisionLog(limit = 50): Promise<DecisionLogEntry[]> {
    return newestFirst(this.decisionLog)
      .slice(0, limit)
      .map((e) => ({ ...e }));
  }
}
