import type { DbPort, DbRow } from '../../services/ports/db.port';
import type { AlertFilter, PersistenceGatewayPort, RecommendationFilter } from '../../services/ports/persistence.port';
import type {
  AlertAgentType,
  AlertRecord,
  AnswerRecord,
  DecisionLogEntry,
  RecommendationRecord,
  Severity,
  StudentRef,
  TopicRef,
} from '../../types/agents.types';
import { PersistenceError } from '../../utils/errors';

const USERS_TABLE = 'learning.users';
const TOPICS_TABLE = 'learning.topics';
const ANSWERS_TABLE = 'learning.student_answers';
const REPORTS_TABLE = 'learning.agent_reports';
const ADAPTATIONS_TABLE = 'learning.adaptation_logs';
const ORCHESTRATOR_TABLE = 'learning.orchestrator_logs';

function asString(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint') return String(value);
  return '';
}

function asNullableString(value: unknown): string | null {
  return value == null ? null : asString(value);
}

function asDate(value: unknown): Date {
  if (value instanceof Date) return value;
  if (typeof value === 'string' || typeof value === 'number') return new Date(value);
  return new Date(0);
}

function asBoolean(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') return ['t', 'true', '1', 'yes'].includes(value.toLowerCase());
  return false;
}

function asSeverity(value: unknown): Severity {
  return value === 'danger' ? 'danger' : 'warning';
}

function asAgentType(value: unknown): AlertAgentType {
  return value === 'notification' ? 'notification' : 'monitoring';
}

function asPayload(value: unknown): Record<string, unknown> | null {
  let parsed: unknown = value;
  if (typeof value === 'string') {
    try {
      parsed = JSON.parse(value);
    } catch {
      return { raw: value };
    }
  }
  if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) return { ...parsed };
  return null;
}

function mapAlert(row: DbRow): AlertRecord {
  return {
    id: asString(row.id),
    agentType: asAgentType(row.agent_type),
    studentId: asString(row.student_id),
    text: asString(row.message),
    severity: asSeverity(row.severity),
    isRead: asBoolean(row.is_read),
    createdAt: asDate(row.created_at),
  };
}

function mapRecommendation(row: DbRow): RecommendationRecord {
  return {
    id: asString(row.id),
    studentId: asString(row.student_id),
    topicId: asNullableString(row.topic_id),
    text: asString(row.recommendation),
    generatedBy: asBoolean(row.ai_generated) ? 'external' : 'rule',
    createdAt: asDate(row.created_at),
  };
}

function mapDecision(row: DbRow): DecisionLogEntry {
  return {
    id: asString(row.id),
    eventType: asString(row.event_type),
    sourceAgent: asString(row.source_agent),
    targetAgent: asNullableString(row.target_agent),
    studentId: asNullableString(row.student_id),
    payload: row.payload == null ? null : asPayload(row.payload),
    decision: asNullableString(row.decision),
    createdAt: asDate(row.created_at),
  };
}

async function guard<T>(operation: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err) {
    throw new PersistenceError(operation, err);
  }
}

/**
 * Persistence gateway over the learning store's tables. The store owns the
 * schema; numeric ids come back as strings.
 */
export function createDbPersistenceGateway(db: DbPort): PersistenceGatewayPort {
  return {
    kind: 'postgres',

    open: () => guard('open', () => db.connect()),

    close: () => guard('close', () => db.disconnect()),

    listStudents: () =>
      guard('listStudents', async () => {
        const rows = await db.query(
          `SELECT id, COALESCE(NULLIF(full_name, ''), username) AS name FROM ${USERS_TABLE} WHERE role = ? ORDER BY id`,
          ['student'],
          { operation: 'listStudents' }
        );
        return rows.map((row): StudentRef => ({ id: asString(row.id), name: asString(row.name) }));
      }),

    listAnswers: (studentId) =>
      guard('listAnswers', async () => {
        const rows = await db.query(
          `SELECT student_id, topic_id, is_correct, created_at FROM ${ANSWERS_TABLE} WHERE student_id = ? ORDER BY created_at`,
          [studentId],
          { operation: 'listAnswers' }
        );
        return rows.map(
          (row): AnswerRecord => ({
            studentId: asString(row.student_id),
            topicId: asString(row.topic_id),
            isCorrect: asBoolean(row.is_correct),
            createdAt: asDate(row.created_at),
          })
        );
      }),

    getTopic: (topicId) =>
      guard('getTopic', async () => {
        const row = await db.queryOne(`SELECT id, title FROM ${TOPICS_TABLE} WHERE id = ?`, [topicId], {
          operation: 'getTopic',
        });
        return row ? { id: asString(row.id), title: asString(row.title) } satisfies TopicRef : null;
      }),

    findLatestAlert: (agentType, studentId) =>
      guard('findLatestAlert', async () => {
        const row = await db.queryOne(
          `SELECT * FROM ${REPORTS_TABLE} WHERE agent_type = ? AND student_id = ? ORDER BY created_at DESC LIMIT 1`,
          [agentType, studentId],
          { operation: 'findLatestAlert' }
        );
        return row ? mapAlert(row) : null;
      }),

    appendAlert: (alert) =>
      guard('appendAlert', async () => {
        const row = await db.insert(
          REPORTS_TABLE,
          {
            agent_type: alert.agentType,
            student_id: alert.studentId,
            message: alert.text,
            severity: alert.severity,
            is_read: false,
            created_at: alert.createdAt,
          },
          { operation: 'appendAlert' }
        );
        return mapAlert(row);
      }),

    markAlertsRead: (alertIds) =>
      guard('markAlertsRead', async () => {
        if (alertIds.length === 0) return 0;
        const rows = await db.query(
          `UPDATE ${REPORTS_TABLE} SET is_read = TRUE WHERE id = ANY(?) AND is_read = FALSE RETURNING id`,
          [alertIds],
          { operation: 'markAlertsRead' }
        );
        return rows.length;
      }),

    listAlerts: (filter: AlertFilter = {}) =>
      guard('listAlerts', async () => {
        const where: string[] = [];
        const params: unknown[] = [];
        if (filter.studentId !== undefined) {
          where.push('student_id = ?');
          params.push(filter.studentId);
        }
        if (filter.agentType !== undefined) {
          where.push('agent_type = ?');
          params.push(filter.agentType);
        }
        if (filter.unreadOnly) where.push('is_read = FALSE');
        const sql = `
          SELECT * FROM ${REPORTS_TABLE}
          ${where.length > 0 ? `WHERE ${where.join(' AND ')}` : ''}
          ORDER BY created_at DESC, id DESC
          LIMIT ?
        `;
        const rows = await db.query(sql, [...params, filter.limit ?? 100], { operation: 'listAlerts' });
        return rows.map(mapAlert);
      }),

    findLatestRecommendation: (studentId, topicId) =>
      guard('findLatestRecommendation', async () => {
        const topicClause = topicId === null ? 'topic_id IS NULL' : 'topic_id = ?';
        const params = topicId === null ? [studentId] : [studentId, topicId];
        const row = await db.queryOne(
          `SELECT * FROM ${ADAPTATIONS_TABLE} WHERE student_id = ? AND ${topicClause} ORDER BY created_at DESC LIMIT 1`,
          params,
          { operation: 'findLatestRecommendation' }
        );
        return row ? mapRecommendation(row) : null;
      }),

    appendRecommendation: (recommendation) =>
      guard('appendRecommendation', async () => {
        const row = await db.insert(
          ADAPTATIONS_TABLE,
          {
            student_id: recommendation.studentId,
            topic_id: recommendation.topicId,
            recommendation: recommendation.text,
            ai_generated: recommendation.generatedBy === 'external',
            created_at: recommendation.createdAt,
          },
          { operation: 'appendRecommendation' }
        );
        return mapRecommendation(row);
      }),

    listRecommendations: (filter: RecommendationFilter = {}) =>
      guard('listRecommendations', async () => {
        const byStudent = filter.studentId !== undefined;
        const rows = await db.query(
          `SELECT * FROM ${ADAPTATIONS_TABLE} ${byStudent ? 'WHERE student_id = ?' : ''} ORDER BY created_at DESC, id DESC LIMIT ?`,
          byStudent ? [filter.studentId, filter.limit ?? 50] : [filter.limit ?? 50],
          { operation: 'listRecommendations' }
        );
        return rows.map(mapRecommendation);
      }),

    appendDecisionLog: (entry) =>
      guard('appendDecisionLog', async () => {
        const row = await db.insert(
          ORCHESTRATOR_TABLE,
          {
            event_type: entry.eventType,
            source_agent: entry.sourceAgent,
            target_agent: entry.targetAgent,
            student_id: entry.studentId,
            payload: entry.payload,
            decision: entry.decision,
            created_at: entry.createdAt,
          },
          { operation: 'appendDecisionLog' }
        );
        return mapDecision(row);
      }),

    listDecisionLog: (limit = 50) =>
      guard('listDecisionLog', async () => {
        const rows = await db.query(
          `SELECT * FROM ${ORCHESTRATOR_TABLE} ORDER BY created_at DESC, id DESC LIMIT ?`,
          [limit],
          { operation: 'listDecisionLog' }
        );
        return rows.map(mapDecision);
      }),
  };
}
