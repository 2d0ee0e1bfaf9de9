import { MONITORING_DEDUP_WINDOW_MS } from '../config/agents.config';
import { agentMetrics } from '../metrics/agents.metrics';
import { buildSnapshot, severityForScore, withinWindow } from '../services/performance.service';
import { monitoringLockKey, type DedupLockPort } from '../services/ports/dedup-lock.port';
import type { Mailbox } from '../services/ports/mailbox.port';
import type { PersistenceGatewayPort } from '../services/ports/persistence.port';
import type { StudentPerformanceSnapshot, StudentRef } from '../types/agents.types';
import type { Logger } from '../utils/logger';
import { logger } from '../utils/logger';
import { PeriodicTask } from './periodic-task';

export interface MonitoringWorkerDeps {
  gateway: PersistenceGatewayPort;
  mailbox: Mailbox;
  routerAddress: string;
  riskScoreThreshold: number;
  periodMs: number;
  lock?: { port: DedupLockPort; ttlMs: number };
  now?: () => Date;
  log?: Logger;
}

export interface MonitoringScanSummary {
  scanned: number;
  skipped: number;
  flagged: number;
  failed: number;
}

type StudentOutcome = 'flagged' | 'skipped' | 'healthy';

export function performanceAlertText(snapshot: StudentPerformanceSnapshot): string {
  let text = `Student "${snapshot.studentName}" has an overall score of ${snapshot.score}% (${snapshot.correct}/${snapshot.total}).`;
  if (snapshot.recentScore !== null) text += ` Last 24h: ${snapshot.recentScore}%.`;
  return text;
}

/**
 * Periodic scan over every student. An at-risk student gets a performance
 * alert record and a `student_risk` event to the router, at most once per
 * dedup window.
 */
export class MonitoringWorker {
  readonly name = 'monitoring';
  private readonly task: PeriodicTask;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(private readonly deps: MonitoringWorkerDeps) {
    this.now = deps.now ?? (() => new Date());
    this.log = deps.log ?? logger.child({ component: 'monitoring' });
    this.task = new PeriodicTask({
      name: 'monitoring_scan',
      periodMs: deps.periodMs,
      run: () => this.scan(),
      log: this.log,
    });
  }

  get isRunning(): boolean {
    return this.task.running;
  }

  start(): void {
    this.task.start();
    this.log.info('worker-started', { periodMs: this.deps.periodMs });
  }

  async stop(): Promise<void> {
    await this.task.stop();
    this.log.info('worker-stopped');
  }

  async scan(): Promise<MonitoringScanSummary> {
    const summary: MonitoringScanSummary = { scanned: 0, skipped: 0, flagged: 0, failed: 0 };
    const students = await this.deps.gateway.listStudents();
    for (const student of students) {
      try {
        const outcome = await this.scanStudent(student);
        summary.scanned += 1;
        if (outcome === 'flagged') summary.flagged += 1;
        if (outcome === 'skipped') summary.skipped += 1;
      } catch (err) {
        summary.failed += 1;
        agentMetrics.recordWorkerFailure(this.name, 'student');
        this.log.error('student-scan-failed', { studentId: student.id, error: err });
      }
    }
    this.log.info('monitoring-scan-complete', { ...summary });
    return summary;
  }

  private async scanStudent(student: StudentRef): Promise<StudentOutcome> {
    const answers = await this.deps.gateway.listAnswers(student.id);
    const snapshot = buildSnapshot(student, answers, this.now());
    if (!snapshot) return 'skipped';
    if (snapshot.score >= this.deps.riskScoreThreshold) return 'healthy';

    const lock = this.deps.lock;
    const key = monitoringLockKey(student.id);
    const token = lock ? await lock.port.acquire(key, lock.ttlMs) : null;
    if (lock && token === null) {
      this.log.debug('student-locked', { studentId: student.id });
      return 'skipped';
    }
    try {
      return await this.report(snapshot);
    } finally {
      if (lock && token !== null && !(await lock.port.release(key, token))) {
        this.log.warn('dedup-lock-lost', { key });
      }
    }
  }

  private async report(snapshot: StudentPerformanceSnapshot): Promise<StudentOutcome> {
    const now = this.now();
    const last = await this.deps.gateway.findLatestAlert('monitoring', snapshot.studentId);
    if (last && withinWindow(last.createdAt, now, MONITORING_DEDUP_WINDOW_MS)) {
      this.log.debug('student-recently-reported', { studentId: snapshot.studentId });
      return 'skipped';
    }

    const severity = severityForScore(snapshot.score);
    try {
      await this.deps.gateway.appendAlert({
        agentType: 'monitoring',
        studentId: snapshot.studentId,
        text: performanceAlertText(snapshot),
        severity,
        createdAt: now,
      });
      agentMetrics.recordAlert('monitoring', severity);
    } catch (err) {
      // the risk event still goes out; the next scan may report the student again
      agentMetrics.recordWorkerFailure(this.name, 'alert_write');
      this.log.error('performance-alert-write-failed', { studentId: snapshot.studentId, error: err });
    }

    try {
      await this.deps.mailbox.send(this.deps.routerAddress, {
        type: 'student_risk',
        studentId: snapshot.studentId,
        studentName: snapshot.studentName,
        score: snapshot.score,
        recentScore: snapshot.recentScore,
        severity,
      });
      agentMetrics.recordSent(this.deps.mailbox.address, 'student_risk');
    } catch (err) {
      agentMetrics.recordSendFailure(this.deps.mailbox.address, this.deps.routerAddress);
      this.log.error('risk-event-send-failed', { studentId: snapshot.studentId, error: err });
    }
    this.log.info('student-at-risk', { studentId: snapshot.studentId, score: snapshot.score, severity });
    return 'flagged';
  }
}
