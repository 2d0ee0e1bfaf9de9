import { ADAPTATION_DEDUP_WINDOW_MS } from '../config/agents.config';
import { agentMetrics } from '../metrics/agents.metrics';
import { percentage, topicStats, withinWindow } from '../services/performance.service';
import { adaptationLockKey, type DedupLockPort } from '../services/ports/dedup-lock.port';
import type { Mailbox } from '../services/ports/mailbox.port';
import type { PersistenceGatewayPort } from '../services/ports/persistence.port';
import { GENERAL_PROGRAM_TITLE } from '../services/recommendation-fallback.service';
import type { RecommendationService } from '../services/recommendation.service';
import type { AnswerRecord, RecommendationSource, TopicResult, TopicStats } from '../types/agents.types';
import type { AnalyzeErrorsMessage, Envelope, GenerateRecommendationsMessage } from '../types/messages.types';
import type { Logger } from '../utils/logger';
import { logger } from '../utils/logger';
import { MailboxWorker } from './mailbox-worker';
import { PeriodicTask } from './periodic-task';

export interface AdaptationWorkerDeps {
  gateway: PersistenceGatewayPort;
  mailbox: Mailbox;
  routerAddress: string;
  recommendations: RecommendationService;
  riskScoreThreshold: number;
  periodMs: number;
  receiveTimeoutMs: number;
  lock?: { port: DedupLockPort; ttlMs: number };
  now?: () => Date;
  log?: Logger;
}

export interface RecommendationBatch {
  count: number;
  externalUsed: boolean;
}

export interface SweepSummary {
  students: number;
  created: number;
  failed: number;
}

type Trigger = 'command' | 'sweep';

interface RecommendationTarget {
  studentId: string;
  studentName: string;
  topicId: string | null;
  topicTitle: string;
  scorePct: number;
  total: number;
  correct: number;
}

/** Unrounded, so 49.96% still counts as below a 50% threshold. */
function rawPercentage(stats: Pick<TopicStats, 'total' | 'correct'>): number {
  return stats.total > 0 ? (stats.correct / stats.total) * 100 : 0;
}

/**
 * Writes recommendation records, reactively for router commands and from a
 * periodic sweep that covers weak topics even when a risk event was lost.
 * Both paths share the per-(student, topic) dedup window.
 */
export class AdaptationWorker extends MailboxWorker {
  private readonly deps: AdaptationWorkerDeps;
  private readonly sweepTask: PeriodicTask;
  private readonly now: () => Date;

  constructor(deps: AdaptationWorkerDeps) {
    super('adaptation', deps.mailbox, deps.receiveTimeoutMs, deps.log ?? logger.child({ component: 'adaptation' }));
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
    this.sweepTask = new PeriodicTask({
      name: 'adaptation_sweep',
      periodMs: deps.periodMs,
      run: () => this.sweep(),
      log: this.log,
    });
  }

  override start(): void {
    super.start();
    this.sweepTask.start();
  }

  override async stop(): Promise<void> {
    await this.sweepTask.stop();
    await super.stop();
  }

  protected async handle(envelope: Envelope): Promise<void> {
    const command = this.decodeCommand(envelope, ['generate_recommendations', 'analyze_errors'] as const);
    if (!command) return;
    if (command.type === 'generate_recommendations') {
      await this.onGenerateRecommendations(command);
    } else {
      await this.onAnalyzeErrors(command);
    }
  }

  async onGenerateRecommendations(command: GenerateRecommendationsMessage): Promise<RecommendationBatch> {
    this.log.info('generating-recommendations', { studentId: command.studentId, score: command.score });
    const batch = await this.recommendForCommand(command);
    await this.trySend(this.deps.routerAddress, {
      type: 'recommendations_ready',
      studentId: command.studentId,
      recommendationsCount: batch.count,
      aiUsed: batch.externalUsed,
    });
    return batch;
  }

  async onAnalyzeErrors(command: AnalyzeErrorsMessage): Promise<void> {
    this.log.info('analyzing-error-patterns', { studentId: command.studentId });
    const answers = await this.deps.gateway.listAnswers(command.studentId);
    const results = await this.topicResults(answers);
    const { value: analysis, source } = await this.deps.recommendations.analyzeErrors(command.studentName, results);
    this.log.debug('error-analysis-ready', { studentId: command.studentId, source });
    await this.trySend(this.deps.routerAddress, {
      type: 'adaptation_analysis',
      studentId: command.studentId,
      suggestedDifficulty: analysis.suggestedDifficulty,
      summary: analysis.summary,
      weakAreas: analysis.weakAreas,
    });
  }

  async sweep(): Promise<SweepSummary> {
    const summary: SweepSummary = { students: 0, created: 0, failed: 0 };
    const students = await this.deps.gateway.listStudents();
    for (const student of students) {
      try {
        const answers = await this.deps.gateway.listAnswers(student.id);
        if (answers.length === 0) continue;
        summary.students += 1;
        for (const target of await this.weakTopics(student.id, student.name, answers)) {
          if ((await this.recommendOnce(target, 'sweep')) !== null) summary.created += 1;
        }
      } catch (err) {
        summary.failed += 1;
        agentMetrics.recordWorkerFailure(this.name, 'sweep_student');
        this.log.error('sweep-student-failed', { studentId: student.id, error: err });
      }
    }
    this.log.info('adaptation-sweep-complete', { ...summary });
    return summary;
  }

  private async recommendForCommand(command: GenerateRecommendationsMessage): Promise<RecommendationBatch> {
    const answers = await this.deps.gateway.listAnswers(command.studentId);
    const weak = await this.weakTopics(command.studentId, command.studentName, answers);
    const targets: RecommendationTarget[] =
      weak.length > 0 || command.score >= this.deps.riskScoreThreshold
        ? weak
        : [
            {
              studentId: command.studentId,
              studentName: command.studentName,
              topicId: null,
              topicTitle: GENERAL_PROGRAM_TITLE,
              scorePct: command.score,
              total: answers.length,
              correct: answers.filter((a) => a.isCorrect).length,
            },
          ];

    const batch: RecommendationBatch = { count: 0, externalUsed: false };
    for (const target of targets) {
      let source: RecommendationSource | null;
      try {
        source = await this.recommendOnce(target, 'command');
      } catch (err) {
        agentMetrics.recordWorkerFailure(this.name, 'recommendation');
        this.log.error('recommendation-failed', { studentId: target.studentId, topicId: target.topicId, error: err });
        continue;
      }
      if (source === null) continue;
      batch.count += 1;
      if (source === 'external') batch.externalUsed = true;
    }
    return batch;
  }

  /** Topics below the risk threshold whose title can be resolved. */
  private async weakTopics(
    studentId: string,
    studentName: string,
    answers: AnswerRecord[]
  ): Promise<RecommendationTarget[]> {
    const targets: RecommendationTarget[] = [];
    for (const [topicId, stats] of topicStats(answers)) {
      if (rawPercentage(stats) >= this.deps.riskScoreThreshold) continue;
      const topic = await this.deps.gateway.getTopic(topicId);
      if (!topic) {
        this.log.warn('topic-not-found', { studentId, topicId });
        continue;
      }
      targets.push({
        studentId,
        studentName,
        topicId,
        topicTitle: topic.title,
        scorePct: stats.percentage,
        total: stats.total,
        correct: stats.correct,
      });
    }
    return targets;
  }

  private async topicResults(answers: AnswerRecord[]): Promise<TopicResult[]> {
    const results: TopicResult[] = [];
    for (const [topicId, stats] of topicStats(answers)) {
      const topic = await this.deps.gateway.getTopic(topicId);
      results.push({
        topicTitle: topic ? topic.title : `Topic ${topicId}`,
        total: stats.total,
        correct: stats.correct,
        pct: percentage(stats.correct, stats.total),
      });
    }
    return results;
  }

  /**
   * Persists one recommendation unless the pair was covered within the dedup
   * window (or its lock is held). Returns the text's source, or null when
   * nothing was written.
   */
  private async recommendOnce(target: RecommendationTarget, trigger: Trigger): Promise<RecommendationSource | null> {
    const lock = this.deps.lock;
    const key = adaptationLockKey(target.studentId, target.topicId);
    const token = lock ? await lock.port.acquire(key, lock.ttlMs) : null;
    if (lock && token === null) {
      this.log.debug('recommendation-locked', { studentId: target.studentId, topicId: target.topicId });
      return null;
    }
    try {
      const existing = await this.deps.gateway.findLatestRecommendation(target.studentId, target.topicId);
      if (existing && withinWindow(existing.createdAt, this.now(), ADAPTATION_DEDUP_WINDOW_MS)) {
        return null;
      }
      const { value: text, source } = await this.deps.recommendations.recommend({
        studentName: target.studentName,
        topicTitle: target.topicTitle,
        scorePct: target.scorePct,
        totalAnswers: target.total,
        correctAnswers: target.correct,
      });
      await this.deps.gateway.appendRecommendation({
        studentId: target.studentId,
        topicId: target.topicId,
        text,
        generatedBy: source,
        createdAt: this.now(),
      });
      agentMetrics.recordRecommendation(source, trigger);
      return source;
    } finally {
      if (lock && token !== null && !(await lock.port.release(key, token))) {
        this.log.warn('dedup-lock-lost', { key });
      }
    }
  }
}
