import { InMemoryDedupLockAdapter } from '../../../adapters/dedup-lock.in-memory';
import { InMemoryMailboxTransport } from '../../../adapters/mailbox.in-memory';
import { InMemoryPersistenceGateway } from '../../../adapters/persistence.in-memory';
import { monitoringLockKey } from '../../../services/ports/dedup-lock.port';
import type { Mailbox } from '../../../services/ports/mailbox.port';
import type { Envelope } from '../../../types/messages.types';
import { MonitoringWorker, performanceAlertText } from '../../../workers/monitoring.worker';
import { HOUR, MINUTE, T0, answers, createClock, parseBody, student } from '../../test-utils/factories';
import { recordingLogger } from '../../test-utils/recording-logger';

async function drain(mailbox: Mailbox): Promise<Envelope[]> {
  const out: Envelope[] = [];
  for (;;) {
    const next = await mailbox.receive(0);
    if (!next) return out;
    out.push(next);
  }
}

describe('MonitoringWorker', () => {
  let gateway: InMemoryPersistenceGateway;
  let transport: InMemoryMailboxTransport;
  let router: Mailbox;
  let clock: ReturnType<typeof createClock>;

  async function buildWorker(overrides: Partial<ConstructorParameters<typeof MonitoringWorker>[0]> = {}) {
    return new MonitoringWorker({
      gateway,
      mailbox: await transport.open('monitoring'),
      routerAddress: 'router',
      riskScoreThreshold: 50,
      periodMs: 30_000,
      now: clock.now,
      log: recordingLogger(),
      ...overrides,
    });
  }

  beforeEach(async () => {
    clock = createClock();
    gateway = new InMemoryPersistenceGateway();
    transport = new InMemoryMailboxTransport(['router', 'monitoring'], clock.now);
    router = await transport.open('router');
  });

  afterEach(async () => {
    await transport.shutdown();
  });

  it('reports a student below the threshold with a danger alert and a risk event', async () => {
    gateway.seed({ students: [student('s1', 'Ada')], answers: answers('s1', 'A', 2, 10) });
    const worker = await buildWorker();

    await expect(worker.scan()).resolves.toEqual({ scanned: 1, skipped: 0, flagged: 1, failed: 0 });

    const [alert] = await gateway.listAlerts();
    expect(alert).toMatchObject({
      agentType: 'monitoring',
      studentId: 's1',
      severity: 'danger',
      text: 'Student "Ada" has an overall score of 20% (2/10). Last 24h: 20%.',
      createdAt: T0,
    });

    const [event] = await drain(router);
    expect(event.from).toBe('monitoring');
    expect(parseBody(event.body)).toEqual({
      type: 'student_risk',
      student_id: 's1',
      student_name: 'Ada',
      score: 20,
      recent_score: 20,
      severity: 'danger',
    });
  });

  it('classifies a score of exactly 30 as a warning and leaves 50 alone', async () => {
    gateway.seed({
      students: [student('s1'), student('s2')],
      answers: [...answers('s1', 'A', 3, 10), ...answers('s2', 'A', 5, 10)],
    });
    const worker = await buildWorker();

    await expect(worker.scan()).resolves.toEqual({ scanned: 2, skipped: 0, flagged: 1, failed: 0 });
    const alerts = await gateway.listAlerts();
    expect(alerts).toHaveLength(1);
    expect(alerts[0]).toMatchObject({ studentId: 's1', severity: 'warning' });
  });

  it('never classifies a student without answers', async () => {
    gateway.seed({ students: [student('s1')] });
    const worker = await buildWorker();

    await expect(worker.scan()).resolves.toEqual({ scanned: 1, skipped: 1, flagged: 0, failed: 0 });
    await expect(gateway.listAlerts()).resolves.toEqual([]);
    expect(transport.pending('router')).toBe(0);
  });

  it('omits the recent score once the answers are older than a day', async () => {
    gateway.seed({ students: [student('s1', 'Ada')], answers: answers('s1', 'A', 1, 4, new Date(T0.getTime() - 25 * HOUR)) });
    const worker = await buildWorker();
    await worker.scan();

    const [event] = await drain(router);
    expect(parseBody(event.body)).toMatchObject({ score: 25, recent_score: null });
    const [alert] = await gateway.listAlerts();
    expect(alert.text).toBe('Student "Ada" has an overall score of 25% (1/4).');
  });

  it('reports a student at most once per hour', async () => {
    gateway.seed({ students: [student('s1')], answers: answers('s1', 'A', 1, 10) });
    const worker = await buildWorker();

    await worker.scan();
    clock.advance(30 * MINUTE);
    await expect(worker.scan()).resolves.toMatchObject({ skipped: 1, flagged: 0 });
    clock.advance(31 * MINUTE);
    await expect(worker.scan()).resolves.toMatchObject({ skipped: 0, flagged: 1 });

    await expect(gateway.listAlerts()).resolves.toHaveLength(2);
    await expect(drain(router)).resolves.toHaveLength(2);
  });

  it('keeps scanning after one student fails', async () => {
    gateway.seed({
      students: [student('s1'), student('s2')],
      answers: [...answers('s1', 'A', 0, 4), ...answers('s2', 'A', 0, 4)],
    });
    jest.spyOn(gateway, 'listAnswers').mockRejectedValueOnce(new Error('read timeout'));
    const worker = await buildWorker();

    await expect(worker.scan()).resolves.toEqual({ scanned: 1, skipped: 0, flagged: 1, failed: 1 });
    const alerts = await gateway.listAlerts();
    expect(alerts.map((a) => a.studentId)).toEqual(['s2']);
  });

  it('keeps the alert when the risk event cannot be sent', async () => {
    gateway.seed({ students: [student('s1')], answers: answers('s1', 'A', 0, 4) });
    const log = recordingLogger();
    const worker = await buildWorker({ routerAddress: 'nowhere', log });

    await expect(worker.scan()).resolves.toMatchObject({ flagged: 1 });
    await expect(gateway.listAlerts()).resolves.toHaveLength(1);
    expect(log.events()).toContain('risk-event-send-failed');
  });

  it('skips a student whose dedup lock is held elsewhere', async () => {
    gateway.seed({ students: [student('s1')], answers: answers('s1', 'A', 0, 4) });
    const port = new InMemoryDedupLockAdapter(() => clock.now().getTime());
    const held = await port.acquire(monitoringLockKey('s1'), 30_000);
    if (held === null) throw new Error('expected the lock');
    const worker = await buildWorker({ lock: { port, ttlMs: 30_000 } });

    await expect(worker.scan()).resolves.toEqual({ scanned: 1, skipped: 1, flagged: 0, failed: 0 });

    await expect(port.release(monitoringLockKey('s1'), held)).resolves.toBe(true);
    await expect(worker.scan()).resolves.toMatchObject({ flagged: 1 });
    await expect(port.acquire(monitoringLockKey('s1'), 30_000)).resolves.toEqual(expect.any(String));
  });

  it('still sends the risk event when the performance alert cannot be stored', async () => {
    gateway.seed({ students: [student('s1', 'Ada')], answers: answers('s1', 'A', 2, 10) });
    jest.spyOn(gateway, 'appendAlert').mockRejectedValue(new Error('store unavailable'));
    const log = recordingLogger();
    const worker = await buildWorker({ log });

    await expect(worker.scan()).resolves.toEqual({ scanned: 1, skipped: 0, flagged: 1, failed: 0 });

    const sent = await drain(router);
    expect(sent).toHaveLength(1);
    expect(parseBody(sent[0].body)).toMatchObject({ type: 'student_risk', student_id: 's1', severity: 'danger' });
    expect(log.events()).toContain('performance-alert-write-failed');
  });

  it('renders the alert text from the snapshot', () => {
    expect(
      performanceAlertText({
        studentId: 's1',
        studentName: 'Ada',
        total: 8,
        correct: 3,
        score: 37.5,
        recentScore: 40,
        topics: new Map(),
      })
    ).toBe('Student "Ada" has an overall score of 37.5% (3/8). Last 24h: 40%.');
  });
});
