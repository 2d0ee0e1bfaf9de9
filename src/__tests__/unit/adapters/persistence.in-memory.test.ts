import { InMemoryPersistenceGateway } from '../../../adapters/persistence.in-memory';
import { MINUTE, T0, answers, student, topic } from '../../test-utils/factories';

const later = (minutes: number) => new Date(T0.getTime() + minutes * MINUTE);

describe('InMemoryPersistenceGateway', () => {
  let gateway: InMemoryPersistenceGateway;

  beforeEach(async () => {
    gateway = new InMemoryPersistenceGateway({
      students: [student('s1', 'Ada'), student('s2', 'Grace')],
      topics: [topic('A', 'Fractions')],
      answers: [...answers('s1', 'A', 1, 2), ...answers('s2', 'A', 2, 2)],
    });
    await gateway.open();
  });

  it('tracks its open/close lifecycle', async () => {
    expect(gateway.isOpen).toBe(true);
    await gateway.close();
    expect(gateway.isOpen).toBe(false);
  });

  it('reads the learning store', async () => {
    await expect(gateway.listStudents()).resolves.toEqual([
      { id: 's1', name: 'Ada' },
      { id: 's2', name: 'Grace' },
    ]);
    await expect(gateway.listAnswers('s1')).resolves.toHaveLength(2);
    await expect(gateway.getTopic('A')).resolves.toEqual({ id: 'A', title: 'Fractions' });
    await expect(gateway.getTopic('missing')).resolves.toBeNull();
  });

  it('finds the latest alert per agent type and student', async () => {
    await gateway.appendAlert({ agentType: 'monitoring', studentId: 's1', text: 'old', severity: 'warning', createdAt: T0 });
    await gateway.appendAlert({ agentType: 'monitoring', studentId: 's1', text: 'new', severity: 'danger', createdAt: later(5) });
    await gateway.appendAlert({ agentType: 'notification', studentId: 's1', text: 'other', severity: 'danger', createdAt: later(9) });

    const latest = await gateway.findLatestAlert('monitoring', 's1');
    expect(latest).toMatchObject({ text: 'new', severity: 'danger', isRead: false });
    await expect(gateway.findLatestAlert('monitoring', 's2')).resolves.toBeNull();
  });

  it('marks alerts read idempotently', async () => {
    const alert = await gateway.appendAlert({
      agentType: 'notification',
      studentId: 's1',
      text: 'Alert',
      severity: 'warning',
      createdAt: T0,
    });
    await expect(gateway.markAlertsRead([alert.id])).resolves.toBe(1);
    await expect(gateway.markAlertsRead([alert.id])).resolves.toBe(0);
    await expect(gateway.listAlerts({ unreadOnly: true })).resolves.toEqual([]);
  });

  it('keeps recommendation lookups separate for topic and general records', async () => {
    await gateway.appendRecommendation({ studentId: 's1', topicId: 'A', text: 'topic', generatedBy: 'rule', createdAt: T0 });
    await gateway.appendRecommendation({ studentId: 's1', topicId: null, text: 'general', generatedBy: 'rule', createdAt: later(1) });

    await expect(gateway.findLatestRecommendation('s1', 'A')).resolves.toMatchObject({ text: 'topic' });
    await expect(gateway.findLatestRecommendation('s1', null)).resolves.toMatchObject({ text: 'general' });
    await expect(gateway.listRecommendations({ studentId: 's1', limit: 1 })).resolves.toMatchObject([{ text: 'general' }]);
  });

  it('lists the decision log newest first', async () => {
    for (const [i, eventType] of ['student_risk', 'recommendations_ready', 'adaptation_analysis'].entries()) {
      await gateway.appendDecisionLog({
        eventType,
        sourceAgent: 'router',
        targetAgent: null,
        studentId: 's1',
        payload: null,
        decision: null,
        createdAt: later(i),
      });
    }
    const log = await gateway.listDecisionLog(2);
    expect(log.map((e) => e.eventType)).toEqual(['adaptation_analysis', 'recommendations_ready']);
  });

  it('does not let callers mutate stored records', async () => {
    const stored = await gateway.appendAlert({
      agentType: 'monitoring',
      studentId: 's1',
      text: 'original',
      severity: 'warning',
      createdAt: T0,
    });
    stored.text = 'changed';
    await expect(gateway.findLatestAlert('monitoring', 's1')).resolves.toMatchObject({ text: 'original' });
  });
});
