import { InMemoryMailboxTransport } from '../../../adapters/mailbox.in-memory';
import { InMemoryPersistenceGateway } from '../../../adapters/persistence.in-memory';
import { NotificationWorker, notificationText } from '../../../workers/notification.worker';
import { T0, createClock } from '../../test-utils/factories';
import { recordingLogger } from '../../test-utils/recording-logger';

describe('NotificationWorker', () => {
  let gateway: InMemoryPersistenceGateway;
  let transport: InMemoryMailboxTransport;

  beforeEach(() => {
    gateway = new InMemoryPersistenceGateway();
    transport = new InMemoryMailboxTransport(['router', 'notification']);
  });

  afterEach(async () => {
    await transport.shutdown();
  });

  async function buildWorker(log = recordingLogger()) {
    return new NotificationWorker({
      gateway,
      mailbox: await transport.open('notification'),
      receiveTimeoutMs: 20,
      now: createClock().now,
      log,
    });
  }

  it('formats the alert text from the command', () => {
    expect(
      notificationText({ type: 'create_alert', studentId: 's1', studentName: 'Ada', score: 37.5, severity: 'warning' })
    ).toBe('Alert: student "Ada" is at risk (score: 37.5%).');
  });

  it('writes one unread alert per command, without deduplication', async () => {
    const worker = await buildWorker();
    const command = { type: 'create_alert', studentId: 's1', studentName: 'Ada', score: 20, severity: 'danger' } as const;

    await worker.createAlert(command);
    await worker.createAlert(command);

    const alerts = await gateway.listAlerts({ agentType: 'notification' });
    expect(alerts).toHaveLength(2);
    expect(alerts[0]).toMatchObject({
      studentId: 's1',
      severity: 'danger',
      isRead: false,
      text: 'Alert: student "Ada" is at risk (score: 20%).',
      createdAt: T0,
    });
  });

  it('consumes create_alert envelopes from its mailbox', async () => {
    const worker = await buildWorker();
    const router = await transport.open('router');
    await router.send('notification', { type: 'create_alert', studentId: 's1', studentName: 'Ada', score: 20, severity: 'danger' });

    await expect(worker.pollOnce()).resolves.toBe(true);
    await expect(gateway.listAlerts()).resolves.toHaveLength(1);
  });

  it('drops a create_alert without a severity', async () => {
    const log = recordingLogger();
    const worker = await buildWorker(log);
    transport.deliver('router', 'notification', JSON.stringify({ type: 'create_alert', student_id: 's1', score: 20 }));

    await worker.pollOnce();

    await expect(gateway.listAlerts()).resolves.toEqual([]);
    expect(log.lines).toContainEqual(expect.objectContaining({ level: 'warn', msg: 'rejected-envelope' }));
  });

  it('contains a storage failure and acknowledges the envelope', async () => {
    jest.spyOn(gateway, 'appendAlert').mockRejectedValueOnce(new Error('store unavailable'));
    const log = recordingLogger();
    const worker = await buildWorker(log);
    const mailbox = await transport.open('router');
    await mailbox.send('notification', { type: 'create_alert', studentId: 's1', studentName: 'Ada', score: 20, severity: 'danger' });

    await expect(worker.pollOnce()).resolves.toBe(true);
    expect(log.events()).toContain('envelope-handling-failed');
    expect(transport.pending('notification')).toBe(0);
  });

  it('stops its receive loop promptly', async () => {
    const worker = await buildWorker();
    worker.start();
    expect(worker.isRunning).toBe(true);
    await worker.stop();
    expect(worker.isRunning).toBe(false);
  });
});
