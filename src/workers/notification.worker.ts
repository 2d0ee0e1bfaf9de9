import { agentMetrics } from '../metrics/agents.metrics';
import type { Mailbox } from '../services/ports/mailbox.port';
import type { PersistenceGatewayPort } from '../services/ports/persistence.port';
import type { AlertRecord } from '../types/agents.types';
import type { CreateAlertMessage, Envelope } from '../types/messages.types';
import type { Logger } from '../utils/logger';
import { logger } from '../utils/logger';
import { MailboxWorker } from './mailbox-worker';

export interface NotificationWorkerDeps {
  gateway: PersistenceGatewayPort;
  mailbox: Mailbox;
  receiveTimeoutMs: number;
  now?: () => Date;
  log?: Logger;
}

export function notificationText(command: CreateAlertMessage): string {
  return `Alert: student "${command.studentName}" is at risk (score: ${command.score}%).`;
}

/** Every valid `create_alert` yields exactly one unread alert; no dedup here. */
export class NotificationWorker extends MailboxWorker {
  private readonly gateway: PersistenceGatewayPort;
  private readonly now: () => Date;

  constructor(deps: NotificationWorkerDeps) {
    super('notification', deps.mailbox, deps.receiveTimeoutMs, deps.log ?? logger.child({ component: 'notification' }));
    this.gateway = deps.gateway;
    this.now = deps.now ?? (() => new Date());
  }

  protected async handle(envelope: Envelope): Promise<void> {
    const command = this.decodeCommand(envelope, ['create_alert'] as const);
    if (command) await this.createAlert(command);
  }

  async createAlert(command: CreateAlertMessage): Promise<AlertRecord> {
    const alert = await this.gateway.appendAlert({
      agentType: 'notification',
      studentId: command.studentId,
      text: notificationText(command),
      severity: command.severity,
      createdAt: this.now(),
    });
    agentMetrics.recordAlert('notification', command.severity);
    this.log.info('alert-created', { studentId: command.studentId, severity: command.severity });
    return alert;
  }
}
