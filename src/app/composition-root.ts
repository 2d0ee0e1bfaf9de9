import Redis from 'ioredis';
import type { AgentsConfig } from '../config/agents.config';
import { createPostgresDbAdapter } from '../adapters/db/postgres.adapter';
import { InMemoryDedupLockAdapter } from '../adapters/dedup-lock.in-memory';
import { RedisDedupLockAdapter } from '../adapters/dedup-lock.redis';
import { InMemoryMailboxTransport } from '../adapters/mailbox.in-memory';
import { RedisStreamMailboxTransport, type StreamCommandClient } from '../adapters/mailbox.redis-stream';
import { InMemoryPersistenceGateway } from '../adapters/persistence.in-memory';
import {
  DisabledRecommendationGenerator,
  OpenAIRecommendationGenerator,
  createAxiosChatClient,
} from '../adapters/recommendation.openai';
import { createDbPersistenceGateway } from '../adapters/repositories/db-learning.repository';
import type { DedupLockPort } from '../services/ports/dedup-lock.port';
import type { MailboxTransport } from '../services/ports/mailbox.port';
import type { PersistenceGatewayPort } from '../services/ports/persistence.port';
import type { RecommendationGeneratorPort } from '../services/ports/recommendation-generator.port';
import { RecommendationService } from '../services/recommendation.service';
import { logger } from '../utils/logger';
import { AdaptationWorker } from '../workers/adaptation.worker';
import { MonitoringWorker } from '../workers/monitoring.worker';
import { NotificationWorker } from '../workers/notification.worker';
import { OrchestratorWorker } from '../workers/orchestrator.worker';

/** Pre-built adapters that replace the ones the configuration would select. */
export interface RuntimeOverrides {
  gateway?: PersistenceGatewayPort;
  transport?: MailboxTransport;
  generator?: RecommendationGeneratorPort;
  lock?: DedupLockPort;
  now?: () => Date;
}

export interface WorkerHealth {
  name: string;
  running: boolean;
}

export interface RuntimeHealth {
  status: 'ok' | 'stopped';
  transport: MailboxTransport['kind'];
  persistence: PersistenceGatewayPort['kind'];
  externalGenerator: boolean;
  workers: WorkerHealth[];
}

function toStreamClient(redis: Redis): StreamCommandClient {
  return {
    call: (command, args) => redis.call(command, args),
    quit: () => redis.quit(),
  };
}

function connectRedis(url: string): Redis {
  const redis = new Redis(url, { maxRetriesPerRequest: null });
  redis.on('error', (err) => logger.warn('redis-connection-error', err));
  return redis;
}

function createTransport(config: AgentsConfig, writer: () => StreamCommandClient): MailboxTransport {
  const addresses = Object.values(config.addresses);
  if (config.transport === 'redis') {
    return new RedisStreamMailboxTransport(writer(), () => toStreamClient(connectRedis(config.redis.url)), {
      addresses,
      streamPrefix: config.redis.streamPrefix,
      consumerName: config.redis.consumerName,
    });
  }
  return new InMemoryMailboxTransport(addresses);
}

function createGateway(config: AgentsConfig): PersistenceGatewayPort {
  if (config.persistence === 'postgres') {
    return createDbPersistenceGateway(createPostgresDbAdapter({ connectionString: config.databaseUrl }));
  }
  return new InMemoryPersistenceGateway();
}

function createGenerator(config: AgentsConfig): RecommendationGeneratorPort {
  const { apiKey, baseUrl, model, timeoutMs, concurrency } = config.recommender;
  if (!apiKey) return new DisabledRecommendationGenerator();
  return new OpenAIRecommendationGenerator(createAxiosChatClient({ apiKey, baseUrl, model, timeoutMs }), {
    concurrency,
    timeoutMs,
  });
}

function createLock(config: AgentsConfig, redis: () => StreamCommandClient): DedupLockPort | undefined {
  if (!config.dedupLock.enabled) return undefined;
  if (config.transport === 'redis') return new RedisDedupLockAdapter(redis(), config.redis.consumerName);
  return new InMemoryDedupLockAdapter();
}

/**
 * Owns every adapter and worker of one process. Workers start router first
 * so it is listening before the first risk event, and stop in reverse.
 */
export class AgentRuntime {
  private started = false;

  private constructor(
    readonly config: AgentsConfig,
    readonly gateway: PersistenceGatewayPort,
    readonly transport: MailboxTransport,
    private readonly generator: RecommendationGeneratorPort,
    readonly router: OrchestratorWorker,
    readonly monitoring: MonitoringWorker,
    readonly adaptation: AdaptationWorker,
    readonly notification: NotificationWorker,
    private readonly ownedClients: StreamCommandClient[]
  ) {}

  static async create(config: AgentsConfig, overrides: RuntimeOverrides = {}): Promise<AgentRuntime> {
    const ownedClients: StreamCommandClient[] = [];
    let shared: StreamCommandClient | null = null;
    const sharedRedis = (): StreamCommandClient => {
      if (!shared) {
        shared = toStreamClient(connectRedis(config.redis.url));
        ownedClients.push(shared);
      }
      return shared;
    };

    const gateway = overrides.gateway ?? createGateway(config);
    // the transport quits its own writer on shutdown
    const transport =
      overrides.transport ?? createTransport(config, () => toStreamClient(connectRedis(config.redis.url)));
    const generator = overrides.generator ?? createGenerator(config);
    const lockPort = overrides.lock ?? createLock(config, sharedRedis);
    const lock = lockPort ? { port: lockPort, ttlMs: config.dedupLock.ttlMs } : undefined;
    const now = overrides.now;

    await gateway.open();
    const { addresses } = config;
    const [routerBox, monitoringBox, adaptationBox, notificationBox] = await Promise.all([
      transport.open(addresses.router),
      transport.open(addresses.monitoring),
      transport.open(addresses.adaptation),
      transport.open(addresses.notification),
    ]);

    const router = new OrchestratorWorker({
      gateway,
      mailbox: routerBox,
      addresses,
      receiveTimeoutMs: config.routerReceiveTimeoutMs,
      now,
    });
    const monitoring = new MonitoringWorker({
      gateway,
      mailbox: monitoringBox,
      routerAddress: addresses.router,
      riskScoreThreshold: config.riskScoreThreshold,
      periodMs: config.monitoringPeriodMs,
      lock,
      now,
    });
    const adaptation = new AdaptationWorker({
      gateway,
      mailbox: adaptationBox,
      routerAddress: addresses.router,
      recommendations: new RecommendationService(generator),
      riskScoreThreshold: config.riskScoreThreshold,
      periodMs: config.adaptationPeriodMs,
      receiveTimeoutMs: config.workerReceiveTimeoutMs,
      lock,
      now,
    });
    const notification = new NotificationWorker({
      gateway,
      mailbox: notificationBox,
      receiveTimeoutMs: config.workerReceiveTimeoutMs,
      now,
    });

    logger.info('agent-runtime-created', {
      transport: transport.kind,
      persistence: gateway.kind,
      externalGenerator: generator.enabled,
      dedupLock: lock !== undefined,
    });
    return new AgentRuntime(
      config,
      gateway,
      transport,
      generator,
      router,
      monitoring,
      adaptation,
      notification,
      ownedClients
    );
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.router.start();
    this.notification.start();
    this.adaptation.start();
    this.monitoring.start();
  }

  async stop(): Promise<void> {
    if (this.started) {
      this.started = false;
      await this.monitoring.stop();
      await this.adaptation.stop();
      await this.notification.stop();
      await this.router.stop();
    }
    if (this.generator.shutdown) await this.generator.shutdown();
    await this.transport.shutdown();
    for (const client of this.ownedClients.splice(0)) {
      try {
        await client.quit();
      } catch (err) {
        logger.warn('redis-quit-failed', err);
      }
    }
    await this.gateway.close();
  }

  health(): RuntimeHealth {
    return {
      status: this.started ? 'ok' : 'stopped',
      transport: this.transport.kind,
      persistence: this.gateway.kind,
      externalGenerator: this.generator.enabled,
      workers: [
        { name: this.router.name, running: this.router.isRunning },
        { name: this.monitoring.name, running: this.monitoring.isRunning },
        { name: this.adaptation.name, running: this.adaptation.isRunning },
        { name: this.notification.name, running: this.notification.isRunning },
      ],
    };
  }

  requestErrorAnalysis(studentId: string, studentName?: string): Promise<boolean> {
    return this.router.requestErrorAnalysis(studentId, studentName);
  }
}
