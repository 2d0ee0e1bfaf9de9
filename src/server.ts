// Load environment variables before anything reads them
import dotenv from 'dotenv';
dotenv.config();

import { createServer } from 'http';
import type { Socket } from 'net';
import { AgentRuntime } from './app/composition-root';
import { createOpsApp } from './app/ops.server';
import { loadAgentsConfig } from './config/agents.config';
import { ConfigError } from './utils/errors';
import { logger } from './utils/logger';

async function startServer(): Promise<void> {
  let runtime: AgentRuntime | null = null;
  try {
    const config = loadAgentsConfig();
    runtime = await AgentRuntime.create(config);
    runtime.start();

    const active = runtime;
    const httpServer = createServer(createOpsApp(active));
    const sockets = new Set<Socket>();
    httpServer.on('connection', (socket: Socket) => {
      sockets.add(socket);
      socket.on('close', () => sockets.delete(socket));
    });
    httpServer.listen(config.opsPort, () => {
      logger.info('ops-server-listening', { port: config.opsPort });
    });

    let shuttingDown = false;
    const graceful = async (signal: string) => {
      if (shuttingDown) return;
      shuttingDown = true;
      logger.info('shutdown-requested', { signal });
      try {
        await active.stop();
      } catch (err) {
        logger.error('runtime-stop-failed', err);
      }
      sockets.forEach((s) => s.destroy());
      httpServer.close(() => {
        logger.info('shutdown-complete');
        process.exit(0);
      });
      // hard exit if close hangs
      setTimeout(() => process.exit(0), 5000).unref();
    };

    process.on('SIGTERM', () => {
      void graceful('SIGTERM');
    });
    process.on('SIGINT', () => {
      void graceful('SIGINT');
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error('invalid-configuration', { issues: error.issues });
    } else {
      logger.error('startup-failed', error);
    }
    if (runtime) await runtime.stop().catch((err: unknown) => logger.error('runtime-stop-failed', err));
    process.exit(1);
  }
}

void startServer();
