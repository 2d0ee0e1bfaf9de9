import { InMemoryMailboxTransport } from '../../../adapters/mailbox.in-memory';
import { AgentRuntime } from '../../../app/composition-root';
import { testConfig } from '../../test-utils/factories';

jest.mock('pg', () => ({
  Pool: jest.fn().mockImplementation(() => ({
    on: jest.fn(),
    connect: jest.fn(async () => ({ release: jest.fn() })),
    query: jest.fn(async () => ({ rows: [] })),
    end: jest.fn(async () => undefined),
  })),
}));

describe('AgentRuntime composition', () => {
  it('wires in-memory adapters and the rule-based generator by default', async () => {
    const runtime = await AgentRuntime.create(testConfig());
    try {
      expect(runtime.health()).toEqual({
        status: 'stopped',
        transport: 'memory',
        persistence: 'memory',
        externalGenerator: false,
        workers: [
          { name: 'router', running: false },
          { name: 'monitoring', running: false },
          { name: 'adaptation', running: false },
          { name: 'notification', running: false },
        ],
      });
    } finally {
      await runtime.stop();
    }
  });

  it('selects the Postgres gateway when configured', async () => {
    const runtime = await AgentRuntime.create(testConfig({ persistence: 'postgres' }));
    try {
      expect(runtime.gateway.kind).toBe('postgres');
      await expect(runtime.gateway.listStudents()).resolves.toEqual([]);
    } finally {
      await runtime.stop();
    }
  });

  it('enables the external generator when an API key is configured', async () => {
    const config = testConfig();
    const runtime = await AgentRuntime.create({ ...config, recommender: { ...config.recommender, apiKey: 'test-secret' } });
    try {
      expect(runtime.health().externalGenerator).toBe(true);
    } finally {
      await runtime.stop();
    }
  });

  it('refuses to open a mailbox the transport does not declare', async () => {
    const config = testConfig();
    const transport = new InMemoryMailboxTransport(['router', 'monitoring', 'adaptation']);
    await expect(AgentRuntime.create(config, { transport })).rejects.toMatchObject({ code: 'unknown_destination' });
  });
});
