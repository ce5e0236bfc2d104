/**
 * Toolset tests
 */

import { describe, it, expect, vi } from 'vitest';
import type { SourceMap } from '../../sources/types.js';
import { Toolset, type InvocationContext } from '../../tools/registry.js';
import { ConfigurationError } from '../../utils/errors.js';
import {
  FakeCollection,
  closingCursor,
  cursorOf,
  fakeSource,
  hangingCursor,
} from '../helpers/fake-source.js';

// Mock logger
vi.mock('../../utils/logger.js', () => {
  const log = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return { logger: log, createToolLogger: () => log };
});

const findUsers = {
  name: 'find-users',
  kind: 'mongodb-atlas',
  source: 'main-db',
  description: 'Find users by id',
  collection: 'users',
  query: { active: true },
  parameters: [{ name: '_id', type: 'integer' }],
};

const ownOrders = {
  name: 'own-orders',
  kind: 'mongodb-atlas',
  source: 'main-db',
  description: 'Orders of the signed-in user',
  collection: 'orders',
  query: {},
  authRequired: ['corp-sso'],
  parameters: [
    { name: 'email', type: 'string', authServices: [{ name: 'corp-sso', field: 'email' }] },
  ],
};

const anonymous: InvocationContext = { verifiedAuthServices: [], claims: {} };

function sourcesFor(collection: FakeCollection): SourceMap {
  return new Map([['main-db', fakeSource(collection)]]);
}

describe('Toolset', () => {
  describe('initialize', () => {
    it('should register every valid tool', () => {
      const toolset = Toolset.initialize([findUsers, ownOrders], sourcesFor(new FakeCollection()));
      expect(toolset.getNames()).toEqual(['find-users', 'own-orders']);
      expect(toolset.failures).toEqual([]);
    });

    it('should record broken tools without failing the others', () => {
      const toolset = Toolset.initialize(
        [{ ...findUsers, source: 'missing-db' }, ownOrders, { name: 'broken' }],
        sourcesFor(new FakeCollection())
      );

      expect(toolset.getNames()).toEqual(['own-orders']);
      expect(toolset.failures.map((f) => f.name)).toEqual(['find-users', 'broken']);
      expect(toolset.failures[0]?.error).toBeInstanceOf(ConfigurationError);
      expect(toolset.failures[0]?.error.message).toBe('no source named "missing-db" configured');
    });

    it('should reject duplicate tool names', () => {
      const toolset = Toolset.initialize([findUsers, findUsers], sourcesFor(new FakeCollection()));
      expect(toolset.getNames()).toEqual(['find-users']);
      expect(toolset.failures[0]?.error.message).toBe('tool "find-users" is already registered');
    });
  });

  describe('manifests', () => {
    it('should list manifests by tool name', () => {
      const toolset = Toolset.initialize([findUsers, ownOrders], sourcesFor(new FakeCollection()));
      const manifests = toolset.getManifests();
      expect(Object.keys(manifests)).toEqual(['find-users', 'own-orders']);
      expect(manifests['own-orders']?.authRequired).toEqual(['corp-sso']);
    });

    it('should list MCP manifests', () => {
      const toolset = Toolset.initialize([findUsers, ownOrders], sourcesFor(new FakeCollection()));
      const [users, orders] = toolset.getMcpManifests();
      expect(users?.inputSchema.required).toEqual(['_id']);
      expect(orders?.inputSchema.properties).toEqual({});
    });
  });

  describe('execute', () => {
    it('should return documents on success', async () => {
      const collection = new FakeCollection({ find: () => cursorOf([{ _id: 1, name: 'Alice' }]) });
      const toolset = Toolset.initialize([findUsers], sourcesFor(collection));

      const result = await toolset.execute('find-users', { _id: 1 }, anonymous);

      expect(result).toEqual({ success: true, data: [{ _id: 1, name: 'Alice' }] });
      expect(collection.finds).toEqual([{ active: true, _id: 1 }]);
    });

    it('should report unknown tools', async () => {
      const toolset = Toolset.initialize([], sourcesFor(new FakeCollection()));
      const result = await toolset.execute('nope', {}, anonymous);
      expect(result.success).toBe(false);
      expect(result.error?.code).toBe('NOT_FOUND');
      expect(result.error?.message).toBe("Tool 'nope' not found");
    });

    it('should refuse callers without a required auth service', async () => {
      const collection = new FakeCollection();
      const toolset = Toolset.initialize([ownOrders], sourcesFor(collection));

      const result = await toolset.execute('own-orders', {}, anonymous);

      expect(result.error?.code).toBe('UNAUTHORIZED');
      expect(collection.finds).toHaveLength(0);
    });

    it('should fill auth-bound parameters from claims', async () => {
      const collection = new FakeCollection();
      const toolset = Toolset.initialize([ownOrders], sourcesFor(collection));

      const result = await toolset.execute(
        'own-orders',
        {},
        {
          verifiedAuthServices: ['corp-sso'],
          claims: { 'corp-sso': { email: 'alice@example.com' } },
        }
      );

      expect(result).toEqual({ success: true, data: [] });
      expect(collection.finds).toEqual([{ email: 'alice@example.com' }]);
    });

    it('should map validation failures', async () => {
      const toolset = Toolset.initialize([findUsers], sourcesFor(new FakeCollection()));

      const result = await toolset.execute('find-users', { _id: 'one' }, anonymous);

      expect(result).toEqual({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'parameter "_id" expects integer',
          retryable: false,
          details: [{ field: '_id', message: 'parameter "_id" expects integer' }],
        },
      });
    });

    it('should time out a slow store and close its cursor', async () => {
      const collection = new FakeCollection({ find: () => hangingCursor() });
      const toolset = Toolset.initialize([findUsers], sourcesFor(collection), { timeoutMs: 20 });

      const result = await toolset.execute('find-users', { _id: 1 }, anonymous);

      expect(result.error?.code).toBe('TIMEOUT_ERROR');
      expect(result.error?.message).toBe("Tool 'find-users' timed out after 20ms");
      expect(result.error?.retryable).toBe(true);
      expect(collection.cursors[0]?.closeCalls).toBeGreaterThan(0);
    });

    it('should time out rather than return partial results', async () => {
      const collection = new FakeCollection({ find: () => closingCursor([{ _id: 1 }]) });
      const toolset = Toolset.initialize([findUsers], sourcesFor(collection), { timeoutMs: 10 });

      const result = await toolset.execute('find-users', { _id: 1 }, anonymous);

      expect(result.success).toBe(false);
      expect(result.data).toBeUndefined();
      expect(result.error?.code).toBe('TIMEOUT_ERROR');
      expect(result.error?.message).toBe("Tool 'find-users' timed out after 10ms");
    });

    it('should honor a caller cancellation', async () => {
      const collection = new FakeCollection();
      const toolset = Toolset.initialize([findUsers], sourcesFor(collection));
      const controller = new AbortController();
      controller.abort();

      const result = await toolset.execute('find-users', { _id: 1 }, {
        ...anonymous,
        signal: controller.signal,
      });

      expect(result.error?.code).toBe('CANCELLED');
      expect(collection.finds).toHaveLength(0);
    });

    it('should map unexpected errors to internal errors', async () => {
      const toolset = Toolset.initialize([findUsers], sourcesFor(new FakeCollection()));
      const tool = toolset.get('find-users');
      if (!tool) throw new Error('tool missing');
      vi.spyOn(tool, 'invoke').mockRejectedValue(new RangeError('boom'));

      const result = await toolset.execute('find-users', { _id: 1 }, anonymous);

      expect(result.error?.code).toBe('INTERNAL_ERROR');
      expect(result.error?.message).toBe('Unexpected tool failure');
    });
  });
});
