import { always, fieldEquals, whenState } from '../../src/services/stategraph/conditions';
import { GraphEngine, type EngineOptions } from '../../src/services/stategraph/engine';
import {
  EdgeEvaluationError,
  GraphBuildError,
  InvalidExecutionStateError,
  InvalidUserInputError,
  MalformedOutputError,
  NodeExecutionError,
  NodeTimeoutError,
  PersistenceError,
  StepLimitExceededError,
} from '../../src/services/stategraph/errors';
import type { FieldMappingInput } from '../../src/services/stategraph/fieldMapping';
import type { StateGraph } from '../../src/services/stategraph/graph';
import { GraphBuilder } from '../../src/services/stategraph/graphBuilder';
import { isPlainRecord } from '../../src/services/stategraph/outputParser';
import {
  InMemorySessionStore,
  type SessionStore,
} from '../../src/services/stategraph/sessionStore';
import type {
  EdgePredicate,
  ExecutionResult,
  NodeHandler,
} from '../../src/services/stategraph/types';

const NOW = '2024-01-01T00:00:00.000Z';
const now = () => new Date(NOW);

function engineFor(
  graph: StateGraph,
  options: EngineOptions = {},
): GraphEngine {
  return new GraphEngine(graph, { executionId: 'exec-1', now, ...options });
}

function twoNodeGraph(
  handlers: { A: NodeHandler; B: NodeHandler },
  edge: { predicate?: EdgePredicate; requiresUserInput?: boolean } = {},
  fieldMapping: FieldMappingInput = [
    ['stage', 'stage'],
    ['status', 'status'],
  ],
) {
  const builder = new GraphBuilder({ name: 'two-node', fieldMapping });
  builder.addNode('A', handlers.A);
  builder.addNode('B', handlers.B);
  builder.addEdge('A', 'B', edge.predicate ?? always, {
    requiresUserInput: edge.requiresUserInput ?? false,
  });
  return builder.setEntryPoint('A').build();
}

type ResultOf<S extends ExecutionResult['status']> = Extract<ExecutionResult, { status: S }>;

function hasStatus<S extends ExecutionResult['status']>(
  result: ExecutionResult,
  status: S,
): result is ResultOf<S> {
  return result.status === status;
}

function expectStatus<S extends ExecutionResult['status']>(
  result: ExecutionResult,
  status: S,
): ResultOf<S> {
  expect(result.status).toBe(status);
  if (!hasStatus(result, status)) {
    throw new Error(`expected ${status}, got ${result.status}`);
  }
  return result;
}

describe('GraphEngine', () => {
  it('completes a two-node graph with the fields of both nodes', async () => {
    const graph = twoNodeGraph(
      { A: () => ({ first: 1 }), B: () => ({ second: 2 }) },
      {},
      [
        ['first', 'first'],
        ['second', 'second'],
      ],
    );

    const result = expectStatus(await engineFor(graph).run(), 'completed');

    expect(result.terminalNodeId).toBe('B');
    expect(result.steps).toBe(2);
    expect(result.state.first).toBe(1);
    expect(result.state.second).toBe(2);
    expect(result.trace.map((entry) => entry.node)).toEqual(['A', 'B']);
  });

  it('follows an edge only while its condition holds', async () => {
    const predicate = whenState({ stage: 'A', status: 'Success' });

    const passing = twoNodeGraph(
      { A: () => ({ stage: 'A', status: 'Success' }), B: () => ({ stage: 'B', status: 'Success' }) },
      { predicate },
    );
    const moved = expectStatus(await engineFor(passing).run(), 'completed');
    expect(moved.terminalNodeId).toBe('B');
    expect(moved.state.stage).toBe('B');

    const failing = twoNodeGraph(
      { A: () => ({ stage: 'A', status: 'Failed' }), B: () => ({ stage: 'B', status: 'Success' }) },
      { predicate },
    );
    const stayed = expectStatus(await engineFor(failing).run(), 'completed');
    expect(stayed.terminalNodeId).toBe('A');
    expect(stayed.steps).toBe(1);
    expect(stayed.state.status).toBe('Failed');
  });

  it('suspends on an edge that needs input and resumes when input arrives', async () => {
    const graph = twoNodeGraph(
      { A: () => ({ stage: 'A' }), B: () => ({ stage: 'B' }) },
      { requiresUserInput: true },
    );
    const engine = engineFor(graph);

    const suspended = expectStatus(await engine.run(), 'suspended');
    expect(engine.status).toBe('suspended');
    expect(suspended.steps).toBe(1);
    expect(suspended.request).toEqual({
      executionId: 'exec-1',
      nodeId: 'A',
      nodeOutput: { stage: 'A' },
      options: [],
      edge: { id: 'A->B#0', source: 'A', target: 'B', requiresUserInput: true },
      requestedAt: NOW,
    });

    const completed = expectStatus(await engine.provideUserInput('yes'), 'completed');
    expect(completed.terminalNodeId).toBe('B');
    expect(completed.state.A_user_input).toEqual({
      input: 'yes',
      timestamp: NOW,
      nodeId: 'A',
      nodeOutput: { stage: 'A' },
      sequence: 2,
    });
    expect(engine.getHistory().map((entry) => [entry.nodeId, entry.operation])).toEqual([
      ['A', 'project'],
      ['A', 'user_input'],
      ['B', 'project'],
    ]);
  });

  it('keeps going after malformed output and reports a warning', async () => {
    const graph = twoNodeGraph({ A: () => 'not json at all', B: () => ({ stage: 'B' }) });

    const result = expectStatus(await engineFor(graph).run(), 'completed');

    expect(result.terminalNodeId).toBe('B');
    expect(result.warnings).toEqual([
      {
        nodeId: 'A',
        kind: 'malformed_output',
        message: 'no JSON object found in text output',
        sequence: 1,
      },
    ]);
    expect(result.state.A_result).toBeUndefined();
    expect(result.state).toEqual({ stage: 'B', B_result: { stage: 'B' } });
  });

  it('leaves state empty when the only node returns malformed output', async () => {
    const builder = new GraphBuilder({ name: 'single' });
    builder.addNode('A', () => 17);
    const engine = engineFor(builder.setEntryPoint('A').build());

    const result = expectStatus(await engine.run(), 'completed');

    expect(result.state).toEqual({});
    expect(engine.getHistory()).toEqual([
      {
        sequence: 1,
        timestamp: NOW,
        nodeId: 'A',
        operation: 'projection_failed',
        changes: {},
        details: { error: 'output of type number is not a field record' },
      },
    ]);
  });

  it('fails on malformed output when configured to', async () => {
    const graph = twoNodeGraph({ A: () => 'nope', B: () => ({}) });

    const result = expectStatus(
      await engineFor(graph, { malformedOutput: 'fail' }).run(),
      'failed',
    );

    expect(result.nodeId).toBe('A');
    expect(result.error).toBeInstanceOf(MalformedOutputError);
    expect(result.error.message).toBe(
      'Malformed output from node A: no JSON object found in text output',
    );
  });

  it('takes the earliest registered edge when several are true', async () => {
    const builder = new GraphBuilder({ name: 'tie' });
    builder.addNode('A', () => ({}));
    builder.addNode('B', () => ({}));
    builder.addNode('C', () => ({}));
    builder.addEdge('A', 'C');
    builder.addEdge('A', 'B');
    const graph = builder.setEntryPoint('A').build();

    for (let i = 0; i < 3; i += 1) {
      const result = expectStatus(await engineFor(graph).run(), 'completed');
      expect(result.terminalNodeId).toBe('C');
    }
  });

  it('reaches the same outcome whether input is given up front or after suspending', async () => {
    const build = () => {
      const builder = new GraphBuilder({ name: 'round-trip', fieldMapping: [['choice', 'choice']] });
      builder.addNode('A', () => ({ options: ['x', 'y'] }));
      builder.addNode('B', ({ state }) => {
        const record = state.A_user_input;
        return { choice: isPlainRecord(record) ? record.input : null };
      });
      builder.addEdge('A', 'B', always, { requiresUserInput: true });
      return builder.setEntryPoint('A').build();
    };

    const resumed = engineFor(build());
    expectStatus(await resumed.run(), 'suspended');
    const viaResume = expectStatus(await resumed.provideUserInput('x'), 'completed');

    const upFront = expectStatus(
      await engineFor(build()).run(undefined, { userInputs: { A: 'x' } }),
      'completed',
    );

    expect(viaResume.terminalNodeId).toBe(upFront.terminalNodeId);
    expect(viaResume.steps).toBe(upFront.steps);
    expect(viaResume.state.choice).toBe('x');
    expect(upFront.state.choice).toBe('x');
  });

  it('passes the entry input to the first step only and injects state', async () => {
    const seen: Array<{ node: string; input: unknown; state: Record<string, unknown> }> = [];
    const graph = twoNodeGraph(
      {
        A: ({ input, state }) => {
          seen.push({ node: 'A', input, state: { ...state } });
          return { stage: 'A' };
        },
        B: ({ input, state }) => {
          seen.push({ node: 'B', input, state: { ...state } });
          return { stage: 'B' };
        },
      },
    );

    await engineFor(graph).run('hello');

    expect(seen).toEqual([
      { node: 'A', input: 'hello', state: {} },
      { node: 'B', input: undefined, state: { stage: 'A', A_result: { stage: 'A' } } },
    ]);
  });

  it('re-asks when input arrives but the blocking edge is still false', async () => {
    const graph = twoNodeGraph(
      { A: () => ({ stage: 'A', status: 'Success' }), B: () => ({ stage: 'B' }) },
      {
        predicate: (state) => {
          const record = state.A_user_input;
          return !isPlainRecord(record) || record.input !== 'no';
        },
        requiresUserInput: true,
      },
    );
    const engine = engineFor(graph);

    expectStatus(await engine.run(), 'suspended');
    const again = expectStatus(await engine.provideUserInput('no'), 'suspended');
    expect(again.request.nodeId).toBe('A');

    const done = expectStatus(await engine.provideUserInput('yes'), 'completed');
    expect(done.terminalNodeId).toBe('B');
  });

  describe('user input reuse', () => {
    const loop = () => {
      const builder = new GraphBuilder({ name: 'loop', fieldMapping: [['round', 'round']] });
      builder.addNode('A', () => ({}));
      builder.addNode('B', ({ visit }) => ({ round: visit }));
      builder.addEdge('A', 'B', always, { requiresUserInput: true });
      builder.addEdge('B', 'A', whenState({ round: 1 }));
      return builder.setEntryPoint('A').build();
    };

    it('asks again on a revisit by default', async () => {
      const engine = engineFor(loop());
      expectStatus(await engine.run(), 'suspended');

      const second = expectStatus(await engine.provideUserInput('first'), 'suspended');
      expect(second.steps).toBe(3);

      const done = expectStatus(await engine.provideUserInput('second'), 'completed');
      expect(done.state.round).toBe(2);
    });

    it('reuses the record when configured to', async () => {
      const engine = engineFor(loop(), { userInputReuse: 'always' });
      expectStatus(await engine.run(), 'suspended');

      const done = expectStatus(await engine.provideUserInput('first'), 'completed');
      expect(done.steps).toBe(4);
      expect(done.state.round).toBe(2);
    });
  });

  describe('failures', () => {
    it('fails with the node id and the handler error', async () => {
      const predicate = jest.fn(() => true);
      const graph = twoNodeGraph(
        {
          A: () => {
            throw new Error('boom');
          },
          B: () => ({}),
        },
        { predicate },
      );

      const result = expectStatus(await engineFor(graph).run(), 'failed');

      expect(result.nodeId).toBe('A');
      expect(result.error).toBeInstanceOf(NodeExecutionError);
      expect(result.error.message).toBe('Node A failed: boom');
      expect(result.error instanceof NodeExecutionError && result.error.originalError).toEqual(
        new Error('boom'),
      );
      expect(result.trace[0].error).toBe('boom');
      expect(predicate).not.toHaveBeenCalled();
    });

    it('keeps the last consistent state when a later node fails', async () => {
      const graph = twoNodeGraph({
        A: () => ({ stage: 'A' }),
        B: async () => {
          throw new Error('later');
        },
      });

      const result = expectStatus(await engineFor(graph).run(), 'failed');

      expect(result.nodeId).toBe('B');
      expect(result.state).toEqual({ stage: 'A', A_result: { stage: 'A' } });
    });

    it('fails when a condition throws', async () => {
      const graph = twoNodeGraph(
        { A: () => ({}), B: () => ({}) },
        {
          predicate: () => {
            throw new Error('bad predicate');
          },
        },
      );

      const result = expectStatus(await engineFor(graph).run(), 'failed');

      expect(result.error).toBeInstanceOf(EdgeEvaluationError);
      expect(result.error.message).toBe('Condition on edge A->B#0 threw: bad predicate');
    });

    it('stops a cycle at the step bound', async () => {
      const builder = new GraphBuilder({ name: 'cycle', fieldMapping: [['count', 'count']] });
      builder.addNode('A', ({ visit }) => ({ count: visit }));
      builder.addEdge('A', 'A');
      const engine = engineFor(builder.setEntryPoint('A').build(), { maxSteps: 3 });

      const result = expectStatus(await engine.run(), 'failed');

      expect(result.error).toBeInstanceOf(StepLimitExceededError);
      expect(result.error.message).toBe('Execution exceeded max steps (3)');
      expect(result.steps).toBe(3);
      expect(result.state.count).toBe(3);
      expect(engine.getHistory()).toHaveLength(3);
    });

    it('times out a slow node', async () => {
      const builder = new GraphBuilder({ name: 'slow' });
      builder.addNode('slow', async () => {
        await new Promise((resolve) => setTimeout(resolve, 50));
        return {};
      });
      const engine = engineFor(builder.setEntryPoint('slow').build(), { nodeTimeoutMs: 10 });

      const result = expectStatus(await engine.run(), 'failed');

      expect(result.error).toBeInstanceOf(NodeTimeoutError);
      expect(result.error.message).toBe('Node slow timed out after 10ms');
    });
  });

  describe('terminal states', () => {
    it('rejects input and reruns after completion', async () => {
      const engine = engineFor(twoNodeGraph({ A: () => ({}), B: () => ({}) }));
      await engine.run();

      await expect(engine.provideUserInput('late')).rejects.toThrow(InvalidExecutionStateError);
      await expect(engine.provideUserInput('late')).rejects.toThrow(
        'Cannot provide user input: execution is completed',
      );
      await expect(engine.run()).rejects.toThrow('Cannot run: execution is completed');
    });

    it('rejects input after failure', async () => {
      const engine = engineFor(
        twoNodeGraph({
          A: () => {
            throw new Error('boom');
          },
          B: () => ({}),
        }),
      );
      await engine.run();

      await expect(engine.provideUserInput('late')).rejects.toThrow(
        'Cannot provide user input: execution is failed',
      );
      expect(engine.getResult().status).toBe('failed');
    });

    it('rejects input before the execution starts', async () => {
      const engine = engineFor(twoNodeGraph({ A: () => ({}), B: () => ({}) }));
      await expect(engine.provideUserInput('early')).rejects.toThrow(
        'Cannot provide user input: execution is idle',
      );
      expect(() => engine.getResult()).toThrow('Cannot read result: execution is idle');
    });
  });

  describe('persistence', () => {
    const suspendingGraph = () =>
      twoNodeGraph(
        { A: () => ({ stage: 'A', options: ['yes', 'no'] }), B: () => ({ stage: 'B' }) },
        { requiresUserInput: true },
      );

    it('saves a snapshot when suspending and resumes from it in a new engine', async () => {
      const sessionStore = new InMemorySessionStore();
      const graph = suspendingGraph();
      await engineFor(graph, { sessionStore }).run();

      const saved = await sessionStore.load('exec-1');
      expect(saved).toMatchObject({
        version: 1,
        executionId: 'exec-1',
        graphName: 'two-node',
        status: 'suspended',
        currentNodeId: 'A',
        pendingEdgeId: 'A->B#0',
        steps: 1,
      });

      const restored = GraphEngine.restore(graph, saved, { sessionStore, now });
      expect(restored.getResult()).toMatchObject({
        status: 'suspended',
        request: { nodeId: 'A', options: ['yes', 'no'] },
      });

      const result = expectStatus(await restored.provideUserInput('yes'), 'completed');
      expect(result.terminalNodeId).toBe('B');
      expect(result.steps).toBe(2);
      expect((await sessionStore.load('exec-1'))?.status).toBe('completed');
    });

    it('refuses a snapshot from another graph', async () => {
      const sessionStore = new InMemorySessionStore();
      await engineFor(suspendingGraph(), { sessionStore }).run();
      const snapshot = await sessionStore.load('exec-1');
      const graph = new GraphBuilder({ name: 'other' });
      graph.addNode('A', () => ({}));
      expect(() => GraphEngine.restore(graph.setEntryPoint('A').build(), snapshot)).toThrow(
        GraphBuildError,
      );
    });

    it('wraps save errors', async () => {
      const failing: SessionStore = {
        save: async () => {
          throw new Error('disk full');
        },
        load: async () => null,
        delete: async () => undefined,
      };

      await expect(engineFor(suspendingGraph(), { sessionStore: failing }).run()).rejects.toThrow(
        new PersistenceError('Failed to persist execution exec-1: disk full'),
      );
    });

    it('drops the persisted record on abandon and refuses further input', async () => {
      const sessionStore = new InMemorySessionStore();
      const engine = engineFor(suspendingGraph(), { sessionStore });
      await engine.run();

      await engine.abandon();

      expect(await sessionStore.load('exec-1')).toBeNull();
      await expect(engine.provideUserInput('yes')).rejects.toThrow(
        'Cannot provide user input: execution is suspended (execution was abandoned)',
      );
      expect(() => engine.getResult()).toThrow(
        'Cannot read result: execution is suspended (execution was abandoned)',
      );
    });

    it('resumes to the same outcome in process and from a saved snapshot', async () => {
      const builder = new GraphBuilder({
        name: 'dated',
        fieldMapping: [['stage', 'stage'], { source: 'when', target: 'when', defaultValue: null }],
      });
      builder.addNode('A', () => ({ stage: 'A', when: new Date(NOW), count: 10n }));
      builder.addNode('B', () => ({ stage: 'B' }));
      builder.addNode('C', () => ({}));
      builder.addNode('D', () => ({}));
      builder.addEdge('A', 'B', whenState({ stage: 'A' }), { requiresUserInput: true });
      builder.addEdge('B', 'C', (state) => state.when instanceof Date);
      builder.addEdge('B', 'D', always);
      const graph = builder.setEntryPoint('A').build();

      const live = engineFor(graph, { executionId: 'live' });
      await live.run();
      const liveResult = expectStatus(await live.provideUserInput('go'), 'completed');

      const sessionStore = new InMemorySessionStore();
      expectStatus(await engineFor(graph, { executionId: 'saved', sessionStore }).run(), 'suspended');
      const restored = GraphEngine.restore(graph, await sessionStore.load('saved'), {
        sessionStore,
        now,
      });
      const restoredResult = expectStatus(await restored.provideUserInput('go'), 'completed');

      expect(liveResult.terminalNodeId).toBe('D');
      expect(restoredResult.terminalNodeId).toBe('D');
      expect(restoredResult.state).toEqual(liveResult.state);
      expect(liveResult.state.when).toBeNull();
      expect(liveResult.state.A_result).toEqual({ stage: 'A' });
      expect(live.getHistory()[0].details).toEqual({
        substitutions: [
          { field: 'when', replacement: null, reason: 'Date at when is not JSON-serializable' },
          { field: 'A_result.when', reason: 'Date at when is not JSON-serializable' },
          { field: 'A_result.count', reason: 'bigint at count is not JSON-serializable' },
        ],
      });
    });

    it('refuses user input that cannot be persisted and stays suspended', async () => {
      const engine = engineFor(suspendingGraph());
      await engine.run();

      await expect(engine.provideUserInput(new Date(NOW))).rejects.toThrow(
        new InvalidUserInputError('A', 'Date at input is not JSON-serializable'),
      );
      expect(engine.status).toBe('suspended');
      expectStatus(await engine.provideUserInput('yes'), 'completed');
    });

    it('does not offer an earlier visit\'s output when the latest one was malformed', async () => {
      const builder = new GraphBuilder({
        name: 'revisit',
        fieldMapping: [
          ['stage', 'stage'],
          ['looped', 'looped'],
        ],
      });
      builder.addNode('A', ({ visit }) => (visit === 1 ? { stage: 'A', options: ['x'] } : 42));
      builder.addNode('B', () => ({ looped: true }));
      builder.addNode('C', () => ({}));
      builder.addEdge('A', 'C', fieldEquals('looped', true), { requiresUserInput: true });
      builder.addEdge('A', 'B', always);
      builder.addEdge('B', 'A', always);
      const graph = builder.setEntryPoint('A').build();
      const sessionStore = new InMemorySessionStore();

      const suspended = expectStatus(
        await engineFor(graph, { sessionStore }).run(),
        'suspended',
      );
      expect(suspended.request.nodeOutput).toBeUndefined();
      expect(suspended.request.options).toEqual([]);

      const restored = GraphEngine.restore(graph, await sessionStore.load('exec-1'), { now });
      const pending = expectStatus(restored.getResult(), 'suspended');
      expect(pending.request.nodeOutput).toBeUndefined();

      const done = expectStatus(await restored.provideUserInput('ok'), 'completed');
      expect(done.state.A_user_input).toEqual({
        input: 'ok',
        timestamp: NOW,
        nodeId: 'A',
        sequence: 4,
      });
    });
  });

  describe('configuration', () => {
    const saved = process.env.STATEGRAPH_MALFORMED_OUTPUT;

    afterEach(() => {
      if (saved === undefined) {
        delete process.env.STATEGRAPH_MALFORMED_OUTPUT;
      } else {
        process.env.STATEGRAPH_MALFORMED_OUTPUT = saved;
      }
    });

    it('reads the environment only for policies left unset', () => {
      process.env.STATEGRAPH_MALFORMED_OUTPUT = 'bogus';
      const graph = twoNodeGraph({ A: () => ({}), B: () => ({}) });

      expect(() => engineFor(graph, { malformedOutput: 'fail' })).not.toThrow();
      expect(
        () =>
          new GraphEngine(graph, {
            maxSteps: undefined,
            nodeTimeoutMs: 0,
            malformedOutput: 'warn',
            userInputReuse: 'once',
          }),
      ).not.toThrow();
      expect(() => engineFor(graph)).toThrow(
        'STATEGRAPH_MALFORMED_OUTPUT must be one of warn, fail, got "bogus"',
      );
    });
  });
});
