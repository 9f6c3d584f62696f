import { always } from '../../src/services/stategraph/conditions';
import { GraphEngine } from '../../src/services/stategraph/engine';
import { GraphBuilder } from '../../src/services/stategraph/graphBuilder';
import {
  createInteractionRequest,
  driveExecution,
  firstOptionResponder,
} from '../../src/services/stategraph/interaction';
import type { GraphEdge, InteractionRequest } from '../../src/services/stategraph/types';

const NOW = '2024-01-01T00:00:00.000Z';

const edge: GraphEdge = {
  id: 'pick->done#0',
  order: 0,
  source: 'pick',
  target: 'done',
  predicate: always,
  requiresUserInput: true,
  label: 'picked',
};

function request(options: unknown[]): InteractionRequest {
  return createInteractionRequest('exec-1', edge, { options }, new Date(NOW));
}

describe('createInteractionRequest', () => {
  it('lifts options and message out of the node output', () => {
    const output = { message: 'Pick one', options: ['a', 'b'], extra: true };
    expect(createInteractionRequest('exec-1', edge, output, new Date(NOW))).toEqual({
      executionId: 'exec-1',
      nodeId: 'pick',
      nodeOutput: output,
      options: ['a', 'b'],
      message: 'Pick one',
      edge: {
        id: 'pick->done#0',
        source: 'pick',
        target: 'done',
        requiresUserInput: true,
        label: 'picked',
      },
      requestedAt: NOW,
    });
  });

  it('ignores options and message of the wrong type', () => {
    const result = createInteractionRequest(
      'exec-1',
      edge,
      { options: 'a,b', message: 3 },
      new Date(NOW),
    );
    expect(result.options).toEqual([]);
    expect(result.message).toBeUndefined();
  });

  it('works without any node output', () => {
    const result = createInteractionRequest('exec-1', edge, undefined, new Date(NOW));
    expect(result.nodeOutput).toBeUndefined();
    expect(result.options).toEqual([]);
  });
});

describe('firstOptionResponder', () => {
  it('answers with the first option or null', () => {
    expect(firstOptionResponder(request(['x', 'y']), {})).toBe('x');
    expect(firstOptionResponder(request([]), {})).toBeNull();
  });
});

describe('driveExecution', () => {
  function pickGraph() {
    const builder = new GraphBuilder({ name: 'pick', fieldMapping: [['picked', 'picked']] });
    builder.addNode('pick', () => ({ options: ['red', 'blue'] }));
    builder.addNode('done', ({ state }) => {
      const record = state.pick_user_input;
      return {
        picked: typeof record === 'object' && record !== null ? Reflect.get(record, 'input') : null,
      };
    });
    builder.addEdge('pick', 'done', always, { requiresUserInput: true });
    return builder.setEntryPoint('pick').build();
  }

  it('answers every request until the execution finishes', async () => {
    const responder = jest.fn(firstOptionResponder);
    const engine = new GraphEngine(pickGraph(), { executionId: 'exec-2' });

    const result = await driveExecution(engine, responder);

    expect(result.status).toBe('completed');
    expect(result.state.picked).toBe('red');
    expect(responder).toHaveBeenCalledTimes(1);
    expect(responder.mock.calls[0][0].nodeId).toBe('pick');
  });

  it('continues an execution that is already suspended', async () => {
    const engine = new GraphEngine(pickGraph());
    await engine.run();

    const result = await driveExecution(engine, async () => 'blue');

    expect(result.state.picked).toBe('blue');
  });

  it('stops after the interaction limit and hands back the suspended result', async () => {
    const builder = new GraphBuilder({ name: 'stubborn' });
    builder.addNode('ask', () => ({}));
    builder.addNode('never', () => ({}));
    builder.addEdge('ask', 'never', (state) => state.ask_user_input === undefined, {
      requiresUserInput: true,
    });
    const engine = new GraphEngine(builder.setEntryPoint('ask').build());
    const responder = jest.fn(() => 'again');

    const result = await driveExecution(engine, responder, { maxInteractions: 2 });

    expect(result.status).toBe('suspended');
    expect(responder).toHaveBeenCalledTimes(2);
  });
});
