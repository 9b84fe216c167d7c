/**
 * Activity graph tests
 */

import { ActivityGraph, availableActions, type NewEdge } from '../activity-graph.js';
import type { ActionableElement, ObservedState } from '../types.js';

function element(index: number, signature: string): ActionableElement {
  return {
    id: `e${index}`,
    role: 'button',
    bounds: { x1: 0, y1: 0, x2: 100, y2: 100, width: 100, height: 100, centerX: 50, centerY: 50, area: 10000 },
    text: null,
    label: null,
    resourceId: null,
    className: 'android.widget.Button',
    interactions: ['tap'],
    path: `0.${index}`,
    signature,
  };
}

function state(fingerprint: string, signatures: string[] = []): ObservedState {
  return {
    fingerprint,
    screenName: `com.example.app.${fingerprint}`,
    packageName: 'com.example.app',
    elements: signatures.map((signature, index) => element(index + 1, signature)),
    summary: { nodeCount: signatures.length + 1, actionableCount: signatures.length, texts: [] },
  };
}

function edge(source: string, destination: string, key: string, extra: Partial<NewEdge> = {}): NewEdge {
  return {
    source,
    destination,
    action: { key, interaction: key === 'back' ? 'back' : 'tap', elementId: null, label: key },
    outcome: 'success',
    decidedBy: 'oracle',
    ...extra,
  };
}

describe('availableActions', () => {
  it('lists element actions in order with back last', () => {
    expect(availableActions(state('A', ['x', 'y']))).toEqual(['tap:x', 'tap:y', 'back']);
  });
});

describe('ActivityGraph', () => {
  let now: number;
  let graph: ActivityGraph;

  beforeEach(() => {
    now = 1000;
    graph = new ActivityGraph({ deadEndRetryBudget: 2, clock: () => now });
  });

  describe('lookupOrCreate', () => {
    it('is idempotent by fingerprint and counts visits', () => {
      const first = graph.lookupOrCreate(state('A', ['x']));
      now = 2000;
      const second = graph.lookupOrCreate(state('A', ['x']));

      expect(first.created).toBe(true);
      expect(second.created).toBe(false);
      expect(second.node).toBe(first.node);
      expect(graph.nodeCount).toBe(1);
      expect(second.node.visits).toBe(2);
      expect(second.node.firstSeenAt).toBe(1000);
      expect(second.node.lastSeenAt).toBe(2000);
    });

    it('adds newly seen actions to an existing node', () => {
      graph.lookupOrCreate(state('A', ['x']));
      const { node } = graph.lookupOrCreate(state('A', ['x', 'y']));

      expect(node.actions).toEqual(['tap:x', 'back', 'tap:y']);
    });

    it('places new nodes one level below their parent', () => {
      graph.lookupOrCreate(state('A'));
      const child = graph.lookupOrCreate(state('B'), 'A').node;
      const grandchild = graph.lookupOrCreate(state('C'), 'B').node;

      expect(child.depth).toBe(1);
      expect(grandchild.depth).toBe(2);
      expect(grandchild.order).toBe(2);
    });
  });

  describe('recordEdge', () => {
    beforeEach(() => {
      graph.lookupOrCreate(state('A', ['x', 'y']));
      graph.lookupOrCreate(state('B', ['z']), 'A');
    });

    it('numbers edges by step and tracks attempts', () => {
      const first = graph.recordEdge(edge('A', 'B', 'tap:x', { discovered: true }));
      const second = graph.recordEdge(edge('B', 'A', 'back'));

      expect(first.step).toBe(1);
      expect(first.discovered).toBe(true);
      expect(second.step).toBe(2);
      expect(second.discovered).toBe(false);
      expect(graph.edgeCount).toBe(2);
      expect(graph.attemptsFor('A', 'tap:x')).toBe(1);
      expect(graph.attemptsFor('A', 'tap:y')).toBe(0);
    });

    it('rejects edges to unknown nodes', () => {
      expect(() => graph.recordEdge(edge('A', 'missing', 'tap:x'))).toThrow('Edge references unknown node: missing');
      expect(graph.edgeCount).toBe(0);
    });

    it('keeps repeated (source, action) pairs', () => {
      graph.recordEdge(edge('A', 'B', 'tap:x'));
      graph.recordEdge(edge('A', 'A', 'tap:x', { outcome: 'failure' }));

      expect(graph.getEdges().map((recorded) => recorded.destination)).toEqual(['B', 'A']);
      expect(graph.attemptsFor('A', 'tap:x')).toBe(2);
    });

    it('shortens destination depth when a shorter path appears', () => {
      graph.lookupOrCreate(state('C'), 'B');
      expect(graph.get('C')?.depth).toBe(2);

      graph.recordEdge(edge('A', 'C', 'tap:y'));
      expect(graph.get('C')?.depth).toBe(1);
    });

    it('splits tried and untried actions', () => {
      const node = graph.get('A');
      if (!node) throw new Error('node A missing');

      graph.recordEdge(edge('A', 'B', 'tap:x'));

      expect(graph.triedActions(node)).toEqual(['tap:x']);
      expect(graph.untriedActions(node)).toEqual(['tap:y', 'back']);
    });

    it('filters edges by outcome', () => {
      graph.recordEdge(edge('A', 'A', 'tap:x', { outcome: 'crash' }));
      graph.recordEdge(edge('A', 'B', 'tap:y'));

      expect(graph.outcomesFrom('A', 'crash').map((recorded) => recorded.action.key)).toEqual(['tap:x']);
    });
  });

  describe('isDeadEnd', () => {
    it('flags a node whose actions are exhausted without discoveries', () => {
      const { node } = graph.lookupOrCreate(state('A', ['x']));

      graph.recordEdge(edge('A', 'A', 'tap:x'));
      graph.recordEdge(edge('A', 'A', 'back'));
      expect(graph.isDeadEnd(node)).toBe(false);

      graph.recordEdge(edge('A', 'A', 'tap:x'));
      graph.recordEdge(edge('A', 'A', 'back'));
      expect(graph.isDeadEnd(node)).toBe(true);
      expect(node.deadEnd).toBe(true);
    });

    it('does not flag a node that led somewhere new', () => {
      const { node } = graph.lookupOrCreate(state('A', ['x']));
      graph.lookupOrCreate(state('B'), 'A');

      graph.recordEdge(edge('A', 'B', 'tap:x', { discovered: true }));
      graph.recordEdge(edge('A', 'A', 'tap:x'));
      graph.recordEdge(edge('A', 'A', 'back'));
      graph.recordEdge(edge('A', 'A', 'back'));

      expect(graph.isDeadEnd(node)).toBe(false);
    });

    it('stays flagged once set', () => {
      const { node } = graph.lookupOrCreate(state('A'));
      graph.recordEdge(edge('A', 'A', 'back'));
      graph.recordEdge(edge('A', 'A', 'back'));
      expect(graph.isDeadEnd(node)).toBe(true);

      graph.lookupOrCreate(state('A', ['fresh']));
      expect(graph.isDeadEnd(node)).toBe(true);
    });
  });

  describe('shortestUnexploredFrontier', () => {
    it('orders by depth, then creation order', () => {
      graph.lookupOrCreate(state('A', ['x']));
      graph.lookupOrCreate(state('C', ['z']), 'A');
      graph.lookupOrCreate(state('B', ['y']), 'A');

      expect(graph.shortestUnexploredFrontier().map((node) => node.fingerprint)).toEqual(['A', 'C', 'B']);
    });

    it('drops nodes with nothing left to try', () => {
      graph.lookupOrCreate(state('A', ['x']));
      graph.lookupOrCreate(state('B', ['y']), 'A');

      graph.recordEdge(edge('A', 'B', 'tap:x', { discovered: true }));
      graph.recordEdge(edge('B', 'A', 'back'));
      graph.recordEdge(edge('A', 'A', 'back'));

      expect(graph.shortestUnexploredFrontier().map((node) => node.fingerprint)).toEqual(['B']);
    });
  });

  describe('routeBetween', () => {
    beforeEach(() => {
      graph.lookupOrCreate(state('A', ['x', 'z']));
      graph.lookupOrCreate(state('B', ['y']), 'A');
      graph.lookupOrCreate(state('C'), 'B');
      graph.recordEdge(edge('A', 'B', 'tap:x', { discovered: true }));
      graph.recordEdge(edge('B', 'C', 'tap:y', { discovered: true }));
      graph.recordEdge(edge('B', 'A', 'back'));
      graph.recordEdge(edge('A', 'C', 'tap:z', { outcome: 'crash' }));
    });

    it('follows successful edges only', () => {
      expect(graph.routeBetween('A', 'C')?.map((step) => step.action.key)).toEqual(['tap:x', 'tap:y']);
      expect(graph.routeBetween('B', 'A')?.map((step) => step.action.key)).toEqual(['back']);
    });

    it('returns an empty route to the same node and null when unreachable', () => {
      expect(graph.routeBetween('B', 'B')).toEqual([]);
      expect(graph.routeBetween('C', 'A')).toBeNull();
    });
  });

  it('hands out copies of nodes and edges', () => {
    graph.lookupOrCreate(state('A', ['x']));
    graph.recordEdge(edge('A', 'A', 'tap:x'));

    const [node] = graph.getNodes();
    node.visits = 99;
    node.actions.push('tap:bogus');
    const [recorded] = graph.getEdges();
    recorded.action.label = 'changed';

    expect(graph.get('A')?.visits).toBe(1);
    expect(graph.get('A')?.actions).toEqual(['tap:x', 'back']);
    expect(graph.getEdges()[0].action.label).toBe('tap:x');
  });

  it('returns the most recent edges oldest first', () => {
    graph.lookupOrCreate(state('A', ['x']));
    graph.recordEdge(edge('A', 'A', 'tap:x'));
    graph.recordEdge(edge('A', 'A', 'back'));
    graph.recordEdge(edge('A', 'A', 'tap:x'));

    expect(graph.recentEdges(2).map((recorded) => recorded.step)).toEqual([2, 3]);
    expect(graph.recentEdges(0)).toEqual([]);
  });

  it('marks terminal nodes', () => {
    graph.lookupOrCreate(state('A'));
    graph.markTerminal('A');
    graph.markTerminal('unknown');

    expect(graph.get('A')?.terminal).toBe(true);
  });
});
