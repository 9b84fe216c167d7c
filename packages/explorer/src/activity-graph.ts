/**
 * Activity Graph
 *
 * Per-session memory of visited states and the actions connecting them.
 * Nodes are unique by fingerprint; edges are append-only and may repeat a
 * (source, action) pair when the app behaves non-deterministically.
 */

import { actionKeyFor } from './fingerprint.js';
import type { EdgeOutcome, GraphEdge, GraphNode, ObservedState, StateFingerprint } from './types.js';

export interface ActivityGraphOptions {
  /** Attempts per action before a node without discoveries counts as a dead end */
  deadEndRetryBudget?: number;
  clock?: () => number;
}

export interface LookupResult {
  node: GraphNode;
  created: boolean;
}

export type NewEdge = Omit<GraphEdge, 'step' | 'discovered'> & { discovered?: boolean };

/** Every action key an observed state offers, in element order, with `back` last */
export function availableActions(state: ObservedState): string[] {
  const keys: string[] = [];
  for (const element of state.elements) {
    for (const interaction of element.interactions) {
      keys.push(actionKeyFor(interaction, element));
    }
  }
  keys.push(actionKeyFor('back'));
  return keys;
}

export class ActivityGraph {
  private nodes: Map<StateFingerprint, GraphNode> = new Map();
  private edges: GraphEdge[] = [];
  private attempts: Map<StateFingerprint, Map<string, number>> = new Map();
  private deadEndRetryBudget: number;
  private clock: () => number;

  constructor(options: ActivityGraphOptions = {}) {
    this.deadEndRetryBudget = options.deadEndRetryBudget ?? 2;
    this.clock = options.clock ?? Date.now;
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  get edgeCount(): number {
    return this.edges.length;
  }

  get(fingerprint: StateFingerprint): GraphNode | undefined {
    return this.nodes.get(fingerprint);
  }

  /**
   * Find the node for an observed state or create it. Idempotent by
   * fingerprint; every call counts as a visit. New nodes sit one level below
   * `parent`, or at depth 0 when there is none.
   */
  lookupOrCreate(state: ObservedState, parent?: StateFingerprint): LookupResult {
    const now = this.clock();
    const existing = this.nodes.get(state.fingerprint);

    if (existing) {
      existing.visits++;
      existing.lastSeenAt = now;
      for (const key of availableActions(state)) {
        if (!existing.actions.includes(key)) existing.actions.push(key);
      }
      return { node: existing, created: false };
    }

    const parentNode = parent ? this.nodes.get(parent) : undefined;
    const node: GraphNode = {
      fingerprint: state.fingerprint,
      screenName: state.screenName,
      visits: 1,
      depth: parentNode ? parentNode.depth + 1 : 0,
      order: this.nodes.size,
      actions: availableActions(state),
      deadEnd: false,
      terminal: false,
      firstSeenAt: now,
      lastSeenAt: now,
    };
    this.nodes.set(node.fingerprint, node);
    return { node, created: true };
  }

  /**
   * Append an edge. Both endpoints must already be in this graph.
   */
  recordEdge(edge: NewEdge): GraphEdge {
    const source = this.nodes.get(edge.source);
    const destination = this.nodes.get(edge.destination);
    if (!source || !destination) {
      throw new Error(
        `Edge references unknown node: ${!source ? edge.source : edge.destination}`
      );
    }

    const recorded: GraphEdge = {
      ...edge,
      step: this.edges.length + 1,
      discovered: edge.discovered ?? false,
    };
    this.edges.push(recorded);

    const counts = this.attempts.get(edge.source) ?? new Map<string, number>();
    counts.set(edge.action.key, (counts.get(edge.action.key) ?? 0) + 1);
    this.attempts.set(edge.source, counts);

    destination.depth = Math.min(destination.depth, source.depth + 1);
    return recorded;
  }

  attemptsFor(fingerprint: StateFingerprint, key: string): number {
    return this.attempts.get(fingerprint)?.get(key) ?? 0;
  }

  /** Action keys of `node` never attempted in this session, in element order */
  untriedActions(node: GraphNode): string[] {
    return node.actions.filter((key) => this.attemptsFor(node.fingerprint, key) === 0);
  }

  /** Action keys attempted from `node`, each listed once */
  triedActions(node: GraphNode): string[] {
    return node.actions.filter((key) => this.attemptsFor(node.fingerprint, key) > 0);
  }

  outcomesFrom(fingerprint: StateFingerprint, outcome: EdgeOutcome): GraphEdge[] {
    return this.edges.filter((edge) => edge.source === fingerprint && edge.outcome === outcome);
  }

  /**
   * A node is a dead end when it offers no actions, or when every action has
   * been attempted `deadEndRetryBudget` times and none of those attempts led
   * to a newly discovered node. The flag is sticky once set.
   */
  isDeadEnd(node: GraphNode): boolean {
    if (node.deadEnd) return true;

    const exhausted =
      node.actions.length === 0 ||
      (node.actions.every((key) => this.attemptsFor(node.fingerprint, key) >= this.deadEndRetryBudget) &&
        !this.edges.some((edge) => edge.source === node.fingerprint && edge.discovered));

    if (exhausted) node.deadEnd = true;
    return exhausted;
  }

  /**
   * Nodes that still have untried actions, shallowest first. Ties break on
   * creation order so the result is stable.
   */
  shortestUnexploredFrontier(): GraphNode[] {
    return Array.from(this.nodes.values())
      .filter((node) => !this.isDeadEnd(node) && this.untriedActions(node).length > 0)
      .sort((a, b) => a.depth - b.depth || a.order - b.order);
  }

  /**
   * Fewest-step route from `from` to `to` over successful edges, or null if
   * none is known. An empty route means both are the same node.
   */
  routeBetween(from: StateFingerprint, to: StateFingerprint): GraphEdge[] | null {
    if (from === to) return [];

    const cameFrom = new Map<StateFingerprint, GraphEdge>();
    const queue: StateFingerprint[] = [from];
    const seen = new Set<StateFingerprint>([from]);

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;

      for (const edge of this.edges) {
        if (edge.source !== current || edge.outcome !== 'success' || seen.has(edge.destination)) continue;
        seen.add(edge.destination);
        cameFrom.set(edge.destination, edge);

        if (edge.destination === to) {
          const route: GraphEdge[] = [];
          let step = cameFrom.get(to);
          while (step) {
            route.unshift(step);
            step = step.source === from ? undefined : cameFrom.get(step.source);
          }
          return route;
        }
        queue.push(edge.destination);
      }
    }
    return null;
  }

  markTerminal(fingerprint: StateFingerprint): void {
    const node = this.nodes.get(fingerprint);
    if (node) node.terminal = true;
  }

  getNodes(): GraphNode[] {
    return Array.from(this.nodes.values()).map((node) => ({ ...node, actions: [...node.actions] }));
  }

  getEdges(): GraphEdge[] {
    return this.edges.map((edge) => ({ ...edge, action: { ...edge.action } }));
  }

  recentEdges(count: number): GraphEdge[] {
    return count > 0 ? this.edges.slice(-count) : [];
  }
}
