/**
 * @roamer/explorer - Types
 *
 * Data model shared by the exploration engine components.
 */

// =============================================================================
// Observation
// =============================================================================

/** Stable identity hash of a canonicalized UI state */
export type StateFingerprint = string;

/** `submit` fires the editor action (go, search, send) of a text field */
export type Interaction = 'tap' | 'long-press' | 'type-text' | 'submit' | 'swipe';

export type SwipeDirection = 'up' | 'down' | 'left' | 'right';

export type ElementRole =
  | 'button'
  | 'input'
  | 'checkbox'
  | 'radio'
  | 'switch'
  | 'select'
  | 'slider'
  | 'image'
  | 'text'
  | 'list'
  | 'scroll'
  | 'tab'
  | 'view'
  | 'container';

export interface BoundingBox {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  width: number;
  height: number;
  centerX: number;
  centerY: number;
  area: number;
}

/**
 * A UI element reachable from the current state. Valid for one observation
 * only; `id` is its position in depth-first document order (`e1`, `e2`, ...).
 */
export interface ActionableElement {
  id: string;
  role: ElementRole;
  bounds: BoundingBox;
  text: string | null;
  label: string | null;
  resourceId: string | null;
  className: string;
  interactions: Interaction[];
  /** Child-index path from the root, e.g. `0.2.1` */
  path: string;
  /** Identity of the element across captures of the same screen */
  signature: string;
}

/** Raw capture handed over by an automation driver */
export interface UiSnapshot {
  /** Foreground activity or screen identifier */
  screenName: string;
  /** uiautomator-style XML hierarchy */
  hierarchy: string;
  packageName?: string;
}

export interface ScreenSummary {
  nodeCount: number;
  actionableCount: number;
  /** Visible texts in document order, deduplicated */
  texts: string[];
}

export interface ObservedState {
  fingerprint: StateFingerprint;
  screenName: string;
  packageName: string | null;
  elements: ActionableElement[];
  summary: ScreenSummary;
}

// =============================================================================
// Actions and decisions
// =============================================================================

export type ActionDescriptor =
  | {
      kind: 'element';
      elementId: string;
      interaction: Interaction;
      text?: string;
      direction?: SwipeDirection;
    }
  | { kind: 'back' };

/** An action as recorded on a graph edge, detached from the observation it came from */
export interface RecordedAction {
  key: string;
  interaction: Interaction | 'back';
  elementId: string | null;
  label: string;
  text?: string;
  direction?: SwipeDirection;
}

export type StopReason = 'goal-reached' | 'oracle-done';

export type Decision =
  | {
      type: 'action';
      action: ActionDescriptor;
      reasoning: string;
      note?: string;
      attempts: number;
    }
  | { type: 'stop'; reason: StopReason; message: string; note?: string; attempts: number }
  | { type: 'unresolved'; attempts: number; error: Error };

/** `replay` marks steps that re-walk a known path before exploring */
export type DecisionSource = 'oracle' | 'fallback' | 'replay';

// =============================================================================
// Activity graph
// =============================================================================

export interface GraphNode {
  fingerprint: StateFingerprint;
  screenName: string;
  visits: number;
  depth: number;
  /** Creation order within the graph */
  order: number;
  /** Action keys known to be available from this node */
  actions: string[];
  deadEnd: boolean;
  terminal: boolean;
  firstSeenAt: number;
  lastSeenAt: number;
}

export type EdgeOutcome = 'success' | 'failure' | 'crash';

export interface GraphEdge {
  step: number;
  source: StateFingerprint;
  action: RecordedAction;
  destination: StateFingerprint;
  outcome: EdgeOutcome;
  decidedBy: DecisionSource;
  /** Destination node was created by this step */
  discovered: boolean;
  detail?: string;
}

// =============================================================================
// Knowledge
// =============================================================================

export interface KnowledgeRecord {
  fingerprint: StateFingerprint;
  screenName: string;
  visits: number;
  triedActions: string[];
  crashTriggers: string[];
  notes: string[];
  /** Action-key sequences that reached this state from a fresh launch, shortest first */
  paths: string[][];
  deadEnd: boolean;
  lastSeenAt: number;
}

export interface KnowledgeDelta {
  /** Job or session that produced the delta */
  source: string;
  records: KnowledgeRecord[];
}

export type KnowledgeSnapshot = ReadonlyMap<StateFingerprint, Readonly<KnowledgeRecord>>;

// =============================================================================
// Jobs and results
// =============================================================================

export interface DeviceSelector {
  serial?: string;
  tags: string[];
}

export interface AppTarget {
  packageName: string;
  entryActivity?: string;
}

export interface JobGoal {
  /** Screen name (or suffix of one) that ends the session when observed */
  screen?: string;
  description?: string;
}

export interface JobDescriptor {
  id: string;
  app: AppTarget;
  selector: DeviceSelector;
  stepBudget?: number;
  timeBudgetMs?: number;
  goal?: JobGoal;
  /** Screen name (or suffix of one) to reach through a known path before exploring */
  startScreen?: string;
  source?: string;
}

export type DoneReason = 'goal-reached' | 'oracle-done' | 'budget-exhausted' | 'time-exhausted' | 'stopped';

export type FailReason = 'capture' | 'oracle-unavailable' | 'recovery' | 'internal';

export type SessionStatus = 'done' | 'failed';

export interface SessionResult {
  jobId: string;
  app: string;
  deviceSerial: string;
  status: SessionStatus;
  reason: DoneReason | FailReason;
  /** Human-readable explanation of the terminal state */
  message: string;
  stepsTaken: number;
  visitedNodes: number;
  nodes: GraphNode[];
  edges: GraphEdge[];
  fallbackSteps: number;
  startedAt: number;
  elapsedMs: number;
}

export interface UnassignedJob {
  jobId: string;
  reason: string;
}

export interface RunTotals {
  sessions: number;
  done: number;
  failed: number;
  nodes: number;
  edges: number;
  steps: number;
  crashes: number;
}

export interface RunSummary {
  results: SessionResult[];
  unassigned: UnassignedJob[];
  notStarted: string[];
  ceilingHit: boolean;
  elapsedMs: number;
  totals: RunTotals;
}
