/**
 * Oracle prompt rendering
 */

import { truncate } from '@roamer/shared';
import { actionKeyFor } from './fingerprint.js';
import type {
  ActionableElement,
  GraphEdge,
  GraphNode,
  Interaction,
  JobGoal,
  KnowledgeRecord,
  ObservedState,
} from './types.js';

export interface PromptContext {
  app: string;
  state: ObservedState;
  node: GraphNode;
  /** Most recent edges of this session, oldest first */
  history: GraphEdge[];
  /** Screen names by fingerprint, for rendering history */
  screenNames: ReadonlyMap<string, string>;
  knowledge?: Readonly<KnowledgeRecord>;
  /** Action keys already attempted from this node in this session */
  triedThisSession: string[];
  /** Action keys that crashed the app; the oracle must not pick them */
  banned?: string[];
  /** Visits to this screen since the last new screen was found */
  loopWarning?: { occurrences: number };
  goal?: JobGoal;
  maxElements: number;
}

export const SYSTEM_PROMPT = `You are exploring an Android app to discover as many distinct screens as possible and surface crashes.

Each turn you see the current screen and the elements you can act on. Pick exactly ONE action.

Respond with a single JSON object and nothing else:
{
  "action": "tap" | "long-press" | "type-text" | "submit" | "swipe" | "back" | "stop",
  "element": "e3",            // required for tap, long-press, type-text, submit and swipe
  "text": "hello",            // required for type-text
  "direction": "up" | "down" | "left" | "right",  // swipe only
  "reason": "why this action",
  "note": "optional one-line description of this screen",
  "goalReached": false        // with "stop": true when the goal is met
}

Use "submit" on a text field to press the keyboard's enter key once you have typed into it.
Never pick an action marked banned. Prefer actions you have not tried before. Use "back" to leave screens that are exhausted.
Use "stop" only when the goal is reached or nothing on any screen is left to explore.`;

function describeElement(element: ActionableElement): string {
  const parts = [`${element.id} [${element.role}]`];
  if (element.text) parts.push(`"${truncate(element.text, 40)}"`);
  if (element.label && element.label !== element.text) parts.push(`label="${truncate(element.label, 40)}"`);
  if (element.resourceId) parts.push(`(id: ${element.resourceId.split('/').pop()})`);
  return parts.join(' ');
}

function isBanned(interaction: Interaction, element: ActionableElement, context: PromptContext): boolean {
  return context.banned?.includes(actionKeyFor(interaction, element)) ?? false;
}

function markers(element: ActionableElement, context: PromptContext): string {
  const keys = element.interactions.map((interaction) => actionKeyFor(interaction, element));
  const flags: string[] = [];
  if (keys.some((key) => context.triedThisSession.includes(key))) flags.push('tried this run');
  else if (keys.some((key) => context.knowledge?.triedActions.includes(key))) flags.push('tried before');

  const banned = element.interactions.filter((interaction) => isBanned(interaction, element, context));
  if (banned.length > 0) flags.push(`banned: ${banned.join(', ')}`);
  else if (keys.some((key) => context.knowledge?.crashTriggers.includes(key))) flags.push('crashed the app before');
  return flags.length > 0 ? ` [${flags.join(', ')}]` : '';
}

export function renderHistory(history: GraphEdge[], screenNames: ReadonlyMap<string, string>): string[] {
  return history.map((edge) => {
    const from = screenNames.get(edge.source) ?? edge.source.slice(0, 8);
    const to = screenNames.get(edge.destination) ?? edge.destination.slice(0, 8);
    const change = edge.source === edge.destination ? 'stayed' : edge.discovered ? `new screen ${to}` : `-> ${to}`;
    return `${edge.step}. ${from}: ${edge.action.label} => ${edge.outcome} (${change})`;
  });
}

export function buildUserPrompt(context: PromptContext): string {
  const { state, node } = context;
  const lines: string[] = [
    `App: ${context.app}`,
    `Screen: ${state.screenName} (visit ${node.visits}, depth ${node.depth})`,
  ];

  if (context.goal?.description || context.goal?.screen) {
    lines.push(`Goal: ${context.goal.description ?? `reach ${context.goal.screen}`}`);
  }

  if (state.summary.texts.length > 0) {
    lines.push(`Visible text: ${truncate(state.summary.texts.join(' | '), 300)}`);
  }

  lines.push('', 'Actionable elements:');
  const shown = state.elements.slice(0, context.maxElements);
  if (shown.length === 0) {
    lines.push('(none, only "back" is possible)');
  }
  for (const element of shown) {
    const allowed = element.interactions.filter((interaction) => !isBanned(interaction, element, context));
    lines.push(`${describeElement(element)} -> ${allowed.join(', ') || 'nothing'}${markers(element, context)}`);
  }
  if (state.elements.length > shown.length) {
    lines.push(`... ${state.elements.length - shown.length} more not shown`);
  }

  if (context.history.length > 0) {
    lines.push('', 'Recent steps:', ...renderHistory(context.history, context.screenNames));
  }

  if (context.knowledge && context.knowledge.notes.length > 0) {
    lines.push('', `Notes from earlier runs: ${context.knowledge.notes.join('; ')}`);
  }

  if (context.loopWarning) {
    lines.push(
      '',
      `WARNING: you have been on this screen ${context.loopWarning.occurrences} times without finding a new screen. ` +
        'Choose something you have not tried, or go back.'
    );
  }

  lines.push('', 'Reply with one JSON object.');
  return lines.join('\n');
}

export function buildRepairPrompt(error: Error): string {
  return `Your last answer was invalid: ${error.message}
Reply again with ONE JSON object that uses an element id from the list above and an interaction that element supports.`;
}
