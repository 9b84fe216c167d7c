/**
 * Decision Oracle
 *
 * Builds a prompt from the current state, asks the LLM endpoint for one
 * action, and validates the reply against the live element set before any
 * other component sees it.
 *
 * Two retry loops live here:
 * - invalid replies are re-prompted with the error appended, up to
 *   `invalidRetryCap` times, then reported as `unresolved` so the session can
 *   apply its fallback policy;
 * - endpoint failures and timeouts are retried with exponential backoff up to
 *   `unavailableRetryCap` attempts, then surface as OracleUnavailableError.
 */

import { z } from 'zod';
import { Logger, retry, toError, withTimeout } from '@roamer/shared';
import { OracleInvalidActionError, OracleParseError, OracleUnavailableError } from './errors.js';
import type { OracleEndpoint, OracleMessage, OracleRequest } from './llm-endpoint.js';
import { actionKeyFor } from './fingerprint.js';
import { SYSTEM_PROMPT, buildRepairPrompt, buildUserPrompt, type PromptContext } from './prompts.js';
import type { ActionDescriptor, ActionableElement, Decision, StopReason } from './types.js';

// =============================================================================
// Response contract
// =============================================================================

export const OracleResponseSchema = z.object({
  action: z.enum(['tap', 'long-press', 'type-text', 'submit', 'swipe', 'back', 'stop']),
  element: z.union([z.string(), z.number().int()]).optional(),
  text: z.string().optional(),
  direction: z.enum(['up', 'down', 'left', 'right']).optional(),
  reason: z.string().optional(),
  note: z.string().optional(),
  goalReached: z.boolean().optional(),
});

export type OracleResponse = z.infer<typeof OracleResponseSchema>;

export type ParsedOracleResponse =
  | { kind: 'action'; action: ActionDescriptor; reasoning: string; note?: string }
  | { kind: 'stop'; reason: StopReason; message: string; note?: string }
  | { kind: 'invalid'; error: OracleParseError | OracleInvalidActionError };

function normalizeElementId(raw: string | number): string {
  const value = String(raw).trim();
  return /^\d+$/.test(value) ? `e${value}` : value;
}

function cleanNote(note: string | undefined): string | undefined {
  const trimmed = note?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Turn raw model text into a tagged result. Never throws. Element actions
 * whose key is in `banned` are rejected like any other invalid answer.
 */
export function parseOracleResponse(
  rawText: string,
  elements: ActionableElement[],
  banned: ReadonlySet<string> = new Set()
): ParsedOracleResponse {
  const jsonMatch = rawText.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    return { kind: 'invalid', error: new OracleParseError('No JSON object found in response', rawText) };
  }

  let json: unknown;
  try {
    json = JSON.parse(jsonMatch[0]);
  } catch (error) {
    return {
      kind: 'invalid',
      error: new OracleParseError(`Response is not valid JSON: ${toError(error).message}`, rawText),
    };
  }

  const parsed = OracleResponseSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return {
      kind: 'invalid',
      error: new OracleParseError(
        `Response does not match the decision format: ${issue ? `${issue.path.join('.') || 'response'}: ${issue.message}` : 'unknown issue'}`,
        rawText
      ),
    };
  }

  const response = parsed.data;
  const note = cleanNote(response.note);
  const reasoning = response.reason?.trim() || 'No reasoning provided';

  if (response.action === 'stop') {
    return {
      kind: 'stop',
      reason: response.goalReached ? 'goal-reached' : 'oracle-done',
      message: response.reason?.trim() || (response.goalReached ? 'Goal reached' : 'Oracle declared exploration complete'),
      note,
    };
  }

  if (response.action === 'back') {
    return { kind: 'action', action: { kind: 'back' }, reasoning, note };
  }

  const invalid = (message: string): ParsedOracleResponse => ({
    kind: 'invalid',
    error: new OracleInvalidActionError(message, rawText),
  });

  if (response.element === undefined) {
    return invalid(`"${response.action}" needs an "element" id`);
  }

  const elementId = normalizeElementId(response.element);
  const element = elements.find((candidate) => candidate.id === elementId);
  if (!element) {
    const range = elements.length > 0 ? `e1-e${elements.length}` : 'none';
    return invalid(`Element ${elementId} does not exist on this screen (valid: ${range})`);
  }

  if (!element.interactions.includes(response.action)) {
    return invalid(`Element ${elementId} does not support ${response.action} (supports: ${element.interactions.join(', ')})`);
  }

  if (banned.has(actionKeyFor(response.action, element))) {
    return invalid(`${response.action} on ${elementId} is banned because it crashed the app`);
  }

  if (response.action === 'type-text') {
    if (!response.text) {
      return invalid(`"type-text" on ${elementId} needs a non-empty "text"`);
    }
    return {
      kind: 'action',
      action: { kind: 'element', elementId, interaction: 'type-text', text: response.text },
      reasoning,
      note,
    };
  }

  if (response.action === 'swipe') {
    return {
      kind: 'action',
      action: { kind: 'element', elementId, interaction: 'swipe', direction: response.direction ?? 'down' },
      reasoning,
      note,
    };
  }

  return { kind: 'action', action: { kind: 'element', elementId, interaction: response.action }, reasoning, note };
}

// =============================================================================
// Oracle
// =============================================================================

export interface DecisionOracleOptions {
  invalidRetryCap?: number;
  unavailableRetryCap?: number;
  timeoutMs?: number;
  backoffBaseMs?: number;
  backoffFactor?: number;
  maxElements?: number;
  logger?: Logger;
}

export type OracleContext = Omit<PromptContext, 'maxElements'>;

export class DecisionOracle {
  private invalidRetryCap: number;
  private unavailableRetryCap: number;
  private timeoutMs: number;
  private backoffBaseMs: number;
  private backoffFactor: number;
  private maxElements: number;
  private logger: Logger;

  constructor(
    private endpoint: OracleEndpoint,
    options: DecisionOracleOptions = {}
  ) {
    this.invalidRetryCap = options.invalidRetryCap ?? 2;
    this.unavailableRetryCap = options.unavailableRetryCap ?? 3;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.backoffBaseMs = options.backoffBaseMs ?? 1000;
    this.backoffFactor = options.backoffFactor ?? 2;
    this.maxElements = options.maxElements ?? 60;
    this.logger = options.logger ?? new Logger({ prefix: '[oracle]' });
  }

  /**
   * Ask for the next action.
   *
   * @throws OracleUnavailableError once the endpoint retry budget is spent
   */
  async decide(context: OracleContext, logger: Logger = this.logger): Promise<Decision> {
    const messages: OracleMessage[] = [
      { role: 'user', content: buildUserPrompt({ ...context, maxElements: this.maxElements }) },
    ];
    const banned = new Set(context.banned ?? []);
    const maxAttempts = this.invalidRetryCap + 1;
    let lastError: Error = new Error('Oracle produced no answer');

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const rawText = await this.call({ system: SYSTEM_PROMPT, messages }, logger);
      const parsed = parseOracleResponse(rawText, context.state.elements, banned);

      if (parsed.kind === 'action') {
        return { type: 'action', action: parsed.action, reasoning: parsed.reasoning, note: parsed.note, attempts: attempt };
      }

      if (parsed.kind === 'stop') {
        return { type: 'stop', reason: parsed.reason, message: parsed.message, note: parsed.note, attempts: attempt };
      }

      lastError = parsed.error;
      logger.warn(`Oracle answer ${attempt}/${maxAttempts} rejected (${parsed.error.name}): ${parsed.error.message}`);
      messages.push({ role: 'assistant', content: rawText }, { role: 'user', content: buildRepairPrompt(parsed.error) });
    }

    return { type: 'unresolved', attempts: maxAttempts, error: lastError };
  }

  private async call(request: OracleRequest, logger: Logger): Promise<string> {
    let attempts = 0;

    try {
      return await retry(
        (attempt) => {
          attempts = attempt;
          return withTimeout((signal) => this.endpoint.complete(request, signal), this.timeoutMs, 'LLM call');
        },
        {
          retries: this.unavailableRetryCap,
          delay: this.backoffBaseMs,
          backoff: this.backoffFactor,
          onRetry: (error, attempt) =>
            logger.warn(`LLM call failed (attempt ${attempt}/${this.unavailableRetryCap}): ${error.message}`),
        }
      );
    } catch (error) {
      const cause = toError(error);
      throw new OracleUnavailableError(
        `LLM endpoint unavailable after ${attempts} attempt(s): ${cause.message}`,
        attempts,
        cause
      );
    }
  }
}
