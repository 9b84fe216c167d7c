/**
 * Engine wiring: config -> knowledge store, oracle, device pool, scheduler.
 */

import { Logger } from '@roamer/shared';
import type { EngineConfig } from './config.js';
import { DecisionOracle } from './decision-oracle.js';
import { DevicePool, type DeviceHandle } from './device-pool.js';
import { KnowledgeStore } from './knowledge-store.js';
import { AiSdkEndpoint, type OracleEndpoint } from './llm-endpoint.js';
import { SessionScheduler } from './scheduler.js';
import type { JobDescriptor, RunSummary } from './types.js';

export interface RunExplorationOptions {
  config: EngineConfig;
  jobs: JobDescriptor[];
  devices: DeviceHandle[];
  /** Defaults to the AI SDK endpoint for the configured provider */
  endpoint?: OracleEndpoint;
  logger?: Logger;
  signal?: AbortSignal;
}

export async function runExploration(options: RunExplorationOptions): Promise<RunSummary> {
  const { config } = options;
  const logger = options.logger ?? new Logger({ level: config.logging.level });

  const knowledge = await KnowledgeStore.open({
    path: config.knowledge.path,
    wipe: config.knowledge.wipe,
    logger: logger.child('[knowledge]'),
  });

  const endpoint =
    options.endpoint ??
    new AiSdkEndpoint({
      provider: config.oracle.provider,
      model: config.oracle.model,
      temperature: config.oracle.temperature,
    });

  const oracle = new DecisionOracle(endpoint, { ...config.oracle, logger: logger.child('[oracle]') });
  const pool = new DevicePool(options.devices, { logger: logger.child('[pool]') });
  const scheduler = new SessionScheduler({ pool, knowledge, oracle, config, logger: logger.child('[scheduler]') });

  return scheduler.run(options.jobs, { signal: options.signal });
}
