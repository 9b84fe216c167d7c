/**
 * @roamer/explorer
 *
 * LLM-driven exploration engine for Android apps.
 */

export * from './types.js';
export * from './errors.js';
export * from './config.js';
export * from './fingerprint.js';
export * from './activity-graph.js';
export * from './knowledge-store.js';
export * from './prompts.js';
export * from './llm-endpoint.js';
export * from './decision-oracle.js';
export * from './driver.js';
export * from './action-executor.js';
export * from './adb-driver.js';
export * from './session.js';
export * from './device-pool.js';
export * from './scheduler.js';
export * from './jobs.js';
export * from './engine.js';
