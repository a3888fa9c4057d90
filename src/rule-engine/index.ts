/**
 * Rule Engine Module
 *
 * Shared plumbing for rule checks: the Result type that legality
 * checks and message decoding return.
 */
export const RULE_ENGINE_VERSION = '0.1.0';

export type { Ok, Err, Result } from './Result';
export { ok, err, mapResult, andThen, unwrap } from './Result';
