/**
 * @module
 * Test helpers: the virtual clock, the action-recording store and the state
 * history tracker.
 */

export * from './test-clock';
export * from './test-store';
export * from './state-history';
