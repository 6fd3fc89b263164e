/**
 * State Module
 *
 * @module state
 */

export * from './StateMachine.js';
