/**
 * Hooks
 */

export { useLooks, type ActionResult } from './useLooks';
export { useAccessorySelection } from './useAccessorySelection';
