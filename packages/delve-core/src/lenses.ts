/**
 * State updates for the research loop
 */

import { BaseContext } from './types';

/**
 * Pure state update: returns a function that shallow-merges `updates` into state
 */
export const updateState = <T extends BaseContext>(updates: Partial<T>) => {
  return (state: T): T => {
    return { ...state, ...updates };
  };
};
