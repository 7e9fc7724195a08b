/**
 * Composition Operators
 * The research loop is assembled from these: each phase is a Step over the loop state
 */

import { Step, BaseContext } from './types';

/**
 * Identity morphism
 */
export const identity = <A extends BaseContext>(): Step<A> => {
  return async (a: A) => a;
};

/**
 * Kleisli composition for the Promise monad: (f ∘ g)(x) = f(g(x))
 */
const composeKleisli = <T extends BaseContext>(
  f: Step<T>,
  g: Step<T>
): Step<T> => {
  return async (state: T) => {
    const intermediate = await g(state);
    return await f(intermediate);
  };
};

/**
 * Execute steps in sequence
 *
 * @throws Error if steps is not an array or contains non-functions
 */
export const sequence = <T extends BaseContext>(steps: Step<T>[]): Step<T> => {
  if (!Array.isArray(steps)) {
    throw new Error('Steps must be an array');
  }

  steps.forEach((step, index) => {
    if (typeof step !== 'function') {
      throw new Error(`Step at index ${index} is not a function`);
    }
  });

  const [first, ...rest] = steps;
  if (!first) return identity<T>();

  // reduce left-to-right so the first step runs first
  return rest.reduce<Step<T>>((acc, step) => composeKleisli(step, acc), first);
};

/**
 * Loop while a condition is true
 *
 * `maxIterations` is a hard stop against a predicate that never turns false.
 */
export const loopWhile = <T extends BaseContext>(
  predicate: (state: T) => boolean,
  body: Step<T>,
  maxIterations = Number.POSITIVE_INFINITY
): Step<T> => {
  return async (state: T) => {
    let currentState = state;
    let iterations = 0;
    while (predicate(currentState)) {
      if (iterations >= maxIterations) {
        throw new Error(`loopWhile exceeded ${maxIterations} iterations`);
      }
      currentState = await body(currentState);
      iterations++;
    }
    return currentState;
  };
};

/**
 * Lift a (possibly sync) state transformation into a Step
 */
export const step = <T extends BaseContext>(
  name: string,
  fn: (state: T) => T | Promise<T>
): Step<T> => {
  const named = async (state: T) => fn(state);
  Object.defineProperty(named, 'name', { value: name });
  return named;
};
