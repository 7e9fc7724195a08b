import { identity, loopWhile, sequence, step } from '../composition';
import { updateState } from '../lenses';
import { Step } from '../types';

type Counter = {
  readonly value: number;
  readonly trail: readonly string[];
};

const push = (name: string): Step<Counter> =>
  step<Counter>(name, state => ({ ...state, trail: [...state.trail, name] }));

const start: Counter = { value: 0, trail: [] };

describe('composition', () => {
  describe('sequence', () => {
    it('should validate that steps is an array', () => {
      const notArray: unknown = 'not-array';
      expect(() => sequence(notArray as Step<Counter>[])).toThrow('Steps must be an array');
    });

    it('should validate that every step is a function', () => {
      const steps: unknown[] = [push('a'), 'not-a-function'];
      expect(() => sequence(steps as Step<Counter>[])).toThrow('Step at index 1 is not a function');
    });

    it('should return the state unchanged for no steps', async () => {
      await expect(sequence<Counter>([])(start)).resolves.toEqual(start);
    });

    it('should run steps first to last', async () => {
      const result = await sequence([push('a'), push('b'), push('c')])(start);
      expect(result.trail).toEqual(['a', 'b', 'c']);
    });

    it('should stop at the first failing step', async () => {
      const boom = step<Counter>('boom', () => {
        throw new Error('boom');
      });
      const after = jest.fn(async (state: Counter) => state);

      await expect(sequence([push('a'), boom, after])(start)).rejects.toThrow('boom');
      expect(after).not.toHaveBeenCalled();
    });
  });

  describe('loopWhile', () => {
    const increment = step<Counter>('increment', state => updateState<Counter>({ value: state.value + 1 })(state));

    it('should repeat the body while the predicate holds', async () => {
      const result = await loopWhile((state: Counter) => state.value < 3, increment)(start);
      expect(result.value).toBe(3);
    });

    it('should not run the body when the predicate is false at once', async () => {
      const result = await loopWhile((state: Counter) => state.value < 0, increment)(start);
      expect(result).toBe(start);
    });

    it('should throw once the iteration limit is passed', async () => {
      await expect(loopWhile(() => true, increment, 5)(start)).rejects.toThrow('loopWhile exceeded 5 iterations');
    });

    it('should allow exactly maxIterations iterations', async () => {
      const result = await loopWhile((state: Counter) => state.value < 5, increment, 5)(start);
      expect(result.value).toBe(5);
    });
  });

  describe('step', () => {
    it('should name the step and lift sync functions', async () => {
      const named = step<Counter>('double', state => ({ ...state, value: state.value * 2 }));

      expect(named.name).toBe('double');
      await expect(named({ ...start, value: 4 })).resolves.toEqual({ value: 8, trail: [] });
    });
  });

  it('identity should return its input', async () => {
    await expect(identity<Counter>()(start)).resolves.toBe(start);
  });
});
