import { updateState } from '../lenses';

type Draft = {
  readonly title: string;
  readonly tags: readonly string[];
  readonly revision: number;
};

const draft: Draft = { title: 'Solar sails', tags: ['space'], revision: 1 };

describe('lenses', () => {
  describe('updateState', () => {
    it('should shallow-merge the updates', () => {
      expect(updateState<Draft>({ revision: 2 })(draft)).toEqual({ title: 'Solar sails', tags: ['space'], revision: 2 });
    });

    it('should leave the original untouched', () => {
      updateState<Draft>({ title: 'Light sails' })(draft);
      expect(draft.title).toBe('Solar sails');
    });

    it('should return an equal copy for empty updates', () => {
      const result = updateState<Draft>({})(draft);
      expect(result).toEqual(draft);
      expect(result).not.toBe(draft);
    });
  });
});
