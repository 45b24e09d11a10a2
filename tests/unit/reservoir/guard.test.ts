import { describe, it, expect } from 'vitest';
import { Guarded } from '../../../src/lib/reservoir/guard.js';

describe('Guarded', () => {
  it('should pass the owned state to the section and return its result', () => {
    const guarded = new Guarded({ count: 1 });

    const result = guarded.run((state) => {
      state.count += 1;
      return state.count * 10;
    });

    expect(result).toBe(20);
    expect(guarded.run((state) => state.count)).toBe(2);
  });

  it('should reject nested sections', () => {
    const guarded = new Guarded({ count: 0 });

    expect(() => guarded.run(() => guarded.run((state) => state.count))).toThrow(
      'Guarded state is already held by this task',
    );
  });

  it('should release the guard when a section throws', () => {
    const guarded = new Guarded({ count: 0 });

    expect(() =>
      guarded.run(() => {
        throw new Error('boom');
      }),
    ).toThrow('boom');

    expect(guarded.isHeld).toBe(false);
    expect(guarded.run((state) => state.count)).toBe(0);
  });
});
