import { describe, it, expect } from 'vitest';
import { Differentiator } from '../../../../src/control/pid/differentiator.js';

describe('Differentiator', () => {
  it('should return the initial value on the first sample, not the new value', () => {
    expect(new Differentiator(0).compute(5.0, 0)).toBe(0);
    expect(new Differentiator(7).compute(5.0, 0)).toBe(7);
  });

  it('should return the secant slope on the second sample', () => {
    const differentiator = new Differentiator(0);

    expect(differentiator.compute(5.0, 10)).toBe(0);
    expect(differentiator.compute(9.0, 12)).toBe(2.0);
  });

  it('should slope from the most recent sample', () => {
    const differentiator = new Differentiator(0);
    differentiator.compute(5, 0);
    differentiator.compute(9, 2);

    expect(differentiator.compute(6, 3)).toBe(-3);
    expect(differentiator.lastSample).toEqual({ value: 6, timestamp: 3 });
  });

  it('should have no sample before the first call', () => {
    expect(new Differentiator(3).lastSample).toBeUndefined();
  });

  describe('zero-length interval', () => {
    it('should return Infinity for a rising value', () => {
      const differentiator = new Differentiator();
      differentiator.compute(5, 1);

      expect(differentiator.compute(9, 1)).toBe(Infinity);
    });

    it('should return -Infinity for a falling value', () => {
      const differentiator = new Differentiator();
      differentiator.compute(5, 1);

      expect(differentiator.compute(3, 1)).toBe(-Infinity);
    });

    it('should return NaN for an unchanged value', () => {
      const differentiator = new Differentiator();
      differentiator.compute(5, 1);

      expect(differentiator.compute(5, 1)).toBeNaN();
    });
  });

  it('should invert the slope sign for a decreasing timestamp', () => {
    const differentiator = new Differentiator();
    differentiator.compute(0, 2);

    expect(differentiator.compute(4, 0)).toBe(-2);
  });

  it('should return to cold start after reset', () => {
    const differentiator = new Differentiator(1.5);
    differentiator.compute(5, 0);
    differentiator.compute(9, 2);

    differentiator.reset();

    expect(differentiator.lastSample).toBeUndefined();
    expect(differentiator.compute(100, 50)).toBe(1.5);
  });
});
