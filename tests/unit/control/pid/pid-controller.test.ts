/**
 * Unit tests for the PID controller
 */

import { describe, it, expect } from 'vitest';
import { pino, type Logger } from 'pino';
import { PidController } from '../../../../src/control/pid/pidController.js';
import { createManualClock, createSequenceClock } from '../../../../src/control/clock.js';
import { GainsValidationError, UnsetSetpointError } from '../../../../src/api/errors.js';

function collectingLogger(): { logger: Logger; lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(message: string) {
        lines.push(JSON.parse(message));
      },
    }
  );
  return { logger, lines };
}

describe('PidController', () => {
  describe('construction', () => {
    it.each([
      [0, 0, 0],
      [100, 100, 100],
      [10, 100, 0.1],
      [50.5, 0, 99.999],
    ])('should accept gains p=%s i=%s d=%s', (pGain, iGain, dGain) => {
      const controller = new PidController({ pGain, iGain, dGain });
      expect(controller.gains).toEqual({ p: pGain, i: iGain, d: dGain });
    });

    it.each([
      [-0.1, 0, 0],
      [0, 100.1, 0],
      [0, 0, -1],
      [Number.NaN, 0, 0],
      [0, Number.POSITIVE_INFINITY, 0],
    ])('should reject gains p=%s i=%s d=%s', (pGain, iGain, dGain) => {
      expect(() => new PidController({ pGain, iGain, dGain })).toThrow(GainsValidationError);
    });

    it('should report every out-of-range gain', () => {
      const result = PidController.create({ pGain: -1, iGain: 0, dGain: 101 });

      expect(result.err).toBe(true);
      if (result.err) {
        expect(result.val.code).toBe('ValidationError');
        expect(result.val.issues.map((issue) => [issue.field, issue.value])).toEqual([
          ['p', -1],
          ['d', 101],
        ]);
      }
    });

    it('should return a controller from create() for valid gains', () => {
      const result = PidController.create({ pGain: 1, iGain: 2, dGain: 3, setpoint: 4 });

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.val.setpoint).toBe(4);
      }
    });

    it('should freeze the gains', () => {
      const controller = new PidController({ pGain: 1, iGain: 2, dGain: 3 });
      expect(Object.isFrozen(controller.gains)).toBe(true);
    });
  });

  describe('getOutput', () => {
    it('should return the proportional term only on the first call', () => {
      const controller = new PidController({ pGain: 10, iGain: 0, dGain: 0, setpoint: 1.0, clock: createManualClock().now });

      expect(controller.getOutput(0.0)).toEqual({ output: 10.0, error: 1.0 });
    });

    it('should ignore integral and derivative gains on the first call', () => {
      const controller = new PidController({ pGain: 10, iGain: 5, dGain: 2, setpoint: 1.0, clock: createManualClock(3).now });

      expect(controller.getOutput(0.0)).toEqual({ output: 10.0, error: 1.0 });
    });

    it('should combine all three terms on later calls', () => {
      const clock = createManualClock(0);
      const controller = new PidController({ pGain: 10, iGain: 5, dGain: 2, setpoint: 1.0, clock: clock.now });

      controller.getOutput(0.0);
      clock.advance(0.5);
      const terms = controller.getTerms(0.5);

      // integral: 0.5 * (1 + 0.5) * 0.5 = 0.375, derivative: (0.5 - 1) / 0.5 = -1
      expect(terms).toEqual({
        output: 4.875,
        error: 0.5,
        proportional: 5,
        integral: 1.875,
        derivative: -2,
        timestamp: 0.5,
      });
    });

    it('should read the clock once per call', () => {
      const controller = new PidController({
        pGain: 1,
        iGain: 1,
        dGain: 0,
        setpoint: 0,
        clock: createSequenceClock([0, 2]),
      });

      controller.getOutput(-1);
      // integral: 0.5 * (1 + 3) * 2 = 4
      expect(controller.getOutput(-3)).toEqual({ output: 7, error: 3 });
    });

    it('should throw UnsetSetpointError for every measured value when unset', () => {
      const controller = new PidController({ pGain: 1, iGain: 1, dGain: 1 });

      for (const value of [0, -1, 1e9, Number.NaN]) {
        expect(() => controller.getOutput(value)).toThrow(UnsetSetpointError);
      }
    });

    it('should not advance state or read the clock while the setpoint is unset', () => {
      const controller = new PidController({
        pGain: 2,
        iGain: 1,
        dGain: 1,
        clock: createSequenceClock([7]),
      });

      expect(() => controller.getOutput(0)).toThrow('Setpoint not set');
      controller.setSetpoint(3);

      expect(controller.getOutput(1)).toEqual({ output: 4, error: 2 });
    });

    it('should throw again after the setpoint is cleared', () => {
      const controller = new PidController({ pGain: 1, iGain: 0, dGain: 0, setpoint: 1 });
      controller.clearSetpoint();

      expect(controller.setpoint).toBeUndefined();
      expect(() => controller.getOutput(0)).toThrow(UnsetSetpointError);
    });

    it('should propagate a non-finite derivative for a zero-length interval', () => {
      const controller = new PidController({
        pGain: 0,
        iGain: 0,
        dGain: 1,
        setpoint: 1,
        clock: createSequenceClock([4, 4]),
      });

      controller.getOutput(0);
      expect(controller.getOutput(0.5)).toEqual({ output: -Infinity, error: 0.5 });
    });

    it('should produce NaN from a zero derivative gain times an infinite slope', () => {
      const controller = new PidController({
        pGain: 0,
        iGain: 0,
        dGain: 0,
        setpoint: 1,
        clock: createSequenceClock([4, 4]),
      });

      controller.getOutput(0);
      expect(controller.getOutput(0.5).output).toBeNaN();
    });

    it('should warn when the output is not finite', () => {
      const { logger, lines } = collectingLogger();
      const controller = new PidController({
        pGain: 0,
        iGain: 0,
        dGain: 1,
        setpoint: 1,
        clock: createSequenceClock([4, 4]),
        logger,
      });

      controller.getOutput(0);
      controller.getOutput(0.5);

      expect(lines).toHaveLength(1);
      expect(lines[0].msg).toBe('PID output is NaN/Inf');
      expect(lines[0].level).toBe(40);
    });

    it('should replay identical inputs bit-for-bit', () => {
      const timestamps = [0.0011, 0.0023, 0.0031, 0.0049, 0.0052, 0.0067];
      const measured = [0, 0.12, 0.25, 0.31, 0.52, 0.7];

      const run = (): number[] => {
        const controller = new PidController({
          pGain: 10,
          iGain: 100,
          dGain: 0.1,
          setpoint: 1.0,
          clock: createSequenceClock(timestamps),
        });
        return measured.map((value) => controller.getOutput(value).output);
      };

      const first = run();
      const second = run();
      first.forEach((value, index) => {
        expect(Object.is(value, second[index])).toBe(true);
      });
    });
  });

  describe('replaceGains', () => {
    it('should replace all gains when valid', () => {
      const { logger, lines } = collectingLogger();
      const controller = new PidController({ pGain: 1, iGain: 1, dGain: 1, logger });

      const result = controller.replaceGains({ p: 2, i: 3, d: 4 });

      expect(result.ok).toBe(true);
      expect(controller.gains).toEqual({ p: 2, i: 3, d: 4 });
      expect(lines.map((line) => line.msg)).toEqual(['PID gains replaced']);
    });

    it('should keep the previous gains when any coefficient is invalid', () => {
      const controller = new PidController({ pGain: 1, iGain: 1, dGain: 1 });

      const result = controller.replaceGains({ p: 2, i: 300, d: 4 });

      expect(result.err).toBe(true);
      if (result.err) {
        expect(result.val).toBeInstanceOf(GainsValidationError);
        expect(result.val.message).toBe('Invalid gains: i=300 must be <= 100');
      }
      expect(controller.gains).toEqual({ p: 1, i: 1, d: 1 });
    });

    it('should use new gains on the next call without resetting accumulators', () => {
      const clock = createManualClock(0);
      const controller = new PidController({ pGain: 1, iGain: 0, dGain: 0, setpoint: 1, clock: clock.now });

      controller.getOutput(0);
      clock.advance(1);
      controller.replaceGains({ p: 0, i: 1, d: 0 });

      // integral: 0.5 * (1 + 1) * 1 = 1
      expect(controller.getOutput(0).output).toBe(1);
    });
  });

  describe('reset', () => {
    it('should return both accumulators to cold start', () => {
      const clock = createManualClock(0);
      const controller = new PidController({ pGain: 1, iGain: 1, dGain: 1, setpoint: 1, clock: clock.now });

      controller.getOutput(0);
      clock.advance(1);
      controller.getOutput(0.5);
      controller.reset();
      clock.advance(1);

      expect(controller.getOutput(0.25)).toEqual({ output: 0.75, error: 0.75 });
      expect(controller.gains).toEqual({ p: 1, i: 1, d: 1 });
      expect(controller.setpoint).toBe(1);
    });
  });
});
