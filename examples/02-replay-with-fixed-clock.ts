#!/usr/bin/env tsx
/**
 * Deterministic Replay Example
 *
 * Feeds a recorded measurement series through the controller with a
 * sequence clock, so the outputs are identical on every run. Also shows
 * all-or-nothing gain replacement.
 *
 * Usage:
 *   tsx examples/02-replay-with-fixed-clock.ts
 */

import { PidController, createSequenceClock } from '../src/index.js';

const recorded: Array<{ t: number; measured: number }> = [
  { t: 0.0, measured: 0.0 },
  { t: 0.013, measured: 0.08 },
  { t: 0.021, measured: 0.19 },
  { t: 0.037, measured: 0.33 },
  { t: 0.052, measured: 0.51 },
  { t: 0.058, measured: 0.62 },
];

function main() {
  const controller = new PidController({
    pGain: 10,
    iGain: 100,
    dGain: 0.1,
    setpoint: 1.0,
    clock: createSequenceClock(recorded.map((row) => row.t)),
  });

  for (const row of recorded) {
    const { output, error } = controller.getOutput(row.measured);
    console.log(`t=${row.t.toFixed(3)} error=${error.toFixed(3)} output=${output.toFixed(4)}`);
  }

  const rejected = controller.replaceGains({ p: 10, i: 250, d: 0.1 });
  if (rejected.err) {
    console.log(`\n${rejected.val.message}; gains still`, controller.gains);
  }
}

main();
