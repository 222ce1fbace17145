/**
 * Error types raised by the rank estimators.
 *
 * InvalidInputError is thrown before any work starts; nothing is retried or
 * corrected. NonConvergenceError is raised only by the iterative solver once
 * its sweep cap is exhausted.
 */

export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

export class NonConvergenceError extends Error {
  readonly iterations: number;
  readonly delta: number;

  constructor(iterations: number, delta: number) {
    super(`Iteration did not converge after ${iterations} sweeps (last max delta ${delta})`);
    this.name = 'NonConvergenceError';
    this.iterations = iterations;
    this.delta = delta;
  }
}
