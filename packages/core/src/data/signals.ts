/**
 * Control signals. These are not errors: they unwind from arbitrarily deep
 * draw calls to exactly one catch site in the runner.
 */

/** Conclusion of an execution. Carries the counter of the data it ends. */
export class StopTest extends Error {
  constructor(public readonly testCounter: number) {
    super(`StopTest(${testCounter})`);
    this.name = 'StopTest';
  }
}

/** Raised by assume(false) and reject(); the execution becomes INVALID. */
export class UnsatisfiedAssumption extends Error {
  constructor(public readonly reason?: string) {
    super(reason ?? 'Unsatisfied assumption');
    this.name = 'UnsatisfiedAssumption';
  }
}

export function isStopTest(error: unknown): error is StopTest {
  return error instanceof StopTest;
}
