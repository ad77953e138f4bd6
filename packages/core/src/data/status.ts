/**
 * Outcome of one execution. Ordered: a higher status is "more" of a result,
 * which the Pareto front and the health checks rely on.
 */
export enum Status {
  OVERRUN = 0,
  INVALID = 1,
  VALID = 2,
  INTERESTING = 3,
}

export function statusName(status: Status): string {
  switch (status) {
    case Status.OVERRUN:
      return 'overrun';
    case Status.INVALID:
      return 'invalid';
    case Status.VALID:
      return 'valid';
    case Status.INTERESTING:
      return 'interesting';
  }
}
