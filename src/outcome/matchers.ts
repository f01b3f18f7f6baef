import type { Outcome, Done, Fail } from "./outcome";
import { isDone } from "./outcome";

export function match<A, E, R>(
  outcome: Outcome<A, E>,
  handlers: {
    done: (d: Done<A>) => R;
    fail: (f: Fail<E>) => R;
  }
): R {
  switch (outcome.tag) {
    case "Done":
      return handlers.done(outcome);
    case "Fail":
      return handlers.fail(outcome);
  }
}

export function mapOutcome<A, B, E>(o: Outcome<A, E>, fn: (a: A) => B): Outcome<B, E> {
  if (isDone(o)) {
    return { ...o, value: fn(o.value) };
  }
  return o;
}

export function flatMapOutcome<A, B, E>(
  o: Outcome<A, E>,
  fn: (a: A) => Outcome<B, E>
): Outcome<B, E> {
  if (isDone(o)) {
    return fn(o.value);
  }
  return o;
}

export function unwrap<A, E>(o: Outcome<A, E>, describe: (e: E) => string = String): A {
  if (isDone(o)) {
    return o.value;
  }
  throw new Error(describe(o.error));
}

export function unwrapOr<A, E>(o: Outcome<A, E>, defaultValue: A): A {
  return isDone(o) ? o.value : defaultValue;
}
