import type { Done, Fail, Outcome, OutcomeMeta } from "./outcome";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export function fail<E>(error: E, meta: OutcomeMeta = {}): Fail<E> {
  return { tag: "Fail", error, meta };
}

/**
 * Run `fn`, turning exceptions recognised by `recognise` into a `Fail`.
 * Anything else is rethrown untouched.
 */
export function attempt<A, E>(
  fn: () => A,
  recognise: (e: unknown) => E | undefined
): Outcome<A, E> {
  try {
    return done(fn());
  } catch (e) {
    const error = recognise(e);
    if (error === undefined) throw e;
    return fail(error);
  }
}
