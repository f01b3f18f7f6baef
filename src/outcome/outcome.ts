export interface OutcomeMeta {
  durationMs?: number;
}

export interface Done<A> {
  readonly tag: "Done";
  readonly value: A;
  readonly meta: OutcomeMeta;
}

export interface Fail<E> {
  readonly tag: "Fail";
  readonly error: E;
  readonly meta: OutcomeMeta;
}

export type Outcome<A, E> = Done<A> | Fail<E>;

export function isDone<A, E>(o: Outcome<A, E>): o is Done<A> {
  return o.tag === "Done";
}

export function isFail<A, E>(o: Outcome<A, E>): o is Fail<E> {
  return o.tag === "Fail";
}
