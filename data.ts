import { setImmediate } from "node:timers";

/** dataset */
// lazy because the iterable protocol on its own is ambiguous
// on whether an iterable can be iterated over more than once
// this ensures it can be created a new iterable for every use
export type Dataset<T> = () => Iterable<T>;

/** async dataset, same contract for async iterables */
export type AsyncDataset<T> = () => AsyncIterable<T>;

/** log sink */
export type Logger = (message: string) => void;

/** create dataset from array-like */
export const fromArray =
  <T>(data: ArrayLike<T>): Dataset<T> =>
  () =>
    Array.from(data).values();

/** export dataset to array */
export const toArray = <T>(data: Dataset<T>): Array<T> => Array.from(data());

// data pipelines

/** create data pipeline */
export const pipeline = pipe;

/** combine rows into batches of `size`, the remainder is yielded last */
export const batch =
  (size: number) =>
  <T>(data: Dataset<T>): Dataset<T[]> =>
    function* () {
      let rows: T[] = [];
      for (const row of data()) {
        rows.push(row);
        if (rows.length === size) {
          yield rows;
          rows = [];
        }
      }
      if (rows.length) yield rows;
    };

/** log dataset */
export const log =
  (logger: Logger = console.log, format: (row: unknown) => string = String) =>
  <T>(data: Dataset<T>): Dataset<T> =>
    function* () {
      let i = 0;
      for (const row of data()) {
        logger(`row(${i}): ${format(row)}`);
        yield row;
        i += 1;
      }
    };

/** map dataset */
export const map =
  <I, O>(fn: (input: I) => O) =>
  (data: Dataset<I>): Dataset<O> =>
    function* () {
      for (const row of data()) yield fn(row);
    };

/**
 * read ahead of the consumer
 * rows are pulled in the background, one per event loop turn,
 * until `depth` rows wait in the buffer
 */
export const prefetch =
  (depth: number) =>
  <T>(data: Dataset<T>): AsyncDataset<T> =>
    async function* () {
      if (depth < 1) {
        yield* data();
        return;
      }
      const rows = data()[Symbol.iterator]();
      const buffer: T[] = [];
      // shared with the background pulls
      const state: {
        done: boolean;
        stopped: boolean;
        scheduled: boolean;
        failure: { error: unknown } | null;
        wake: (() => void) | null;
      } = {
        done: false,
        stopped: false,
        scheduled: false,
        failure: null,
        wake: null,
      };

      const notify = () => {
        state.wake?.();
        state.wake = null;
      };
      const schedule = () => {
        if (state.scheduled || state.stopped || state.done) return;
        if (buffer.length >= depth) return;
        state.scheduled = true;
        setImmediate(pull);
      };
      const pull = () => {
        state.scheduled = false;
        if (state.stopped) return;
        try {
          const next = rows.next();
          if (next.done) state.done = true;
          else buffer.push(next.value);
        } catch (error) {
          state.failure = { error };
          state.done = true;
        }
        notify();
        schedule();
      };

      try {
        schedule();
        while (true) {
          if (buffer.length) {
            yield* buffer.splice(0, 1);
            schedule();
          } else if (state.failure) {
            throw state.failure.error;
          } else if (state.done) {
            return;
          } else {
            await new Promise<void>((resolve) => (state.wake = resolve));
          }
        }
      } finally {
        state.stopped = true;
        rows.return?.();
      }
    };

// utils

function pipe<A>(a: A): A;
function pipe<A, B>(a: A, ab: (a: A) => B): B;
function pipe<A, B, C>(a: A, ab: (a: A) => B, bc: (b: B) => C): C;
function pipe<A, B, C, D>(
  a: A,
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D
): D;
function pipe<A, B, C, D, E>(
  a: A,
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E
): E;
function pipe<A, B, C, D, E, F>(
  a: A,
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E,
  ef: (e: E) => F
): F;
function pipe(
  a: unknown,
  ...fns: Array<(input: unknown) => unknown>
): unknown {
  return fns.reduce((input, fn) => fn(input), a);
}
