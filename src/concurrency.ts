/**
 * Fan-out helpers for per-author work.
 *
 * settleAll runs every task concurrently and converts each outcome into a
 * typed result, so one author's failure never cancels or hides the others.
 * withTimeout puts a deadline on a single remote call and cancels it on expiry.
 */

import { TimeoutError } from "./errors.js";

export type TaskResult<T> =
  | { readonly ok: true; readonly label: string; readonly value: T }
  | { readonly ok: false; readonly label: string; readonly error: unknown };

export interface LabeledTask<T> {
  label: string;
  run: () => Promise<T>;
}

export async function settleAll<T>(tasks: readonly LabeledTask<T>[]): Promise<TaskResult<T>[]> {
  return Promise.all(
    tasks.map(async ({ label, run }): Promise<TaskResult<T>> => {
      try {
        return { ok: true, label, value: await run() };
      } catch (error) {
        return { ok: false, label, error };
      }
    })
  );
}

/** Values of the successful results, in task order. */
export function successes<T>(results: readonly TaskResult<T>[]): T[] {
  const values: T[] = [];
  for (const r of results) {
    if (r.ok) values.push(r.value);
  }
  return values;
}

/**
 * Run `run` with a deadline of `ms`. On expiry the signal handed to `run` is
 * aborted and the call rejects with TimeoutError, so the remote request
 * behind it is torn down instead of left running.
 * The timer is always cleared, so a finished call never keeps the process alive.
 */
export function withTimeout<T>(run: (signal: AbortSignal) => Promise<T>, ms: number, label: string): Promise<T> {
  const controller = new AbortController();
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      const err = new TimeoutError(label, ms);
      controller.abort(err);
      reject(err);
    }, ms);
    run(controller.signal).then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      }
    );
  });
}
