import type { Printable } from "@planar/std";

/**
 * Anything text can be written to: `process.stdout`, a Node `Writable`, or a
 * plain collector object.
 */
export interface TextSink {
  write(chunk: string): unknown;
}

/**
 * Write the printed form of `value` to `sink` and return the sink, so calls
 * can be chained.
 *
 * @example
 * ```ts
 * print(process.stdout, point2d(3, 4), printablePoint(printableNumber)); // 3, 4
 * ```
 */
export function print<S extends TextSink, A>(sink: S, value: A, P: Printable<A>): S {
  sink.write(P.display(value));
  return sink;
}
