/**
 * Process-wide count of live task nodes, for leak diagnostics. Kept in a
 * SharedArrayBuffer so a worker given {@link getInstanceCounterBuffer} sees
 * and updates the same count.
 */

const buffer = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT);
const counter = new Int32Array(buffer);

/** Number of task nodes constructed and not yet disposed. */
export function getInstanceCount(): number {
  return Atomics.load(counter, 0);
}

/** The buffer backing the live count, to hand to worker threads. */
export function getInstanceCounterBuffer(): SharedArrayBuffer {
  return buffer;
}

/** @internal */
export function incrementInstanceCount(): void {
  Atomics.add(counter, 0, 1);
}

/** @internal */
export function decrementInstanceCount(): void {
  Atomics.sub(counter, 0, 1);
}
