/** Identifier assigned to every vertex of a graph. */
export type VertexId = number;

/** Function returning the next identifier of a sequence. */
export type IdGenerator = () => VertexId;

/**
 * Creates a strictly increasing identifier sequence scoped to one graph. The
 * first call returns `start + 1`. Allocation is a single synchronous step so
 * concurrent callers on the event loop can never observe the same value.
 */
export function createIdGenerator(start: VertexId = 0): IdGenerator {
  if (!Number.isSafeInteger(start) || start < 0) {
    throw new RangeError(`identifier sequence must start at a non-negative integer, received ${start}`);
  }
  let last = start;
  return () => {
    if (last >= Number.MAX_SAFE_INTEGER) {
      throw new RangeError("vertex identifier space exhausted");
    }
    last += 1;
    return last;
  };
}
