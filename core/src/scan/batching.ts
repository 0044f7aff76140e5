/**
 * Group an async sequence into arrays of `size` items; the last group may be
 * shorter. Nothing is yielded for an empty sequence.
 *
 * Stopping the returned generator early stops the underlying sequence too.
 */
export async function* chunkAsync<T>(items: AsyncIterable<T>, size: number): AsyncGenerator<T[], void, undefined> {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
  }
  let chunk: T[] = [];
  for await (const item of items) {
    chunk.push(item);
    if (chunk.length === size) {
      yield chunk;
      chunk = [];
    }
  }
  if (chunk.length > 0) {
    yield chunk;
  }
}
