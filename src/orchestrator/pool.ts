export type Settled<T> =
  | { ok: true; value: T }
  | { ok: false; error: unknown };

/**
 * Run `worker` over `items` with at most `limit` in flight. Every outcome is
 * written to the slot of its input index, so the returned array lines up with
 * `items` whatever order the workers finish in.
 */
export async function settleWithLimit<I, T>(
  items: readonly I[],
  limit: number,
  worker: (item: I, index: number) => Promise<T>,
  onSettled?: (index: number, outcome: Settled<T>) => void,
): Promise<Settled<T>[]> {
  const slots = new Array<Settled<T> | undefined>(items.length).fill(undefined);
  const inFlight = new Map<number, Promise<number>>();
  const cap = Math.max(1, limit);
  let next = 0;

  const launch = (index: number) => {
    const settle = (outcome: Settled<T>) => {
      slots[index] = outcome;
      onSettled?.(index, outcome);
      return index;
    };
    const task = Promise.resolve()
      .then(() => worker(items[index], index))
      .then(
        value => settle({ ok: true, value }),
        (error: unknown) => settle({ ok: false, error }),
      );
    inFlight.set(index, task);
  };

  while (next < items.length || inFlight.size > 0) {
    while (next < items.length && inFlight.size < cap) launch(next++);
    const finished = await Promise.race(inFlight.values());
    inFlight.delete(finished);
  }

  return slots.map((slot, index) => {
    if (!slot) throw new Error(`worker ${index} never settled`);
    return slot;
  });
}
