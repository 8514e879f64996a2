/**
 * Run `attempt` over the candidates in order and return the first non-null
 * result. Later candidates are never attempted once one succeeds.
 */
export async function tryInOrder<C, R>(
  candidates: Iterable<C>,
  attempt: (candidate: C, index: number) => Promise<R | null>
): Promise<R | null> {
  let index = 0;
  for (const candidate of candidates) {
    const result = await attempt(candidate, index);
    if (result !== null) {
      return result;
    }
    index += 1;
  }
  return null;
}
