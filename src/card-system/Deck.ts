/**
 * Pair-deck operations for the memory-match engine.
 *
 * A memory "deck" is a plain array of face ids in which every id
 * appears exactly twice. This module builds and shuffles such arrays;
 * the board turns them into cards.
 */

/**
 * Shuffle an array in place using the Fisher-Yates algorithm.
 *
 * An optional random number generator can be supplied for
 * deterministic testing. The generator must return a value
 * in [0, 1) (same contract as Math.random).
 *
 * @returns The same array reference (mutated).
 */
export function shuffle<T>(items: T[], rng: () => number = Math.random): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [items[i], items[j]] = [items[j], items[i]];
  }
  return items;
}

/**
 * Number of cards actually dealt for a board with `cellCount` slots.
 * An odd board leaves its last slot empty.
 */
export function pairedCardCount(cellCount: number): number {
  return cellCount - (cellCount % 2);
}

/**
 * Build a shuffled list of face ids in which each chosen face
 * appears exactly twice.
 *
 * Faces are picked at random from `0..faceCount-1`. When the board
 * needs more pairs than there are faces, the picked faces are reused
 * in order, so some ids then appear four (or more) times.
 *
 * @throws If `cellCount` is not a positive integer.
 * @throws If `faceCount` is less than 1.
 */
export function createPairedTypeIds(
  cellCount: number,
  faceCount: number,
  rng: () => number = Math.random,
): number[] {
  if (!Number.isInteger(cellCount) || cellCount < 1) {
    throw new Error(`cellCount must be a positive integer, got ${cellCount}`);
  }
  if (!Number.isInteger(faceCount) || faceCount < 1) {
    throw new Error(`faceCount must be a positive integer, got ${faceCount}`);
  }

  if (cellCount % 2 !== 0) {
    console.warn(
      '[Deck] Grid size is odd; one card will not have a pair. Reducing total cards by one.',
    );
  }

  const pairs = pairedCardCount(cellCount) / 2;
  const faces = shuffle(
    Array.from({ length: faceCount }, (_, i) => i),
    rng,
  );

  const ids: number[] = [];
  for (let i = 0; i < pairs; i++) {
    const id = faces[i % faces.length];
    ids.push(id, id);
  }

  return shuffle(ids, rng);
}
