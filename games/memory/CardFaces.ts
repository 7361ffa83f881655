/**
 * Face catalogue for the memory game.
 *
 * A card's `typeId` indexes into this list. Each face is a single
 * printable character so the terminal board stays aligned.
 */
export const CARD_FACES: readonly string[] = [
  '*', '#', '@', '%', '&', '+', '=', '~', '$',
  '?', '!', '^', 'o', 'x', '8', 'Z', 'M', 'W',
];

/** Face for a type id, wrapping around when ids exceed the catalogue. */
export function faceFor(typeId: number): string {
  return CARD_FACES[typeId % CARD_FACES.length];
}
