import { InputValidationError } from "../utils/errors";

export const MAX_PHOTOS_PER_SUB_ITEM = 5;
export const SUB_ITEM_COUNT = 9;
export const PHOTO_EXTENSION = "jpg";
export const PHOTO_MIME_TYPE = "image/jpeg";

/** Container choices as shown to the user. */
export const CONTAINER_CHOICES: readonly string[] = [
  "CAJA A", "CAJA B", "CAJA C", "CAJA D",
  "CAJA E", "CAJA F", "CAJA G", "CAJA H",
];

/** Uppercase and replace every single space with `_`, as the archive names expect. */
export function normalizeLabel(raw: string): string {
  return raw.trim().replace(/ /g, "_").toUpperCase();
}

export function subItemName(index: number): string {
  return `ACRILICO_${index}`;
}

/** `ACRILICO_3` → `ACRILICO 3` for chat text. */
export function displaySubItem(name: string): string {
  return name.replace(/_/g, " ");
}

/** Returns the normalized container, or undefined when it is not one of the offered choices. */
export function matchContainer(input: string): string | undefined {
  const normalized = normalizeLabel(input);
  if (!normalized) return undefined;
  return CONTAINER_CHOICES.map(normalizeLabel).find((choice) => choice === normalized);
}

const INTEGER = /^[+-]?\d+$/;

/**
 * Parses "1, 3,3,12" into [ACRILICO_1, ACRILICO_3].
 * Every token must be an integer; values outside 1..9 are dropped and repeats keep
 * their first position. Throws when nothing usable remains.
 */
export function parseSubItemSelection(input: string): string[] {
  const tokens = input.split(",").map((token) => token.trim());
  if (tokens.some((token) => !INTEGER.test(token))) {
    throw new InputValidationError(`Not a comma-separated list of numbers: "${input}"`);
  }

  const picked: number[] = [];
  for (const token of tokens) {
    const index = Number.parseInt(token, 10);
    if (index < 1 || index > SUB_ITEM_COUNT) continue;
    if (!picked.includes(index)) picked.push(index);
  }

  if (picked.length === 0) {
    throw new InputValidationError(`No sub-item between 1 and ${SUB_ITEM_COUNT} in "${input}"`);
  }
  return picked.map(subItemName);
}

/** Folder that groups every upload for a point of sale. */
export function folderNameFor(pointOfSale: string): string {
  return normalizeLabel(pointOfSale);
}

/** `{POINT_OF_SALE}_{CONTAINER}_{SUBITEM}_{ordinal}.jpg` */
export function buildFileName(pointOfSale: string, container: string, subItem: string, ordinal: number): string {
  return `${normalizeLabel(pointOfSale)}_${normalizeLabel(container)}_${subItem}_${ordinal}.${PHOTO_EXTENSION}`;
}
