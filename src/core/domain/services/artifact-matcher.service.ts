export type ArtifactRole = "item" | "modifier";

export interface RequiredArtifactPair {
  itemFile: string;
  modifierFile: string;
}

export type ArtifactMatch =
  | { kind: "matched"; pair: RequiredArtifactPair }
  | { kind: "missing"; missing: ArtifactRole[] };

export const ARTIFACT_KEYWORDS: Readonly<Record<ArtifactRole, string>> = {
  item: "itemselectiondetails",
  modifier: "modifiersselectiondetails",
};

/**
 * Picks the item-selection and modifier-selection exports out of a folder
 * listing. Matching is a case-insensitive substring test, so prefixes and
 * extensions do not matter. When several names match a keyword the first
 * one in `filenames` wins.
 */
export function matchArtifacts(filenames: readonly string[]): ArtifactMatch {
  const itemFile = findFirst(filenames, ARTIFACT_KEYWORDS.item);
  const modifierFile = findFirst(filenames, ARTIFACT_KEYWORDS.modifier);

  if (itemFile !== undefined && modifierFile !== undefined) {
    return { kind: "matched", pair: { itemFile, modifierFile } };
  }

  const missing: ArtifactRole[] = [];
  if (itemFile === undefined) missing.push("item");
  if (modifierFile === undefined) missing.push("modifier");
  return { kind: "missing", missing };
}

function findFirst(
  filenames: readonly string[],
  keyword: string,
): string | undefined {
  return filenames.find((name) => name.toLowerCase().includes(keyword));
}
