import { Digest, generalHash } from './hasher';

export const EMPTY_MERKLE_SENTINEL = 'empty';

/**
 * Ordered merkle root over leaf strings. Leaves are combined pairwise, left to
 * right, by hashing the concatenated strings; an odd trailing leaf is paired
 * with itself. A single leaf is returned unchanged, so the root is not always
 * a digest.
 */
export function computeMerkleRoot(leaves: readonly string[]): string {
  if (leaves.length === 0) {
    return generalHash(EMPTY_MERKLE_SENTINEL);
  }

  if (leaves.length === 1) {
    return leaves[0];
  }

  let level: string[] = [...leaves];

  while (level.length > 1) {
    const next: Digest[] = [];

    for (let index = 0; index < level.length; index += 2) {
      const left = level[index];
      const right = index + 1 < level.length ? level[index + 1] : left;
      next.push(generalHash(`${left}${right}`));
    }

    level = next;
  }

  return level[0];
}
