/**
 * Gestalt Pattern Matching (Ratcliff/Obershelp)
 *
 * Similarity ratio used by the fuzzy pass and the confidence scorer.
 *
 * Algorithm:
 * 1. Find the longest common contiguous block of the two sequences
 *    (earliest in the first sequence on ties, then earliest in the second)
 * 2. Recurse on the pieces left and right of that block
 * 3. ratio = 2 * M / T, where M is the total size of all matched blocks
 *    and T the combined length of both sequences
 *
 * Sequences are compared by Unicode code point. When the second sequence
 * has 200 or more elements, elements occurring in more than 1% of it
 * (plus one) are "popular" and cannot seed a match, though a match may
 * still extend across them.
 */

// =============================================================================
// TYPES
// =============================================================================

/** [start in a, start in b, length] */
export type MatchingBlock = [number, number, number];

const AUTOJUNK_MIN_LENGTH = 200;

// =============================================================================
// SEQUENCE MATCHER
// =============================================================================

export class SequenceMatcher {
  private readonly a: string[];
  private readonly b: string[];
  private readonly b2j = new Map<string, number[]>();
  private blocks: MatchingBlock[] | null = null;

  constructor(a: string, b: string, autojunk: boolean = true) {
    this.a = Array.from(a);
    this.b = Array.from(b);
    this.indexB(autojunk);
  }

  private indexB(autojunk: boolean): void {
    this.b.forEach((elt, j) => {
      const indices = this.b2j.get(elt);
      if (indices) {
        indices.push(j);
      } else {
        this.b2j.set(elt, [j]);
      }
    });

    const n = this.b.length;
    if (autojunk && n >= AUTOJUNK_MIN_LENGTH) {
      const ntest = Math.floor(n / 100) + 1;
      for (const [elt, indices] of this.b2j) {
        if (indices.length > ntest) {
          this.b2j.delete(elt);
        }
      }
    }
  }

  /**
   * Longest matching block in a[alo:ahi] and b[blo:bhi]
   */
  findLongestMatch(alo: number, ahi: number, blo: number, bhi: number): MatchingBlock {
    const { a, b } = this;
    let besti = alo;
    let bestj = blo;
    let bestsize = 0;

    // j2len[j] = length of longest match ending with a[i-1] and b[j]
    let j2len = new Map<number, number>();
    for (let i = alo; i < ahi; i++) {
      const newj2len = new Map<number, number>();
      const indices = this.b2j.get(a[i]) ?? [];
      for (const j of indices) {
        if (j < blo) continue;
        if (j >= bhi) break;
        const k = (j2len.get(j - 1) ?? 0) + 1;
        newj2len.set(j, k);
        if (k > bestsize) {
          besti = i - k + 1;
          bestj = j - k + 1;
          bestsize = k;
        }
      }
      j2len = newj2len;
    }

    // Extend across popular elements that were left out of the index
    while (besti > alo && bestj > blo && a[besti - 1] === b[bestj - 1]) {
      besti--;
      bestj--;
      bestsize++;
    }
    while (
      besti + bestsize < ahi &&
      bestj + bestsize < bhi &&
      a[besti + bestsize] === b[bestj + bestsize]
    ) {
      bestsize++;
    }

    return [besti, bestj, bestsize];
  }

  /**
   * All matching blocks, ordered by position
   */
  getMatchingBlocks(): MatchingBlock[] {
    if (this.blocks) return this.blocks;

    const found: MatchingBlock[] = [];
    const queue: Array<[number, number, number, number]> = [[0, this.a.length, 0, this.b.length]];

    while (queue.length > 0) {
      const next = queue.pop();
      if (!next) break;
      const [alo, ahi, blo, bhi] = next;
      const [i, j, k] = this.findLongestMatch(alo, ahi, blo, bhi);
      if (k > 0) {
        found.push([i, j, k]);
        if (alo < i && blo < j) {
          queue.push([alo, i, blo, j]);
        }
        if (i + k < ahi && j + k < bhi) {
          queue.push([i + k, ahi, j + k, bhi]);
        }
      }
    }

    found.sort((x, y) => x[0] - y[0] || x[1] - y[1]);
    this.blocks = found;
    return found;
  }

  /**
   * Similarity in [0, 1]; two empty sequences are identical
   */
  ratio(): number {
    const total = this.a.length + this.b.length;
    if (total === 0) return 1.0;

    const matches = this.getMatchingBlocks().reduce((sum, block) => sum + block[2], 0);
    return (2.0 * matches) / total;
  }
}

// =============================================================================
// CONVENIENCE
// =============================================================================

/**
 * Gestalt similarity ratio of two strings
 */
export function similarityRatio(s1: string, s2: string): number {
  return new SequenceMatcher(s1, s2).ratio();
}
