import { normalizeText } from './normalize.js';

/**
 * Index every character of `b` to the ascending positions it occurs at.
 */
function indexPositions(b: string): Map<string, number[]> {
    const positions = new Map<string, number[]>();
    for (let j = 0; j < b.length; j++) {
        const ch = b.charAt(j);
        const list = positions.get(ch);
        if (list) {
            list.push(j);
        } else {
            positions.set(ch, [j]);
        }
    }
    return positions;
}

/**
 * Longest common block of a[alo:ahi] and b[blo:bhi].
 * Among equally long blocks the one starting earliest in `a`, then in `b`, wins.
 */
function longestMatch(
    a: string,
    positions: Map<string, number[]>,
    alo: number,
    ahi: number,
    blo: number,
    bhi: number
): { i: number; j: number; size: number } {
    let best = { i: alo, j: blo, size: 0 };
    let runs = new Map<number, number>();

    for (let i = alo; i < ahi; i++) {
        const next = new Map<number, number>();
        for (const j of positions.get(a.charAt(i)) ?? []) {
            if (j < blo) continue;
            if (j >= bhi) break;
            const size = (runs.get(j - 1) ?? 0) + 1;
            next.set(j, size);
            if (size > best.size) {
                best = { i: i - size + 1, j: j - size + 1, size };
            }
        }
        runs = next;
    }

    return best;
}

/**
 * Total size of the matching blocks found by Ratcliff/Obershelp:
 * take the longest common block, then recurse on both sides of it.
 */
export function countMatchingCharacters(a: string, b: string): number {
    const positions = indexPositions(b);
    const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
    let matched = 0;

    for (let range = queue.pop(); range; range = queue.pop()) {
        const [alo, ahi, blo, bhi] = range;
        const { i, j, size } = longestMatch(a, positions, alo, ahi, blo, bhi);
        if (size === 0) continue;

        matched += size;
        if (alo < i && blo < j) queue.push([alo, i, blo, j]);
        if (i + size < ahi && j + size < bhi) queue.push([i + size, ahi, j + size, bhi]);
    }

    return matched;
}

/**
 * Sequence-alignment ratio `2 * M / (|a| + |b|)`, in [0, 1].
 * Inputs are compared as given; see `titleSimilarity` for the normalized form.
 */
export function sequenceRatio(a: string, b: string): number {
    const total = a.length + b.length;
    if (total === 0) return 1.0;
    return (2 * countMatchingCharacters(a, b)) / total;
}

/**
 * Similarity of two titles after normalization.
 * 0 when either side is empty, 1 when both normalize to the same string.
 *
 * Block selection depends on argument order, so the pair is sorted first
 * and the score is the same whichever way round it is called.
 */
export function titleSimilarity(a: string | null | undefined, b: string | null | undefined): number {
    const normA = normalizeText(a);
    const normB = normalizeText(b);

    if (!normA || !normB) return 0.0;
    if (normA === normB) return 1.0;

    return normA < normB ? sequenceRatio(normA, normB) : sequenceRatio(normB, normA);
}
