import { Entry } from "./values";

// ══════════════════════════════════════════════════════════════════════════════
//  Subsequence filter used while a column is narrowing its items
// ══════════════════════════════════════════════════════════════════════════════

export interface FilterMatch {
    /** Index into the filtered target list. */
    readonly index: number;
    readonly score: number;
}

/** Text an entry is matched against. */
export function filterTarget(e: Entry): string {
    return e.title + "\n" + e.description;
}

/**
 * Case-insensitive subsequence score, or undefined when `query` is not a
 * subsequence of `text`. Contiguous hits earn a growing streak bonus;
 * longer targets lose a point per surplus character.
 */
export function subsequenceScore(text: string, query: string): number | undefined {
    const t = text.toLowerCase();
    const q = query.toLowerCase();
    let score = 0;
    let streak = 0;
    let textIndex = 0;

    for (const ch of q) {
        const foundAt = t.indexOf(ch, textIndex);
        if (foundAt === -1) return undefined;

        if (foundAt === textIndex) {
            streak += 1;
            score += 8 + streak * 2;
        } else {
            streak = 0;
            score += 5;
        }
        textIndex = foundAt + ch.length;
    }

    return score - Math.max(0, t.length - q.length);
}

/** Ranks targets by score; ties keep source order. Empty query keeps all. */
export function filterTargets(
    targets: readonly string[],
    query: string,
): FilterMatch[] {
    if (query === "") return targets.map((_, index) => ({ index, score: 0 }));

    const out: FilterMatch[] = [];
    targets.forEach((text, index) => {
        const score = subsequenceScore(text, query);
        if (score !== undefined) out.push({ index, score });
    });
    return out.sort((a, b) => b.score - a.score || a.index - b.index);
}
