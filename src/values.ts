// ══════════════════════════════════════════════════════════════════════════════
//  Candidate data: what the selector displays
// ══════════════════════════════════════════════════════════════════════════════

/** One completion candidate. */
export interface Entry {
    /** Main displayed text. */
    readonly title: string;
    /** Explanation shown under the columns; may be empty. */
    readonly description: string;
}

/** A named, ordered group of entries. */
export interface Category {
    readonly name: string;
    readonly entries: readonly Entry[];
}

/**
 * Read-only view of the candidates handed to `Selector.setValues()`.
 * Indices are 0-based and must stay consistent for the duration of one
 * `setValues()` call; the selector copies what it needs and never calls
 * back afterwards.
 */
export interface CompletionValues {
    numCategories(): number;
    categoryTitle(catIdx: number): string;
    numEntries(catIdx: number): number;
    entry(catIdx: number, entryIdx: number): Entry;
}

export function entry(title: string, description = ""): Entry {
    return Object.freeze({ title, description });
}

/** In-memory CompletionValues over a fixed list of categories. */
export class StaticValues implements CompletionValues {
    private readonly _categories: readonly Category[];

    constructor(categories: readonly Category[]) {
        this._categories = categories;
    }

    numCategories(): number {
        return this._categories.length;
    }

    categoryTitle(catIdx: number): string {
        return this._categories[catIdx]?.name ?? "";
    }

    numEntries(catIdx: number): number {
        return this._categories[catIdx]?.entries.length ?? 0;
    }

    entry(catIdx: number, entryIdx: number): Entry {
        return this._categories[catIdx]?.entries[entryIdx] ?? entry("");
    }
}

/** Copies one category out of a source. Negative counts read as zero. */
export function readCategory(values: CompletionValues, catIdx: number): Category {
    const count = Math.max(0, values.numEntries(catIdx));
    const entries: Entry[] = [];
    for (let i = 0; i < count; i++) {
        const e = values.entry(catIdx, i);
        entries.push(entry(e.title, e.description));
    }
    return Object.freeze({
        name: values.categoryTitle(catIdx),
        entries: Object.freeze(entries),
    });
}

export function readCategories(values: CompletionValues): Category[] {
    const count = Math.max(0, values.numCategories());
    const out: Category[] = [];
    for (let i = 0; i < count; i++) out.push(readCategory(values, i));
    return out;
}
