// ══════════════════════════════════════════════════════════════════════════════
//  Layout: height negotiation between the columns and the description row
// ══════════════════════════════════════════════════════════════════════════════

export interface LayoutConstants {
    /** Items shown per page in every column, whatever the height. */
    readonly pageSize: number;
    /** Items per category counted when computing the maximum height. */
    readonly heightItemCap: number;
    /** Rows a column spends outside its items: title, spacers, pagination. */
    readonly decorationRows: number;
    /** Rows one item occupies. */
    readonly itemRows: number;
    readonly minWidth: number;
    readonly minHeight: number;
}

/** The description area under the columns is always one row. */
export const DESCRIPTION_ROWS = 1;

export const DEFAULT_LAYOUT: LayoutConstants = Object.freeze({
    pageSize: 4,
    heightItemCap: 5,
    decorationRows: 2,
    itemRows: 1,
    minWidth: 10,
    minHeight: 2,
});

const LOWER_BOUNDS: readonly [keyof LayoutConstants, number][] = [
    ["pageSize", 1],
    ["heightItemCap", 0],
    ["decorationRows", 2],
    ["itemRows", 1],
    ["minWidth", 1],
    ["minHeight", 2],
];

/** Merges overrides onto the defaults; throws RangeError on a bad value. */
export function resolveLayout(
    overrides: Partial<LayoutConstants> = {},
): LayoutConstants {
    const merged: LayoutConstants = { ...DEFAULT_LAYOUT, ...overrides };
    for (const [name, low] of LOWER_BOUNDS) {
        const v = merged[name];
        if (!Number.isInteger(v) || v < low) {
            throw new RangeError(
                `layout.${name} must be an integer >= ${low}, got ${v}`,
            );
        }
    }
    return Object.freeze(merged);
}

export function clamp(v: number, low: number, high: number): number {
    if (high < low) [low, high] = [high, low];
    return Math.min(high, Math.max(low, v));
}

/**
 * decoration + min(largest category, cap) × item rows + description row.
 * Computed over every category so switching columns never changes it.
 */
export function computeMaxHeight(
    categorySizes: readonly number[],
    layout: LayoutConstants,
): number {
    const largest = categorySizes.reduce((m, n) => Math.max(m, n), 0);
    return (
        layout.decorationRows +
        Math.min(largest, layout.heightItemCap) * layout.itemRows +
        DESCRIPTION_ROWS
    );
}

export function clampHeight(
    height: number,
    maxHeight: number,
    layout: LayoutConstants,
): number {
    if (!Number.isFinite(height)) return layout.minHeight;
    return clamp(height, layout.minHeight, maxHeight);
}

/** Height handed to each column once the description row is taken. */
export function columnHeight(height: number): number {
    return Math.max(0, height - DESCRIPTION_ROWS);
}

/** Width budget handed to each column. */
export function columnWidth(width: number, layout: LayoutConstants): number {
    return Math.max(width, layout.minWidth);
}
