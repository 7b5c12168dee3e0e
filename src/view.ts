import chalk from "chalk";
import { Column } from "./column";
import { LayoutConstants, columnHeight } from "./layout";
import { Styles, paint } from "./styles";
import { cell, truncate, width as cellWidth } from "./text";

// ══════════════════════════════════════════════════════════════════════════════
//  Rendering (pure reads of selector state)
// ══════════════════════════════════════════════════════════════════════════════

export interface ViewContext {
    readonly chalk: chalk.Chalk;
    readonly styles: Styles;
    readonly layout: LayoutConstants;
}

export interface ColumnViewState {
    /** The column is the selector's active one. */
    readonly active: boolean;
    /** The column is active and the selector has focus. */
    readonly focused: boolean;
}

export interface SelectorViewState {
    readonly columns: readonly Column[];
    readonly activeIndex: number;
    readonly focused: boolean;
    readonly width: number;
    readonly height: number;
}

const NO_ITEMS = "No items";
const NOTHING_MATCHED = "Nothing matched";
const NO_SELECTION = "(no entry selected)";

function titleLine(
    col: Column,
    w: number,
    state: ColumnViewState,
    ctx: ViewContext,
): string {
    const { chalk: c, styles } = ctx;

    if (col.isFiltering()) {
        const prompt = cell(c, styles.filterPrompt, "/", Math.min(w, 2));
        const room = w - 2;
        if (room <= 0) return prompt;
        const s = col.filterSlice();
        const cursorStyle = state.focused ? styles.filterCursor : styles.filterText;
        let avail = room;
        const before = truncate(s.before, avail);
        avail -= cellWidth(before);
        const cur = truncate(s.cursor, avail);
        avail -= cellWidth(cur);
        const after = truncate(s.after, avail);
        avail -= cellWidth(after);
        return (
            prompt +
            paint(c, styles.filterText, before) +
            paint(c, cursorStyle, cur) +
            paint(c, styles.filterText, after) +
            " ".repeat(avail)
        );
    }

    const style = state.focused ? styles.focusedTitle : styles.blurredTitle;
    const label =
        col.filterState() === "filterApplied"
            ? `${col.title} [${col.filterValue()}]`
            : col.title;
    return cell(c, style, label, w);
}

/**
 * The rows of one column, exactly `w` cells wide and `col.height` rows
 * tall: title, spacer rows, one slot per page item, pagination.
 */
export function renderColumn(
    col: Column,
    w: number,
    state: ColumnViewState,
    ctx: ViewContext,
): string[] {
    const { chalk: c, styles, layout } = ctx;
    const blank = " ".repeat(w);
    const lines: string[] = [titleLine(col, w, state, ctx)];

    for (let i = 2; i < layout.decorationRows; i++) lines.push(blank);

    const page = col.pageItems();
    if (page.length === 0) {
        const msg =
            col.filterState() === "filterApplied" || col.isFiltering()
                ? NOTHING_MATCHED
                : NO_ITEMS;
        lines.push(cell(c, styles.placeholder, msg, w));
        for (let r = 1; r < layout.itemRows; r++) lines.push(blank);
    }
    const current = col.index();
    for (const { index, entry } of page) {
        const style =
            state.active && index === current
                ? styles.selectedItem
                : styles.item;
        lines.push(cell(c, style, entry.title, w));
        for (let r = 1; r < layout.itemRows; r++) lines.push(blank);
    }
    const slots = layout.pageSize * layout.itemRows;
    const itemsEnd = layout.decorationRows - 1 + slots;
    while (lines.length < itemsEnd) lines.push(blank);

    const { totalPages } = col.pageInfo();
    lines.push(
        totalPages > 1
            ? cell(c, styles.pagination, col.pageLabel(), w)
            : blank,
    );

    const out = lines.slice(0, col.height);
    while (out.length < col.height) out.push(blank);
    return out;
}

/** Complete selector box; "" when below the minimum dimensions. */
export function renderSelector(state: SelectorViewState, ctx: ViewContext): string {
    const { chalk: c, styles, layout } = ctx;
    if (state.width < layout.minWidth || state.height < layout.minHeight) {
        return "";
    }

    const inner = Math.max(0, state.width - 4);
    const rows = columnHeight(state.height);

    // Columns are cut at the inner width; a column that does not fit is
    // rendered narrower or dropped.
    const blocks: string[][] = [];
    let remaining = inner;
    state.columns.forEach((col, i) => {
        const w = Math.min(col.width, remaining);
        if (w <= 0) return;
        remaining -= w;
        const active = i === state.activeIndex;
        blocks.push(
            renderColumn(col, w, { active, focused: active && state.focused }, ctx),
        );
    });

    const body: string[] = [];
    for (let r = 0; r < rows; r++) {
        const line = blocks.map((b) => b[r] ?? "").join("");
        body.push(line + " ".repeat(remaining));
    }

    body.push(paint(c, styles.separator, "─".repeat(inner)));

    const current = state.columns[state.activeIndex]?.currentItem();
    if (current === undefined) {
        body.push(cell(c, styles.placeholder, NO_SELECTION, inner));
    } else if (current.description !== "") {
        body.push(cell(c, styles.description, current.description, inner));
    } else {
        body.push(" ".repeat(inner));
    }

    const b = (s: string) => paint(c, styles.border, s);
    const edge = "─".repeat(inner + 2);
    return [
        b("╭" + edge + "╮"),
        ...body.map((line) => b("│") + " " + line + " " + b("│")),
        b("╰" + edge + "╯"),
    ].join("\n");
}
