import chalk from "chalk";
import * as readline from "readline";
import { Column, ColumnView, columnView } from "./column";
import { FocusRing } from "./focus";
import { renderFullHelp, renderShortHelp } from "./help";
import { KeyBinding, KeyMap, defaultKeyMap, matches } from "./keymap";
import {
    LayoutConstants,
    clampHeight,
    columnHeight,
    columnWidth,
    computeMaxHeight,
    resolveLayout,
} from "./layout";
import { routeKey } from "./router";
import { Styles, defaultStyles } from "./styles";
import { CompletionValues, Entry, readCategories } from "./values";
import { renderSelector } from "./view";

// ══════════════════════════════════════════════════════════════════════════════
//  Termination sentinel
// ══════════════════════════════════════════════════════════════════════════════

/**
 * Reported through `Selector.err` once the interaction is over. It marks
 * the end of input, not a failure: `acceptedEntry` tells acceptance from
 * cancellation.
 */
export class SelectionDone extends Error {
    constructor() {
        super("selection done");
        this.name = "SelectionDone";
    }
}

export const DONE: Readonly<SelectionDone> = Object.freeze(new SelectionDone());

export function isDone(err: unknown): err is SelectionDone {
    return err instanceof SelectionDone;
}

// ══════════════════════════════════════════════════════════════════════════════
//  Selector
// ══════════════════════════════════════════════════════════════════════════════

export interface SelectorOptions {
    keyMap?: KeyMap;
    styles?: Styles;
    layout?: Partial<LayoutConstants>;
    /** Chalk instance used for every painted fragment. */
    chalk?: chalk.Chalk;
    /** Whether the selector starts focused. Defaults to true. */
    focused?: boolean;
}

export type SelectorEvent =
    | { readonly kind: "key"; readonly key: readline.Key }
    | { readonly kind: "resize"; readonly width: number; readonly height: number };

export type SelectionResult =
    | { readonly status: "active" }
    | { readonly status: "accepted"; readonly entry: Entry }
    | { readonly status: "cancelled" };

export type SelectorOutcome = SelectionResult["status"];

export class Selector {
    readonly keyMap: KeyMap;
    readonly styles: Styles;
    readonly layout: LayoutConstants;

    private readonly _chalk: chalk.Chalk;
    private readonly _ring = new FocusRing<Column>();
    private _focused: boolean;
    private _width = 0;
    private _height: number;
    private _maxHeight: number;
    private _accepted: Entry | undefined;
    private _err: Error | undefined;
    private _showFullHelp = false;

    constructor(options: SelectorOptions = {}) {
        this.keyMap = options.keyMap ?? defaultKeyMap();
        this.styles = options.styles ?? defaultStyles();
        this.layout = resolveLayout(options.layout);
        this._chalk = options.chalk ?? chalk;
        this._focused = options.focused ?? true;
        this._maxHeight = computeMaxHeight([], this.layout);
        this._height = this._maxHeight;
    }

    // ── Candidates ────────────────────────────────────────────────────────────

    /**
     * Rebuilds every column from `values`, discarding all navigation state,
     * and recomputes the maximum height. An empty source terminates the
     * selector at once, as a cancellation.
     */
    setValues(values: CompletionValues): void {
        this._err = undefined;
        this._accepted = undefined;

        const categories = readCategories(values);
        const columns = categories.map(
            (cat) =>
                new Column(cat.name, cat.entries, {
                    pageSize: this.layout.pageSize,
                    minWidth: this.layout.minWidth,
                    // Enter in the filter prompt always takes the top item,
                    // even before anything was typed.
                    blockEmptyFilterAccept: false,
                }),
        );
        this._ring.reset(columns);

        this._maxHeight = computeMaxHeight(
            categories.map((cat) => cat.entries.length),
            this.layout,
        );
        this.setHeight(this._maxHeight);
        this.setWidth(this._width);

        const wasFocused = this._focused;
        this.blur();
        if (wasFocused) this.focus();

        if (columns.length === 0) this._terminate();
    }

    // ── Dimensions ────────────────────────────────────────────────────────────

    /**
     * Stores the width; columns get at least layout.minWidth. A width that
     * is not a finite number counts as 0.
     */
    setWidth(width: number): void {
        this._width = Number.isFinite(width) ? Math.max(0, width) : 0;
        const w = columnWidth(this._width, this.layout);
        for (const col of this._ring.all()) col.setWidth(w);
    }

    /**
     * Clamps into [minHeight, maxHeight], with a non-finite height read as
     * minHeight. The description keeps one row.
     */
    setHeight(height: number): void {
        this._height = clampHeight(height, this._maxHeight, this.layout);
        const h = columnHeight(this._height);
        for (const col of this._ring.all()) col.setHeight(h);
    }

    getWidth(): number {
        return this._width;
    }
    getHeight(): number {
        return this._height;
    }
    getMaxHeight(): number {
        return this._maxHeight;
    }

    // ── Focus ─────────────────────────────────────────────────────────────────

    focus(): void {
        this._focused = true;
        this._ring.focusCurrent();
    }

    blur(): void {
        this._focused = false;
        this._ring.blurAll();
    }

    isFocused(): boolean {
        return this._focused;
    }

    // ── State queries ─────────────────────────────────────────────────────────

    get columnCount(): number {
        return this._ring.size;
    }

    get activeColumnIndex(): number {
        return this._ring.index;
    }

    /** Read-only view of column `i`; columns change only through update(). */
    column(i: number): ColumnView | undefined {
        const col = this._ring.at(i);
        return col && columnView(col);
    }

    activeColumn(): ColumnView | undefined {
        return this.column(this._ring.index);
    }

    get acceptedEntry(): Entry | undefined {
        return this._accepted;
    }

    /** DONE once the interaction has ended. */
    get err(): Error | undefined {
        return this._err;
    }

    get terminated(): boolean {
        return this._err !== undefined;
    }

    get outcome(): SelectorOutcome {
        return this.result().status;
    }

    result(): SelectionResult {
        if (!this._err) return { status: "active" };
        return this._accepted
            ? { status: "accepted", entry: this._accepted }
            : { status: "cancelled" };
    }

    isShowingFullHelp(): boolean {
        return this._showFullHelp;
    }

    /** True when update() would act on `key`. */
    matchesKey(key: readline.Key): boolean {
        const col = this._ring.current;
        if (!this._focused || !col) return false;
        if (col.isFiltering()) return true;

        const km = this.keyMap;
        return matches(
            key,
            km.cursorUp,
            km.cursorDown,
            km.goToStart,
            km.goToEnd,
            km.filter,
            km.clearFilter,
            km.prevColumn,
            km.nextColumn,
            km.nextPage,
            km.prevPage,
            km.showFullHelp,
            km.accept,
            km.abort,
        );
    }

    // ── Events ────────────────────────────────────────────────────────────────

    update(event: SelectorEvent): this {
        if (event.kind === "resize") {
            if (!Number.isFinite(event.width) || !Number.isFinite(event.height)) {
                return this;
            }
            this.setWidth(event.width);
            this.setHeight(event.height);
            return this;
        }
        if (event.kind !== "key" || this._err) return this;

        const col = this._ring.current;
        if (!col) {
            this._terminate();
            return this;
        }

        const route = routeKey(event.key, this.keyMap, col.isFiltering());
        switch (route.target) {
            case "selector":
                switch (route.action) {
                    case "abort":
                        this.cancel();
                        break;
                    case "accept":
                        this._accepted = col.currentItem();
                        this._terminate();
                        break;
                    case "nextColumn":
                        this._switchColumn(1);
                        break;
                    case "prevColumn":
                        this._switchColumn(-1);
                        break;
                    case "nextPage":
                        if (col.pageInfo().page >= col.pageInfo().totalPages - 1) {
                            this._switchColumn(1);
                        } else {
                            col.nextPage();
                        }
                        break;
                    case "prevPage":
                        if (col.pageInfo().page === 0) {
                            this._switchColumn(-1);
                        } else {
                            col.prevPage();
                        }
                        break;
                    case "toggleHelp":
                        this._showFullHelp = !this._showFullHelp;
                        break;
                }
                break;
            case "column":
                switch (route.action) {
                    case "cursorUp":
                        col.cursorUp();
                        break;
                    case "cursorDown":
                        col.cursorDown();
                        break;
                    case "goToStart":
                        col.goToStart();
                        break;
                    case "goToEnd":
                        col.goToEnd();
                        break;
                    case "filter":
                        col.startFiltering();
                        break;
                    case "clearFilter":
                        col.clearFilter();
                        break;
                }
                break;
            case "filter":
                switch (route.action) {
                    case "cancel":
                        col.resetFilter();
                        break;
                    case "accept":
                        col.acceptFilter();
                        break;
                    case "edit":
                        col.editFilter(route.key);
                        break;
                }
                break;
            case "none":
                break;
        }
        return this;
    }

    /** Ends the interaction as cancelled, as the abort key does. */
    cancel(): void {
        if (this._err) return;
        this._accepted = undefined;
        this._terminate();
    }

    private _switchColumn(direction: 1 | -1): void {
        this._ring.cycle(direction, this._focused);
        this._ring.current?.selectCursor(0);
    }

    private _terminate(): void {
        this._err = DONE;
    }

    // ── Rendering ─────────────────────────────────────────────────────────────

    view(): string {
        return renderSelector(
            {
                columns: this._ring.all(),
                activeIndex: this._ring.index,
                focused: this._focused,
                width: this._width,
                height: this._height,
            },
            { chalk: this._chalk, styles: this.styles, layout: this.layout },
        );
    }

    shortHelp(): KeyBinding[] {
        const col = this._ring.current;
        if (!col) return [];

        const kb: KeyBinding[] = [this.keyMap.abort];
        if (!col.isFiltering()) {
            if (this.columnCount > 1) kb.push(this.keyMap.nextColumn);
            kb.push(this.keyMap.accept);
        }
        return kb.concat(col.shortHelp(this.keyMap));
    }

    fullHelp(): KeyBinding[][] {
        const col = this._ring.current;
        if (!col) return [];

        const group: KeyBinding[] = [];
        if (!col.isFiltering()) {
            if (this.columnCount > 1) {
                group.push(this.keyMap.nextColumn, this.keyMap.prevColumn);
            }
            group.push(this.keyMap.accept);
        }
        group.push(this.keyMap.abort);
        return [group, ...col.fullHelp(this.keyMap)];
    }

    /** Short or full help, whichever the help toggle selects. */
    helpView(): string {
        const w = Math.max(this._width, this.layout.minWidth);
        return this._showFullHelp
            ? renderFullHelp(this.fullHelp(), this._chalk, this.styles, w)
            : renderShortHelp(this.shortHelp(), this._chalk, this.styles, w);
    }

    debug(): string {
        const lines = [
            `width: ${this._width}, height: ${this._height}, maxHeight: ${this._maxHeight}`,
            `num columns: ${this.columnCount}`,
            `active column: ${this.activeColumnIndex}`,
        ];
        const cur = this._ring.current?.currentItem();
        lines.push(`selected item: ${cur ? cur.title : "<none>"}`);
        lines.push(
            `accepted: ${this._accepted ? this._accepted.title : "<none>"} / err: ${
                this._err ? this._err.message : "<none>"
            }`,
        );
        return lines.join("\n") + "\n";
    }
}
