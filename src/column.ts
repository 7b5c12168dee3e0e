import * as readline from "readline";
import { filterTarget, filterTargets } from "./filter";
import { FieldSlice, FilterInput } from "./filterInput";
import { IFocusTarget } from "./focus";
import { ColumnKeyMap, KeyBinding } from "./keymap";
import { clamp } from "./layout";
import { Paginator } from "./paginator";
import { width as cellWidth } from "./text";
import { Entry } from "./values";

// ══════════════════════════════════════════════════════════════════════════════
//  Column: one category's items, cursor, page and filter state
// ══════════════════════════════════════════════════════════════════════════════

export type FilterState = "unfiltered" | "filtering" | "filterApplied";

export interface PageInfo {
    readonly page: number;
    readonly totalPages: number;
}

export interface ColumnOptions {
    readonly pageSize: number;
    /** Floor for the item area's width. */
    readonly minWidth: number;
    /**
     * Refuse to leave filter mode through acceptWhileFiltering while the
     * filter text is empty. Defaults to true.
     */
    readonly blockEmptyFilterAccept?: boolean;
}

/** What a column exposes outside the selector that owns it. */
export interface ColumnView {
    readonly title: string;
    readonly width: number;
    readonly height: number;
    currentItem(): Entry | undefined;
    index(): number;
    pageInfo(): PageInfo;
    isFiltering(): boolean;
    filterState(): FilterState;
    filterValue(): string;
    visibleItems(): Entry[];
    isFocused(): boolean;
}

/** Cells taken by the " /" prompt in front of the filter text. */
export const FILTER_PROMPT_CELLS = 2;

export class Column implements IFocusTarget {
    readonly naturalWidth: number;

    private readonly _items: readonly Entry[];
    private readonly _targets: readonly string[];
    /** Indices into _items, in display order. */
    private _visible: readonly number[];
    /** Row within the current page. */
    private _cursor = 0;
    private readonly _paginator: Paginator;
    private _filterState: FilterState = "unfiltered";
    private readonly _filter = new FilterInput();
    private readonly _blockEmptyFilterAccept: boolean;
    private _focused = false;
    private _width: number;
    private _height = 0;

    constructor(
        readonly title: string,
        items: readonly Entry[],
        options: ColumnOptions,
    ) {
        this._items = items;
        this._targets = items.map(filterTarget);
        this._visible = items.map((_, i) => i);
        this._paginator = new Paginator(options.pageSize);
        this._paginator.setTotalItems(items.length);
        this._blockEmptyFilterAccept = options.blockEmptyFilterAccept ?? true;

        const widest = items.reduce((m, e) => Math.max(m, cellWidth(e.title)), 0);
        this.naturalWidth =
            1 + Math.max(options.minWidth, widest, cellWidth(title));
        this._width = this.naturalWidth;
        this._filter.setWidth(this._width - FILTER_PROMPT_CELLS);
    }

    // ── Items ─────────────────────────────────────────────────────────────────

    items(): readonly Entry[] {
        return this._items;
    }

    visibleItems(): Entry[] {
        return this._visible.flatMap((i) => {
            const e = this._items[i];
            return e ? [e] : [];
        });
    }

    /** Position of the highlighted item within visibleItems(). */
    index(): number {
        return this._paginator.page * this._paginator.perPage + this._cursor;
    }

    currentItem(): Entry | undefined {
        const i = this._visible[this.index()];
        return i === undefined ? undefined : this._items[i];
    }

    /** Highlights visible item `i`, clamped into range. No-op when empty. */
    selectCursor(i: number): void {
        const len = this._visible.length;
        if (len === 0) return;
        const target = clamp(i, 0, len - 1);
        this._paginator.setPage(Math.floor(target / this._paginator.perPage));
        this._cursor = target - this._paginator.page * this._paginator.perPage;
    }

    pageInfo(): PageInfo {
        return {
            page: this._paginator.page,
            totalPages: this._paginator.totalPages,
        };
    }

    /** "page/total", 1-based. */
    pageLabel(): string {
        return this._paginator.view();
    }

    /** Visible items on the current page, with their visible-list indices. */
    pageItems(): { index: number; entry: Entry }[] {
        const [start, end] = this._paginator.sliceBounds(this._visible.length);
        const out: { index: number; entry: Entry }[] = [];
        for (let i = start; i < end; i++) {
            const e = this._items[this._visible[i] ?? -1];
            if (e) out.push({ index: i, entry: e });
        }
        return out;
    }

    // ── Browsing ──────────────────────────────────────────────────────────────

    cursorUp(): void {
        if (this._visible.length === 0) return;
        this._cursor--;
        if (this._cursor >= 0) return;
        if (this._paginator.onFirstPage()) {
            this._cursor = 0;
            return;
        }
        this._paginator.prevPage();
        this._cursor = this._itemsOnPage() - 1;
    }

    cursorDown(): void {
        if (this._visible.length === 0) return;
        const onPage = this._itemsOnPage();
        this._cursor++;
        if (this._cursor < onPage) return;
        if (!this._paginator.onLastPage()) {
            this._paginator.nextPage();
            this._cursor = 0;
            return;
        }
        this._cursor = Math.max(0, onPage - 1);
    }

    goToStart(): void {
        this._paginator.setPage(0);
        this._cursor = 0;
    }

    goToEnd(): void {
        this._paginator.setPage(this._paginator.totalPages - 1);
        this._cursor = Math.max(0, this._itemsOnPage() - 1);
    }

    nextPage(): void {
        this._paginator.nextPage();
        this._clampCursor();
    }

    prevPage(): void {
        this._paginator.prevPage();
        this._clampCursor();
    }

    private _itemsOnPage(): number {
        return this._paginator.itemsOnPage(this._visible.length);
    }

    private _clampCursor(): void {
        this._cursor = Math.min(this._cursor, Math.max(0, this._itemsOnPage() - 1));
    }

    // ── Filtering ─────────────────────────────────────────────────────────────

    filterState(): FilterState {
        return this._filterState;
    }

    /** True while the filter prompt is taking text. */
    isFiltering(): boolean {
        return this._filterState === "filtering";
    }

    filterValue(): string {
        return this._filter.getValue();
    }

    filterSlice(): FieldSlice {
        return this._filter.slice();
    }

    startFiltering(): void {
        this._filterState = "filtering";
    }

    editFilter(key: readline.Key): void {
        if (!this.isFiltering()) return;
        if (!this._filter.handleKey(key)) return;
        this._refilter();
        this.goToStart();
    }

    /**
     * Leaves the prompt keeping the filtered view, with the top match
     * highlighted. Returns false when the column refused (empty text while
     * blockEmptyFilterAccept is set).
     */
    acceptFilter(): boolean {
        if (!this.isFiltering()) return false;
        const value = this._filter.getValue();
        if (value === "" && this._blockEmptyFilterAccept) return false;

        if (value === "" || this._visible.length === 0) {
            this.resetFilter();
        } else {
            this._filterState = "filterApplied";
        }
        this.goToStart();
        return true;
    }

    /** Clears an applied filter; ignored while unfiltered or still typing. */
    clearFilter(): void {
        if (this._filterState === "filterApplied") this.resetFilter();
    }

    resetFilter(): void {
        this._filterState = "unfiltered";
        this._filter.reset();
        this._refilter();
        this._clampCursor();
    }

    private _refilter(): void {
        this._visible = filterTargets(this._targets, this._filter.getValue()).map(
            (m) => m.index,
        );
        this._paginator.setTotalItems(this._visible.length);
    }

    // ── Focus & dimensions ────────────────────────────────────────────────────

    isFocused(): boolean {
        return this._focused;
    }
    focus(): void {
        this._focused = true;
    }
    blur(): void {
        this._focused = false;
    }

    get width(): number {
        return this._width;
    }
    get height(): number {
        return this._height;
    }

    /** Width budget; the column never grows past its natural width. */
    setWidth(budget: number): void {
        this._width = Math.max(0, Math.min(this.naturalWidth, budget));
        this._filter.setWidth(this._width - FILTER_PROMPT_CELLS);
    }

    setHeight(height: number): void {
        this._height = Math.max(0, height);
    }

    // ── Help ──────────────────────────────────────────────────────────────────

    shortHelp(km: ColumnKeyMap): KeyBinding[] {
        if (this.isFiltering()) {
            return [km.acceptWhileFiltering, km.cancelWhileFiltering];
        }
        const kb = [km.cursorUp, km.cursorDown, km.filter];
        if (this._filterState === "filterApplied") kb.push(km.clearFilter);
        kb.push(km.showFullHelp);
        return kb;
    }

    fullHelp(km: ColumnKeyMap): KeyBinding[][] {
        if (this.isFiltering()) {
            return [[km.acceptWhileFiltering, km.cancelWhileFiltering]];
        }
        const filterGroup = [km.filter];
        if (this._filterState === "filterApplied") filterGroup.push(km.clearFilter);
        filterGroup.push(km.closeFullHelp);
        return [
            [
                km.cursorUp,
                km.cursorDown,
                km.nextPage,
                km.prevPage,
                km.goToStart,
                km.goToEnd,
            ],
            filterGroup,
        ];
    }
}

/** A live, read-only window onto `col`; none of its mutators are reachable. */
export function columnView(col: Column): ColumnView {
    return Object.freeze({
        title: col.title,
        get width() {
            return col.width;
        },
        get height() {
            return col.height;
        },
        currentItem: () => col.currentItem(),
        index: () => col.index(),
        pageInfo: () => col.pageInfo(),
        isFiltering: () => col.isFiltering(),
        filterState: () => col.filterState(),
        filterValue: () => col.filterValue(),
        visibleItems: () => col.visibleItems(),
        isFocused: () => col.isFocused(),
    });
}
