// ══════════════════════════════════════════════════════════════════════════════
//  Paginator: fixed-size pages over a list
// ══════════════════════════════════════════════════════════════════════════════

export class Paginator {
    private _page = 0;
    private _totalPages = 1;

    constructor(readonly perPage: number) {}

    get page(): number {
        return this._page;
    }
    get totalPages(): number {
        return this._totalPages;
    }

    /** Recomputes the page count for `items` entries, keeping `page` in range. */
    setTotalItems(items: number): void {
        this._totalPages = Math.max(1, Math.ceil(items / this.perPage));
        if (this._page >= this._totalPages) this._page = this._totalPages - 1;
    }

    setPage(page: number): void {
        this._page = Math.max(0, Math.min(page, this._totalPages - 1));
    }

    /** [start, end) of the current page within a list of `length` items. */
    sliceBounds(length: number): [number, number] {
        const start = Math.min(this._page * this.perPage, length);
        return [start, Math.min(start + this.perPage, length)];
    }

    itemsOnPage(length: number): number {
        const [start, end] = this.sliceBounds(length);
        return end - start;
    }

    onFirstPage(): boolean {
        return this._page === 0;
    }
    onLastPage(): boolean {
        return this._page >= this._totalPages - 1;
    }

    prevPage(): void {
        if (this._page > 0) this._page--;
    }
    nextPage(): void {
        if (!this.onLastPage()) this._page++;
    }

    /** Arabic form, e.g. "2/5". */
    view(): string {
        return `${this._page + 1}/${this._totalPages}`;
    }
}
