// ══════════════════════════════════════════════════════════════════════════════
//  Focus bookkeeping over an index-addressed ring of targets
// ══════════════════════════════════════════════════════════════════════════════

/** Focus state kept apart from key handling. */
export interface IFocusTarget {
    isFocused(): boolean;
    focus(): void;
    blur(): void;
}

/**
 * Tracks the active slot of a fixed list and which target holds focus.
 * Targets are always addressed by index; replacing the list resets the
 * active slot to 0.
 */
export class FocusRing<T extends IFocusTarget> {
    private _idx = 0;
    private _targets: readonly T[] = [];

    get index(): number {
        return this._idx;
    }
    get size(): number {
        return this._targets.length;
    }
    get current(): T | undefined {
        return this._targets[this._idx];
    }

    at(i: number): T | undefined {
        return this._targets[i];
    }

    all(): readonly T[] {
        return this._targets;
    }

    reset(targets: readonly T[]): void {
        this.blurAll();
        this._targets = targets;
        this._idx = 0;
    }

    /** Moves the active slot with wrap-around; the new slot is focused only if `focus`. */
    cycle(direction: 1 | -1, focus: boolean): void {
        const len = this._targets.length;
        if (len === 0) return;
        this.blurAll();
        this._idx = (this._idx + direction + len) % len;
        if (focus) this.current?.focus();
    }

    focusCurrent(): void {
        this.current?.focus();
    }

    blurAll(): void {
        for (const t of this._targets) t.blur();
    }
}
