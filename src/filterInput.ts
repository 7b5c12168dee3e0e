import * as readline from "readline";

// ══════════════════════════════════════════════════════════════════════════════
//  Single-line text field behind a column's filter prompt
// ══════════════════════════════════════════════════════════════════════════════

/** Horizontal scroll offset that keeps a cursor inside a viewport. */
export class HorizontalScroll {
    private _x = 0;

    get x(): number {
        return this._x;
    }

    reset(): void {
        this._x = 0;
    }

    /** Ensure a cursor column stays within a viewport of `viewportWidth`. */
    follow(cursor: number, viewportWidth: number): void {
        const w = Math.max(1, viewportWidth);
        if (cursor < this._x) this._x = cursor;
        if (cursor >= this._x + w) this._x = cursor - w + 1;
        this._x = Math.max(0, this._x);
    }
}

/** The visible slice of the field, split around the cursor cell. */
export interface FieldSlice {
    readonly before: string;
    readonly cursor: string;
    readonly after: string;
}

export class FilterInput {
    private _value = "";
    private _cursor = 0;
    private _width = 1;
    private readonly _scroll = new HorizontalScroll();

    getValue(): string {
        return this._value;
    }

    reset(): void {
        this._value = "";
        this._cursor = 0;
        this._scroll.reset();
    }

    /** Width in cells available to the text, cursor cell included. */
    setWidth(width: number): void {
        this._width = Math.max(1, width);
        this._scroll.follow(this._cursor, this._width);
    }

    /**
     * Applies an editing key. Returns true when the value changed; keys that
     * only move the cursor, or that mean nothing to a text field, return
     * false.
     */
    handleKey(key: readline.Key): boolean {
        const before = this._value;
        const target = this._cursorTarget(key);

        if (target !== undefined) {
            this._cursor = target;
        } else if (key.name === "backspace") {
            this._removeAt(this._cursor - 1);
        } else if (key.name === "delete") {
            this._removeAt(this._cursor);
        } else {
            const text = typedText(key);
            if (text !== undefined) this._insert(text);
        }

        this._scroll.follow(this._cursor, this._width);
        return this._value !== before;
    }

    /** Where a motion key puts the cursor; undefined for other keys. */
    private _cursorTarget(key: readline.Key): number | undefined {
        const end = this._value.length;
        switch (key.ctrl ? `ctrl+${key.name}` : key.name) {
            case "left":
            case "ctrl+b":
                return Math.max(0, this._cursor - 1);
            case "right":
            case "ctrl+f":
                return Math.min(end, this._cursor + 1);
            case "home":
            case "ctrl+a":
                return 0;
            case "end":
            case "ctrl+e":
                return end;
            default:
                return undefined;
        }
    }

    private _insert(text: string): void {
        const v = this._value;
        this._value = v.slice(0, this._cursor) + text + v.slice(this._cursor);
        this._cursor += text.length;
    }

    /** Drops the character at `i`, keeping the cursor on the same text. */
    private _removeAt(i: number): void {
        const v = this._value;
        if (i < 0 || i >= v.length) return;
        this._value = v.slice(0, i) + v.slice(i + 1);
        if (i < this._cursor) this._cursor--;
    }

    slice(): FieldSlice {
        const visible = this._value.slice(
            this._scroll.x,
            this._scroll.x + this._width,
        );
        const rel = this._cursor - this._scroll.x;
        return {
            before: visible.slice(0, rel),
            cursor: visible[rel] ?? " ",
            after: visible.slice(rel + 1),
        };
    }
}

/** The character a key types into the field, if it types one. */
function typedText(key: readline.Key): string | undefined {
    const seq = key.sequence;
    if (!seq || key.ctrl || key.meta) return undefined;
    if (seq.length !== 1 || seq < " " || seq === "\x7f") return undefined;
    return seq;
}
