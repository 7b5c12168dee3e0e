import * as readline from "readline";

// ══════════════════════════════════════════════════════════════════════════════
//  Key bindings
// ══════════════════════════════════════════════════════════════════════════════

export interface KeyHelp {
    /** Short rendering of the keys, e.g. "C-p/↑". */
    readonly key: string;
    readonly desc: string;
}

export interface KeyBinding {
    /** Normalized key names as produced by keyString(). */
    readonly keys: readonly string[];
    readonly help: KeyHelp;
}

export function binding(keys: string[], key: string, desc: string): KeyBinding {
    return Object.freeze({
        keys: Object.freeze([...keys]),
        help: Object.freeze({ key, desc }),
    });
}

/** Bindings understood by a single column. */
export interface ColumnKeyMap {
    readonly cursorUp: KeyBinding;
    readonly cursorDown: KeyBinding;
    readonly nextPage: KeyBinding;
    readonly prevPage: KeyBinding;
    readonly goToStart: KeyBinding;
    readonly goToEnd: KeyBinding;
    readonly filter: KeyBinding;
    readonly clearFilter: KeyBinding;
    readonly cancelWhileFiltering: KeyBinding;
    readonly acceptWhileFiltering: KeyBinding;
    readonly showFullHelp: KeyBinding;
    readonly closeFullHelp: KeyBinding;
}

export interface KeyMap extends ColumnKeyMap {
    readonly nextColumn: KeyBinding;
    readonly prevColumn: KeyBinding;
    readonly accept: KeyBinding;
    readonly abort: KeyBinding;
}

/** Builds a fresh key map; nothing is shared between selectors. */
export function defaultKeyMap(): KeyMap {
    return Object.freeze({
        cursorUp: binding(["up", "ctrl+p", "shift+tab"], "C-p/↑", "prev entry"),
        cursorDown: binding(["down", "ctrl+n", "tab"], "C-n/↓", "next entry"),
        nextPage: binding(["pgdown"], "pgdown", "next page/column"),
        prevPage: binding(["pgup"], "pgup", "prev page/column"),
        goToStart: binding(["ctrl+a", "home"], "C-a/home", "start of column"),
        goToEnd: binding(["ctrl+e", "end"], "C-e/end", "end of column"),
        filter: binding(["/"], "/", "filter"),
        clearFilter: binding(["ctrl+g"], "C-g", "clear/cancel"),
        cancelWhileFiltering: binding(["ctrl+g"], "C-g", "clear/cancel"),
        acceptWhileFiltering: binding(["enter", "ctrl+j"], "C-j/enter", "accept filter"),
        showFullHelp: binding(["alt+?"], "M-?", "toggle key help"),
        closeFullHelp: binding(["alt+?"], "M-?", "toggle key help"),
        nextColumn: binding(["right", "alt+n"], "→/M-n", "next column"),
        prevColumn: binding(["left", "alt+p"], "←/M-p", "prev column"),
        accept: binding(["enter", "ctrl+j"], "C-j/enter", "accept"),
        abort: binding(["ctrl+c", "esc"], "C-c/esc", "close/cancel"),
    });
}

// ── Normalizing readline keys ────────────────────────────────────────────────

const NAMED_KEYS: Record<string, string> = {
    return: "enter",
    escape: "esc",
    tab: "tab",
    backspace: "backspace",
    delete: "delete",
    insert: "insert",
    up: "up",
    down: "down",
    left: "left",
    right: "right",
    home: "home",
    end: "end",
    pageup: "pgup",
    pagedown: "pgdown",
};

/**
 * Turns a keypress event into the name used in KeyBinding.keys:
 * "ctrl+p", "alt+n", "shift+tab", "pgdown", "/", "A".
 * Node reports a bare line feed as `enter`; that is what ctrl+j sends.
 */
export function keyString(key: readline.Key | undefined): string {
    if (!key) return "";
    const name = key.name;
    const alt = key.meta ? "alt+" : "";

    if (name === "enter") return alt + "ctrl+j";

    const named =
        name !== undefined && Object.hasOwn(NAMED_KEYS, name)
            ? NAMED_KEYS[name]
            : undefined;
    if (named !== undefined) {
        const ctrl = key.ctrl ? "ctrl+" : "";
        const shift = key.shift ? "shift+" : "";
        return ctrl + alt + shift + named;
    }

    if (key.ctrl && name !== undefined && /^[a-z]$/.test(name)) {
        return "ctrl+" + alt + name;
    }

    let seq = key.sequence ?? "";
    if (key.meta && seq.startsWith("\x1b")) seq = seq.slice(1);
    if ([...seq].length === 1 && seq >= " " && seq !== "\x7f") {
        return alt + seq;
    }

    return name ? alt + name : "";
}

export function matches(
    key: readline.Key | undefined,
    ...bindings: KeyBinding[]
): boolean {
    const k = keyString(key);
    if (!k) return false;
    return bindings.some((b) => b.keys.includes(k));
}
