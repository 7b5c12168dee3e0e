import * as readline from "readline";
import { KeyMap, matches } from "./keymap";

// ══════════════════════════════════════════════════════════════════════════════
//  Input routing: which layer handles a key
// ══════════════════════════════════════════════════════════════════════════════

export type SelectorAction =
    | "abort"
    | "accept"
    | "nextColumn"
    | "prevColumn"
    | "nextPage"
    | "prevPage"
    | "toggleHelp";

export type ColumnAction =
    | "cursorUp"
    | "cursorDown"
    | "goToStart"
    | "goToEnd"
    | "filter"
    | "clearFilter";

export type FilterAction = "cancel" | "accept" | "edit";

export type Route =
    | { readonly target: "selector"; readonly action: SelectorAction }
    | { readonly target: "column"; readonly action: ColumnAction }
    | {
          readonly target: "filter";
          readonly action: FilterAction;
          readonly key: readline.Key;
      }
    | { readonly target: "none" };

const NONE: Route = { target: "none" };

/**
 * Abort wins in every state. While the active column is taking filter
 * text, every other key belongs to the filter, including the keys that
 * would otherwise switch columns or pages.
 */
export function routeKey(
    key: readline.Key | undefined,
    km: KeyMap,
    filtering: boolean,
): Route {
    if (!key) return NONE;

    if (matches(key, km.abort)) return { target: "selector", action: "abort" };

    if (filtering) {
        if (matches(key, km.cancelWhileFiltering))
            return { target: "filter", action: "cancel", key };
        if (matches(key, km.acceptWhileFiltering))
            return { target: "filter", action: "accept", key };
        return { target: "filter", action: "edit", key };
    }

    if (matches(key, km.prevColumn))
        return { target: "selector", action: "prevColumn" };
    if (matches(key, km.nextColumn))
        return { target: "selector", action: "nextColumn" };
    if (matches(key, km.nextPage))
        return { target: "selector", action: "nextPage" };
    if (matches(key, km.prevPage))
        return { target: "selector", action: "prevPage" };
    if (matches(key, km.accept)) return { target: "selector", action: "accept" };
    if (matches(key, km.showFullHelp, km.closeFullHelp))
        return { target: "selector", action: "toggleHelp" };

    if (matches(key, km.cursorUp)) return { target: "column", action: "cursorUp" };
    if (matches(key, km.cursorDown))
        return { target: "column", action: "cursorDown" };
    if (matches(key, km.goToStart))
        return { target: "column", action: "goToStart" };
    if (matches(key, km.goToEnd)) return { target: "column", action: "goToEnd" };
    if (matches(key, km.filter)) return { target: "column", action: "filter" };
    if (matches(key, km.clearFilter))
        return { target: "column", action: "clearFilter" };

    return NONE;
}
