import * as assert from "node:assert/strict";
import { describe, it } from "node:test";
import * as readline from "readline";
import { DONE, Selector, isDone } from "../selector";
import { StaticValues, entry } from "../values";
import { char, keys, plain, tablesAndColumns } from "./helpers";

function press(s: Selector, ...ks: readline.Key[]): void {
    for (const key of ks) s.update({ kind: "key", key });
}

function selectorWith(values = tablesAndColumns()): Selector {
    const s = new Selector({ chalk: plain });
    s.setValues(values);
    return s;
}

function columns(n: number, perColumn = 2): StaticValues {
    return new StaticValues(
        Array.from({ length: n }, (_, c) => ({
            name: `cat${c}`,
            entries: Array.from({ length: perColumn }, (_, i) =>
                entry(`c${c}e${i}`),
            ),
        })),
    );
}

describe("Selector column switching", () => {
    it("wraps between Tables and Columns and resets the cursor", () => {
        const s = selectorWith();
        assert.equal(s.column(0)?.title, "Tables");

        press(s, keys.right);
        assert.equal(s.activeColumnIndex, 1);
        assert.equal(s.activeColumn()?.title, "Columns");
        assert.equal(s.activeColumn()?.index(), 0);

        press(s, keys.down, keys.down, keys.left);
        assert.equal(s.activeColumnIndex, 0);
        assert.equal(s.activeColumn()?.index(), 0);

        press(s, keys.left);
        assert.equal(s.activeColumnIndex, 1);
        assert.equal(s.activeColumn()?.index(), 0);
    });

    it("returns to the start after N switches for every N", () => {
        for (let n = 1; n <= 5; n++) {
            const s = selectorWith(columns(n));
            for (let i = 0; i < n; i++) {
                press(s, keys.down, keys.altN);
                assert.equal(s.activeColumnIndex, (i + 1) % n);
                assert.equal(s.activeColumn()?.index(), 0);
            }
            assert.equal(s.activeColumnIndex, 0);
        }
    });

    it("turns pgdown on the last page into a column switch", () => {
        const s = selectorWith(columns(3, 6));
        press(s, keys.pageDown);
        assert.equal(s.activeColumnIndex, 0);
        assert.deepEqual(s.activeColumn()?.pageInfo(), { page: 1, totalPages: 2 });

        press(s, keys.pageDown);
        assert.equal(s.activeColumnIndex, 1);
        assert.deepEqual(s.activeColumn()?.pageInfo(), { page: 0, totalPages: 2 });
    });

    it("turns pgup on the first page into a switch to the previous column", () => {
        const s = selectorWith(columns(3, 6));
        press(s, keys.pageUp);
        assert.equal(s.activeColumnIndex, 2);
        assert.equal(s.activeColumn()?.index(), 0);
    });

    it("moves focus with the active column", () => {
        const s = selectorWith();
        assert.equal(s.column(0)?.isFocused(), true);
        press(s, keys.right);
        assert.equal(s.column(0)?.isFocused(), false);
        assert.equal(s.column(1)?.isFocused(), true);

        s.blur();
        press(s, keys.right);
        assert.equal(s.column(0)?.isFocused(), false);
        assert.equal(s.column(1)?.isFocused(), false);
    });
});

describe("Selector termination", () => {
    it("accepts the single entry at once", () => {
        const s = selectorWith(
            new StaticValues([{ name: "Only", entries: [entry("one", "the one")] }]),
        );
        press(s, keys.enter);
        assert.equal(s.terminated, true);
        assert.equal(s.outcome, "accepted");
        assert.deepEqual(s.acceptedEntry, { title: "one", description: "the one" });
        assert.equal(s.err, DONE);
        assert.equal(isDone(s.err), true);
    });

    it("cancels the single entry on abort", () => {
        const s = selectorWith(
            new StaticValues([{ name: "Only", entries: [entry("one")] }]),
        );
        press(s, keys.escape);
        assert.equal(s.outcome, "cancelled");
        assert.equal(s.acceptedEntry, undefined);
        assert.deepEqual(s.result(), { status: "cancelled" });
    });

    it("accepts whatever the active column highlights", () => {
        const s = selectorWith();
        press(s, keys.right, keys.down, keys.down, keys.ctrlJ);
        assert.deepEqual(s.result(), {
            status: "accepted",
            entry: { title: "email", description: "contact address" },
        });
    });

    it("aborts mid-filter with nothing accepted", () => {
        const s = selectorWith();
        press(s, keys.down, keys.slash, char("o"));
        assert.equal(s.activeColumn()?.isFiltering(), true);
        press(s, keys.ctrlC);
        assert.equal(s.outcome, "cancelled");
        assert.equal(s.acceptedEntry, undefined);
    });

    it("terminates immediately on an empty source", () => {
        const s = selectorWith(new StaticValues([]));
        assert.equal(s.columnCount, 0);
        assert.equal(s.terminated, true);
        assert.equal(s.outcome, "cancelled");
        assert.equal(s.acceptedEntry, undefined);
    });

    it("cancels when accepting in an empty category", () => {
        const s = selectorWith(new StaticValues([{ name: "Empty", entries: [] }]));
        press(s, keys.enter);
        assert.equal(s.outcome, "cancelled");
    });

    it("ignores keys once terminated", () => {
        const s = selectorWith();
        press(s, keys.escape, keys.right, keys.enter);
        assert.equal(s.activeColumnIndex, 0);
        assert.equal(s.outcome, "cancelled");
    });

    it("starts over on setValues", () => {
        const s = selectorWith();
        press(s, keys.right, keys.enter);
        assert.equal(s.outcome, "accepted");

        s.setValues(tablesAndColumns());
        assert.equal(s.terminated, false);
        assert.equal(s.err, undefined);
        assert.equal(s.acceptedEntry, undefined);
        assert.equal(s.activeColumnIndex, 0);
        assert.equal(s.column(0)?.isFocused(), true);
    });

    it("terminates on the first key when never given values", () => {
        const s = new Selector({ chalk: plain });
        assert.equal(s.terminated, false);
        press(s, keys.down);
        assert.equal(s.outcome, "cancelled");
    });
});

describe("Selector column views", () => {
    it("exposes no way to change a column", () => {
        const s = selectorWith();
        press(s, keys.escape);
        const view = s.activeColumn();
        assert.ok(view);
        assert.equal("cursorDown" in view, false);
        assert.equal("startFiltering" in view, false);
        assert.equal(Object.isFrozen(view), true);
        assert.equal(view.currentItem()?.title, "users");
        assert.equal(view.isFiltering(), false);
    });

    it("follows the column it was taken from", () => {
        const s = selectorWith();
        const view = s.column(0);
        press(s, keys.down, keys.slash, char("o"));
        assert.equal(view?.isFiltering(), true);
        assert.equal(view?.filterValue(), "o");
        assert.equal(view?.currentItem()?.title, "orders");
    });
});

describe("Selector.cancel", () => {
    it("terminates as cancelled", () => {
        const s = selectorWith();
        press(s, keys.down);
        s.cancel();
        assert.deepEqual(s.result(), { status: "cancelled" });
    });

    it("leaves a finished selection alone", () => {
        const s = selectorWith();
        press(s, keys.enter);
        s.cancel();
        assert.equal(s.acceptedEntry?.title, "users");
    });
});

describe("Selector filtering", () => {
    it("accepts an empty filter and then the top item", () => {
        const s = selectorWith();
        press(s, keys.down, keys.down, keys.slash);
        assert.equal(s.activeColumn()?.isFiltering(), true);

        press(s, keys.enter);
        assert.equal(s.terminated, false);
        assert.equal(s.activeColumn()?.isFiltering(), false);

        press(s, keys.enter);
        assert.equal(s.acceptedEntry?.title, "users");
    });

    it("keeps column and page keys inside the filter", () => {
        const s = selectorWith();
        press(s, keys.slash, keys.right, keys.pageDown);
        assert.equal(s.activeColumnIndex, 0);
        assert.equal(s.activeColumn()?.isFiltering(), true);
    });

    it("commits a typed filter and accepts the top match", () => {
        const s = selectorWith();
        press(s, keys.slash, char("o"), char("r"), char("d"));
        assert.deepEqual(
            s.activeColumn()?.visibleItems().map((e) => e.title),
            ["orders"],
        );
        press(s, keys.enter, keys.enter);
        assert.equal(s.acceptedEntry?.title, "orders");
    });

    it("cancels the filter with ctrl+g", () => {
        const s = selectorWith();
        press(s, keys.slash, char("x"), keys.ctrlG);
        assert.equal(s.activeColumn()?.filterState(), "unfiltered");
        assert.equal(s.activeColumn()?.visibleItems().length, 3);
    });
});

describe("Selector layout", () => {
    it("computes maxHeight over all categories", () => {
        const s = selectorWith();
        assert.equal(s.getMaxHeight(), 8);
        assert.equal(s.getHeight(), 8);
        assert.equal(s.column(0)?.height, 7);
    });

    it("clamps setHeight and propagates one row less to every column", () => {
        const s = selectorWith();
        s.setHeight(1);
        assert.equal(s.getHeight(), 2);
        s.setHeight(50);
        assert.equal(s.getHeight(), 8);
        s.setHeight(5);
        assert.equal(s.getHeight(), 5);
        assert.equal(s.column(0)?.height, 4);
        assert.equal(s.column(1)?.height, 4);
        assert.equal(s.getMaxHeight(), 8);
    });

    it("floors column widths but stores the width as given", () => {
        const s = selectorWith();
        s.setWidth(4);
        assert.equal(s.getWidth(), 4);
        assert.equal(s.column(0)?.width, 10);
    });

    it("reads a non-finite height or width as the floor", () => {
        const s = selectorWith();
        s.setHeight(Number.NaN);
        assert.equal(s.getHeight(), 2);
        assert.equal(s.column(0)?.height, 1);
        s.setHeight(Number.POSITIVE_INFINITY);
        assert.equal(s.getHeight(), 2);

        s.setWidth(Number.NaN);
        assert.equal(s.getWidth(), 0);
        assert.equal(s.column(0)?.width, 10);
        assert.equal(s.view(), "");
    });

    it("ignores resize events with non-finite dimensions", () => {
        const s = selectorWith();
        s.setWidth(40);
        s.update({ kind: "resize", width: Number.NaN, height: Number.NaN });
        s.update({ kind: "resize", width: 30, height: Number.POSITIVE_INFINITY });
        assert.equal(s.getWidth(), 40);
        assert.equal(s.getHeight(), 8);
        assert.equal(s.column(0)?.height, 7);
    });

    it("applies resize events, also after termination", () => {
        const s = selectorWith();
        press(s, keys.escape);
        s.update({ kind: "resize", width: 30, height: 4 });
        assert.equal(s.getWidth(), 30);
        assert.equal(s.getHeight(), 4);
    });
});

describe("Selector help and key matching", () => {
    it("builds short help from the state", () => {
        const s = selectorWith();
        const km = s.keyMap;
        assert.deepEqual(s.shortHelp(), [
            km.abort,
            km.nextColumn,
            km.accept,
            km.cursorUp,
            km.cursorDown,
            km.filter,
            km.showFullHelp,
        ]);
        press(s, keys.slash);
        assert.deepEqual(s.shortHelp(), [
            km.abort,
            km.acceptWhileFiltering,
            km.cancelWhileFiltering,
        ]);
    });

    it("leaves out column switching for a single column", () => {
        const s = selectorWith(columns(1));
        const km = s.keyMap;
        assert.deepEqual(s.fullHelp()[0], [km.accept, km.abort]);
    });

    it("toggles full help", () => {
        const s = selectorWith();
        assert.equal(s.isShowingFullHelp(), false);
        press(s, keys.altQuestion);
        assert.equal(s.isShowingFullHelp(), true);
    });

    it("matches keys only when focused", () => {
        const s = selectorWith();
        assert.equal(s.matchesKey(keys.down), true);
        assert.equal(s.matchesKey(char("q")), false);
        press(s, keys.slash);
        assert.equal(s.matchesKey(char("q")), true);
        s.blur();
        assert.equal(s.matchesKey(keys.down), false);
    });
});

describe("Selector.debug", () => {
    it("dumps dimensions, position and outcome", () => {
        const s = selectorWith();
        s.setWidth(40);
        press(s, keys.down);
        assert.equal(
            s.debug(),
            [
                "width: 40, height: 8, maxHeight: 8",
                "num columns: 2",
                "active column: 0",
                "selected item: orders",
                "accepted: <none> / err: <none>",
                "",
            ].join("\n"),
        );
    });
});
