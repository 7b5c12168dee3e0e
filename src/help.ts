import chalk from "chalk";
import { KeyBinding } from "./keymap";
import { Styles, TextStyle, paint } from "./styles";
import { width as cellWidth } from "./text";

// ══════════════════════════════════════════════════════════════════════════════
//  Key help rendering
// ══════════════════════════════════════════════════════════════════════════════

const SHORT_SEPARATOR = " • ";
const GROUP_GAP = "    ";
const ELLIPSIS = "..";

interface Seg {
    plain: string;
    style: TextStyle;
}

function bindingSegs(b: KeyBinding, styles: Styles): Seg[] {
    return [
        { plain: b.help.key, style: styles.helpKey },
        { plain: " ", style: {} },
        { plain: b.help.desc, style: styles.helpDesc },
    ];
}

/**
 * One line of `key desc` pairs. A pair that does not fit is replaced by
 * ".." when there is room for it, and nothing after it is drawn.
 */
export function renderShortHelp(
    bindings: readonly KeyBinding[],
    c: chalk.Chalk,
    styles: Styles,
    maxWidth: number,
): string {
    let out = "";
    let used = 0;

    for (let i = 0; i < bindings.length; i++) {
        const b = bindings[i];
        if (!b) continue;
        const segs: Seg[] =
            i > 0
                ? [{ plain: SHORT_SEPARATOR, style: styles.helpSeparator }]
                : [];
        segs.push(...bindingSegs(b, styles));
        const w = segs.reduce((s, seg) => s + cellWidth(seg.plain), 0);

        if (used + w > maxWidth) {
            const tail = " " + ELLIPSIS;
            if (used + cellWidth(tail) <= maxWidth) {
                out += paint(c, styles.helpSeparator, tail);
            }
            break;
        }
        out += segs.map((seg) => paint(c, seg.style, seg.plain)).join("");
        used += w;
    }

    return out;
}

/**
 * Groups side by side, one binding per row. Groups are added left to
 * right while they fit in `maxWidth`.
 */
export function renderFullHelp(
    groups: readonly (readonly KeyBinding[])[],
    c: chalk.Chalk,
    styles: Styles,
    maxWidth: number,
): string {
    const columns: { rows: string[]; width: number }[] = [];
    let used = 0;

    for (const group of groups) {
        if (group.length === 0) continue;
        const keyW = group.reduce((m, b) => Math.max(m, cellWidth(b.help.key)), 0);
        const descW = group.reduce((m, b) => Math.max(m, cellWidth(b.help.desc)), 0);
        const colW = keyW + 1 + descW;
        const gap = columns.length > 0 ? GROUP_GAP.length : 0;
        if (used + gap + colW > maxWidth) break;

        const rows = group.map(
            (b) =>
                paint(c, styles.helpKey, b.help.key) +
                " ".repeat(keyW - cellWidth(b.help.key) + 1) +
                paint(c, styles.helpDesc, b.help.desc) +
                " ".repeat(descW - cellWidth(b.help.desc)),
        );
        columns.push({ rows, width: colW });
        used += gap + colW;
    }

    const height = columns.reduce((m, col) => Math.max(m, col.rows.length), 0);
    const lines: string[] = [];
    for (let r = 0; r < height; r++) {
        const parts = columns.map((col) => col.rows[r] ?? " ".repeat(col.width));
        lines.push(parts.join(GROUP_GAP).trimEnd());
    }
    return lines.join("\n");
}
