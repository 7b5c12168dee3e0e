import chalk from "chalk";
import stringWidth from "string-width";
import { TextStyle, paint } from "./styles";

// ══════════════════════════════════════════════════════════════════════════════
//  Cell-width helpers (plain text in, plain or painted text out)
// ══════════════════════════════════════════════════════════════════════════════

const CONTROL_CHARS = /[\u0000-\u001f\u007f-\u009f]/g;

/** Control characters such as newlines become single spaces. */
export function singleLine(text: string): string {
    return text.replace(CONTROL_CHARS, " ");
}

export function width(text: string): number {
    return stringWidth(singleLine(text));
}

/** Longest prefix of `text`, on one line, that fits in `max` cells. */
export function truncate(raw: string, max: number): string {
    if (max <= 0) return "";
    const text = singleLine(raw);
    if (stringWidth(text) <= max) return text;
    let out = "";
    let used = 0;
    for (const ch of text) {
        const w = stringWidth(ch);
        if (used + w > max) break;
        out += ch;
        used += w;
    }
    return out;
}

/**
 * Renders `text` in a cell exactly `cells` wide: left padding from the
 * style, the text cut to what remains, painted, then blank fill. Only the
 * text itself is painted so attributes such as underline stop at the text.
 */
export function cell(
    c: chalk.Chalk,
    style: TextStyle,
    text: string,
    cells: number,
): string {
    if (cells <= 0) return "";
    const pad = Math.min(style.paddingLeft ?? 0, cells);
    const body = truncate(text, cells - pad);
    const rest = cells - pad - stringWidth(body);
    return " ".repeat(pad) + paint(c, style, body) + " ".repeat(rest);
}
