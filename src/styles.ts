import chalk from "chalk";

// ══════════════════════════════════════════════════════════════════════════════
//  Styles
// ══════════════════════════════════════════════════════════════════════════════

/** One visual state. Every record stands on its own; none derives from another. */
export interface TextStyle {
    /** Foreground colour as a hex string. */
    readonly fg?: string;
    readonly bold?: boolean;
    readonly underline?: boolean;
    readonly inverse?: boolean;
    /** Blank cells before the text, counted in the cell's width. */
    readonly paddingLeft?: number;
}

export interface Styles {
    readonly focusedTitle: TextStyle;
    readonly blurredTitle: TextStyle;
    readonly item: TextStyle;
    readonly selectedItem: TextStyle;
    readonly filterPrompt: TextStyle;
    readonly filterText: TextStyle;
    readonly filterCursor: TextStyle;
    readonly pagination: TextStyle;
    readonly placeholder: TextStyle;
    readonly description: TextStyle;
    readonly border: TextStyle;
    readonly separator: TextStyle;
    readonly helpKey: TextStyle;
    readonly helpDesc: TextStyle;
    readonly helpSeparator: TextStyle;
}

const GREEN = "#2aa853";
const GREEN_LIGHT = "#9ad2a7";
const GRAY = "#e2e1ed";
const SUBTLE = "#383838";
const DIM = "#626262";

export function defaultStyles(): Styles {
    return Object.freeze({
        focusedTitle: { fg: GREEN_LIGHT, underline: true, paddingLeft: 1 },
        blurredTitle: { fg: SUBTLE, underline: true, paddingLeft: 1 },
        item: { paddingLeft: 1 },
        selectedItem: { fg: GREEN, bold: true, paddingLeft: 1 },
        filterPrompt: { fg: "#ecfd65", paddingLeft: 1 },
        filterText: {},
        filterCursor: { inverse: true },
        pagination: { fg: DIM, paddingLeft: 1 },
        placeholder: { fg: GRAY, paddingLeft: 1 },
        description: { fg: GRAY, paddingLeft: 2 },
        border: { fg: SUBTLE },
        separator: { fg: SUBTLE },
        helpKey: { fg: DIM },
        helpDesc: { fg: "#4a4a4a" },
        helpSeparator: { fg: "#3c3c3c" },
    });
}

/** Applies colour and attributes. Padding is the caller's business. */
export function paint(c: chalk.Chalk, style: TextStyle, text: string): string {
    if (!text) return "";
    let p = c;
    if (style.fg) p = p.hex(style.fg);
    if (style.bold) p = p.bold;
    if (style.underline) p = p.underline;
    if (style.inverse) p = p.inverse;
    return p(text);
}
