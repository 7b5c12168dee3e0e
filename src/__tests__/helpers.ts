import chalk from "chalk";
import * as readline from "readline";
import { StaticValues, entry } from "../values";

/** Keys shaped the way readline.emitKeypressEvents reports them. */
export const keys = {
    up: { name: "up", sequence: "\x1b[A" },
    down: { name: "down", sequence: "\x1b[B" },
    left: { name: "left", sequence: "\x1b[D" },
    right: { name: "right", sequence: "\x1b[C" },
    home: { name: "home", sequence: "\x1b[H" },
    end: { name: "end", sequence: "\x1b[F" },
    pageUp: { name: "pageup", sequence: "\x1b[5~" },
    pageDown: { name: "pagedown", sequence: "\x1b[6~" },
    enter: { name: "return", sequence: "\r" },
    ctrlJ: { name: "enter", sequence: "\n" },
    escape: { name: "escape", sequence: "\x1b" },
    tab: { name: "tab", sequence: "\t" },
    shiftTab: { name: "tab", shift: true, sequence: "\x1b[Z" },
    backspace: { name: "backspace", sequence: "\x7f" },
    ctrlC: { name: "c", ctrl: true, sequence: "\x03" },
    ctrlG: { name: "g", ctrl: true, sequence: "\x07" },
    ctrlP: { name: "p", ctrl: true, sequence: "\x10" },
    ctrlN: { name: "n", ctrl: true, sequence: "\x0e" },
    altN: { name: "n", meta: true, sequence: "\x1bn" },
    altP: { name: "p", meta: true, sequence: "\x1bp" },
    altQuestion: { meta: true, sequence: "\x1b?" },
    slash: { sequence: "/" },
} satisfies Record<string, readline.Key>;

/** A printable character key. */
export function char(ch: string): readline.Key {
    const lower = ch.toLowerCase();
    return /^[a-z]$/i.test(ch)
        ? { name: lower, sequence: ch, shift: ch !== lower }
        : { sequence: ch };
}

export const plain = new chalk.Instance({ level: 0 });

export function tablesAndColumns(): StaticValues {
    return new StaticValues([
        {
            name: "Tables",
            entries: [
                entry("users", "registered accounts"),
                entry("orders", "one row per checkout"),
                entry("items"),
            ],
        },
        {
            name: "Columns",
            entries: [
                entry("id", "primary key"),
                entry("name"),
                entry("email", "contact address"),
                entry("created_at"),
                entry("total"),
            ],
        },
    ]);
}
