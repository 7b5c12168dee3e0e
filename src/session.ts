import * as readline from "readline";
import { Readable } from "stream";
import { SelectionResult, Selector } from "./selector";

// ══════════════════════════════════════════════════════════════════════════════
//  Terminal I/O
// ══════════════════════════════════════════════════════════════════════════════

/** All drawing goes through this interface, never to process.stdout directly. */
export interface ITerminalWriter {
    moveTo(row: number, col: number): void;
    write(text: string): void;
}

/** Default ITerminalWriter: ANSI escape codes on a writable stream. */
export class TerminalWriter implements ITerminalWriter {
    constructor(
        private readonly out: NodeJS.WritableStream = process.stdout,
    ) {}

    moveTo(row: number, col: number): void {
        this.out.write(`\x1b[${row};${col}H`);
    }
    write(text: string): void {
        this.out.write(text);
    }
}

export const ENTER_SCREEN = "\x1b[?1049h\x1b[2J\x1b[H\x1b[?25l";
export const EXIT_SCREEN = "\x1b[?25h\x1b[?1049l";
export const CLEAR_LINE = "\x1b[2K";

export class Screen {
    private active = false;

    constructor(private readonly writer: ITerminalWriter) {}

    enter(): void {
        if (this.active) return;
        this.active = true;
        this.writer.write(ENTER_SCREEN);
    }

    exit(): void {
        if (!this.active) return;
        this.active = false;
        this.writer.write(EXIT_SCREEN);
    }
}

// ══════════════════════════════════════════════════════════════════════════════
//  Session: drives a Selector from keypress events until it terminates
// ══════════════════════════════════════════════════════════════════════════════

/** A key source: process.stdin, or any readable stream in tests. */
export type KeyInput = Readable & {
    isTTY?: boolean;
    setRawMode?: (mode: boolean) => unknown;
};

export interface SessionOptions {
    input?: KeyInput;
    writer?: ITerminalWriter;
    /** Top-left corner of the box, 1-based. */
    row?: number;
    col?: number;
    /** Draw the help line under the box. */
    showHelp?: boolean;
}

export class Session {
    private readonly input: KeyInput;
    private readonly writer: ITerminalWriter;
    private readonly screen: Screen;
    private readonly row: number;
    private readonly col: number;
    private readonly showHelp: boolean;
    private drawnLines = 0;

    constructor(
        private readonly selector: Selector,
        options: SessionOptions = {},
    ) {
        this.input = options.input ?? process.stdin;
        this.writer = options.writer ?? new TerminalWriter();
        this.screen = new Screen(this.writer);
        this.row = options.row ?? 1;
        this.col = options.col ?? 1;
        this.showHelp = options.showHelp ?? true;
    }

    /**
     * Resolves with the selector's result once it terminates. The end of
     * the input cancels the selection; an input error restores the
     * terminal and rejects.
     */
    start(): Promise<SelectionResult> {
        return new Promise((resolve, reject) => {
            if (this.selector.terminated) {
                resolve(this.selector.result());
                return;
            }

            const raw = this.input.isTTY === true;
            readline.emitKeypressEvents(this.input);
            if (raw) this.input.setRawMode?.(true);

            const onKey = (_str: string | undefined, key: readline.Key | undefined) => {
                if (!key) return;
                this.selector.update({ kind: "key", key });
                if (this.selector.terminated) {
                    finish();
                    return;
                }
                this.render();
            };

            const onEnd = () => {
                this.selector.cancel();
                finish();
            };

            const onError = (err: Error) => {
                this.selector.cancel();
                restore();
                reject(err);
            };

            const restore = () => {
                this.input.off("keypress", onKey);
                this.input.off("end", onEnd);
                this.input.off("close", onEnd);
                this.input.off("error", onError);
                if (raw) this.input.setRawMode?.(false);
                this.input.pause();
                this.screen.exit();
            };

            const finish = () => {
                restore();
                resolve(this.selector.result());
            };

            this.screen.enter();
            this.input.on("keypress", onKey);
            this.input.once("end", onEnd);
            this.input.once("close", onEnd);
            this.input.once("error", onError);
            this.input.resume();
            this.render();
        });
    }

    resize(width: number, height: number): void {
        this.selector.update({ kind: "resize", width, height });
        if (!this.selector.terminated) this.render();
    }

    render(): void {
        const lines = this.selector.view().split("\n");
        if (this.showHelp) lines.push(...this.selector.helpView().split("\n"));

        lines.forEach((line, i) => {
            this.writer.moveTo(this.row + i, this.col);
            this.writer.write(CLEAR_LINE + line);
        });
        for (let i = lines.length; i < this.drawnLines; i++) {
            this.writer.moveTo(this.row + i, this.col);
            this.writer.write(CLEAR_LINE);
        }
        this.drawnLines = lines.length;
    }
}
