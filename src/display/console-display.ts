import type { RunEvent, RunResult, RunVerdict } from "../executor/types.js";
import type { ActionState } from "../graph/types.js";

export type DisplayStyle = "prefixes" | "headers";

export const DISPLAY_STYLES: readonly DisplayStyle[] = ["prefixes", "headers"];

export type ConsoleDisplayOptions = {
  /** Receives one rendered line at a time. Defaults to stdout. */
  write?: (line: string) => void;
  color?: boolean;
  style?: DisplayStyle;
};

type Paint = (s: string) => string;

const ANSI = {
  reset: "\x1b[0m",
  gray: "\x1b[90m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  magenta: "\x1b[35m",
};

function palette(enabled: boolean) {
  const wrap =
    (code: string): Paint =>
    (s) =>
      enabled ? `${code}${s}${ANSI.reset}` : s;
  return {
    gray: wrap(ANSI.gray),
    red: wrap(ANSI.red),
    green: wrap(ANSI.green),
    yellow: wrap(ANSI.yellow),
    magenta: wrap(ANSI.magenta),
    plain: (s: string) => s,
  };
}

const MARKS: Record<ActionState, string> = {
  PENDING: "◯",
  READY: "◯",
  RUNNING: "◯",
  SKIPPED: "◯",
  SUCCESS: "✓",
  WARNING: "⚠",
  FAILURE: "✗",
  CANCELLED: "⊘",
};

export const fmtMs = (ms: number) => (ms < 1000 ? `${Math.round(ms)}ms` : `${(ms / 1000).toFixed(1)}s`);

/**
 * Renders run events as text. `prefixes` tags every output line with the
 * action id; `headers` groups consecutive lines under a boxed header.
 */
export class ConsoleDisplay {
  private readonly write: (line: string) => void;
  private readonly style: DisplayStyle;
  private readonly c: ReturnType<typeof palette>;
  private nameWidth = 0;
  private lastShown: string | null = null;

  constructor(opts: ConsoleDisplayOptions = {}) {
    this.write = opts.write ?? ((line) => process.stdout.write(`${line}\n`));
    this.style = opts.style ?? "prefixes";
    this.c = palette(opts.color ?? false);
  }

  /** Pass as `onEvent` to the engine. */
  readonly handle = (event: RunEvent): void => {
    switch (event.type) {
      case "run:started":
        this.nameWidth = Math.max(0, ...event.actionIds.map((id) => id.length));
        this.lastShown = null;
        break;
      case "action:message": {
        const stderr = event.stream === "stderr";
        this.write(`${this.prologue(event.actionId, stderr ? "*" : " ")}${stderr ? this.c.yellow(event.message) : event.message}`);
        break;
      }
      case "action:transition":
        if ((event.to === "FAILURE" || event.to === "WARNING") && event.cause) {
          const paint = event.to === "FAILURE" ? this.c.red : this.c.yellow;
          for (const line of event.cause.split("\n")) {
            this.write(`${this.prologue(event.actionId, "!")}${paint(line)}`);
          }
        }
        break;
      case "run:finished":
        this.banner(event.result);
        break;
    }
  };

  banner(result: RunResult): void {
    const color = (state: ActionState | RunVerdict): Paint => {
      switch (state) {
        case "SUCCESS":
          return this.c.green;
        case "FAILURE":
          return this.c.red;
        case "WARNING":
          return this.c.yellow;
        case "CANCELLED":
          return this.c.magenta;
        case "RUNNING":
          return this.c.plain;
        default:
          return this.c.gray;
      }
    };

    if (this.style === "headers") {
      this.closeBlock();
      for (const action of result.actions) {
        this.write(color(action.state)(` ${MARKS[action.state]} ${action.state}: ${action.id}`));
      }
    } else {
      // "CANCELLED: " is the widest state label
      this.write(this.c.gray("=".repeat(this.nameWidth + 11)));
      for (const action of result.actions) {
        this.write(`${color(action.state)(action.state)}: ${action.id}`);
      }
    }
    this.write(`${color(result.verdict)(`Run ${result.verdict}`)} ${this.c.gray(`(${fmtMs(result.durationMs)})`)}`);
  }

  private prologue(actionId: string, mark: string): string {
    if (this.style === "headers") {
      if (this.lastShown !== actionId) {
        this.closeBlock();
        this.write(this.c.gray(` ┌─[${actionId}]`));
        this.lastShown = actionId;
      }
      return this.c.gray(`${mark}│ `);
    }

    const width = this.nameWidth + 2;
    const name = this.lastShown !== actionId ? `[${actionId}]`.padEnd(width) : " ".repeat(width);
    this.lastShown = actionId;
    return this.c.gray(`${name} ${mark}| `);
  }

  private closeBlock(): void {
    if (this.lastShown !== null) this.write(this.c.gray(" ╵"));
    this.lastShown = null;
  }
}
