import { log } from "../utils/logger.js";

/**
 * Shell functions prepended to scripts when yield injection is enabled.
 * `yield_outcome KEY [VALUE]` reads the value from stdin when none is given.
 */
export const SHELL_SERVICE_FUNCTIONS = `yield_outcome(){
  [ "$1" = "" ] && echo "Missing key (first argument)" >&2 && return 1
  command -v base64 >/dev/null || { echo "Missing command: base64" >&2; return 2; }
  [ "$2" = "" ] && value="$(cat /dev/stdin)" || value="$2"
  echo "##taskweave[yield-outcome-b64 $(printf '%s' "$1" | base64 | tr -d '\\n') $(printf '%s' "$value" | base64 | tr -d '\\n')]##"
  return 0
}
`;

const SERVICE_LINE = /^(.*?)##taskweave\[([A-Za-z0-9+/= -]+)\]##$/;
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/** Encode an outcome the way `yield_outcome` prints it. */
export function formatYieldLine(key: string, value: string): string {
  const b64 = (s: string) => Buffer.from(s, "utf8").toString("base64");
  return `##taskweave[yield-outcome-b64 ${b64(key)} ${b64(value)}]##`;
}

/**
 * Scans stdout lines for service messages. Visible text is passed on;
 * service messages are removed and collected as outcomes. Text printed on
 * the same line before a service message is carried over to the next line.
 */
export class EmissionScanner {
  readonly outcomes: Record<string, string> = {};
  private carried = "";
  private onText: (line: string) => void;

  constructor(onText: (line: string) => void) {
    this.onText = onText;
  }

  push(line: string): void {
    const match = line.endsWith("]##") ? SERVICE_LINE.exec(line) : null;
    if (!match) {
      this.onText(this.carried + line);
      this.carried = "";
      return;
    }
    this.carried += match[1];
    this.apply(match[2]);
  }

  flush(): void {
    if (this.carried) {
      this.onText(this.carried);
      this.carried = "";
    }
  }

  private apply(expression: string): void {
    const [type, ...args] = expression.trim().split(/\s+/);
    if (type !== "yield-outcome-b64" || args.length < 1 || args.length > 2 || !args.every((a) => BASE64.test(a))) {
      log.warn("Ignoring unrecognized service message", { expression });
      return;
    }
    const [key, value = ""] = args.map((a) => Buffer.from(a, "base64").toString("utf8"));
    if (key in this.outcomes) {
      log.debug(`Outcome "${key}" yielded again, keeping the latest value`);
    }
    this.outcomes[key] = value;
  }
}
