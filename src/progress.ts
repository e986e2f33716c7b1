import chalk from "chalk";
import type { Logger } from "./logger.js";
import { center, type Output } from "./output.js";

// ---------------------------------------------------------------------------
// Text progress bars
// ---------------------------------------------------------------------------

/** Columns used by "Progress: [", "]" and the percentage */
const PERCENT_BAR_CHROME = 17;

/** `Progress: [█████.....]  n/total` — the bar itself is `size` columns */
export function renderCountBar(count: number, total: number, size: number): string {
  if (total <= 0) return "";
  const done = Math.min(count, total);
  const x = Math.floor((size * done) / total);
  return (
    "Progress: ".padEnd(10) +
    `[${"█".repeat(x)}${".".repeat(size - x)}]` +
    `${done}/${total}\r`.padStart(79 - size - 10)
  );
}

/** `Progress: [█████.....]  42%` — `size` columns wide in total */
export function renderPercentBar(count: number, total: number, size = 80): string {
  const ratio = total > 0 ? Math.min(count, total) / total : 0;
  const width = size - PERCENT_BAR_CHROME;
  const x = Math.floor(width * ratio);
  return `Progress: [${"█".repeat(x)}${".".repeat(width - x)}]` + `${Math.floor(ratio * 100)}%`.padStart(5);
}

const CURSOR_UP = "\x1b[A";
const CURSOR_PREV_LINE = "\x1b[F";

/**
 * Step-by-step progress display: every step prints "<message> ....... ✔"
 * above a percent bar that is redrawn in place. Results are also logged.
 */
export class ProgressBar {
  private stepsTotal = 0;
  private stepsCount = 0;

  constructor(
    private readonly out: Output,
    private readonly logger: Logger,
    private readonly size = 80,
  ) {}

  setStepsTotal(total: number): void {
    this.stepsTotal = total;
    this.stepsCount = 0;
  }

  get completed(): number {
    return this.stepsCount;
  }

  /** Count bar for single-pass loops, redrawn on the same line */
  tick(count: number, total: number, size: number): void {
    const bar = renderCountBar(count, total, size);
    if (bar) this.out.write(bar);
  }

  endTicks(total: number, size: number): void {
    if (total <= 0) return;
    this.tick(total, total, size);
    this.out.write("\n");
  }

  logTitle(message: string, options: { end?: boolean; displayBar?: boolean } = {}): void {
    const { end = false, displayBar = true } = options;
    this.logger.info(message);
    this.out.log(CURSOR_UP);
    this.out.log(`${center(` ${message} `, this.size)} \n\n`);
    if (!end && displayBar) {
      this.out.log("".padEnd(80));
      this.drawBar();
    }
  }

  logMessage(message: string, displayBar = true): void {
    this.step(message, " ", false, displayBar);
  }

  logSuccess(message: string, options: { inc?: boolean; displayBar?: boolean } = {}): void {
    this.logger.info(`${message}: Success`);
    this.step(message, `${chalk.green("✔")}\n`, options.inc ?? false, options.displayBar ?? true);
  }

  logWarning(message: string, options: { inc?: boolean; displayBar?: boolean } = {}): void {
    this.logger.warn(`${message}: Warning`);
    this.step(message, `${chalk.yellow("⭘")}\n`, options.inc ?? false, options.displayBar ?? true);
  }

  logFailure(
    message: string,
    options: { inc?: boolean; displayBar?: boolean; err?: unknown } = {},
  ): void {
    if (options.err !== undefined) {
      this.logger.error({ err: options.err }, `${message}: Failure`);
    } else {
      this.logger.error(`${message}: Failure`);
    }
    this.step(message, `${chalk.red("✖")}\n`, options.inc ?? false, options.displayBar ?? true);
  }

  private step(message: string, result: string, inc: boolean, displayBar: boolean): void {
    if (inc) this.stepsCount += 1;
    const text = `${CURSOR_UP}${CURSOR_PREV_LINE}${message} `;
    this.out.log(`${text.padEnd(this.size + 4, ".")} ${result}`);
    this.out.log("".padEnd(80));
    if (displayBar) this.drawBar();
  }

  private drawBar(): void {
    this.out.write(renderPercentBar(this.stepsCount, this.stepsTotal, this.size));
  }
}
