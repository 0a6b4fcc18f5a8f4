/**
 * CLI Progress Display
 *
 * Animated spinner and progress bar driven by an Observable.
 */

import type { Observable } from "rxjs";

// ANSI escape codes
const ESC = "\x1b";
const CLEAR_LINE = `${ESC}[2K`;
const DIM = `${ESC}[2m`;
const RESET = `${ESC}[0m`;
const GREEN = `${ESC}[32m`;
const YELLOW = `${ESC}[33m`;
const RED = `${ESC}[31m`;
const CYAN = `${ESC}[36m`;
const BOLD = `${ESC}[1m`;

const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
const BAR_WIDTH = 20;

export interface ProgressOptions {
  label: string;
  unit?: string;
  barWidth?: number;
  stream?: NodeJS.WriteStream;
}

export interface ProgressPosition {
  current: number;
  total: number;
}

/**
 * Render a progress bar while `source` runs.
 *
 * `mapper` turns a value into a bar position, or null to leave the bar as is.
 * Resolves with the last value the source emitted.
 */
export function runWithProgress<T>(
  source: Observable<T>,
  mapper: (value: T) => ProgressPosition | null,
  options: ProgressOptions
): Promise<T | undefined> {
  const {
    label,
    unit = "pages",
    barWidth = BAR_WIDTH,
    stream = process.stderr,
  } = options;

  let current = 0;
  let total = 0;
  let frame = 0;
  let last: T | undefined;

  function render(spinner: string) {
    const filled = total > 0 ? Math.round((current / total) * barWidth) : 0;
    const empty = barWidth - filled;
    const bar = `${GREEN}${"█".repeat(filled)}${RESET}${DIM}${"░".repeat(empty)}${RESET}`;
    const line = `${BOLD}${CYAN}${spinner}${RESET} ${label}  ${bar}  ${current}/${total} ${unit}`;
    stream.write(`\r${CLEAR_LINE}${line}`);
  }

  return new Promise<T | undefined>((resolve, reject) => {
    const timer = setInterval(() => {
      render(SPINNER_FRAMES[frame % SPINNER_FRAMES.length]);
      frame++;
    }, 80);

    source.subscribe({
      next(value) {
        last = value;
        const position = mapper(value);
        if (position) {
          current = position.current;
          total = position.total;
        }
      },
      error(err) {
        clearInterval(timer);
        stream.write(`\r${CLEAR_LINE}${RED}✗${RESET} ${label}  ${err instanceof Error ? err.message : String(err)}\n`);
        reject(err);
      },
      complete() {
        clearInterval(timer);
        const filled = `${GREEN}${"█".repeat(barWidth)}${RESET}`;
        stream.write(`\r${CLEAR_LINE}${GREEN}✔${RESET} ${label}  ${filled}  ${current}/${total} ${unit}\n`);
        resolve(last);
      },
    });
  });
}

export function printWarnings(warnings: string[], stream: NodeJS.WriteStream = process.stderr): void {
  if (warnings.length === 0) return;
  stream.write(`${YELLOW}⚠${RESET} ${BOLD}${warnings.length} warning(s)${RESET}\n`);
  for (const warning of warnings) {
    stream.write(`  ${DIM}-${RESET} ${warning}\n`);
  }
}
