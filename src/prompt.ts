import { createInterface } from "node:readline/promises";
import { UserAbortError } from "./errors.js";
import { center, type Output } from "./output.js";

/** Anything that can ask the operator a question — readline in production, a script in tests */
export interface Prompter {
  question(query: string): Promise<string>;
  close(): void;
}

/** The part of a readline interface a prompter talks to */
export interface QuestionInterface {
  question(query: string): Promise<string>;
  close(): void;
  on(event: "SIGINT", listener: () => void): unknown;
}

export interface ReadlinePrompterOptions {
  open?: () => QuestionInterface;
  /** Called on Ctrl-C while a question is pending */
  interrupt?: () => void;
}

/**
 * Opens a readline interface for each question and closes it once answered,
 * so stdin is only held while waiting for the operator. Ctrl-C during a
 * question interrupts the whole process.
 */
export function createReadlinePrompter(options: ReadlinePrompterOptions = {}): Prompter {
  const open = options.open ?? (() => createInterface({ input: process.stdin, output: process.stdout }));
  const interrupt = options.interrupt ?? (() => process.kill(process.pid, "SIGINT"));
  let closed = false;

  return {
    question: async (query) => {
      if (closed) throw new Error("The prompter is closed");
      const rl = open();
      let released = false;
      const release = () => {
        if (released) return;
        released = true;
        rl.close();
      };
      rl.on("SIGINT", () => {
        release();
        interrupt();
      });
      try {
        return await rl.question(query);
      } finally {
        release();
      }
    },
    close: () => {
      closed = true;
    },
  };
}

/** True only for an explicit "y" */
export async function promptConfirm(prompter: Prompter, label: string): Promise<boolean> {
  const answer = (await prompter.question(label)).trim();
  return answer.toLowerCase() === "y";
}

/** Ask until the answer is one of `choices`; "" maps to `defaultValue` when given */
export async function promptChoice<T extends string>(
  prompter: Prompter,
  label: string,
  choices: readonly T[],
  defaultValue?: T,
): Promise<T> {
  while (true) {
    const answer = (await prompter.question(label)).trim();
    if (!answer && defaultValue !== undefined) return defaultValue;
    const match = choices.find((c) => c === answer);
    if (match !== undefined) return match;
  }
}

/**
 * Numbered menu. Re-asks on anything that is not a valid index;
 * "q" raises UserAbortError.
 */
export async function showMenu<T>(
  prompter: Prompter,
  out: Output,
  header: string,
  entries: readonly T[],
  label: (entry: T) => string = String,
): Promise<T> {
  if (!entries.length) throw new Error(`Nothing to select${header ? `: ${header}` : ""}`);
  out.log();
  out.log(center("", 80));
  const last = entries.length - 1;

  while (true) {
    if (header) out.log(header);
    entries.forEach((entry, i) => out.log(`${i}) ${label(entry)}`));
    const resp = (await prompter.question(`Please select an option (0-${last}, q to quit): `)).trim();
    if (resp.toLowerCase() === "q") throw new UserAbortError();
    if (!/^\d+$/.test(resp)) {
      out.error("Please enter a number");
      continue;
    }
    const index = Number(resp);
    const entry = entries[index];
    if (index > last || entry === undefined) {
      out.error(`Please enter a number between 0 and ${last}.`);
      continue;
    }
    return entry;
  }
}

/**
 * Parse a multi-selection such as "0,2,4-6" or "a" (all) against a list of
 * `count` entries. Returns null when the input is not valid.
 */
export function parseSelection(input: string, count: number): number[] | null {
  const text = input.trim().toLowerCase();
  if (text === "a") return Array.from({ length: count }, (_, i) => i);
  if (!text) return null;

  const picked = new Set<number>();
  for (const part of text.split(",")) {
    const range = part.trim().match(/^(\d+)(?:-(\d+))?$/);
    if (!range) return null;
    const from = Number(range[1]);
    const to = range[2] !== undefined ? Number(range[2]) : from;
    if (from > to || to >= count) return null;
    for (let i = from; i <= to; i++) picked.add(i);
  }
  return [...picked].sort((a, b) => a - b);
}

/** Numbered menu accepting several entries at once */
export async function showMultiMenu<T>(
  prompter: Prompter,
  out: Output,
  header: string,
  entries: readonly T[],
  label: (entry: T) => string = String,
): Promise<T[]> {
  if (!entries.length) throw new Error(`Nothing to select${header ? `: ${header}` : ""}`);
  out.log();
  out.log(center("", 80));
  const last = entries.length - 1;

  while (true) {
    if (header) out.log(header);
    entries.forEach((entry, i) => out.log(`${i}) ${label(entry)}`));
    const resp = await prompter.question(
      `Please select one or more options (0-${last}, "0,2" or "1-3" for several, "a" for all, q to quit): `,
    );
    if (resp.trim().toLowerCase() === "q") throw new UserAbortError();
    const indexes = parseSelection(resp, entries.length);
    if (!indexes) {
      out.error(`Please enter numbers between 0 and ${last}, separated by commas.`);
      continue;
    }
    return indexes.flatMap((i) => {
      const entry = entries[i];
      return entry === undefined ? [] : [entry];
    });
  }
}
