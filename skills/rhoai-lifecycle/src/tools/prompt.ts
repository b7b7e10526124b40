import { createInterface } from "node:readline";
import { logError } from "./log.js";

/** Asks one question and resolves with the trimmed answer. */
export type Ask = (message: string) => Promise<string>;

export class InputClosedError extends Error {
  constructor() {
    super("Input closed before an answer was given");
    this.name = "InputClosedError";
  }
}

/**
 * Prompt user for input using readline. Rejects with InputClosedError on EOF,
 * so a closed stdin cannot leave a confirmation loop spinning.
 */
export const prompt: Ask = (message) => {
  const rl = createInterface({
    input: process.stdin,
    output: process.stderr,
  });

  return new Promise((resolve, reject) => {
    let answered = false;
    // readline swallows Ctrl-C while a question is open; hand it back to the process handler.
    rl.on("SIGINT", () => {
      process.kill(process.pid, "SIGINT");
    });
    rl.on("close", () => {
      if (!answered) reject(new InputClosedError());
    });
    rl.question(message, (answer) => {
      answered = true;
      rl.close();
      resolve(answer.trim());
    });
  });
};

export type Choice<T extends string> = { value: T; accepted: string[] };

/** Asks until the answer matches one of the choices' accepted spellings. */
export async function choose<T extends string>(
  ask: Ask,
  message: string,
  choices: Array<Choice<T>>,
  invalidMessage: string
): Promise<T> {
  while (true) {
    const answer = await ask(message);
    const match = choices.find((c) => c.accepted.includes(answer));
    if (match) return match.value;
    logError(invalidMessage);
  }
}

export async function confirm(ask: Ask, message: string): Promise<boolean> {
  const answer = await choose(
    ask,
    `${message} (y/n): `,
    [
      { value: "yes", accepted: ["y", "Y", "yes", "Yes", "YES"] },
      { value: "no", accepted: ["n", "N", "no", "No", "NO"] },
    ],
    "Invalid input. Please enter 'y' or 'n'"
  );
  return answer === "yes";
}
