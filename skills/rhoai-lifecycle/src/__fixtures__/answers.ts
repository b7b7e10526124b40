import { Ask } from "../tools/prompt.js";

export type ScriptedAsk = Ask & { questions: string[] };

/** An Ask that replies with `replies` in order and records each question. Runs out with an error. */
export function scriptedAsk(...replies: string[]): ScriptedAsk {
  const queue = [...replies];
  const questions: string[] = [];
  const ask = async (message: string): Promise<string> => {
    questions.push(message);
    const next = queue.shift();
    if (next === undefined) throw new Error(`Unexpected question: ${message}`);
    return next;
  };
  return Object.assign(ask, { questions });
}
