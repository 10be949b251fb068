/**
 * Interactive prompts on stdin/stderr (stdout stays clean for data).
 */

import { createInterface } from "node:readline";

function ask(question: string): Promise<string> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stderr,
  });
  return new Promise(resolve => {
    rl.question(question, answer => {
      rl.close();
      resolve(answer);
    });
  });
}

export async function confirm(question: string): Promise<boolean> {
  const answer = await ask(`${question} [y/N]: `);
  return answer.trim().toLowerCase().startsWith("y");
}

/** Ask until a non-empty answer is given. */
export async function promptNonEmpty(question: string): Promise<string> {
  for (;;) {
    const answer = (await ask(question)).trim();
    if (answer) return answer;
  }
}
