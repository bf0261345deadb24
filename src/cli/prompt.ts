// src/cli/prompt.ts

import readline from "readline";

/**
 * "y" / "yes", any case, surrounding whitespace ignored.
 */
export function isAffirmative(answer: string): boolean {
  const val = answer.trim().toLowerCase();
  return val === "y" || val === "yes";
}

/**
 * Ask a single yes/no question on stdin/stdout.
 * End of input counts as "no".
 */
export function askYesNo(
  question: string,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Promise<boolean> {
  const rl = readline.createInterface({ input, output });

  return new Promise((resolve) => {
    let answered = false;

    rl.on("close", () => {
      if (!answered) resolve(false);
    });

    rl.question(question, (answer) => {
      answered = true;
      rl.close();
      resolve(isAffirmative(answer));
    });
  });
}
