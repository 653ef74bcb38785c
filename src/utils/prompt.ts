import { createInterface } from "node:readline";

/**
 * Ask a yes/no question on stderr. Anything but y/yes (including a closed
 * stdin) counts as no.
 */
export function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  return new Promise((resolve) => {
    let answered = false;
    rl.on("close", () => {
      if (!answered) resolve(false);
    });
    rl.question(`${question} [y/N] `, (answer) => {
      answered = true;
      rl.close();
      resolve(/^y(es)?$/i.test(answer.trim()));
    });
  });
}

export function isInteractive(): boolean {
  return Boolean(process.stdin.isTTY);
}
