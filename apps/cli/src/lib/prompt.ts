import * as readline from "node:readline";

/**
 * Ask a yes/no question on stderr. Only "y" or "Y" confirms; end of input
 * answers no.
 */
export function promptYesNo(question: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stderr,
  });
  return new Promise((resolve) => {
    rl.on("close", () => resolve(false));
    rl.question(`${question} y/[n]: `, (answer) => {
      resolve(answer.trim() === "y" || answer.trim() === "Y");
      rl.close();
    });
  });
}
