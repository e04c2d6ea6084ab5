// cli/src/prompt.ts - Interactive confirmation

import { createInterface } from 'readline';

export function prompt(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

/** Destructive operations need the whole word, not just "y" */
export function isTypedConfirmation(answer: string, word = 'yes'): boolean {
  return answer.trim() === word;
}

/**
 * Ask the operator to type "yes". Without a terminal on stdin there is
 * nobody to ask: treated as declined.
 */
export async function confirmTyped(question: string): Promise<boolean> {
  if (!process.stdin.isTTY) {
    console.error('Confirmation required but stdin is not a terminal; aborting.');
    return false;
  }
  return isTypedConfirmation(await prompt(`${question} Type 'yes' to continue: `));
}
