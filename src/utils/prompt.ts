import { createInterface } from 'readline';

export type Prompt = (question: string) => Promise<string>;

/**
 * Ask a single question on the terminal and resolve with the answer.
 */
export const terminalPrompt: Prompt = (question) =>
  new Promise((resolve) => {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
