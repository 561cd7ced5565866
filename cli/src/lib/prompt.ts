import * as readline from 'readline';

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

const TERMINAL: PromptStreams = { input: process.stdin, output: process.stdout };

/**
 * Ask one question and resolve with the trimmed answer.
 */
export function prompt(question: string, streams: PromptStreams = TERMINAL): Promise<string> {
  const rl = readline.createInterface(streams);
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

/** True only when the user types `expected` exactly. */
export async function confirmByTyping(
  expected: string,
  streams: PromptStreams = TERMINAL
): Promise<boolean> {
  const answer = await prompt(`Type "${expected}" to confirm: `, streams);
  return answer === expected;
}
