/**
 * Terminal prompts.
 *
 * Questions go to stderr so stdout carries only command output.
 *
 * @module cli/prompt
 */

import { createInterface } from "node:readline";
import { Writable } from "node:stream";

/**
 * Asks the user questions. Injected into runners so tests can answer.
 */
export interface Prompter {
  /** Resolves with the trimmed answer */
  ask(question: string): Promise<string>;
  /** Like ask, without echoing what is typed */
  secret(question: string): Promise<string>;
  /** Yes/no question; an empty answer counts as yes */
  confirm(question: string): Promise<boolean>;
}

/**
 * Interprets a [Y/n] answer.
 */
export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === "" || normalized === "y" || normalized === "yes";
}

/**
 * Prompts the user for input.
 *
 * @param question - The question to display
 * @param hidden - Suppress the echo of typed characters
 * @returns User's response
 */
function promptUser(question: string, hidden = false): Promise<string> {
  return new Promise((resolve) => {
    let muted = false;
    const output = new Writable({
      write(chunk: Buffer | string, _encoding, callback) {
        if (!muted) {
          process.stderr.write(chunk);
        }
        callback();
      },
    });

    const rl = createInterface({
      input: process.stdin,
      output,
      terminal: process.stdin.isTTY === true,
    });
    rl.question(question, (answer) => {
      rl.close();
      if (muted) {
        process.stderr.write("\n");
      }
      resolve(answer.trim());
    });
    // The question itself is already written at this point
    muted = hidden && process.stdin.isTTY === true;
  });
}

/** Prompter on the process's stdin. */
export const terminalPrompter: Prompter = {
  ask: (question) => promptUser(question),
  secret: (question) => promptUser(question, true),
  async confirm(question) {
    return isAffirmative(await promptUser(question));
  },
};
