import readline from "readline";
import { CredentialsError } from "./errors.js";

/** Source of values the user types in when nothing else supplied them. */
export type Prompter = {
  promptText: (label: string) => Promise<string>;
  promptSecret: (label: string) => Promise<string>;
};

// Ctrl-C at a prompt aborts the run.
function abortOnInterrupt(rl: readline.Interface): void {
  rl.once("SIGINT", () => {
    rl.close();
    process.stderr.write("\n");
    process.exit(130);
  });
}

export async function promptHidden(prompt: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stderr,
    terminal: true
  });
  abortOnInterrupt(rl);
  const rlAny = rl as unknown as {
    output: NodeJS.WritableStream;
    _writeToOutput?: (text: string) => void;
  };
  const output = rlAny.output;

  rlAny._writeToOutput = (text: string) => {
    if (text === "\n" || text === "\r" || text === "\r\n") {
      output.write(text);
      return;
    }
    if (text === "\b \b") {
      output.write(text);
      return;
    }
    // The prompt itself is echoed once; everything typed after it is masked.
    if (text === prompt) {
      output.write(text);
      return;
    }
    output.write("*");
  };

  try {
    const value = await new Promise<string>((resolve) => {
      rl.question(prompt, (answer) => resolve(answer));
    });
    return value;
  } finally {
    rl.close();
  }
}

export async function promptText(prompt: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stderr });
  abortOnInterrupt(rl);
  try {
    const value = await new Promise<string>((resolve) => {
      rl.question(prompt, (answer) => resolve(answer));
    });
    return value.trim();
  } finally {
    rl.close();
  }
}

export function createTerminalPrompter(): Prompter {
  const requireTty = (label: string) => {
    if (!process.stdin.isTTY) {
      throw new CredentialsError(`${label} required but stdin is not a terminal.`);
    }
  };
  return {
    promptText: async (label) => {
      requireTty(label);
      return promptText(`${label}: `);
    },
    promptSecret: async (label) => {
      requireTty(label);
      return promptHidden(`${label}: `);
    },
  };
}
