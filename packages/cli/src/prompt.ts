import { createInterface } from 'readline/promises';

/**
 * Line-oriented console I/O. `ask` resolves to null once input is closed.
 */
export interface Prompt {
  ask(question: string): Promise<string | null>;
  print(text: string): void;
  close(): void;
}

export function createConsolePrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompt {
  const rl = createInterface({ input, output });
  let closed = false;
  const whenClosed = new Promise<null>((resolve) => {
    rl.once('close', () => {
      closed = true;
      resolve(null);
    });
  });

  return {
    async ask(question) {
      if (closed) return null;
      return Promise.race([rl.question(question), whenClosed]);
    },
    print(text) {
      output.write(`${text}\n`);
    },
    close() {
      rl.close();
    },
  };
}

/**
 * Prompt fed from a fixed list of lines, collecting everything printed.
 * Used to drive menus without a terminal.
 */
export class ScriptedPrompt implements Prompt {
  readonly output: string[] = [];
  private readonly lines: string[];

  constructor(lines: readonly string[]) {
    this.lines = [...lines];
  }

  async ask(question: string): Promise<string | null> {
    const line = this.lines.shift();
    this.output.push(`${question}${line ?? ''}`);
    return line ?? null;
  }

  print(text: string): void {
    this.output.push(text);
  }

  close(): void {
    this.lines.length = 0;
  }

  get transcript(): string {
    return this.output.join('\n');
  }
}
