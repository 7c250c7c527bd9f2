/**
 * Line-based terminal input and output for the console front end
 */
import readline from 'readline';

export interface ConsoleIO {
  /**
   * Shows the question and resolves with the next line, or null once input has ended (EOF or Ctrl+C)
   */
  prompt(question: string): Promise<string | null>;
  write(text: string): void;
  close(): void;
}

/**
 * Terminal IO over readline; lines typed ahead of a prompt are queued
 */
export function createTerminalIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): ConsoleIO {
  const rl = readline.createInterface({ input, output });
  const queued: string[] = [];
  const waiting: Array<(line: string | null) => void> = [];
  let closed = false;

  rl.on('line', (line) => {
    const resolve = waiting.shift();
    if (resolve) {
      resolve(line);
    } else {
      queued.push(line);
    }
  });
  rl.on('SIGINT', () => {
    output.write('\n');
    rl.close();
  });
  rl.on('close', () => {
    closed = true;
    waiting.splice(0).forEach((resolve) => resolve(null));
  });

  return {
    prompt(question: string): Promise<string | null> {
      const line = queued.shift();
      if (line !== undefined) {
        output.write(`${question}${line}\n`);
        return Promise.resolve(line);
      }
      if (closed) {
        return Promise.resolve(null);
      }
      output.write(question);
      return new Promise((resolve) => waiting.push(resolve));
    },
    write(text: string): void {
      output.write(text);
    },
    close(): void {
      rl.close();
    },
  };
}
