/**
 * Console styling: ANSI colors and the typing effect
 */
import { ANSI } from '../utils/banner';

export type Delay = (ms: number) => Promise<void>;

export const THEME = {
  conch: ANSI.cyan,
  system: ANSI.dim,
  error: ANSI.red,
} as const;

export function paint(text: string, color: string): string {
  return `${color}${text}${ANSI.reset}`;
}

/**
 * Writes text one character at a time, then a newline
 */
export async function slowPrint(
  write: (text: string) => void,
  text: string,
  delayMs: number,
  delay: Delay
): Promise<void> {
  write(THEME.conch);
  for (const char of text) {
    write(char);
    await delay(delayMs);
  }
  write(`${ANSI.reset}\n`);
}
