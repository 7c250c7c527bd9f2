/**
 * Words that end a conversation, matched after trimming and lowercasing
 */
export const EXIT_COMMANDS: readonly string[] = ['exit', 'quit', 'bye', 'goodbye'];

export function isExitCommand(text: string): boolean {
  return EXIT_COMMANDS.includes(text.trim().toLowerCase());
}
