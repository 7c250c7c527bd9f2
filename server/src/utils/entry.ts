import path from 'path';
import { fileURLToPath } from 'url';

/**
 * True when the module is the process entry rather than an import (tests import entries too)
 */
export function isEntryModule(moduleUrl: string, argv: string[] = process.argv): boolean {
  const entry = argv[1];
  return entry !== undefined && fileURLToPath(moduleUrl) === path.resolve(entry);
}
