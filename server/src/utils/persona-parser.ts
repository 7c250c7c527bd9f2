/**
 * Persona parsing utilities - splits persona files into prompt and named sections
 */
import type { Persona, PersonaSections } from '../types/index';

/**
 * Section markers look like ---NAME---, on a line of their own
 */
const SECTION_MARKER = /^---([A-Z][A-Z_]*)---$/;

const REQUIRED_SECTIONS = ['NAME', 'WELCOME', 'GOODBYE'] as const;

/**
 * Splits raw persona content at section markers
 * @param content - Raw persona file content
 * @returns Text before the first marker plus each named section, trimmed
 */
export function parseSections(content: string): PersonaSections {
  const lines = content.split(/\r?\n/);
  const preamble: string[] = [];
  const sections: Record<string, string[]> = {};
  let current: string[] = preamble;

  for (const line of lines) {
    const match = SECTION_MARKER.exec(line.trim());
    if (match) {
      const name = match[1];
      sections[name] = [];
      current = sections[name];
      continue;
    }
    current.push(line);
  }

  const trimmed: Record<string, string> = {};
  for (const [name, body] of Object.entries(sections)) {
    trimmed[name] = body.join('\n').trim();
  }

  return {
    preamble: preamble.join('\n').trim(),
    sections: trimmed,
  };
}

/**
 * Parses persona file content into an immutable persona
 * @param content - Raw persona file content
 * @throws Error if the system prompt or a required section is missing
 */
export function parsePersonaContent(content: string): Persona {
  const { preamble, sections } = parseSections(content);

  if (!preamble) {
    throw new Error('Persona file has no system prompt before the first section');
  }

  for (const name of REQUIRED_SECTIONS) {
    if (!sections[name]) {
      throw new Error(`Persona file is missing the ---${name}--- section`);
    }
  }

  return Object.freeze({
    name: sections.NAME,
    backstory: sections.BACKSTORY ?? '',
    systemPrompt: preamble,
    welcomeMessage: sections.WELCOME,
    goodbyeMessage: sections.GOODBYE,
  });
}
