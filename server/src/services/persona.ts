/**
 * Persona service - loads the persona definition and the demo response table
 */
import path from 'path';
import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import type { DemoBucket, DemoResponseTable, Persona } from '../types/index';
import { parsePersonaContent } from '../utils/persona-parser';

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isNonEmptyStringArray(value: unknown): value is string[] {
  return isStringArray(value) && value.length > 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isBucket(value: unknown): value is DemoBucket {
  return isRecord(value) && isStringArray(value.keywords) && isNonEmptyStringArray(value.responses);
}

/**
 * Validates parsed JSON against the demo table shape
 */
export function isDemoResponseTable(value: unknown): value is DemoResponseTable {
  if (!isRecord(value) || !isRecord(value.definition)) {
    return false;
  }
  const { definition } = value;
  return (
    isBucket(value.greeting) &&
    isStringArray(definition.triggers) &&
    Array.isArray(definition.topics) &&
    definition.topics.every(isBucket) &&
    isNonEmptyStringArray(definition.fallback) &&
    isBucket(value.colony) &&
    isBucket(value.ancestors) &&
    isNonEmptyStringArray(value.fallback)
  );
}

/**
 * Loads persona files from a directory
 */
export class PersonaService {
  private readonly personasDir: string;

  constructor(personasDir?: string) {
    this.personasDir = personasDir ?? path.join(process.cwd(), 'personas');
  }

  /**
   * Loads a persona from markdown file
   * @param filename - Name of the persona file (e.g., "conch.md")
   * @throws Error if file doesn't exist, is empty, or is missing a section
   */
  async loadPersona(filename: string): Promise<Persona> {
    const filePath = path.join(this.personasDir, filename);

    if (!existsSync(filePath)) {
      throw new Error(`Persona file not found: ${filePath}`);
    }

    const content = await readFile(filePath, 'utf-8');
    if (!content.trim()) {
      throw new Error(`Persona file is empty: ${filePath}`);
    }

    return parsePersonaContent(content);
  }

  /**
   * Loads the canned response table used by the demo backend
   * @throws Error if the file is missing or malformed
   */
  async loadDemoResponses(filename: string): Promise<DemoResponseTable> {
    const filePath = path.join(this.personasDir, filename);

    if (!existsSync(filePath)) {
      throw new Error(`Demo response file not found: ${filePath}`);
    }

    const parsed: unknown = JSON.parse(await readFile(filePath, 'utf-8'));
    if (!isDemoResponseTable(parsed)) {
      throw new Error(`Demo response file is malformed: ${filePath}`);
    }
    return parsed;
  }
}
