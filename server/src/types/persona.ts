/**
 * Persona type definitions
 */

/**
 * Character definition loaded once from a persona file
 */
export interface Persona {
  /**
   * Display name of the persona
   */
  readonly name: string;

  /**
   * Long-form backstory, shown to people but never sent to the model
   */
  readonly backstory: string;

  /**
   * System prompt injected verbatim into every generation call
   */
  readonly systemPrompt: string;

  readonly welcomeMessage: string;
  readonly goodbyeMessage: string;
}

/**
 * Sections found in a persona file: preamble text plus named blocks
 */
export interface PersonaSections {
  preamble: string;
  sections: Record<string, string>;
}

/**
 * Keyword bucket used by the demo backend
 */
export interface DemoBucket {
  keywords: string[];
  responses: string[];
}

/**
 * Canned response table for the demo backend
 * Buckets are checked in declaration order; the first match wins
 */
export interface DemoResponseTable {
  greeting: DemoBucket;
  definition: {
    triggers: string[];
    topics: DemoBucket[];
    fallback: string[];
  };
  colony: DemoBucket;
  ancestors: DemoBucket;
  fallback: string[];
}
