/**
 * Narrative Types
 */

export interface Persona {
  name: string;
  archetype: string;
  story: string;
}

export interface NarrativeBrief {
  appName: string;
  headline: string;
  summary: string;
  personas: Persona[];
  strategy: string[];
  /** False when the brief is the deterministic placeholder. */
  generated: boolean;
}
