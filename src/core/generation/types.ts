/**
 * Generator Collaborators
 *
 * The engine never talks to a model directly. Quiz items and syllabi come
 * from these two interfaces, so tests can substitute in-process fakes and
 * the Anthropic adapters stay at the edge.
 */

/**
 * Whether a round targets the review-priority concepts or the whole syllabus.
 */
export type GenerationMode = 'focused' | 'general';

export interface QuizGenerationRequest {
  /** Canonical concept names the items must cover */
  concepts: string[];
  /** Study material the questions are drawn from */
  sourceMaterial: string;
  itemCount: number;
  mode: GenerationMode;
  /** Study level of the project, e.g. 'beginner' */
  level?: string;
}

/**
 * Produces raw (untrusted) quiz text. The caller sanitizes it.
 */
export interface ContentGenerator {
  generate(request: QuizGenerationRequest, signal?: AbortSignal): Promise<string>;
}

/**
 * Proposes candidate concept names for a body of study material. The caller
 * canonicalizes them.
 */
export interface SyllabusGenerator {
  generate(sourceMaterial: string, signal?: AbortSignal): Promise<string[]>;
}
