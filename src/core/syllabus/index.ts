/**
 * Syllabus Module - Barrel Export
 *
 * Canonical vocabulary per project: canonicalization of generated lists,
 * label resolution against the vocabulary, and the syllabus lifecycle.
 */

export { normalizeLabel, trigramCosine } from './similarity';
export {
  canonicalizeSyllabus,
  DEFAULT_CANONICALIZE_OPTIONS,
  type CanonicalizeOptions,
} from './canonicalize';
export {
  resolveConcept,
  ConceptResolver,
  DEFAULT_RESOLVER_OPTIONS,
  type ResolverOptions,
  type ConceptResolution,
  type CorruptionReason,
} from './resolver';
export { SyllabusService } from './syllabus-service';
