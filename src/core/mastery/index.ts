export {
  classify,
  findCorruptedEntries,
  isCorruptedConcept,
  DEFAULT_CLASSIFIER_OPTIONS,
  type ClassifierOptions,
  type ConceptClassification,
} from './classifier';
