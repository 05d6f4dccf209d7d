export { ConceptLedger, applyAttempt } from './concept-ledger';
