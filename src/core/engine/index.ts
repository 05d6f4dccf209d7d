/**
 * Engine Module - Barrel Export
 */

export { MasteryEngine, DEFAULT_ENGINE_CONFIG, type MasteryEngineDependencies } from './mastery-engine';
export { ProjectLock } from './project-lock';
export type {
  MasteryEngineConfig,
  MasteryReport,
  GenerateQuizOptions,
  GradeQuizInput,
  GradeResult,
  GradedItem,
  RoundEventListener,
} from './types';
