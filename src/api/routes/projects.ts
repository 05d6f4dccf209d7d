/**
 * Projects API Routes
 *
 * Project CRUD plus the per-project mastery operations:
 *
 * - GET    /                      - List projects
 * - POST   /                      - Create a project
 * - GET    /:id                   - Project details
 * - DELETE /:id                   - Delete a project
 * - GET    /:id/syllabus          - Syllabus (generated on first request)
 * - PUT    /:id/syllabus          - Replace the syllabus (no progress allowed)
 * - GET    /:id/mastery           - Mastery report (?asOf=YYYY-MM-DD)
 * - POST   /:id/quizzes           - Run a quiz round
 * - POST   /:id/quizzes/grade     - Grade a quiz and record the results
 * - POST   /:id/reset             - Clear ledger and review schedule
 *
 * Engine errors propagate to the global error handler, which maps them to
 * statuses (404, 409, 502, 503, 400).
 */

import { randomUUID } from 'crypto';
import { Hono, type MiddlewareHandler } from 'hono';
import { success } from '../utils/response';
import { AppError, ErrorCodes, notFoundError, validate, validateQuery } from '../middleware';
import {
  createProjectSchema,
  defineSyllabusSchema,
  generateQuizSchema,
  gradeQuizSchema,
  masteryQuerySchema,
  toAsOfDate,
} from '../types';
import { GenerationFailureError } from '../../core/errors';
import type { MasteryEngine } from '../../core/engine';
import type { ProjectRepository } from '../../storage/repositories';

export interface ProjectsRouteDependencies {
  engine: MasteryEngine;
  projects: ProjectRepository;
  /** Applied to the routes that call the model provider */
  generationLimiter?: MiddlewareHandler;
}

const passThrough: MiddlewareHandler = (_c, next) => next();

export function projectsRoutes(deps: ProjectsRouteDependencies): Hono {
  const router = new Hono();
  const { engine, projects } = deps;
  const limitGeneration = deps.generationLimiter ?? passThrough;

  // ---------------------------------------------------------------------------
  // Projects
  // ---------------------------------------------------------------------------

  router.get('/', async (c) => {
    const all = await projects.findAll();
    return success(c, all);
  });

  router.post('/', validate(createProjectSchema), async (c) => {
    const body = c.get('validatedBody');

    const existing = await projects.findByName(body.name);
    if (existing) {
      throw new AppError(
        ErrorCodes.CONFLICT,
        `A project named '${body.name}' already exists`,
        409,
        { id: existing.id }
      );
    }

    const project = await projects.create({
      id: `prj_${randomUUID()}`,
      name: body.name,
      sourceText: body.sourceText,
      level: body.level,
      notes: body.notes,
    });

    console.log(`[Projects] Created project ${project.id} (${project.name})`);
    return success(c, project, 201);
  });

  router.get('/:id', async (c) => {
    const id = c.req.param('id');
    const project = await projects.findById(id);
    if (!project) {
      throw notFoundError('Project', id);
    }
    return success(c, project);
  });

  router.delete('/:id', async (c) => {
    const id = c.req.param('id');
    await projects.delete(id);
    return success(c, { id, deleted: true });
  });

  // ---------------------------------------------------------------------------
  // Syllabus
  // ---------------------------------------------------------------------------

  router.get('/:id/syllabus', limitGeneration, async (c) => {
    const projectId = c.req.param('id');
    const concepts = await engine.getSyllabus(projectId, c.req.raw.signal);
    return success(c, { projectId, concepts });
  });

  router.put('/:id/syllabus', validate(defineSyllabusSchema), async (c) => {
    const projectId = c.req.param('id');
    const concepts = await engine.defineSyllabus(projectId, c.get('validatedBody').concepts);
    return success(c, { projectId, concepts });
  });

  // ---------------------------------------------------------------------------
  // Mastery
  // ---------------------------------------------------------------------------

  router.get('/:id/mastery', validateQuery(masteryQuerySchema), async (c) => {
    const { asOf } = c.get('validatedQuery');
    const report = await engine.getReport(c.req.param('id'), toAsOfDate(asOf));
    return success(c, report);
  });

  router.post(
    '/:id/quizzes',
    limitGeneration,
    validate(generateQuizSchema, { optional: true }),
    async (c) => {
      const projectId = c.req.param('id');
      const outcome = await engine.generateQuiz(projectId, {
        signal: c.req.raw.signal,
        asOf: toAsOfDate(c.get('validatedBody').asOf),
      });

      if (outcome.status === 'failed') {
        throw new GenerationFailureError(
          outcome.reason === 'cancelled'
            ? 'Quiz generation was cancelled'
            : 'Quiz generation failed; no quiz could be produced',
          { reason: outcome.reason, attempts: outcome.attempts, notices: outcome.notices }
        );
      }

      return success(c, {
        projectId,
        mode: outcome.mode,
        targetConcepts: outcome.targetConcepts,
        items: outcome.items,
        rejected: outcome.rejected,
        notices: outcome.notices,
      });
    }
  );

  router.post('/:id/quizzes/grade', validate(gradeQuizSchema), async (c) => {
    const body = c.get('validatedBody');
    const result = await engine.gradeQuiz(c.req.param('id'), {
      items: body.items,
      answers: body.answers,
      asOf: toAsOfDate(body.asOf),
    });
    return success(c, result);
  });

  router.post('/:id/reset', async (c) => {
    const projectId = c.req.param('id');
    await engine.resetProgress(projectId);
    return success(c, { projectId, reset: true });
  });

  return router;
}
