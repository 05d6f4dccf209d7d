/**
 * API Routes Aggregator
 *
 * Combines the route modules into a single router mounted at /api:
 *
 * - /api          - API root with version info
 * - /api/projects - Projects and their mastery operations
 *
 * The health check is mounted separately at /health.
 *
 * @example
 * ```typescript
 * app.route('/health', healthRoutes());
 * app.route('/api', createApiRouter({ engine, projects }));
 * ```
 */

import { Hono } from 'hono';
import { success } from '../utils/response';
import { projectsRoutes, type ProjectsRouteDependencies } from './projects';

export { healthRoutes } from './health';
export { projectsRoutes, type ProjectsRouteDependencies } from './projects';

/**
 * API information returned by the root endpoint.
 */
export interface ApiInfo {
  name: string;
  version: string;
  endpoints: {
    method: string;
    path: string;
    description: string;
  }[];
}

/**
 * API version - should match package.json version.
 */
export const API_VERSION = '0.1.0';

const ENDPOINTS: ApiInfo['endpoints'] = [
  { method: 'GET', path: '/api/projects', description: 'List projects' },
  { method: 'POST', path: '/api/projects', description: 'Create a project' },
  { method: 'GET', path: '/api/projects/:id', description: 'Project details' },
  { method: 'DELETE', path: '/api/projects/:id', description: 'Delete a project' },
  { method: 'GET', path: '/api/projects/:id/syllabus', description: 'Syllabus, generated on first request' },
  { method: 'PUT', path: '/api/projects/:id/syllabus', description: 'Replace the syllabus' },
  { method: 'GET', path: '/api/projects/:id/mastery', description: 'Weak, strong and due concepts' },
  { method: 'POST', path: '/api/projects/:id/quizzes', description: 'Generate a targeted quiz' },
  { method: 'POST', path: '/api/projects/:id/quizzes/grade', description: 'Grade a quiz and record results' },
  { method: 'POST', path: '/api/projects/:id/reset', description: 'Clear recorded progress' },
  { method: 'GET', path: '/health', description: 'Health check' },
];

export function createApiRouter(deps: ProjectsRouteDependencies): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const apiInfo: ApiInfo = {
      name: 'Study Mastery API',
      version: API_VERSION,
      endpoints: ENDPOINTS,
    };
    return success(c, apiInfo);
  });

  router.route('/projects', projectsRoutes(deps));

  return router;
}
