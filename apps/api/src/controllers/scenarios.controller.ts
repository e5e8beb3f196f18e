import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { NotFoundError } from '@scenario-runner/domain';
import type { RunDispatcherPort } from '@scenario-runner/domain';
import type { ScenarioService } from '../services/scenario.service.js';
import type { TaskService } from '../services/task.service.js';
import { serializeScenario, serializeTask, serializeTaskSummary } from '../serializers.js';

export interface ScenariosRouterDeps {
  scenarios: ScenarioService;
  tasks: TaskService;
  dispatcher: RunDispatcherPort;
}

const createBodySchema = z.object({
  name: z.string(),
  config: z.record(z.unknown()).nullable().optional(),
});

export function createScenariosRouter({ scenarios, tasks, dispatcher }: ScenariosRouterDeps): Router {
  const router = Router();

  /** POST /scenarios — record a scenario; it stays pending until a run is enqueued */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = createBodySchema.parse(req.body);
      const created = await scenarios.create({ name: body.name, config: body.config });
      if (!created.ok) return next(created.error);

      res.location(`/scenarios/${created.value.id}`);
      return res.status(201).json(serializeScenario(created.value));
    } catch (err) {
      return next(err);
    }
  });

  // Registered before '/:scenarioId' so 'tasks' is never taken for a scenario id.
  /** GET /scenarios/tasks/:taskId */
  router.get('/tasks/:taskId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const found = await tasks.get(req.params['taskId'] ?? '');
      if (!found.ok) return next(found.error);
      return res.json(serializeTask(found.value));
    } catch (err) {
      return next(err);
    }
  });

  /** GET /scenarios/:scenarioId */
  router.get('/:scenarioId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const scenarioId = req.params['scenarioId'] ?? '';
      const scenario = await scenarios.get(scenarioId);
      if (!scenario) return next(new NotFoundError('scenario', scenarioId));
      return res.json(serializeScenario(scenario));
    } catch (err) {
      return next(err);
    }
  });

  /** POST /scenarios/:scenarioId/run — enqueue a background run */
  router.post('/:scenarioId/run', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const created = await tasks.create(req.params['scenarioId'] ?? '');
      if (!created.ok) return next(created.error);

      const task = created.value;
      dispatcher.submit({ taskId: task.taskId, scenarioId: task.scenarioId });

      res.location(`/scenarios/tasks/${task.taskId}`);
      return res.status(202).json(serializeTaskSummary(task));
    } catch (err) {
      return next(err);
    }
  });

  /** GET /scenarios/:scenarioId/tasks — run history, oldest first */
  router.get('/:scenarioId/tasks', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const listed = await tasks.listForScenario(req.params['scenarioId'] ?? '');
      if (!listed.ok) return next(listed.error);
      return res.json({ data: listed.value.map(serializeTask), total: listed.value.length });
    } catch (err) {
      return next(err);
    }
  });

  return router;
}
