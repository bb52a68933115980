/**
 * Code Job Endpoint
 *
 * POST /api/code-job
 *
 * Starts an implementation or fix job in a container and waits for it within
 * the configured timeout. A body that is not JSON reads as an empty request,
 * which has no supported job type.
 */

import { Router, Request, Response, NextFunction } from 'express';
import { CodeJobResult, CodeJobService } from '../services/jobs/CodeJobService';
import { CodeJobRequestSchema } from '../services/jobs/schemas';
import { HttpStatus } from '../utils/ApiResponse';
import { parseJsonBody, rawBody } from './shared';

export function createCodeJobRouter(service: CodeJobService): Router {
  const router = Router();

  router.post('/', rawBody, async (req: Request, res: Response, next: NextFunction) => {
    const body = parseJsonBody(req.body);
    const parsed = CodeJobRequestSchema.safeParse(body.ok ? body.data : {});
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => issue.message).join('; ');
      res.status(HttpStatus.BAD_REQUEST).json({ error: `Invalid job request: ${issues}` });
      return;
    }

    let result: CodeJobResult;
    try {
      result = await service.run(parsed.data);
    } catch (error) {
      next(error);
      return;
    }

    switch (result.kind) {
      case 'terminated':
        res.status(HttpStatus.OK).json({
          message: result.message,
          container_group: result.containerGroup,
          exit_code: result.exitCode,
        });
        return;
      case 'timeout':
        res.status(HttpStatus.ACCEPTED).json({ result: result.result });
        return;
      case 'error':
        res.status(HttpStatus.INTERNAL_SERVER_ERROR).json({ error: result.error });
        return;
      case 'unsupported':
        res.status(HttpStatus.BAD_REQUEST).json({ error: result.error });
        return;
    }
  });

  return router;
}
