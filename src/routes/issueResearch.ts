/**
 * Issue Research Endpoint
 *
 * POST /api/issue-research  { issue, project_name }
 *
 * Runs the research group chat on the issue, hands the report to a fix job
 * and answers with the job's status code and the report.
 */

import { Router, Request, Response, NextFunction } from 'express';
import { IssueResearchService } from '../services/research/IssueResearchService';
import { isJsonObject, parseJsonBody, rawBody } from './shared';

export const CONTENT_TYPE_MESSAGE = 'Content-Type must be application/json.';
export const INVALID_BODY_MESSAGE = 'Invalid or missing JSON body.';
export const MISSING_FIELDS_MESSAGE = 'Both "issue" and "project_name" must be provided in the JSON body.';

export function createIssueResearchRouter(service: IssueResearchService): Router {
  const router = Router();

  router.post('/', rawBody, async (req: Request, res: Response, next: NextFunction) => {
    if (!(req.headers['content-type'] ?? '').startsWith('application/json')) {
      res.status(400).type('text/plain').send(CONTENT_TYPE_MESSAGE);
      return;
    }

    const body = parseJsonBody(req.body);
    if (!body.ok || !isJsonObject(body.data)) {
      res.status(400).type('text/plain').send(INVALID_BODY_MESSAGE);
      return;
    }

    const { issue, project_name: projectName } = body.data;
    if (typeof issue !== 'string' || !issue || typeof projectName !== 'string' || !projectName) {
      res.status(400).type('text/plain').send(MISSING_FIELDS_MESSAGE);
      return;
    }

    try {
      const outcome = await service.research(issue, projectName);
      res.status(200).json(outcome);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
