/**
 * Work-Item Webhook
 *
 * Receives work-item events from the work tracker. Bugs tagged [AGENT] in
 * their title are handed to issue research; everything else is acknowledged
 * and ignored. The response never waits for the research.
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { ResearchTrigger } from '../../services/research/IssueResearchTrigger';
import { Logger } from '../../utils/logger';
import { parseJsonBody, rawBody } from '../shared';

export const AGENT_TAG = '[AGENT]';

const WorkItemEventSchema = z.object({
  resource: z
    .object({
      fields: z
        .object({
          'System.TeamProject': z.string().optional(),
          'System.WorkItemType': z.string().optional(),
          'System.Title': z.string().optional(),
        })
        .passthrough()
        .optional(),
    })
    .passthrough()
    .optional(),
});

export function createDevOpsWebhookRouter(trigger: ResearchTrigger): Router {
  const router = Router();

  /**
   * POST /api/webhooks/devops
   */
  router.post('/', rawBody, (req: Request, res: Response) => {
    const body = parseJsonBody(req.body);
    if (!body.ok) {
      res.status(400).type('text/plain').send('Invalid JSON body.');
      return;
    }

    const event = WorkItemEventSchema.safeParse(body.data);
    const fields = event.success ? event.data.resource?.fields : undefined;

    if (fields?.['System.WorkItemType'] !== 'Bug') {
      res.status(200).type('text/plain').send('Not a bug work item.');
      return;
    }

    const title = fields['System.Title'] ?? '';
    if (!title.includes(AGENT_TAG)) {
      res.status(200).type('text/plain').send('No [AGENT] tag in the bug content.');
      return;
    }

    const projectName = fields['System.TeamProject'] ?? '';
    Logger.info('Agent bug received, triggering issue research', { projectName });
    trigger.trigger({ issue: title, project_name: projectName });

    res.status(200).json({ result: 'triggered' });
  });

  return router;
}
