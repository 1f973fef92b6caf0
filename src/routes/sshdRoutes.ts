/**
 * sshd_config editing routes, mounted under /api/sshd
 */

import { Router, Request, Response, RequestHandler } from 'express';
import type { Explanations } from '../explanations.js';
import type { SshdConfig } from '../sshdConfig.js';
import { describeLine, parseDirectiveUpdate, parseIndex, parseNewDirective } from './requestBody.js';

export function createSshdRouter(
  config: SshdConfig,
  options: { explanations: Explanations; limiter: RequestHandler }
): Router {
  const router = Router();
  const { explanations, limiter } = options;

  /**
   * GET /api/sshd
   * Every line in file order, with its explanation when one is known
   */
  router.get('/', (req: Request, res: Response) => {
    res.json({
      path: config.path,
      lines: config.lines.map((line, i) => describeLine(line, i, explanations)),
      includes: config.includes,
    });
  });

  /**
   * GET /api/sshd/options?key=PermitRootLogin
   * Case-insensitive lookup, active and disabled directives alike
   */
  router.get('/options', (req: Request, res: Response) => {
    const key = req.query.key;
    if (typeof key !== 'string' || !key.trim()) {
      res.status(400).json({ error: 'Missing key' });
      return;
    }
    const matches = config.getOptionsByKey(key.trim());
    res.json({
      options: matches.map((line) => describeLine(line, config.lines.indexOf(line), explanations)),
    });
  });

  router.post('/options', limiter, (req: Request, res: Response) => {
    const body = parseNewDirective(req.body);
    if (!body.ok) {
      res.status(400).json({ error: body.error });
      return;
    }
    const { key, value, commented } = body.value;
    const line = config.addOption(key, value, commented);
    res.status(201).json({ line: describeLine(line, config.lines.length - 1, explanations) });
  });

  router.patch('/options/:index', limiter, (req: Request, res: Response) => {
    const index = parseIndex(req.params.index);
    if (index === null) {
      res.status(400).json({ error: 'Invalid line index' });
      return;
    }
    const body = parseDirectiveUpdate(req.body);
    if (!body.ok) {
      res.status(400).json({ error: body.error });
      return;
    }
    const line = config.editOption(index, body.value);
    res.json({ line: describeLine(line, index, explanations) });
  });

  router.delete('/options/:index', limiter, (req: Request, res: Response) => {
    const index = parseIndex(req.params.index);
    if (index === null) {
      res.status(400).json({ error: 'Invalid line index' });
      return;
    }
    const removed = config.deleteLine(index);
    res.json({ removed: describeLine(removed, index) });
  });

  /**
   * POST /api/sshd/save
   * Backup the live file, write the edited document, reload from disk
   */
  router.post('/save', limiter, (req: Request, res: Response) => {
    const backupPath = config.save();
    console.log(`[SSHD Config] Saved ${config.path} (backup: ${backupPath})`);
    res.json({ success: true, backupPath });
  });

  router.post('/save-as-backup', limiter, (req: Request, res: Response) => {
    const backupPath = config.saveAsBackup();
    res.json({ success: true, backupPath });
  });

  router.post('/backup', limiter, (req: Request, res: Response) => {
    const backupPath = config.writeBackup();
    res.json({ success: true, backupPath });
  });

  router.post('/restore', limiter, (req: Request, res: Response) => {
    config.restoreBackup();
    config.load();
    res.json({ success: true });
  });

  router.post('/reload', limiter, (req: Request, res: Response) => {
    config.load();
    res.json({ success: true });
  });

  return router;
}
