/**
 * ssh_config (client) editing routes, mounted under /api/ssh
 * Blocks and lines are addressed by position.
 */

import { Router, Request, Response, RequestHandler } from 'express';
import type { SshConfig } from '../sshConfig.js';
import { type HostBlock, hostPattern } from '../sshParser.js';
import { describeLine, parseDirectiveUpdate, parseHostPattern, parseIndex, parseNewDirective } from './requestBody.js';

function describeBlock(block: HostBlock, index: number) {
  return {
    index,
    header: block.header,
    pattern: hostPattern(block),
    lineNumber: block.headerLineNumber,
    lines: block.lines.map((line, i) => describeLine(line, i)),
  };
}

export function createSshRouter(config: SshConfig, options: { limiter: RequestHandler }): Router {
  const router = Router();
  const { limiter } = options;

  router.get('/', (req: Request, res: Response) => {
    res.json({
      path: config.path,
      preamble: config.preamble.map((line, i) => describeLine(line, i)),
      blocks: config.blocks.map(describeBlock),
    });
  });

  router.post('/preamble', limiter, (req: Request, res: Response) => {
    const body = parseNewDirective(req.body);
    if (!body.ok) {
      res.status(400).json({ error: body.error });
      return;
    }
    const { key, value, commented } = body.value;
    const line = config.addPreambleOption(key, value, commented);
    res.status(201).json({ line: describeLine(line, config.preamble.length - 1) });
  });

  router.patch('/preamble/:index', limiter, (req: Request, res: Response) => {
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
    const line = config.editPreambleOption(index, body.value);
    res.json({ line: describeLine(line, index) });
  });

  router.delete('/preamble/:index', limiter, (req: Request, res: Response) => {
    const index = parseIndex(req.params.index);
    if (index === null) {
      res.status(400).json({ error: 'Invalid line index' });
      return;
    }
    const removed = config.deletePreambleLine(index);
    res.json({ removed: describeLine(removed, index) });
  });

  router.post('/hosts', limiter, (req: Request, res: Response) => {
    const body = parseHostPattern(req.body);
    if (!body.ok) {
      res.status(400).json({ error: body.error });
      return;
    }
    const block = config.addHost(body.value);
    res.status(201).json({ block: describeBlock(block, config.blocks.length - 1) });
  });

  router.patch('/hosts/:block', limiter, (req: Request, res: Response) => {
    const blockIndex = parseIndex(req.params.block);
    if (blockIndex === null) {
      res.status(400).json({ error: 'Invalid block index' });
      return;
    }
    const body = parseHostPattern(req.body);
    if (!body.ok) {
      res.status(400).json({ error: body.error });
      return;
    }
    const block = config.renameHost(blockIndex, body.value);
    res.json({ block: describeBlock(block, blockIndex) });
  });

  router.delete('/hosts/:block', limiter, (req: Request, res: Response) => {
    const blockIndex = parseIndex(req.params.block);
    if (blockIndex === null) {
      res.status(400).json({ error: 'Invalid block index' });
      return;
    }
    const removed = config.removeHost(blockIndex);
    res.json({ removed: describeBlock(removed, blockIndex) });
  });

  router.post('/hosts/:block/options', limiter, (req: Request, res: Response) => {
    const blockIndex = parseIndex(req.params.block);
    if (blockIndex === null) {
      res.status(400).json({ error: 'Invalid block index' });
      return;
    }
    const body = parseNewDirective(req.body);
    if (!body.ok) {
      res.status(400).json({ error: body.error });
      return;
    }
    const { key, value, commented } = body.value;
    const line = config.addOption(blockIndex, key, value, commented);
    res.status(201).json({ line: describeLine(line, config.block(blockIndex).lines.length - 1) });
  });

  router.patch('/hosts/:block/options/:index', limiter, (req: Request, res: Response) => {
    const blockIndex = parseIndex(req.params.block);
    const index = parseIndex(req.params.index);
    if (blockIndex === null || index === null) {
      res.status(400).json({ error: 'Invalid block or line index' });
      return;
    }
    const body = parseDirectiveUpdate(req.body);
    if (!body.ok) {
      res.status(400).json({ error: body.error });
      return;
    }
    const line = config.editOption(blockIndex, index, body.value);
    res.json({ line: describeLine(line, index) });
  });

  router.delete('/hosts/:block/options/:index', limiter, (req: Request, res: Response) => {
    const blockIndex = parseIndex(req.params.block);
    const index = parseIndex(req.params.index);
    if (blockIndex === null || index === null) {
      res.status(400).json({ error: 'Invalid block or line index' });
      return;
    }
    const removed = config.deleteLine(blockIndex, index);
    res.json({ removed: describeLine(removed, index) });
  });

  router.post('/save', limiter, (req: Request, res: Response) => {
    const backupPath = config.save();
    console.log(`[SSH Config] Saved ${config.path} (backup: ${backupPath})`);
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
