/**
 * HTTP API tests
 * Each test starts the app on an ephemeral localhost port against temp config files
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Server } from 'http';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createApp } from '../src/app.js';
import type { Settings } from '../src/settings.js';
import { SshConfig } from '../src/sshConfig.js';
import { SshdConfig } from '../src/sshdConfig.js';

const SSHD_TEXT = 'Port 22\n#PermitRootLogin no\n';
const SSH_TEXT = 'Host alpha\n  User alice\nHost beta\n  Port 2200\n';

let dir: string;
let sshdPath: string;
let sshPath: string;
let server: Server;
let baseUrl: string;

async function call(method: string, path: string, body?: unknown): Promise<{ status: number; body: unknown }> {
  const res = await fetch(baseUrl + path, {
    method,
    headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  const json: unknown = await res.json();
  return { status: res.status, body: json };
}

beforeEach(async () => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});

  dir = mkdtempSync(join(tmpdir(), 'routes-'));
  sshdPath = join(dir, 'sshd_config');
  sshPath = join(dir, 'config');
  writeFileSync(sshdPath, SSHD_TEXT);
  writeFileSync(sshPath, SSH_TEXT);

  const settings: Settings = {
    port: 0,
    sshdConfigPath: sshdPath,
    sshConfigPath: sshPath,
    explanationsFile: join(dir, 'unused.json'),
    production: false,
  };
  const app = createApp(settings, {
    sshd: new SshdConfig(sshdPath).load(),
    ssh: new SshConfig(sshPath).load(),
    explanations: { Port: 'Port number that sshd listens on.' },
  });

  server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, '127.0.0.1', () => resolve(s));
  });
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('Server has no TCP address');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe('GET /health', () => {
  it('should report ok', async () => {
    expect(await call('GET', '/health')).toEqual({ status: 200, body: { status: 'ok' } });
  });
});

describe('/api/sshd', () => {
  it('should list lines with explanations where known', async () => {
    const { status, body } = await call('GET', '/api/sshd');

    expect(status).toBe(200);
    expect(body).toEqual({
      path: sshdPath,
      lines: [
        { index: 0, key: 'Port', value: '22', raw: 'Port 22', commented: false, lineNumber: 1, explanation: 'Port number that sshd listens on.' },
        { index: 1, key: 'PermitRootLogin', value: 'no', raw: '#PermitRootLogin no', commented: true, lineNumber: 2 },
      ],
      includes: [],
    });
  });

  it('should look up options by key', async () => {
    const { body } = await call('GET', '/api/sshd/options?key=permitrootlogin');
    expect(body).toEqual({
      options: [{ index: 1, key: 'PermitRootLogin', value: 'no', raw: '#PermitRootLogin no', commented: true, lineNumber: 2 }],
    });
  });

  it('should edit, save and back up', async () => {
    const edit = await call('PATCH', '/api/sshd/options/0', { value: '2200' });
    expect(edit.status).toBe(200);
    expect(edit.body).toMatchObject({ line: { index: 0, raw: 'Port 2200' } });

    const save = await call('POST', '/api/sshd/save');

    expect(save).toEqual({ status: 200, body: { success: true, backupPath: `${sshdPath}.bak` } });
    expect(readFileSync(sshdPath, 'utf8')).toBe('Port 2200\n#PermitRootLogin no\n');
    expect(readFileSync(`${sshdPath}.bak`, 'utf8')).toBe(SSHD_TEXT);
  });

  it('should add and delete lines', async () => {
    const add = await call('POST', '/api/sshd/options', { key: 'UsePAM', value: 'yes', commented: true });
    expect(add.status).toBe(201);
    expect(add.body).toMatchObject({ line: { index: 2, raw: '#UsePAM yes' } });

    const del = await call('DELETE', '/api/sshd/options/0');
    expect(del.body).toMatchObject({ removed: { key: 'Port' } });

    await call('POST', '/api/sshd/save');
    expect(readFileSync(sshdPath, 'utf8')).toBe('#PermitRootLogin no\n#UsePAM yes\n');
  });

  it('should answer 400 for bad input', async () => {
    expect(await call('POST', '/api/sshd/options', {})).toEqual({ status: 400, body: { error: 'Missing key' } });
    expect(await call('PATCH', '/api/sshd/options/abc', { value: '1' })).toEqual({
      status: 400,
      body: { error: 'Invalid line index' },
    });
    expect(await call('PATCH', '/api/sshd/options/0', {})).toEqual({ status: 400, body: { error: 'Nothing to update' } });
    expect(await call('POST', '/api/sshd/options', { key: 'Two Words' })).toEqual({
      status: 400,
      body: { error: 'Invalid directive key: "Two Words"' },
    });
  });

  it('should answer 400 for a malformed JSON body', async () => {
    const res = await fetch(`${baseUrl}/api/sshd/options`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"key":',
    });
    expect(res.status).toBe(400);
  });

  it('should answer 404 for an unknown line', async () => {
    expect(await call('DELETE', '/api/sshd/options/9')).toEqual({
      status: 404,
      body: { error: 'Line index out of range: 9' },
    });
  });

  it('should answer 404 when restoring without a backup', async () => {
    expect(await call('POST', '/api/sshd/restore')).toEqual({ status: 404, body: { error: 'Backup not found' } });
    expect(readFileSync(sshdPath, 'utf8')).toBe(SSHD_TEXT);
  });

  it('should restore and reload from the backup', async () => {
    await call('POST', '/api/sshd/backup');
    writeFileSync(sshdPath, 'Port 1\n');
    await call('POST', '/api/sshd/reload');

    expect(await call('POST', '/api/sshd/restore')).toEqual({ status: 200, body: { success: true } });

    const { body } = await call('GET', '/api/sshd');
    expect(body).toMatchObject({ lines: [{ raw: 'Port 22' }, { raw: '#PermitRootLogin no' }] });
  });
});

describe('/api/ssh', () => {
  it('should list blocks', async () => {
    const { body } = await call('GET', '/api/ssh');
    expect(body).toMatchObject({
      path: sshPath,
      preamble: [],
      blocks: [
        { index: 0, header: 'Host alpha', pattern: 'alpha', lineNumber: 1, lines: [{ key: 'User', value: 'alice' }] },
        { index: 1, header: 'Host beta', pattern: 'beta', lineNumber: 3, lines: [{ key: 'Port', value: '2200' }] },
      ],
    });
  });

  it('should add a host and a directive, then save', async () => {
    const host = await call('POST', '/api/ssh/hosts', { pattern: 'gamma' });
    expect(host.status).toBe(201);
    expect(host.body).toMatchObject({ block: { index: 2, header: 'Host gamma', lines: [] } });

    const opt = await call('POST', '/api/ssh/hosts/2/options', { key: 'HostName', value: 'gamma.example.com' });
    expect(opt.status).toBe(201);
    expect(opt.body).toMatchObject({ line: { index: 0, raw: 'HostName gamma.example.com' } });

    await call('POST', '/api/ssh/save');
    expect(readFileSync(sshPath, 'utf8')).toBe(SSH_TEXT + 'Host gamma\nHostName gamma.example.com\n');
  });

  it('should edit a directive inside one block only', async () => {
    await call('PATCH', '/api/ssh/hosts/0/options/0', { value: 'bob' });
    await call('POST', '/api/ssh/save');
    expect(readFileSync(sshPath, 'utf8')).toBe('Host alpha\nUser bob\nHost beta\n  Port 2200\n');
  });

  it('should rename and remove hosts', async () => {
    expect((await call('PATCH', '/api/ssh/hosts/1', { pattern: 'beta-2' })).body).toMatchObject({
      block: { header: 'Host beta-2' },
    });
    expect((await call('DELETE', '/api/ssh/hosts/0')).body).toMatchObject({ removed: { pattern: 'alpha' } });

    await call('POST', '/api/ssh/save');
    expect(readFileSync(sshPath, 'utf8')).toBe('Host beta-2\n  Port 2200\n');
  });

  it('should reject a Host directive inside a block', async () => {
    expect(await call('POST', '/api/ssh/hosts/0/options', { key: 'Host', value: 'x' })).toEqual({
      status: 400,
      body: { error: 'Use addHost to start a new Host block' },
    });
  });

  it('should add, edit and delete global options', async () => {
    const add = await call('POST', '/api/ssh/preamble', { key: 'Compression', value: 'yes' });
    expect(add).toEqual({
      status: 201,
      body: { line: { index: 0, key: 'Compression', value: 'yes', raw: 'Compression yes', commented: false, lineNumber: 0 } },
    });
    await call('POST', '/api/ssh/preamble', { key: 'ServerAliveInterval', value: '30' });
    expect((await call('PATCH', '/api/ssh/preamble/0', { value: 'no' })).body).toMatchObject({ line: { raw: 'Compression no' } });
    expect((await call('DELETE', '/api/ssh/preamble/1')).body).toMatchObject({ removed: { key: 'ServerAliveInterval' } });

    await call('POST', '/api/ssh/save');
    expect(readFileSync(sshPath, 'utf8')).toBe('Compression no\n' + SSH_TEXT);
  });

  it('should reject a key starting with #', async () => {
    expect(await call('POST', '/api/ssh/preamble', { key: '#Compression', value: 'yes' })).toEqual({
      status: 400,
      body: { error: 'Invalid directive key: "#Compression"' },
    });
  });

  it('should answer 404 for an unknown block', async () => {
    expect(await call('DELETE', '/api/ssh/hosts/5/options/0')).toEqual({
      status: 404,
      body: { error: 'Host block index out of range: 5' },
    });
  });

  it('should answer 400 for a missing pattern', async () => {
    expect(await call('POST', '/api/ssh/hosts', { pattern: '  ' })).toEqual({
      status: 400,
      body: { error: 'Missing pattern' },
    });
  });
});
