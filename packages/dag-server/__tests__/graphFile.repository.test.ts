import { mkdir, mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { ConfigService, configSchema } from '../src/core/services/config.service';
import { GraphFileRepository } from '../src/graph/graphFile.repository';
import { quietLogger } from './helpers/graph';

describe('GraphFileRepository', () => {
  let dir: string;
  let repo: GraphFileRepository;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'graph-file-'));
    const config = new ConfigService().init(
      configSchema.parse({ graphFilePath: path.join(dir, 'nested', 'graph.json') }),
    );
    repo = new GraphFileRepository(config, quietLogger());
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns null before anything was written', async () => {
    await expect(repo.read()).resolves.toBeNull();
  });

  it('creates missing directories and leaves no temp files behind', async () => {
    const doc = { nodes: [{ id: 'a', type: 'ADD', parameters: [{ column: 'x' }, { value: 1 }] }], edges: [] };
    const written = await repo.write(doc);
    expect(written).toBe(path.join(dir, 'nested', 'graph.json'));
    expect(await readdir(path.join(dir, 'nested'))).toEqual(['graph.json']);
    expect(await readFile(written, 'utf8')).toBe(`${JSON.stringify(doc, null, 2)}\n`);
    await expect(repo.read()).resolves.toEqual(doc);
  });

  it('overwrites the previous document', async () => {
    await repo.write({ nodes: [], edges: [{ source: 'a', target: 'b' }] });
    await repo.write({ nodes: [], edges: [] });
    await expect(repo.read()).resolves.toEqual({ nodes: [], edges: [] });
  });

  it('removes the temp file when the rename fails', async () => {
    const target = path.join(dir, 'nested', 'graph.json');
    await mkdir(target, { recursive: true });
    await expect(repo.write({ nodes: [], edges: [] })).rejects.toThrow();
    expect(await readdir(path.join(dir, 'nested'))).toEqual(['graph.json']);
  });
});
