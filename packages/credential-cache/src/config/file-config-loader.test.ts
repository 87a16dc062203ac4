import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import { createChatModelConfigLoader, createFileConfigLoader } from './file-config-loader.js';

const writeJson = async (file: string, data: unknown): Promise<void> => {
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, JSON.stringify(data), 'utf8');
};

describe('createFileConfigLoader', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), 'config-loader-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('reads every json file below the directory, nested ones included', async () => {
    await writeJson(path.join(directory, 'a.json'), { key: 'a' });
    await writeJson(path.join(directory, 'nested', 'b.json'), { key: 'b' });
    await writeFile(path.join(directory, 'notes.txt'), 'ignored', 'utf8');

    const load = createFileConfigLoader({
      directory,
      schema: z.object({ key: z.string() }),
    });
    const configs = await load();

    expect(configs).toEqual([{ key: 'a' }, { key: 'b' }]);
  });

  it('orders configs by the sort key', async () => {
    await writeJson(path.join(directory, '1.json'), { key: 'zeta' });
    await writeJson(path.join(directory, '2.json'), { key: 'alpha' });

    const load = createFileConfigLoader({
      directory,
      schema: z.object({ key: z.string() }),
      sortKey: (config) => config.key,
    });

    expect(await load()).toEqual([{ key: 'alpha' }, { key: 'zeta' }]);
  });

  it('returns an empty list for an empty directory', async () => {
    const load = createFileConfigLoader({ directory, schema: z.object({ key: z.string() }) });

    expect(await load()).toEqual([]);
  });

  it('rejects naming the file when JSON is malformed', async () => {
    const file = path.join(directory, 'broken.json');
    await writeFile(file, '{ "key": ', 'utf8');

    const load = createFileConfigLoader({ directory, schema: z.object({ key: z.string() }) });

    await expect(load()).rejects.toThrow(`Invalid JSON in ${file}`);
  });

  it('rejects naming the file and field when the schema fails', async () => {
    const file = path.join(directory, 'wrong.json');
    await writeJson(file, { key: 42 });

    const load = createFileConfigLoader({ directory, schema: z.object({ key: z.string() }) });

    await expect(load()).rejects.toThrow(
      `Invalid config in ${file}: key: Expected string, received number`
    );
  });

  it('rejects when the directory does not exist', async () => {
    const load = createFileConfigLoader({
      directory: path.join(directory, 'missing'),
      schema: z.object({ key: z.string() }),
    });

    await expect(load()).rejects.toMatchObject({ code: 'ENOENT' });
  });
});

describe('createChatModelConfigLoader', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), 'chat-models-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('applies schema defaults and sorts by name', async () => {
    await writeJson(path.join(directory, 'writer.json'), {
      id: 'writer',
      name: 'Writer',
      description: 'Drafts documents',
      model: { provider: 'example-provider', model: 'model-large' },
    });
    await writeJson(path.join(directory, 'analyst.json'), {
      id: 'analyst',
      name: 'Analyst',
      description: 'Answers data questions',
      type: 'agent',
      disabled: true,
    });

    const configs = await createChatModelConfigLoader(directory)();

    expect(configs).toEqual([
      {
        id: 'analyst',
        name: 'Analyst',
        description: 'Answers data questions',
        type: 'agent',
        disabled: true,
      },
      {
        id: 'writer',
        name: 'Writer',
        description: 'Drafts documents',
        type: 'langchain',
        model: { provider: 'example-provider', model: 'model-large' },
      },
    ]);
  });
});
