import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { StoreCorruptionError } from '../utils/errors.js';
import { JsonDocument } from './json-document.js';

const counterSchema = z.object({
  version: z.literal(1),
  count: z.number().int().min(0),
});

describe('JsonDocument', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'json-document-'));
    filePath = path.join(dir, 'nested', 'counter.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should return null for a missing file', async () => {
    const document = new JsonDocument(filePath, counterSchema);

    await expect(document.read()).resolves.toBeNull();
  });

  it('should write and read back the same data', async () => {
    const document = new JsonDocument(filePath, counterSchema);

    await document.write({ version: 1, count: 3 });

    await expect(document.read()).resolves.toEqual({ version: 1, count: 3 });
    await expect(fs.readdir(path.dirname(filePath))).resolves.toEqual(['counter.json']);
  });

  it('should reject unparsable JSON', async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, '{"version": 1, "count":', 'utf8');
    const document = new JsonDocument(filePath, counterSchema);

    await expect(document.read()).rejects.toBeInstanceOf(StoreCorruptionError);
  });

  it('should reject a document that fails validation', async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify({ version: 1, count: -1 }), 'utf8');
    const document = new JsonDocument(filePath, counterSchema);

    await expect(document.read()).rejects.toThrow(/count/);
  });
});
