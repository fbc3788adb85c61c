import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { filtersDocumentSchema } from '../../database/document.schemas.js';
import { JsonDocument } from '../../database/json-document.js';
import { FilterValidationError } from '../errors.js';
import { WriteLock } from '../write-lock.js';
import { FilterSet } from './filter-set.js';

vi.mock('../logger/logger.service.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe('FilterSet', () => {
  let dir: string;
  let document: JsonDocument<typeof filtersDocumentSchema>;
  let filterSet: FilterSet;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'filter-set-'));
    document = new JsonDocument(path.join(dir, 'filters.json'), filtersDocumentSchema);
    filterSet = new FilterSet(document, new WriteLock());
    await filterSet.open();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should append filters and name blank ones after their id', async () => {
    const first = await filterSet.add({
      rules: [{ position: 0, mode: 'contains', expression: 'example' }],
      action: 'to_download',
    });
    const second = await filterSet.add({
      name: '  ',
      rules: [{ position: 'any', mode: 'any' }],
      action: 'to_skip',
    });

    expect(first).toMatchObject({ numericId: 1, name: 'Unnamed_1', priorityRank: 0 });
    expect(second).toMatchObject({ numericId: 2, name: 'Unnamed_2', priorityRank: 1 });
    expect(second.rules).toEqual([{ position: 'any', mode: 'any', expression: '' }]);
  });

  it('should stop at the first matching filter', async () => {
    await filterSet.add({
      name: 'first',
      rules: [{ position: 0, mode: 'contains', expression: 'example' }],
      action: 'to_download',
    });
    await filterSet.add({
      name: 'second',
      rules: [{ position: 'any', mode: 'any' }],
      action: 'to_skip',
    });
    const matchSpy = vi.spyOn(filterSet, 'matchesFilter');

    const result = filterSet.match(['example', 'com', 'a']);

    expect(result.filter?.name).toBe('first');
    expect(result.evaluated).toBe(1);
    expect(matchSpy).toHaveBeenCalledTimes(1);
  });

  it('should pass over disabled filters', async () => {
    await filterSet.add({
      name: 'off',
      rules: [{ position: 0, mode: 'exact', expression: 'example' }],
      action: 'to_download',
      enabled: false,
    });
    await filterSet.add({ name: 'fallback', rules: [{ position: 'any', mode: 'any' }], action: 'to_skip' });

    const result = filterSet.match(['example', 'com', 'a']);

    expect(result.filter?.name).toBe('fallback');
    expect(result.evaluated).toBe(1);
    expect(filterSet.get(1)?.enabled).toBe(false);
  });

  it('should persist the enabled flag', async () => {
    await filterSet.add({ rules: [{ position: 0, mode: 'any' }], action: 'to_skip' });

    const disabled = await filterSet.setEnabled(1, false);
    await expect(filterSet.setEnabled(99, false)).resolves.toBeNull();

    const reopened = new FilterSet(document, new WriteLock());
    await reopened.open();

    expect(disabled?.enabled).toBe(false);
    expect(reopened.get(1)?.enabled).toBe(false);
    expect(reopened.match(['example'])).toEqual({ filter: null, evaluated: 0 });
  });

  it('should keep the enabled flag on update unless the draft sets it', async () => {
    await filterSet.add({ rules: [{ position: 0, mode: 'any' }], action: 'to_skip', enabled: false });

    const kept = await filterSet.update(1, { rules: [{ position: 0, mode: 'any' }], action: 'deleted' });
    const turnedOn = await filterSet.update(1, {
      rules: [{ position: 0, mode: 'any' }],
      action: 'deleted',
      enabled: true,
    });

    expect(kept?.enabled).toBe(false);
    expect(turnedOn?.enabled).toBe(true);
  });

  it('should load stored filters without an enabled flag as enabled', async () => {
    await fs.writeFile(
      path.join(dir, 'filters.json'),
      JSON.stringify({
        version: 1,
        next_numeric_id: 2,
        filters: [
          {
            numeric_id: 1,
            name: 'legacy',
            rules: [{ position: 0, mode: 'exact', expression: 'example' }],
            action: 'to_download',
            priority_rank: 0,
          },
        ],
      }),
      'utf8'
    );

    await filterSet.open();

    expect(filterSet.get(1)?.enabled).toBe(true);
    expect(filterSet.match(['example']).filter?.name).toBe('legacy');
  });

  it('should report no match with every filter evaluated', async () => {
    await filterSet.add({
      rules: [{ position: 0, mode: 'exact', expression: 'other' }],
      action: 'to_download',
    });

    expect(filterSet.match(['example', 'com'])).toEqual({ filter: null, evaluated: 1 });
  });

  it('should reject an invalid draft without persisting it', async () => {
    const attempt = filterSet.add({
      rules: [{ position: 0, mode: 'regex', expression: '([a-z' }],
      action: 'to_download',
    });

    await expect(attempt).rejects.toBeInstanceOf(FilterValidationError);
    expect(filterSet.size).toBe(0);
    await expect(document.read()).resolves.toBeNull();
  });

  it('should require an expression for expression-bearing modes', async () => {
    const attempt = filterSet.add({
      rules: [{ position: 0, mode: 'contains', expression: '   ' }],
      action: 'to_download',
    });

    await expect(attempt).rejects.toThrow('rules.0: Expression is required for mode "contains"');
  });

  it('should never reuse an id, even after a reload', async () => {
    const draft = { rules: [{ position: 0, mode: 'any' }], action: 'to_skip' };
    await filterSet.add(draft);
    const second = await filterSet.add(draft);
    await filterSet.remove(second.numericId);

    const reloaded = new FilterSet(document, new WriteLock());
    await reloaded.open();
    const third = await reloaded.add(draft);

    expect(third.numericId).toBe(3);
    expect(reloaded.list().map((f) => f.numericId)).toEqual([1, 3]);
  });

  it('should keep ranks in step with the order', async () => {
    const draft = { rules: [{ position: 0, mode: 'any' }], action: 'to_skip' };
    await filterSet.add(draft);
    await filterSet.add(draft);
    await filterSet.add(draft);

    expect(await filterSet.move(3, 'up')).toBe(true);
    expect(await filterSet.move(1, 'up')).toBe(false);
    expect(await filterSet.reorder(1, 10)).toBe(true);

    expect(filterSet.list().map((f) => [f.numericId, f.priorityRank])).toEqual([
      [3, 0],
      [2, 1],
      [1, 2],
    ]);
  });

  it('should insert at a requested rank', async () => {
    const draft = { rules: [{ position: 0, mode: 'any' }], action: 'to_skip' };
    await filterSet.add(draft);
    await filterSet.add(draft, 0);

    expect(filterSet.list().map((f) => f.numericId)).toEqual([2, 1]);
  });

  it('should replace content in place on update', async () => {
    await filterSet.add({ name: 'keep', rules: [{ position: 0, mode: 'any' }], action: 'to_skip' });

    const updated = await filterSet.update(1, {
      rules: [{ position: 1, mode: 'exact', expression: 'com' }],
      action: 'deleted',
    });

    expect(updated).toEqual({
      numericId: 1,
      name: 'keep',
      rules: [{ position: 1, mode: 'exact', expression: 'com' }],
      action: 'deleted',
      priorityRank: 0,
      enabled: true,
    });
    await expect(filterSet.update(99, { rules: [{ position: 0, mode: 'any' }], action: 'to_skip' })).resolves.toBeNull();
  });

  it('should hand out copies', async () => {
    await filterSet.add({ name: 'original', rules: [{ position: 0, mode: 'any' }], action: 'to_skip' });

    const copy = filterSet.get(1);
    if (copy) {
      copy.name = 'changed';
    }

    expect(filterSet.get(1)?.name).toBe('original');
  });
});
