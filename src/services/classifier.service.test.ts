import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DatabaseService } from '../database/database.service.js';
import {
  ClassifierService,
  type RuleAuthoring,
  type RuleAuthoringAnswer,
  type RuleAuthoringRequest,
} from './classifier.service.js';
import { FilterService } from './filter.service.js';

vi.mock('../utils/logger/logger.service.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

class ScriptedAuthoring implements RuleAuthoring {
  readonly requests: RuleAuthoringRequest[] = [];

  constructor(private readonly answers: RuleAuthoringAnswer[] = []) {}

  async requestNewFilter(request: RuleAuthoringRequest): Promise<RuleAuthoringAnswer> {
    this.requests.push({ ...request, errors: [...request.errors] });
    return this.answers.shift() ?? { action: 'cancel' };
  }
}

describe('ClassifierService', () => {
  let dir: string;
  let database: DatabaseService;
  let authoring: ScriptedAuthoring;
  let classifier: ClassifierService;
  let filterService: FilterService;

  function setUp(answers: RuleAuthoringAnswer[] = []): void {
    authoring = new ScriptedAuthoring(answers);
    classifier = new ClassifierService(database.links, database.filters, authoring);
    filterService = new FilterService({
      filters: database.filters,
      links: database.links,
      lock: database.lock,
      classifier,
    });
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'classifier-'));
    database = new DatabaseService(dir);
    await database.open();
    setUp();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should classify, cascade on delete and leave the link alone on cancel', async () => {
    await filterService.createFilter({
      rules: [{ position: 0, mode: 'contains', expression: 'example' }],
      action: 'to_download',
    });

    const first = await classifier.processLink('http://example.com/a', { source: 'manual' });
    expect(first.kind).toBe('classified');
    expect(database.links.get('http://example.com/a')).toMatchObject({
      status: 'to_download',
      filterMatchedId: 1,
    });

    const deleted = await filterService.deleteFilter(1);
    expect(deleted.reprocessed).toEqual(['http://example.com/a']);
    expect(database.links.get('http://example.com/a')?.status).toBe('to_reprocess');

    const again = await classifier.processLink('http://example.com/a', { source: 'manual' });
    expect(again).toEqual({ kind: 'cancelled', url: 'http://example.com/a' });
    expect(authoring.requests).toHaveLength(1);
    expect(database.links.get('http://example.com/a')).toMatchObject({
      status: 'to_reprocess',
      filterMatchedId: 1,
    });
  });

  it('should evaluate only up to the first matching filter', async () => {
    await filterService.createFilter({
      rules: [{ position: 1, mode: 'exact', expression: 'example' }],
      action: 'to_download',
    });
    await filterService.createFilter({ rules: [{ position: 'any', mode: 'any' }], action: 'to_skip' });
    const matchSpy = vi.spyOn(database.filters, 'matchesFilter');

    const result = classifier.classify({ tokens: ['img', 'example', 'com'] });

    expect(result.matched?.numericId).toBe(1);
    expect(result.action).toBe('to_download');
    expect(result.evaluated).toBe(1);
    expect(matchSpy).toHaveBeenCalledTimes(1);
    expect(classifier.classify({ tokens: ['img', 'example', 'com'] }).action).toBe('to_download');
  });

  it('should pass validation errors back to the author', async () => {
    setUp([
      { action: 'create', draft: { rules: [{ position: 0, mode: 'regex', expression: '(' }], action: 'to_skip' } },
      { action: 'create', draft: { rules: [{ position: 0, mode: 'exact', expression: 'media' }], action: 'to_skip' } },
    ]);

    const outcome = await classifier.processLink('https://media.example.org/x', { source: 'manual' });

    expect(authoring.requests).toHaveLength(2);
    expect(authoring.requests[0]).toMatchObject({
      url: 'https://media.example.org/x',
      tokens: ['media', 'example', 'org', 'x'],
      attempt: 1,
      errors: [],
    });
    expect(authoring.requests[1]?.errors).toHaveLength(1);
    expect(authoring.requests[1]?.errors[0]).toMatch(/^rules\.0: Invalid regex pattern/);
    expect(outcome.kind).toBe('classified');
    expect(database.links.get('https://media.example.org/x')).toMatchObject({
      status: 'to_skip',
      filterMatchedId: 1,
    });
  });

  it('should ask again when a new filter still does not match', async () => {
    setUp([
      { action: 'create', draft: { rules: [{ position: 0, mode: 'exact', expression: 'other' }], action: 'to_skip' } },
    ]);

    const outcome = await classifier.processLink('https://media.example.org/x', { source: 'manual' });

    expect(outcome.kind).toBe('cancelled');
    expect(authoring.requests[1]?.errors).toEqual([
      'Filter 1 was added but does not match https://media.example.org/x',
    ]);
    expect(database.links.has('https://media.example.org/x')).toBe(false);
  });

  it('should leave known live links untouched', async () => {
    await database.links.upsert({ url: 'http://example.com/a', status: 'to_skip', filterMatchedId: 9 });

    const outcome = await classifier.processLink('  http://example.com/a ', { source: 'manual' });

    expect(outcome.kind).toBe('known');
    expect(authoring.requests).toHaveLength(0);
    expect(database.links.get('http://example.com/a')?.filterMatchedId).toBe(9);
  });

  it('should reactivate a deleted link', async () => {
    await filterService.createFilter({
      rules: [{ position: 'any', mode: 'exact', expression: 'a' }],
      action: 'to_download',
    });
    await database.links.upsert({ url: 'http://example.com/a', status: 'deleted', filterMatchedId: null });

    await classifier.processLink('http://example.com/a', { source: 'manual' });

    expect(database.links.get('http://example.com/a')).toMatchObject({
      status: 'to_download',
      deleted: false,
      filterMatchedId: 1,
    });
  });

  it('should re-evaluate pending links in the new order after a move', async () => {
    await filterService.createFilter({
      rules: [{ position: 'any', mode: 'contains', expression: 'example' }],
      action: 'to_skip',
    });
    await filterService.createFilter({
      rules: [{ position: 0, mode: 'exact', expression: 'img' }],
      action: 'to_download',
    });
    await classifier.processLink('http://img.example.com/p', { source: 'manual' });
    expect(database.links.get('http://img.example.com/p')?.filterMatchedId).toBe(1);

    await filterService.setLinkStatus(['http://img.example.com/p'], 'to_reprocess');
    const moved = await filterService.moveFilter(2, 'up');

    expect(moved.success).toBe(true);
    expect(moved.reprocess?.reclassified).toEqual(['http://img.example.com/p']);
    expect(database.links.get('http://img.example.com/p')).toMatchObject({
      status: 'to_download',
      filterMatchedId: 2,
    });
    expect(authoring.requests).toHaveLength(0);
  });

  it('should cascade deletion to exactly the referencing links', async () => {
    await database.links.upsert({ url: 'http://example.com/1', status: 'to_download', filterMatchedId: 1 });
    await database.links.upsert({ url: 'http://example.com/2', status: 'to_skip', filterMatchedId: 2 });
    await filterService.createFilter({ rules: [{ position: 0, mode: 'any' }], action: 'to_download' });
    await filterService.createFilter({ rules: [{ position: 0, mode: 'any' }], action: 'to_skip' });

    const result = await filterService.deleteFilter(1);

    expect(result.success).toBe(true);
    expect(result.reprocessed).toEqual(['http://example.com/1']);
    expect(database.links.get('http://example.com/2')?.status).toBe('to_skip');
    await expect(filterService.deleteFilter(1)).resolves.toMatchObject({ success: false, message: 'Filter not found' });
  });

  it('should halt explicit reprocessing on cancel', async () => {
    await filterService.createFilter({
      rules: [{ position: 0, mode: 'exact', expression: 'example' }],
      action: 'to_download',
    });
    await classifier.processLink('http://example.com/a', { source: 'manual' });
    await classifier.processLink('http://example.com/b', { source: 'manual' });
    await filterService.updateFilter(1, {
      rules: [{ position: 0, mode: 'exact', expression: 'zzz' }],
      action: 'to_download',
    });

    const summary = await filterService.reprocessAffected(1);

    expect(summary).toEqual({
      reclassified: [],
      unmatched: ['http://example.com/a', 'http://example.com/b'],
      cancelled: true,
    });
    expect(authoring.requests).toHaveLength(1);
    expect(database.links.byStatus('to_reprocess')).toHaveLength(2);
  });

  it('should report validation failures as results', async () => {
    const result = await filterService.createFilter({ rules: [], action: 'to_download' });

    expect(result.success).toBe(false);
    expect(result.errors).toEqual(['rules: A filter needs at least one rule']);
  });
});
