import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'node:fs';
import { Coordinator } from '../../../src/coordinator/coordinator.js';
import {
  QUERY_TEMPLATES,
  buildBacklinksQuery,
  buildBrokenLinksQuery,
  buildFrontmatterQuery,
  buildMostLinkedQuery,
  buildOrphanedFilesQuery,
  buildRecentFilesQuery,
  buildTagQuery,
  type CannedQuery,
} from '../../../src/query/canned.js';
import { QueryValidationError, type QueryRow } from '../../../src/query/types.js';
import { validateQuery } from '../../../src/query/validator.js';
import { createWorkspace, testConfig, type Workspace } from '../../helpers.js';

describe('canned statements', () => {
  let workspace: Workspace;
  let coordinator: Coordinator;
  let alpha: string;
  let beta: string;
  let gamma: string;
  let delta: string;

  async function rows(query: CannedQuery): Promise<QueryRow[]> {
    const outcome = await coordinator.query(query.sql, { params: query.params });
    if (!outcome.success) throw outcome.error;
    return outcome.result.rows;
  }

  beforeAll(async () => {
    workspace = createWorkspace('mdquery-canned-');
    alpha = workspace.write(
      'alpha.md',
      '---\ntitle: Alpha\nstatus: draft\ntags: [project, ideas]\n---\n# Alpha\n\nSee [[beta]] and [[Missing Note]].'
    );
    beta = workspace.write(
      'sub/beta.md',
      '---\ntitle: Beta\nstatus: done\naliases: [b, bee]\n---\n# Beta\n\nBack to [Alpha](../alpha.md#top) and [Gamma](gamma.md).'
    );
    gamma = workspace.write('gamma.md', '# Gamma\n\nTagged #ideas, points at [[alpha]] and [[beta]].');
    delta = workspace.write('delta.md', '# Delta\n\nNo links here. #solo');
    const monthAgo = new Date(Date.now() - 30 * 86_400_000);
    fs.utimesSync(delta, monthAgo, monthAgo);

    coordinator = await Coordinator.open({ config: testConfig(workspace.databasePath) });
    await coordinator.index(workspace.docs);
  });

  afterAll(async () => {
    await coordinator.close();
    workspace.cleanup();
  });

  it('passes validation like any client statement', () => {
    for (const template of QUERY_TEMPLATES) {
      expect(() => validateQuery(template.sql, { maxQueryLength: 10000, maxJoins: 8 })).not.toThrow();
    }
  });

  it('finds backlinks whether written as a wiki link or a relative path with an anchor', async () => {
    expect(await rows(buildBacklinksQuery(alpha))).toEqual([
      { path: gamma, title: 'Gamma', link_target: 'alpha', link_type: 'wikilink' },
      { path: beta, title: 'Beta', link_target: '../alpha.md#top', link_type: 'markdown' },
    ]);
  });

  it('lists links that resolve to no document', async () => {
    expect(await rows(buildBrokenLinksQuery())).toEqual([
      { path: alpha, link_target: 'Missing Note', link_type: 'wikilink' },
    ]);
  });

  it('lists documents nothing links to', async () => {
    expect(await rows(buildOrphanedFilesQuery())).toEqual([{ path: delta, title: 'Delta' }]);
  });

  it('ranks documents by distinct linking documents', async () => {
    expect(await rows(buildMostLinkedQuery())).toEqual([
      { path: alpha, title: 'Alpha', backlink_count: 2 },
      { path: beta, title: 'Beta', backlink_count: 2 },
      { path: gamma, title: 'Gamma', backlink_count: 1 },
    ]);
  });

  it('matches all or any of several tags', async () => {
    expect(await rows(buildTagQuery(['project', '#Ideas']))).toEqual([{ path: alpha, title: 'Alpha' }]);
    expect(await rows(buildTagQuery(['ideas'], 'any'))).toEqual([
      { path: alpha, title: 'Alpha' },
      { path: gamma, title: 'Gamma' },
    ]);
    expect(await rows(buildTagQuery(['#solo', 'project'], 'any'))).toEqual([
      { path: alpha, title: 'Alpha' },
      { path: delta, title: 'Delta' },
    ]);
    expect(() => buildTagQuery(['#', ''])).toThrow(QueryValidationError);
  });

  it('looks up frontmatter keys and values, including array elements', async () => {
    expect(await rows(buildFrontmatterQuery('status'))).toEqual([
      { path: alpha, title: 'Alpha', value: 'draft' },
      { path: beta, title: 'Beta', value: 'done' },
    ]);
    expect(await rows(buildFrontmatterQuery('status', 'done'))).toEqual([
      { path: beta, title: 'Beta', value: 'done' },
    ]);
    expect(await rows(buildFrontmatterQuery('aliases', 'bee'))).toEqual([
      { path: beta, title: 'Beta', value: '["b","bee"]' },
    ]);
  });

  it('lists documents modified within the window', async () => {
    const recent = await rows(buildRecentFilesQuery(7));
    expect(recent.map((row) => row.path).sort()).toEqual([alpha, gamma, beta].sort());
    expect((await rows(buildRecentFilesQuery(60))).map((row) => row.path)).toContain(delta);
  });
});
