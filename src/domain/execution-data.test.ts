import { describe, it, expect } from 'vitest';
import { parseExecutionData } from './execution-data.js';

describe('parseExecutionData', () => {
  const raw = {
    id: 42,
    href: 'http://host/exec/42',
    project: 'infra',
    job: { name: 'Deploy', href: 'http://host/job/1', group: 'ops' },
    user: 'admin',
  };

  it('should read the attributes a message needs', () => {
    const result = parseExecutionData(raw);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.value).toEqual({
        id: '42',
        href: 'http://host/exec/42',
        project: 'infra',
        job: { name: 'Deploy', href: 'http://host/job/1' },
        failedNodeListString: undefined,
        failedNodeList: undefined,
      });
    }
  });

  it('should keep failed node details', () => {
    const result = parseExecutionData({
      ...raw,
      failedNodeListString: 'node-a, node-b',
      failedNodeList: ['node-a', 7, 'node-b'],
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.value.failedNodeListString).toBe('node-a, node-b');
      expect(result.value.failedNodeList).toEqual(['node-a', 'node-b']);
    }
  });

  it('should report every missing attribute as a render error', () => {
    const result = parseExecutionData({ id: 'abc', job: 'not-a-map' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.type).toBe('RENDER_ERROR');
      expect(result.error.message).toBe(
        'Error merging Slack notification message template: [missing execution data: href, project, job.name, job.href].'
      );
    }
  });

  it('should not accept non-scalar values', () => {
    const result = parseExecutionData({ ...raw, project: { name: 'infra' } });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toContain('missing execution data: project]');
    }
  });
});
