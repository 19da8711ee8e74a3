import { describe, it, expect } from 'vitest';
import { templateQuery } from '../../../src/cli/commands/find.js';
import { InvalidArgumentError } from '../../../src/cli/errors.js';
import { FRONTMATTER_VALUE_SQL, TAG_COUNTS_SQL } from '../../../src/query/canned.js';

describe('templateQuery', () => {
  it('binds the named parameters of a template', () => {
    expect(templateQuery('frontmatter-value', ['key=status', 'value=done'])).toEqual({
      sql: FRONTMATTER_VALUE_SQL,
      params: { key: 'status', value: 'done' },
    });
  });

  it('runs a template without parameters', () => {
    expect(templateQuery('tag-counts')).toEqual({ sql: TAG_COUNTS_SQL, params: {} });
  });

  it('rejects an unknown template name', () => {
    expect(() => templateQuery('nope')).toThrow(InvalidArgumentError);
  });

  it('requires every parameter the template names', () => {
    expect(() => templateQuery('frontmatter-value', ['key=status'])).toThrow(
      'Template "frontmatter-value" needs --param value=...'
    );
  });

  it('rejects parameters the template does not take', () => {
    expect(() => templateQuery('orphans', ['path=x'])).toThrow('Template "orphans" takes no parameter path');
  });
});
