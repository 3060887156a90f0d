import { describe, it, expect } from 'vitest';
import { NameResolvers, findSchemaKey } from '../naming.js';

describe('NameResolvers', () => {
  it('identity leaves names untouched', () => {
    expect(NameResolvers.identity('PageSize')).toBe('PageSize');
  });

  it('camelCase lowers the leading word or acronym', () => {
    expect(NameResolvers.camelCase('PageSize')).toBe('pageSize');
    expect(NameResolvers.camelCase('URLValue')).toBe('urlValue');
    expect(NameResolvers.camelCase('ID')).toBe('id');
    expect(NameResolvers.camelCase('query')).toBe('query');
    expect(NameResolvers.camelCase('')).toBe('');
  });
});

describe('findSchemaKey', () => {
  it('prefers the resolved key', () => {
    expect(
      findSchemaKey('Query', ['query', 'Query'], NameResolvers.identity)
    ).toBe('Query');
  });

  it('falls back to a case-insensitive match', () => {
    expect(findSchemaKey('Query', ['query'], NameResolvers.identity)).toBe(
      'query'
    );
    expect(findSchemaKey('page_size', ['PAGE_SIZE'], NameResolvers.camelCase)).toBe(
      'PAGE_SIZE'
    );
  });

  it('returns undefined when nothing matches', () => {
    expect(findSchemaKey('missing', ['query'], NameResolvers.identity)).toBe(
      undefined
    );
  });
});
