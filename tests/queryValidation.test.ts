import { describe, expect, it } from 'vitest';
import { ValidationError } from '../src/lib/errors';
import { assertValidQuery, contentTerms, parseSearchBody } from '../src/services/queryValidation';
import { makeQuery } from './fixtures';

const defaults = { maxResults: 10, minRelevance: 0.7 };

describe('contentTerms', () => {
  it('drops stop words and punctuation', () => {
    expect(contentTerms('The Effects of Bail-Reform!')).toEqual(['effects', 'bail', 'reform']);
  });
});

describe('parseSearchBody', () => {
  it('applies defaults to a minimal body', () => {
    expect(parseSearchBody({ query: '  bail reform recidivism  ' }, defaults)).toEqual({
      query: 'bail reform recidivism',
      context: null,
      maxResults: 10,
      citationStyle: 'APA',
      filterEnabled: true,
      minRelevance: 0.7,
      includeContext: true
    });
  });

  it('maps the snake_case wire fields', () => {
    const query = parseSearchBody(
      {
        query: 'bail reform',
        context: ' essay on pretrial detention ',
        max_results: 3,
        citation_style: 'Bluebook',
        filter: false,
        min_relevance: 0.4,
        include_context: false
      },
      defaults
    );

    expect(query).toEqual({
      query: 'bail reform',
      context: 'essay on pretrial detention',
      maxResults: 3,
      citationStyle: 'Bluebook',
      filterEnabled: false,
      minRelevance: 0.4,
      includeContext: false
    });
  });

  it('treats an empty context as absent', () => {
    expect(parseSearchBody({ query: 'bail reform', context: '   ' }, defaults).context).toBeNull();
  });

  it.each([
    [{ query: '' }],
    [{ query: 'x'.repeat(1001) }],
    [{ query: 'bail', max_results: 0 }],
    [{ query: 'bail', max_results: 51 }],
    [{ query: 'bail', min_relevance: 1.5 }],
    [{ query: 'bail', citation_style: 'Harvard' }],
    [{ query: 'bail', context: 'c'.repeat(2001) }],
    [{}],
    ['not an object']
  ])('rejects %j', (body) => {
    expect(() => parseSearchBody(body, defaults)).toThrowError(ValidationError);
  });

  it('rejects a query made only of stop words', () => {
    expect(() => parseSearchBody({ query: 'the a an' }, defaults)).toThrowError(
      'query must contain at least one meaningful term'
    );
  });
});

describe('assertValidQuery', () => {
  it('accepts a well formed query', () => {
    expect(() => assertValidQuery(makeQuery())).not.toThrow();
  });

  it('names the offending field', () => {
    try {
      assertValidQuery(makeQuery({ maxResults: 2.5 }));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) expect(err.details).toEqual({ field: 'max_results' });
    }
  });
});
