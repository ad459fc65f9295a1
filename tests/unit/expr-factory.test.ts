import { describe, it, expect } from 'vitest';
import { STRING_CONTAINS, and, constant, contains, eq, ge, isExpression, lambda, le, member, or, param, prop } from '../../src/expr/factory.js';
import { formatExpression, formatLambda } from '../../src/expr/format.js';
import type { Book } from './fixtures.js';

describe('expression factory', () => {
  it('lambda hands the same placeholder to the body', () => {
    const fragment = lambda<Book, boolean>('b', (b) => eq(prop(b, 'title'), 'Notes'));
    expect(fragment.parameter).toEqual({ kind: 'parameter', name: 'b' });
    expect(fragment.body).toEqual({
      kind: 'binary',
      operator: 'eq',
      left: { kind: 'member', object: fragment.parameter, member: 'title' },
      right: { kind: 'constant', value: 'Notes' },
    });
  });

  it('prop is a chain of member accesses', () => {
    const b = param<Book>('b');
    expect(prop(b, 'author', 'name')).toEqual({
      kind: 'member',
      object: member(b, 'author'),
      member: 'name',
    });
  });

  it('lifts raw values to constants but keeps expressions', () => {
    const b = param<Book>('b');
    expect(ge(prop(b, 'pages'), 10)).toEqual(ge(prop(b, 'pages'), constant(10)));
    expect(le(prop(b, 'pages'), prop(b, 'authorId'))).toEqual({
      kind: 'binary',
      operator: 'le',
      left: { kind: 'member', object: b, member: 'pages' },
      right: { kind: 'member', object: b, member: 'authorId' },
    });
  });

  it('treats dates as values, not expressions', () => {
    const when = new Date('2024-01-01T00:00:00Z');
    expect(isExpression(when)).toBe(false);
    expect(isExpression(null)).toBe(false);
    expect(isExpression(constant(1))).toBe(true);
  });

  it('contains is a call to string.contains', () => {
    const b = param<Book>('b');
    expect(contains(prop(b, 'title'), 'ot')).toEqual({
      kind: 'call',
      method: STRING_CONTAINS,
      target: { kind: 'member', object: b, member: 'title' },
      args: [{ kind: 'constant', value: 'ot' }],
    });
  });
});

describe('formatting', () => {
  it('renders operators, members and constants', () => {
    const fragment = lambda<Book, boolean>('b', (b) =>
      or(and(eq(prop(b, 'author', 'name'), null), le(prop(b, 'pages'), 50)), contains(prop(b, 'title'), 'a"b')),
    );
    expect(formatLambda(fragment)).toBe(
      'b => (((b.author.name == null) && (b.pages <= 50)) || b.title.contains("a\\"b"))',
    );
  });

  it('renders dates in ISO form', () => {
    expect(formatExpression(constant(new Date('2024-02-03T04:05:06Z')))).toBe('Date(2024-02-03T04:05:06.000Z)');
  });
});
