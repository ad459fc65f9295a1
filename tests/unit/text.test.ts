import { describe, it, expect } from 'vitest';
import { anyPropertyContainsText } from '../../src/filters/text.js';
import { contains, lambda, prop } from '../../src/expr/factory.js';
import { compilePredicate } from '../../src/expr/evaluate.js';
import { formatLambda } from '../../src/expr/format.js';
import { CapabilityMissingError } from '../../src/errors.js';
import type { MethodTable } from '../../src/expr/methods.js';
import type { Predicate } from '../../src/expr/types.js';
import { books, ids } from './fixtures.js';
import type { Book } from './fixtures.js';

const title = lambda<Book, string>('b', (b) => prop(b, 'title'));
const authorName = lambda<Book, string>('a', (a) => prop(a, 'author', 'name'));

function matching(predicate: Predicate<Book>): number[] {
  return ids(books.filter(compilePredicate(predicate)));
}

describe('anyPropertyContainsText', () => {
  it('matches nothing without selectors', () => {
    const predicate = anyPropertyContainsText<Book>('e', []);
    expect(formatLambda(predicate)).toBe('x => false');
    expect(matching(predicate)).toEqual([]);
  });

  it('with one selector behaves like a direct containment test', () => {
    const direct = compilePredicate(lambda<Book, boolean>('b', (b) => contains(prop(b, 'title'), 'e')));
    const built = compilePredicate(anyPropertyContainsText('e', [title]));
    for (const book of books) {
      expect(built(book)).toBe(direct(book));
    }
    expect(ids(books.filter(built))).toEqual([1, 2, 3]);
  });

  it('ORs the selectors, starting from false', () => {
    const predicate = anyPropertyContainsText('n', [authorName, title]);
    expect(formatLambda(predicate)).toBe('x => ((false || x.author.name.contains("n")) || x.title.contains("n"))');
    // Engines, Kernels (and Linus), Orphan; "Notes" and "Ada" have no lowercase n
    expect(matching(predicate)).toEqual([1, 2, 4]);
  });

  it('is the OR of direct containment tests', () => {
    for (const search of ['a', 'in', 'Li', 'x', '']) {
      const built = compilePredicate(anyPropertyContainsText(search, [title, authorName]));
      for (const book of books) {
        const expected = book.title.includes(search) || (book.author?.name.includes(search) ?? false);
        expect(built(book)).toBe(expected);
      }
    }
  });

  it('is case-sensitive', () => {
    expect(matching(anyPropertyContainsText('k', [title]))).toEqual([]);
    expect(matching(anyPropertyContainsText('K', [title]))).toEqual([2]);
  });

  it('fails before building anything when contains is unavailable', () => {
    const noMethods: MethodTable = new Map();
    expect(() => anyPropertyContainsText('e', [title], noMethods)).toThrow(CapabilityMissingError);
    expect(() => anyPropertyContainsText<Book>('e', [], noMethods)).toThrow(
      'Method "contains" is not available for string values',
    );
  });
});
