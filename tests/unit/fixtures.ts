import type { EntityModel } from '../../src/postgres/model.js';

export interface Author {
  id: number;
  name: string;
  country: string;
}

export interface Book {
  id: number;
  title: string;
  publishedAt: Date;
  pages: number;
  authorId: number;
  author?: Author;
}

export const ada: Author = { id: 1, name: 'Ada', country: 'UK' };
export const linus: Author = { id: 2, name: 'Linus', country: 'FI' };

export const books: Book[] = [
  { id: 1, title: 'Engines', publishedAt: new Date('2020-01-10T00:00:00Z'), pages: 120, authorId: 1, author: ada },
  { id: 2, title: 'Kernels', publishedAt: new Date('2021-06-01T00:00:00Z'), pages: 300, authorId: 2, author: linus },
  { id: 3, title: 'Notes', publishedAt: new Date('2022-03-15T00:00:00Z'), pages: 45, authorId: 1, author: ada },
  // author row missing
  { id: 4, title: 'Orphan', publishedAt: new Date('2023-09-30T00:00:00Z'), pages: 200, authorId: 9 },
];

export function ids(items: readonly Book[]): number[] {
  return items.map((book) => book.id);
}

export const authorModel: EntityModel<Author> = {
  table: 'authors',
  primaryKey: 'id',
  columns: { id: 'id', name: 'name', country: 'country' },
  map: (record) => ({
    id: record.number('id'),
    name: record.string('name'),
    country: record.string('country'),
  }),
};

export const bookModel: EntityModel<Book> = {
  table: 'books',
  primaryKey: 'id',
  columns: {
    id: 'id',
    title: 'title',
    publishedAt: 'published_at',
    pages: 'pages',
    authorId: 'author_id',
  },
  navigations: {
    author: { target: authorModel, foreignKey: 'author_id' },
  },
  map: (record) => {
    const book: Book = {
      id: record.number('id'),
      title: record.string('title'),
      publishedAt: record.date('publishedAt'),
      pages: record.number('pages'),
      authorId: record.number('authorId'),
    };
    const author = record.navigation('author', authorModel);
    return author === undefined ? book : { ...book, author };
  },
};

export const BOOK_COLUMNS =
  't0."id" AS "t0.id", t0."title" AS "t0.title", t0."published_at" AS "t0.publishedAt", ' +
  't0."pages" AS "t0.pages", t0."author_id" AS "t0.authorId"';

export const AUTHOR_COLUMNS = 't1."id" AS "t1.id", t1."name" AS "t1.name", t1."country" AS "t1.country"';

export const AUTHOR_JOIN = 'LEFT JOIN "authors" AS t1 ON t1."id" = t0."author_id"';
