import { join } from 'node:path';
import { InMemoryBookRepository } from '../../src/catalog/book.repository';
import { readSampleBooks, seedBooks } from '../../src/catalog/sample-books.loader';
import { ConfigurationError } from '../../src/common/errors/catalog-errors';

describe('sample books', () => {
  it('reads the shipped sample file and seeds it in order', async () => {
    const drafts = readSampleBooks(join(__dirname, '../../config/sample-books.json'));
    let counter = 0;
    const repository = new InMemoryBookRepository(() => `sample-${++counter}`);

    await expect(seedBooks(repository, drafts)).resolves.toBe(4);

    const books = await repository.list();
    expect(books.map((book) => book.id)).toEqual(['sample-1', 'sample-2', 'sample-3', 'sample-4']);
    expect(books[0]).toEqual({
      id: 'sample-1',
      title: 'Secure Web Application Patterns',
      author: 'Security Expert',
      publicationYear: 2023
    });
  });

  it('reports a missing file as a configuration error', () => {
    expect(() => readSampleBooks(join(__dirname, 'missing.json'))).toThrow(ConfigurationError);
  });
});

describe('InMemoryBookRepository', () => {
  it('returns null and false for unknown ids', async () => {
    const repository = new InMemoryBookRepository();

    await expect(repository.findById('nope')).resolves.toBeNull();
    await expect(repository.update('nope', { title: 'T', author: 'A', publicationYear: 2000 })).resolves.toBeNull();
    await expect(repository.delete('nope')).resolves.toBe(false);
  });

  it('stores frozen books', async () => {
    const repository = new InMemoryBookRepository(() => 'b1');
    const book = await repository.create({ title: 'T', author: 'A', publicationYear: 2000 });

    expect(Object.isFrozen(book)).toBe(true);
    await expect(repository.findById('b1')).resolves.toBe(book);
  });
});
