// Import node crypto for ID generation
import { randomUUID } from 'node:crypto';
// Import book shapes
import type { Book, BookDraft } from './book.types';

/**
 * BookRepository - Persistence collaborator of the catalog
 * Implementations may fail; callers treat any rejection as a downstream failure
 */
export abstract class BookRepository {
  /** Every book, in insertion order */
  abstract list(): Promise<Book[]>;
  abstract findById(id: string): Promise<Book | null>;
  abstract create(draft: BookDraft): Promise<Book>;
  /** @returns The updated book, or null when `id` is unknown */
  abstract update(id: string, draft: BookDraft): Promise<Book | null>;
  /** @returns false when `id` is unknown */
  abstract delete(id: string): Promise<boolean>;
}

/**
 * InMemoryBookRepository - Map-backed repository
 */
export class InMemoryBookRepository extends BookRepository {
  private readonly books = new Map<string, Book>();

  /**
   * @param nextId - ID generator
   */
  constructor(private readonly nextId: () => string = randomUUID) {
    super();
  }

  async list(): Promise<Book[]> {
    return Array.from(this.books.values());
  }

  async findById(id: string): Promise<Book | null> {
    return this.books.get(id) ?? null;
  }

  async create(draft: BookDraft): Promise<Book> {
    const book: Book = Object.freeze({ id: this.nextId(), ...draft });
    this.books.set(book.id, book);
    return book;
  }

  async update(id: string, draft: BookDraft): Promise<Book | null> {
    if (!this.books.has(id)) return null;
    const book: Book = Object.freeze({ id, ...draft });
    this.books.set(id, book);
    return book;
  }

  async delete(id: string): Promise<boolean> {
    return this.books.delete(id);
  }
}
