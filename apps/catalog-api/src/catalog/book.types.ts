/**
 * Book - A catalog entry
 */
export interface Book {
  readonly id: string;
  readonly title: string;
  readonly author: string;
  readonly publicationYear: number;
}

/**
 * BookDraft - Validated fields of a book to create or update
 */
export type BookDraft = Omit<Book, 'id'>;
