/**
 * Extra checks a field class runs on non-empty values
 */
export type FieldKind = 'text' | 'freeText' | 'year' | 'email';

/**
 * FieldClass - How one kind of input field is cleaned and checked
 */
export interface FieldClass {
  /** Capitalized label used in messages ('Author name') */
  readonly label: string;
  /** Longest accepted cleaned value, in characters; year fields are bounded by their range instead */
  readonly maxLength: number;
  readonly kind: FieldKind;
  /** Empty values are accepted instead of rejected */
  readonly optional?: boolean;
}

export const FIELD_CLASSES = {
  title: { label: 'Title', maxLength: 200, kind: 'text' },
  author: { label: 'Author name', maxLength: 100, kind: 'text' },
  publicationYear: { label: 'Publication year', maxLength: 4, kind: 'year' },
  name: { label: 'Name', maxLength: 100, kind: 'freeText' },
  email: { label: 'Email', maxLength: 254, kind: 'email' },
  message: { label: 'Message', maxLength: 500, kind: 'freeText' }
} as const satisfies Record<string, FieldClass>;

/**
 * One field of a form: the input key and its class
 */
export interface FormField<K extends string> {
  readonly name: K;
  readonly fieldClass: FieldClass;
}

/** Ordered fields of a form */
export type FormSchema<K extends string> = readonly FormField<K>[];

export type BookField = 'title' | 'author' | 'publicationYear';

export const BOOK_FORM: FormSchema<BookField> = [
  { name: 'title', fieldClass: FIELD_CLASSES.title },
  { name: 'author', fieldClass: FIELD_CLASSES.author },
  { name: 'publicationYear', fieldClass: FIELD_CLASSES.publicationYear }
];

export type FeedbackField = 'name' | 'email' | 'message';

export const FEEDBACK_FORM: FormSchema<FeedbackField> = [
  { name: 'name', fieldClass: FIELD_CLASSES.name },
  { name: 'email', fieldClass: FIELD_CLASSES.email },
  { name: 'message', fieldClass: FIELD_CLASSES.message }
];
