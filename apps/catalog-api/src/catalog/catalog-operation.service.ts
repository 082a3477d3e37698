// Import NestJS Injectable decorator
import { Injectable } from '@nestjs/common';
// Import error values
import { DownstreamError, ValidationError } from '../common/errors/catalog-errors';
// Import the configuration snapshot holder (validation settings)
import { SecurityConfigService } from '../config/security-config.service';
// Import principal lookup contract
import { PrincipalLookup } from '../iam/principals/principal-lookup';
import type { Principal } from '../iam/principals/principal.types';
// Import guard pipeline and permission model
import { evaluateGuards, OPERATION_GUARDS } from '../iam/rbac/operation-guards';
import { PermissionService } from '../iam/rbac/permission.service';
// Import logger
import { JsonLogger } from '../logging/json-logger.service';
// Import sanitizer
import { BOOK_FORM } from '../security/sanitizer/field-classes';
import { type RawFields, validateFields } from '../security/sanitizer/sanitizing-validator';
// Import persistence contract
import { BookRepository } from './book.repository';
import type { BookDraft } from './book.types';
import { OPERATION_PERMISSIONS, type OperationKind, type OperationResult } from './catalog-operation.types';

/** Either a value or the result to hand back instead */
type Step<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly result: OperationResult };

/**
 * CatalogOperationService - Runs catalog operations behind the trust boundary
 *
 * Order is fixed: resolve the principal, run the guards, validate input for
 * create/update, and only then touch the repository. Failures come back as
 * result values; nothing is thrown to the caller.
 */
@Injectable()
export class CatalogOperationService {
  constructor(
    private readonly principals: PrincipalLookup,
    private readonly permissions: PermissionService,
    private readonly books: BookRepository,
    private readonly security: SecurityConfigService,
    private readonly logger: JsonLogger
  ) {}

  /**
   * Perform one gated operation
   * @param principalToken - Bearer token, or null for anonymous callers
   * @param kind - Operation to perform
   * @param resourceId - Book ID for view, update and delete
   * @param rawFields - Unvalidated input for create and update
   */
  async performOperation(
    principalToken: string | null,
    kind: OperationKind,
    resourceId?: string,
    rawFields: RawFields = {}
  ): Promise<OperationResult> {
    const permission = OPERATION_PERMISSIONS[kind];

    let principal: Principal;
    try {
      principal = await this.principals.resolve(principalToken);
    } catch (err: unknown) {
      return this.downstream('Principal lookup failed', kind, err);
    }

    const denied = evaluateGuards(OPERATION_GUARDS, { principal, permission, authorizer: this.permissions });
    if (denied) {
      this.logger.warn('Catalog operation denied', {
        operation: kind,
        permission,
        reason: denied.reason,
        principalId: principal.kind === 'user' ? principal.id : null
      });
      return { status: 'authorization_error', error: denied };
    }

    switch (kind) {
      case 'list': {
        const books = await this.attempt(kind, () => this.books.list());
        if (!books.ok) return books.result;
        return { status: 'success', resourceId: null, payload: books.value };
      }

      case 'create': {
        const draft = this.validateBook(rawFields);
        if (!draft.ok) return draft.result;
        const fields = draft.value;
        const created = await this.attempt(kind, () => this.books.create(fields));
        if (!created.ok) return created.result;
        return { status: 'success', resourceId: created.value.id, payload: created.value };
      }

      case 'view': {
        const id = this.requireId(resourceId);
        if (!id.ok) return id.result;
        const bookId = id.value;
        const found = await this.attempt(kind, () => this.books.findById(bookId));
        if (!found.ok) return found.result;
        if (!found.value) return { status: 'not_found', resourceId: bookId };
        return { status: 'success', resourceId: bookId, payload: found.value };
      }

      case 'update': {
        const id = this.requireId(resourceId);
        if (!id.ok) return id.result;
        const draft = this.validateBook(rawFields);
        if (!draft.ok) return draft.result;
        const bookId = id.value;
        const fields = draft.value;
        const updated = await this.attempt(kind, () => this.books.update(bookId, fields));
        if (!updated.ok) return updated.result;
        if (!updated.value) return { status: 'not_found', resourceId: bookId };
        return { status: 'success', resourceId: bookId, payload: updated.value };
      }

      case 'delete': {
        const id = this.requireId(resourceId);
        if (!id.ok) return id.result;
        const bookId = id.value;
        const deleted = await this.attempt(kind, () => this.books.delete(bookId));
        if (!deleted.ok) return deleted.result;
        if (!deleted.value) return { status: 'not_found', resourceId: bookId };
        return { status: 'success', resourceId: bookId, payload: null };
      }
    }
  }

  private requireId(resourceId: string | undefined): Step<string> {
    const id = resourceId?.trim();
    if (id) return { ok: true, value: id };
    return {
      ok: false,
      result: { status: 'validation_error', error: new ValidationError([{ field: 'id', message: 'Book id is required.' }]) }
    };
  }

  private validateBook(rawFields: RawFields): Step<BookDraft> {
    const form = validateFields(BOOK_FORM, rawFields, this.security.current().validation);
    if (form.violations.length > 0) {
      return { ok: false, result: { status: 'validation_error', error: new ValidationError(form.violations) } };
    }
    return {
      ok: true,
      value: {
        title: form.values.title ?? '',
        author: form.values.author ?? '',
        publicationYear: Number(form.values.publicationYear)
      }
    };
  }

  /**
   * Call the repository; a rejection becomes a downstream_error result
   */
  private async attempt<T>(kind: OperationKind, task: () => Promise<T>): Promise<Step<T>> {
    try {
      return { ok: true, value: await task() };
    } catch (err: unknown) {
      return { ok: false, result: this.downstream('Book repository failed', kind, err) };
    }
  }

  private downstream(message: string, kind: OperationKind, cause: unknown): OperationResult {
    this.logger.error(message, { operation: kind, cause });
    return { status: 'downstream_error', error: new DownstreamError(message, { cause }) };
  }
}
