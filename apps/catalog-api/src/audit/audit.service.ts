// Import NestJS Injectable decorator
import { Injectable } from '@nestjs/common';
// Import the structured logger audit records are written to
import { JsonLogger } from '../logging/json-logger.service';

/**
 * RbacAuditAction - Union type of all audited RBAC actions
 */
export type RbacAuditAction =
  | 'role.define' // Create or replace a role's permission set
  | 'role.assign'; // Assign a role to a principal

/**
 * AuditRecord - One administrative change: who did what, to what, before/after
 */
export interface AuditRecord {
  /** Principal ID of the caller, or 'system' */
  actor: string;
  action: RbacAuditAction;
  /** Kind of entity changed (e.g. 'role', 'principal') */
  targetType: string;
  targetId: string;
  before: unknown;
  after: unknown;
  requestId?: string;
}

/**
 * AuditService - Writes RBAC administrative actions to the audit trail
 * Records go out as structured log lines under the 'audit' context
 */
@Injectable()
export class AuditService {
  /**
   * @param logger - Application JSON logger
   */
  constructor(private readonly logger: JsonLogger) {}

  /**
   * Record an RBAC administrative action
   * @returns Promise that resolves once the record is written
   */
  async logRbacAction(record: AuditRecord): Promise<void> {
    this.logger.log('rbac audit', {
      audit: true,
      actor: record.actor,
      action: record.action,
      targetType: record.targetType,
      targetId: record.targetId,
      before: record.before,
      after: record.after,
      ...(record.requestId ? { requestId: record.requestId } : {})
    });
  }
}
