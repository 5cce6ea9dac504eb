/**
 * Identities Data Access Layer
 *
 * Persistence for provisioned hub identities. Rows are retained indefinitely
 * for audit: there is no delete, only deactivation.
 *
 * @module dal/identities
 * @security SEC-006: Parameterized queries only
 */

import { BaseDAL } from './base.dal';
import { IdentityStatusSchema, type DeviceIdentity, type IdentityStatus } from '../shared/types/scan.types';
import { createLogger } from '../utils/logger';

export interface IdentityRow {
  identity_id: string;
  credential: string;
  provisioned_at: string;
  last_seen_at: string;
  status: string;
}

const log = createLogger('identities-dal');

function toIdentity(row: IdentityRow): DeviceIdentity {
  return {
    identityId: row.identity_id,
    credential: row.credential,
    provisionedAt: row.provisioned_at,
    lastSeenAt: row.last_seen_at,
    status: IdentityStatusSchema.parse(row.status),
  };
}

export class IdentitiesDAL extends BaseDAL<IdentityRow> {
  protected readonly tableName = 'identities';
  protected readonly primaryKey = 'identity_id';

  findById(identityId: string): DeviceIdentity | undefined {
    const row = this.findRowById(identityId);
    return row ? toIdentity(row) : undefined;
  }

  findAll(): DeviceIdentity[] {
    return this.db
      .prepare<[], IdentityRow>('SELECT * FROM identities ORDER BY provisioned_at ASC')
      .all()
      .map(toIdentity);
  }

  /**
   * Insert or refresh an identity. `provisioned_at` of an existing row is kept.
   */
  upsert(identity: DeviceIdentity): DeviceIdentity {
    this.db
      .prepare(
        `INSERT INTO identities (identity_id, credential, provisioned_at, last_seen_at, status)
         VALUES (@identityId, @credential, @provisionedAt, @lastSeenAt, @status)
         ON CONFLICT(identity_id) DO UPDATE SET
           credential = excluded.credential,
           last_seen_at = excluded.last_seen_at,
           status = excluded.status`
      )
      .run(identity);

    log.debug('Identity upserted', { identityId: identity.identityId, status: identity.status });

    const stored = this.findById(identity.identityId);
    if (!stored) {
      throw new Error(`Identity ${identity.identityId} missing after upsert`);
    }
    return stored;
  }

  touchLastSeen(identityId: string, at: string = this.now()): boolean {
    const result = this.db
      .prepare('UPDATE identities SET last_seen_at = ? WHERE identity_id = ?')
      .run(at, identityId);
    return result.changes > 0;
  }

  setStatus(identityId: string, status: IdentityStatus): boolean {
    const result = this.db.prepare('UPDATE identities SET status = ? WHERE identity_id = ?').run(status, identityId);
    if (result.changes > 0) {
      log.info('Identity status changed', { identityId, status });
    }
    return result.changes > 0;
  }
}
