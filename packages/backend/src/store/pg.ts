import type { Pool, PoolClient } from 'pg';
import { SubmissionStatus, type SubmissionStatusType } from '@pressdesk/shared';
import { withTransaction, type Queryable } from '../db/pool';
import * as submissions from '../db/queries/submissions';
import * as users from '../db/queries/users';
import * as macs from '../db/queries/macs';
import * as comments from '../db/queries/comments';
import * as notifications from '../db/queries/notifications';
import * as audit from '../db/queries/audit';
import * as analytics from '../db/queries/analytics';
import type { Store, StoreReader, StoreTx } from './types';
import { runAfterCommitHooks } from './hooks';

// Ids arrive from URLs and tokens; anything that is not a UUID cannot match a row
// and would otherwise fail the ::uuid cast.
const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

function isUuid(id: string): boolean {
  return UUID_RE.test(id);
}

function emptyStatusCounts(): Record<SubmissionStatusType, number> {
  return { PENDING: 0, UNDER_REVIEW: 0, APPROVED: 0, DENIED: 0, RETURNED: 0 };
}

function readerFor(db: Queryable): StoreReader {
  return {
    getSubmission: async (id) => (isUuid(id) ? submissions.getSubmissionById(id, db) : null),
    findSubmissions: (scope, filter) => submissions.findSubmissions(scope, filter, db),
    countSubmissionsByStatus: async (scope, filter = {}) => {
      const counts = emptyStatusCounts();
      for (const row of await submissions.countSubmissionsByStatus(scope, filter, db)) {
        counts[SubmissionStatus.parse(row.status)] = row.count;
      }
      return counts;
    },

    getUser: async (id) => (isUuid(id) ? users.getUserById(id, db) : null),
    getUsersByIds: (ids) => users.getUsersByIds(ids.filter(isUuid), db),
    listActiveUsersByRole: (role) => users.listActiveUsersByRole(role, db),

    getMac: async (id) => (isUuid(id) ? macs.getMacById(id, db) : null),
    getMacsByIds: (ids) => macs.getMacsByIds(ids.filter(isUuid), db),

    listComments: async (submissionId, opts) =>
      isUuid(submissionId) ? comments.listComments(submissionId, opts.includeInternal, db) : [],

    listNotifications: (userId, limit) => notifications.listNotifications(userId, limit, db),
    countUnreadNotifications: (userId) => notifications.countUnreadNotifications(userId, db),

    listAuditEntries: (filter) => audit.listAuditEntries(filter, db),

    getAnalyticsFacts: (since, top) => analytics.getAnalyticsFacts(since, top, db),
  };
}

function txFor(client: PoolClient, hooks: Array<() => Promise<void>>): StoreTx {
  return {
    ...readerFor(client),
    insertSubmission: (params) => submissions.insertSubmission(params, client),
    updateSubmissionIfStatus: (id, expected, patch) =>
      submissions.updateSubmissionIfStatus(id, expected, patch, client),
    deleteSubmissionIfStatus: (id, expected) =>
      submissions.deleteSubmissionIfStatus(id, expected, client),
    insertComment: (params) => comments.insertComment(params, client),
    insertNotification: (params) => notifications.insertNotification(params, client),
    lockAuditTip: () => audit.lockAuditTip(client),
    appendAuditEntry: (params) => audit.appendAuditEntry(params, client),
    afterCommit: (hook) => {
      hooks.push(hook);
    },
  };
}

/** PostgreSQL-backed repository. One instance per pool, constructed at startup. */
export function createPgStore(pool: Pool): Store {
  return {
    ...readerFor(pool),

    async transaction(fn) {
      const hooks: Array<() => Promise<void>> = [];
      const result = await withTransaction(pool, (client) => fn(txFor(client, hooks)));
      void runAfterCommitHooks(hooks);
      return result;
    },

    markNotificationRead: async (id, userId) =>
      isUuid(id) ? notifications.markNotificationRead(id, userId, pool) : null,
  };
}
