import { randomUUID } from 'crypto';
import type { ContentTypeType, SubmissionStatusType, UserRoleType } from '@pressdesk/shared';
import type { AuditEntry, Comment, Mac, Notification, Submission, User } from '../domain';
import type {
  AgencyTotals,
  AnalyticsFacts,
  PersonCount,
  Store,
  StoreReader,
  StoreTx,
  SubmissionFilter,
  SubmissionScope,
} from './types';
import { runAfterCommitHooks } from './hooks';
import { inScope } from '../services/visibility';

interface MemoryState {
  submissions: Map<string, Submission>;
  insertOrder: Map<string, number>;
  users: Map<string, User>;
  macs: Map<string, Mac>;
  comments: Comment[];
  notifications: Notification[];
  audit: AuditEntry[];
  seq: number;
}

type TxWriteMethod = Exclude<keyof StoreTx, keyof StoreReader | 'afterCommit'>;

function emptyState(): MemoryState {
  return {
    submissions: new Map(),
    insertOrder: new Map(),
    users: new Map(),
    macs: new Map(),
    comments: [],
    notifications: [],
    audit: [],
    seq: 0,
  };
}

function matchesFilter(filter: SubmissionFilter, s: Submission): boolean {
  if (filter.status && s.status !== filter.status) return false;
  if (filter.macId && s.macId !== filter.macId) return false;
  if (filter.contentType && s.contentType !== filter.contentType) return false;
  if (filter.reviewedBy && s.reviewedBy !== filter.reviewedBy) return false;
  if (filter.search) {
    const needle = filter.search.toLowerCase();
    const haystacks = [s.title, s.description, s.tags].map((v) => v.toLowerCase());
    if (!haystacks.some((h) => h.includes(needle))) return false;
  }
  return true;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * In-process Store for tests and local tooling. Transactions are serialised
 * through a queue and roll back by restoring a snapshot of the state.
 */
export class MemoryStore implements Store {
  private state: MemoryState = emptyState();
  private queue: Promise<void> = Promise.resolve();
  private failures = new Map<TxWriteMethod, Error>();
  private pendingHooks = new Set<Promise<void>>();

  // ─── Seeding ───────────────────────────────────────────────────────────────

  addMac(mac: Partial<Mac> & Pick<Mac, 'acronym'>): Mac {
    const row: Mac = { id: randomUUID(), name: mac.acronym, isActive: true, ...mac };
    this.state.macs.set(row.id, row);
    return { ...row };
  }

  addUser(user: Partial<User> & Pick<User, 'role'>): User {
    const id = user.id ?? randomUUID();
    const row: User = {
      id,
      email: `${id}@example.test`,
      fullName: '',
      macId: null,
      isActive: true,
      ...user,
    };
    this.state.users.set(row.id, row);
    return { ...row };
  }

  /** Make the next call to `method` inside a transaction throw `error`. */
  failNext(method: TxWriteMethod, error = new Error(`${method} failed`)): void {
    this.failures.set(method, error);
  }

  // ─── Reads ─────────────────────────────────────────────────────────────────

  async getSubmission(id: string): Promise<Submission | null> {
    const s = this.state.submissions.get(id);
    return s ? { ...s } : null;
  }

  async findSubmissions(
    scope: SubmissionScope,
    filter: SubmissionFilter
  ): Promise<{ submissions: Submission[]; total: number }> {
    const matched = [...this.state.submissions.values()]
      .filter((s) => inScope(scope, s) && matchesFilter(filter, s))
      .sort((a, b) => this.compare(a, b, filter.orderBy ?? 'submitted_at'));

    const offset = filter.offset ?? 0;
    const page = filter.limit === undefined
      ? matched.slice(offset)
      : matched.slice(offset, offset + filter.limit);

    return { submissions: page.map((s) => ({ ...s })), total: matched.length };
  }

  async countSubmissionsByStatus(
    scope: SubmissionScope,
    filter: Pick<SubmissionFilter, 'reviewedBy'> = {}
  ): Promise<Record<SubmissionStatusType, number>> {
    const counts: Record<SubmissionStatusType, number> = {
      PENDING: 0, UNDER_REVIEW: 0, APPROVED: 0, DENIED: 0, RETURNED: 0,
    };
    for (const s of this.state.submissions.values()) {
      if (inScope(scope, s) && matchesFilter(filter, s)) counts[s.status]++;
    }
    return counts;
  }

  async getUser(id: string): Promise<User | null> {
    const u = this.state.users.get(id);
    return u ? { ...u } : null;
  }

  async getUsersByIds(ids: string[]): Promise<User[]> {
    return ids.flatMap((id) => {
      const u = this.state.users.get(id);
      return u ? [{ ...u }] : [];
    });
  }

  async listActiveUsersByRole(role: UserRoleType): Promise<User[]> {
    return [...this.state.users.values()]
      .filter((u) => u.role === role && u.isActive)
      .map((u) => ({ ...u }));
  }

  async getMac(id: string): Promise<Mac | null> {
    const m = this.state.macs.get(id);
    return m ? { ...m } : null;
  }

  async getMacsByIds(ids: string[]): Promise<Mac[]> {
    return ids.flatMap((id) => {
      const m = this.state.macs.get(id);
      return m ? [{ ...m }] : [];
    });
  }

  async listComments(submissionId: string, opts: { includeInternal: boolean }): Promise<Comment[]> {
    return this.state.comments
      .filter((c) => c.submissionId === submissionId && (opts.includeInternal || !c.isInternal))
      .reverse()
      .map((c) => ({ ...c }));
  }

  async listNotifications(userId: string, limit: number): Promise<Notification[]> {
    return this.state.notifications
      .filter((n) => n.userId === userId)
      .reverse()
      .slice(0, limit)
      .map((n) => ({ ...n }));
  }

  async countUnreadNotifications(userId: string): Promise<number> {
    return this.state.notifications.filter((n) => n.userId === userId && !n.isRead).length;
  }

  async listAuditEntries(filter: { userId?: string; limit: number }): Promise<AuditEntry[]> {
    return this.state.audit
      .filter((e) => filter.userId === undefined || e.userId === filter.userId)
      .reverse()
      .slice(0, filter.limit)
      .map((e) => ({ ...e }));
  }

  async getAnalyticsFacts(since: Date, top: number): Promise<AnalyticsFacts> {
    const submissions = [...this.state.submissions.values()];
    const users = [...this.state.users.values()];
    const from = since.getTime();

    const byStatus: Record<SubmissionStatusType, number> = {
      PENDING: 0, UNDER_REVIEW: 0, APPROVED: 0, DENIED: 0, RETURNED: 0,
    };
    const byContentType: Record<ContentTypeType, number> = {
      PRESS_RELEASE: 0, ANNOUNCEMENT: 0, SPEECH: 0, PHOTO: 0, VIDEO: 0, DOCUMENT: 0, OTHER: 0,
    };
    const perDay = new Map<string, number>();
    for (const s of submissions) {
      byStatus[s.status]++;
      byContentType[s.contentType]++;
      if (s.submittedAt.getTime() >= from) {
        const day = s.submittedAt.toISOString().slice(0, 10);
        perDay.set(day, (perDay.get(day) ?? 0) + 1);
      }
    }

    const byMac: AgencyTotals[] = [...this.state.macs.values()]
      .map((m) => {
        const own = submissions.filter((s) => s.macId === m.id);
        return {
          macId: m.id,
          acronym: m.acronym,
          name: m.name,
          total: own.length,
          approved: own.filter((s) => s.status === 'APPROVED').length,
          pending: own.filter((s) => s.status === 'PENDING').length,
        };
      })
      .sort((a, b) => b.total - a.total || compareText(a.acronym, b.acronym))
      .slice(0, top);

    const rank = (role: UserRoleType, counted: (s: Submission) => string | null): PersonCount[] =>
      users
        .filter((u) => u.role === role)
        .map((u) => ({
          userId: u.id,
          fullName: u.fullName,
          email: u.email,
          count: submissions.filter((s) => counted(s) === u.id).length,
        }))
        .sort((a, b) => b.count - a.count || compareText(a.fullName, b.fullName) || compareText(a.email, b.email))
        .slice(0, top);

    return {
      activeUsers: users.filter((u) => u.isActive).length,
      activeMacs: [...this.state.macs.values()].filter((m) => m.isActive).length,
      byStatus,
      byContentType,
      byMac,
      topSubmitters: rank('MAC_OFFICER', (s) => s.submittedBy),
      topReviewers: rank('MICAT_REVIEWER', (s) => s.reviewedBy),
      perDay: [...perDay.entries()]
        .sort(([a], [b]) => compareText(a, b))
        .map(([date, count]) => ({ date, count })),
      submittedSince: submissions.filter((s) => s.submittedAt.getTime() >= from).length,
      approvedSince: submissions.filter((s) => s.approvedAt !== null && s.approvedAt.getTime() >= from).length,
    };
  }

  // ─── Writes ────────────────────────────────────────────────────────────────

  async markNotificationRead(id: string, userId: string): Promise<Notification | null> {
    const n = this.state.notifications.find((row) => row.id === id && row.userId === userId);
    if (!n) return null;
    n.isRead = true;
    return { ...n };
  }

  transaction<T>(fn: (tx: StoreTx) => Promise<T>): Promise<T> {
    const run = this.queue.then(() => this.runTransaction(fn));
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async runTransaction<T>(fn: (tx: StoreTx) => Promise<T>): Promise<T> {
    const snapshot = structuredClone(this.state);
    const hooks: Array<() => Promise<void>> = [];

    let result: T;
    try {
      result = await fn(this.createTx(hooks));
    } catch (err) {
      this.state = snapshot;
      throw err;
    }

    const delivery = runAfterCommitHooks(hooks);
    this.pendingHooks.add(delivery);
    void delivery.then(() => this.pendingHooks.delete(delivery));
    return result;
  }

  /** Resolves once every after-commit hook started so far has finished. */
  async settled(): Promise<void> {
    await Promise.all([...this.pendingHooks]);
  }

  private createTx(hooks: Array<() => Promise<void>>): StoreTx {
    const guard = (method: TxWriteMethod): void => {
      const failure = this.failures.get(method);
      if (failure) {
        this.failures.delete(method);
        throw failure;
      }
    };

    return {
      getSubmission: (id) => this.getSubmission(id),
      findSubmissions: (scope, filter) => this.findSubmissions(scope, filter),
      countSubmissionsByStatus: (scope, filter) => this.countSubmissionsByStatus(scope, filter),
      getUser: (id) => this.getUser(id),
      getUsersByIds: (ids) => this.getUsersByIds(ids),
      listActiveUsersByRole: (role) => this.listActiveUsersByRole(role),
      getMac: (id) => this.getMac(id),
      getMacsByIds: (ids) => this.getMacsByIds(ids),
      listComments: (submissionId, opts) => this.listComments(submissionId, opts),
      listNotifications: (userId, limit) => this.listNotifications(userId, limit),
      countUnreadNotifications: (userId) => this.countUnreadNotifications(userId),
      listAuditEntries: (filter) => this.listAuditEntries(filter),
      getAnalyticsFacts: (since, top) => this.getAnalyticsFacts(since, top),

      insertSubmission: async (params) => {
        guard('insertSubmission');
        const row: Submission = {
          id: randomUUID(),
          title: params.title,
          contentType: params.contentType,
          description: params.description,
          tags: params.tags,
          fileRef: params.fileRef,
          isConfidential: params.isConfidential,
          macId: params.macId,
          submittedBy: params.submittedBy,
          assignedTo: null,
          reviewedBy: null,
          status: 'PENDING',
          priority: 'MEDIUM',
          isPublished: false,
          reviewerComments: '',
          denialReason: '',
          submittedAt: params.submittedAt,
          reviewedAt: null,
          approvedAt: null,
          publishedAt: null,
          updatedAt: params.submittedAt,
        };
        this.state.submissions.set(row.id, row);
        this.state.insertOrder.set(row.id, ++this.state.seq);
        return { ...row };
      },

      updateSubmissionIfStatus: async (id, expected, patch) => {
        guard('updateSubmissionIfStatus');
        const current = this.state.submissions.get(id);
        if (!current || current.status !== expected) return null;
        const next: Submission = { ...current };
        for (const [key, value] of Object.entries(patch)) {
          if (value !== undefined) Object.assign(next, { [key]: value });
        }
        this.state.submissions.set(id, next);
        return { ...next };
      },

      deleteSubmissionIfStatus: async (id, expected) => {
        guard('deleteSubmissionIfStatus');
        const current = this.state.submissions.get(id);
        if (!current || current.status !== expected) return false;
        this.state.submissions.delete(id);
        this.state.comments = this.state.comments.filter((c) => c.submissionId !== id);
        this.state.notifications = this.state.notifications.filter((n) => n.submissionId !== id);
        return true;
      },

      insertComment: async (params) => {
        guard('insertComment');
        const row: Comment = { id: randomUUID(), ...params };
        this.state.comments.push(row);
        return { ...row };
      },

      insertNotification: async (params) => {
        guard('insertNotification');
        const existing = this.state.notifications.find(
          (n) => n.userId === params.userId && n.eventKey === params.eventKey
        );
        if (existing) return { notification: { ...existing }, created: false };
        const row: Notification = { id: randomUUID(), isRead: false, ...params };
        this.state.notifications.push(row);
        return { notification: { ...row }, created: true };
      },

      lockAuditTip: async () => {
        const tip = this.state.audit[this.state.audit.length - 1];
        return tip ? { sequence: tip.sequence, hash: tip.hash } : null;
      },

      appendAuditEntry: async (params) => {
        guard('appendAuditEntry');
        if (this.state.audit.some((e) => e.sequence === params.sequence)) {
          throw new Error(`Duplicate audit sequence ${params.sequence}`);
        }
        const row: AuditEntry = { ...params };
        this.state.audit.push(row);
        return { ...row };
      },

      afterCommit: (hook) => {
        hooks.push(hook);
      },
    };
  }

  private compare(a: Submission, b: Submission, orderBy: 'submitted_at' | 'published_at'): number {
    if (orderBy === 'published_at') {
      const diff = (b.publishedAt?.getTime() ?? 0) - (a.publishedAt?.getTime() ?? 0);
      if (diff !== 0) return diff;
    }
    const diff = b.submittedAt.getTime() - a.submittedAt.getTime();
    if (diff !== 0) return diff;
    return (this.state.insertOrder.get(b.id) ?? 0) - (this.state.insertOrder.get(a.id) ?? 0);
  }
}
