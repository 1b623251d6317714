import {
  AnalyticsQuerySchema,
  ContentType,
  ExportQuerySchema,
  LibraryQuerySchema,
  SubmissionStatus,
  SubmissionsQuerySchema,
  type SubmissionAnalytics,
  type SubmissionStats,
} from '@pressdesk/shared';
import type { Actor, Comment, Mac, Submission } from '../domain';
import { NotFoundError, PermissionError, parseInput } from '../errors';
import type { Store } from '../store/types';
import { assertCan, canPerform } from './access';
import { buildExportRows } from './export';
import { canSeeInternalComments, isVisible, publicScope, scopeFor } from './visibility';

export interface SubmissionPage {
  submissions: Submission[];
  total: number;
  limit: number;
  offset: number;
}

export interface SubmissionDetail {
  submission: Submission;
  mac: Mac | null;
  comments: Comment[];
  canEdit: boolean;
  canDelete: boolean;
  canReview: boolean;
}

/** Officers are pinned to their own agency, so their agency filter is dropped. */
function agencyFilter(actor: Actor, macId: string | undefined): string | undefined {
  return actor.role === 'MAC_OFFICER' ? undefined : macId;
}

const ANALYTICS_TOP = 10;
const DAY_MS = 24 * 60 * 60 * 1000;

/** Non-zero entries, largest count first. */
function ranked<K extends string>(counts: Record<K, number>, keys: readonly K[]): Array<{ key: K; count: number }> {
  return keys
    .map((key) => ({ key, count: counts[key] }))
    .filter((e) => e.count > 0)
    .sort((a, b) => b.count - a.count);
}

/** Read side: listings, detail, the public library, dashboard counts, analytics and export. */
export class SubmissionCatalog {
  constructor(
    private readonly store: Store,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async list(actor: Actor, query: unknown): Promise<SubmissionPage> {
    const q = parseInput(SubmissionsQuerySchema, query);
    const { submissions, total } = await this.store.findSubmissions(scopeFor(actor), {
      status: q.status,
      macId: agencyFilter(actor, q.macId),
      search: q.search?.trim() || undefined,
      limit: q.limit,
      offset: q.offset,
    });
    return { submissions, total, limit: q.limit, offset: q.offset };
  }

  async get(actor: Actor, id: string): Promise<SubmissionDetail> {
    const submission = await this.store.getSubmission(id);
    if (!submission) throw new NotFoundError('Submission', id);
    if (!isVisible(actor, submission)) {
      throw new PermissionError("You don't have permission to view this submission");
    }

    const [mac, comments] = await Promise.all([
      this.store.getMac(submission.macId),
      this.store.listComments(id, { includeInternal: canSeeInternalComments(actor) }),
    ]);

    return {
      submission,
      mac,
      comments,
      canEdit: canPerform(actor, 'submission.edit', submission),
      canDelete: canPerform(actor, 'submission.delete', submission),
      canReview:
        canPerform(actor, 'submission.review', submission) &&
        (submission.status === 'PENDING' || submission.status === 'UNDER_REVIEW'),
    };
  }

  /** Approved and published content, newest publication first. */
  async library(actor: Actor, query: unknown): Promise<SubmissionPage> {
    assertCan(actor, 'library.view');
    const q = parseInput(LibraryQuerySchema, query);
    const { submissions, total } = await this.store.findSubmissions(publicScope(), {
      contentType: q.contentType,
      macId: q.macId,
      search: q.search?.trim() || undefined,
      orderBy: 'published_at',
      limit: q.limit,
      offset: q.offset,
    });
    return { submissions, total, limit: q.limit, offset: q.offset };
  }

  async stats(actor: Actor): Promise<SubmissionStats> {
    const byStatus = await this.store.countSubmissionsByStatus(scopeFor(actor));
    const total = Object.values(byStatus).reduce((sum, n) => sum + n, 0);
    if (actor.role !== 'MICAT_REVIEWER') return { total, byStatus };

    const mine = await this.store.countSubmissionsByStatus(scopeFor(actor), { reviewedBy: actor.id });
    const myReviews = Object.values(mine).reduce((sum, n) => sum + n, 0);
    return { total, byStatus, myReviews };
  }

  /**
   * System-wide figures for administrators over the last `days` days
   * (default 30). Counts outside the window cover every submission.
   */
  async analytics(actor: Actor, query: unknown): Promise<SubmissionAnalytics> {
    assertCan(actor, 'analytics.view');
    const { days } = parseInput(AnalyticsQuerySchema, query);
    const since = new Date(this.clock().getTime() - days * DAY_MS);
    const facts = await this.store.getAnalyticsFacts(since, ANALYTICS_TOP);

    const { APPROVED: approved, DENIED: denied, PENDING: pending } = facts.byStatus;
    const decided = approved + denied;
    const submissions = Object.values(facts.byStatus).reduce((sum, n) => sum + n, 0);

    return {
      days,
      totals: {
        users: facts.activeUsers,
        macs: facts.activeMacs,
        submissions,
        approved,
        pending,
        denied,
        approvalRate: decided > 0 ? Math.round((approved / decided) * 1000) / 10 : 0,
      },
      byMac: facts.byMac,
      byStatus: ranked(facts.byStatus, SubmissionStatus.options).map(({ key, count }) => ({ status: key, count })),
      contentTypes: ranked(facts.byContentType, ContentType.options).map(({ key, count }) => ({
        contentType: key,
        count,
      })),
      trend: facts.perDay,
      topSubmitters: facts.topSubmitters,
      topReviewers: facts.topReviewers,
      recentSubmissions: facts.submittedSince,
      recentApprovals: facts.approvedSince,
    };
  }

  /** Header row plus one row per visible submission matching the filter. */
  async exportRows(actor: Actor, query: unknown): Promise<string[][]> {
    assertCan(actor, 'submission.export');
    const q = parseInput(ExportQuerySchema, query);
    const { submissions } = await this.store.findSubmissions(scopeFor(actor), {
      status: q.status,
      macId: agencyFilter(actor, q.macId),
      search: q.search?.trim() || undefined,
    });

    const macIds = [...new Set(submissions.map((s) => s.macId))];
    const userIds = [
      ...new Set(
        submissions.flatMap((s) => [s.submittedBy, s.reviewedBy]).filter((id): id is string => id !== null)
      ),
    ];
    const [macs, users] = await Promise.all([
      this.store.getMacsByIds(macIds),
      this.store.getUsersByIds(userIds),
    ]);
    return buildExportRows(submissions, macs, users);
  }
}
