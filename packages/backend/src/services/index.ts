import type { Store } from '../store/types';
import { AuditSink } from './audit';
import { SubmissionCatalog } from './catalog';
import { CommentService } from './comments';
import type { EmailTransport } from './email';
import { NotificationDispatcher } from './notifications';
import { SubmissionWorkflow } from './workflow';

export interface Services {
  store: Store;
  audit: AuditSink;
  notifications: NotificationDispatcher;
  workflow: SubmissionWorkflow;
  comments: CommentService;
  catalog: SubmissionCatalog;
}

export interface ServiceOptions {
  email: EmailTransport;
  dashboardUrl: string;
  clock?: () => Date;
}

/** Wire the service graph once at startup. Every service shares one store and clock. */
export function createServices(store: Store, options: ServiceOptions): Services {
  const clock = options.clock ?? (() => new Date());
  const audit = new AuditSink(store, clock);
  const notifications = new NotificationDispatcher(store, options.email, {
    dashboardUrl: options.dashboardUrl,
    clock,
  });

  return {
    store,
    audit,
    notifications,
    workflow: new SubmissionWorkflow(store, audit, notifications, clock),
    comments: new CommentService(store, audit, notifications, clock),
    catalog: new SubmissionCatalog(store, clock),
  };
}
