import type { Actor, Mac, User } from '../domain';
import { createServices, type Services } from '../services';
import type { EmailResult, EmailTransport } from '../services/email';
import { MemoryStore } from '../store/memory';

export interface SentEmail {
  to: string;
  subject: string;
  body: string;
}

/** Records every send. Set `failWith` to make sends report failure, or `throwWith` to make them throw. */
export class RecordingEmail implements EmailTransport {
  enabled = true;
  sent: SentEmail[] = [];
  failWith: string | null = null;
  throwWith: Error | null = null;

  async send(to: string, subject: string, body: string): Promise<EmailResult> {
    if (this.throwWith) throw this.throwWith;
    this.sent.push({ to, subject, body });
    return this.failWith ? { ok: false, error: this.failWith } : { ok: true };
  }
}

/** Each call returns a new instant, one second after the previous one. */
export function steppingClock(start = new Date('2026-03-02T09:00:00.000Z')): () => Date {
  let tick = 0;
  return () => new Date(start.getTime() + 1000 * tick++);
}

export function toActor(user: User): Actor {
  return {
    id: user.id,
    role: user.role,
    macId: user.macId,
    email: user.email,
    fullName: user.fullName,
  };
}

export interface World {
  store: MemoryStore;
  services: Services;
  email: RecordingEmail;
  agency: Mac;
  otherAgency: Mac;
  dormantAgency: Mac;
  officer: Actor;
  otherOfficer: Actor;
  dormantOfficer: Actor;
  reviewer: Actor;
  secondReviewer: Actor;
  admin: Actor;
  inactiveReviewerId: string;
}

/**
 * Two active agencies and one deactivated one, an officer in each, two active
 * reviewers, one inactive reviewer and an admin (attached to the first agency).
 */
export function createWorld(store: MemoryStore = new MemoryStore()): World {
  const agency = store.addMac({ acronym: 'MOH', name: 'Ministry of Health' });
  const otherAgency = store.addMac({ acronym: 'MOA', name: 'Ministry of Agriculture' });
  const dormantAgency = store.addMac({ acronym: 'NFC', name: 'National Film Commission', isActive: false });

  const officer = store.addUser({ role: 'MAC_OFFICER', macId: agency.id, fullName: 'Olive Officer' });
  const otherOfficer = store.addUser({ role: 'MAC_OFFICER', macId: otherAgency.id, fullName: 'Oscar Officer' });
  const dormantOfficer = store.addUser({ role: 'MAC_OFFICER', macId: dormantAgency.id, fullName: 'Dana Dormant' });
  const reviewer = store.addUser({ role: 'MICAT_REVIEWER', fullName: 'Rita Reviewer' });
  const secondReviewer = store.addUser({ role: 'MICAT_REVIEWER', fullName: 'Ravi Reviewer' });
  const inactiveReviewer = store.addUser({ role: 'MICAT_REVIEWER', fullName: 'Ivan Inactive', isActive: false });
  const admin = store.addUser({ role: 'ADMIN', macId: agency.id, fullName: 'Ada Admin' });

  const email = new RecordingEmail();
  const services = createServices(store, {
    email,
    dashboardUrl: 'https://press.example.test',
    clock: steppingClock(),
  });

  return {
    store,
    services,
    email,
    agency,
    otherAgency,
    dormantAgency,
    officer: toActor(officer),
    otherOfficer: toActor(otherOfficer),
    dormantOfficer: toActor(dormantOfficer),
    reviewer: toActor(reviewer),
    secondReviewer: toActor(secondReviewer),
    admin: toActor(admin),
    inactiveReviewerId: inactiveReviewer.id,
  };
}

export const validSubmission = {
  title: 'Flood Update',
  contentType: 'PRESS_RELEASE',
  description: 'Water levels along the river are receding.',
  tags: 'flood, weather',
  fileRef: 'uploads/flood-update.pdf',
};
