import * as admin from 'firebase-admin';
import { existsSync } from 'node:fs';
import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { PersistenceError } from './errors';
import { severityBucket } from './severity';
import { ClassificationResult, NEW_ISSUES, PersistedTicketRecord } from './ticket-model';

export const TICKETS_COLLECTION = 'tickets';

export interface TicketStore {
  readonly name: string;
  save(record: PersistedTicketRecord): Promise<void>;
}

export interface SaveOutcome {
  store: string;
  issueId: string;
  severity: string;
}

/**
 * Combine the classification with the original ticket so every stored
 * record can be audited on its own.
 */
export function buildRecord(result: ClassificationResult, now: Date = new Date()): PersistedTicketRecord {
  return {
    ticket: result.full_text,
    ...result,
    kb_source: result.kb_match === NEW_ISSUES ? 'auto_generated' : 'knowledge_base',
    created_at: now.toISOString(),
  };
}

/**
 * Pick the service-account file: the explicit path when it exists, else the default.
 */
export function resolveCredentialsPath(explicit: string | undefined, fallbackPath: string): string | null {
  if (explicit && existsSync(explicit)) return explicit;
  if (existsSync(fallbackPath)) return fallbackPath;
  return null;
}

/**
 * Initialise firebase-admin from a service-account file.
 * Returns null when there are no credentials or initialisation fails.
 */
export function initFirestore(credentialsPath: string | null): admin.firestore.Firestore | null {
  if (!credentialsPath) {
    console.warn('[store] no Firebase credentials found, Firestore disabled');
    return null;
  }
  try {
    const app = admin.apps.length > 0
      ? admin.app()
      : admin.initializeApp({ credential: admin.credential.cert(credentialsPath) });
    return app.firestore();
  } catch (error) {
    console.warn('[store] failed to initialise Firebase:', error instanceof Error ? error.message : error);
    return null;
  }
}

/**
 * Stores tickets at tickets/{issue_id}/{severity}/{auto-id}. The issue
 * document itself carries the latest summary, category and action.
 */
export class FirestoreTicketStore implements TicketStore {
  readonly name = 'firestore';

  constructor(
    private readonly db: admin.firestore.Firestore,
    private readonly collection: string = TICKETS_COLLECTION
  ) {}

  /**
   * The issue document and the ticket are committed together in one batch.
   */
  async save(record: PersistedTicketRecord): Promise<void> {
    const issueRef = this.db.collection(this.collection).doc(record.kb_match);
    const ticketRef = issueRef.collection(severityBucket(record.severity)).doc();
    const batch = this.db.batch();

    batch.set(
      issueRef,
      {
        issue_id: record.kb_match,
        title: record.summary,
        category: record.category,
        recommended_action: record.next_step,
        source: record.kb_source,
        updated_at: admin.firestore.FieldValue.serverTimestamp(),
      },
      { merge: true }
    );
    batch.set(ticketRef, {
      ...record,
      created_at: admin.firestore.FieldValue.serverTimestamp(),
    });

    await batch.commit();
  }

  /**
   * Single-document read used by the deep health check.
   */
  async ping(): Promise<void> {
    await this.db.collection(this.collection).limit(1).get();
  }
}

/**
 * Append-only JSON Lines file used when Firestore is unavailable.
 */
export class LocalFileTicketStore implements TicketStore {
  readonly name = 'local';

  constructor(readonly path: string) {}

  async save(record: PersistedTicketRecord): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await appendFile(this.path, JSON.stringify(record) + '\n', 'utf8');
  }
}

export interface TicketRepositoryOptions {
  primary: TicketStore | null;
  fallback?: TicketStore | null;
  allowFallback: boolean;
}

export class TicketRepository {
  private readonly primary: TicketStore | null;
  private readonly fallback: TicketStore | null;
  private readonly allowFallback: boolean;

  constructor(options: TicketRepositoryOptions) {
    this.primary = options.primary;
    this.fallback = options.fallback ?? null;
    this.allowFallback = options.allowFallback;
  }

  get fallbackEnabled(): boolean {
    return this.allowFallback && this.fallback !== null;
  }

  /**
   * Save to the primary store, falling back to the local file when allowed.
   *
   * @throws PersistenceError when no store accepted the record
   */
  async save(record: PersistedTicketRecord): Promise<SaveOutcome> {
    const outcome = { issueId: record.kb_match, severity: severityBucket(record.severity) };
    let primaryError: unknown = null;

    if (this.primary) {
      try {
        await this.primary.save(record);
        return { store: this.primary.name, ...outcome };
      } catch (error) {
        primaryError = error;
        console.warn(`[store] ${this.primary.name} save failed:`, error instanceof Error ? error.message : error);
      }
    }

    if (!this.allowFallback || !this.fallback) {
      throw new PersistenceError(
        this.primary ? 'Ticket store failed and local fallback is disabled' : 'No ticket store configured and local fallback is disabled',
        { cause: primaryError }
      );
    }

    try {
      await this.fallback.save(record);
    } catch (error) {
      throw new PersistenceError(`Fallback store ${this.fallback.name} failed`, { cause: error });
    }
    console.log(`[store] ticket saved to ${this.fallback.name} fallback`);
    return { store: this.fallback.name, ...outcome };
  }
}
