import { createHash } from 'node:crypto';
import type Database from 'better-sqlite3';
import { generateId } from '../shared/ids.js';
import { jsonHash } from '../shared/redact.js';
import { InvalidStateError, NotFoundError } from '../shared/errors.js';

export type ApprovalStatus = 'pending' | 'approved' | 'denied';

/** What a reviewer sees: enough to judge the video without opening the job. */
export interface ApprovalSummary {
  jobId: string;
  channel: string;
  topic: string | null;
  title: string;
  scriptExcerpt: string;
  qualityScore: number | null;
  videoPath: string | null;
  thumbnailPath: string | null;
}

export interface ApprovalRecord {
  id: string;
  job_id: string;
  created_at: string;
  actor: string | null;
  payload_hash: string;
  summary: ApprovalSummary;
  status: ApprovalStatus;
  decided_at: string | null;
  decision_reason: string | null;
  chain_prev_hash: string | null;
  chain_this_hash: string | null;
}

interface ApprovalRow extends Omit<ApprovalRecord, 'summary'> {
  summary_json: string;
}

function rowToRecord(row: ApprovalRow): ApprovalRecord {
  const { summary_json, ...rest } = row;
  return { ...rest, summary: JSON.parse(summary_json) as ApprovalSummary };
}

function computeChainHash(prev: string | null, entry: Omit<ApprovalRecord, 'chain_this_hash' | 'summary'>): string {
  const canonical = JSON.stringify({
    id: entry.id,
    job_id: entry.job_id,
    created_at: entry.created_at,
    actor: entry.actor,
    payload_hash: entry.payload_hash,
    status: entry.status,
    decided_at: entry.decided_at,
    decision_reason: entry.decision_reason,
    chain_prev_hash: prev,
  });
  return createHash('sha256').update(canonical).digest('hex');
}

function getLastApprovalHash(db: Database.Database): string | null {
  const row = db
    .prepare(
      `SELECT chain_this_hash FROM approvals
       ORDER BY COALESCE(decided_at, created_at) DESC, rowid DESC LIMIT 1`,
    )
    .get() as { chain_this_hash: string | null } | undefined;
  return row?.chain_this_hash ?? null;
}

export function createApproval(
  db: Database.Database,
  summary: ApprovalSummary,
  actor?: string,
): ApprovalRecord {
  const id = generateId('apr');
  const created_at = new Date().toISOString();
  const chain_prev_hash = getLastApprovalHash(db);

  const partial: Omit<ApprovalRecord, 'chain_this_hash' | 'summary'> = {
    id,
    job_id: summary.jobId,
    created_at,
    actor: actor ?? null,
    payload_hash: jsonHash(summary),
    status: 'pending',
    decided_at: null,
    decision_reason: null,
    chain_prev_hash,
  };

  const chain_this_hash = computeChainHash(chain_prev_hash, partial);
  const record: ApprovalRecord = { ...partial, summary, chain_this_hash };

  db.prepare(`
    INSERT INTO approvals
      (id, job_id, created_at, actor, payload_hash, summary_json, status,
       decided_at, decision_reason, chain_prev_hash, chain_this_hash)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    record.id,
    record.job_id,
    record.created_at,
    record.actor,
    record.payload_hash,
    JSON.stringify(summary),
    record.status,
    record.decided_at,
    record.decision_reason,
    record.chain_prev_hash,
    record.chain_this_hash,
  );

  return record;
}

export function decideApproval(
  db: Database.Database,
  approvalId: string,
  decision: 'approved' | 'denied',
  reason?: string,
  actor?: string,
): ApprovalRecord {
  const existing = getApproval(db, approvalId);
  if (!existing) {
    throw new NotFoundError(`Approval ${approvalId} not found`);
  }
  if (existing.status !== 'pending') {
    throw new InvalidStateError(`Approval ${approvalId} is already ${existing.status}`);
  }

  const decided_at = new Date().toISOString();
  const chain_prev_hash = getLastApprovalHash(db);
  const partial: Omit<ApprovalRecord, 'chain_this_hash' | 'summary'> = {
    id: existing.id,
    job_id: existing.job_id,
    created_at: existing.created_at,
    payload_hash: existing.payload_hash,
    actor: actor ?? existing.actor,
    status: decision,
    decided_at,
    decision_reason: reason ?? null,
    chain_prev_hash,
  };

  const chain_this_hash = computeChainHash(chain_prev_hash, partial);

  db.prepare(`
    UPDATE approvals
    SET status = ?, actor = ?, decided_at = ?, decision_reason = ?,
        chain_prev_hash = ?, chain_this_hash = ?
    WHERE id = ? AND status = 'pending'
  `).run(decision, partial.actor, decided_at, reason ?? null, chain_prev_hash, chain_this_hash, approvalId);

  return { ...partial, summary: existing.summary, chain_this_hash };
}

export function listApprovals(
  db: Database.Database,
  filter: { status?: ApprovalStatus; jobId?: string } = {},
): ApprovalRecord[] {
  const clauses: string[] = [];
  const params: string[] = [];
  if (filter.status) {
    clauses.push('status = ?');
    params.push(filter.status);
  }
  if (filter.jobId) {
    clauses.push('job_id = ?');
    params.push(filter.jobId);
  }
  const where = clauses.length ? `WHERE ${clauses.join(' AND ')}` : '';
  const rows = db
    .prepare(`SELECT * FROM approvals ${where} ORDER BY created_at DESC, rowid DESC`)
    .all(...params) as ApprovalRow[];
  return rows.map(rowToRecord);
}

export function getApproval(db: Database.Database, approvalId: string): ApprovalRecord | null {
  const row = db.prepare(`SELECT * FROM approvals WHERE id = ?`).get(approvalId) as ApprovalRow | undefined;
  return row ? rowToRecord(row) : null;
}

/**
 * The approval seam the pipeline depends on: a request creates a pending
 * record, and a decision is recorded exactly once.
 */
export interface ApprovalGateway {
  requestApproval(summary: ApprovalSummary): ApprovalRecord;
  decide(approvalId: string, decision: 'approved' | 'denied', reason?: string, actor?: string): ApprovalRecord;
  get(approvalId: string): ApprovalRecord | null;
  list(filter?: { status?: ApprovalStatus; jobId?: string }): ApprovalRecord[];
}

export class SqliteApprovalGateway implements ApprovalGateway {
  constructor(private readonly db: Database.Database) {}

  requestApproval(summary: ApprovalSummary): ApprovalRecord {
    return createApproval(this.db, summary, 'pipeline');
  }

  decide(approvalId: string, decision: 'approved' | 'denied', reason?: string, actor?: string): ApprovalRecord {
    return decideApproval(this.db, approvalId, decision, reason, actor);
  }

  get(approvalId: string): ApprovalRecord | null {
    return getApproval(this.db, approvalId);
  }

  list(filter: { status?: ApprovalStatus; jobId?: string } = {}): ApprovalRecord[] {
    return listApprovals(this.db, filter);
  }
}
