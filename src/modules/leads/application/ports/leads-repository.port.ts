import type { Lead } from '@/modules/leads/domain/lead';

export const LEADS_REPOSITORY = Symbol('LEADS_REPOSITORY');

/**
 * Reads and single-row writes against the canonical `leads` table.
 *
 * `save` inserts or replaces one row by `lead_id` atomically: either the whole
 * row is written or nothing is. It throws ConstraintViolationError when
 * `lead.domain` is already owned by a different lead.
 */
export interface LeadsRepositoryPort {
  findById(id: string): Promise<Lead | null>;
  findByDomain(domain: string): Promise<Lead | null>;
  listAll(): Promise<Lead[]>;
  count(): Promise<number>;
  save(lead: Lead): Promise<void>;
}
