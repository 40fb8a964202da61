import { Injectable } from '@nestjs/common';
import type { SupabaseClient } from '@supabase/supabase-js';

import type { LeadsRepositoryPort } from '@/modules/leads/application/ports/leads-repository.port';
import { ConstraintViolationError } from '@/modules/leads/domain/errors';
import type { Lead } from '@/modules/leads/domain/lead';
import {
  LEAD_COLUMNS,
  type LeadRow,
  leadToRow,
  rowToLead,
} from '@/modules/leads/infra/repositories/lead-row.mapper';

const SELECT = LEAD_COLUMNS.join(', ');

/**
 * Same table shape as the SQLite store, hosted on Supabase. Each save is a
 * single upsert statement, which Postgres applies atomically.
 */
@Injectable()
export class SupabaseLeadsRepository implements LeadsRepositoryPort {
  constructor(private readonly supabase: SupabaseClient) {}

  async findById(id: string): Promise<Lead | null> {
    const { data, error } = await this.supabase
      .from('leads')
      .select(SELECT)
      .eq('lead_id', id)
      .returns<LeadRow[]>()
      .maybeSingle();

    if (error) throw error;
    return data ? rowToLead(data) : null;
  }

  async findByDomain(domain: string): Promise<Lead | null> {
    const { data, error } = await this.supabase
      .from('leads')
      .select(SELECT)
      .eq('domain', domain)
      .returns<LeadRow[]>()
      .maybeSingle();

    if (error) throw error;
    return data ? rowToLead(data) : null;
  }

  async listAll(): Promise<Lead[]> {
    const { data, error } = await this.supabase
      .from('leads')
      .select(SELECT)
      .order('lead_id', { ascending: true })
      .returns<LeadRow[]>();

    if (error) throw error;
    return (data ?? []).map(rowToLead);
  }

  async count(): Promise<number> {
    const { count, error } = await this.supabase
      .from('leads')
      .select('lead_id', { count: 'exact', head: true });

    if (error) throw error;
    return count ?? 0;
  }

  async save(lead: Lead): Promise<void> {
    if (lead.domain) {
      const owner = await this.findByDomain(lead.domain);
      if (owner && owner.lead_id !== lead.lead_id) {
        throw new ConstraintViolationError(lead.domain, owner.lead_id);
      }
    }

    const { error } = await this.supabase
      .from('leads')
      .upsert(leadToRow(lead, new Date().toISOString()), { onConflict: 'lead_id' });

    if (error?.code === '23505' && lead.domain) {
      // unique_violation on the partial domain index
      const owner = await this.findByDomain(lead.domain);
      throw new ConstraintViolationError(lead.domain, owner?.lead_id ?? 'unknown');
    }
    if (error) throw error;
  }
}
