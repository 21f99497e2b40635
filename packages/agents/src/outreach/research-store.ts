/**
 * Research Store Adapter
 *
 * Read-only access to company and attendee research records. The in-memory
 * store is loaded from the research export JSON; other backends implement
 * the same interface.
 *
 * @module outreach/research-store
 */

import { readFile } from 'node:fs/promises';
import type { AttendeeId, CompanyId } from '@expo-outreach/lib';
import {
  parseResearchExport,
  type AttendeeRecord,
  type CompanyRecord,
  type ResearchExport,
} from './contracts/research-records';
import { InvalidInputError } from './errors';

// ===========================================
// Interface
// ===========================================

export interface ResearchStore {
  getCompany(id: CompanyId): Promise<CompanyRecord | null>;
  getAttendee(id: AttendeeId): Promise<AttendeeRecord | null>;
  getAttendees(companyId: CompanyId): Promise<AttendeeRecord[]>;
  /**
   * Ids of the n best companies: combined score desc, distribution-center
   * count desc, id asc.
   */
  getTopCompanies(n: number): Promise<CompanyId[]>;
  listCompanyIds(): Promise<CompanyId[]>;
}

/**
 * Ordering used for the global top-target list
 */
export function compareTargetPriority(a: CompanyRecord, b: CompanyRecord): number {
  return (
    b.combined_score - a.combined_score ||
    b.dc_count - a.dc_count ||
    (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
  );
}

// ===========================================
// In-Memory Store
// ===========================================

export class InMemoryResearchStore implements ResearchStore {
  private readonly companies = new Map<CompanyId, CompanyRecord>();
  private readonly attendees = new Map<AttendeeId, AttendeeRecord>();
  private readonly byCompany = new Map<CompanyId, AttendeeRecord[]>();

  constructor(data: ResearchExport = { companies: [], attendees: [] }) {
    for (const company of data.companies) {
      if (this.companies.has(company.id)) {
        throw new InvalidInputError(`Duplicate company id ${company.id}`, 'classify', { companyId: company.id });
      }
      this.companies.set(company.id, company);
    }

    for (const attendee of data.attendees) {
      if (this.attendees.has(attendee.id)) {
        throw new InvalidInputError(`Duplicate attendee id ${attendee.id}`, 'classify', {
          attendeeId: attendee.id,
        });
      }
      this.attendees.set(attendee.id, attendee);
      const list = this.byCompany.get(attendee.company_id) ?? [];
      list.push(attendee);
      this.byCompany.set(attendee.company_id, list);
    }
  }

  async getCompany(id: CompanyId): Promise<CompanyRecord | null> {
    return this.companies.get(id) ?? null;
  }

  async getAttendee(id: AttendeeId): Promise<AttendeeRecord | null> {
    return this.attendees.get(id) ?? null;
  }

  async getAttendees(companyId: CompanyId): Promise<AttendeeRecord[]> {
    return [...(this.byCompany.get(companyId) ?? [])];
  }

  async getTopCompanies(n: number): Promise<CompanyId[]> {
    return [...this.companies.values()]
      .sort(compareTargetPriority)
      .slice(0, Math.max(0, n))
      .map((c) => c.id);
  }

  async listCompanyIds(): Promise<CompanyId[]> {
    return [...this.companies.keys()];
  }
}

/**
 * Load and validate a research export from disk
 */
export async function loadResearchStore(path: string): Promise<InMemoryResearchStore> {
  const raw = await readFile(path, 'utf-8');
  return new InMemoryResearchStore(parseResearchExport(JSON.parse(raw)));
}
