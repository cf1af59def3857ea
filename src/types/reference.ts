/**
 * Reference entities: the taxonomy data points are filed against.
 */

import type { MaturityLevel, Relevance, ValueKind } from "./enums.js";

export interface Subcategory {
  readonly id: number;
  readonly sectorId: number;
  readonly name: string;
  readonly description: string | null;
}

export interface Sector {
  readonly id: number;
  readonly name: string;
  readonly description: string | null;
  readonly subcategories: readonly Subcategory[];
  readonly createdAt: string;
}

export interface Dimension {
  readonly id: number;
  readonly name: string;
  readonly unit: string | null;
  readonly description: string | null;
  readonly kind: ValueKind;
}

export interface TechnologySectorLink {
  readonly sector: string;
  readonly relevance: Relevance;
}

export interface Technology {
  readonly id: number;
  readonly name: string;
  readonly category: string | null;
  readonly description: string | null;
  readonly maturityLevel: MaturityLevel | null;
  readonly sectors: readonly TechnologySectorLink[];
}

export interface Company {
  readonly id: number;
  readonly name: string;
  readonly description: string | null;
  readonly website: string | null;
  readonly headquartersCountry: string | null;
  readonly foundedYear: number | null;
  readonly primarySector: string | null;
}

export interface CompanyInput {
  name: string;
  description?: string | null;
  website?: string | null;
  headquartersCountry?: string | null;
  foundedYear?: number | null;
  primarySector?: string | null;
}

export interface TechnologyInput {
  name: string;
  category?: string | null;
  description?: string | null;
  maturityLevel?: MaturityLevel | null;
}

export interface Source {
  readonly id: number;
  readonly name: string;
  readonly url: string | null;
  readonly sourceType: string | null;
  readonly reliabilityScore: number;
  readonly retrievedAt: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// RESEARCH SESSIONS
// ═══════════════════════════════════════════════════════════════════════════

export type ResearchSessionStatus = "running" | "completed" | "failed";

/**
 * Bookkeeping row for one ingestion run.
 */
export interface ResearchSessionRecord {
  readonly id: number;
  readonly sessionType: string;
  readonly target: string | null;
  readonly status: ResearchSessionStatus;
  readonly findingsReceived: number;
  readonly dataPointsCreated: number;
  readonly findingsRejected: number;
  readonly errorMessage: string | null;
  readonly startedAt: string;
  readonly completedAt: string | null;
}

export interface ResearchSessionOutcome {
  status: Exclude<ResearchSessionStatus, "running">;
  findingsReceived: number;
  dataPointsCreated: number;
  findingsRejected: number;
  errorMessage?: string | null;
}

// ═══════════════════════════════════════════════════════════════════════════
// STATISTICS
// ═══════════════════════════════════════════════════════════════════════════

export interface DatabaseStatistics {
  readonly sectors: number;
  readonly subcategories: number;
  readonly dimensions: number;
  readonly technologies: number;
  readonly companies: number;
  readonly sources: number;
  readonly dataPoints: number;
  readonly interviews: number;
  readonly changes: number;
  readonly validationBreakdown: Readonly<Record<string, number>>;
  readonly dataPointsBySector: Readonly<Record<string, number>>;
}
