/**
 * Row shapes returned by the repository's SELECTs and their mapping to
 * domain records.
 */

import { z } from "zod";
import { ConfidenceLevel, MaturityLevel, Relevance, ValidationStatus, ValueKind } from "../types/enums.js";
import type { Subject } from "../types/subject.js";
import { toSubjectRef } from "../types/subject.js";
import type { DataPointRecord, PointValue } from "../types/data-point.js";
import type { ChangesLogEntry, DataPointSnapshot } from "../types/audit.js";
import type { Interview } from "../types/interview.js";
import type {
  Company,
  Dimension,
  ResearchSessionRecord,
  Source,
  Technology,
  TechnologySectorLink,
} from "../types/reference.js";
import {
  ChangedFieldsSchema,
  DataPointSnapshotSchema,
  MetadataSchema,
  StringListSchema,
  StructuredValueSchema,
  parseStoredJson,
} from "./schema.js";

// ═══════════════════════════════════════════════════════════════════════════
// DATA POINTS
// ═══════════════════════════════════════════════════════════════════════════

export const DATA_POINT_SELECT = `
  SELECT dp.*,
         d.name  AS dimension_name,
         d.unit  AS dimension_unit,
         d.value_kind AS value_kind,
         s.name  AS sector_name,
         sc.name AS subcategory_name,
         sc.sector_id AS subcategory_sector_id,
         scs.name AS subcategory_sector_name,
         c.name  AS company_name,
         t.name  AS technology_name,
         src.name AS source_name,
         src.url  AS source_url,
         src.source_type AS source_type,
         src.reliability_score AS source_reliability
    FROM data_points dp
    JOIN dimensions d ON d.id = dp.dimension_id
    LEFT JOIN sectors s ON s.id = dp.sector_id
    LEFT JOIN subcategories sc ON sc.id = dp.subcategory_id
    LEFT JOIN sectors scs ON scs.id = sc.sector_id
    LEFT JOIN companies c ON c.id = dp.company_id
    LEFT JOIN technologies t ON t.id = dp.technology_id
    LEFT JOIN sources src ON src.id = dp.source_id`;

export const DATA_POINT_ORDER =
  "ORDER BY dp.year DESC NULLS LAST, dp.quarter DESC NULLS LAST, dp.month DESC NULLS LAST, dp.id ASC";

export interface DataPointRow {
  id: number;
  dimension_id: number;
  sector_id: number | null;
  subcategory_id: number | null;
  company_id: number | null;
  technology_id: number | null;
  value: number | null;
  value_text: string | null;
  value_json: string | null;
  year: number | null;
  quarter: number | null;
  month: number | null;
  source_id: number | null;
  confidence: string;
  validation_status: string;
  validated_by: string | null;
  validated_at: string | null;
  notes: string | null;
  metadata: string | null;
  created_at: string;
  updated_at: string;
  dimension_name: string;
  dimension_unit: string | null;
  value_kind: string;
  sector_name: string | null;
  subcategory_name: string | null;
  subcategory_sector_id: number | null;
  subcategory_sector_name: string | null;
  company_name: string | null;
  technology_name: string | null;
  source_name: string | null;
  source_url: string | null;
  source_type: string | null;
  source_reliability: number | null;
}

function subjectFromRow(row: DataPointRow): Subject {
  if (row.sector_id !== null && row.sector_name !== null) {
    return { type: "sector", id: row.sector_id, name: row.sector_name };
  }
  if (
    row.subcategory_id !== null &&
    row.subcategory_name !== null &&
    row.subcategory_sector_id !== null &&
    row.subcategory_sector_name !== null
  ) {
    return {
      type: "subcategory",
      id: row.subcategory_id,
      name: row.subcategory_name,
      sectorId: row.subcategory_sector_id,
      sector: row.subcategory_sector_name,
    };
  }
  if (row.company_id !== null && row.company_name !== null) {
    return { type: "company", id: row.company_id, name: row.company_name };
  }
  if (row.technology_id !== null && row.technology_name !== null) {
    return { type: "technology", id: row.technology_id, name: row.technology_name };
  }
  throw new Error(`data_points row ${row.id} has no subject`);
}

function valueFromRow(row: DataPointRow): PointValue {
  if (row.value !== null) return row.value;
  if (row.value_text !== null) return row.value_text;
  if (row.value_json !== null) return parseStoredJson(StructuredValueSchema, row.value_json);
  return null;
}

export function toDataPointRecord(row: DataPointRow): DataPointRecord {
  return {
    id: row.id,
    dimension: {
      id: row.dimension_id,
      name: row.dimension_name,
      unit: row.dimension_unit,
      kind: ValueKind.parse(row.value_kind),
    },
    subject: subjectFromRow(row),
    value: valueFromRow(row),
    year: row.year,
    quarter: row.quarter,
    month: row.month,
    confidence: ConfidenceLevel.parse(row.confidence),
    status: ValidationStatus.parse(row.validation_status),
    source:
      row.source_id !== null && row.source_name !== null
        ? {
            id: row.source_id,
            name: row.source_name,
            url: row.source_url,
            sourceType: row.source_type,
            reliabilityScore: row.source_reliability ?? 0.5,
          }
        : null,
    validatedBy: row.validated_by,
    validatedAt: row.validated_at,
    notes: row.notes,
    metadata: row.metadata !== null ? parseStoredJson(MetadataSchema, row.metadata) : null,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Ledger view of a record.
 */
export function toSnapshot(record: DataPointRecord): DataPointSnapshot {
  return {
    dimension: record.dimension.name,
    subject: toSubjectRef(record.subject),
    value: record.value,
    year: record.year,
    quarter: record.quarter,
    month: record.month,
    confidence: record.confidence,
    status: record.status,
    sourceId: record.source?.id ?? null,
    validatedBy: record.validatedBy,
    validatedAt: record.validatedAt,
    notes: record.notes,
    metadata: record.metadata,
    updatedAt: record.updatedAt,
  };
}

/**
 * Split a value into the three storage columns.
 */
export function valueColumns(value: PointValue): {
  value: number | null;
  value_text: string | null;
  value_json: string | null;
} {
  if (typeof value === "number") return { value, value_text: null, value_json: null };
  if (typeof value === "string") return { value: null, value_text: value, value_json: null };
  if (value === null) return { value: null, value_text: null, value_json: null };
  return { value: null, value_text: null, value_json: JSON.stringify(value) };
}

// ═══════════════════════════════════════════════════════════════════════════
// AUDIT LEDGER
// ═══════════════════════════════════════════════════════════════════════════

export interface ChangeRow {
  id: number;
  table_name: string;
  record_id: number;
  change_type: string;
  old_value: string | null;
  new_value: string;
  fields: string;
  changed_by: string;
  reason: string | null;
  created_at: string;
}

const ChangeTypeSchema = z.enum(["insert", "update", "status"]);

export function toChangesLogEntry(row: ChangeRow): ChangesLogEntry {
  return {
    id: row.id,
    table: row.table_name,
    recordId: row.record_id,
    changeType: ChangeTypeSchema.parse(row.change_type),
    before: row.old_value !== null ? parseStoredJson(DataPointSnapshotSchema, row.old_value) : null,
    after: parseStoredJson(DataPointSnapshotSchema, row.new_value),
    fields: parseStoredJson(ChangedFieldsSchema, row.fields),
    actor: row.changed_by,
    reason: row.reason,
    timestamp: row.created_at,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// REFERENCE DATA
// ═══════════════════════════════════════════════════════════════════════════

export interface DimensionRow {
  id: number;
  name: string;
  unit: string | null;
  description: string | null;
  value_kind: string;
}

export function toDimension(row: DimensionRow): Dimension {
  return {
    id: row.id,
    name: row.name,
    unit: row.unit,
    description: row.description,
    kind: ValueKind.parse(row.value_kind),
  };
}

export interface TechnologyRow {
  id: number;
  name: string;
  category: string | null;
  description: string | null;
  maturity_level: string | null;
}

export interface TechnologyLinkRow {
  technology_id: number;
  sector_name: string;
  relevance: string;
}

export function toTechnology(row: TechnologyRow, links: readonly TechnologyLinkRow[]): Technology {
  const sectors: TechnologySectorLink[] = links
    .filter((link) => link.technology_id === row.id)
    .map((link) => ({ sector: link.sector_name, relevance: Relevance.parse(link.relevance) }));
  return {
    id: row.id,
    name: row.name,
    category: row.category,
    description: row.description,
    maturityLevel: row.maturity_level !== null ? MaturityLevel.parse(row.maturity_level) : null,
    sectors,
  };
}

export interface CompanyRow {
  id: number;
  name: string;
  description: string | null;
  website: string | null;
  headquarters_country: string | null;
  founded_year: number | null;
  primary_sector: string | null;
}

export function toCompany(row: CompanyRow): Company {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    website: row.website,
    headquartersCountry: row.headquarters_country,
    foundedYear: row.founded_year,
    primarySector: row.primary_sector,
  };
}

export interface SourceRow {
  id: number;
  name: string;
  url: string | null;
  source_type: string | null;
  reliability_score: number;
  retrieved_at: string;
}

export function toSource(row: SourceRow): Source {
  return {
    id: row.id,
    name: row.name,
    url: row.url,
    sourceType: row.source_type,
    reliabilityScore: row.reliability_score,
    retrievedAt: row.retrieved_at,
  };
}

export interface ResearchSessionRow {
  id: number;
  session_type: string;
  target: string | null;
  status: string;
  findings_received: number;
  data_points_created: number;
  findings_rejected: number;
  error_message: string | null;
  started_at: string;
  completed_at: string | null;
}

const SessionStatusSchema = z.enum(["running", "completed", "failed"]);

export function toResearchSession(row: ResearchSessionRow): ResearchSessionRecord {
  return {
    id: row.id,
    sessionType: row.session_type,
    target: row.target,
    status: SessionStatusSchema.parse(row.status),
    findingsReceived: row.findings_received,
    dataPointsCreated: row.data_points_created,
    findingsRejected: row.findings_rejected,
    errorMessage: row.error_message,
    startedAt: row.started_at,
    completedAt: row.completed_at,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// INTERVIEWS
// ═══════════════════════════════════════════════════════════════════════════

export interface InterviewRow {
  id: number;
  expert_name: string;
  expert_title: string | null;
  expert_company: string | null;
  interview_date: string | null;
  topics: string;
  key_insights: string;
  summary: string | null;
  validation_status: string;
  metadata: string | null;
  created_at: string;
}

export function toInterview(row: InterviewRow): Interview {
  return {
    id: row.id,
    expertName: row.expert_name,
    expertTitle: row.expert_title,
    expertCompany: row.expert_company,
    interviewDate: row.interview_date,
    topics: parseStoredJson(StringListSchema, row.topics),
    keyInsights: parseStoredJson(StringListSchema, row.key_insights),
    summary: row.summary,
    status: ValidationStatus.parse(row.validation_status),
    metadata: row.metadata !== null ? parseStoredJson(MetadataSchema, row.metadata) : null,
    createdAt: row.created_at,
  };
}
