/**
 * ═══════════════════════════════════════════════════════════════════════════
 * INTELLIGENCE REPOSITORY
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Sole gateway to storage. Every data point write goes through here, and
 * every write appends exactly one entry to the audit ledger in the same
 * transaction.
 *
 * Integrity rules enforced on write:
 *   - the dimension, subject and source a point references exist
 *   - the value matches the dimension's value kind
 *   - a quarter or month has a year, and a month sits inside its quarter
 *
 * Data points are never deleted. Status changes are exposed only through
 * `transitionStatus`, which the validation workflow wraps with its state
 * machine.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

import type { Connection } from "../db/connection.js";
import { IntegrityError, NotFound, SchemaViolation, ValidationFailed } from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import type { Relevance, ValidationStatus } from "../types/enums.js";
import type { Subject, SubjectRef } from "../types/subject.js";
import { subjectLabel } from "../types/subject.js";
import {
  DataPointInputSchema,
  DataPointPatchSchema,
  SourceInputSchema,
  valueMatchesKind,
  type DataPointFilter,
  type DataPointInput,
  type DataPointPatch,
  type DataPointRecord,
  type DimensionSummary,
  type PointValue,
  type SourceInput,
  type SourceRef,
} from "../types/data-point.js";
import type {
  ChangeType,
  ChangesFilter,
  ChangesLogEntry,
  DataPointSnapshot,
  StatusChange,
} from "../types/audit.js";
import type {
  Company,
  CompanyInput,
  DatabaseStatistics,
  Dimension,
  ResearchSessionOutcome,
  ResearchSessionRecord,
  Sector,
  Source,
  Subcategory,
  Technology,
  TechnologyInput,
} from "../types/reference.js";
import {
  InterviewInputSchema,
  type Interview,
  type InterviewFilter,
  type InterviewInput,
} from "../types/interview.js";
import {
  DATA_POINT_ORDER,
  DATA_POINT_SELECT,
  toChangesLogEntry,
  toCompany,
  toDataPointRecord,
  toDimension,
  toInterview,
  toResearchSession,
  toSnapshot,
  toSource,
  toTechnology,
  valueColumns,
  type ChangeRow,
  type CompanyRow,
  type DataPointRow,
  type DimensionRow,
  type InterviewRow,
  type ResearchSessionRow,
  type SourceRow,
  type TechnologyLinkRow,
  type TechnologyRow,
} from "./rows.js";
import { ValidationEngine, toFailedRules } from "../validation/engine.js";
import { parseOrViolation } from "./schema.js";
import { loadReferenceData, seedReferenceData, type ReferenceData, type SeedCounts } from "./seed.js";

type SqlParam = string | number | null;

const DATA_POINTS_TABLE = "data_points";

/** Statuses whose data has passed the engine and must keep passing it */
const VETTED_STATUSES: readonly ValidationStatus[] = ["validated", "outdated"];

/** Fields the engine looks at */
const VETTED_FIELDS: readonly string[] = ["value", "year", "quarter", "month", "confidence", "sourceId"];

const PATCHABLE_FIELDS = [
  "value",
  "year",
  "quarter",
  "month",
  "confidence",
  "sourceId",
  "notes",
  "metadata",
] as const;

export interface RepositoryOptions {
  /** Clock for created/updated/audit timestamps */
  now?: () => Date;
  logger?: Logger;
  /** Re-checks corrections to validated and outdated points */
  engine?: ValidationEngine;
}

export interface WriteOptions {
  actor?: string;
  reason?: string | null;
}

/**
 * Temporal anchor after normalization.
 */
export interface Period {
  year: number | null;
  quarter: number | null;
  month: number | null;
}

/**
 * Check and complete a temporal anchor.
 * A month without a quarter gets its quarter derived.
 */
export function normalizePeriod(period: Period): Period {
  const { year, month } = period;
  let { quarter } = period;

  if (year === null && (quarter !== null || month !== null)) {
    throw SchemaViolation.single("year", "A quarter or month requires a year");
  }

  if (month !== null) {
    const expected = Math.ceil(month / 3);
    if (quarter === null) {
      quarter = expected;
    } else if (quarter !== expected) {
      throw SchemaViolation.single(
        "quarter",
        `Month ${month} falls in quarter ${expected}, not quarter ${quarter}`
      );
    }
  }

  return { year, quarter, month };
}

function assertKind(value: PointValue, dimension: DimensionSummary): void {
  if (!valueMatchesKind(value, dimension.kind)) {
    const got = Array.isArray(value) ? "array" : typeof value;
    throw SchemaViolation.single(
      "value",
      `Dimension '${dimension.name}' holds ${dimension.kind} values, got ${got}`
    );
  }
}

function sameJson(a: unknown, b: unknown): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

interface SubjectColumns {
  sector_id: number | null;
  subcategory_id: number | null;
  company_id: number | null;
  technology_id: number | null;
}

function subjectColumns(subject: Subject): SubjectColumns {
  return {
    sector_id: subject.type === "sector" ? subject.id : null,
    subcategory_id: subject.type === "subcategory" ? subject.id : null,
    company_id: subject.type === "company" ? subject.id : null,
    technology_id: subject.type === "technology" ? subject.id : null,
  };
}

export class IntelligenceRepository {
  private readonly db: Connection;
  private readonly now: () => Date;
  private readonly log: Logger;
  private readonly engine: ValidationEngine;

  constructor(db: Connection, options: RepositoryOptions = {}) {
    this.db = db;
    this.now = options.now ?? (() => new Date());
    this.log = (options.logger ?? silentLogger).child({ component: "repository" });
    this.engine = options.engine ?? new ValidationEngine({ now: this.now });
  }

  /**
   * Run `fn` atomically. Nested calls become savepoints.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    this.db.close();
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  // ═══════════════════════════════════════════════════════════════════════
  // DATA POINT WRITES
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Insert a `pending` data point and its `insert` ledger entry.
   *
   * @throws SchemaViolation for malformed payloads, kind mismatches and inconsistent periods
   * @throws IntegrityError when the dimension, subject or source does not exist
   */
  createDataPoint(input: DataPointInput, options: WriteOptions = {}): number {
    const parsed = parseOrViolation(DataPointInputSchema, input, "data point");

    return this.transaction(() => {
      const dimension = this.resolveDimension(parsed.dimension);
      assertKind(parsed.value, dimension);
      const period = normalizePeriod({
        year: parsed.year ?? null,
        quarter: parsed.quarter ?? null,
        month: parsed.month ?? null,
      });
      const subject = this.resolveSubject(parsed.subject);
      const sourceId = parsed.source != null ? this.resolveSource(parsed.source) : null;
      const ts = this.timestamp();
      const cols = subjectColumns(subject);
      const stored = valueColumns(parsed.value);

      const result = this.db
        .prepare<SqlParam[]>(
          `INSERT INTO data_points (
             dimension_id, sector_id, subcategory_id, company_id, technology_id,
             value, value_text, value_json, year, quarter, month, source_id,
             confidence, validation_status, notes, metadata, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 'pending', ?, ?, ?, ?)`
        )
        .run(
          dimension.id,
          cols.sector_id,
          cols.subcategory_id,
          cols.company_id,
          cols.technology_id,
          stored.value,
          stored.value_text,
          stored.value_json,
          period.year,
          period.quarter,
          period.month,
          sourceId,
          parsed.confidence,
          parsed.notes ?? null,
          parsed.metadata != null ? JSON.stringify(parsed.metadata) : null,
          ts,
          ts
        );

      const id = Number(result.lastInsertRowid);
      const record = this.requireDataPoint(id);
      this.appendChange(id, "insert", null, toSnapshot(record), [], {
        actor: options.actor ?? "system",
        reason: options.reason ?? null,
      });

      this.log.debug("Data point created", {
        id,
        dimension: dimension.name,
        subject: subjectLabel(subject),
      });
      return id;
    });
  }

  /**
   * Correct a data point's value, period, confidence, source, notes or
   * metadata. Validation status is untouched. A patch that changes nothing
   * writes nothing.
   *
   * A `validated` or `outdated` point keeps its status only while it passes
   * the validation engine: a correction to a checked field is re-evaluated
   * and rolled back if any error rule fails.
   *
   * @returns the record after the update
   * @throws ValidationFailed when a vetted point no longer passes the engine
   */
  updateDataPoint(
    id: number,
    patch: DataPointPatch,
    reason: string | null,
    actor: string
  ): DataPointRecord {
    const parsed = parseOrViolation(DataPointPatchSchema, patch, "data point patch");

    return this.transaction(() => {
      const before = this.requireDataPoint(id);

      const value = parsed.value !== undefined ? parsed.value : before.value;
      assertKind(value, before.dimension);

      const period = normalizePeriod({
        year: parsed.year !== undefined ? parsed.year : before.year,
        quarter:
          parsed.quarter !== undefined
            ? parsed.quarter
            : typeof parsed.month === "number"
              ? null
              : before.quarter,
        month: parsed.month !== undefined ? parsed.month : before.month,
      });

      let sourceId = before.source?.id ?? null;
      if (parsed.source !== undefined) {
        sourceId = parsed.source === null ? null : this.resolveSource(parsed.source);
      }

      const next = {
        value,
        ...period,
        confidence: parsed.confidence ?? before.confidence,
        sourceId,
        notes: parsed.notes !== undefined ? parsed.notes : before.notes,
        metadata: parsed.metadata !== undefined ? parsed.metadata : before.metadata,
      };

      const beforeSnapshot = toSnapshot(before);
      const fields = PATCHABLE_FIELDS.filter((key) => !sameJson(beforeSnapshot[key], next[key]));
      if (fields.length === 0) {
        return before;
      }

      const stored = valueColumns(next.value);

      this.db
        .prepare<SqlParam[]>(
          `UPDATE data_points
              SET value = ?, value_text = ?, value_json = ?,
                  year = ?, quarter = ?, month = ?,
                  confidence = ?, source_id = ?, notes = ?, metadata = ?, updated_at = ?
            WHERE id = ?`
        )
        .run(
          stored.value,
          stored.value_text,
          stored.value_json,
          next.year,
          next.quarter,
          next.month,
          next.confidence,
          next.sourceId,
          next.notes,
          next.metadata !== null ? JSON.stringify(next.metadata) : null,
          this.timestamp(),
          id
        );

      const after = this.requireDataPoint(id);
      if (VETTED_STATUSES.includes(after.status) && fields.some((f) => VETTED_FIELDS.includes(f))) {
        const verdict = this.engine.evaluateRecord(after);
        if (!verdict.passed) {
          this.log.warn("Correction refused", { id, status: after.status, fields });
          throw new ValidationFailed(id, toFailedRules(verdict.failures));
        }
      }
      this.appendChange(id, "update", beforeSnapshot, toSnapshot(after), fields, { actor, reason });
      this.log.debug("Data point updated", { id, fields });
      return after;
    });
  }

  /**
   * Write a status change and its `status` ledger entry. Legality of the
   * transition is the caller's concern.
   */
  transitionStatus(id: number, change: StatusChange): DataPointRecord {
    return this.transaction(() => {
      const before = this.requireDataPoint(id);
      const ts = this.timestamp();
      const fields = ["status"];

      const validatedBy = change.recordValidation ? change.actor : before.validatedBy;
      const validatedAt = change.recordValidation ? ts : before.validatedAt;
      if (change.recordValidation) fields.push("validatedBy", "validatedAt");

      const notes = change.notes != null ? change.notes : before.notes;
      if (notes !== before.notes) fields.push("notes");

      this.db
        .prepare<SqlParam[]>(
          `UPDATE data_points
              SET validation_status = ?, validated_by = ?, validated_at = ?, notes = ?, updated_at = ?
            WHERE id = ?`
        )
        .run(change.to, validatedBy, validatedAt, notes, ts, id);

      const after = this.requireDataPoint(id);
      this.appendChange(id, "status", toSnapshot(before), toSnapshot(after), fields, {
        actor: change.actor,
        reason: change.reason ?? null,
      });
      this.log.info("Status changed", { id, from: before.status, to: change.to, actor: change.actor });
      return after;
    });
  }

  private appendChange(
    recordId: number,
    changeType: ChangeType,
    before: DataPointSnapshot | null,
    after: DataPointSnapshot,
    fields: readonly string[],
    options: { actor: string; reason: string | null }
  ): void {
    this.db
      .prepare<SqlParam[]>(
        `INSERT INTO changes_log
           (table_name, record_id, change_type, old_value, new_value, fields, changed_by, reason, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        DATA_POINTS_TABLE,
        recordId,
        changeType,
        before !== null ? JSON.stringify(before) : null,
        JSON.stringify(after),
        JSON.stringify(fields),
        options.actor,
        options.reason,
        this.timestamp()
      );
  }

  // ═══════════════════════════════════════════════════════════════════════
  // DATA POINT READS
  // ═══════════════════════════════════════════════════════════════════════

  getDataPoint(id: number): DataPointRecord | null {
    const row = this.db
      .prepare<[number], DataPointRow>(`${DATA_POINT_SELECT} WHERE dp.id = ?`)
      .get(id);
    return row !== undefined ? toDataPointRecord(row) : null;
  }

  requireDataPoint(id: number): DataPointRecord {
    const record = this.getDataPoint(id);
    if (record === null) {
      throw new NotFound("data point", id);
    }
    return record;
  }

  /**
   * Query data points. Ordered by period (latest first, missing parts
   * last), then by id.
   */
  getDataPoints(filters: DataPointFilter = {}): DataPointRecord[] {
    const where: string[] = [];
    const params: SqlParam[] = [];

    if (filters.dimension !== undefined) {
      where.push("d.name = ?");
      params.push(filters.dimension);
    }
    if (filters.sector !== undefined) {
      where.push("(s.name = ? OR scs.name = ?)");
      params.push(filters.sector, filters.sector);
    }
    if (filters.subject !== undefined) {
      this.pushSubjectFilter(filters.subject, where, params);
    }
    if (filters.company !== undefined) {
      where.push("c.name = ?");
      params.push(filters.company);
    }
    if (filters.technology !== undefined) {
      where.push("t.name = ?");
      params.push(filters.technology);
    }
    if (filters.year !== undefined) {
      where.push("dp.year = ?");
      params.push(filters.year);
    }
    if (filters.quarter !== undefined) {
      where.push("dp.quarter IS ?");
      params.push(filters.quarter);
    }
    if (filters.month !== undefined) {
      where.push("dp.month IS ?");
      params.push(filters.month);
    }
    if (filters.status !== undefined) {
      const statuses: readonly ValidationStatus[] =
        typeof filters.status === "string" ? [filters.status] : filters.status;
      if (statuses.length === 0) return [];
      where.push(`dp.validation_status IN (${statuses.map(() => "?").join(", ")})`);
      params.push(...statuses);
    }
    if (filters.confidence !== undefined) {
      where.push("dp.confidence = ?");
      params.push(filters.confidence);
    }

    let sql = DATA_POINT_SELECT;
    if (where.length > 0) sql += ` WHERE ${where.join(" AND ")}`;
    sql += ` ${DATA_POINT_ORDER}`;
    if (filters.limit !== undefined) {
      sql += " LIMIT ?";
      params.push(filters.limit);
    }

    return this.db.prepare<SqlParam[], DataPointRow>(sql).all(...params).map(toDataPointRecord);
  }

  private pushSubjectFilter(subject: SubjectRef, where: string[], params: SqlParam[]): void {
    switch (subject.type) {
      case "sector":
        where.push("s.name = ?");
        params.push(subject.name);
        return;
      case "subcategory":
        where.push("scs.name = ? AND sc.name = ?");
        params.push(subject.sector, subject.name);
        return;
      case "company":
        where.push("c.name = ?");
        params.push(subject.name);
        return;
      case "technology":
        where.push("t.name = ?");
        params.push(subject.name);
        return;
    }
  }

  /**
   * Items with the given status, oldest first.
   */
  getReviewQueue(status: ValidationStatus, limit?: number): DataPointRecord[] {
    const params: SqlParam[] = [status];
    let sql = `${DATA_POINT_SELECT} WHERE dp.validation_status = ? ORDER BY dp.created_at ASC, dp.id ASC`;
    if (limit !== undefined) {
      sql += " LIMIT ?";
      params.push(limit);
    }
    return this.db.prepare<SqlParam[], DataPointRow>(sql).all(...params).map(toDataPointRecord);
  }

  /**
   * Validated points for the same dimension, subject and exact period.
   */
  findValidatedPeers(record: DataPointRecord): DataPointRecord[] {
    const cols = subjectColumns(record.subject);
    return this.db
      .prepare<SqlParam[], DataPointRow>(
        `${DATA_POINT_SELECT}
          WHERE dp.validation_status = 'validated'
            AND dp.id != ?
            AND dp.dimension_id = ?
            AND dp.sector_id IS ? AND dp.subcategory_id IS ?
            AND dp.company_id IS ? AND dp.technology_id IS ?
            AND dp.year IS ? AND dp.quarter IS ? AND dp.month IS ?
          ORDER BY dp.id ASC`
      )
      .all(
        record.id,
        record.dimension.id,
        cols.sector_id,
        cols.subcategory_id,
        cols.company_id,
        cols.technology_id,
        record.year,
        record.quarter,
        record.month
      )
      .map(toDataPointRecord);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // AUDIT LEDGER
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Ledger entries, newest first.
   */
  getChanges(filters: ChangesFilter = {}): ChangesLogEntry[] {
    const where: string[] = [];
    const params: SqlParam[] = [];
    if (filters.recordId !== undefined) {
      where.push("table_name = ? AND record_id = ?");
      params.push(DATA_POINTS_TABLE, filters.recordId);
    }
    if (filters.changeType !== undefined) {
      where.push("change_type = ?");
      params.push(filters.changeType);
    }
    if (filters.since !== undefined) {
      where.push("created_at >= ?");
      params.push(filters.since);
    }

    let sql = "SELECT * FROM changes_log";
    if (where.length > 0) sql += ` WHERE ${where.join(" AND ")}`;
    sql += " ORDER BY created_at DESC, id DESC";
    if (filters.limit !== undefined) {
      sql += " LIMIT ?";
      params.push(filters.limit);
    }
    return this.db.prepare<SqlParam[], ChangeRow>(sql).all(...params).map(toChangesLogEntry);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // REFERENCE RESOLUTION
  // ═══════════════════════════════════════════════════════════════════════

  private resolveDimension(name: string): DimensionSummary {
    const dimension = this.getDimensionByName(name);
    if (dimension === null) {
      throw new IntegrityError("dimension", name);
    }
    return dimension;
  }

  private resolveSubject(ref: SubjectRef): Subject {
    switch (ref.type) {
      case "sector": {
        const row = this.db
          .prepare<[string], { id: number; name: string }>("SELECT id, name FROM sectors WHERE name = ?")
          .get(ref.name);
        if (row === undefined) throw new IntegrityError("sector", ref.name);
        return { type: "sector", id: row.id, name: row.name };
      }
      case "subcategory": {
        const row = this.db
          .prepare<[string, string], { id: number; name: string; sector_id: number; sector: string }>(
            `SELECT sc.id, sc.name, sc.sector_id, s.name AS sector
               FROM subcategories sc JOIN sectors s ON s.id = sc.sector_id
              WHERE s.name = ? AND sc.name = ?`
          )
          .get(ref.sector, ref.name);
        if (row === undefined) throw new IntegrityError("subcategory", subjectLabel(ref));
        return { type: "subcategory", id: row.id, name: row.name, sectorId: row.sector_id, sector: row.sector };
      }
      case "company": {
        const row = this.db
          .prepare<[string], { id: number; name: string }>("SELECT id, name FROM companies WHERE name = ?")
          .get(ref.name);
        if (row === undefined) throw new IntegrityError("company", ref.name);
        return { type: "company", id: row.id, name: row.name };
      }
      case "technology": {
        const row = this.db
          .prepare<[string], { id: number; name: string }>("SELECT id, name FROM technologies WHERE name = ?")
          .get(ref.name);
        if (row === undefined) throw new IntegrityError("technology", ref.name);
        return { type: "technology", id: row.id, name: row.name };
      }
    }
  }

  private resolveSource(ref: SourceRef): number {
    if ("id" in ref) {
      if (this.getSource(ref.id) === null) {
        throw new IntegrityError("source", ref.id);
      }
      return ref.id;
    }
    return this.getOrCreateSource(ref);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // SOURCES
  // ═══════════════════════════════════════════════════════════════════════

  createSource(input: SourceInput): number {
    const source = parseOrViolation(SourceInputSchema, input, "source");
    const result = this.db
      .prepare<SqlParam[]>(
        `INSERT INTO sources (name, url, source_type, reliability_score, retrieved_at)
         VALUES (?, ?, ?, ?, ?)`
      )
      .run(
        source.name,
        source.url ?? null,
        source.sourceType,
        source.reliabilityScore,
        source.retrievedAt ?? this.timestamp()
      );
    return Number(result.lastInsertRowid);
  }

  /**
   * Existing source with the same URL (or, without a URL, the same name),
   * else a new one.
   */
  getOrCreateSource(input: SourceInput): number {
    const source = parseOrViolation(SourceInputSchema, input, "source");
    const existing =
      source.url !== undefined
        ? this.db.prepare<[string], { id: number }>("SELECT id FROM sources WHERE url = ?").get(source.url)
        : this.db
            .prepare<[string], { id: number }>(
              "SELECT id FROM sources WHERE name = ? AND url IS NULL ORDER BY id LIMIT 1"
            )
            .get(source.name);
    return existing !== undefined ? existing.id : this.createSource(source);
  }

  getSource(id: number): Source | null {
    const row = this.db.prepare<[number], SourceRow>("SELECT * FROM sources WHERE id = ?").get(id);
    return row !== undefined ? toSource(row) : null;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // SECTORS & DIMENSIONS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Insert the default taxonomy. Safe to run repeatedly.
   */
  seedDefaultData(data: ReferenceData = loadReferenceData()): SeedCounts {
    const counts = this.transaction(() => seedReferenceData(this.db, data, this.timestamp()));
    this.log.info("Reference data seeded", { ...counts });
    return counts;
  }

  getSectors(): Sector[] {
    const sectors = this.db
      .prepare<[], { id: number; name: string; description: string | null; created_at: string }>(
        "SELECT id, name, description, created_at FROM sectors ORDER BY name"
      )
      .all();
    const subcategories = this.db
      .prepare<[], { id: number; sector_id: number; name: string; description: string | null }>(
        "SELECT id, sector_id, name, description FROM subcategories ORDER BY name"
      )
      .all();

    return sectors.map((row) => ({
      id: row.id,
      name: row.name,
      description: row.description,
      createdAt: row.created_at,
      subcategories: subcategories
        .filter((sc) => sc.sector_id === row.id)
        .map((sc): Subcategory => ({
          id: sc.id,
          sectorId: sc.sector_id,
          name: sc.name,
          description: sc.description,
        })),
    }));
  }

  getSectorByName(name: string): Sector | null {
    return this.getSectors().find((sector) => sector.name === name) ?? null;
  }

  /**
   * Sectors are immutable once referenced, apart from their description.
   */
  updateSectorDescription(name: string, description: string | null): void {
    const result = this.db
      .prepare<SqlParam[]>("UPDATE sectors SET description = ?, updated_at = ? WHERE name = ?")
      .run(description, this.timestamp(), name);
    if (result.changes === 0) {
      throw new NotFound("sector", name);
    }
  }

  getDimensions(): Dimension[] {
    return this.db
      .prepare<[], DimensionRow>(
        "SELECT id, name, unit, description, value_kind FROM dimensions ORDER BY name"
      )
      .all()
      .map(toDimension);
  }

  getDimensionByName(name: string): Dimension | null {
    const row = this.db
      .prepare<[string], DimensionRow>(
        "SELECT id, name, unit, description, value_kind FROM dimensions WHERE name = ?"
      )
      .get(name);
    return row !== undefined ? toDimension(row) : null;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // TECHNOLOGIES & COMPANIES
  // ═══════════════════════════════════════════════════════════════════════

  getTechnologies(category?: string): Technology[] {
    const rows =
      category !== undefined
        ? this.db
            .prepare<[string], TechnologyRow>("SELECT * FROM technologies WHERE category = ? ORDER BY name")
            .all(category)
        : this.db.prepare<[], TechnologyRow>("SELECT * FROM technologies ORDER BY name").all();
    const links = this.db
      .prepare<[], TechnologyLinkRow>(
        `SELECT ts.technology_id, s.name AS sector_name, ts.relevance
           FROM technology_sectors ts JOIN sectors s ON s.id = ts.sector_id
          ORDER BY s.name`
      )
      .all();
    return rows.map((row) => toTechnology(row, links));
  }

  /**
   * Id of the named technology, registering it first if needed.
   */
  ensureTechnology(input: TechnologyInput): number {
    const existing = this.db
      .prepare<[string], { id: number }>("SELECT id FROM technologies WHERE name = ?")
      .get(input.name);
    if (existing !== undefined) return existing.id;

    const result = this.db
      .prepare<SqlParam[]>(
        `INSERT INTO technologies (name, category, description, maturity_level, created_at)
         VALUES (?, ?, ?, ?, ?)`
      )
      .run(
        input.name,
        input.category ?? null,
        input.description ?? null,
        input.maturityLevel ?? null,
        this.timestamp()
      );
    this.log.info("Technology registered", { name: input.name });
    return Number(result.lastInsertRowid);
  }

  linkTechnologyToSector(technology: string, sector: string, relevance: Relevance): void {
    const tech = this.db
      .prepare<[string], { id: number }>("SELECT id FROM technologies WHERE name = ?")
      .get(technology);
    if (tech === undefined) throw new IntegrityError("technology", technology);
    const sec = this.db.prepare<[string], { id: number }>("SELECT id FROM sectors WHERE name = ?").get(sector);
    if (sec === undefined) throw new IntegrityError("sector", sector);

    this.db
      .prepare<[number, number, string]>(
        `INSERT INTO technology_sectors (technology_id, sector_id, relevance) VALUES (?, ?, ?)
         ON CONFLICT (technology_id, sector_id) DO UPDATE SET relevance = excluded.relevance`
      )
      .run(tech.id, sec.id, relevance);
  }

  getCompanies(): Company[] {
    return this.db
      .prepare<[], CompanyRow>(
        `SELECT c.id, c.name, c.description, c.website, c.headquarters_country, c.founded_year,
                s.name AS primary_sector
           FROM companies c LEFT JOIN sectors s ON s.id = c.primary_sector_id
          ORDER BY c.name`
      )
      .all()
      .map(toCompany);
  }

  /**
   * Id of the named company, registering it first if needed.
   */
  ensureCompany(input: CompanyInput): number {
    const existing = this.db
      .prepare<[string], { id: number }>("SELECT id FROM companies WHERE name = ?")
      .get(input.name);
    if (existing !== undefined) return existing.id;

    let sectorId: number | null = null;
    if (input.primarySector != null) {
      const sector = this.db
        .prepare<[string], { id: number }>("SELECT id FROM sectors WHERE name = ?")
        .get(input.primarySector);
      if (sector === undefined) throw new IntegrityError("sector", input.primarySector);
      sectorId = sector.id;
    }

    const result = this.db
      .prepare<SqlParam[]>(
        `INSERT INTO companies
           (name, description, website, headquarters_country, founded_year, primary_sector_id, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        input.name,
        input.description ?? null,
        input.website ?? null,
        input.headquartersCountry ?? null,
        input.foundedYear ?? null,
        sectorId,
        this.timestamp()
      );
    this.log.info("Company registered", { name: input.name });
    return Number(result.lastInsertRowid);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // INTERVIEWS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Store an expert interview.
   *
   * @throws SchemaViolation when the input does not parse
   */
  addInterview(input: InterviewInput): number {
    const interview = parseOrViolation(InterviewInputSchema, input, "interview");
    const result = this.db
      .prepare<SqlParam[]>(
        `INSERT INTO interviews
           (expert_name, expert_title, expert_company, interview_date, topics, key_insights,
            summary, validation_status, metadata, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        interview.expertName,
        interview.expertTitle ?? null,
        interview.expertCompany ?? null,
        interview.interviewDate ?? null,
        JSON.stringify(interview.topics),
        JSON.stringify(interview.keyInsights),
        interview.summary ?? null,
        interview.status,
        interview.metadata != null ? JSON.stringify(interview.metadata) : null,
        this.timestamp()
      );
    const id = Number(result.lastInsertRowid);
    this.log.info("Interview recorded", { id, expert: interview.expertName });
    return id;
  }

  getInterview(id: number): Interview | null {
    const row = this.db.prepare<[number], InterviewRow>("SELECT * FROM interviews WHERE id = ?").get(id);
    return row !== undefined ? toInterview(row) : null;
  }

  /**
   * Interviews, most recent first; undated ones last.
   */
  getInterviews(filters: InterviewFilter = {}): Interview[] {
    const where: string[] = [];
    const params: SqlParam[] = [];
    if (filters.status !== undefined) {
      where.push("validation_status = ?");
      params.push(filters.status);
    }
    if (filters.expertCompany !== undefined) {
      where.push("expert_company = ?");
      params.push(filters.expertCompany);
    }

    const clause = where.length > 0 ? `WHERE ${where.join(" AND ")}` : "";
    const interviews = this.db
      .prepare<SqlParam[], InterviewRow>(
        `SELECT * FROM interviews ${clause}
          ORDER BY interview_date IS NULL, interview_date DESC, id DESC`
      )
      .all(...params)
      .map(toInterview);

    const topic = filters.topic?.toLowerCase();
    return topic === undefined
      ? interviews
      : interviews.filter((i) => i.topics.some((t) => t.toLowerCase() === topic));
  }

  // ═══════════════════════════════════════════════════════════════════════
  // RESEARCH SESSIONS
  // ═══════════════════════════════════════════════════════════════════════

  startResearchSession(sessionType: string, target: string | null): number {
    const result = this.db
      .prepare<SqlParam[]>(
        "INSERT INTO research_sessions (session_type, target, status, started_at) VALUES (?, ?, 'running', ?)"
      )
      .run(sessionType, target, this.timestamp());
    return Number(result.lastInsertRowid);
  }

  finishResearchSession(id: number, outcome: ResearchSessionOutcome): void {
    const result = this.db
      .prepare<SqlParam[]>(
        `UPDATE research_sessions
            SET status = ?, findings_received = ?, data_points_created = ?, findings_rejected = ?,
                error_message = ?, completed_at = ?
          WHERE id = ?`
      )
      .run(
        outcome.status,
        outcome.findingsReceived,
        outcome.dataPointsCreated,
        outcome.findingsRejected,
        outcome.errorMessage ?? null,
        this.timestamp(),
        id
      );
    if (result.changes === 0) {
      throw new NotFound("research session", id);
    }
  }

  /**
   * Sessions, most recent first.
   */
  getResearchSessions(limit = 20): ResearchSessionRecord[] {
    return this.db
      .prepare<[number], ResearchSessionRow>(
        "SELECT * FROM research_sessions ORDER BY started_at DESC, id DESC LIMIT ?"
      )
      .all(limit)
      .map(toResearchSession);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // STATISTICS
  // ═══════════════════════════════════════════════════════════════════════

  getStatistics(): DatabaseStatistics {
    const count = (table: string): number =>
      this.db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get()?.n ?? 0;

    const validationBreakdown: Record<string, number> = {};
    for (const row of this.db
      .prepare<[], { status: string; n: number }>(
        "SELECT validation_status AS status, COUNT(*) AS n FROM data_points GROUP BY validation_status ORDER BY validation_status"
      )
      .all()) {
      validationBreakdown[row.status] = row.n;
    }

    const dataPointsBySector: Record<string, number> = {};
    for (const row of this.db
      .prepare<[], { sector: string; n: number }>(
        `SELECT COALESCE(s.name, scs.name) AS sector, COUNT(*) AS n
           FROM data_points dp
           LEFT JOIN sectors s ON s.id = dp.sector_id
           LEFT JOIN subcategories sc ON sc.id = dp.subcategory_id
           LEFT JOIN sectors scs ON scs.id = sc.sector_id
          WHERE COALESCE(s.name, scs.name) IS NOT NULL
          GROUP BY 1 ORDER BY 1`
      )
      .all()) {
      dataPointsBySector[row.sector] = row.n;
    }

    return {
      sectors: count("sectors"),
      subcategories: count("subcategories"),
      dimensions: count("dimensions"),
      technologies: count("technologies"),
      companies: count("companies"),
      sources: count("sources"),
      dataPoints: count("data_points"),
      interviews: count("interviews"),
      changes: count("changes_log"),
      validationBreakdown,
      dataPointsBySector,
    };
  }
}
