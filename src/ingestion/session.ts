/**
 * ═══════════════════════════════════════════════════════════════════════════
 * RESEARCH SESSION
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Turns collaborator findings into `pending` data points.
 *
 * Flow for one target:
 *   1. register the company or technology being researched
 *   2. open a research_sessions row (`running`)
 *   3. ask the collaborator for findings
 *   4. parse and store each finding; rejected findings are counted and
 *      reported individually, the rest of the batch continues
 *   5. close the row as `completed`
 *
 * A collaborator failure, or any error other than a rejected finding,
 * closes the row as `failed` and is rethrown.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { IntegrityError, SchemaViolation, type ErrorCode } from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import type { IntelligenceRepository } from "../repository/repository.js";
import { findingToInput, parseFinding, type ResearchTarget, type ResearchTargetType } from "./findings.js";

/**
 * Source of raw findings (web search plus an analyzer, a saved file...).
 */
export interface ResearchCollaborator {
  readonly name: string;
  research(target: ResearchTarget): Promise<unknown[]>;
}

export interface FindingRejection {
  /** Position of the finding in the collaborator's batch */
  index: number;
  code: ErrorCode;
  message: string;
}

export interface ResearchResult {
  sessionId: number;
  target: ResearchTarget;
  findingsReceived: number;
  dataPointIds: number[];
  rejected: FindingRejection[];
}

export interface ResearchSessionOptions {
  logger?: Logger;
  now?: () => Date;
}

const SESSION_TYPES: Record<ResearchTargetType, string> = {
  sector: "sector_deep_dive",
  company: "company_research",
  technology: "technology_research",
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class ResearchSession {
  private readonly repo: IntelligenceRepository;
  private readonly collaborator: ResearchCollaborator;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(
    repo: IntelligenceRepository,
    collaborator: ResearchCollaborator,
    options: ResearchSessionOptions = {}
  ) {
    this.repo = repo;
    this.collaborator = collaborator;
    this.now = options.now ?? (() => new Date());
    this.log = (options.logger ?? silentLogger).child({
      component: "ingestion",
      collaborator: collaborator.name,
    });
  }

  private defaultYear(): number {
    return this.now().getUTCFullYear();
  }

  /**
   * @throws IntegrityError when the sector is unknown
   */
  async researchSector(name: string, year = this.defaultYear()): Promise<ResearchResult> {
    if (this.repo.getSectorByName(name) === null) {
      throw new IntegrityError("sector", name);
    }
    return this.run({ type: "sector", name, year });
  }

  async researchCompany(name: string, year = this.defaultYear()): Promise<ResearchResult> {
    this.repo.ensureCompany({ name });
    return this.run({ type: "company", name, year });
  }

  async researchTechnology(name: string, year = this.defaultYear()): Promise<ResearchResult> {
    this.repo.ensureTechnology({
      name,
      category: "emerging",
      description: `Added from research: ${name}`,
    });
    return this.run({ type: "technology", name, year });
  }

  /**
   * Every seeded sector, one session each, in name order. Stops at the
   * first failed session.
   */
  async researchAllSectors(year = this.defaultYear()): Promise<ResearchResult[]> {
    const results: ResearchResult[] = [];
    for (const sector of this.repo.getSectors()) {
      results.push(await this.researchSector(sector.name, year));
    }
    return results;
  }

  private async run(target: ResearchTarget): Promise<ResearchResult> {
    const sessionId = this.repo.startResearchSession(SESSION_TYPES[target.type], target.name);
    const log = this.log.child({ sessionId });
    log.info("Research session started", { type: target.type, target: target.name, year: target.year });

    const dataPointIds: number[] = [];
    const rejected: FindingRejection[] = [];
    let findingsReceived = 0;

    try {
      const raw = await this.collaborator.research(target);
      findingsReceived = raw.length;

      raw.forEach((item, index) => {
        try {
          const input = findingToInput(parseFinding(item), target);
          dataPointIds.push(
            this.repo.createDataPoint(input, {
              actor: `research:${this.collaborator.name}`,
              reason: `research session #${sessionId}`,
            })
          );
        } catch (err) {
          if (!(err instanceof IntegrityError || err instanceof SchemaViolation)) throw err;
          rejected.push({ index, code: err.code, message: err.message });
          log.warn("Finding rejected", { index, code: err.code, error: err.message });
        }
      });
    } catch (err) {
      this.repo.finishResearchSession(sessionId, {
        status: "failed",
        findingsReceived,
        dataPointsCreated: dataPointIds.length,
        findingsRejected: rejected.length,
        errorMessage: errorMessage(err),
      });
      log.error("Research session failed", { error: err });
      throw err;
    }

    this.repo.finishResearchSession(sessionId, {
      status: "completed",
      findingsReceived,
      dataPointsCreated: dataPointIds.length,
      findingsRejected: rejected.length,
    });
    log.info("Research session completed", {
      findingsReceived,
      dataPointsCreated: dataPointIds.length,
      findingsRejected: rejected.length,
    });

    return { sessionId, target, findingsReceived, dataPointIds, rejected };
  }
}
