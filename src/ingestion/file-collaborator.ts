/**
 * Collaborator that replays findings saved to disk, for offline runs and
 * for re-ingesting analyzer output captured earlier.
 */

import { readFile } from "node:fs/promises";
import { parseAnalyzerOutput } from "./analyzer-output.js";
import type { ResearchTarget } from "./findings.js";
import type { ResearchCollaborator } from "./session.js";

/** One file for every target, or a file chosen per target */
export type FindingsLocation = string | ((target: ResearchTarget) => string);

export class FindingsFileCollaborator implements ResearchCollaborator {
  readonly name = "findings-file";
  private readonly location: FindingsLocation;

  constructor(location: FindingsLocation) {
    this.location = location;
  }

  /**
   * Every finding in the target's file; the target only supplies defaults later.
   */
  async research(target: ResearchTarget): Promise<unknown[]> {
    const path = typeof this.location === "string" ? this.location : this.location(target);
    const text = await readFile(path, "utf-8");
    return parseAnalyzerOutput(text);
  }
}
