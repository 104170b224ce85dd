import * as path from 'path';
import type { IBuildTool } from '../build_tool';
import type { Logger } from '../logger';
import type { RoutingClassifierDependencies, RoutingDecision } from './classifier.types';

/** Classification that names no actionable routing target */
export const UNKNOWN_CLASSIFICATION = 'UNKNOWN';

const SEPARATOR = ' :: ';

/**
 * Error thrown when a classification report cannot be parsed
 */
export class ClassificationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ClassificationError';
    Object.setPrototypeOf(this, ClassificationError.prototype);
  }
}

/**
 * Counts the detail lines (space-indented) under each classification header.
 * Headers keep the order they were first seen in.
 *
 * @throws ClassificationError when a detail line precedes every header
 */
export function parseComponentReport(report: string): Map<string, number> {
  const counts = new Map<string, number>();
  let current: string | null = null;

  for (const line of report.split('\n')) {
    if (!line.trim()) {
      continue;
    }
    if (line.startsWith(' ')) {
      if (current === null) {
        throw new ClassificationError(`Detail line without a classification: "${line.trim()}"`);
      }
      counts.set(current, (counts.get(current) ?? 0) + 1);
    } else {
      current = line.trim();
    }
  }
  return counts;
}

/**
 * Most frequent classification, ties going to the first seen. UNKNOWN
 * gives way to the runner-up; null when nothing usable remains.
 */
export function chooseClassification(counts: Map<string, number>): string | null {
  const ranked = [...counts.entries()].sort((a, b) => b[1] - a[1]);
  let choice = ranked[0]?.[0];
  if (choice === UNKNOWN_CLASSIFICATION && ranked.length > 1) {
    choice = ranked[1]?.[0];
  }
  if (choice === undefined || choice === UNKNOWN_CLASSIFICATION) {
    return null;
  }
  return choice;
}

/** Splits "Primary :: Secondary"; null for any other shape */
export function toRoutingDecision(classification: string): RoutingDecision | null {
  const parts = classification.split(SEPARATOR);
  const [primary, secondary] = parts;
  if (parts.length !== 2 || !primary || !secondary) {
    return null;
  }
  return { primary, secondary };
}

/**
 * RoutingClassifier - picks the tracker routing for a set of changed paths.
 *
 * Never fails: an empty path set, an unusable report or a failing
 * classification query all yield the default.
 */
export class RoutingClassifier {
  private readonly buildTool: IBuildTool;
  private readonly upstreamPath: string;
  private readonly logger: Logger;

  constructor(deps: RoutingClassifierDependencies) {
    this.buildTool = deps.buildTool;
    this.upstreamPath = deps.upstreamPath;
    this.logger = deps.logger;
  }

  async classify(
    targetRoot: string,
    changedPaths: Iterable<string>,
    fallback: RoutingDecision,
  ): Promise<RoutingDecision> {
    const paths = [...changedPaths].map((p) => path.posix.join(this.upstreamPath, p));
    if (paths.length === 0) {
      return fallback;
    }

    let counts: Map<string, number>;
    try {
      const report = await this.buildTool.classifyPaths(targetRoot, paths);
      counts = parseComponentReport(report);
    } catch (error) {
      this.logger.warn(
        `Classification failed, using ${fallback.primary}${SEPARATOR}${fallback.secondary}:`,
        error instanceof Error ? error.message : error,
      );
      return fallback;
    }

    const classification = chooseClassification(counts);
    const decision = classification === null ? null : toRoutingDecision(classification);
    if (!decision) {
      this.logger.info(`No usable classification in ${counts.size} candidate(s), using default`);
      return fallback;
    }
    return decision;
  }
}
