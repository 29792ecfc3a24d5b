import { posix } from "node:path";

import type { Commit, Contributor, Rng } from "../core/index.js";

export interface CommitType {
  type: string;
  /** `{}` is replaced by the component name. */
  template: string;
}

export const COMMIT_TYPES: readonly CommitType[] = [
  { type: "feat", template: "Add {}" },
  { type: "fix", template: "Fix bug in {}" },
  { type: "refactor", template: "Refactor {}" },
  { type: "docs", template: "Update documentation for {}" },
  { type: "test", template: "Add tests for {}" },
  { type: "chore", template: "Update dependencies" },
];

export const INITIAL_COMMIT_MESSAGE = "Initial commit";

export interface TimelineOptions {
  spanDays: number;
  minGapHours: number;
  maxGapHours: number;
}

export const DEFAULT_TIMELINE: TimelineOptions = {
  spanDays: 365,
  minGapHours: 1,
  maxGapHours: 48,
};

export interface ScheduleInput {
  /** Manifest paths in manifest order. */
  files: readonly string[];
  bootstrapFiles: readonly string[];
  targetCommits: number;
  contributors: readonly Contributor[];
  now: Date;
  timeline?: Partial<TimelineOptions>;
}

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;
/** Feature commits are sized to leave this many commits of headroom. */
const COMMIT_HEADROOM = 10;

/** `now` minus `spanDays`, truncated to whole seconds. */
export function bootstrapTimestamp(now: Date, spanDays: number): Date {
  return new Date(Math.floor((now.getTime() - spanDays * DAY_MS) / 1000) * 1000);
}

export function batchSizeFor(remaining: number, targetCommits: number): number {
  if (targetCommits <= COMMIT_HEADROOM) return 1;
  return Math.max(1, Math.floor(remaining / (targetCommits - COMMIT_HEADROOM)));
}

/** First path segment, or `core` for files at the repository root. */
export function componentOf(path: string): string {
  const [head, ...rest] = path.split(posix.sep);
  return rest.length > 0 && head ? head : "core";
}

export function formatCommitMessage(commitType: CommitType, component: string): string {
  return `${commitType.type}: ${commitType.template.replace("{}", component)}`;
}

/**
 * Plan the history of one repository: a bootstrap commit a year back, then
 * batched feature commits walking forward in 1-48 hour gaps. Every manifest
 * file lands in exactly one commit, even when `targetCommits` runs out first.
 */
export function scheduleCommits(input: ScheduleInput, rng: Rng): Commit[] {
  const [founder] = input.contributors;
  if (!founder) {
    throw new RangeError("scheduleCommits() needs at least one contributor");
  }

  const timeline = { ...DEFAULT_TIMELINE, ...input.timeline };
  const ceiling = Math.max(1, input.targetCommits);
  const bootstrap = new Set(input.bootstrapFiles);
  const remaining = input.files.filter((file) => !bootstrap.has(file));

  const bootstrapMs = bootstrapTimestamp(input.now, timeline.spanDays).getTime();
  const commits: Commit[] = [
    {
      index: 0,
      timestamp: new Date(bootstrapMs),
      author: founder,
      message: INITIAL_COMMIT_MESSAGE,
      files: [...input.bootstrapFiles],
    },
  ];

  // A single-commit budget folds everything into the bootstrap commit.
  if (ceiling === 1) {
    commits[0].files.push(...remaining);
    return commits;
  }

  const batchSize = batchSizeFor(remaining.length, input.targetCommits);
  let cursor = 0;
  let timestampMs = bootstrapMs;

  while (cursor < remaining.length) {
    const last = commits.length + 1 === ceiling;
    const files = last ? remaining.slice(cursor) : remaining.slice(cursor, cursor + batchSize);
    cursor += files.length;

    const commitType = rng.pick(COMMIT_TYPES);
    const author = rng.pick(input.contributors);
    timestampMs += rng.int(timeline.minGapHours, timeline.maxGapHours) * HOUR_MS;

    commits.push({
      index: commits.length,
      timestamp: new Date(timestampMs),
      author,
      message: formatCommitMessage(commitType, componentOf(files[0])),
      files,
    });
  }

  return commits;
}
