/**
 * Run labels.
 *
 * A run label becomes part of the result artifact's file name, so it is
 * restricted to a filename-safe character set: lowercase ASCII
 * alphanumerics, underscore and hyphen. Labels may not be empty and may not
 * start with a hyphen (it would read as a flag when passed on a command
 * line).
 */

import { ConfigurationError } from "./errors";

export type SlugProblem =
  | { type: "empty" }
  | { type: "leading-hyphen" }
  | { type: "bad-character"; character: string };

const SLUG_CHAR = /^[a-z0-9_-]$/;

/**
 * Returns the first problem with `candidate`, or undefined if it is a valid slug.
 */
export function checkSlug(candidate: string): SlugProblem | undefined {
  if (candidate.length === 0) {
    return { type: "empty" };
  }
  if (candidate.startsWith("-")) {
    return { type: "leading-hyphen" };
  }
  for (const character of candidate) {
    if (!SLUG_CHAR.test(character)) {
      return { type: "bad-character", character };
    }
  }
  return undefined;
}

export function describeSlugProblem(problem: SlugProblem): string {
  switch (problem.type) {
    case "empty":
      return "must not be empty";
    case "leading-hyphen":
      return "must not start with a hyphen";
    case "bad-character":
      return `contains disallowed character ${JSON.stringify(problem.character)}`;
  }
}

export function assertRunLabel(label: string): string {
  const problem = checkSlug(label);
  if (problem) {
    throw new ConfigurationError(
      label,
      `Invalid run label "${label}": ${describeSlugProblem(problem)}`
    );
  }
  return label;
}

/**
 * Default label for a run: `<target>-<yyyymmdd>-<hhmmss>` in UTC.
 *
 * The target part is squashed into the slug alphabet; whether the target
 * itself is valid is decided later by the target resolver.
 */
export function defaultRunLabel(target: string, now: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  const prefix = target
    .toLowerCase()
    .replace(/[^a-z0-9_-]/g, "_")
    .replace(/^-+/, "");
  return `${prefix || "run"}-${date}-${time}`;
}
