/** Flag the editor tool uses to inline a whole file body into one action. */
export const FILE_TEXT_MARKER = "--file_text";

/** Terms expected in the filename or header of a reproduction artifact. */
export const FILE_KEYWORDS: readonly string[] = Object.freeze([
  "repro",
  "reproduce",
  "reproduction",
  "debug",
  "test",
  "tests",
  "pytest",
  "unit",
  "minimal",
]);

/** Phrases expected in the agent's reasoning when it sets up a reproduction. */
export const THOUGHT_KEYWORDS: readonly string[] = Object.freeze([
  "repro",
  "reproduce",
  "reproduction",
  "debug",
  "test case",
  "test to reproduce",
  "script to reproduce",
  "minimal example",
  "minimal repro",
  "unit test",
  "pytest",
]);

const CREATION_MARKERS: readonly string[] = [
  "str_replace_editor create",
  "apply_patch",
  "cat <<",
  "cat >",
  "tee ",
  "printf ",
  "echo ",
  "touch ",
];

const LINE_BREAK_PATTERN = /\r\n|[\n\v\f\r\x1c-\x1e\x85\u2028\u2029]/;

const ABSOLUTE_PATH_PATTERN = /\/[^\s'"`]+/g;

const DOTTED_PATH_PATTERN = /[A-Za-z0-9_./\\-]+\.[A-Za-z0-9_.-]+/g;

/**
 * Command prefix of an action. Everything from the inline file marker on, or
 * everything after the first line, is payload.
 */
export function actionHeader(actionText: string): string {
  if (!actionText) {
    return "";
  }
  const markerAt = actionText.indexOf(FILE_TEXT_MARKER);
  if (markerAt >= 0) {
    return actionText.slice(0, markerAt);
  }
  return actionText.split(LINE_BREAK_PATTERN)[0] ?? "";
}

export function isCreationAction(header: string): boolean {
  const lowered = header.toLowerCase();
  return CREATION_MARKERS.some((marker) => lowered.includes(marker));
}

function stripQuotes(token: string): string {
  return token.replace(/^['"]+|['"]+$/g, "");
}

/**
 * Path-like tokens in first-seen order: absolute paths first, then dotted
 * names. May miss names with spaces and may catch tokens that are not paths.
 */
export function extractFilenames(text: string): string[] {
  const candidates: string[] = [];
  for (const match of text.matchAll(ABSOLUTE_PATH_PATTERN)) {
    candidates.push(match[0]);
  }
  for (const match of text.matchAll(DOTTED_PATH_PATTERN)) {
    candidates.push(match[0]);
  }

  const output: string[] = [];
  const seen = new Set<string>();
  for (const candidate of candidates) {
    const cleaned = stripQuotes(candidate);
    if (seen.has(cleaned)) {
      continue;
    }
    seen.add(cleaned);
    output.push(cleaned);
  }

  return output;
}

/** Case-insensitive substring match; no word boundaries. */
export function hasKeyword(text: string, keywords: readonly string[]): boolean {
  const lowered = text.toLowerCase();
  return keywords.some((keyword) => lowered.includes(keyword));
}

export function collapseWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(" ");
}

export function clipText(text: string, limit: number): string {
  const collapsed = collapseWhitespace(text);
  if (collapsed.length <= limit) {
    return collapsed;
  }
  return `${collapsed.slice(0, limit)}...`;
}
