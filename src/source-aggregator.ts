import type { RoundRecord, Source } from "./types";

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * Narrow one attribution entry. Anything malformed counts as "no source";
 * tool output is data from outside the type system.
 */
function toSource(value: unknown): Source | undefined {
  if (!value || typeof value !== "object") return undefined;
  const displayText: unknown = Reflect.get(value, "displayText");
  if (!isNonEmptyString(displayText)) return undefined;
  const link: unknown = Reflect.get(value, "link");
  return isNonEmptyString(link) ? { displayText, link } : { displayText };
}

/**
 * Collect attributions across every round in order, keeping the first
 * occurrence of each (displayText, link) pair. Failed results contribute
 * nothing.
 */
export function aggregateSources(roundLog: readonly RoundRecord[]): Source[] {
  const seen = new Set<string>();
  const sources: Source[] = [];

  for (const round of roundLog) {
    for (const result of round.toolResults) {
      if (!result.succeeded || !Array.isArray(result.sources)) continue;

      for (const entry of result.sources) {
        const source = toSource(entry);
        if (!source) continue;

        const key = JSON.stringify([source.displayText, source.link ?? null]);
        if (seen.has(key)) continue;
        seen.add(key);
        sources.push(source);
      }
    }
  }

  return sources;
}
