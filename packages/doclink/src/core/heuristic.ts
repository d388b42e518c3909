import { toEntityRef, toSectionRef } from "../types/index.js";

import type { CodeEntity, DocSection, LinkSuggestion } from "../types/index.js";

// strictly greater than; a score of exactly 0.80 is not proposed
export const MIN_CONFIDENCE = 0.8;

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current.push(
        Math.min(
          (previous[j] ?? 0) + 1, // deletion
          (current[j - 1] ?? 0) + 1, // insertion
          (previous[j - 1] ?? 0) + cost, // substitution
        ),
      );
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}

/** Normalized edit-distance similarity in [0, 1]. */
export function similarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - levenshtein(a, b) / longest;
}

function words(text: string): string {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(Boolean)
    .join(" ");
}

// createUser, create_user, CreateUser -> "create user"
export function entityKey(name: string): string {
  return words(
    name
      .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
      .replace(/([A-Z]+)([A-Z][a-z])/g, "$1 $2")
      .replace(/([A-Za-z])(\d)/g, "$1 $2")
      .replace(/(\d)([A-Za-z])/g, "$1 $2"),
  );
}

export function titleKey(title: string): string {
  return words(title);
}

export function scoreMatch(entity: CodeEntity, section: DocSection): number {
  const key = entityKey(entity.name);
  const byId = similarity(key, entityKey(section.id));
  if (section.title === undefined) return byId;
  return Math.max(similarity(key, titleKey(section.title)), byId);
}

/**
 * Propose links for unlinked entities among sections no entity targets yet.
 * One suggestion per entity at most; ties go to the earliest section.
 */
export function findCandidates(
  entities: readonly CodeEntity[],
  sections: readonly DocSection[],
): LinkSuggestion[] {
  const targeted = new Set(entities.flatMap((e) => (e.docId !== undefined ? [e.docId] : [])));
  const openSections = sections.filter((s) => !targeted.has(s.id));
  const suggestions: LinkSuggestion[] = [];

  for (const entity of entities) {
    if (entity.docId !== undefined) continue;

    let best: { section: DocSection; score: number } | null = null;
    for (const section of openSections) {
      const score = scoreMatch(entity, section);
      if (score <= MIN_CONFIDENCE) continue;
      if (!best || score > best.score) best = { section, score };
    }

    if (best) {
      suggestions.push({ entity: toEntityRef(entity), section: toSectionRef(best.section), score: best.score });
    }
  }

  return suggestions;
}
