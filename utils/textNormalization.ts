/**
 * Text helpers shared by the skill matcher and the education scorer
 */

export function normalizeSkill(skill: string): string {
  return skill
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Lowercase, trim and de-duplicate a skill list. Empty tokens are dropped.
 * Idempotent: normalizing an already normalized set returns the same set.
 */
export function normalizeSkillSet(skills: Iterable<string>): Set<string> {
  const normalized = new Set<string>();
  for (const skill of skills) {
    if (typeof skill !== 'string') continue;
    const token = normalizeSkill(skill);
    if (token) {
      normalized.add(token);
    }
  }
  return normalized;
}

export function foldDiacritics(text: string): string {
  return text.normalize('NFD').replace(/[\u0300-\u036f]/g, '');
}

export function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function intersect<T>(a: Set<T>, b: Set<T>): Set<T> {
  const result = new Set<T>();
  for (const value of a) {
    if (b.has(value)) {
      result.add(value);
    }
  }
  return result;
}
