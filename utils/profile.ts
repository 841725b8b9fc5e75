import { Profile, ProfileInput } from '../types';
import { normalizeSkill } from './textNormalization';

function collectSkills(skills: readonly string[] | undefined, displayNames: Map<string, string>): Set<string> {
  const tokens = new Set<string>();
  for (const skill of skills ?? []) {
    if (typeof skill !== 'string') continue;
    const token = normalizeSkill(skill);
    if (!token) continue;
    tokens.add(token);
    if (!displayNames.has(token)) {
      displayNames.set(token, skill.trim());
    }
  }
  return tokens;
}

export function joinEducation(education: string | readonly string[] | undefined): string {
  if (!education) return '';
  if (typeof education === 'string') return education.trim();
  return education
    .filter(entry => typeof entry === 'string' && entry.trim().length > 0)
    .map(entry => entry.trim())
    .join('; ');
}

/**
 * Fill every field of a profile from the loose input shape.
 */
export function buildProfile(input: ProfileInput, fallbackId: string = 'unknown'): Profile {
  const displayNames = new Map<string, string>();
  const experienceYears = typeof input.experienceYears === 'number' && Number.isFinite(input.experienceYears)
    ? Math.max(0, input.experienceYears)
    : 0;

  return {
    id: input.id ?? fallbackId,
    technicalSkills: collectSkills(input.technicalSkills, displayNames),
    softSkills: collectSkills(input.softSkills, displayNames),
    experienceYears,
    educationText: joinEducation(input.education),
    embedding: Array.isArray(input.embedding) ? [...input.embedding] : [],
    text: (input.text ?? '').trim(),
    name: (input.name ?? '').trim(),
    title: (input.title ?? '').trim(),
    currentPosition: (input.currentPosition ?? '').trim(),
    availability: (input.availability ?? '').trim(),
    displayNames
  };
}

export function displayName(profile: Profile, token: string): string {
  return profile.displayNames.get(token) ?? token;
}
