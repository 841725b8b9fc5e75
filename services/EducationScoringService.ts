import degreeTable from '../data/degree-levels.json';
import {
  EDUCATION_BELOW_FLOOR,
  EDUCATION_EXCESS_CAP,
  EDUCATION_EXCESS_STEP,
  EDUCATION_MEETS_BASE,
  EDUCATION_UNKNOWN_WITH_REQUIREMENT,
  EDUCATION_UNSPECIFIED_BASE,
  EDUCATION_UNSPECIFIED_DIVISOR,
  EDUCATION_UNSPECIFIED_UNKNOWN
} from '../config/scoringPolicy';
import { escapeRegex, foldDiacritics } from '../utils/textNormalization';

export interface DegreeLevel {
  name: string;
  level: number;
  keywords: readonly string[];
}

interface KeywordPattern {
  keyword: string;
  level: number;
  pattern: RegExp;
}

export function normalizeEducationText(text: string): string {
  return foldDiacritics(text)
    .toLowerCase()
    .replace(/[’`]/g, "'")
    .replace(/\bbac\s*\+\s*(\d)/g, 'bac+$1')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Infers an ordinal degree level from free text and compares candidate
 * against requirement. Meeting the bar scores at least 0.85; falling short
 * scores the level ratio with a 0.3 floor.
 */
export class EducationScoringService {
  private readonly patterns: KeywordPattern[];

  constructor(ladder: readonly DegreeLevel[] = degreeTable.levels) {
    this.patterns = ladder
      .flatMap(entry => entry.keywords.map(keyword => {
        const normalized = normalizeEducationText(keyword);
        return {
          keyword: normalized,
          level: entry.level,
          pattern: new RegExp(`(?<![a-z0-9])${escapeRegex(normalized)}(?![a-z0-9])`, 'g')
        };
      }))
      // longest keyword first so "bac+5" wins over "bac"
      .sort((a, b) => b.keyword.length - a.keyword.length || b.level - a.level);
  }

  /**
   * Highest ladder level mentioned in the text, 0 when nothing matches.
   * The text may hold several entries ("Master ...; Bac ...").
   */
  inferLevel(text: string | null | undefined): number {
    if (!text) return 0;
    let remaining = normalizeEducationText(text);
    let best = 0;

    for (const { level, pattern } of this.patterns) {
      pattern.lastIndex = 0;
      if (!pattern.test(remaining)) continue;
      best = Math.max(best, level);
      pattern.lastIndex = 0;
      // blank out the span so shorter keywords inside it do not match again
      remaining = remaining.replace(pattern, match => ' '.repeat(match.length));
    }

    return best;
  }

  score(candidateEducation: string, requiredEducation: string): number {
    return this.scoreLevels(this.inferLevel(candidateEducation), this.inferLevel(requiredEducation));
  }

  scoreLevels(candidateLevel: number, requiredLevel: number): number {
    if (requiredLevel > 0) {
      if (candidateLevel <= 0) {
        return EDUCATION_UNKNOWN_WITH_REQUIREMENT;
      }
      if (candidateLevel >= requiredLevel) {
        const bonus = Math.min(EDUCATION_EXCESS_CAP, (candidateLevel - requiredLevel) * EDUCATION_EXCESS_STEP);
        return Math.min(1.0, EDUCATION_MEETS_BASE + bonus);
      }
      // capped so a near miss never outranks meeting the requirement
      return Math.min(EDUCATION_MEETS_BASE, Math.max(EDUCATION_BELOW_FLOOR, candidateLevel / requiredLevel));
    }

    if (candidateLevel > 0) {
      return Math.min(1.0, EDUCATION_UNSPECIFIED_BASE + candidateLevel / EDUCATION_UNSPECIFIED_DIVISOR);
    }
    return EDUCATION_UNSPECIFIED_UNKNOWN;
  }
}
