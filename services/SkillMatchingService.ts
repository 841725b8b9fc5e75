import synonymTable from '../data/skill-synonyms.json';
import {
  EXACT_MATCH_WEIGHT,
  SKILLS_UNSPECIFIED_CREDIT,
  SYNONYM_MATCH_WEIGHT
} from '../config/scoringPolicy';
import { normalizeSkill, normalizeSkillSet } from '../utils/textNormalization';

export type SynonymGroups = Readonly<Record<string, readonly string[]>>;

export interface SkillMatchAnalysis {
  score: number;
  exactMatches: string[];
  // job skill -> candidate skill that satisfied it through a synonym group
  synonymMatches: Array<{ jobSkill: string; candidateSkill: string }>;
  missingSkills: string[];
}

/**
 * Skill overlap scoring with synonym expansion.
 *
 * Each normalized job skill earns full credit when the candidate lists it,
 * 70% when the candidate only lists an alias from the same synonym group,
 * nothing otherwise. The sum is divided by the number of job skills, so a
 * candidate listing the required skills verbatim always scores 1.0.
 */
export class SkillMatchingService {
  // token -> every group (canonical + aliases) containing it
  private readonly groupsByToken: Map<string, Set<string>[]> = new Map();

  constructor(groups: SynonymGroups = synonymTable.groups) {
    for (const [canonical, aliases] of Object.entries(groups)) {
      const group = normalizeSkillSet([canonical, ...aliases]);
      for (const token of group) {
        const existing = this.groupsByToken.get(token);
        if (existing) {
          existing.push(group);
        } else {
          this.groupsByToken.set(token, [group]);
        }
      }
    }
  }

  normalize(skills: Iterable<string>): Set<string> {
    return normalizeSkillSet(skills);
  }

  /**
   * Add every synonym group member reachable from the given tokens.
   */
  expand(skills: Iterable<string>): Set<string> {
    const expanded = new Set<string>();
    for (const skill of skills) {
      const token = normalizeSkill(skill);
      if (!token) continue;
      expanded.add(token);
      for (const group of this.groupsByToken.get(token) ?? []) {
        for (const member of group) {
          expanded.add(member);
        }
      }
    }
    return expanded;
  }

  areSynonyms(a: string, b: string): boolean {
    const tokenA = normalizeSkill(a);
    const tokenB = normalizeSkill(b);
    if (tokenA === tokenB) return true;
    return (this.groupsByToken.get(tokenA) ?? []).some(group => group.has(tokenB));
  }

  score(candidateSkills: Iterable<string>, jobSkills: Iterable<string>): number {
    return this.analyze(candidateSkills, jobSkills).score;
  }

  analyze(candidateSkills: Iterable<string>, jobSkills: Iterable<string>): SkillMatchAnalysis {
    const candidate = this.normalize(candidateSkills);
    const job = this.normalize(jobSkills);

    if (job.size === 0) {
      return {
        score: candidate.size > 0 ? SKILLS_UNSPECIFIED_CREDIT : 0.0,
        exactMatches: [],
        synonymMatches: [],
        missingSkills: []
      };
    }

    // credit per job skill: exact first, else any candidate alias from a shared group
    const exactMatches: string[] = [];
    const synonymMatches: Array<{ jobSkill: string; candidateSkill: string }> = [];
    const missingSkills: string[] = [];
    let credit = 0;

    for (const jobSkill of job) {
      if (candidate.has(jobSkill)) {
        exactMatches.push(jobSkill);
        credit += EXACT_MATCH_WEIGHT;
        continue;
      }
      const alias = [...candidate].find(candidateSkill => this.areSynonyms(jobSkill, candidateSkill));
      if (alias) {
        synonymMatches.push({ jobSkill, candidateSkill: alias });
        credit += SYNONYM_MATCH_WEIGHT;
      } else {
        missingSkills.push(jobSkill);
      }
    }

    const score = Math.min(1.0, credit / job.size);

    return {
      score,
      exactMatches,
      synonymMatches,
      missingSkills
    };
  }
}
