import { SkillMatchingService } from '../services/SkillMatchingService';

describe('SkillMatchingService', () => {
  describe('with the bundled synonym table', () => {
    const matcher = new SkillMatchingService();

    const job = ['JavaScript', 'Python', 'Java', 'SQL'];

    it('should credit one exact and two alias matches out of three', () => {
      const score = matcher.score(['Python', 'ReactJS', 'AWS'], ['Python', 'React', 'Amazon Web Services']);
      expect(score).toBeCloseTo((1 + 0.7 + 0.7) / 3);
    });

    it('should score one exact match out of four as 0.25', () => {
      expect(matcher.score(['Python'], job)).toBe(0.25);
    });

    it('should score an alias-only match below an exact match', () => {
      const aliasOnly = matcher.score(['JS'], job);

      expect(aliasOnly).toBeCloseTo(0.7 / 4);
      expect(aliasOnly).toBeLessThan(matcher.score(['Python'], job));
    });

    it('should score half of the required skills below all of them', () => {
      const half = matcher.score(['JavaScript', 'Python'], job);

      expect(half).toBe(0.5);
      expect(half).toBeLessThan(matcher.score(job, job));
      expect(matcher.score(job, job)).toBe(1.0);
    });

    it('should report the skills the score leaves out as missing', () => {
      const analysis = matcher.analyze(['JavaScript', 'Python'], job);

      expect(analysis.exactMatches).toEqual(['javascript', 'python']);
      expect(analysis.synonymMatches).toEqual([]);
      expect(analysis.missingSkills).toEqual(['java', 'sql']);
    });

    it('should know common aliases', () => {
      expect(matcher.areSynonyms('JS', 'JavaScript')).toBe(true);
      expect(matcher.areSynonyms('k8s', 'Kubernetes')).toBe(true);
      expect(matcher.areSynonyms('Python', 'Java')).toBe(false);
    });
  });

  describe('with a custom synonym table', () => {
    const matcher = new SkillMatchingService({
      javascript: ['js'],
      kubernetes: ['k8s']
    });

    it('should score verbatim skills as 1.0', () => {
      expect(matcher.score(['Go', 'Rust'], ['go', 'rust'])).toBe(1.0);
    });

    it('should ignore case and surrounding whitespace', () => {
      expect(matcher.score(['  DOCKER '], ['docker'])).toBe(1.0);
    });

    it('should score the exact share when no synonyms apply', () => {
      expect(matcher.score(['Go', 'Rust'], ['Go', 'Rust', 'Docker', 'Terraform'])).toBe(0.5);
    });

    it('should credit synonym matches at 70%', () => {
      // docker exact, javascript through js
      const score = matcher.score(['JS', 'Docker'], ['JavaScript', 'Go', 'Rust', 'Docker']);
      expect(score).toBeCloseTo((1 + 0.7) / 4);
    });

    it('should give partial credit when the job lists no skills', () => {
      expect(matcher.score(['Go'], [])).toBe(0.5);
      expect(matcher.score([], [])).toBe(0);
    });

    it('should score 0 for a candidate without skills', () => {
      expect(matcher.score([], ['Go'])).toBe(0);
    });

    it('should expand tokens to their whole group', () => {
      expect([...matcher.expand(['K8s'])]).toEqual(['k8s', 'kubernetes']);
      expect([...matcher.expand(['Go'])]).toEqual(['go']);
    });

    it('should split job skills into exact, synonym and missing', () => {
      const analysis = matcher.analyze(['JS', 'Docker'], ['JavaScript', 'Go', 'Docker']);

      expect(analysis.exactMatches).toEqual(['docker']);
      expect(analysis.synonymMatches).toEqual([{ jobSkill: 'javascript', candidateSkill: 'js' }]);
      expect(analysis.missingSkills).toEqual(['go']);
    });

    it('should never score above 1', () => {
      const score = matcher.score(['js', 'javascript', 'k8s', 'kubernetes'], ['JavaScript']);
      expect(score).toBe(1.0);
    });
  });
});
