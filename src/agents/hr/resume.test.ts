import { describe, it, expect } from 'vitest';
import { TEST_NOW, testSeed } from '../../test-utils/mocks.js';
import { educationLevel, fallbackParseResume, loadResumeKeywords, scoreCandidate, type ScoringRules } from './resume.js';

const kw = loadResumeKeywords();

const rules: ScoringRules = {
  acceptThreshold: 50,
  reviewThreshold: 40,
  experiencePenalty: 0.7,
  educationPenalty: 0.8,
  education: kw.education,
};

function backendJob() {
  const [job] = testSeed().jobPositions;
  if (!job) throw new Error('seed job missing');
  return job;
}

describe('fallbackParseResume', () => {
  it('should find whole-word skills, years and the highest listed degree', () => {
    const text = 'Maintained Go Lang services on Kubernetes (k8s) with Java, not JavaScript; 7+ yrs. MBA.';

    expect(fallbackParseResume(text, kw)).toEqual({
      skills: ['Golang', 'Java', 'Javascript', 'Kubernetes'],
      experienceYears: 7,
      education: "Master's Degree",
    });
  });

  it('should return empty results for text without keywords', () => {
    expect(fallbackParseResume('Recent graduate', kw)).toEqual({
      skills: [],
      experienceYears: 0,
      education: 'Not Specified',
    });
  });
});

describe('educationLevel', () => {
  it('should rank qualifications', () => {
    expect(educationLevel('PhD', kw.education)).toBe(5);
    expect(educationLevel("Bachelor's Degree", kw.education)).toBe(3);
    expect(educationLevel('Not Specified', kw.education)).toBe(0);
  });
});

describe('scoreCandidate', () => {
  it('should accept a full skill match despite missing experience', () => {
    const result = scoreCandidate(
      { extractedSkills: ['python', 'SQL', 'Docker', 'AWS'], experienceYears: 1, education: "Master's Degree" },
      backendJob(), rules, TEST_NOW,
    );

    expect(result).toEqual({
      score: 70,
      skillMatchPercentage: 100,
      matchedSkills: ['python', 'sql', 'docker', 'aws'],
      experienceMet: false,
      educationMet: true,
      decision: 'Accepted',
      message: 'Score 70.0% meets threshold',
      evaluatedDate: '2026-03-10T09:00:00.000Z',
    });
  });

  it('should send borderline candidates to manual review', () => {
    const result = scoreCandidate(
      { extractedSkills: ['Python', 'SQL'], experienceYears: 5, education: 'Diploma' },
      backendJob(), rules, TEST_NOW,
    );

    expect(result).toMatchObject({ score: 40, decision: 'Pending Review', message: 'Score 40.0% needs manual review' });
  });

  it('should apply both penalties and reject', () => {
    const result = scoreCandidate(
      { extractedSkills: ['Python', 'SQL'], experienceYears: 2, education: 'Diploma' },
      backendJob(), rules, TEST_NOW,
    );

    expect(result).toMatchObject({ score: 28, experienceMet: false, educationMet: false, decision: 'Rejected' });
  });
});
