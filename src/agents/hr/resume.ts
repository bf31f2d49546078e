// ═══════════════════════════════════════════════════════════════
// Agent::HR :: Resume Screening
// Keyword fallback parser and candidate scoring
// ═══════════════════════════════════════════════════════════════

import fs from 'fs';
import { z } from 'zod';
import { CONFIG } from '../../core/config.js';
import type { CandidateEvaluation, JobPosition } from '../../store/schemas.js';

const ResumeKeywordsSchema = z.object({
  keywords: z.array(z.string()),
  displayNames: z.record(z.string(), z.string()),
  education: z.array(z.object({
    label: z.string(),
    level: z.number().int(),
    markers: z.array(z.string()),
  })),
  experiencePatterns: z.array(z.string()),
});

export type ResumeKeywords = z.infer<typeof ResumeKeywordsSchema>;

export interface ParsedResume {
  skills: string[];
  experienceYears: number;
  education: string;
}

export const NOT_SPECIFIED = 'Not Specified';

export function loadResumeKeywords(file: string = CONFIG.data.resumeKeywordsPath): ResumeKeywords {
  return ResumeKeywordsSchema.parse(JSON.parse(fs.readFileSync(file, 'utf-8')));
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function titleCase(s: string): string {
  return s.split(' ').map(w => w.charAt(0).toUpperCase() + w.slice(1)).join(' ');
}

/** Keyword appears as a standalone token, so "ai" does not hit "maintained" */
function mentions(text: string, keyword: string): boolean {
  return new RegExp(`(?<![a-z0-9])${escapeRegExp(keyword)}(?![a-z0-9])`).test(text);
}

/** 0 when no known qualification is mentioned */
export function educationLevel(text: string, table: ResumeKeywords['education']): number {
  const lower = text.toLowerCase();
  const entry = table.find(e => e.markers.some(m => lower.includes(m)));
  return entry ? entry.level : 0;
}

export function fallbackParseResume(text: string, kw: ResumeKeywords): ParsedResume {
  const lower = text.toLowerCase();

  const skills = new Set<string>();
  for (const keyword of kw.keywords) {
    if (mentions(lower, keyword)) skills.add(kw.displayNames[keyword] ?? titleCase(keyword));
  }

  let experienceYears = 0;
  for (const pattern of kw.experiencePatterns) {
    const m = lower.match(new RegExp(pattern));
    if (m?.[1]) experienceYears = Math.max(experienceYears, parseInt(m[1], 10));
  }

  const education = kw.education.find(e => e.markers.some(m => lower.includes(m)))?.label ?? NOT_SPECIFIED;

  return { skills: [...skills].sort(), experienceYears, education };
}

// ── Scoring ──

export interface CandidateProfile {
  extractedSkills: string[];
  experienceYears: number;
  education: string;
}

export interface ScoringRules {
  acceptThreshold: number;
  reviewThreshold: number;
  experiencePenalty: number;
  educationPenalty: number;
  education: ResumeKeywords['education'];
}

/** Skill match percentage, reduced when experience or education falls short */
export function scoreCandidate(candidate: CandidateProfile, job: JobPosition, rules: ScoringRules, evaluatedAt: Date): CandidateEvaluation {
  const required = new Set(job.requiredSkills.map(s => s.toLowerCase()));
  const have = new Set(candidate.extractedSkills.map(s => s.toLowerCase()));
  const matched = [...required].filter(s => have.has(s));
  const skillPct = required.size > 0 ? (matched.length / required.size) * 100 : 0;

  const experienceMet = candidate.experienceYears >= job.minExperience;
  const educationMet = educationLevel(candidate.education, rules.education) >= educationLevel(job.minEducation, rules.education);

  let score = skillPct;
  if (!experienceMet) score *= rules.experiencePenalty;
  if (!educationMet) score *= rules.educationPenalty;

  const shown = score.toFixed(1);
  let decision: CandidateEvaluation['decision'];
  let message: string;
  if (score >= rules.acceptThreshold) {
    decision = 'Accepted';
    message = `Score ${shown}% meets threshold`;
  } else if (score >= rules.reviewThreshold) {
    decision = 'Pending Review';
    message = `Score ${shown}% needs manual review`;
  } else {
    decision = 'Rejected';
    message = `Score ${shown}% below minimum`;
  }

  return {
    score: Math.round(score * 100) / 100,
    skillMatchPercentage: Math.round(skillPct * 100) / 100,
    matchedSkills: matched,
    experienceMet,
    educationMet,
    decision,
    message,
    evaluatedDate: evaluatedAt.toISOString(),
  };
}
