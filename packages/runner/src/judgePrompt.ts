import type { SkillRef } from '@skillcheck/schemas';
import type { JudgePrompt } from './types.js';

export const JUDGE_SYSTEM_PROMPT =
  'You are a strict code reviewer grading generated code against a named skill. ' +
  'Answer with a single JSON object and nothing else.';

export function formatSkill(skill: SkillRef): string {
  return `${skill.domain}/${skill.name}`;
}

// Fence must be longer than any backtick run in the artifact.
function fenceFor(artifact: string): string {
  const runs = artifact.match(/`+/g) ?? [];
  const longest = runs.reduce((max, run) => Math.max(max, run.length), 0);
  return '`'.repeat(Math.max(3, longest + 1));
}

export function buildJudgePrompt(
  skill: SkillRef,
  scenario: string,
  artifact: string,
  criteria: string[] = []
): JudgePrompt {
  const fence = fenceFor(artifact);
  const sections = [
    `# Skill\n${formatSkill(skill)}`,
    `# Scenario\n${scenario}`,
    `# Generated artifact\n${fence}\n${artifact}\n${fence}`
  ];

  if (criteria.length > 0) {
    sections.push(`# Review criteria\n${criteria.map((c, i) => `${i + 1}. ${c}`).join('\n')}`);
  }

  sections.push(
    [
      '# Response format',
      'Evaluate whether the artifact fulfils the scenario while following the skill.',
      'Score from 0 (unusable) to 5 (exemplary). Respond with JSON only:',
      '{ "pass": <boolean>, "overall_score": <number 0-5>, "issues": [<string>, ...] }'
    ].join('\n')
  );

  return {
    skill,
    system: JUDGE_SYSTEM_PROMPT,
    text: sections.join('\n\n')
  };
}
