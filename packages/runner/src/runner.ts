import { readFileSync, readdirSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import {
  runConfigSchema,
  scenarioCaseSchema,
  type RunConfigInput,
  type ScenarioCase
} from '@skillcheck/schemas';
import type { JudgeSettings } from './config.js';
import type { JudgeClientFactory } from './judges/registry.js';
import { judgeScoreOf, toOutcomeReport } from './report.js';
import { ScenarioRunner } from './scenarioRunner.js';
import { now } from './util.js';
import type { CaseReport, SuiteReport } from './types.js';

export interface LoadedCase {
  file: string;
  scenarioCase: ScenarioCase;
  artifact: string;
}

export interface SuiteOptions {
  judgeSettings?: JudgeSettings;
  createClient?: JudgeClientFactory;
}

function readArtifact(scenarioCase: ScenarioCase, file: string): string {
  if (scenarioCase.artifact !== undefined) {
    return scenarioCase.artifact;
  }
  if (scenarioCase.artifactPath === undefined) {
    throw new Error(`Case ${scenarioCase.id} has neither artifact nor artifactPath`);
  }
  return readFileSync(resolve(dirname(file), scenarioCase.artifactPath), 'utf8');
}

export function loadCases(casesPath: string): LoadedCase[] {
  const files = readdirSync(casesPath)
    .filter((file) => file.endsWith('.json'))
    .sort();

  return files.map((file) => {
    const fullPath = join(casesPath, file);
    const parsed: unknown = JSON.parse(readFileSync(fullPath, 'utf8'));
    const result = scenarioCaseSchema.safeParse(parsed);
    if (!result.success) {
      throw new Error(`Invalid case file ${file}: ${result.error.message}`);
    }
    return {
      file: fullPath,
      scenarioCase: result.data,
      artifact: readArtifact(result.data, fullPath)
    };
  });
}

export async function runSuite(input: RunConfigInput, options: SuiteOptions = {}): Promise<SuiteReport> {
  const config = runConfigSchema.parse(input);
  const startedAt = now();
  const runner = new ScenarioRunner({
    threshold: config.threshold,
    ...(options.judgeSettings ? { judgeSettings: options.judgeSettings } : {}),
    ...(options.createClient ? { createClient: options.createClient } : {}),
    ...(config.crossDeadlineMs !== undefined ? { crossDeadlineMs: config.crossDeadlineMs } : {})
  });

  const cases = loadCases(config.casesPath);
  const caseReports: CaseReport[] = [];
  const judgeScores: number[] = [];

  for (const { scenarioCase, artifact } of cases) {
    const outcome = await runner.run({
      skill: scenarioCase.skill,
      scenario: scenarioCase.scenario,
      artifact,
      rules: scenarioCase.rules,
      criteria: scenarioCase.criteria,
      judgeMode: config.judgeMode
    });

    const score = judgeScoreOf(outcome.judge);
    if (score !== null) {
      judgeScores.push(score);
    }

    caseReports.push({
      id: scenarioCase.id,
      title: scenarioCase.title,
      tags: scenarioCase.tags,
      outcome: toOutcomeReport(outcome)
    });
  }

  const passed = caseReports.filter((report) => report.outcome.finalPass).length;

  return {
    runId: `${startedAt}_${config.suiteName}`,
    suiteName: config.suiteName,
    judgeMode: config.judgeMode,
    threshold: config.threshold,
    startedAt,
    finishedAt: now(),
    summary: {
      passed,
      failed: caseReports.length - passed,
      passRate: caseReports.length > 0 ? passed / caseReports.length : 0,
      averageJudgeScore:
        judgeScores.length > 0
          ? judgeScores.reduce((acc, score) => acc + score, 0) / judgeScores.length
          : null
    },
    cases: caseReports
  };
}
