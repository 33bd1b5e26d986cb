import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { beforeEach, describe, expect, it } from 'vitest';
import { defaultJudgeSettings } from '../config.js';
import { loadCases, runSuite } from '../runner.js';

let casesPath: string;

function writeCase(file: string, body: Record<string, unknown>): void {
  writeFileSync(join(casesPath, file), JSON.stringify(body), 'utf8');
}

const skill = { domain: 'frontend', name: 'turbo-page-refresh' };

beforeEach(() => {
  casesPath = mkdtempSync(join(tmpdir(), 'skillcheck-cases-'));
  mkdirSync(join(casesPath, 'artifacts'));
  writeFileSync(join(casesPath, 'artifacts', 'layout.html.erb'), '<body data-turbo-refresh-method="morph">', 'utf8');

  writeCase('b-inline.json', {
    schemaVersion: '0.1.0',
    id: 'inline',
    title: 'Inline artifact',
    skill,
    scenario: 'Broadcast refreshes',
    artifact: 'broadcast_append_to "feedbacks"',
    rules: [{ id: 'no-append', pattern: 'broadcast_append_to', polarity: 'absent', message: 'No append' }]
  });
  writeCase('a-file.json', {
    schemaVersion: '0.1.0',
    id: 'from-file',
    title: 'Artifact on disk',
    skill,
    scenario: 'Add morphing',
    artifactPath: 'artifacts/layout.html.erb',
    rules: [{ id: 'morph', kind: 'literal', pattern: 'morph', polarity: 'present', message: 'Needs morph' }],
    tags: ['layout']
  });
  writeFileSync(join(casesPath, 'notes.txt'), 'not a case', 'utf8');
});

describe('loadCases', () => {
  it('loads json cases in file order and resolves artifact paths', () => {
    const cases = loadCases(casesPath);

    expect(cases.map((loaded) => loaded.scenarioCase.id)).toEqual(['from-file', 'inline']);
    expect(cases[0]?.artifact).toBe('<body data-turbo-refresh-method="morph">');
    expect(cases[0]?.scenarioCase.rules[0]?.required).toBe(true);
    expect(cases[1]?.scenarioCase.rules[0]?.kind).toBe('regex');
  });

  it('rejects a case with both artifact sources', () => {
    writeCase('c-bad.json', {
      schemaVersion: '0.1.0',
      id: 'bad',
      title: 'Bad',
      skill,
      scenario: 's',
      artifact: 'x',
      artifactPath: 'artifacts/layout.html.erb'
    });

    expect(() => loadCases(casesPath)).toThrow(/^Invalid case file c-bad\.json: /);
  });
});

describe('runSuite', () => {
  it('summarizes every case with the mock judge', async () => {
    const report = await runSuite(
      { suiteName: 'turbo', casesPath, judgeMode: { type: 'single', provider: 'mock' } },
      { judgeSettings: defaultJudgeSettings() }
    );

    expect(report.suiteName).toBe('turbo');
    expect(report.runId).toBe(`${report.startedAt}_turbo`);
    expect(report.threshold).toBe(4);
    expect(report.summary).toEqual({ passed: 1, failed: 1, passRate: 0.5, averageJudgeScore: 4.5 });
    expect(report.cases.map((entry) => [entry.id, entry.outcome.finalPass])).toEqual([
      ['from-file', true],
      ['inline', false]
    ]);
    expect(report.cases[1]?.outcome.failureReasons).toEqual(['Pattern rule no-append not satisfied: No append']);
    expect(report.cases[0]?.tags).toEqual(['layout']);
  });

  it('reports no judge score without a judge', async () => {
    const report = await runSuite({ casesPath });

    expect(report.judgeMode).toEqual({ type: 'none' });
    expect(report.summary.averageJudgeScore).toBeNull();
  });
});
