#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import chalk from 'chalk';
import { Command } from 'commander';
import {
  createScenarioRunner,
  loadHarnessConfig,
  renderOutcomeText,
  resolveJudgeMode,
  runSuite,
  toOutcomeReport,
  writeReport
} from '@skillcheck/runner';
import { ingestReport } from './ingest.js';
import {
  buildJudgeMode,
  loadRules,
  parseSkillRef,
  withOverrides,
  type JudgeFlags,
  type OverrideFlags
} from './options.js';

interface EvaluateOptions extends JudgeFlags, OverrideFlags {
  skill: string;
  scenario: string;
  artifact: string;
  rules?: string;
  criteria?: string[];
  format: string;
}

interface SuiteCommandOptions extends JudgeFlags, OverrideFlags {
  cases: string;
  suite: string;
  out: string;
  submittedBy: string;
  ingestUrl?: string;
  ingestKey?: string;
}

const program = new Command();

program
  .name('skillcheck')
  .description('Check generated artifacts against skill guidance with pattern rules and LLM judges');

program
  .command('evaluate')
  .description('Evaluate a single artifact for one skill and scenario')
  .requiredOption('--skill <domain/name>', 'skill under test, e.g. turbo/page-refresh')
  .requiredOption('--scenario <text>', 'scenario description given to the judge')
  .requiredOption('--artifact <path>', 'file holding the generated artifact')
  .option('--rules <path>', 'JSON file with an array of pattern rules')
  .option('--criteria <text...>', 'extra review criteria for the judge')
  .option('--judge <provider>', 'single judge: none | mock | anthropic | openai | gemini')
  .option('--cross <providers>', 'comma-separated providers for cross-validation')
  .option('--min-providers <n>', 'usable verdicts required in cross-validation')
  .option('--threshold <score>', 'minimum judge score on the 0-5 scale')
  .option('--deadline-ms <ms>', 'overall deadline for cross-validation')
  .option('--format <format>', 'output format: text | json', 'text')
  .action(async (options: EvaluateOptions) => {
    const workspaceRoot = process.env.INIT_CWD ?? process.cwd();
    const config = withOverrides(loadHarnessConfig(), options);
    const judgeMode = buildJudgeMode(options, resolveJudgeMode(config));
    const rules = loadRules(options.rules ? resolve(workspaceRoot, options.rules) : undefined);
    const artifact = readFileSync(resolve(workspaceRoot, options.artifact), 'utf8');

    const outcome = await createScenarioRunner(config).run({
      skill: parseSkillRef(options.skill),
      scenario: options.scenario,
      artifact,
      rules,
      judgeMode,
      criteria: options.criteria ?? []
    });

    if (options.format === 'json') {
      console.log(JSON.stringify(toOutcomeReport(outcome), null, 2));
    } else {
      const [header, ...rest] = renderOutcomeText(outcome).split('\n');
      console.log(outcome.finalPass ? chalk.green(header) : chalk.red(header));
      console.log(rest.join('\n'));
    }

    process.exitCode = outcome.finalPass ? 0 : 1;
  });

program
  .command('suite')
  .description('Run every scenario case in a directory and write a suite report')
  .option('--cases <path>', 'directory of scenario case files', 'cases')
  .option('--suite <name>', 'suite name', 'skills')
  .option('--out <path>', 'output report path', 'reports/suite-report.json')
  .option('--judge <provider>', 'single judge: none | mock | anthropic | openai | gemini')
  .option('--cross <providers>', 'comma-separated providers for cross-validation')
  .option('--min-providers <n>', 'usable verdicts required in cross-validation')
  .option('--threshold <score>', 'minimum judge score on the 0-5 scale')
  .option('--deadline-ms <ms>', 'overall deadline for cross-validation')
  .option('--submitted-by <name>', 'person or runner label', 'local-user')
  .option('--ingest-url <url>', 'POST endpoint for report ingestion')
  .option('--ingest-key <key>', 'Bearer token for ingestion auth')
  .action(async (options: SuiteCommandOptions) => {
    const workspaceRoot = process.env.INIT_CWD ?? process.cwd();
    const reportPath = resolve(workspaceRoot, options.out);
    const config = withOverrides(loadHarnessConfig(), options);

    const report = await runSuite(
      {
        suiteName: options.suite,
        casesPath: resolve(workspaceRoot, options.cases),
        judgeMode: buildJudgeMode(options, resolveJudgeMode(config)),
        threshold: config.threshold,
        ...(config.crossDeadlineMs !== undefined ? { crossDeadlineMs: config.crossDeadlineMs } : {})
      },
      { judgeSettings: config.judge }
    );

    writeReport(report, reportPath);

    if (options.ingestUrl) {
      await ingestReport({
        ingestUrl: options.ingestUrl,
        ...(options.ingestKey ? { ingestKey: options.ingestKey } : {}),
        submittedBy: options.submittedBy,
        report
      });
    }

    console.table([
      { metric: 'passed', value: report.summary.passed },
      { metric: 'failed', value: report.summary.failed },
      { metric: 'pass rate', value: report.summary.passRate.toFixed(3) },
      {
        metric: 'judge score',
        value: report.summary.averageJudgeScore?.toFixed(2) ?? 'n/a'
      }
    ]);

    for (const caseReport of report.cases) {
      if (!caseReport.outcome.finalPass) {
        console.log(chalk.red(`FAIL ${caseReport.id}: ${caseReport.outcome.failureReasons.join('; ')}`));
      }
    }

    console.log(`Report written to ${reportPath}`);
    process.exitCode = report.summary.failed > 0 ? 1 : 0;
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
