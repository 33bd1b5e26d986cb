import type { SuiteReport } from '@skillcheck/runner';

export async function ingestReport(input: {
  ingestUrl: string;
  ingestKey?: string;
  submittedBy: string;
  report: SuiteReport;
}): Promise<void> {
  const response = await fetch(input.ingestUrl, {
    method: 'POST',
    headers: {
      'content-type': 'application/json',
      ...(input.ingestKey ? { authorization: `Bearer ${input.ingestKey}` } : {})
    },
    body: JSON.stringify({
      suiteName: input.report.suiteName,
      submittedBy: input.submittedBy,
      report: input.report
    })
  });

  if (!response.ok) {
    const text = await response.text();
    throw new Error(`Ingest failed (${response.status}): ${text}`);
  }
}
