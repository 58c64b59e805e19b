#!/usr/bin/env node
import 'dotenv/config';
import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { parseArgs } from 'node:util';
import { loadConfig } from '../src/infrastructure/config.js';
import { logger } from '../src/infrastructure/logger.js';
import { decisionsRequestInput } from '../src/domain/schemas.js';
import { parseCaseFile, runReview } from '../src/services/pipeline/index.js';
import { acceptedFixes, applyDecisions, applyFixes } from '../src/services/routing/index.js';

const log = logger.child({ module: 'review-case' });

function printUsage(): never {
  console.error('Usage: npm run review -- <case.json> [--decisions decisions.json] [--auto-apply 0.9] [--emit-fixed out.json]');
  console.error('Prints the review bundle as JSON. Exit code 2 when review is required.');
  process.exit(1);
}

function parseThreshold(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const threshold = Number(value);
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    console.error(`--auto-apply must be a number between 0 and 1, got '${value}'`);
    process.exit(1);
  }
  return threshold;
}

async function readJson(path: string): Promise<unknown> {
  return JSON.parse(await readFile(resolve(path), 'utf-8'));
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      decisions: { type: 'string' },
      'auto-apply': { type: 'string' },
      'emit-fixed': { type: 'string' },
    },
  });

  const [casePath] = positionals;
  if (!casePath) printUsage();

  const config = loadConfig();
  const autoApplyThreshold = parseThreshold(values['auto-apply']) ?? config.review.autoApplyThreshold;
  const input = await readJson(casePath);

  const reviewed = await runReview(input, { config: config.review, autoApplyThreshold });
  if (!reviewed.ok) {
    log.error({ errorCode: reviewed.error.code, details: reviewed.error.details }, reviewed.error.message);
    process.exit(1);
  }

  let bundle = reviewed.value.bundle;

  if (values.decisions) {
    const parsed = decisionsRequestInput.safeParse(await readJson(values.decisions));
    if (!parsed.success) {
      const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      log.error({ details }, 'Decisions file failed validation');
      process.exit(1);
    }

    const decided = applyDecisions(bundle, parsed.data.decisions);
    if (!decided.ok) {
      log.error({ errorCode: decided.error.code }, decided.error.message);
      process.exit(1);
    }
    bundle = decided.value.bundle;
  }

  if (values['emit-fixed']) {
    const parsedCase = parseCaseFile(input);
    if (parsedCase.ok) {
      const records = applyFixes(parsedCase.value.records, acceptedFixes(bundle, autoApplyThreshold));
      await writeFile(resolve(values['emit-fixed']), JSON.stringify({ caseId: bundle.caseId, records }, null, 2));
      log.info({ path: values['emit-fixed'] }, 'Fixed case file written');
    }
  }

  process.stdout.write(`${JSON.stringify(bundle, null, 2)}\n`);
  process.exitCode = bundle.overallRecommendation === 'REVIEW_REQUIRED' ? 2 : 0;
}

main().catch((error) => {
  log.fatal({ err: error instanceof Error ? error.message : String(error) }, 'Review failed');
  process.exit(1);
});
