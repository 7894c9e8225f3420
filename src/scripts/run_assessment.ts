#!/usr/bin/env tsx
/* eslint-disable no-console */
// npx tsx src/scripts/run_assessment.ts evaluate 1975 2000 [strict|moderate|loose] [--json]
// npx tsx src/scripts/run_assessment.ts assess 2030 [--json]
import { assessFutureTargets } from "../analysis/assess_future_targets";
import { CitationRegistry } from "../analysis/citations";
import { evaluatePastForecasts } from "../analysis/evaluate_past_forecasts";
import {
  parseAssessRequest,
  parseEvaluateRequest,
  type QueryParams,
} from "../analysis/requests";
import { toWireEvaluation, toWireTargetAssessment } from "../analysis/wire";
import { errorMessage } from "../domain/errors";
import { formatQuantity } from "../domain/quantity";
import { SECTORS } from "../domain/types";
import { createForecastLedger } from "../ledger";
import { currentYear } from "../util/clock";

function usage(): never {
  console.error(
    "Usage:\n  run_assessment.ts evaluate <forecastYear> <targetYear> [band] [--json]\n  run_assessment.ts assess <targetYear> [--json]"
  );
  process.exit(1);
}

function fail(issues: string[]): never {
  console.error("Invalid arguments:");
  for (const issue of issues) console.error(`  ${issue}`);
  process.exit(1);
}

async function runEvaluate(args: string[], asJson: boolean) {
  const ledger = createForecastLedger();
  const params: QueryParams = {
    forecastYear: args[0],
    targetYear: args[1],
    band: args[2],
  };
  const request = parseEvaluateRequest(params, {
    band: ledger.settings.defaultBand,
    registry: ledger.registry,
  });
  if (!request.ok) fail(request.error);

  const report = await evaluatePastForecasts(
    { ...request.data, thresholds: ledger.settings.tolerance },
    { orchestrator: ledger.orchestrator, registry: ledger.registry }
  );
  if (asJson) {
    console.log(JSON.stringify(toWireEvaluation(report), null, 2));
    return;
  }

  const citations = new CitationRegistry();
  console.log(
    `=== Forecasts made in ${report.forecastYear} about ${report.targetYear} (${report.band} band) ===`
  );
  for (const sector of SECTORS) {
    const results = report.results[sector];
    if (!results || results.length === 0) continue;
    console.log(`[${sector}]`);
    for (const r of results) {
      const actual = r.actual ? formatQuantity(r.actual.actualValue) : "n/a";
      const deviation =
        r.deviationRatio === null ? "" : ` (${(r.deviationRatio * 100).toFixed(1)}%)`;
      console.log(
        `  ${r.forecast.metric}: predicted ${formatQuantity(r.forecast.predictedValue)}, actual ${actual} -> ${r.status}${deviation} ${citations.inline(r.forecast.provenanceUrl)}`
      );
    }
  }
  const t = report.tally;
  console.log(
    `Totals: EARLY ${t.EARLY} | ON_TIME ${t.ON_TIME} | LATE ${t.LATE} | UNRESOLVED ${t.UNRESOLVED}`
  );
  printFooter(citations, report.failures.length);
}

async function runAssess(args: string[], asJson: boolean) {
  const ledger = createForecastLedger();
  const request = parseAssessRequest(
    { targetYear: args[0] },
    {
      band: ledger.settings.defaultBand,
      registry: ledger.registry,
      nowYear: currentYear(ledger.clock),
    }
  );
  if (!request.ok) fail(request.error);

  const report = await assessFutureTargets(
    { ...request.data, thresholds: ledger.settings.tolerance },
    { orchestrator: ledger.orchestrator, registry: ledger.registry },
    { clock: ledger.clock, minSampleSize: ledger.settings.minSampleSize }
  );
  if (asJson) {
    console.log(JSON.stringify(toWireTargetAssessment(report), null, 2));
    return;
  }

  const citations = new CitationRegistry();
  console.log(`=== Targets due by ${report.targetYear} ===`);
  for (const sector of SECTORS) {
    const assessments = report.assessments[sector];
    if (!assessments || assessments.length === 0) continue;
    console.log(`[${sector}]`);
    for (const a of assessments) {
      const p = a.prediction;
      console.log(
        `  ${p.metric}: ${formatQuantity(p.currentProgress)} of ${formatQuantity(p.targetValue)} -> ${a.outlook}, p=${a.probability.toFixed(2)} (${a.confidence}) ${citations.inline(p.provenanceUrl)}`
      );
      for (const line of a.rationale) console.log(`    - ${line}`);
    }
  }
  for (const r of report.rejected) {
    console.log(`  rejected ${r.prediction.metric}: ${r.reason}`);
  }
  printFooter(citations, report.failures.length);
}

function printFooter(citations: CitationRegistry, failureCount: number) {
  if (failureCount > 0) {
    console.log(`${failureCount} source request(s) failed; see logs`);
  }
  console.log("");
  for (const { tag, url } of citations.render()) {
    console.log(`${tag}: ${url}`);
  }
}

async function main() {
  const argv = process.argv.slice(2);
  const asJson = argv.includes("--json");
  const [command, ...rest] = argv.filter((a) => a !== "--json");

  if (command === "evaluate") return runEvaluate(rest, asJson);
  if (command === "assess") return runAssess(rest, asJson);
  usage();
}

main().catch((err) => {
  console.error("run_assessment failed:", errorMessage(err));
  process.exit(1);
});
