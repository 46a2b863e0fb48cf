#!/usr/bin/env -S tsx

import fs from "node:fs/promises";
import { isAcpEngineError } from "../modules/core/errors";
import { evaluate, type EvaluationReport } from "../modules/engine/evaluate";
import { loadBenchmarkDataset, runBenchmark } from "../tools/rescatteringBenchmark";

function parseArgs(): { jsonPath?: string; rawJson?: string; datasetPath?: string } {
  const args = process.argv.slice(2);
  let jsonPath: string | undefined;
  let rawJson: string | undefined;
  let datasetPath: string | undefined;

  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (token === "--json" && args[i + 1]) {
      jsonPath = args[i + 1];
      i += 1;
    } else if (token === "--params" && args[i + 1]) {
      rawJson = args[i + 1];
      i += 1;
    } else if (token === "--dataset" && args[i + 1]) {
      datasetPath = args[i + 1];
      i += 1;
    }
  }

  return { jsonPath, rawJson, datasetPath };
}

async function loadConfig(jsonPath?: string, rawJson?: string): Promise<unknown> {
  if (jsonPath) {
    const src = await fs.readFile(jsonPath, "utf8");
    return JSON.parse(src);
  }
  if (rawJson) {
    return JSON.parse(rawJson);
  }
  return undefined;
}

function fmt(n: unknown): string {
  if (typeof n !== "number" || !Number.isFinite(n)) return String(n);
  if (Math.abs(n) >= 1e4 || Math.abs(n) < 1e-3) {
    return n.toExponential(4);
  }
  return n.toFixed(4);
}

function printLines(lines: [string, string][]) {
  const labelWidth = Math.max(...lines.map(([label]) => label.length));
  for (const [label, value] of lines) {
    console.log(label.padEnd(labelWidth + 2), value);
  }
}

function printReport(report: EvaluationReport) {
  console.log(`=== ${report.model}: ${report.description} ===`);
  const lines: [string, string][] = [];
  for (const evaluation of Object.values(report.channels)) {
    if (!evaluation) continue;
    const name = evaluation.channel === "kk" ? "K+K-" : "pi+pi-";
    lines.push([`|A(D0 -> ${name})|^2`, fmt(evaluation.physical.particle.modulusSquared)]);
    lines.push([`|A(D0bar -> ${name})|^2`, fmt(evaluation.physical.antiparticle.modulusSquared)]);
    lines.push([`Acp(${name})`, fmt(evaluation.acp)]);
  }
  if (report.deltaAcp !== undefined) {
    lines.push(["Delta Acp", fmt(report.deltaAcp)]);
  }
  printLines(lines);
}

function runDefaultBenchmark(datasetPath?: string) {
  const summary = runBenchmark(loadBenchmarkDataset(datasetPath));
  console.log(`=== Benchmark ${summary.datasetId} ===`);
  for (const row of summary.rows) {
    console.log(`\n--- delta_2 = ${fmt(row.isospinTwoPhase)} ---`);
    printLines([
      ["Acp(K+K-)", `${fmt(row.acpKK.value)}  (ref ${fmt(row.acpKK.reference)}, ${row.acpKK.withinTolerance ? "ok" : "off"})`],
      ["Acp(pi+pi-)", `${fmt(row.acpPipi.value)}  (ref ${fmt(row.acpPipi.reference)}, ${row.acpPipi.withinTolerance ? "ok" : "off"})`],
      ["Delta Acp", fmt(row.report.deltaAcp)],
    ]);
  }
  if (summary.triangle) {
    console.log("");
    printReport(summary.triangle);
  }
}

async function main() {
  const { jsonPath, rawJson, datasetPath } = parseArgs();
  const config = await loadConfig(jsonPath, rawJson);
  if (config === undefined) {
    runDefaultBenchmark(datasetPath);
    return;
  }
  printReport(evaluate(config));
}

main().catch((err) => {
  if (isAcpEngineError(err)) {
    console.error(`[acp-evaluate] ${err.kind}: ${err.message}`);
  } else {
    console.error("[acp-evaluate] failed:", err);
  }
  process.exit(1);
});
