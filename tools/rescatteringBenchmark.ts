import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { InvalidConfigurationError, parseWithSchema } from "../modules/core/errors";
import { evaluateWithModel, type EvaluationReport } from "../modules/engine/evaluate";
import { RescatteringMatrixModel } from "../modules/fsi/rescattering-matrix";
import { TriangleRescatteringModel } from "../modules/fsi/triangle-rescattering";
import { benchmarkDatasetSchema, type BenchmarkDataset } from "../shared/schema";

export const DEFAULT_BENCHMARK_PATH = fileURLToPath(
  new URL("../datasets/charm/rescattering-benchmark.json", import.meta.url),
);

export interface BenchmarkComparison {
  value: number;
  reference: number;
  relativeDeviation: number;
  withinTolerance: boolean;
}

export interface BenchmarkRow {
  isospinTwoPhase: number;
  report: EvaluationReport;
  acpKK: BenchmarkComparison;
  acpPipi: BenchmarkComparison;
}

export interface BenchmarkSummary {
  datasetId: string;
  rows: BenchmarkRow[];
  triangle?: EvaluationReport;
}

export function loadBenchmarkDataset(filePath: string = DEFAULT_BENCHMARK_PATH): BenchmarkDataset {
  const raw: unknown = JSON.parse(readFileSync(filePath, "utf8"));
  return parseWithSchema(
    benchmarkDatasetSchema,
    raw,
    `Invalid benchmark dataset ${filePath}`,
    (message, details) => new InvalidConfigurationError(message, details),
  );
}

const compare = (value: number, reference: number, tolerance: number): BenchmarkComparison => {
  const relativeDeviation = Math.abs(value - reference) / Math.abs(reference);
  return { value, reference, relativeDeviation, withinTolerance: relativeDeviation <= tolerance };
};

const requireAcp = (report: EvaluationReport, channel: "pipi" | "kk"): number => {
  const evaluation = report.channels[channel];
  if (!evaluation) {
    throw new InvalidConfigurationError(`Benchmark report has no ${channel} channel`);
  }
  return evaluation.acp;
};

export function runBenchmark(dataset: BenchmarkDataset): BenchmarkSummary {
  const { relativeTolerance, acpKK, acpPipi } = dataset.reference;

  const rows = acpPipi.map(({ isospinTwoPhase, acp }): BenchmarkRow => {
    const model = new RescatteringMatrixModel({
      ...dataset.rescattering,
      isospinTwo: { ...dataset.rescattering.isospinTwo, phase: isospinTwoPhase },
    });
    const report = evaluateWithModel(model, dataset.weak);
    return {
      isospinTwoPhase,
      report,
      acpKK: compare(requireAcp(report, "kk"), acpKK, relativeTolerance),
      acpPipi: compare(requireAcp(report, "pipi"), acp, relativeTolerance),
    };
  });

  const triangle = dataset.triangle
    ? evaluateWithModel(new TriangleRescatteringModel(dataset.triangle.params), dataset.triangle.weak)
    : undefined;

  return { datasetId: dataset.datasetId, rows, triangle };
}
