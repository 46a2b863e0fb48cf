/**
 * Evaluation entry point: configuration → weak amplitudes → FSI model → A_CP.
 */

import { magnitude, modulusSquared, phase, type ComplexAmplitude } from "../core/complex.js";
import { InvalidConfigurationError, parseWithSchema } from "../core/errors.js";
import { fsiModelRegistry } from "../core/model-registry.js";
import { traceLog, warnLog } from "../core/trace-log.js";
import { cpAsymmetry, deltaAcp, isPhysicalAsymmetry } from "../asymmetry/cp-asymmetry.js";
import type { FsiModel, FsiModelKind } from "../fsi/types.js";
import { buildWeakAmplitudes, buildWeakCouplings, type ConjugatePair } from "../weak/weak-amplitudes.js";
import {
  evaluationConfigSchema,
  type ChannelSelection,
  type FinalState,
} from "../../shared/schema.js";

export interface AmplitudeReport {
  real: number;
  imag: number;
  magnitude: number;
  phase: number;
  modulusSquared: number;
}

export interface ChannelEvaluation {
  channel: FinalState;
  weak: ConjugatePair<AmplitudeReport>;
  physical: ConjugatePair<AmplitudeReport>;
  acp: number;
  /** false when acp falls outside [-1, 1]; the value itself is left as computed. */
  physicalRange: boolean;
}

export interface EvaluationReport {
  model: FsiModelKind;
  description: string;
  channels: Partial<Record<FinalState, ChannelEvaluation>>;
  deltaAcp?: number;
}

export const reportAmplitude = (c: ComplexAmplitude): AmplitudeReport => ({
  real: c.real,
  imag: c.imag,
  magnitude: magnitude(c),
  phase: phase(c),
  modulusSquared: modulusSquared(c),
});

const reportPair = (pair: ConjugatePair): ConjugatePair<AmplitudeReport> => ({
  particle: reportAmplitude(pair.particle),
  antiparticle: reportAmplitude(pair.antiparticle),
});

const selectedChannels = (selection: ChannelSelection): FinalState[] =>
  selection === "both" ? ["pipi", "kk"] : [selection];

/**
 * Run one configuration through the weak builder, an FSI model and the asymmetry evaluator.
 * @throws AcpEngineError subclasses; nothing is substituted on failure
 */
export function evaluate(raw: unknown): EvaluationReport {
  const config = parseWithSchema(
    evaluationConfigSchema,
    raw,
    "Invalid evaluation configuration",
    (message, details) => new InvalidConfigurationError(message, details),
  );
  const model: FsiModel = fsiModelRegistry.create(config.fsi.model, config.fsi);
  return evaluateWithModel(model, config.weak, config.channel);
}

export function evaluateWithModel(model: FsiModel, weakConfig: unknown, selection: ChannelSelection = "both"): EvaluationReport {
  const weak = buildWeakAmplitudes(buildWeakCouplings(weakConfig));
  const physical = model.apply(weak);

  const channels: Partial<Record<FinalState, ChannelEvaluation>> = {};
  for (const channel of selectedChannels(selection)) {
    const pair = physical.finalStates[channel];
    const acp = cpAsymmetry(pair.particle, pair.antiparticle);
    const physicalRange = isPhysicalAsymmetry(acp);
    if (!physicalRange) {
      warnLog("Evaluate", "asymmetry outside [-1, 1]", { channel, acp, model: model.kind });
    }
    channels[channel] = {
      channel,
      weak: reportPair(weak.finalStates[channel]),
      physical: reportPair(pair),
      acp,
      physicalRange,
    };
  }

  const report: EvaluationReport = { model: model.kind, description: model.description, channels };
  if (channels.kk && channels.pipi) {
    report.deltaAcp = deltaAcp(channels.kk.acp, channels.pipi.acp);
  }
  traceLog("Evaluate", "evaluation complete", {
    model: model.kind,
    acp: Object.fromEntries(Object.entries(channels).map(([k, v]) => [k, v?.acp])),
  });
  return report;
}
