/**
 * FSI model B: triangle rescattering.
 *
 * A_f = A_f^weak + Σ_{n→f} A_n^weak · L_{n→f}(M_D²) · h_{n→f}
 *
 * Each diagram is a weak D → n vertex, an on-shell n pair, and a t-channel exchange that
 * rescatters n into f. The loop factors depend on masses only, so one set is computed per
 * call and shared between D⁰ and D̄⁰.
 */

import { add, mul, scale, type ComplexAmplitude } from "../core/complex.js";
import { InvalidModelParametersError, parseWithSchema } from "../core/errors.js";
import { traceLog } from "../core/trace-log.js";
import {
  triangleLoopParamsSchema,
  type ExchangeDiagram,
  type FinalState,
  type TriangleLoopParams,
} from "../../shared/schema.js";
import type { ConjugatePair, FinalStateAmplitudes, WeakAmplitudeSet } from "../weak/weak-amplitudes.js";
import { triangleLoopFactor } from "./loop-functions.js";
import type { FsiModel, PhysicalAmplitudeSet } from "./types.js";

export interface RescatteringTerm {
  readonly diagram: ExchangeDiagram;
  /** L_{n→f} · h_{n→f}, common to D⁰ and D̄⁰. */
  readonly weight: ComplexAmplitude;
}

export class TriangleRescatteringModel implements FsiModel {
  readonly kind = "triangle-rescattering" as const;
  readonly description = "Triangle rescattering through t-channel meson exchange between ππ and KK̄";

  private readonly params: TriangleLoopParams;

  constructor(params: TriangleLoopParams) {
    this.params = { ...params, diagrams: [...params.diagrams] };
  }

  static fromParameters(raw: unknown): TriangleRescatteringModel {
    return new TriangleRescatteringModel(
      parseWithSchema(
        triangleLoopParamsSchema,
        raw,
        "Invalid triangle-rescattering model parameters",
        (message, details) => new InvalidModelParametersError(message, details),
      ),
    );
  }

  /**
   * Loop-weighted rescattering terms for the configured diagrams.
   * @throws SingularKinematicsError, ConvergenceFailureError
   */
  rescatteringTerms(): RescatteringTerm[] {
    const { decayingMass, channelMasses, projection, quadrature } = this.params;
    const s = decayingMass * decayingMass;
    return this.params.diagrams.map((diagram) => {
      const loop = triangleLoopFactor(
        {
          s,
          intermediateMass: channelMasses[diagram.from],
          finalMass: channelMasses[diagram.to],
          exchangeMass: diagram.exchangeMass,
          exchangeWidth: diagram.exchangeWidth,
        },
        { projection, quadrature },
      );
      return Object.freeze({ diagram, weight: scale(loop, diagram.coupling) });
    });
  }

  apply(weak: WeakAmplitudeSet): PhysicalAmplitudeSet {
    const terms = this.rescatteringTerms();
    traceLog("TriangleRescattering", "loop factors evaluated", {
      diagrams: terms.map((t) => t.diagram.label ?? `${t.diagram.from}->${t.diagram.to}`),
      projection: this.params.projection,
    });

    const rescatter = (f: FinalState, pick: (pair: ConjugatePair) => ComplexAmplitude): ComplexAmplitude =>
      terms
        .filter((t) => t.diagram.to === f)
        .reduce((acc, t) => add(acc, mul(pick(weak.finalStates[t.diagram.from]), t.weight)), pick(weak.finalStates[f]));

    const pairFor = (f: FinalState): ConjugatePair =>
      Object.freeze({
        particle: rescatter(f, (pair) => pair.particle),
        antiparticle: rescatter(f, (pair) => pair.antiparticle),
      });

    const finalStates: FinalStateAmplitudes = Object.freeze({ pipi: pairFor("pipi"), kk: pairFor("kk") });
    return Object.freeze({ model: this.kind, finalStates });
  }
}
