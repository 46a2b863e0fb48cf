/**
 * FSI model A: coupled-channel rescattering matrix.
 *
 * The I=0 ππ and KK̄ amplitudes are mixed by a 2×2 matrix built from a reduced set of
 * strong parameters; the I=2 ππ and I=1 KK̄ amplitudes each pick up a single-channel
 * Omnès factor. One matrix instance acts on the D⁰ and D̄⁰ amplitudes of a call.
 */

import { add, fromPolar, mul, type ComplexAmplitude } from "../core/complex.js";
import { InvalidModelParametersError, parseWithSchema } from "../core/errors.js";
import { traceLog } from "../core/trace-log.js";
import {
  coupledChannelSchema,
  rescatteringMatrixParamsSchema,
  type CoupledRow,
  type FinalState,
  type OmnesFactor,
  type RescatteringMatrixParams,
} from "../../shared/schema.js";
import { pairFinalStates, type IsospinAmplitudes, type WeakAmplitudeSet } from "../weak/weak-amplitudes.js";
import type { FsiModel, PhysicalAmplitudeSet } from "./types.js";

type ChannelVector = Readonly<Record<FinalState, ComplexAmplitude>>;
type MatrixRow = Readonly<Record<FinalState, ComplexAmplitude>>;

const toModelError = (message: string, details?: Record<string, unknown>) =>
  new InvalidModelParametersError(message, details);

function buildRow(channel: FinalState, row: CoupledRow, overallPhase: number): MatrixRow {
  const elastic = fromPolar(row.strength * Math.cos(row.mixingAngle), overallPhase + row.elasticPhase);
  const inelastic = fromPolar(row.strength * Math.sin(row.mixingAngle), overallPhase + row.inelasticPhase);
  return channel === "pipi"
    ? Object.freeze({ pipi: elastic, kk: inelastic })
    : Object.freeze({ pipi: inelastic, kk: elastic });
}

export class RescatteringMatrix {
  private constructor(private readonly rows: Readonly<Record<FinalState, MatrixRow>>) {
    Object.freeze(this);
  }

  /**
   * Build from strengths, mixing angles and strong phases.
   * `strength` caps the norm of each row; the matrix as a whole is not a contraction.
   * @throws InvalidModelParametersError outside strength ∈ [0,1], mixingAngle ∈ [0, π/2]
   */
  static fromParameters(raw: unknown): RescatteringMatrix {
    const params = parseWithSchema(coupledChannelSchema, raw, "Invalid rescattering matrix parameters", toModelError);
    return new RescatteringMatrix(
      Object.freeze({
        pipi: buildRow("pipi", params.pipi, params.overallPhase),
        kk: buildRow("kk", params.kk, params.overallPhase),
      }),
    );
  }

  /** Transition element from `column` (weak) into `row` (physical). */
  entry(row: FinalState, column: FinalState): ComplexAmplitude {
    return this.rows[row][column];
  }

  apply(vector: ChannelVector): ChannelVector {
    const project = (row: MatrixRow) => add(mul(row.pipi, vector.pipi), mul(row.kk, vector.kk));
    return Object.freeze({ pipi: project(this.rows.pipi), kk: project(this.rows.kk) });
  }
}

const omnes = (factor: OmnesFactor): ComplexAmplitude => fromPolar(factor.modulus, factor.phase);

export class RescatteringMatrixModel implements FsiModel {
  readonly kind = "rescattering-matrix" as const;
  readonly description = "Coupled-channel ππ/KK̄ rescattering matrix with single-channel Omnès factors";

  private readonly matrix: RescatteringMatrix;
  private readonly isospinOne: ComplexAmplitude;
  private readonly isospinTwo: ComplexAmplitude;

  constructor(params: RescatteringMatrixParams) {
    this.matrix = RescatteringMatrix.fromParameters(params.coupled);
    this.isospinOne = omnes(params.isospinOne);
    this.isospinTwo = omnes(params.isospinTwo);
  }

  static fromParameters(raw: unknown): RescatteringMatrixModel {
    return new RescatteringMatrixModel(
      parseWithSchema(rescatteringMatrixParamsSchema, raw, "Invalid rescattering-matrix model parameters", toModelError),
    );
  }

  private transform(amps: IsospinAmplitudes): IsospinAmplitudes {
    const coupled = this.matrix.apply({ pipi: amps.pipi.I0, kk: amps.kk.I0 });
    return Object.freeze({
      pipi: Object.freeze({ I0: coupled.pipi, I2: mul(this.isospinTwo, amps.pipi.I2) }),
      kk: Object.freeze({ I0: coupled.kk, I1: mul(this.isospinOne, amps.kk.I1) }),
    });
  }

  apply(weak: WeakAmplitudeSet): PhysicalAmplitudeSet {
    const particle = this.transform(weak.isospin.particle);
    const antiparticle = this.transform(weak.isospin.antiparticle);
    traceLog("RescatteringMatrix", "applied coupled-channel transformation", {
      I0_pipi: this.matrix.entry("pipi", "pipi"),
      I0_kk: this.matrix.entry("kk", "kk"),
    });
    return Object.freeze({
      model: this.kind,
      isospin: Object.freeze({ particle, antiparticle }),
      finalStates: pairFinalStates(particle, antiparticle),
    });
  }
}
