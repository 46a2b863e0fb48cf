/**
 * Weak (short-distance) amplitudes for D⁰ and D̄⁰ → ππ, KK̄.
 *
 * Amplitudes live in the isospin basis (ππ: I=0,2; KK̄: I=0,1) and are projected onto
 * π⁺π⁻ and K⁺K⁻. The antiparticle uses conjugated CKM products; the strong-phase-bearing
 * tree and penguin coefficients are shared.
 */

import { add, fromPolar, mul, scale, type ComplexAmplitude } from "../core/complex.js";
import { InvalidConfigurationError, parseWithSchema } from "../core/errors.js";
import { traceLog } from "../core/trace-log.js";
import {
  weakConfigSchema,
  type CouplingsInput,
  type FinalState,
  type TopologyCoupling,
} from "../../shared/schema.js";
import { conjugateCkm, lambdaSd, resolveCkmProducts, type CkmProducts } from "./ckm.js";
import { factorizationCouplings, resolveHadronicInputs } from "./factorization.js";

export interface IsospinCoupling {
  readonly tree: ComplexAmplitude;
  readonly penguin: ComplexAmplitude;
}

export interface IsospinCouplings {
  readonly pipi: { readonly I0: IsospinCoupling; readonly I2: IsospinCoupling };
  readonly kk: { readonly I0: IsospinCoupling; readonly I1: IsospinCoupling };
}

/**
 * Which CKM combination the tree coefficients multiply.
 * - "flavour": λ_d for ππ, λ_s for KK̄ (factorization coefficients)
 * - "u-spin": −λ_sd for ππ, +λ_sd for KK̄ with λ_sd = (λ_s − λ_d)/2; the −λ_b/2 remainder
 *   belongs to the penguin coefficient, so tree-only amplitudes share one weak phase
 */
export type TreeCkmBasis = "flavour" | "u-spin";

export interface WeakCouplings extends IsospinCouplings {
  readonly ckm: CkmProducts;
  readonly treeBasis: TreeCkmBasis;
}

export interface IsospinAmplitudes {
  readonly pipi: { readonly I0: ComplexAmplitude; readonly I2: ComplexAmplitude };
  readonly kk: { readonly I0: ComplexAmplitude; readonly I1: ComplexAmplitude };
}

export interface ConjugatePair<T = ComplexAmplitude> {
  readonly particle: T;
  readonly antiparticle: T;
}

export type FinalStateAmplitudes = Readonly<Record<FinalState, ConjugatePair>>;

export interface WeakAmplitudeSet {
  readonly couplings: WeakCouplings;
  readonly isospin: ConjugatePair<IsospinAmplitudes>;
  readonly finalStates: FinalStateAmplitudes;
}

const INV_SQRT6 = 1 / Math.sqrt(6);
const INV_2SQRT3 = 1 / (2 * Math.sqrt(3));

/**
 * A(π⁺π⁻) = A₀/√6 + A₂/(2√3), A(K⁺K⁻) = (A₀ + A₁)/2
 */
export function projectFinalStates(amps: IsospinAmplitudes): Record<FinalState, ComplexAmplitude> {
  return {
    pipi: add(scale(amps.pipi.I0, INV_SQRT6), scale(amps.pipi.I2, INV_2SQRT3)),
    kk: scale(add(amps.kk.I0, amps.kk.I1), 0.5),
  };
}

export function pairFinalStates(particle: IsospinAmplitudes, antiparticle: IsospinAmplitudes): FinalStateAmplitudes {
  const p = projectFinalStates(particle);
  const a = projectFinalStates(antiparticle);
  return Object.freeze({
    pipi: Object.freeze({ particle: p.pipi, antiparticle: a.pipi }),
    kk: Object.freeze({ particle: p.kk, antiparticle: a.kk }),
  });
}

const fromTopology = (input: TopologyCoupling): IsospinCoupling =>
  Object.freeze({
    tree: fromPolar(input.tree.magnitude, input.tree.phase),
    penguin: fromPolar(input.penguin.magnitude, input.penguin.phase),
  });

function resolveCouplings(input: CouplingsInput): IsospinCouplings {
  if (input.kind === "topological") {
    return {
      pipi: { I0: fromTopology(input.pipi.I0), I2: fromTopology(input.pipi.I2) },
      kk: { I0: fromTopology(input.kk.I0), I1: fromTopology(input.kk.I1) },
    };
  }
  return factorizationCouplings(resolveHadronicInputs(input.hadronic));
}

const freezeCouplings = (ckm: CkmProducts, treeBasis: TreeCkmBasis, c: IsospinCouplings): WeakCouplings =>
  Object.freeze({
    ckm,
    treeBasis,
    pipi: Object.freeze({ I0: Object.freeze({ ...c.pipi.I0 }), I2: Object.freeze({ ...c.pipi.I2 }) }),
    kk: Object.freeze({ I0: Object.freeze({ ...c.kk.I0 }), I1: Object.freeze({ ...c.kk.I1 }) }),
  });

/**
 * Validate a weak configuration and fix its couplings.
 * @throws InvalidConfigurationError on a missing coupling, negative magnitude or non-finite input
 */
export function buildWeakCouplings(raw: unknown): WeakCouplings {
  const config = parseWithSchema(
    weakConfigSchema,
    raw,
    "Invalid weak configuration",
    (message, details) => new InvalidConfigurationError(message, details),
  );
  const ckm = resolveCkmProducts(config.ckm);
  const couplings = resolveCouplings(config.couplings);
  const treeBasis: TreeCkmBasis = config.couplings.kind === "topological" ? "u-spin" : "flavour";
  traceLog("WeakAmplitudes", "couplings resolved", { kind: config.couplings.kind, treeBasis });
  return freezeCouplings(ckm, treeBasis, couplings);
}

const combine = (coupling: IsospinCoupling, treeCkm: ComplexAmplitude, penguinCkm: ComplexAmplitude) =>
  add(mul(treeCkm, coupling.tree), mul(penguinCkm, coupling.penguin));

function treeFactors(ckm: CkmProducts, basis: TreeCkmBasis): Record<FinalState, ComplexAmplitude> {
  if (basis === "flavour") {
    return { pipi: ckm.lambdaD, kk: ckm.lambdaS };
  }
  const sd = lambdaSd(ckm);
  return { pipi: scale(sd, -1), kk: sd };
}

function isospinAmplitudes(couplings: WeakCouplings, ckm: CkmProducts): IsospinAmplitudes {
  const tree = treeFactors(ckm, couplings.treeBasis);
  return Object.freeze({
    pipi: Object.freeze({
      I0: combine(couplings.pipi.I0, tree.pipi, ckm.lambdaB),
      I2: combine(couplings.pipi.I2, tree.pipi, ckm.lambdaB),
    }),
    kk: Object.freeze({
      I0: combine(couplings.kk.I0, tree.kk, ckm.lambdaB),
      I1: combine(couplings.kk.I1, tree.kk, ckm.lambdaB),
    }),
  });
}

export function buildWeakAmplitudes(couplings: WeakCouplings): WeakAmplitudeSet {
  const particle = isospinAmplitudes(couplings, couplings.ckm);
  const antiparticle = isospinAmplitudes(couplings, conjugateCkm(couplings.ckm));
  return Object.freeze({
    couplings,
    isospin: Object.freeze({ particle, antiparticle }),
    finalStates: pairFinalStates(particle, antiparticle),
  });
}
