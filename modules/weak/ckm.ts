/**
 * CKM products λ_q = V*_cq V_uq entering c → u q q̄ transitions.
 *
 * Wolfenstein inputs are mapped onto the exact standard parameterisation
 * (s12 = λ, s23 = Aλ², s13 e^{iδ} from ρ̄ + iη̄), so the products satisfy
 * λ_d + λ_s + λ_b = 0 to rounding.
 */

import { complex, conj, div, magnitude, mul, scale, sub, type ComplexAmplitude } from "../core/complex.js";
import { traceLog } from "../core/trace-log.js";
import type { CkmInput, WolfensteinInput } from "../../shared/schema.js";

export interface CkmProducts {
  readonly lambdaD: ComplexAmplitude;
  readonly lambdaS: ComplexAmplitude;
  readonly lambdaB: ComplexAmplitude;
}

export function ckmFromWolfenstein(w: Omit<WolfensteinInput, "kind">): CkmProducts {
  const { lambda, A, rhoBar, etaBar } = w;
  const l2 = lambda * lambda;
  const a2l4 = A * A * l2 * l2;
  const rhoEta = complex(rhoBar, etaBar);

  // s13 e^{iδ}
  const numerator = scale(rhoEta, A * l2 * lambda * Math.sqrt(1 - a2l4));
  const denominator = scale(sub(complex(1), scale(rhoEta, a2l4)), Math.sqrt(1 - l2));
  const z = div(numerator, denominator);

  const s12 = lambda;
  const s23 = A * l2;
  const s13 = magnitude(z);
  const c12 = Math.sqrt(1 - s12 * s12);
  const c23 = Math.sqrt(1 - s23 * s23);
  const c13 = Math.sqrt(1 - s13 * s13);

  const Vud = complex(c12 * c13);
  const Vus = complex(s12 * c13);
  const Vub = conj(z);
  const Vcd = sub(complex(-s12 * c23), scale(z, c12 * s23));
  const Vcs = sub(complex(c12 * c23), scale(z, s12 * s23));
  const Vcb = complex(s23 * c13);

  return Object.freeze({
    lambdaD: mul(conj(Vcd), Vud),
    lambdaS: mul(conj(Vcs), Vus),
    lambdaB: mul(conj(Vcb), Vub),
  });
}

export function resolveCkmProducts(input: CkmInput): CkmProducts {
  if (input.kind === "products") {
    return Object.freeze({
      lambdaD: complex(input.lambdaD.real, input.lambdaD.imag),
      lambdaS: complex(input.lambdaS.real, input.lambdaS.imag),
      lambdaB: complex(input.lambdaB.real, input.lambdaB.imag),
    });
  }
  const products = ckmFromWolfenstein(input);
  traceLog("CKM", "resolved Wolfenstein inputs", {
    lambdaD: products.lambdaD,
    lambdaS: products.lambdaS,
    lambdaB: products.lambdaB,
  });
  return products;
}

/** λ_sd = (λ_s − λ_d)/2; with unitarity λ_d = −λ_sd − λ_b/2 and λ_s = λ_sd − λ_b/2. */
export const lambdaSd = (p: CkmProducts): ComplexAmplitude => scale(sub(p.lambdaS, p.lambdaD), 0.5);

/** CP conjugation of the weak vertex: every CKM element replaced by its conjugate. */
export const conjugateCkm = (p: CkmProducts): CkmProducts =>
  Object.freeze({
    lambdaD: conj(p.lambdaD),
    lambdaS: conj(p.lambdaS),
    lambdaB: conj(p.lambdaB),
  });
