/**
 * Loop factors for triangle rescattering D → n → f.
 *
 * The triangle is evaluated in on-shell factorised form: the two-meson bubble J̄_n(s)
 * of the intermediate pair times the s-wave projection of the t-channel exchange that
 * turns n into f. Masses in MeV, s in MeV².
 */

import {
  add,
  complex,
  div,
  isFiniteComplex,
  log,
  magnitude,
  mul,
  scale,
  sub,
  type ComplexAmplitude,
} from "../core/complex.js";
import { ConvergenceFailureError, SingularKinematicsError } from "../core/errors.js";
import { pairMomentum } from "../core/physics-constants.js";
import type { LoopProjection, QuadratureBounds } from "../../shared/schema.js";

export const THRESHOLD_TOLERANCE = 1e-9;

const SIXTEEN_PI_SQ = 16 * Math.PI * Math.PI;

export interface TriangleKinematics {
  s: number;
  intermediateMass: number;
  finalMass: number;
  exchangeMass: number;
  exchangeWidth: number;
}

/**
 * Centre-of-mass momentum of an open equal-mass channel.
 * @throws SingularKinematicsError at or below the threshold √s = 2m
 */
export function openChannelMomentum(s: number, mass: number, channel: string): number {
  const sqrtS = Math.sqrt(s);
  const threshold = 2 * mass;
  if (Math.abs(sqrtS - threshold) <= THRESHOLD_TOLERANCE * sqrtS) {
    throw new SingularKinematicsError(`${channel} channel sits at threshold (√s = 2m = ${threshold})`, {
      channel,
      sqrtS,
      threshold,
    });
  }
  if (sqrtS < threshold) {
    throw new SingularKinematicsError(`${channel} channel is closed (√s = ${sqrtS} < 2m = ${threshold})`, {
      channel,
      sqrtS,
      threshold,
    });
  }
  return pairMomentum(s, mass);
}

/**
 * Subtracted two-meson loop above threshold:
 * 16π² J̄(s) = 2 + σ ln((1 − σ)/(1 + σ)) + iπσ, σ = √(1 − 4m²/s)
 */
export function bubbleLoop(s: number, mass: number): ComplexAmplitude {
  const sigma = Math.sqrt(1 - (4 * mass * mass) / s);
  const real = (2 + sigma * Math.log((1 - sigma) / (1 + sigma))) / SIXTEEN_PI_SQ;
  const imag = (Math.PI * sigma) / SIXTEEN_PI_SQ;
  return complex(real, imag);
}

// X − 2pq·cosθ is the exchange propagator denominator m² − i mΓ − t.
const exchangeOffset = (k: TriangleKinematics): ComplexAmplitude =>
  complex(
    k.exchangeMass * k.exchangeMass - k.intermediateMass * k.intermediateMass - k.finalMass * k.finalMass + k.s / 2,
    -k.exchangeMass * k.exchangeWidth,
  );

/**
 * ½∫ dcosθ / (X − b cosθ) = [ln(X + b) − ln(X − b)] / (2b), b = 2pq
 */
export function exchangeProjectionClosedForm(x: ComplexAmplitude, b: number): ComplexAmplitude {
  return scale(sub(log(add(x, complex(b))), log(sub(x, complex(b)))), 1 / (2 * b));
}

type ComplexIntegrand = (c: number) => ComplexAmplitude;

const simpson = (h: number, fa: ComplexAmplitude, fm: ComplexAmplitude, fb: ComplexAmplitude) =>
  scale(add(add(fa, scale(fm, 4)), fb), h / 6);

function adaptiveSimpson(f: ComplexIntegrand, lo: number, hi: number, bounds: QuadratureBounds): ComplexAmplitude {
  const fa = f(lo);
  const fb = f(hi);
  const fm = f((lo + hi) / 2);
  const whole = simpson(hi - lo, fa, fm, fb);
  const tolerance = bounds.relativeTolerance * magnitude(whole);

  const refine = (
    a: number,
    b: number,
    fA: ComplexAmplitude,
    fM: ComplexAmplitude,
    fB: ComplexAmplitude,
    estimate: ComplexAmplitude,
    tol: number,
    depth: number,
  ): ComplexAmplitude => {
    const m = (a + b) / 2;
    const fLm = f((a + m) / 2);
    const fRm = f((m + b) / 2);
    const left = simpson(m - a, fA, fLm, fM);
    const right = simpson(b - m, fM, fRm, fB);
    const delta = sub(add(left, right), estimate);
    if (magnitude(delta) <= 15 * tol) {
      return add(add(left, right), scale(delta, 1 / 15));
    }
    if (depth >= bounds.maxDepth) {
      throw new ConvergenceFailureError(
        `Exchange projection did not reach relative precision ${bounds.relativeTolerance} within depth ${bounds.maxDepth}`,
        { interval: [a, b], error: magnitude(delta) },
      );
    }
    return add(
      refine(a, m, fA, fLm, fM, left, tol / 2, depth + 1),
      refine(m, b, fM, fRm, fB, right, tol / 2, depth + 1),
    );
  };

  return refine(lo, hi, fa, fm, fb, whole, tolerance, 1);
}

export function exchangeProjectionQuadrature(
  x: ComplexAmplitude,
  b: number,
  bounds: QuadratureBounds,
): ComplexAmplitude {
  const integrand: ComplexIntegrand = (c) => div(complex(1), sub(x, complex(b * c)));
  return scale(adaptiveSimpson(integrand, -1, 1, bounds), 0.5);
}

export interface LoopFactorOptions {
  projection: LoopProjection;
  quadrature: QuadratureBounds;
}

/**
 * L_{n→f}(s) = J̄_n(s) · V̂_{n→f}(s)
 * @throws SingularKinematicsError when n or f is at or below threshold, or the factor is not finite
 * @throws ConvergenceFailureError when quadrature exhausts its bound
 */
export function triangleLoopFactor(k: TriangleKinematics, options: LoopFactorOptions): ComplexAmplitude {
  const p = openChannelMomentum(k.s, k.intermediateMass, "intermediate");
  const q = openChannelMomentum(k.s, k.finalMass, "final");
  const x = exchangeOffset(k);
  const b = 2 * p * q;

  const projection =
    options.projection === "quadrature"
      ? exchangeProjectionQuadrature(x, b, options.quadrature)
      : exchangeProjectionClosedForm(x, b);
  const factor = mul(bubbleLoop(k.s, k.intermediateMass), projection);

  if (!isFiniteComplex(factor)) {
    throw new SingularKinematicsError("Triangle loop factor is not finite", {
      s: k.s,
      intermediateMass: k.intermediateMass,
      finalMass: k.finalMass,
      exchangeMass: k.exchangeMass,
    });
  }
  return factor;
}
