/**
 * Short-distance tree and penguin coefficients in naive factorization.
 *
 * Coefficients are CKM-stripped: the tree pieces multiply λ_d (ππ) or λ_s (KK̄),
 * the penguin pieces multiply λ_b. Units follow HADRONIC_INPUTS (MeV).
 */

import { complex, ZERO } from "../core/complex.js";
import { HADRONIC_INPUTS, poleCorrectedFormFactor, type HadronicInputs } from "../core/physics-constants.js";
import type { IsospinCouplings } from "./weak-amplitudes.js";

export interface PenguinEnhancement {
  pipi: number;
  kk: number;
}

const SQRT2 = Math.SQRT2;

export function resolveHadronicInputs(overrides: Partial<HadronicInputs> = {}): HadronicInputs {
  return { ...HADRONIC_INPUTS, ...overrides };
}

const chiralScalarCorrection = (p: HadronicInputs, mesonMass: number, decayConstant: number): number => {
  const x = (mesonMass * mesonMass) / (decayConstant * decayConstant);
  return 1 + 16 * p.twoL8PlusL5 * x + 8 * p.L5 * x;
};

/**
 * δ6: ratio of the scalar-density (Q6) matrix element to the V−A one, per final state.
 */
export function penguinEnhancement(p: HadronicInputs): PenguinEnhancement {
  const fPi = p.f_K / p.fKOverFPi;
  const mq = p.avgLightQuarkMass;
  const mD2 = p.m_D0 * p.m_D0;
  const formPi = poleCorrectedFormFactor(p.F_Dpi_0, p.m_pi, p.m_D0_star);
  const formK = poleCorrectedFormFactor(p.F_DK_0, p.m_K, p.m_Ds0_star);

  const termPi =
    ((p.f_D * mD2) / (fPi * (mD2 - p.m_pi * p.m_pi))) *
    ((p.m_c - mq) / (p.m_c + mq)) *
    (chiralScalarCorrection(p, p.m_pi, fPi) / formPi);
  const pipi = (2 / (p.m_c - mq)) * ((p.m_pi * p.m_pi) / (2 * mq)) * (1 + termPi);

  const termK =
    ((p.f_D * mD2) / (p.f_K * (mD2 - p.m_K * p.m_K))) *
    ((p.m_c - p.m_s) / (p.m_c + mq)) *
    (chiralScalarCorrection(p, p.m_K, p.f_K) / formK);
  const kk = (2 / (p.m_c - p.m_s)) * ((p.m_K * p.m_K) / (p.m_s + mq)) * (1 + termK);

  return { pipi, kk };
}

export function factorizationCouplings(p: HadronicInputs): IsospinCouplings {
  const fPi = p.f_K / p.fKOverFPi;
  const mD2 = p.m_D0 * p.m_D0;
  const delta6 = penguinEnhancement(p);

  const normPi0 = -(p.G_F / SQRT2) * Math.sqrt(2 / 3);
  const normPi2 = -(p.G_F / Math.sqrt(6));
  const normK = p.G_F / SQRT2;
  const commonPi = fPi * (mD2 - p.m_pi * p.m_pi) * poleCorrectedFormFactor(p.F_Dpi_0, p.m_pi, p.m_D0_star);
  const commonK = p.f_K * (mD2 - p.m_K * p.m_K) * poleCorrectedFormFactor(p.F_DK_0, p.m_K, p.m_Ds0_star);

  const pipiI0 = {
    tree: complex(normPi0 * commonPi * (2 * p.c1 - p.c2)),
    penguin: complex(normPi0 * commonPi * (-3 * (p.c4 - p.c6 * delta6.pipi))),
  };
  const pipiI2 = {
    tree: complex(normPi2 * 2 * commonPi * (p.c1 + p.c2)),
    penguin: ZERO,
  };
  const kkI1 = {
    tree: complex(normK * commonK * p.c1),
    penguin: complex(normK * commonK * -(p.c4 - p.c6 * delta6.kk)),
  };
  // D⁰ → KK̄ reaches I=0 and I=1 with opposite sign in this normalisation.
  const kkI0 = {
    tree: complex(-kkI1.tree.real),
    penguin: complex(-kkI1.penguin.real),
  };

  return {
    pipi: { I0: pipiI0, I2: pipiI2 },
    kk: { I0: kkI0, I1: kkI1 },
  };
}
