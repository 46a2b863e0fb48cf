/**
 * Hadronic and flavour inputs for D⁰ → ππ, KK̄ amplitudes
 * Central values from the PDG and the FSI literature; masses in MeV
 */

export const HADRONIC_INPUTS = {
  // Wilson coefficients at μ = 2 GeV
  c1: 1.18,
  c2: -0.32,
  c3: 0.011,
  c4: -0.031,
  c5: 0.0068,
  c6: -0.032,

  // MS-bar quark masses at 2 GeV (MeV)
  m_u: 2.14,
  m_d: 4.7,
  m_s: 93.46,
  m_c: 1097,
  avgLightQuarkMass: 3.427, // (m_u + m_d) / 2

  // Meson masses (MeV)
  m_D0: 1864.84,
  m_D0_star: 2343,   // scalar pole for D → π
  m_Ds0_star: 2317.8, // scalar pole for D → K
  m_pi: 139.57,
  m_K: 496,

  G_F: 1.1663788e-11, // Fermi constant (MeV⁻²)
  f_K: 155.7,         // kaon decay constant (MeV)
  f_D: 212.0,         // D decay constant (MeV)
  fKOverFPi: 1.1934,

  // Chiral low-energy constants
  L5: 1.2e-3,
  twoL8PlusL5: -0.15e-3,

  // Scalar form factors at q² = 0
  F_Dpi_0: 0.612,
  F_DK_0: 0.7385,
} as const;

export type HadronicInputs = { -readonly [K in keyof typeof HADRONIC_INPUTS]: number };

/** Wolfenstein parameters (PDG global fit). */
export const CKM_WOLFENSTEIN = {
  lambda: 0.225,
  A: 0.826,
  rhoBar: 0.159,
  etaBar: 0.348,
} as const;

/** t-channel exchange mesons for triangle rescattering (MeV). */
export const EXCHANGE_MESONS = {
  rho: { mass: 775.26, width: 149.1 },
  kStar: { mass: 891.67, width: 51.4 },
  phi: { mass: 1019.461, width: 4.249 },
} as const;

/**
 * Centre-of-mass momentum of an equal-mass pair, q = √(s/4 − m²)
 */
export function pairMomentum(s: number, mass: number): number {
  return Math.sqrt(s / 4 - mass * mass);
}

/**
 * Scalar form factor at q² = m², single-pole extrapolation from q² = 0
 */
export function poleCorrectedFormFactor(f0: number, mass: number, poleMass: number): number {
  return f0 / (1 - (mass * mass) / (poleMass * poleMass));
}
