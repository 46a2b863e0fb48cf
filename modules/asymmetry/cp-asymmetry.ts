import { isFiniteComplex, modulusSquared, type ComplexAmplitude } from "../core/complex.js";
import { DegenerateAmplitudeError } from "../core/errors.js";

/**
 * Direct CP asymmetry (|A|² − |Ā|²) / (|A|² + |Ā|²).
 * The result is not clamped; see {@link isPhysicalAsymmetry}.
 * @throws DegenerateAmplitudeError when the summed rate is zero or not finite
 */
export function cpAsymmetry(amplitude: ComplexAmplitude, conjugate: ComplexAmplitude): number {
  const rate = modulusSquared(amplitude);
  const conjugateRate = modulusSquared(conjugate);
  const total = rate + conjugateRate;
  if (!Number.isFinite(total) || total === 0) {
    throw new DegenerateAmplitudeError(`Cannot form an asymmetry from total rate ${total}`, {
      amplitude,
      conjugate,
      finite: isFiniteComplex(amplitude) && isFiniteComplex(conjugate),
    });
  }
  return (rate - conjugateRate) / total;
}

export const isPhysicalAsymmetry = (acp: number): boolean => Number.isFinite(acp) && acp >= -1 && acp <= 1;

/** ΔA_CP = A_CP(K⁺K⁻) − A_CP(π⁺π⁻) */
export const deltaAcp = (acpKK: number, acpPipi: number): number => acpKK - acpPipi;
