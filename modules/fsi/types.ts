import type { ConjugatePair, FinalStateAmplitudes, IsospinAmplitudes, WeakAmplitudeSet } from "../weak/weak-amplitudes.js";

export type FsiModelKind = "rescattering-matrix" | "triangle-rescattering";

export interface PhysicalAmplitudeSet {
  readonly model: FsiModelKind;
  readonly finalStates: FinalStateAmplitudes;
  /** Present for models that work in the isospin basis. */
  readonly isospin?: ConjugatePair<IsospinAmplitudes>;
}

/**
 * Final-state interaction model: maps weak amplitudes onto physical ones.
 * One strong-interaction transformation is applied to D⁰ and D̄⁰ alike.
 */
export interface FsiModel {
  readonly kind: FsiModelKind;
  readonly description: string;
  apply(weak: WeakAmplitudeSet): PhysicalAmplitudeSet;
}
