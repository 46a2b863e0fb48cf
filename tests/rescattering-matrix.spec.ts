import { describe, expect, it } from "vitest";
import { complex, magnitude, modulusSquared, phase } from "../modules/core/complex";
import { InvalidModelParametersError } from "../modules/core/errors";
import { RescatteringMatrix, RescatteringMatrixModel } from "../modules/fsi/rescattering-matrix";
import { buildWeakAmplitudes, buildWeakCouplings } from "../modules/weak/weak-amplitudes";
import { loadBenchmarkDataset } from "../tools/rescatteringBenchmark";
import { topologicalConfig } from "./helpers/weak-configs";

const identityParams = {
  model: "rescattering-matrix",
  coupled: {
    pipi: { strength: 1, mixingAngle: 0, elasticPhase: 0, inelasticPhase: 0 },
    kk: { strength: 1, mixingAngle: 0, elasticPhase: 0, inelasticPhase: 0 },
  },
  isospinOne: { modulus: 1, phase: 0 },
  isospinTwo: { modulus: 1, phase: 0 },
};

describe("coupled-channel rescattering matrix", () => {
  const dataset = loadBenchmarkDataset();

  it("reproduces the benchmark I=0 entries from strengths and mixing angles", () => {
    const matrix = RescatteringMatrix.fromParameters(dataset.rescattering.coupled);
    const expected = [
      ["pipi", "pipi", 0.58, 1.8],
      ["pipi", "kk", 0.64, -1.74],
      ["kk", "pipi", 0.58, -1.37],
      ["kk", "kk", 0.61, 2.26],
    ] as const;
    for (const [row, column, modulus, strongPhase] of expected) {
      const entry = matrix.entry(row, column);
      expect(magnitude(entry)).toBeCloseTo(modulus, 12);
      expect(phase(entry)).toBeCloseTo(strongPhase, 12);
    }
  });

  it("adds the overall phase to every entry", () => {
    const matrix = RescatteringMatrix.fromParameters({ ...dataset.rescattering.coupled, overallPhase: 0.3 });
    expect(phase(matrix.entry("pipi", "pipi"))).toBeCloseTo(2.1, 12);
    expect(phase(matrix.entry("kk", "pipi"))).toBeCloseTo(-1.07, 12);
  });

  it("bounds each row by its strength without bounding the output norm", () => {
    const fullMixing = { strength: 1, mixingAngle: Math.PI / 4, elasticPhase: 0, inelasticPhase: 0 };
    const matrix = RescatteringMatrix.fromParameters({ pipi: fullMixing, kk: fullMixing });
    for (const row of ["pipi", "kk"] as const) {
      const norm = modulusSquared(matrix.entry(row, "pipi")) + modulusSquared(matrix.entry(row, "kk"));
      expect(norm).toBeCloseTo(1, 14);
    }

    const out = matrix.apply({ pipi: complex(1, 0), kk: complex(1, 0) });
    expect(out.pipi.real).toBeCloseTo(Math.SQRT2, 14);
    expect(out.kk.real).toBeCloseTo(Math.SQRT2, 14);
    expect(modulusSquared(out.pipi) + modulusSquared(out.kk)).toBeCloseTo(4, 13);
  });

  it("leaves the weak amplitudes untouched when it is the identity", () => {
    const weak = buildWeakAmplitudes(buildWeakCouplings(topologicalConfig()));
    const physical = RescatteringMatrixModel.fromParameters(identityParams).apply(weak);
    expect(physical.model).toBe("rescattering-matrix");
    expect(physical.isospin).toEqual(weak.isospin);
    expect(physical.finalStates).toEqual(weak.finalStates);
  });

  it("rejects a strength above one", () => {
    const params = {
      ...identityParams,
      coupled: { ...identityParams.coupled, kk: { ...identityParams.coupled.kk, strength: 1.2 } },
    };
    expect(() => RescatteringMatrixModel.fromParameters(params)).toThrow(InvalidModelParametersError);
    expect(() => RescatteringMatrixModel.fromParameters(params)).toThrow(/coupled\.kk\.strength/);
  });

  it("rejects a mixing angle beyond π/2", () => {
    expect(() =>
      RescatteringMatrix.fromParameters({
        ...identityParams.coupled,
        pipi: { ...identityParams.coupled.pipi, mixingAngle: 2 },
      }),
    ).toThrow(InvalidModelParametersError);
  });

  it("rejects an Omnès modulus above one", () => {
    expect(() =>
      RescatteringMatrixModel.fromParameters({ ...identityParams, isospinTwo: { modulus: 1.5, phase: 0 } }),
    ).toThrow(/isospinTwo\.modulus/);
  });
});
