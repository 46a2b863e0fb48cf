import { describe, expect, it } from "vitest";
import { ConvergenceFailureError, InvalidModelParametersError, SingularKinematicsError } from "../modules/core/errors";
import { EXCHANGE_MESONS, HADRONIC_INPUTS } from "../modules/core/physics-constants";
import {
  bubbleLoop,
  exchangeProjectionClosedForm,
  openChannelMomentum,
  triangleLoopFactor,
  type LoopFactorOptions,
} from "../modules/fsi/loop-functions";
import { TriangleRescatteringModel } from "../modules/fsi/triangle-rescattering";
import { buildWeakAmplitudes, buildWeakCouplings } from "../modules/weak/weak-amplitudes";
import { expectComplexClose } from "./helpers/expect-close";
import { topologicalConfig } from "./helpers/weak-configs";

const s = HADRONIC_INPUTS.m_D0 * HADRONIC_INPUTS.m_D0;
const closedForm: LoopFactorOptions = {
  projection: "closed-form",
  quadrature: { relativeTolerance: 1e-10, maxDepth: 40 },
};
const quadrature: LoopFactorOptions = { ...closedForm, projection: "quadrature" };

const kStarKkToPipi = {
  s,
  intermediateMass: HADRONIC_INPUTS.m_K,
  finalMass: HADRONIC_INPUTS.m_pi,
  exchangeMass: EXCHANGE_MESONS.kStar.mass,
  exchangeWidth: EXCHANGE_MESONS.kStar.width,
};

describe("triangle loop functions", () => {
  it("evaluates the subtracted bubble above threshold", () => {
    expectComplexClose(bubbleLoop(s, HADRONIC_INPUTS.m_pi), {
      real: -0.019726882858621266,
      imag: 0.019670230385659408,
    });
    expectComplexClose(bubbleLoop(s, HADRONIC_INPUTS.m_K), {
      real: -0.0006831493718136615,
      imag: 0.016846079579167526,
    });
  });

  it("evaluates the loop factor for each exchange", () => {
    const cases = [
      [HADRONIC_INPUTS.m_pi, HADRONIC_INPUTS.m_pi, EXCHANGE_MESONS.rho, -1.1828466624328975e-8, 9.930075912807535e-9],
      [HADRONIC_INPUTS.m_K, HADRONIC_INPUTS.m_pi, EXCHANGE_MESONS.kStar, -6.116271111252522e-10, 8.789142013569298e-9],
      [HADRONIC_INPUTS.m_pi, HADRONIC_INPUTS.m_K, EXCHANGE_MESONS.kStar, -1.0601749667129862e-8, 9.976299219072795e-9],
      [HADRONIC_INPUTS.m_K, HADRONIC_INPUTS.m_K, EXCHANGE_MESONS.phi, -3.550847102608235e-10, 8.265302727933372e-9],
    ] as const;
    for (const [intermediateMass, finalMass, meson, real, imag] of cases) {
      const factor = triangleLoopFactor(
        { s, intermediateMass, finalMass, exchangeMass: meson.mass, exchangeWidth: meson.width },
        closedForm,
      );
      expectComplexClose(factor, { real, imag });
    }
  });

  it("agrees between the closed form and adaptive quadrature", () => {
    const exact = triangleLoopFactor(kStarKkToPipi, closedForm);
    const numeric = triangleLoopFactor(kStarKkToPipi, quadrature);
    expectComplexClose(numeric, exact, 1e-9);
  });

  it("reduces to 1/X for a vanishing momentum product", () => {
    const x = { real: 4, imag: -2 };
    const projection = exchangeProjectionClosedForm(x, 1e-6);
    expectComplexClose(projection, { real: 0.2, imag: 0.1 }, 1e-6);
  });

  it("rejects a channel sitting exactly at threshold", () => {
    const atThreshold = (2 * HADRONIC_INPUTS.m_K) ** 2;
    expect(() => openChannelMomentum(atThreshold, HADRONIC_INPUTS.m_K, "kk")).toThrow(SingularKinematicsError);
    expect(() => openChannelMomentum(atThreshold, HADRONIC_INPUTS.m_K, "kk")).toThrow(/threshold/);
  });

  it("rejects a closed channel", () => {
    expect(() => triangleLoopFactor({ ...kStarKkToPipi, s: 900 * 900 }, closedForm)).toThrow(/closed/);
  });

  it("reports convergence failure when quadrature exhausts its depth", () => {
    const exhausted: LoopFactorOptions = {
      projection: "quadrature",
      quadrature: { relativeTolerance: 1e-12, maxDepth: 1 },
    };
    expect(() => triangleLoopFactor(kStarKkToPipi, exhausted)).toThrow(ConvergenceFailureError);
  });
});

describe("triangle rescattering model", () => {
  const weak = buildWeakAmplitudes(buildWeakCouplings(topologicalConfig()));

  it("adds nothing without diagrams", () => {
    const physical = TriangleRescatteringModel.fromParameters({ model: "triangle-rescattering", diagrams: [] }).apply(weak);
    expect(physical.model).toBe("triangle-rescattering");
    expect(physical.finalStates).toEqual(weak.finalStates);
  });

  it("adds nothing when every coupling is zero", () => {
    const model = TriangleRescatteringModel.fromParameters({
      model: "triangle-rescattering",
      diagrams: [
        { meson: "rho", from: "pipi", to: "pipi", coupling: 0 },
        { meson: "kStar", from: "kk", to: "pipi", coupling: 0 },
        { meson: "kStar", from: "pipi", to: "kk", coupling: 0 },
      ],
    });
    expect(model.apply(weak).finalStates).toEqual(weak.finalStates);
  });

  it("weights each diagram by its loop factor and coupling", () => {
    const model = TriangleRescatteringModel.fromParameters({
      model: "triangle-rescattering",
      diagrams: [{ meson: "phi", from: "kk", to: "kk", coupling: 1e7 }],
    });
    const [term] = model.rescatteringTerms();
    expect(term.diagram.label).toBe("phi");
    expect(term.diagram.exchangeMass).toBe(EXCHANGE_MESONS.phi.mass);
    expectComplexClose(term.weight, {
      real: -3.550847102608235e-3,
      imag: 8.265302727933372e-2,
    });
  });

  it("prefers an explicit exchange mass over the named meson", () => {
    const model = TriangleRescatteringModel.fromParameters({
      model: "triangle-rescattering",
      diagrams: [{ meson: "rho", exchangeMass: 780, from: "pipi", to: "pipi", coupling: 1 }],
    });
    const [term] = model.rescatteringTerms();
    expect(term.diagram.exchangeMass).toBe(780);
    expect(term.diagram.exchangeWidth).toBe(EXCHANGE_MESONS.rho.width);
  });

  it("rejects a diagram with neither meson nor mass", () => {
    expect(() =>
      TriangleRescatteringModel.fromParameters({
        model: "triangle-rescattering",
        diagrams: [{ from: "pipi", to: "kk", coupling: 1 }],
      }),
    ).toThrow(InvalidModelParametersError);
  });

  it("rejects a negative exchange width", () => {
    expect(() =>
      TriangleRescatteringModel.fromParameters({
        model: "triangle-rescattering",
        diagrams: [{ from: "pipi", to: "kk", exchangeMass: 891.67, exchangeWidth: -1, coupling: 1 }],
      }),
    ).toThrow(/diagrams\.0\.exchangeWidth/);
  });

  it("rejects a decaying mass at the K⁺K⁻ threshold", () => {
    const model = TriangleRescatteringModel.fromParameters({
      model: "triangle-rescattering",
      decayingMass: 2 * HADRONIC_INPUTS.m_K,
      diagrams: [{ meson: "phi", from: "kk", to: "kk", coupling: 1 }],
    });
    expect(() => model.apply(weak)).toThrow(SingularKinematicsError);
  });

  it("surfaces quadrature failure from apply", () => {
    const model = TriangleRescatteringModel.fromParameters({
      model: "triangle-rescattering",
      diagrams: [{ meson: "kStar", from: "kk", to: "pipi", coupling: 1 }],
      projection: "quadrature",
      quadrature: { relativeTolerance: 1e-12, maxDepth: 1 },
    });
    expect(() => model.apply(weak)).toThrow(ConvergenceFailureError);
  });
});
