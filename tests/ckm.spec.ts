import { describe, expect, it } from "vitest";
import { add, magnitude } from "../modules/core/complex";
import { CKM_WOLFENSTEIN } from "../modules/core/physics-constants";
import { ckmFromWolfenstein, conjugateCkm, resolveCkmProducts } from "../modules/weak/ckm";
import { ckmInputSchema } from "../shared/schema";
import { expectComplexClose } from "./helpers/expect-close";

describe("CKM products", () => {
  it("maps central Wolfenstein inputs onto λ_d, λ_s, λ_b", () => {
    const products = ckmFromWolfenstein(CKM_WOLFENSTEIN);
    expectComplexClose(products.lambdaD, { real: -0.21909830567851304, imag: 1.33361107243838e-4 });
    expectComplexClose(products.lambdaS, { real: 0.2190342275878398, imag: 7.1114217819294776e-6 });
    expectComplexClose(products.lambdaB, { real: 6.407809067321498e-5, imag: -1.4047252902576747e-4 });
  });

  it("satisfies λ_d + λ_s + λ_b = 0 to rounding", () => {
    const { lambdaD, lambdaS, lambdaB } = ckmFromWolfenstein({ lambda: 0.2, A: 0.9, rhoBar: 0.1, etaBar: 0.4 });
    expect(magnitude(add(add(lambdaD, lambdaS), lambdaB))).toBeLessThan(1e-15);
  });

  it("fills omitted Wolfenstein parameters with central values", () => {
    const input = ckmInputSchema.parse({ kind: "wolfenstein" });
    expect(input).toEqual({ kind: "wolfenstein", ...CKM_WOLFENSTEIN });
  });

  it("passes explicit products through unchanged", () => {
    const products = resolveCkmProducts({
      kind: "products",
      lambdaD: { real: -0.22, imag: 1.3e-4 },
      lambdaS: { real: 0.22, imag: 6.9e-6 },
      lambdaB: { real: 6.1e-5, imag: -1.4e-4 },
    });
    expect(products.lambdaD).toEqual({ real: -0.22, imag: 1.3e-4 });
    expect(products.lambdaB).toEqual({ real: 6.1e-5, imag: -1.4e-4 });
  });

  it("has no weak phase when η̄ = 0", () => {
    const products = ckmFromWolfenstein({ ...CKM_WOLFENSTEIN, etaBar: 0 });
    expect(Math.abs(products.lambdaD.imag)).toBe(0);
    expect(Math.abs(products.lambdaS.imag)).toBe(0);
    expect(Math.abs(products.lambdaB.imag)).toBe(0);
  });

  it("conjugates every product for the antiparticle", () => {
    const products = ckmFromWolfenstein(CKM_WOLFENSTEIN);
    const conjugated = conjugateCkm(products);
    expect(conjugated.lambdaB).toEqual({ real: products.lambdaB.real, imag: -products.lambdaB.imag });
    expect(conjugateCkm(conjugated)).toEqual(products);
  });

  it("rejects λ outside (0, 1)", () => {
    expect(ckmInputSchema.safeParse({ kind: "wolfenstein", lambda: 1.2 }).success).toBe(false);
  });
});
