import { z } from "zod";
import { ACP_QUADRATURE_MAX_DEPTH, ACP_QUADRATURE_TOLERANCE } from "../modules/core/env";
import { CKM_WOLFENSTEIN, EXCHANGE_MESONS, HADRONIC_INPUTS } from "../modules/core/physics-constants";

const finite = () => z.number().finite();
const positive = () => z.number().finite().positive();

export const finalStateSchema = z.enum(["pipi", "kk"]);
export type FinalState = z.infer<typeof finalStateSchema>;

export const channelSelectionSchema = z.enum(["pipi", "kk", "both"]);
export type ChannelSelection = z.infer<typeof channelSelectionSchema>;

export const complexInputSchema = z.object({
  real: finite(),
  imag: finite(),
});
export type ComplexInput = z.infer<typeof complexInputSchema>;

export const polarInputSchema = z.object({
  magnitude: finite().nonnegative(),
  phase: finite(),
});
export type PolarInput = z.infer<typeof polarInputSchema>;

// --- CKM ---------------------------------------------------------------------

export const wolfensteinSchema = z.object({
  kind: z.literal("wolfenstein"),
  lambda: finite().gt(0).lt(1).default(CKM_WOLFENSTEIN.lambda),
  A: positive().default(CKM_WOLFENSTEIN.A),
  rhoBar: finite().default(CKM_WOLFENSTEIN.rhoBar),
  etaBar: finite().default(CKM_WOLFENSTEIN.etaBar),
});
export type WolfensteinInput = z.infer<typeof wolfensteinSchema>;

export const ckmProductsInputSchema = z.object({
  kind: z.literal("products"),
  lambdaD: complexInputSchema,
  lambdaS: complexInputSchema,
  lambdaB: complexInputSchema,
});
export type CkmProductsInput = z.infer<typeof ckmProductsInputSchema>;

export const ckmInputSchema = z.discriminatedUnion("kind", [wolfensteinSchema, ckmProductsInputSchema]);
export type CkmInput = z.infer<typeof ckmInputSchema>;

// --- weak couplings ----------------------------------------------------------

export const topologyCouplingSchema = z.object({
  tree: polarInputSchema,
  penguin: polarInputSchema,
});
export type TopologyCoupling = z.infer<typeof topologyCouplingSchema>;

export const topologicalCouplingsSchema = z.object({
  kind: z.literal("topological"),
  pipi: z.object({ I0: topologyCouplingSchema, I2: topologyCouplingSchema }),
  kk: z.object({ I0: topologyCouplingSchema, I1: topologyCouplingSchema }),
});
export type TopologicalCouplingsInput = z.infer<typeof topologicalCouplingsSchema>;

export const hadronicInputsSchema = z.object({
  c1: finite(),
  c2: finite(),
  c3: finite(),
  c4: finite(),
  c5: finite(),
  c6: finite(),
  m_u: positive(),
  m_d: positive(),
  m_s: positive(),
  m_c: positive(),
  avgLightQuarkMass: positive(),
  m_D0: positive(),
  m_D0_star: positive(),
  m_Ds0_star: positive(),
  m_pi: positive(),
  m_K: positive(),
  G_F: positive(),
  f_K: positive(),
  f_D: positive(),
  fKOverFPi: positive(),
  L5: finite(),
  twoL8PlusL5: finite(),
  F_Dpi_0: finite(),
  F_DK_0: finite(),
});

export const factorizationCouplingsSchema = z.object({
  kind: z.literal("factorization"),
  hadronic: hadronicInputsSchema.partial().default({}),
});
export type FactorizationCouplingsInput = z.infer<typeof factorizationCouplingsSchema>;

export const couplingsInputSchema = z.discriminatedUnion("kind", [
  topologicalCouplingsSchema,
  factorizationCouplingsSchema,
]);
export type CouplingsInput = z.infer<typeof couplingsInputSchema>;

export const weakConfigSchema = z.object({
  ckm: ckmInputSchema,
  couplings: couplingsInputSchema,
});
export type WeakConfig = z.infer<typeof weakConfigSchema>;
export type WeakConfigInput = z.input<typeof weakConfigSchema>;

// --- FSI model A: coupled-channel rescattering matrix -------------------------

export const coupledRowSchema = z.object({
  strength: finite().min(0).max(1),
  mixingAngle: finite().min(0).max(Math.PI / 2),
  elasticPhase: finite(),
  inelasticPhase: finite(),
});
export type CoupledRow = z.infer<typeof coupledRowSchema>;

export const omnesFactorSchema = z.object({
  modulus: finite().min(0).max(1),
  phase: finite(),
});
export type OmnesFactor = z.infer<typeof omnesFactorSchema>;

export const coupledChannelSchema = z.object({
  pipi: coupledRowSchema,
  kk: coupledRowSchema,
  overallPhase: finite().default(0),
});
export type CoupledChannelParams = z.infer<typeof coupledChannelSchema>;

export const rescatteringMatrixParamsSchema = z.object({
  model: z.literal("rescattering-matrix"),
  coupled: coupledChannelSchema,
  isospinOne: omnesFactorSchema,
  isospinTwo: omnesFactorSchema,
});
export type RescatteringMatrixParams = z.infer<typeof rescatteringMatrixParamsSchema>;
export type RescatteringMatrixParamsInput = z.input<typeof rescatteringMatrixParamsSchema>;

// --- FSI model B: triangle rescattering --------------------------------------

export const exchangeMesonSchema = z.enum(["rho", "kStar", "phi"]);
export type ExchangeMeson = z.infer<typeof exchangeMesonSchema>;

// A diagram names a standard exchange meson, gives mass and width explicitly, or both
// (explicit values win).
export const exchangeDiagramSchema = z
  .object({
    from: finalStateSchema,
    to: finalStateSchema,
    meson: exchangeMesonSchema.optional(),
    exchangeMass: positive().optional(),
    exchangeWidth: positive().optional(),
    coupling: finite(),
    label: z.string().optional(),
  })
  .transform((diagram, ctx) => {
    const standard = diagram.meson ? EXCHANGE_MESONS[diagram.meson] : undefined;
    const exchangeMass = diagram.exchangeMass ?? standard?.mass;
    const exchangeWidth = diagram.exchangeWidth ?? standard?.width;
    if (exchangeMass === undefined || exchangeWidth === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "exchange diagram needs a meson or an explicit exchangeMass and exchangeWidth",
      });
      return z.NEVER;
    }
    return {
      from: diagram.from,
      to: diagram.to,
      exchangeMass,
      exchangeWidth,
      coupling: diagram.coupling,
      label: diagram.label ?? diagram.meson,
    };
  });
export type ExchangeDiagram = z.infer<typeof exchangeDiagramSchema>;

export const loopProjectionSchema = z.enum(["closed-form", "quadrature"]);
export type LoopProjection = z.infer<typeof loopProjectionSchema>;

export const quadratureBoundsSchema = z.object({
  relativeTolerance: positive().default(ACP_QUADRATURE_TOLERANCE),
  maxDepth: z.number().int().min(1).max(60).default(ACP_QUADRATURE_MAX_DEPTH),
});
export type QuadratureBounds = z.infer<typeof quadratureBoundsSchema>;

export const triangleLoopParamsSchema = z.object({
  model: z.literal("triangle-rescattering"),
  decayingMass: positive().default(HADRONIC_INPUTS.m_D0),
  channelMasses: z
    .object({ pipi: positive(), kk: positive() })
    .default({ pipi: HADRONIC_INPUTS.m_pi, kk: HADRONIC_INPUTS.m_K }),
  diagrams: z.array(exchangeDiagramSchema),
  projection: loopProjectionSchema.default("closed-form"),
  quadrature: quadratureBoundsSchema.default({}),
});
export type TriangleLoopParams = z.infer<typeof triangleLoopParamsSchema>;
export type TriangleLoopParamsInput = z.input<typeof triangleLoopParamsSchema>;

// --- evaluation --------------------------------------------------------------

export const fsiSelectorSchema = z
  .object({
    model: z.string(),
  })
  .passthrough();

export const evaluationConfigSchema = z.object({
  channel: channelSelectionSchema.default("both"),
  weak: weakConfigSchema,
  fsi: fsiSelectorSchema,
});
export type EvaluationConfig = z.infer<typeof evaluationConfigSchema>;
export type EvaluationConfigInput = z.input<typeof evaluationConfigSchema>;

export const benchmarkDatasetSchema = z.object({
  datasetId: z.string(),
  description: z.string(),
  weak: weakConfigSchema,
  rescattering: rescatteringMatrixParamsSchema,
  triangle: z
    .object({
      weak: weakConfigSchema,
      params: triangleLoopParamsSchema,
    })
    .optional(),
  reference: z.object({
    relativeTolerance: positive(),
    acpKK: finite(),
    acpPipi: z.array(
      z.object({
        isospinTwoPhase: finite(),
        acp: finite(),
      }),
    ),
  }),
});
export type BenchmarkDataset = z.infer<typeof benchmarkDatasetSchema>;
