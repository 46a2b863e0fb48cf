// Environment switches for the amplitude engine, read once at load.
export const flagEnabled = (value: string | undefined, defaultValue: boolean): boolean => {
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return defaultValue;
};

export const positiveNumber = (value: string | undefined, fallback: number): number => {
  const requested = Number(value ?? fallback);
  if (!Number.isFinite(requested) || requested <= 0) {
    return fallback;
  }
  return requested;
};

const parseMaxDepth = (): number => {
  const requested = positiveNumber(process.env.ACP_QUADRATURE_MAX_DEPTH, 40);
  return Math.min(Math.max(1, Math.floor(requested)), 60);
};

export const ACP_DEBUG_LOG = flagEnabled(process.env.ACP_DEBUG_LOG, false);
export const ACP_QUADRATURE_TOLERANCE = positiveNumber(process.env.ACP_QUADRATURE_TOLERANCE, 1e-10);
export const ACP_QUADRATURE_MAX_DEPTH = parseMaxDepth();
