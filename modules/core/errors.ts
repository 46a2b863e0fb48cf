import type { z, ZodError, ZodTypeAny } from "zod";

export type AcpErrorKind =
  | "InvalidConfiguration"
  | "InvalidModelParameters"
  | "SingularKinematics"
  | "DegenerateAmplitude"
  | "ConvergenceFailure";

export class AcpEngineError extends Error {
  readonly kind: AcpErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: AcpErrorKind, message: string, details?: Record<string, unknown>) {
    super(message);
    this.kind = kind;
    this.details = details;
    this.name = "AcpEngineError";
  }
}

export class InvalidConfigurationError extends AcpEngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("InvalidConfiguration", message, details);
    this.name = "InvalidConfigurationError";
  }
}

export class InvalidModelParametersError extends AcpEngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("InvalidModelParameters", message, details);
    this.name = "InvalidModelParametersError";
  }
}

export class SingularKinematicsError extends AcpEngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("SingularKinematics", message, details);
    this.name = "SingularKinematicsError";
  }
}

export class DegenerateAmplitudeError extends AcpEngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("DegenerateAmplitude", message, details);
    this.name = "DegenerateAmplitudeError";
  }
}

export class ConvergenceFailureError extends AcpEngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("ConvergenceFailure", message, details);
    this.name = "ConvergenceFailureError";
  }
}

export const formatZodIssues = (error: ZodError): string =>
  error.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");

type ErrorFactory = (message: string, details?: Record<string, unknown>) => AcpEngineError;

export function parseWithSchema<T extends ZodTypeAny>(
  schema: T,
  raw: unknown,
  context: string,
  toError: ErrorFactory,
): z.output<T> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw toError(`${context}: ${formatZodIssues(parsed.error)}`, { issues: parsed.error.issues });
  }
  return parsed.data;
}

export const isAcpEngineError = (err: unknown): err is AcpEngineError => err instanceof AcpEngineError;
