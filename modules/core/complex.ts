/**
 * Complex amplitude arithmetic.
 *
 * Values are frozen; every helper returns a fresh value. Special IEEE values are
 * passed through untouched so that callers further down the pipeline can reject them.
 */

export interface ComplexAmplitude {
  readonly real: number;
  readonly imag: number;
}

export const complex = (real: number, imag = 0): ComplexAmplitude => Object.freeze({ real, imag });

export const ZERO: ComplexAmplitude = complex(0, 0);

export const fromPolar = (magnitude: number, phase: number): ComplexAmplitude =>
  complex(magnitude * Math.cos(phase), magnitude * Math.sin(phase));

export const add = (a: ComplexAmplitude, b: ComplexAmplitude): ComplexAmplitude =>
  complex(a.real + b.real, a.imag + b.imag);

export const sub = (a: ComplexAmplitude, b: ComplexAmplitude): ComplexAmplitude =>
  complex(a.real - b.real, a.imag - b.imag);

export const mul = (a: ComplexAmplitude, b: ComplexAmplitude): ComplexAmplitude =>
  complex(a.real * b.real - a.imag * b.imag, a.real * b.imag + a.imag * b.real);

export const scale = (c: ComplexAmplitude, s: number): ComplexAmplitude => complex(c.real * s, c.imag * s);

export const conj = (c: ComplexAmplitude): ComplexAmplitude => complex(c.real, -c.imag);

// re² + im²; never square a hypot.
export const modulusSquared = (c: ComplexAmplitude): number => c.real * c.real + c.imag * c.imag;

export const magnitude = (c: ComplexAmplitude): number => Math.hypot(c.real, c.imag);

/** Argument in (-π, π]. */
export const phase = (c: ComplexAmplitude): number => Math.atan2(c.imag, c.real);

/**
 * Unguarded division: a zero divisor yields NaN/Infinity components rather than a
 * substituted value.
 */
export const div = (a: ComplexAmplitude, b: ComplexAmplitude): ComplexAmplitude => {
  const denom = modulusSquared(b);
  return complex(
    (a.real * b.real + a.imag * b.imag) / denom,
    (a.imag * b.real - a.real * b.imag) / denom,
  );
};

/** Principal branch, cut along the negative real axis. */
export const log = (c: ComplexAmplitude): ComplexAmplitude => complex(Math.log(magnitude(c)), phase(c));

export const isFiniteComplex = (c: ComplexAmplitude): boolean =>
  Number.isFinite(c.real) && Number.isFinite(c.imag);
